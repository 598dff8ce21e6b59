import pino from "pino";
import { env } from "../config/env.js";
import { FIELD_SHAPES, passesChecksum, scoreCandidate, type FieldShape } from "./candidateScorer.js";
import { amountValue, normalizeAmount } from "./fieldNormalizers.js";
import { SharpVariantGenerator, type ImageVariant, type VariantGenerator, type VariantName } from "./image/variantGenerator.js";
import { LocalTesseractAdapter } from "./ocr/localTesseractAdapter.js";
import type { FieldKind } from "../types/document.js";
import type { ImageRegion, OcrBackend, RecognizeConfig } from "../types/ocr.js";

const logger = pino({ name: "field-recovery", level: env.LOG_LEVEL });

export interface RecoveryResult {
  value: string;
  confidence: number;
  region?: ImageRegion;
  variant?: VariantName;
  config?: RecognizeConfig;
}

export interface FieldRecoverer {
  recover(image: Buffer, fieldKind: FieldKind, candidateRegions?: readonly ImageRegion[]): Promise<RecoveryResult>;
}

export interface FieldRecoveryOptions {
  backend: OcrBackend;
  variants: VariantGenerator;
  minScore: number;
  maxParallel: number;
  corrections: Readonly<Record<string, string>>;
  /** Bound on each OCR call; a call that runs over is skipped. */
  timeoutMs: number;
}

const DIGITS = "0123456789";

export const RECOVERY_CONFIGS: Readonly<Record<FieldKind, readonly RecognizeConfig[]>> = {
  cae: [
    { pageSegMode: "single_line", charWhitelist: DIGITS },
    { pageSegMode: "single_word", charWhitelist: DIGITS },
    { pageSegMode: "single_block", charWhitelist: DIGITS },
    { pageSegMode: "single_line" }
  ],
  cuit: [
    { pageSegMode: "single_line", charWhitelist: `${DIGITS}-` },
    { pageSegMode: "single_word", charWhitelist: `${DIGITS}-` },
    { pageSegMode: "single_block", charWhitelist: `${DIGITS}-` },
    { pageSegMode: "single_line" }
  ],
  amount: [
    { pageSegMode: "single_line", charWhitelist: `${DIGITS}.,$` },
    { pageSegMode: "single_block", charWhitelist: `${DIGITS}.,$` },
    { pageSegMode: "single_line" }
  ]
};

export const DEFAULT_REGIONS: Readonly<Record<FieldKind, readonly ImageRegion[]>> = {
  cae: [
    { left: 0.5, top: 0.5, width: 0.5, height: 0.5 },
    { left: 0, top: 0.75, width: 1, height: 0.25 },
    { left: 0.6667, top: 0.6667, width: 0.3333, height: 0.3333 }
  ],
  cuit: [
    { left: 0, top: 0.25, width: 0.5, height: 0.5 },
    { left: 0, top: 0.3333, width: 0.5, height: 0.3333 },
    { left: 0.5, top: 0.25, width: 0.5, height: 0.5 },
    { left: 0.5, top: 0.3333, width: 0.5, height: 0.3333 }
  ],
  amount: [
    { left: 0.5, top: 0.75, width: 0.5, height: 0.25 },
    { left: 0.6667, top: 0.6667, width: 0.3333, height: 0.3333 }
  ]
};

/** Glyphs OCR commonly confuses with digits. Tunable; not derived from data. */
export const DEFAULT_CORRECTIONS: Readonly<Record<string, string>> = {
  O: "0",
  o: "0",
  D: "0",
  Q: "0",
  I: "1",
  l: "1",
  "|": "1",
  S: "5",
  s: "5",
  B: "8",
  G: "6",
  Z: "2",
  z: "2",
  T: "7"
};

const KIND_SHAPES: Readonly<Record<FieldKind, FieldShape>> = {
  cae: FIELD_SHAPES.cae,
  cuit: FIELD_SHAPES.cuit,
  amount: FIELD_SHAPES.amount
};

const EMPTY_RESULT: RecoveryResult = { value: "", confidence: 0 };

/**
 * Applies the correction map inside tokens that already contain a digit,
 * leaving plain words such as "TOTAL" alone.
 */
export function applyCorrections(text: string, corrections: Readonly<Record<string, string>> = DEFAULT_CORRECTIONS): string {
  return text
    .split(/(\s+)/)
    .map((token) =>
      /\d/.test(token)
        ? Array.from(token, (char) => corrections[char] ?? char).join("")
        : token
    )
    .join("");
}

export function candidatesFromText(text: string, fieldKind: FieldKind): string[] {
  const found = new Set<string>();

  if (fieldKind === "amount") {
    const amounts = (text.match(/\d[\d.,]*\d|\d/g) ?? [])
      .map((token) => normalizeAmount(token))
      .filter((value): value is string => value !== undefined)
      .sort((left, right) => (amountValue(right) ?? 0) - (amountValue(left) ?? 0));
    amounts.forEach((value) => found.add(value));
    return [...found];
  }

  const length = fieldKind === "cae" ? 14 : 11;
  for (const line of text.split(/\r?\n/)) {
    const compact = line.replace(/[\s.-]/g, "");
    for (const run of compact.match(/\d+/g) ?? []) {
      if (run.length === length) {
        found.add(run);
      } else if (run.length > length) {
        for (let start = 0; start + length <= run.length; start += 1) {
          found.add(run.slice(start, start + length));
        }
      }
    }
  }
  return [...found];
}

/**
 * Targeted re-OCR of a critical field: every region, preprocessing
 * variant and engine configuration is tried and the best-scoring
 * candidate wins. A region whose winner passes its checksum ends the
 * search early.
 */
export class FieldRecoveryService implements FieldRecoverer {
  private readonly options: FieldRecoveryOptions;

  constructor(options: Partial<FieldRecoveryOptions> = {}) {
    this.options = {
      backend: options.backend ?? new LocalTesseractAdapter(),
      variants: options.variants ?? new SharpVariantGenerator(),
      minScore: options.minScore ?? env.RECOVERY_MIN_SCORE,
      maxParallel: Math.max(1, options.maxParallel ?? 4),
      corrections: options.corrections ?? DEFAULT_CORRECTIONS,
      timeoutMs: options.timeoutMs ?? env.OCR_TIMEOUT_MS
    };
  }

  async recover(
    image: Buffer,
    fieldKind: FieldKind,
    candidateRegions?: readonly ImageRegion[]
  ): Promise<RecoveryResult> {
    const regions = candidateRegions && candidateRegions.length > 0 ? candidateRegions : DEFAULT_REGIONS[fieldKind];
    const shape = KIND_SHAPES[fieldKind];
    let best: RecoveryResult | undefined;

    try {
      for (const region of regions) {
        const regionBest = await this.searchRegion(image, region, fieldKind, shape);
        if (regionBest && (!best || regionBest.confidence > best.confidence)) {
          best = regionBest;
        }
        if (best && best.confidence > this.options.minScore && passesChecksum(best.value, shape)) {
          break;
        }
      }
    } catch (error) {
      logger.warn({ err: error, fieldKind }, "Field recovery aborted");
    }

    if (!best || best.confidence <= this.options.minScore) {
      logger.debug({ fieldKind, bestConfidence: best?.confidence ?? 0 }, "No recovery candidate cleared the minimum score");
      return EMPTY_RESULT;
    }

    logger.info(
      { fieldKind, confidence: best.confidence, variant: best.variant, region: best.region },
      "Critical field recovered"
    );
    return best;
  }

  private async searchRegion(
    image: Buffer,
    region: ImageRegion,
    fieldKind: FieldKind,
    shape: FieldShape
  ): Promise<RecoveryResult | undefined> {
    let variants: ImageVariant[];
    try {
      variants = await this.options.variants.variants(await this.options.variants.crop(image, region));
    } catch (error) {
      logger.debug({ err: error, fieldKind, region }, "Region preprocessing failed");
      return undefined;
    }

    const attempts = variants.flatMap((variant) => RECOVERY_CONFIGS[fieldKind].map((config) => ({ variant, config })));
    let best: RecoveryResult | undefined;

    for (let start = 0; start < attempts.length; start += this.options.maxParallel) {
      const batch = attempts.slice(start, start + this.options.maxParallel);
      const outcomes = await Promise.all(
        batch.map(({ variant, config }) => this.attempt(variant, config, fieldKind, shape))
      );
      for (const [index, outcome] of outcomes.entries()) {
        if (outcome && (!best || outcome.confidence > best.confidence)) {
          best = { ...outcome, region, variant: batch[index].variant.name, config: batch[index].config };
        }
      }
    }

    return best;
  }

  private async attempt(
    variant: ImageVariant,
    config: RecognizeConfig,
    fieldKind: FieldKind,
    shape: FieldShape
  ): Promise<RecoveryResult | undefined> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`recovery_ocr_timeout:${this.options.timeoutMs}ms`)), this.options.timeoutMs);
    });

    try {
      const recognition = await Promise.race([this.options.backend.recognize(variant.image, config), timeout]);
      const corrected = applyCorrections(recognition.text, this.options.corrections);

      let best: RecoveryResult | undefined;
      for (const candidate of candidatesFromText(corrected, fieldKind)) {
        const confidence = scoreCandidate(candidate, shape);
        if (!best || confidence > best.confidence) {
          best = { value: candidate, confidence };
        }
      }
      return best;
    } catch (error) {
      logger.debug({ err: error, fieldKind, variant: variant.name, config }, "Recovery OCR attempt failed");
      return undefined;
    } finally {
      clearTimeout(timer);
    }
  }
}

export const fieldRecoveryService = new FieldRecoveryService();
