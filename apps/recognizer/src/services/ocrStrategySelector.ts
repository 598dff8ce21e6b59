import pino from "pino";
import { env } from "../config/env.js";
import { complexityAnalyzer, type ComplexityAnalyzer } from "./complexityAnalyzer.js";
import { AzureFormRecognizerAdapter } from "./ocr/azureFormRecognizerAdapter.js";
import { GoogleCloudVisionAdapter } from "./ocr/googleCloudVisionAdapter.js";
import { LocalTesseractAdapter } from "./ocr/localTesseractAdapter.js";
import { createQuotaStore } from "./quota/postgresQuotaStore.js";
import { err, ok, type Result } from "../types/result.js";
import type { DocumentType } from "../types/document.js";
import {
  ProviderError,
  type CloudProviderName,
  type ComplexityScore,
  type OcrBackend,
  type OcrProviderName,
  type OcrRecognition,
  type ProviderChoice,
  type QuotaStore,
  type RawOcrResult,
  type RecognizeConfig
} from "../types/ocr.js";

const logger = pino({ name: "ocr-strategy", level: env.LOG_LEVEL });

const LOCAL: OcrProviderName = "local_tesseract";

/** Fallback order once the preferred provider is out. */
const PROVIDER_PRIORITY: readonly OcrProviderName[] = ["google_cloud_vision", "azure_form_recognizer", "local_tesseract"];

const FINANCIAL_DOCUMENTS: ReadonlySet<DocumentType> = new Set(["afip_invoice", "invoice", "receipt"]);
const FORM_DOCUMENTS: ReadonlySet<DocumentType> = new Set(["form"]);

export interface StrategySelectorOptions {
  backends: Partial<Record<OcrProviderName, OcrBackend>>;
  quotaStore: QuotaStore;
  dailyLimits: Record<CloudProviderName, number>;
  costUnits: Record<OcrProviderName, number>;
  timeoutMs: number;
  localConfidenceThreshold: number;
  analyzer: ComplexityAnalyzer;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  documentId?: string;
}

export interface RecognitionRun {
  complexity: ComplexityScore;
  choice: ProviderChoice;
  result: RawOcrResult;
}

interface InvokeOutcome {
  result: Result<OcrRecognition, ProviderError>;
  /** The provider call still running after its timeout fired. */
  abandoned?: Promise<OcrRecognition>;
}

function isCloud(provider: OcrProviderName): provider is CloudProviderName {
  return provider !== LOCAL;
}

function resolveOptions(options: Partial<StrategySelectorOptions>): StrategySelectorOptions {
  return {
    backends: options.backends ?? {
      local_tesseract: new LocalTesseractAdapter(),
      google_cloud_vision: new GoogleCloudVisionAdapter(),
      azure_form_recognizer: new AzureFormRecognizerAdapter()
    },
    quotaStore: options.quotaStore ?? createQuotaStore(),
    dailyLimits: options.dailyLimits ?? {
      google_cloud_vision: env.GOOGLE_VISION_DAILY_LIMIT,
      azure_form_recognizer: env.AZURE_FORM_RECOGNIZER_DAILY_LIMIT
    },
    costUnits: options.costUnits ?? {
      local_tesseract: 0,
      google_cloud_vision: env.GOOGLE_VISION_COST_UNITS,
      azure_form_recognizer: env.AZURE_FORM_RECOGNIZER_COST_UNITS
    },
    timeoutMs: options.timeoutMs ?? env.OCR_TIMEOUT_MS,
    localConfidenceThreshold: options.localConfidenceThreshold ?? env.TESSERACT_CONFIDENCE_THRESHOLD,
    analyzer: options.analyzer ?? complexityAnalyzer
  };
}

/**
 * Routes a page to an OCR provider from its complexity tier and document
 * type, honouring per-provider daily quotas, and runs the ordered
 * fallback chain down to the local engine.
 */
export class OcrStrategySelector {
  private readonly options: StrategySelectorOptions;
  private readonly inFlight = new Map<CloudProviderName, number>();

  constructor(options: Partial<StrategySelectorOptions> = {}) {
    this.options = resolveOptions(options);
    if (!this.options.backends.local_tesseract) {
      throw new Error("local_ocr_backend_required");
    }
  }

  async select(complexity: ComplexityScore, documentTypeHint: DocumentType): Promise<ProviderChoice> {
    const { provider: preferred, reason } = preferredProvider(complexity, documentTypeHint);
    const chain = fallbackChain(preferred);
    const skipped: string[] = [];

    for (const [index, provider] of chain.entries()) {
      if (isCloud(provider)) {
        if (!this.isRegistered(provider)) {
          skipped.push(`${provider} unavailable`);
          continue;
        }
        if (!(await this.hasQuota(provider))) {
          skipped.push(`${provider} quota exhausted`);
          continue;
        }
      }

      const choice: ProviderChoice = {
        provider,
        fallbacks: chain.slice(index + 1),
        reason: skipped.length > 0 ? `${reason}; demoted (${skipped.join(", ")})` : reason,
        retryPageSegModes: provider === LOCAL && complexity.tier === "medium" ? ["single_block", "sparse_text"] : []
      };
      logger.debug({ complexity, documentTypeHint, choice }, "OCR provider selected");
      return choice;
    }

    return { provider: LOCAL, fallbacks: [], reason: `${reason}; demoted to local`, retryPageSegModes: [] };
  }

  async execute(choice: ProviderChoice, image: Buffer, options: ExecuteOptions = {}): Promise<RawOcrResult> {
    const started = performance.now();
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const chain = [choice.provider, ...choice.fallbacks];
    if (chain[chain.length - 1] !== LOCAL) chain.push(LOCAL);

    for (const provider of chain) {
      if (isCloud(provider) && !(await this.reserve(provider))) {
        logger.info({ provider, documentId: options.documentId }, "OCR provider quota exhausted at execution; demoting");
        continue;
      }

      const { result: outcome, abandoned } = await this.invoke(provider, image, {}, timeoutMs);

      if (isCloud(provider)) {
        if (abandoned) {
          this.settleWhenAnswered(provider, abandoned, options.documentId);
        } else {
          await this.settle(provider, outcome.ok, options.documentId);
        }
      }

      if (!outcome.ok) {
        logger.warn(
          { err: outcome.error, provider, reason: outcome.error.reason, documentId: options.documentId },
          "OCR provider failed; demoting"
        );
        continue;
      }

      let recognition = outcome.value;
      if (provider === LOCAL && choice.retryPageSegModes.length > 0 && recognition.confidence < this.options.localConfidenceThreshold) {
        recognition = await this.retryLocal(image, recognition, choice, timeoutMs, options.documentId);
      }

      return {
        text: recognition.text,
        confidence: recognition.confidence,
        providerUsed: provider,
        costUnits: this.options.costUnits[provider],
        elapsedMs: Math.round(performance.now() - started)
      };
    }

    logger.error({ documentId: options.documentId }, "Every OCR provider failed; returning empty text");
    return {
      text: "",
      confidence: 0,
      providerUsed: LOCAL,
      costUnits: 0,
      elapsedMs: Math.round(performance.now() - started)
    };
  }

  async recognize(image: Buffer, documentTypeHint: DocumentType, options: ExecuteOptions = {}): Promise<RecognitionRun> {
    const complexity = await this.options.analyzer.analyze(image);
    const choice = await this.select(complexity, documentTypeHint);
    const result = await this.execute(choice, image, options);
    logger.info(
      {
        documentId: options.documentId,
        tier: complexity.tier,
        providerUsed: result.providerUsed,
        confidence: result.confidence,
        elapsedMs: result.elapsedMs
      },
      "OCR complete"
    );
    return { complexity, choice, result };
  }

  private isRegistered(provider: OcrProviderName): boolean {
    const backend = this.options.backends[provider];
    return backend !== undefined && (backend.isAvailable?.() ?? true);
  }

  private async hasQuota(provider: CloudProviderName): Promise<boolean> {
    try {
      const used = await this.options.quotaStore.currentCount(provider);
      return used + (this.inFlight.get(provider) ?? 0) < this.options.dailyLimits[provider];
    } catch (error) {
      logger.warn({ err: error, provider }, "Quota store unreadable; treating provider as exhausted");
      return false;
    }
  }

  /** Holds a slot for a call in progress so parallel documents cannot overshoot the limit. */
  private async reserve(provider: CloudProviderName): Promise<boolean> {
    let used: number;
    try {
      used = await this.options.quotaStore.currentCount(provider);
    } catch (error) {
      logger.warn({ err: error, provider }, "Quota store unreadable; treating provider as exhausted");
      return false;
    }
    // No await between the check and the reservation.
    const pending = this.inFlight.get(provider) ?? 0;
    if (used + pending >= this.options.dailyLimits[provider]) {
      return false;
    }
    this.inFlight.set(provider, pending + 1);
    return true;
  }

  private async settle(provider: CloudProviderName, succeeded: boolean, documentId: string | undefined): Promise<void> {
    try {
      if (succeeded) {
        const count = await this.options.quotaStore.increment(provider);
        logger.debug({ provider, count, documentId }, "OCR provider usage recorded");
      }
    } catch (error) {
      logger.error({ err: error, provider, documentId }, "Failed to record OCR provider usage");
    } finally {
      this.release(provider);
    }
  }

  /** A call abandoned at its timeout holds its slot until the provider answers, and is counted if it succeeds. */
  private settleWhenAnswered(provider: CloudProviderName, call: Promise<OcrRecognition>, documentId: string | undefined): void {
    void call.then(
      () => this.settle(provider, true, documentId),
      () => this.settle(provider, false, documentId)
    );
  }

  private release(provider: CloudProviderName): void {
    this.inFlight.set(provider, Math.max(0, (this.inFlight.get(provider) ?? 0) - 1));
  }

  private async retryLocal(
    image: Buffer,
    first: OcrRecognition,
    choice: ProviderChoice,
    timeoutMs: number,
    documentId: string | undefined
  ): Promise<OcrRecognition> {
    let best = first;
    for (const pageSegMode of choice.retryPageSegModes) {
      const { result: retry } = await this.invoke(LOCAL, image, { pageSegMode }, timeoutMs);
      if (!retry.ok) {
        logger.debug({ err: retry.error, pageSegMode, documentId }, "Local OCR retry failed");
        continue;
      }
      if (retry.value.text.trim().length > best.text.trim().length) {
        best = retry.value;
      }
    }
    return best;
  }

  private async invoke(
    provider: OcrProviderName,
    image: Buffer,
    config: RecognizeConfig,
    timeoutMs: number
  ): Promise<InvokeOutcome> {
    const backend = this.options.backends[provider];
    if (!backend) {
      return { result: err(new ProviderError(provider, "unavailable", "backend_not_registered")) };
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ProviderError(provider, "timeout", `timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    let call: Promise<OcrRecognition> | undefined;
    try {
      call = backend.recognize(image, config);
      const recognition = await Promise.race([call, timeout]);
      return {
        result: ok({
          text: recognition.text,
          confidence: Math.max(0, Math.min(1, recognition.confidence))
        })
      };
    } catch (error) {
      if (error instanceof ProviderError) {
        return { result: err(error), abandoned: error.reason === "timeout" ? call : undefined };
      }
      return { result: err(new ProviderError(provider, "failed", error instanceof Error ? error.message : String(error))) };
    } finally {
      clearTimeout(timer);
    }
  }
}

export function preferredProvider(
  complexity: ComplexityScore,
  documentTypeHint: DocumentType
): { provider: OcrProviderName; reason: string } {
  switch (complexity.tier) {
    case "simple":
      return { provider: LOCAL, reason: "simple page" };
    case "medium":
      return FINANCIAL_DOCUMENTS.has(documentTypeHint)
        ? { provider: "google_cloud_vision", reason: "medium page with monetary fields" }
        : { provider: LOCAL, reason: "medium page" };
    case "complex":
      return FORM_DOCUMENTS.has(documentTypeHint)
        ? { provider: "azure_form_recognizer", reason: "complex form layout" }
        : { provider: "google_cloud_vision", reason: "complex page" };
  }
}

export function fallbackChain(preferred: OcrProviderName): OcrProviderName[] {
  if (preferred === LOCAL) return [LOCAL];
  return [preferred, ...PROVIDER_PRIORITY.filter((provider) => provider !== preferred)];
}
