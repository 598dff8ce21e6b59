import pino from "pino";
import { env } from "../config/env.js";
import {
  conformsToShape,
  isAcceptableCandidate,
  passesChecksum,
  scoreCandidate
} from "./candidateScorer.js";
import { cleanCandidate, normalizeValue } from "./fieldNormalizers.js";
import { fieldPatternLibrary, type FieldDefinition, type FieldPatternLibrary } from "./fieldPatternLibrary.js";
import { fieldRecoveryService, type FieldRecoverer } from "./fieldRecoveryService.js";
import { extractLineItems } from "./lineItemExtractor.js";
import type { DocumentFields, DocumentType, FieldValue, StructuredDocument } from "../types/document.js";

const logger = pino({ name: "structured-extraction", level: env.LOG_LEVEL });

export interface ExtractOptions {
  /** Source page; critical fields are only re-read when it is present. */
  image?: Buffer;
  documentId?: string;
}

export interface FieldCandidate {
  raw: string;
  normalized: string;
  score: number;
  /** Offset of the captured text in the OCR output. */
  position: number;
}

/**
 * Runs every pattern for a field over the whole text and keeps the
 * candidates whose normalized value fits the field shape.
 */
export function collectCandidates(rawText: string, field: FieldDefinition): FieldCandidate[] {
  const candidates: FieldCandidate[] = [];

  for (const pattern of field.patterns) {
    for (const match of rawText.matchAll(pattern)) {
      const capture = match.slice(1).find((group) => group !== undefined);
      if (capture === undefined) continue;

      const raw = cleanCandidate(capture, field.shape.nameLike === true);
      const normalized = normalizeValue(field.normalize, raw);
      if (!normalized || !isAcceptableCandidate(normalized, field.shape)) continue;

      candidates.push({
        raw,
        normalized,
        score: scoreCandidate(normalized, field.shape),
        position: (match.index ?? 0) + Math.max(0, match[0].indexOf(capture))
      });
    }
  }

  return candidates;
}

function pickBest(candidates: FieldCandidate[], minScore: number): FieldCandidate | undefined {
  let best: FieldCandidate | undefined;
  for (const candidate of candidates) {
    if (candidate.score < minScore) continue;
    if (!best || candidate.score > best.score) best = candidate;
  }
  return best;
}

/**
 * Reading-order pick: the issuer's CUIT is printed before the buyer's.
 * Every occurrence indexes one ranking, checksum-valid candidates first,
 * so two occurrences of a distinct field never share a value.
 */
function pickOccurrence(
  candidates: FieldCandidate[],
  field: FieldDefinition,
  occurrence: number,
  minScore: number
): FieldCandidate | undefined {
  const ordered = [...candidates]
    .filter((candidate) => candidate.score >= minScore)
    .sort((left, right) => left.position - right.position);

  const unique: FieldCandidate[] = [];
  for (const candidate of ordered) {
    if (field.distinct && unique.some((existing) => existing.normalized === candidate.normalized)) continue;
    if (!field.distinct && unique.some((existing) => existing.position === candidate.position)) continue;
    unique.push(candidate);
  }

  const valid = unique.filter((candidate) => passesChecksum(candidate.normalized, field.shape));
  const ranked = [...valid, ...unique.filter((candidate) => !valid.includes(candidate))];
  return ranked[occurrence];
}

export function detectDocumentType(rawText: string): DocumentType {
  if (/\bC\.?A\.?E\.?\b|\b(?:AFIP|ARCA)\b|C[oó]digo\s+de\s+Autorizaci[oó]n/i.test(rawText)) return "afip_invoice";
  if (/\bFACTURA\b/i.test(rawText)) return "invoice";
  if (/\bRECIBO\b/i.test(rawText)) return "receipt";
  if (/\bFORMULARIO\b/i.test(rawText)) return "form";
  return "generic";
}

export class StructuredFieldExtractor {
  constructor(
    private readonly library: FieldPatternLibrary = fieldPatternLibrary,
    private readonly recovery: FieldRecoverer = fieldRecoveryService,
    private readonly minScore = 0.5
  ) {}

  /** Pattern pass only; deterministic for a given text. */
  extractText(rawText: string, documentType: DocumentType): StructuredDocument {
    const profile = this.library.profile(documentType);
    const fields: DocumentFields = {};

    for (const field of profile.fields) {
      const candidates = collectCandidates(rawText, field);
      const chosen =
        field.occurrence === undefined
          ? pickBest(candidates, this.minScore)
          : pickOccurrence(candidates, field, field.occurrence, this.minScore);

      if (chosen) {
        fields[field.name] = {
          raw: chosen.raw,
          normalized: chosen.normalized,
          source: "general_ocr",
          confidence: chosen.score
        };
      }
    }

    return {
      documentType,
      fields,
      lineItems: extractLineItems(rawText, this.library.lineItemRows)
    };
  }

  async extract(rawText: string, documentType: DocumentType, options: ExtractOptions = {}): Promise<StructuredDocument> {
    const document = this.extractText(rawText, documentType);
    if (options.documentId !== undefined) {
      document.documentId = options.documentId;
    }

    if (options.image) {
      for (const field of this.library.profile(documentType).fields) {
        if (!field.critical) continue;
        const recovered = await this.recoverField(options.image, field, document.fields[field.name], options.documentId);
        if (recovered) {
          document.fields[field.name] = recovered;
        }
      }
    }

    logger.info(
      {
        documentId: options.documentId,
        documentType,
        fields: Object.keys(document.fields).length,
        lineItems: document.lineItems.length
      },
      "Structured extraction complete"
    );
    return document;
  }

  private async recoverField(
    image: Buffer,
    field: FieldDefinition,
    current: FieldValue | undefined,
    documentId: string | undefined
  ): Promise<FieldValue | undefined> {
    if (!field.critical) return undefined;
    if (current && passesChecksum(current.normalized, field.shape)) return undefined;

    const result = await this.recovery.recover(image, field.critical, field.regions);
    const regexScore = current?.confidence ?? 0;
    if (!result.value || result.confidence <= regexScore || !conformsToShape(result.value, field.shape)) {
      logger.debug(
        { documentId, field: field.name, recoveredConfidence: result.confidence, regexScore },
        "Recovery did not improve field"
      );
      return undefined;
    }

    logger.info(
      { documentId, field: field.name, previous: current?.normalized, confidence: result.confidence },
      "Field replaced by targeted recovery"
    );
    return {
      raw: result.value,
      normalized: result.value,
      source: "recovery_ocr",
      confidence: result.confidence
    };
  }
}

export const structuredFieldExtractor = new StructuredFieldExtractor();
