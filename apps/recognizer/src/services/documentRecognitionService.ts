import { readFile } from "node:fs/promises";
import pino from "pino";
import { env } from "../config/env.js";
import { OcrStrategySelector, type RecognitionRun } from "./ocrStrategySelector.js";
import { detectDocumentType, structuredFieldExtractor, type StructuredFieldExtractor } from "./structuredFieldExtractor.js";
import { validationEngine, type ValidateOptions, type ValidationEngine } from "./validationEngine.js";
import type { DocumentType, StructuredDocument } from "../types/document.js";
import type { ComplexityScore, RawOcrResult } from "../types/ocr.js";
import type { ValidationVerdict } from "../types/validation.js";

const logger = pino({ name: "document-recognition", level: env.LOG_LEVEL });

export interface RecognitionInput {
  documentId?: string;
  image?: Buffer;
  imagePath?: string;
  /** Skips OCR entirely; the image, when given, is still used for field recovery. */
  rawText?: string;
  documentType?: DocumentType;
  validation?: ValidateOptions;
}

export interface RecognitionOutcome {
  documentId?: string;
  documentType: DocumentType;
  complexity?: ComplexityScore;
  ocr?: RawOcrResult;
  document: StructuredDocument;
  verdict: ValidationVerdict;
}

export interface OcrRunner {
  recognize(image: Buffer, documentTypeHint: DocumentType, options?: { documentId?: string }): Promise<RecognitionRun>;
}

/**
 * Image or text in, validated record out: OCR routing, structured
 * extraction with critical-field recovery, then validation.
 */
export class DocumentRecognitionService {
  private ocr: OcrRunner | undefined;

  constructor(
    ocr?: OcrRunner,
    private readonly extractor: StructuredFieldExtractor = structuredFieldExtractor,
    private readonly validator: ValidationEngine = validationEngine
  ) {
    this.ocr = ocr;
  }

  async process(input: RecognitionInput): Promise<RecognitionOutcome> {
    if (input.rawText === undefined && !input.image && !input.imagePath) {
      throw new Error("recognition_input_missing:image_or_text_required");
    }

    const image = input.image ?? (input.imagePath ? await this.readImage(input.imagePath, input.documentId) : undefined);

    let rawText = input.rawText;
    let run: RecognitionRun | undefined;
    if (rawText === undefined) {
      if (image) {
        run = await this.ocrRunner().recognize(image, input.documentType ?? "generic", { documentId: input.documentId });
        rawText = run.result.text;
      } else {
        // Unreadable page: validate an empty document so missing fields are reported.
        rawText = "";
      }
    }

    const documentType = input.documentType ?? detectDocumentType(rawText);
    const document = await this.extractor.extract(rawText, documentType, { image, documentId: input.documentId });
    const verdict = this.validator.validate(document, documentType, input.validation);

    logger.info(
      {
        documentId: input.documentId,
        documentType,
        providerUsed: run?.result.providerUsed,
        overallValid: verdict.overallValid
      },
      "Document processed"
    );

    return {
      documentId: input.documentId,
      documentType,
      complexity: run?.complexity,
      ocr: run?.result,
      document,
      verdict
    };
  }

  private ocrRunner(): OcrRunner {
    this.ocr ??= new OcrStrategySelector();
    return this.ocr;
  }

  private async readImage(imagePath: string, documentId: string | undefined): Promise<Buffer | undefined> {
    try {
      return await readFile(imagePath);
    } catch (error) {
      logger.error({ err: error, imagePath, documentId }, "Failed to read document image; continuing with empty text");
      return undefined;
    }
  }
}

export const documentRecognitionService = new DocumentRecognitionService();
