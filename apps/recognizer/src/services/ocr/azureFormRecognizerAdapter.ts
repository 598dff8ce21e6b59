import { AzureKeyCredential, DocumentAnalysisClient } from "@azure/ai-form-recognizer";
import { env } from "../../config/env.js";
import { ProviderError, type OcrBackend, type OcrRecognition } from "../../types/ocr.js";

export interface AzureFormRecognizerOptions {
  endpoint?: string;
  apiKey?: string;
  modelId: string;
}

/**
 * Azure Document Intelligence layout model; used for form-like pages
 * where table and key-value structure matters.
 */
export class AzureFormRecognizerAdapter implements OcrBackend {
  private readonly client: DocumentAnalysisClient | undefined;
  private readonly modelId: string;

  constructor(
    options: AzureFormRecognizerOptions = {
      endpoint: env.AZURE_FORM_RECOGNIZER_ENDPOINT,
      apiKey: env.AZURE_FORM_RECOGNIZER_KEY,
      modelId: env.AZURE_FORM_RECOGNIZER_MODEL
    }
  ) {
    this.modelId = options.modelId;
    this.client =
      options.endpoint && options.apiKey
        ? new DocumentAnalysisClient(options.endpoint, new AzureKeyCredential(options.apiKey))
        : undefined;
  }

  isAvailable(): boolean {
    return this.client !== undefined;
  }

  async recognize(image: Buffer): Promise<OcrRecognition> {
    if (!this.client) {
      throw new ProviderError("azure_form_recognizer", "not_configured", "provider_not_configured");
    }

    const poller = await this.client.beginAnalyzeDocument(this.modelId, image);
    const result = await poller.pollUntilDone();
    const text = result.content ?? "";

    const wordConfidences = (result.pages ?? []).flatMap((page) => (page.words ?? []).map((word) => word.confidence));
    const confidence =
      wordConfidences.length > 0
        ? wordConfidences.reduce((sum, value) => sum + value, 0) / wordConfidences.length
        : text.trim().length > 0
          ? 0.9
          : 0;

    return { text, confidence };
  }
}
