/**
 * Provider names double as quota keys. The local engine is the terminal
 * fallback and carries no quota.
 */
export type OcrProviderName = "local_tesseract" | "google_cloud_vision" | "azure_form_recognizer";

export type CloudProviderName = Exclude<OcrProviderName, "local_tesseract">;

export type ComplexityTier = "simple" | "medium" | "complex";

export interface ComplexityScore {
  value: number;
  tier: ComplexityTier;
}

export type PageSegMode = "auto" | "single_block" | "single_line" | "single_word" | "sparse_text";

export interface RecognizeConfig {
  pageSegMode?: PageSegMode;
  charWhitelist?: string;
}

export interface OcrRecognition {
  text: string;
  confidence: number;
}

export interface OcrBackend {
  recognize(image: Buffer, config?: RecognizeConfig): Promise<OcrRecognition>;
  /** False when credentials or endpoints are missing; omitted means always available. */
  isAvailable?(): boolean;
}

export interface RawOcrResult {
  readonly text: string;
  readonly confidence: number;
  readonly providerUsed: OcrProviderName;
  readonly costUnits: number;
  readonly elapsedMs: number;
}

export interface ProviderChoice {
  provider: OcrProviderName;
  /** Remaining providers to try, in order, after `provider`. */
  fallbacks: OcrProviderName[];
  reason: string;
  retryPageSegModes: PageSegMode[];
}

export interface QuotaStore {
  increment(provider: CloudProviderName): Promise<number>;
  currentCount(provider: CloudProviderName): Promise<number>;
}

export type ProviderErrorReason = "timeout" | "unavailable" | "quota_exhausted" | "failed" | "not_configured";

export class ProviderError extends Error {
  constructor(
    readonly provider: OcrProviderName,
    readonly reason: ProviderErrorReason,
    message: string
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

/** Fractions of page width/height. */
export interface ImageRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}
