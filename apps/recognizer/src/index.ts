export * from "./types/document.js";
export * from "./types/ocr.js";
export * from "./types/result.js";
export * from "./types/validation.js";
export { validateCae, validateCuit, type CaeResult, type CaeWindow, type CuitResult } from "./services/checksumValidators.js";
export { normalizeAmount, normalizeDate, normalizeDescription } from "./services/fieldNormalizers.js";
export { FIELD_SHAPES, scoreCandidate, type FieldShape, type ShapeName } from "./services/candidateScorer.js";
export {
  FieldPatternLibrary,
  fieldPatternLibrary,
  loadPatternLibrary,
  type DocumentProfile,
  type FieldDefinition
} from "./services/fieldPatternLibrary.js";
export { ComplexityAnalyzer, complexityAnalyzer } from "./services/complexityAnalyzer.js";
export { OcrStrategySelector, type RecognitionRun, type StrategySelectorOptions } from "./services/ocrStrategySelector.js";
export { InMemoryQuotaStore } from "./services/quota/inMemoryQuotaStore.js";
export { PostgresQuotaStore, createQuotaStore } from "./services/quota/postgresQuotaStore.js";
export { FieldRecoveryService, type FieldRecoverer, type RecoveryResult } from "./services/fieldRecoveryService.js";
export { StructuredFieldExtractor, detectDocumentType } from "./services/structuredFieldExtractor.js";
export { ValidationEngine, type ValidateOptions } from "./services/validationEngine.js";
export {
  DocumentRecognitionService,
  type RecognitionInput,
  type RecognitionOutcome
} from "./services/documentRecognitionService.js";
