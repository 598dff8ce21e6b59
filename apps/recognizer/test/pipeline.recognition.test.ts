import { test } from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { DocumentRecognitionService, type OcrRunner } from "../src/services/documentRecognitionService.js";
import { fieldPatternLibrary } from "../src/services/fieldPatternLibrary.js";
import type { FieldRecoverer } from "../src/services/fieldRecoveryService.js";
import type { RecognitionRun } from "../src/services/ocrStrategySelector.js";
import { StructuredFieldExtractor } from "../src/services/structuredFieldExtractor.js";
import { ValidationEngine } from "../src/services/validationEngine.js";
import type { DocumentType } from "../src/types/document.js";

const invoiceText = readFileSync(new URL("./fixtures/afip-invoice.txt", import.meta.url), "utf8");
const noRecovery: FieldRecoverer = { recover: async () => ({ value: "", confidence: 0 }) };
const extractor = new StructuredFieldExtractor(fieldPatternLibrary, noRecovery);
const engine = new ValidationEngine({ library: fieldPatternLibrary, tolerance: 0.01 });
const now = new Date("2024-11-01T12:00:00Z");

class ScriptedOcr implements OcrRunner {
  readonly hints: DocumentType[] = [];

  constructor(private readonly text: string) {}

  async recognize(_image: Buffer, documentTypeHint: DocumentType): Promise<RecognitionRun> {
    this.hints.push(documentTypeHint);
    return {
      complexity: { value: 0.1, tier: "simple" },
      choice: { provider: "local_tesseract", fallbacks: [], reason: "simple page", retryPageSegModes: [] },
      result: { text: this.text, confidence: 0.91, providerUsed: "local_tesseract", costUnits: 0, elapsedMs: 5 }
    };
  }
}

test("raw text skips OCR and carries the document id through", async () => {
  const ocr = new ScriptedOcr("unused");
  const outcome = await new DocumentRecognitionService(ocr, extractor, engine).process({
    documentId: "inv-7",
    rawText: invoiceText,
    validation: { now }
  });

  assert.deepEqual(ocr.hints, []);
  assert.equal(outcome.documentId, "inv-7");
  assert.equal(outcome.documentType, "afip_invoice");
  assert.equal(outcome.ocr, undefined);
  assert.equal(outcome.document.documentId, "inv-7");
  assert.equal(outcome.verdict.documentId, "inv-7");
  assert.equal(outcome.verdict.overallValid, true);
  assert.equal(outcome.document.fields.total_amount?.normalized, "1210.00");
});

test("an image is read by OCR and the detected type drives extraction", async () => {
  const ocr = new ScriptedOcr("CAE N°: 20241015123456\nImporte Total: $ 1.234,56");
  const outcome = await new DocumentRecognitionService(ocr, extractor, engine).process({
    image: Buffer.from("page"),
    validation: { requiredFields: ["cae_number", "total_amount"], now }
  });

  assert.deepEqual(ocr.hints, ["generic"]);
  assert.equal(outcome.documentType, "afip_invoice");
  assert.equal(outcome.ocr?.providerUsed, "local_tesseract");
  assert.deepEqual(outcome.complexity, { value: 0.1, tier: "simple" });
  assert.equal(outcome.document.fields.cae_number?.normalized, "20241015123456");
  assert.equal(outcome.verdict.overallValid, true);
});

test("a declared document type is passed to OCR as the hint", async () => {
  const ocr = new ScriptedOcr("Importe Total: $ 99,00");
  const outcome = await new DocumentRecognitionService(ocr, extractor, engine).process({
    image: Buffer.from("page"),
    documentType: "receipt",
    validation: { requiredFields: ["total_amount"], now }
  });
  assert.deepEqual(ocr.hints, ["receipt"]);
  assert.equal(outcome.documentType, "receipt");
});

const afipRequiredMissing = [
  "point_of_sale: missing",
  "invoice_number: missing",
  "issue_date: missing",
  "cuit_issuer: missing",
  "total_amount: missing",
  "cae_number: missing"
];

test("a document needs an image or text", async () => {
  const service = new DocumentRecognitionService(new ScriptedOcr(""), extractor, engine);
  await assert.rejects(service.process({ documentId: "empty" }), /recognition_input_missing:image_or_text_required/);
});

test("an unreadable image yields an empty document whose verdict lists the missing fields", async () => {
  const ocr = new ScriptedOcr("unused");
  const outcome = await new DocumentRecognitionService(ocr, extractor, engine).process({
    documentId: "x",
    imagePath: "/nonexistent/invoice.png",
    documentType: "afip_invoice",
    validation: { now }
  });

  assert.deepEqual(ocr.hints, []);
  assert.equal(outcome.ocr, undefined);
  assert.deepEqual(outcome.document.fields, {});
  assert.deepEqual(outcome.document.lineItems, []);
  assert.equal(outcome.verdict.overallValid, false);
  assert.deepEqual(outcome.verdict.errors, afipRequiredMissing);
  assert.deepEqual(outcome.verdict.warnings, []);
});

test("empty OCR text is validated rather than rejected", async () => {
  const outcome = await new DocumentRecognitionService(new ScriptedOcr(""), extractor, engine).process({
    image: Buffer.from("blank page"),
    documentType: "afip_invoice",
    validation: { now }
  });
  assert.deepEqual(outcome.document.fields, {});
  assert.deepEqual(outcome.verdict.errors, afipRequiredMissing);
});
