import { test } from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { fieldPatternLibrary } from "../src/services/fieldPatternLibrary.js";
import type { FieldRecoverer, RecoveryResult } from "../src/services/fieldRecoveryService.js";
import {
  StructuredFieldExtractor,
  collectCandidates,
  detectDocumentType
} from "../src/services/structuredFieldExtractor.js";
import type { FieldKind } from "../src/types/document.js";

const invoiceText = readFileSync(new URL("./fixtures/afip-invoice.txt", import.meta.url), "utf8");
const image = Buffer.from("page");

class ScriptedRecoverer implements FieldRecoverer {
  readonly calls: FieldKind[] = [];

  constructor(private readonly results: Partial<Record<FieldKind, RecoveryResult>> = {}) {}

  async recover(_image: Buffer, fieldKind: FieldKind): Promise<RecoveryResult> {
    this.calls.push(fieldKind);
    return this.results[fieldKind] ?? { value: "", confidence: 0 };
  }
}

test("extracts the printed AFIP invoice header, parties and totals", () => {
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, new ScriptedRecoverer());
  const { fields, lineItems } = extractor.extractText(invoiceText, "afip_invoice");

  assert.equal(fields.invoice_letter?.normalized, "A");
  assert.equal(fields.invoice_code?.normalized, "01");
  assert.equal(fields.point_of_sale?.normalized, "00003");
  assert.equal(fields.invoice_number?.normalized, "00001234");
  assert.equal(fields.issue_date?.normalized, "15/10/2024");
  assert.equal(fields.issuer_name?.normalized, "Distribuidora del Sur S.A.");
  assert.equal(fields.issuer_vat_condition?.normalized, "IVA Responsable Inscripto");
  assert.equal(fields.buyer_vat_condition?.normalized, "Consumidor Final");
  assert.equal(fields.buyer_name?.normalized, "Juan Pérez");
  assert.equal(fields.sale_condition?.normalized, "Contado");
  assert.equal(fields.subtotal?.normalized, "1000.00");
  assert.equal(fields.vat_amount?.normalized, "210.00");
  assert.equal(fields.total_amount?.normalized, "1210.00");
  assert.equal(fields.total_amount?.raw, "1.210,00");
  assert.equal(fields.cae_number?.normalized, "20241015123456");
  assert.equal(fields.cae_number?.confidence, 1);
  assert.equal(fields.cae_due_date?.normalized, "25/10/2024");
  assert.equal(fields.due_date, undefined);
  assert.equal(lineItems.length, 1);
});

test("issuer and buyer CUITs follow reading order", () => {
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, new ScriptedRecoverer());
  const { fields } = extractor.extractText(invoiceText, "afip_invoice");
  assert.equal(fields.cuit_issuer?.normalized, "30712345671");
  assert.equal(fields.cuit_buyer?.normalized, "20123456786");
});

test("checksum-valid CUITs win over an earlier misread one", () => {
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, new ScriptedRecoverer());
  const text = ["CUIT: 30712345670", "CUIT: 30-71234567-1", "CUIT: 20-12345678-6"].join("\n");
  const { fields } = extractor.extractText(text, "afip_invoice");
  assert.equal(fields.cuit_issuer?.normalized, "30712345671");
  assert.equal(fields.cuit_buyer?.normalized, "20123456786");
});

test("a misread CUIT before the only valid one goes to the buyer, never a duplicate", () => {
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, new ScriptedRecoverer());
  const { fields } = extractor.extractText("CUIT: 30712345670\nCUIT: 20123456786", "afip_invoice");
  assert.equal(fields.cuit_issuer?.normalized, "20123456786");
  assert.equal(fields.cuit_buyer?.normalized, "30712345670");
});

test("a single CUIT fills the issuer and leaves the buyer unset", () => {
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, new ScriptedRecoverer());
  const { fields } = extractor.extractText("CUIT: 30-71234567-1", "afip_invoice");
  assert.equal(fields.cuit_issuer?.normalized, "30712345671");
  assert.equal(fields.cuit_buyer, undefined);
});

test("extracting the same text twice yields the same document", () => {
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, new ScriptedRecoverer());
  assert.deepEqual(extractor.extractText(invoiceText, "afip_invoice"), extractor.extractText(invoiceText, "afip_invoice"));
});

test("CAE label and total amount", () => {
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, new ScriptedRecoverer());
  const { fields } = extractor.extractText("CAE N°: 20241015123456\nImporte Total: $ 1.234,56", "afip_invoice");
  assert.equal(fields.cae_number?.normalized, "20241015123456");
  assert.equal(fields.total_amount?.normalized, "1234.56");
  assert.equal(fields.total_amount?.source, "general_ocr");
});

test("collectCandidates drops captures that do not fit the field shape", () => {
  const field = fieldPatternLibrary.field("afip_invoice", "cae_number");
  assert.ok(field);
  if (!field) return;
  assert.deepEqual(collectCandidates("CAE N°: 2024101512345", field), []);
});

test("critical fields that already pass their checksum are not re-read", async () => {
  const recoverer = new ScriptedRecoverer();
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, recoverer);
  await extractor.extract(invoiceText, "afip_invoice", { image });
  assert.deepEqual(recoverer.calls, []);
});

test("a missing critical field is filled from targeted recovery", async () => {
  const recoverer = new ScriptedRecoverer({ cae: { value: "20241015123456", confidence: 0.95 } });
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, recoverer);
  const document = await extractor.extract("CAE N°: 2024101512345\nImporte Total: $ 1.234,56", "afip_invoice", {
    image,
    documentId: "inv-7"
  });

  assert.equal(document.documentId, "inv-7");
  assert.deepEqual(document.fields.cae_number, {
    raw: "20241015123456",
    normalized: "20241015123456",
    source: "recovery_ocr",
    confidence: 0.95
  });
  assert.deepEqual(recoverer.calls, ["cuit", "cuit", "cae"]);
});

test("recovery only replaces a value when it scores higher", async () => {
  const text = "CAE N°: 20241099120000";

  const weaker = new StructuredFieldExtractor(
    fieldPatternLibrary,
    new ScriptedRecoverer({ cae: { value: "20241015123456", confidence: 0.7 } })
  );
  const kept = await weaker.extract(text, "afip_invoice", { image });
  assert.equal(kept.fields.cae_number?.normalized, "20241099120000");
  assert.equal(kept.fields.cae_number?.source, "general_ocr");

  const stronger = new StructuredFieldExtractor(
    fieldPatternLibrary,
    new ScriptedRecoverer({ cae: { value: "20241015123456", confidence: 0.9 } })
  );
  const replaced = await stronger.extract(text, "afip_invoice", { image });
  assert.equal(replaced.fields.cae_number?.normalized, "20241015123456");
});

test("without an image the text pass is final", async () => {
  const recoverer = new ScriptedRecoverer({ cae: { value: "20241015123456", confidence: 0.95 } });
  const extractor = new StructuredFieldExtractor(fieldPatternLibrary, recoverer);
  const document = await extractor.extract("CAE N°: 2024101512345", "afip_invoice");
  assert.equal(document.fields.cae_number, undefined);
  assert.deepEqual(recoverer.calls, []);
});

test("detectDocumentType reads the document's own labels", () => {
  assert.equal(detectDocumentType(invoiceText), "afip_invoice");
  assert.equal(detectDocumentType("FACTURA B\nTotal: 100,00"), "invoice");
  assert.equal(detectDocumentType("RECIBO N° 0001-00000042"), "receipt");
  assert.equal(detectDocumentType("Formulario 931"), "form");
  assert.equal(detectDocumentType("Nota de pedido"), "generic");
});
