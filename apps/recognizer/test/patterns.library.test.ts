import { test } from "node:test";
import assert from "node:assert/strict";
import {
  FieldPatternLibrary,
  fieldPatternLibrary,
  type PatternLibraryDefinition
} from "../src/services/fieldPatternLibrary.js";

function minimalDefinition(): PatternLibraryDefinition {
  const profile = () => ({ fields: ["total_amount"], required: ["total_amount"] });
  return {
    documentTypes: {
      afip_invoice: profile(),
      invoice: profile(),
      receipt: profile(),
      form: profile(),
      generic: profile()
    },
    fields: {
      total_amount: { shape: "amount", normalize: "amount", patterns: ["Total\\s*:?\\s*([\\d.,]+)"] }
    },
    lineItemRows: []
  };
}

test("a minimal library compiles patterns with global, case-insensitive and multiline flags", () => {
  const library = new FieldPatternLibrary(minimalDefinition());
  const field = library.field("invoice", "total_amount");
  assert.ok(field);
  assert.equal(field?.patterns[0]?.flags, "gim");
  assert.deepEqual(library.profile("receipt").required, ["total_amount"]);
});

test("every document type needs a profile", () => {
  const definition = minimalDefinition();
  delete definition.documentTypes.generic;
  assert.throws(() => new FieldPatternLibrary(definition), /^Error: pattern_library_invalid:generic:missing_document_type$/);
});

test("profiles may only list known fields with definitions", () => {
  const unknown = minimalDefinition();
  unknown.documentTypes.form = { fields: ["bogus_field"], required: [] };
  assert.throws(() => new FieldPatternLibrary(unknown), /pattern_library_invalid:bogus_field:unknown_field/);

  const undefinedField = minimalDefinition();
  undefinedField.documentTypes.form = { fields: ["cae_number"], required: [] };
  assert.throws(() => new FieldPatternLibrary(undefinedField), /pattern_library_invalid:cae_number:missing_definition/);
});

test("patterns must compile and capture", () => {
  const broken = minimalDefinition();
  broken.fields.total_amount = { shape: "amount", normalize: "amount", patterns: ["Total ([\\d.,]+"] };
  assert.throws(() => new FieldPatternLibrary(broken), /pattern_library_invalid:total_amount:/);

  const noCapture = minimalDefinition();
  noCapture.fields.total_amount = { shape: "amount", normalize: "amount", patterns: ["Total\\s*(?:[\\d.,]+)"] };
  assert.throws(() => new FieldPatternLibrary(noCapture), /pattern_library_invalid:total_amount:pattern_without_capture_group/);
});

test("a required field must be extracted for its document type", () => {
  const definition = minimalDefinition();
  definition.documentTypes.invoice = { fields: ["total_amount"], required: ["cae_number"] };
  assert.throws(
    () => new FieldPatternLibrary(definition),
    /pattern_library_invalid:cae_number:required_but_not_extracted_for_invoice/
  );
});

test("distinct fields must name an occurrence", () => {
  const definition = minimalDefinition();
  definition.fields.total_amount = {
    shape: "amount",
    normalize: "amount",
    patterns: ["Total\\s*([\\d.,]+)"],
    distinct: true
  };
  assert.throws(() => new FieldPatternLibrary(definition), /pattern_library_invalid:total_amount:distinct_requires_occurrence/);
});

test("line item rows must name their cells", () => {
  const definition = minimalDefinition();
  definition.lineItemRows = [{ layout: "numbered", pattern: "^(?<description>.+)\\s+(?<quantity>\\d+)$" }];
  assert.throws(() => new FieldPatternLibrary(definition), /pattern_library_invalid:line_item_numbered:missing_group_unitPrice/);
});

test("pattern overrides replace the shared patterns for one document type", () => {
  const definition = minimalDefinition();
  definition.documentTypes.receipt = {
    fields: ["total_amount"],
    required: [],
    patternOverrides: { total_amount: ["Monto\\s*([\\d.,]+)"] }
  };
  const library = new FieldPatternLibrary(definition);
  assert.equal(library.field("receipt", "total_amount")?.patterns[0]?.source, "Monto\\s*([\\d.,]+)");
  assert.equal(library.field("invoice", "total_amount")?.patterns[0]?.source, "Total\\s*:?\\s*([\\d.,]+)");
});

test("the bundled library defines the AFIP invoice profile", () => {
  assert.deepEqual(fieldPatternLibrary.profile("afip_invoice").required, [
    "point_of_sale",
    "invoice_number",
    "issue_date",
    "cuit_issuer",
    "total_amount",
    "cae_number"
  ]);
  assert.equal(fieldPatternLibrary.definitionOf("cuit_buyer")?.occurrence, 1);
  assert.equal(fieldPatternLibrary.definitionOf("cae_number")?.critical, "cae");
  assert.deepEqual(
    fieldPatternLibrary.lineItemRows.map((row) => row.layout),
    ["pipe", "whitespace", "numbered"]
  );
});
