import { test } from "node:test";
import assert from "node:assert/strict";
import { bundledLangPath } from "../src/services/ocr/localTesseractAdapter.js";

test("Spanish traineddata resolves from the installed data package", () => {
  assert.match(bundledLangPath("spa") ?? "", /@tesseract\.js-data[\\/]spa[\\/]4\.0\.0_best_int$/);
});

test("a language without a data package has no bundled path", () => {
  assert.equal(bundledLangPath("zz-missing"), undefined);
});
