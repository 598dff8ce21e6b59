import { test } from "node:test";
import assert from "node:assert/strict";
import {
  FIELD_SHAPES,
  conformsToShape,
  isAcceptableCandidate,
  passesChecksum,
  scoreCandidate
} from "../src/services/candidateScorer.js";

test("a checksum-valid CAE earns the full score", () => {
  assert.equal(scoreCandidate("20241015123456", FIELD_SHAPES.cae), 1);
});

test("a CAE-shaped code with an impossible date loses only the checksum reward", () => {
  assert.equal(scoreCandidate("20241099120000", FIELD_SHAPES.cae), 0.8);
});

test("amount and CUIT scores", () => {
  assert.equal(scoreCandidate("1234.56", FIELD_SHAPES.amount), 0.8);
  assert.equal(scoreCandidate("2.00", FIELD_SHAPES.amount), 0.8);
  assert.equal(scoreCandidate("30712345671", FIELD_SHAPES.cuit), 1);
  assert.equal(scoreCandidate("30712345670", FIELD_SHAPES.cuit), 0.8);
});

test("organization keywords raise a name score", () => {
  assert.equal(scoreCandidate("Distribuidora del Sur S.A", FIELD_SHAPES.name), 0.9);
  assert.equal(scoreCandidate("Juan Pérez", FIELD_SHAPES.name), 0.7);
});

test("scoreCandidate is zero for an empty value", () => {
  assert.equal(scoreCandidate("", FIELD_SHAPES.free_text), 0);
});

test("isAcceptableCandidate drops stop words and digit-only names", () => {
  assert.equal(isAcceptableCandidate("del", FIELD_SHAPES.name), false);
  assert.equal(isAcceptableCandidate("12345", FIELD_SHAPES.name), false);
  assert.equal(isAcceptableCandidate("Contado", FIELD_SHAPES.name), true);
});

test("shape conformance checks length and charset", () => {
  assert.equal(conformsToShape("0003", FIELD_SHAPES.point_of_sale), true);
  assert.equal(conformsToShape("003", FIELD_SHAPES.point_of_sale), false);
  assert.equal(conformsToShape("X", FIELD_SHAPES.letter), false);
  assert.equal(passesChecksum("0.00", FIELD_SHAPES.amount), false);
  assert.equal(passesChecksum("anything", FIELD_SHAPES.free_text), true);
});
