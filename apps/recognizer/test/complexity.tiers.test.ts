import { test } from "node:test";
import assert from "node:assert/strict";
import { ComplexityAnalyzer, tierRank } from "../src/services/complexityAnalyzer.js";
import { encodeGray, type GrayImage } from "../src/services/image/grayImage.js";

const thresholds = { simpleBelow: 0.3, mediumBelow: 0.6, severeFrom: 0.8 };
const analyzer = new ComplexityAnalyzer({ thresholds });

function image(width: number, height: number, pixel: (x: number, y: number) => number): GrayImage {
  const data = new Uint8Array(width * height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) data[y * width + x] = pixel(x, y);
  }
  return { width, height, data };
}

/** Three dark text bars on white paper. */
const sparseText = image(200, 200, (x, y) => {
  const inBar = [40, 90, 140].some((top) => y >= top && y < top + 16);
  return inBar && x >= 40 && x < 160 ? 0 : 255;
});

/** Washed-out vertical hatching: low contrast, edges everywhere. */
const hatched = image(200, 200, (x) => (x % 4 < 2 ? 120 : 140));

test("a high-contrast page with sparse text is simple", () => {
  const score = analyzer.scorePixels(sparseText);
  assert.equal(score.value, 0.0288);
  assert.equal(score.tier, "simple");
});

test("a low-contrast page dense with edges is complex", () => {
  const score = analyzer.scorePixels(hatched);
  assert.equal(score.value, 0.7);
  assert.equal(score.tier, "complex");
});

test("a flat grey page lands on the medium boundary", () => {
  const score = analyzer.scorePixels(image(50, 50, () => 128));
  assert.deepEqual(score, { value: 0.3, tier: "medium" });
});

test("tiers never decrease as the score grows", () => {
  let previous = 0;
  for (let step = 0; step <= 100; step += 1) {
    const rank = tierRank(analyzer.tierFor(step / 100));
    assert.ok(rank >= previous, `tier dropped at ${step / 100}`);
    previous = rank;
  }
  assert.equal(analyzer.tierFor(0.29), "simple");
  assert.equal(analyzer.tierFor(0.59), "medium");
  assert.equal(analyzer.tierFor(0.6), "complex");
});

test("an unreadable image is treated as medium", async () => {
  const score = await analyzer.analyze(Buffer.from("not an image"));
  assert.deepEqual(score, { value: 0.45, tier: "medium" });
});

test("analyze decodes encoded pages", async () => {
  const score = await analyzer.analyze(await encodeGray(sparseText));
  assert.equal(score.tier, "simple");
});

test("cut points must increase", () => {
  assert.throws(
    () => new ComplexityAnalyzer({ thresholds: { simpleBelow: 0.6, mediumBelow: 0.3, severeFrom: 0.8 } }),
    /complexity_thresholds_invalid/
  );
});
