import type { GrayImage } from "./grayImage.js";

export interface IntensityStats {
  mean: number;
  stdDev: number;
  min: number;
  max: number;
}

export function intensityStats(image: GrayImage): IntensityStats {
  const { data } = image;
  if (data.length === 0) return { mean: 0, stdDev: 0, min: 0, max: 0 };

  let sum = 0;
  let min = 255;
  let max = 0;
  for (const value of data) {
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  const mean = sum / data.length;

  let squares = 0;
  for (const value of data) {
    squares += (value - mean) ** 2;
  }
  return { mean, stdDev: Math.sqrt(squares / data.length), min, max };
}

/**
 * Share of interior pixels whose Sobel gradient magnitude reaches
 * `magnitude`. Border pixels are not sampled.
 */
export function sobelEdgeDensity(image: GrayImage, magnitude: number): number {
  const { width, height, data } = image;
  if (width < 3 || height < 3) return 0;

  const at = (x: number, y: number): number => data[y * width + x];
  let edges = 0;
  for (let y = 1; y < height - 1; y += 1) {
    for (let x = 1; x < width - 1; x += 1) {
      const gx =
        at(x + 1, y - 1) + 2 * at(x + 1, y) + at(x + 1, y + 1) - at(x - 1, y - 1) - 2 * at(x - 1, y) - at(x - 1, y + 1);
      const gy =
        at(x - 1, y + 1) + 2 * at(x, y + 1) + at(x + 1, y + 1) - at(x - 1, y - 1) - 2 * at(x, y - 1) - at(x + 1, y - 1);
      if (Math.sqrt(gx * gx + gy * gy) >= magnitude) edges += 1;
    }
  }
  return edges / ((width - 2) * (height - 2));
}

/** Otsu's global threshold; undefined for a flat image. */
export function otsuThreshold(image: GrayImage): number | undefined {
  const histogram = new Array<number>(256).fill(0);
  for (const value of image.data) histogram[value] += 1;

  const total = image.data.length;
  let weightedSum = 0;
  for (let level = 0; level < 256; level += 1) weightedSum += level * histogram[level];

  let backgroundWeight = 0;
  let backgroundSum = 0;
  let bestVariance = 0;
  let threshold: number | undefined;

  for (let level = 0; level < 256; level += 1) {
    backgroundWeight += histogram[level];
    if (backgroundWeight === 0) continue;
    const foregroundWeight = total - backgroundWeight;
    if (foregroundWeight === 0) break;

    backgroundSum += level * histogram[level];
    const backgroundMean = backgroundSum / backgroundWeight;
    const foregroundMean = (weightedSum - backgroundSum) / foregroundWeight;
    const variance = backgroundWeight * foregroundWeight * (backgroundMean - foregroundMean) ** 2;
    if (variance > bestVariance) {
      bestVariance = variance;
      threshold = level;
    }
  }
  return threshold;
}

/**
 * Bounding-box area of 4-connected dark components (at or below the Otsu
 * threshold) as a fraction of the image, capped at 1.
 */
export function darkComponentCoverage(image: GrayImage, minArea = 4): number {
  const { width, height, data } = image;
  const threshold = otsuThreshold(image);
  if (threshold === undefined || width === 0 || height === 0) return 0;

  const visited = new Uint8Array(width * height);
  const stack: number[] = [];
  let covered = 0;

  for (let start = 0; start < data.length; start += 1) {
    if (visited[start] || data[start] > threshold) continue;

    visited[start] = 1;
    stack.push(start);
    let area = 0;
    let minX = width;
    let maxX = 0;
    let minY = height;
    let maxY = 0;

    while (stack.length > 0) {
      const index = stack.pop() ?? 0;
      const x = index % width;
      const y = (index - x) / width;
      area += 1;
      minX = Math.min(minX, x);
      maxX = Math.max(maxX, x);
      minY = Math.min(minY, y);
      maxY = Math.max(maxY, y);

      const neighbours = [
        x > 0 ? index - 1 : -1,
        x < width - 1 ? index + 1 : -1,
        y > 0 ? index - width : -1,
        y < height - 1 ? index + width : -1
      ];
      for (const next of neighbours) {
        if (next >= 0 && !visited[next] && data[next] <= threshold) {
          visited[next] = 1;
          stack.push(next);
        }
      }
    }

    if (area >= minArea) {
      covered += (maxX - minX + 1) * (maxY - minY + 1);
    }
  }

  return Math.min(1, covered / (width * height));
}

/** Mean-C local threshold: dark where a pixel sits `offset` below its window mean. */
export function adaptiveThreshold(image: GrayImage, window = 15, offset = 10): GrayImage {
  const { width, height, data } = image;
  const integral = new Float64Array((width + 1) * (height + 1));
  for (let y = 0; y < height; y += 1) {
    let rowSum = 0;
    for (let x = 0; x < width; x += 1) {
      rowSum += data[y * width + x];
      integral[(y + 1) * (width + 1) + x + 1] = integral[y * (width + 1) + x + 1] + rowSum;
    }
  }

  const half = Math.floor(window / 2);
  const output = new Uint8Array(width * height);
  for (let y = 0; y < height; y += 1) {
    const top = Math.max(0, y - half);
    const bottom = Math.min(height - 1, y + half);
    for (let x = 0; x < width; x += 1) {
      const left = Math.max(0, x - half);
      const right = Math.min(width - 1, x + half);
      const count = (bottom - top + 1) * (right - left + 1);
      const sum =
        integral[(bottom + 1) * (width + 1) + right + 1] -
        integral[top * (width + 1) + right + 1] -
        integral[(bottom + 1) * (width + 1) + left] +
        integral[top * (width + 1) + left];
      output[y * width + x] = data[y * width + x] <= sum / count - offset ? 0 : 255;
    }
  }
  return { width, height, data: output };
}

function rankFilter(image: GrayImage, pick: (a: number, b: number) => number): GrayImage {
  const { width, height, data } = image;
  const output = new Uint8Array(width * height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let value = data[y * width + x];
      for (let dy = -1; dy <= 1; dy += 1) {
        for (let dx = -1; dx <= 1; dx += 1) {
          const nx = x + dx;
          const ny = y + dy;
          if (nx >= 0 && nx < width && ny >= 0 && ny < height) {
            value = pick(value, data[ny * width + nx]);
          }
        }
      }
      output[y * width + x] = value;
    }
  }
  return { width, height, data: output };
}

/**
 * 3x3 closing of dark strokes: grow dark pixels, then shrink them back,
 * bridging one-pixel gaps inside glyphs.
 */
export function closeDarkStrokes(image: GrayImage): GrayImage {
  return rankFilter(rankFilter(image, Math.min), Math.max);
}

export function binarize(image: GrayImage): GrayImage {
  const threshold = otsuThreshold(image);
  if (threshold === undefined) return image;
  return {
    width: image.width,
    height: image.height,
    data: image.data.map((value) => (value <= threshold ? 0 : 255))
  };
}
