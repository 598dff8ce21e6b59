import pino from "pino";
import { env } from "../config/env.js";
import { decodeGray, type GrayImage } from "./image/grayImage.js";
import { darkComponentCoverage, intensityStats, sobelEdgeDensity } from "./image/pixelOps.js";
import type { ComplexityScore, ComplexityTier } from "../types/ocr.js";

const logger = pino({ name: "complexity-analyzer", level: env.LOG_LEVEL });

export interface TierThresholds {
  simpleBelow: number;
  mediumBelow: number;
  /** Start of the severe end of the complex band; reported only. */
  severeFrom: number;
}

export interface ComplexityOptions {
  pixelLimit: number;
  resolutionWeight: number;
  lowContrastStdDev: number;
  contrastWeight: number;
  edgeMagnitude: number;
  edgeDensityLimit: number;
  edgeWeight: number;
  textDensityWeight: number;
  thresholds: TierThresholds;
}

export interface ComplexityMetrics {
  pixels: number;
  stdDev: number;
  edgeDensity: number;
  textDensity: number;
}

const DEFAULT_OPTIONS: ComplexityOptions = {
  pixelLimit: 2_000_000,
  resolutionWeight: 0.2,
  lowContrastStdDev: 30,
  contrastWeight: 0.3,
  edgeMagnitude: 50,
  edgeDensityLimit: 0.1,
  edgeWeight: 0.3,
  textDensityWeight: 0.2,
  thresholds: {
    simpleBelow: env.COMPLEXITY_SIMPLE_BELOW,
    mediumBelow: env.COMPLEXITY_MEDIUM_BELOW,
    severeFrom: env.COMPLEXITY_SEVERE_FROM
  }
};

const TIER_RANK: Record<ComplexityTier, number> = { simple: 0, medium: 1, complex: 2 };

export function tierRank(tier: ComplexityTier): number {
  return TIER_RANK[tier];
}

/**
 * Heuristic OCR difficulty from pixel statistics. The value is a ranking
 * proxy for routing, not a calibrated probability of OCR failure.
 */
export class ComplexityAnalyzer {
  private readonly options: ComplexityOptions;

  constructor(options: Partial<ComplexityOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const { simpleBelow, mediumBelow, severeFrom } = this.options.thresholds;
    if (!(simpleBelow > 0 && simpleBelow < mediumBelow && mediumBelow <= severeFrom && severeFrom <= 1)) {
      throw new Error("complexity_thresholds_invalid");
    }
  }

  async analyze(image: Buffer): Promise<ComplexityScore> {
    let gray: GrayImage;
    try {
      gray = await decodeGray(image);
    } catch (error) {
      logger.warn({ err: error }, "Unreadable image; defaulting to medium complexity");
      return this.fallbackScore();
    }
    return this.scorePixels(gray);
  }

  scorePixels(gray: GrayImage): ComplexityScore {
    if (gray.width === 0 || gray.height === 0) {
      return this.fallbackScore();
    }

    const metrics = this.measure(gray);
    const weights = this.options;
    let value = 0;
    if (metrics.pixels > weights.pixelLimit) value += weights.resolutionWeight;
    if (metrics.stdDev < weights.lowContrastStdDev) value += weights.contrastWeight;
    if (metrics.edgeDensity > weights.edgeDensityLimit) value += weights.edgeWeight;
    value += metrics.textDensity * weights.textDensityWeight;
    value = Math.min(1, Math.round(value * 10000) / 10000);

    const tier = this.tierFor(value);
    logger.debug(
      { ...metrics, value, tier, severe: value >= weights.thresholds.severeFrom },
      "Image complexity measured"
    );
    return { value, tier };
  }

  measure(gray: GrayImage): ComplexityMetrics {
    return {
      pixels: gray.width * gray.height,
      stdDev: intensityStats(gray).stdDev,
      edgeDensity: sobelEdgeDensity(gray, this.options.edgeMagnitude),
      textDensity: darkComponentCoverage(gray)
    };
  }

  tierFor(value: number): ComplexityTier {
    const { simpleBelow, mediumBelow } = this.options.thresholds;
    if (value < simpleBelow) return "simple";
    if (value < mediumBelow) return "medium";
    return "complex";
  }

  private fallbackScore(): ComplexityScore {
    const { simpleBelow, mediumBelow } = this.options.thresholds;
    return { value: Math.round(((simpleBelow + mediumBelow) / 2) * 10000) / 10000, tier: "medium" };
  }
}

export const complexityAnalyzer = new ComplexityAnalyzer();
