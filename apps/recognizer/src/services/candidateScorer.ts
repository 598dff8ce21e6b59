import { validateCae, validateCuit } from "./checksumValidators.js";
import { amountValue } from "./fieldNormalizers.js";

export interface FieldShape {
  minLength: number;
  maxLength: number;
  /** Whole-value charset test. */
  charset: RegExp;
  /** Length band that earns the length reward; defaults to the shape bounds. */
  preferredLength?: readonly [number, number];
  pattern?: RegExp;
  keywords?: RegExp;
  nameLike?: boolean;
  checksum?: (value: string) => boolean;
}

export const SHAPE_NAMES = [
  "cae",
  "cuit",
  "amount",
  "date",
  "point_of_sale",
  "invoice_number",
  "short_number",
  "letter",
  "name",
  "address",
  "free_text"
] as const;

export type ShapeName = (typeof SHAPE_NAMES)[number];

const ORGANIZATION_KEYWORDS =
  /\b(S\.?\s?A\.?|S\.?\s?R\.?\s?L\.?|S\.?\s?A\.?\s?S\.?|SOCIEDAD|COOPERATIVA|ASOCIACI[OÓ]N|FUNDACI[OÓ]N|UNIVERSIDAD|INSTITUTO|MUNICIPALIDAD|BANCO)\b/i;

export const FIELD_SHAPES: Readonly<Record<ShapeName, FieldShape>> = {
  cae: {
    minLength: 14,
    maxLength: 14,
    charset: /^\d+$/,
    pattern: /^(19|20)\d{12}$/,
    checksum: (value) => validateCae(value).valid
  },
  cuit: {
    minLength: 11,
    maxLength: 11,
    charset: /^\d+$/,
    pattern: /^(20|23|24|25|26|27|30|33|34)\d{9}$/,
    checksum: (value) => validateCuit(value).valid
  },
  amount: {
    minLength: 4,
    maxLength: 16,
    charset: /^\d+\.\d{2}$/,
    checksum: (value) => (amountValue(value) ?? 0) > 0
  },
  date: {
    minLength: 10,
    maxLength: 10,
    charset: /^[\d/]+$/,
    pattern: /^\d{2}\/\d{2}\/\d{4}$/
  },
  point_of_sale: { minLength: 4, maxLength: 5, charset: /^\d+$/ },
  invoice_number: { minLength: 1, maxLength: 8, charset: /^\d+$/ },
  short_number: { minLength: 1, maxLength: 4, charset: /^\d+$/ },
  letter: { minLength: 1, maxLength: 1, charset: /^[ABCEMT]$/ },
  name: {
    minLength: 2,
    maxLength: 200,
    charset: /^[\p{L}\p{N}\s.,&'°º\-/()]+$/u,
    preferredLength: [5, 100],
    keywords: ORGANIZATION_KEYWORDS,
    nameLike: true
  },
  address: {
    minLength: 2,
    maxLength: 200,
    charset: /^[\p{L}\p{N}\s.,°º'\-/()#]+$/u,
    preferredLength: [5, 100],
    pattern: /\d/
  },
  free_text: {
    minLength: 2,
    maxLength: 200,
    charset: /^[^\n]+$/,
    preferredLength: [5, 100]
  }
};

export const STOP_WORDS: ReadonlySet<string> = new Set(["el", "la", "de", "del", "en", "con", "por", "para", "se", "que", "es", "son"]);

export function conformsToShape(value: string, shape: FieldShape): boolean {
  return value.length >= shape.minLength && value.length <= shape.maxLength && shape.charset.test(value);
}

export function isAcceptableCandidate(value: string, shape: FieldShape): boolean {
  if (value.length === 0) return false;
  if (STOP_WORDS.has(value.toLowerCase())) return false;
  if (shape.nameLike && /^[\d\W_]+$/u.test(value)) return false;
  return conformsToShape(value, shape);
}

export function passesChecksum(value: string, shape: FieldShape): boolean {
  return shape.checksum ? shape.checksum(value) : true;
}

/**
 * Heuristic quality in [0, 1]. Both the text pass and region re-OCR
 * rank candidates with this, so their scores are comparable.
 */
export function scoreCandidate(value: string, shape: FieldShape): number {
  if (value.length === 0) return 0;

  let score = 0;
  const [preferredMin, preferredMax] = shape.preferredLength ?? [shape.minLength, shape.maxLength];
  if (value.length >= preferredMin && value.length <= preferredMax) score += 0.3;
  if (shape.charset.test(value)) score += 0.2;

  const noisy = value.replace(/[\p{L}\p{N}\s]/gu, "").length;
  if (noisy / value.length < 0.3) score += 0.1;

  if (shape.nameLike && /\p{L}/u.test(value)) score += 0.1;
  if (shape.pattern?.test(value)) score += 0.2;
  if (shape.keywords?.test(value)) score += 0.2;
  if (shape.checksum?.(value)) score += 0.2;

  return Math.min(1, Math.round(score * 100) / 100);
}
