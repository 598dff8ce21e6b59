import { FIELD_SHAPES, scoreCandidate } from "./candidateScorer.js";
import {
  amountValue,
  cleanCandidate,
  formatAmount,
  normalizeAmount,
  normalizeDescription
} from "./fieldNormalizers.js";
import type { LineItemRowPattern } from "./fieldPatternLibrary.js";
import type { FieldValue, LineItem } from "../types/document.js";

interface RowCells {
  code?: string;
  description: string;
  unit?: string;
  quantity: string;
  unitPrice: string;
  discountPercent?: string;
  discountAmount?: string;
  vatRate?: string;
  subtotal?: string;
  lineTotal?: string;
}

const NUMERIC_CELL = /^\$?\s*\d[\d.,]*\s*%?$/;

function printed(raw: string | undefined): FieldValue | undefined {
  if (raw === undefined) return undefined;
  const cleaned = cleanCandidate(raw);
  const normalized = normalizeAmount(cleaned);
  if (!normalized) return undefined;
  return {
    raw: cleaned,
    normalized,
    source: "general_ocr",
    confidence: scoreCandidate(normalized, FIELD_SHAPES.amount)
  };
}

function computed(value: number, confidence: number): FieldValue {
  const normalized = formatAmount(value);
  return { raw: normalized, normalized, source: "computed", confidence };
}

function numeric(value: FieldValue | undefined): number {
  return value ? amountValue(value.normalized) ?? 0 : 0;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function splitPipeRow(line: string): RowCells | undefined {
  const cells = line
    .split("|")
    .map((cell) => cell.trim())
    .filter((_, index, all) => !((index === 0 || index === all.length - 1) && all[index] === ""));

  const descriptionIndex = cells.findIndex((cell) => /[A-Za-zÁÉÍÓÚáéíóúÑñ]{2,}/.test(cell) && !NUMERIC_CELL.test(cell));
  if (descriptionIndex < 0) return undefined;

  const code = descriptionIndex > 0 ? cells[descriptionIndex - 1] : undefined;
  const rest = cells.slice(descriptionIndex + 1);
  const unit = rest.find((cell) => cell.length > 0 && !NUMERIC_CELL.test(cell));
  const numbers = rest.filter((cell) => cell !== unit);
  if (numbers.length < 2 || !NUMERIC_CELL.test(numbers[0]) || !NUMERIC_CELL.test(numbers[1])) {
    return undefined;
  }

  const [quantity, unitPrice, ...tail] = numbers;
  const present = (cell: string | undefined): string | undefined => (cell && cell.length > 0 ? cell : undefined);
  const last = present(tail[tail.length - 1]);

  return {
    code: present(code),
    description: cells[descriptionIndex],
    unit,
    quantity,
    unitPrice,
    discountPercent: tail.length >= 2 ? present(tail[0]) : undefined,
    discountAmount: tail.length >= 3 ? present(tail[1]) : undefined,
    subtotal: last
  };
}

function matchRow(line: string, row: LineItemRowPattern): RowCells | undefined {
  if (row.layout === "pipe") {
    return row.pattern.test(line) ? splitPipeRow(line) : undefined;
  }

  const groups = row.pattern.exec(line)?.groups;
  if (!groups?.description || !groups.quantity || !groups.unitPrice) return undefined;
  return {
    code: groups.code,
    description: groups.description,
    unit: groups.unit,
    quantity: groups.quantity,
    unitPrice: groups.unitPrice,
    discountPercent: groups.discountPercent,
    discountAmount: groups.discountAmount,
    vatRate: groups.vatRate,
    subtotal: groups.subtotal,
    lineTotal: groups.lineTotal
  };
}

function buildItem(cells: RowCells): LineItem | undefined {
  const quantity = printed(cells.quantity);
  const unitPrice = printed(cells.unitPrice);
  if (!quantity || !unitPrice) return undefined;

  const discountPercent = printed(cells.discountPercent);
  const discountAmount = printed(cells.discountAmount);
  const vatRate = printed(cells.vatRate);
  const storedSubtotal = printed(cells.subtotal);
  const lineTotal = printed(cells.lineTotal);

  let expected = numeric(quantity) * numeric(unitPrice);
  if (numeric(discountAmount) > 0) {
    expected -= numeric(discountAmount);
  } else if (numeric(discountPercent) > 0) {
    expected *= 1 - numeric(discountPercent) / 100;
  }
  expected = round2(expected);

  const inputConfidence = Math.min(quantity.confidence, unitPrice.confidence);
  const subtotal = storedSubtotal ?? computed(expected, inputConfidence);
  const vatAmount = vatRate ? computed(round2((numeric(subtotal) * numeric(vatRate)) / 100), inputConfidence) : undefined;

  let deviation: number | undefined;
  if (lineTotal && numeric(lineTotal) > 0) {
    const reconstructed = numeric(subtotal) + numeric(vatAmount);
    deviation = Math.abs(reconstructed - numeric(lineTotal)) / numeric(lineTotal);
  } else if (storedSubtotal && numeric(storedSubtotal) > 0) {
    deviation = Math.abs(expected - numeric(storedSubtotal)) / numeric(storedSubtotal);
  }

  const item: LineItem = {
    description: cleanCandidate(cells.description),
    quantity,
    unitPrice,
    subtotal
  };
  if (cells.code) item.code = cells.code;
  if (cells.unit) item.unit = cells.unit;
  if (discountPercent) item.discountPercent = discountPercent;
  if (discountAmount) item.discountAmount = discountAmount;
  if (vatRate) item.vatRate = vatRate;
  if (vatAmount) item.vatAmount = vatAmount;
  if (lineTotal) item.lineTotal = lineTotal;
  if (deviation !== undefined) item.deviation = round4(deviation);
  return item;
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Scans every line against the row layouts in order; the first layout
 * that yields an item wins for that line. Rows repeating a description
 * already seen are dropped.
 */
export function extractLineItems(rawText: string, rows: readonly LineItemRowPattern[]): LineItem[] {
  const items: LineItem[] = [];
  const seen = new Set<string>();

  for (const line of rawText.split(/\r?\n/)) {
    if (line.trim().length === 0) continue;

    for (const row of rows) {
      const cells = matchRow(line, row);
      const item = cells ? buildItem(cells) : undefined;
      if (!item) continue;

      const key = normalizeDescription(item.description);
      if (key.length > 0 && !seen.has(key)) {
        seen.add(key);
        items.push(item);
      }
      break;
    }
  }

  return items;
}

export const lineItemTestables = {
  splitPipeRow,
  buildItem
};
