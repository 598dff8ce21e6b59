import { isCalendarDate } from "./checksumValidators.js";

export type NormalizerKind = "text" | "digits" | "amount" | "date" | "code";

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/** Pass `keepFinalPeriod` for names, where a final "." closes an abbreviation such as "S.A.". */
export function cleanCandidate(raw: string, keepFinalPeriod = false): string {
  return raw
    .replace(/\s+/g, " ")
    .trim()
    .replace(keepFinalPeriod ? /[,:;]+$/ : /[.,:;]+$/, "")
    .trim();
}

/**
 * Canonical amounts use a period decimal separator and two decimals, so
 * "1.234,56", "1,234.56" and "1234.56" all become "1234.56".
 */
export function normalizeAmount(raw: string): string | undefined {
  const compact = raw.replace(/[^\d.,]/g, "").replace(/^[.,]+|[.,]+$/g, "");
  if (!/\d/.test(compact)) return undefined;

  const lastDot = compact.lastIndexOf(".");
  const lastComma = compact.lastIndexOf(",");
  let plain: string | undefined;

  if (lastDot >= 0 && lastComma >= 0) {
    const decimal = lastDot > lastComma ? "." : ",";
    const thousands = decimal === "." ? "," : ".";
    plain = compact.split(thousands).join("").replace(decimal, ".");
  } else if (lastDot >= 0 || lastComma >= 0) {
    const separator = lastDot >= 0 ? "." : ",";
    const parts = compact.split(separator);
    const grouped = parts.slice(1).every((part) => part.length === 3);
    if (parts.length > 2) {
      plain = grouped ? parts.join("") : undefined;
    } else {
      plain = grouped ? parts.join("") : `${parts[0]}.${parts[1]}`;
    }
  } else {
    plain = compact;
  }

  if (!plain || !/^\d+(\.\d+)?$/.test(plain)) return undefined;
  const value = Number(plain);
  return Number.isFinite(value) ? value.toFixed(2) : undefined;
}

export function amountValue(normalized: string): number | undefined {
  if (!/^\d+\.\d{2}$/.test(normalized)) return undefined;
  return Number(normalized);
}

export function formatAmount(value: number): string {
  return value.toFixed(2);
}

export function parseDate(raw: string): CalendarDate | undefined {
  const trimmed = raw.trim();
  const dayFirst = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/.exec(trimmed);
  const isoDate = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(trimmed);

  let date: CalendarDate | undefined;
  if (dayFirst) {
    date = { day: Number(dayFirst[1]), month: Number(dayFirst[2]), year: Number(dayFirst[3]) };
  } else if (isoDate) {
    date = { year: Number(isoDate[1]), month: Number(isoDate[2]), day: Number(isoDate[3]) };
  }

  if (!date || !isCalendarDate(date.year, date.month, date.day)) return undefined;
  return date;
}

export function formatDate(date: CalendarDate): string {
  const day = String(date.day).padStart(2, "0");
  const month = String(date.month).padStart(2, "0");
  return `${day}/${month}/${date.year}`;
}

export function normalizeDate(raw: string): string | undefined {
  const date = parseDate(raw);
  return date ? formatDate(date) : undefined;
}

/** Sortable yyyymmdd integer. */
export function dateOrdinal(date: CalendarDate): number {
  return date.year * 10000 + date.month * 100 + date.day;
}

export function normalizeDescription(text: string): string {
  return text
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

export function normalizeValue(kind: NormalizerKind, cleaned: string): string | undefined {
  switch (kind) {
    case "amount":
      return normalizeAmount(cleaned);
    case "date":
      return normalizeDate(cleaned);
    case "digits": {
      const digits = cleaned.replace(/\D/g, "");
      return digits.length > 0 ? digits : undefined;
    }
    case "code":
      return cleaned.toUpperCase();
    case "text":
      return cleaned.length > 0 ? cleaned : undefined;
  }
}
