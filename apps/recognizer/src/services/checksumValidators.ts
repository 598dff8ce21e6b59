import { env } from "../config/env.js";

export interface ChecksumResult {
  valid: boolean;
  digits: string;
  message?: string;
}

export interface CuitResult extends ChecksumResult {
  formatted?: string;
  /** Set when only the check digit is off. */
  suggestion?: string;
}

export interface CaeResult extends ChecksumResult {
  issuedAt?: { year: number; month: number; day: number; hour: number; minute: number; second: number };
}

export interface CaeWindow {
  minYear: number;
  maxYear: number;
}

const CUIT_WEIGHTS = [5, 4, 3, 2, 7, 6, 5, 4, 3, 2] as const;
export const CUIT_PREFIXES: ReadonlySet<string> = new Set(["20", "23", "24", "25", "26", "27", "30", "33", "34"]);

export function digitsOnly(value: string): string {
  return value.replace(/\D/g, "");
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

export function cuitCheckDigit(body: string): number {
  let sum = 0;
  for (let index = 0; index < CUIT_WEIGHTS.length; index += 1) {
    sum += Number(body[index]) * CUIT_WEIGHTS[index];
  }
  const remainder = sum % 11;
  return remainder < 2 ? remainder : 11 - remainder;
}

export function formatCuit(digits: string): string {
  return `${digits.slice(0, 2)}-${digits.slice(2, 10)}-${digits.slice(10)}`;
}

export function validateCuit(value: string): CuitResult {
  const digits = digitsOnly(value);
  if (digits.length !== 11) {
    return { valid: false, digits, message: `CUIT must have 11 digits, found ${digits.length}` };
  }

  const prefix = digits.slice(0, 2);
  if (!CUIT_PREFIXES.has(prefix)) {
    return { valid: false, digits, message: `CUIT prefix ${prefix} is not an issued type` };
  }

  const expected = cuitCheckDigit(digits.slice(0, 10));
  if (expected !== Number(digits[10])) {
    const suggestion = formatCuit(`${digits.slice(0, 10)}${expected}`);
    return {
      valid: false,
      digits,
      message: `CUIT check digit mismatch (expected ${expected}; did you mean ${suggestion}?)`,
      suggestion
    };
  }

  return { valid: true, digits, formatted: formatCuit(digits) };
}

/**
 * CAE codes lead with their issuance timestamp as YYYYMMDDHHMMSS.
 */
export function validateCae(
  value: string,
  window: CaeWindow = { minYear: env.CAE_MIN_YEAR, maxYear: env.CAE_MAX_YEAR }
): CaeResult {
  const digits = digitsOnly(value);
  if (digits.length !== 14) {
    return { valid: false, digits, message: `CAE must have 14 digits, found ${digits.length}` };
  }

  const year = Number(digits.slice(0, 4));
  const month = Number(digits.slice(4, 6));
  const day = Number(digits.slice(6, 8));
  const hour = Number(digits.slice(8, 10));
  const minute = Number(digits.slice(10, 12));
  const second = Number(digits.slice(12, 14));

  if (year < window.minYear || year > window.maxYear) {
    return { valid: false, digits, message: `CAE year ${year} outside ${window.minYear}-${window.maxYear}` };
  }
  if (!isCalendarDate(year, month, day)) {
    return { valid: false, digits, message: `CAE date ${digits.slice(0, 8)} is not a calendar date` };
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return { valid: false, digits, message: `CAE time ${digits.slice(8, 14)} is out of range` };
  }

  return { valid: true, digits, issuedAt: { year, month, day, hour, minute, second } };
}
