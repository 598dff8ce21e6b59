import pino from "pino";
import { env } from "../config/env.js";
import { validateCae, validateCuit, type CaeWindow } from "./checksumValidators.js";
import { amountValue, dateOrdinal, formatAmount, formatDate, parseDate, type CalendarDate } from "./fieldNormalizers.js";
import { fieldPatternLibrary, type FieldDefinition, type FieldPatternLibrary } from "./fieldPatternLibrary.js";
import { getValidationRuleMeta, severityFor, type ValidationRuleId } from "./rules/validationRuleMap.js";
import { FIELD_NAMES, type DocumentType, type FieldName, type FieldValue, type StructuredDocument } from "../types/document.js";
import type { CheckStatus, FieldValidation, ValidationCheck, ValidationVerdict } from "../types/validation.js";

const logger = pino({ name: "validation-engine", level: env.LOG_LEVEL });

const DEFAULT_PASS_CONFIDENCE = 0.8;
const LENGTH_FAILURE_CONFIDENCE = 0.2;
const PATTERN_FAILURE_CONFIDENCE = 0.3;
const CHECKSUM_FAILURE_CONFIDENCE = 0.1;

export interface ValidationEngineOptions {
  library: FieldPatternLibrary;
  /** Relative deviation allowed between reconstructed and printed amounts. */
  tolerance: number;
  caeWindow: CaeWindow;
}

export interface ValidateOptions {
  requiredFields?: readonly FieldName[];
  now?: Date;
}

interface RuleOutcome {
  ruleId: ValidationRuleId;
  passed: boolean;
  detail: string;
  failureConfidence: number;
}

class VerdictBuilder {
  readonly checks: ValidationCheck[] = [];
  readonly errors: string[] = [];
  readonly warnings: string[] = [];
  readonly fieldResults: Partial<Record<FieldName, FieldValidation>> = {};

  record(ruleId: ValidationRuleId, status: CheckStatus, detail: string, field?: FieldName, required = false): void {
    const meta = getValidationRuleMeta(ruleId);
    this.checks.push({
      checkId: field ? `${ruleId}:${field}` : ruleId,
      ruleId,
      label: meta.label,
      status,
      severity: severityFor(ruleId, required),
      field,
      detail
    });
  }

  /** Cross-field rules never fail a document; a violation is a warning. */
  crossField(ruleId: ValidationRuleId, violation: string | undefined, passDetail: string): void {
    if (violation) {
      this.record(ruleId, "warning", violation);
      this.warnings.push(violation);
    } else {
      this.record(ruleId, "pass", passDetail);
    }
  }
}

function relativeDeviation(expected: number, actual: number): number {
  if (actual === 0) return expected === 0 ? 0 : Number.POSITIVE_INFINITY;
  return Math.abs(expected - actual) / Math.abs(actual);
}

function percent(deviation: number): string {
  return `${(deviation * 100).toFixed(2)}%`;
}

function amountOf(value: FieldValue | undefined): number | undefined {
  return value ? amountValue(value.normalized) : undefined;
}

function dateOf(value: FieldValue | undefined): CalendarDate | undefined {
  return value ? parseDate(value.normalized) : undefined;
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export class ValidationEngine {
  private readonly options: ValidationEngineOptions;

  constructor(options: Partial<ValidationEngineOptions> = {}) {
    this.options = {
      library: options.library ?? fieldPatternLibrary,
      tolerance: options.tolerance ?? env.RECONCILIATION_TOLERANCE,
      caeWindow: options.caeWindow ?? { minYear: env.CAE_MIN_YEAR, maxYear: env.CAE_MAX_YEAR }
    };
  }

  validate(document: StructuredDocument, documentType: DocumentType, options: ValidateOptions = {}): ValidationVerdict {
    const profile = this.options.library.profile(documentType);
    const required = new Set<FieldName>(options.requiredFields ?? profile.required);
    const builder = new VerdictBuilder();

    const names = FIELD_NAMES.filter(
      (name) => required.has(name) || document.fields[name] !== undefined || profile.fields.some((field) => field.name === name)
    );

    for (const name of names) {
      this.validateField(builder, name, document.fields[name], required.has(name));
    }

    this.crossFieldRules(builder, document, options.now ?? new Date());

    const overallValid = [...required].every((name) => builder.fieldResults[name]?.valid === true);
    const verdict: ValidationVerdict = {
      overallValid,
      fieldResults: builder.fieldResults,
      errors: builder.errors,
      warnings: builder.warnings,
      checks: builder.checks
    };
    if (document.documentId !== undefined) {
      verdict.documentId = document.documentId;
    }

    logger.info(
      {
        documentId: document.documentId,
        documentType,
        overallValid,
        errors: builder.errors.length,
        warnings: builder.warnings.length
      },
      "Document validated"
    );
    return verdict;
  }

  private validateField(builder: VerdictBuilder, name: FieldName, value: FieldValue | undefined, required: boolean): void {
    if (!value) {
      if (required) {
        builder.fieldResults[name] = { valid: false, confidence: 0, message: "missing" };
        builder.errors.push(`${name}: missing`);
        builder.record("required_present", "fail", "missing", name, true);
      }
      return;
    }

    if (required) {
      builder.record("required_present", "pass", "present", name, true);
    }

    const definition = this.options.library.definitionOf(name);
    if (!definition) {
      builder.fieldResults[name] = { valid: true, confidence: value.confidence };
      return;
    }

    const outcomes = this.fieldRules(definition, value.normalized);
    let failure: RuleOutcome | undefined;
    for (const outcome of outcomes) {
      if (failure) {
        builder.record(outcome.ruleId, "not_evaluable", `skipped after ${failure.ruleId}`, name, required);
        continue;
      }
      builder.record(outcome.ruleId, outcome.passed ? "pass" : "fail", outcome.detail, name, required);
      if (!outcome.passed) failure = outcome;
    }

    if (!failure) {
      builder.fieldResults[name] = {
        valid: true,
        confidence: value.confidence > 0 ? value.confidence : DEFAULT_PASS_CONFIDENCE
      };
      return;
    }

    builder.fieldResults[name] = { valid: false, confidence: failure.failureConfidence, message: failure.detail };
    (required ? builder.errors : builder.warnings).push(`${name}: ${failure.detail}`);
  }

  /** Ordered; the first failing rule decides the field confidence. */
  private fieldRules(definition: FieldDefinition, normalized: string): RuleOutcome[] {
    const { shape } = definition;
    const lengthOk = normalized.length >= shape.minLength && normalized.length <= shape.maxLength;
    const outcomes: RuleOutcome[] = [
      {
        ruleId: "field_length",
        passed: lengthOk,
        detail: lengthOk
          ? `length ${normalized.length}`
          : `length ${normalized.length} outside ${shape.minLength}-${shape.maxLength}`,
        failureConfidence: LENGTH_FAILURE_CONFIDENCE
      },
      {
        ruleId: "field_charset",
        passed: shape.charset.test(normalized),
        detail: shape.charset.test(normalized) ? "characters ok" : `unexpected characters in "${normalized}"`,
        failureConfidence: PATTERN_FAILURE_CONFIDENCE
      }
    ];

    switch (definition.shapeName) {
      case "cuit": {
        const result = validateCuit(normalized);
        outcomes.push({
          ruleId: "cuit_checksum",
          passed: result.valid,
          detail: result.message ?? `valid CUIT ${result.formatted ?? normalized}`,
          failureConfidence: CHECKSUM_FAILURE_CONFIDENCE
        });
        break;
      }
      case "cae": {
        const result = validateCae(normalized, this.options.caeWindow);
        outcomes.push({
          ruleId: "cae_checksum",
          passed: result.valid,
          detail: result.message ?? "valid CAE timestamp",
          failureConfidence: CHECKSUM_FAILURE_CONFIDENCE
        });
        break;
      }
      case "date": {
        const date = parseDate(normalized);
        outcomes.push({
          ruleId: "calendar_date",
          passed: date !== undefined,
          detail: date ? "calendar date" : `${normalized} is not a calendar date`,
          failureConfidence: PATTERN_FAILURE_CONFIDENCE
        });
        break;
      }
      case "amount": {
        const amount = amountValue(normalized);
        const positive = amount !== undefined && amount > 0;
        outcomes.push({
          ruleId: "amount_positive",
          passed: positive,
          detail: positive ? "positive amount" : `amount ${normalized} is not positive`,
          failureConfidence: CHECKSUM_FAILURE_CONFIDENCE
        });
        break;
      }
      default:
        break;
    }

    return outcomes;
  }

  private crossFieldRules(builder: VerdictBuilder, document: StructuredDocument, now: Date): void {
    const { fields, lineItems } = document;
    const tolerance = this.options.tolerance;

    const issueDate = dateOf(fields.issue_date);
    const cae = fields.cae_number ? validateCae(fields.cae_number.normalized, this.options.caeWindow) : undefined;
    if (issueDate && cae?.issuedAt) {
      const caeDate = cae.issuedAt;
      builder.crossField(
        "cae_not_before_issue",
        dateOrdinal(caeDate) < dateOrdinal(issueDate)
          ? `CAE date ${formatDate(caeDate)} precedes issue date ${formatDate(issueDate)}`
          : undefined,
        "CAE issued on or after the issue date"
      );
    } else {
      builder.record("cae_not_before_issue", "not_evaluable", "needs a valid CAE and issue date");
    }

    const total = amountOf(fields.total_amount);
    const lineSubtotals = lineItems.map((item) => amountValue(item.subtotal.normalized) ?? 0);
    const lineVat = lineItems.flatMap((item) => (item.vatAmount ? [amountValue(item.vatAmount.normalized) ?? 0] : []));
    const base = lineItems.length > 0 ? sum(lineSubtotals) : amountOf(fields.subtotal);

    if (total !== undefined && base !== undefined) {
      const vat = amountOf(fields.vat_amount) ?? sum(lineVat);
      const reconstructed = base + vat + (amountOf(fields.other_taxes_amount) ?? 0);
      const deviation = relativeDeviation(reconstructed, total);
      builder.crossField(
        "total_reconciliation",
        deviation > tolerance
          ? `Reconstructed total ${formatAmount(reconstructed)} differs from extracted total ${formatAmount(total)} (${percent(deviation)} deviation)`
          : undefined,
        `Reconstructed total ${formatAmount(reconstructed)} matches ${formatAmount(total)}`
      );
    } else {
      builder.record("total_reconciliation", "not_evaluable", "needs a total and a subtotal or line items");
    }

    const subtotal = amountOf(fields.subtotal);
    if (lineItems.length > 0 && subtotal !== undefined) {
      const itemsSum = sum(lineSubtotals);
      const deviation = relativeDeviation(itemsSum, subtotal);
      builder.crossField(
        "items_match_subtotal",
        deviation > tolerance
          ? `Line items sum ${formatAmount(itemsSum)} differs from subtotal ${formatAmount(subtotal)} (${percent(deviation)} deviation)`
          : undefined,
        "Line items add up to the subtotal"
      );
    } else {
      builder.record("items_match_subtotal", "not_evaluable", "needs line items and a subtotal");
    }

    if (lineItems.length > 0) {
      const offending = lineItems.filter((item) => (item.deviation ?? 0) > tolerance);
      builder.crossField(
        "line_item_arithmetic",
        offending.length > 0
          ? offending
              .map((item) => `Line item "${item.description}" deviates ${percent(item.deviation ?? 0)} from its computed amount`)
              .join("; ")
          : undefined,
        "Line item arithmetic consistent"
      );
    } else {
      builder.record("line_item_arithmetic", "not_evaluable", "no line items");
    }

    if (issueDate) {
      const today = dateOrdinal({ year: now.getUTCFullYear(), month: now.getUTCMonth() + 1, day: now.getUTCDate() });
      builder.crossField(
        "issue_date_not_future",
        dateOrdinal(issueDate) > today ? `Issue date ${fields.issue_date?.normalized ?? ""} is in the future` : undefined,
        "Issue date not in the future"
      );
    } else {
      builder.record("issue_date_not_future", "not_evaluable", "no issue date");
    }

    if (fields.cuit_issuer && fields.cuit_buyer) {
      builder.crossField(
        "distinct_parties",
        fields.cuit_issuer.normalized === fields.cuit_buyer.normalized
          ? `Issuer and buyer share CUIT ${fields.cuit_issuer.normalized}`
          : undefined,
        "Issuer and buyer CUITs differ"
      );
    } else {
      builder.record("distinct_parties", "not_evaluable", "needs both CUITs");
    }

    const periodFrom = dateOf(fields.period_from);
    const periodTo = dateOf(fields.period_to);
    if (periodFrom && periodTo) {
      builder.crossField(
        "billing_period_order",
        dateOrdinal(periodFrom) > dateOrdinal(periodTo)
          ? `Billing period starts ${fields.period_from?.normalized ?? ""} after it ends ${fields.period_to?.normalized ?? ""}`
          : undefined,
        "Billing period in order"
      );
    } else {
      builder.record("billing_period_order", "not_evaluable", "needs both period dates");
    }
  }
}

export const validationEngine = new ValidationEngine();
