import type { CheckSeverity } from "../../types/validation.js";

export type ValidationRuleId =
  | "required_present"
  | "field_length"
  | "field_charset"
  | "cuit_checksum"
  | "cae_checksum"
  | "calendar_date"
  | "amount_positive"
  | "cae_not_before_issue"
  | "total_reconciliation"
  | "items_match_subtotal"
  | "line_item_arithmetic"
  | "issue_date_not_future"
  | "distinct_parties"
  | "billing_period_order";

export interface ValidationRuleMeta {
  ruleId: ValidationRuleId;
  label: string;
  severity: CheckSeverity;
  /** Field rules drop to soft_fail when the field is optional. */
  fieldRule: boolean;
}

const RULES: Record<ValidationRuleId, ValidationRuleMeta> = {
  required_present: { ruleId: "required_present", label: "Required Field Present", severity: "hard_fail", fieldRule: true },
  field_length: { ruleId: "field_length", label: "Field Length", severity: "hard_fail", fieldRule: true },
  field_charset: { ruleId: "field_charset", label: "Field Characters", severity: "hard_fail", fieldRule: true },
  cuit_checksum: { ruleId: "cuit_checksum", label: "CUIT Check Digit", severity: "hard_fail", fieldRule: true },
  cae_checksum: { ruleId: "cae_checksum", label: "CAE Timestamp", severity: "hard_fail", fieldRule: true },
  calendar_date: { ruleId: "calendar_date", label: "Calendar Date", severity: "hard_fail", fieldRule: true },
  amount_positive: { ruleId: "amount_positive", label: "Positive Amount", severity: "hard_fail", fieldRule: true },
  cae_not_before_issue: {
    ruleId: "cae_not_before_issue",
    label: "CAE Not Before Issue Date",
    severity: "advisory",
    fieldRule: false
  },
  total_reconciliation: { ruleId: "total_reconciliation", label: "Total Reconciliation", severity: "advisory", fieldRule: false },
  items_match_subtotal: { ruleId: "items_match_subtotal", label: "Line Items vs Subtotal", severity: "advisory", fieldRule: false },
  line_item_arithmetic: { ruleId: "line_item_arithmetic", label: "Line Item Arithmetic", severity: "advisory", fieldRule: false },
  issue_date_not_future: { ruleId: "issue_date_not_future", label: "Issue Date Not In Future", severity: "advisory", fieldRule: false },
  distinct_parties: { ruleId: "distinct_parties", label: "Issuer And Buyer Differ", severity: "advisory", fieldRule: false },
  billing_period_order: { ruleId: "billing_period_order", label: "Billing Period Order", severity: "advisory", fieldRule: false }
};

export function getValidationRuleMeta(ruleId: ValidationRuleId): ValidationRuleMeta {
  return RULES[ruleId];
}

export function severityFor(ruleId: ValidationRuleId, required: boolean): CheckSeverity {
  const meta = RULES[ruleId];
  if (meta.fieldRule && !required && meta.severity === "hard_fail") return "soft_fail";
  return meta.severity;
}
