import type { FieldName } from "./document.js";

export type CheckStatus = "pass" | "fail" | "warning" | "not_evaluable";
export type CheckSeverity = "hard_fail" | "soft_fail" | "advisory";

export interface FieldValidation {
  valid: boolean;
  confidence: number;
  message?: string;
}

export interface ValidationCheck {
  checkId: string;
  ruleId: string;
  label: string;
  status: CheckStatus;
  severity: CheckSeverity;
  field?: FieldName;
  detail: string;
}

export interface ValidationVerdict {
  documentId?: string;
  overallValid: boolean;
  fieldResults: Partial<Record<FieldName, FieldValidation>>;
  errors: string[];
  warnings: string[];
  checks: ValidationCheck[];
}
