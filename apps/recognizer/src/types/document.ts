export const DOCUMENT_TYPES = ["afip_invoice", "invoice", "receipt", "form", "generic"] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export type FieldKind = "cae" | "cuit" | "amount";

export const FIELD_NAMES = [
  "invoice_letter",
  "invoice_code",
  "point_of_sale",
  "invoice_number",
  "receipt_number",
  "issue_date",
  "due_date",
  "period_from",
  "period_to",
  "issuer_name",
  "issuer_address",
  "issuer_vat_condition",
  "gross_income_id",
  "activity_start_date",
  "cuit_issuer",
  "cuit_buyer",
  "buyer_name",
  "buyer_address",
  "buyer_vat_condition",
  "sale_condition",
  "subtotal",
  "vat_amount",
  "other_taxes_amount",
  "total_amount",
  "cae_number",
  "cae_due_date",
  "page_current",
  "page_total"
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export type FieldSource = "general_ocr" | "recovery_ocr" | "computed";

export interface FieldValue {
  raw: string;
  normalized: string;
  source: FieldSource;
  confidence: number;
}

export interface LineItem {
  code?: string;
  description: string;
  unit?: string;
  quantity: FieldValue;
  unitPrice: FieldValue;
  discountPercent?: FieldValue;
  discountAmount?: FieldValue;
  vatRate?: FieldValue;
  subtotal: FieldValue;
  vatAmount?: FieldValue;
  lineTotal?: FieldValue;
  /** Relative gap between computed and printed line total. */
  deviation?: number;
}

export type DocumentFields = Partial<Record<FieldName, FieldValue>>;

export interface StructuredDocument {
  documentId?: string;
  documentType: DocumentType;
  fields: DocumentFields;
  lineItems: LineItem[];
}

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

export function isFieldName(value: string): value is FieldName {
  return FIELD_NAMES.some((name) => name === value);
}
