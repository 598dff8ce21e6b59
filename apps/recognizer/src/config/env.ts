import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.string().default("info"),
  DATABASE_URL: z.string().default("postgres://recognizer:recognizer@db:5432/recognizer"),
  QUOTA_STORE: z.enum(["memory", "postgres"]).default("memory"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  GOOGLE_VISION_DAILY_LIMIT: z.coerce.number().int().nonnegative().default(200),
  GOOGLE_VISION_COST_UNITS: z.coerce.number().nonnegative().default(0.0015),
  AZURE_FORM_RECOGNIZER_ENDPOINT: z.string().url().optional(),
  AZURE_FORM_RECOGNIZER_KEY: z.string().optional(),
  AZURE_FORM_RECOGNIZER_MODEL: z.string().default("prebuilt-layout"),
  AZURE_FORM_RECOGNIZER_DAILY_LIMIT: z.coerce.number().int().nonnegative().default(100),
  AZURE_FORM_RECOGNIZER_COST_UNITS: z.coerce.number().nonnegative().default(0.01),
  TESSERACT_LANG: z.string().default("spa"),
  TESSERACT_LANG_PATH: z.string().optional(),
  TESSERACT_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  OCR_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  COMPLEXITY_SIMPLE_BELOW: z.coerce.number().min(0).max(1).default(0.3),
  COMPLEXITY_MEDIUM_BELOW: z.coerce.number().min(0).max(1).default(0.6),
  COMPLEXITY_SEVERE_FROM: z.coerce.number().min(0).max(1).default(0.8),
  CAE_MIN_YEAR: z.coerce.number().int().default(2000),
  CAE_MAX_YEAR: z.coerce.number().int().default(2035),
  RECONCILIATION_TOLERANCE: z.coerce.number().positive().default(0.01),
  RECOVERY_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.6)
});

export const env = envSchema.parse(process.env);
