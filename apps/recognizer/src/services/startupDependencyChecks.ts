import { env } from "../config/env.js";
import type pino from "pino";

/**
 * Fail fast on missing runtime dependencies that the recognition pipeline always needs.
 */
export async function runStartupDependencyChecks(logger: pino.Logger): Promise<void> {
  await assertModule("sharp", logger, "Image decoding and preprocessing variants");
  await assertModule("tesseract.js", logger, "Local OCR engine");
  await assertModule("./fieldPatternLibrary.js", logger, "Field pattern library");

  if (!env.GOOGLE_APPLICATION_CREDENTIALS) {
    logger.warn("Google Cloud Vision credentials not configured; medium and complex pages will fall back to other providers");
  }
  if (!env.AZURE_FORM_RECOGNIZER_ENDPOINT || !env.AZURE_FORM_RECOGNIZER_KEY) {
    logger.warn(
      {
        endpointConfigured: Boolean(env.AZURE_FORM_RECOGNIZER_ENDPOINT),
        keyConfigured: Boolean(env.AZURE_FORM_RECOGNIZER_KEY)
      },
      "Azure Form Recognizer not configured; complex forms will fall back to other providers"
    );
  }
  if (env.QUOTA_STORE === "memory") {
    logger.info("Provider quotas are tracked in memory and reset when the process exits");
  }
}

async function assertModule(moduleName: string, logger: pino.Logger, feature: string): Promise<void> {
  try {
    await import(moduleName);
    logger.info({ moduleName, feature }, "Startup dependency check passed");
  } catch (error) {
    logger.fatal(
      {
        moduleName,
        feature,
        err: error
      },
      "Startup dependency check failed"
    );
    throw new Error(`missing_runtime_dependency:${moduleName}`);
  }
}
