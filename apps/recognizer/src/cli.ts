#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { parseArgs } from "node:util";
import pino from "pino";
import { env } from "./config/env.js";
import { runStartupDependencyChecks } from "./services/startupDependencyChecks.js";
import { isDocumentType } from "./types/document.js";

const logger = pino({ name: "invoice-recognition", level: env.LOG_LEVEL });

const USAGE = "usage: recognize-invoice <image> [--type afip_invoice|invoice|receipt|form|generic] [--text file] [--id documentId]";

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      type: { type: "string", short: "t" },
      text: { type: "string" },
      id: { type: "string" },
      help: { type: "boolean", short: "h" }
    }
  });

  if (values.help || (positionals.length === 0 && !values.text)) {
    process.stdout.write(`${USAGE}\n`);
    process.exitCode = values.help ? 0 : 2;
    return;
  }
  if (values.type !== undefined && !isDocumentType(values.type)) {
    throw new Error(`unknown_document_type:${values.type}`);
  }

  await runStartupDependencyChecks(logger);
  // Loaded after the checks so a broken pattern library is reported as such.
  const { documentRecognitionService } = await import("./services/documentRecognitionService.js");

  const imagePath = positionals[0];
  const outcome = await documentRecognitionService.process({
    documentId: values.id ?? (imagePath ? basename(imagePath) : undefined),
    imagePath,
    rawText: values.text ? await readFile(values.text, "utf8") : undefined,
    documentType: values.type !== undefined && isDocumentType(values.type) ? values.type : undefined
  });

  process.stdout.write(`${JSON.stringify(outcome, null, 2)}\n`);
  process.exitCode = outcome.verdict.overallValid ? 0 : 1;
}

main().catch((error: unknown) => {
  logger.error({ err: error }, "Recognition failed");
  process.exitCode = 1;
});
