import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import pino from "pino";
import { createWorker, OEM, PSM } from "tesseract.js";
import { env } from "../../config/env.js";
import type { OcrBackend, OcrRecognition, PageSegMode, RecognizeConfig } from "../../types/ocr.js";

const logger = pino({ name: "local-tesseract", level: env.LOG_LEVEL });
const resolveFromHere = createRequire(import.meta.url).resolve;

const PAGE_SEG_MODES: Record<PageSegMode, PSM> = {
  auto: PSM.AUTO,
  single_block: PSM.SINGLE_BLOCK,
  single_line: PSM.SINGLE_LINE,
  single_word: PSM.SINGLE_WORD,
  sparse_text: PSM.SPARSE_TEXT
};

/**
 * Directory of the LSTM traineddata published as `@tesseract.js-data/<lang>`,
 * or undefined when that package is not installed.
 */
export function bundledLangPath(lang: string): string | undefined {
  try {
    return join(dirname(resolveFromHere(`@tesseract.js-data/${lang}/package.json`)), "4.0.0_best_int");
  } catch (error) {
    logger.warn({ err: error, lang }, "No bundled traineddata; tesseract.js will fetch it on first use");
    return undefined;
  }
}

export interface LocalTesseractOptions {
  lang: string;
  /** Directory or URL holding gzipped traineddata. */
  langPath?: string;
}

/**
 * Local OCR backed by Tesseract.js. One worker per call; failures reject
 * so the strategy selector can decide what an empty page means.
 */
export class LocalTesseractAdapter implements OcrBackend {
  constructor(
    private readonly options: LocalTesseractOptions = {
      lang: env.TESSERACT_LANG,
      langPath: env.TESSERACT_LANG_PATH ?? bundledLangPath(env.TESSERACT_LANG)
    }
  ) {}

  async recognize(image: Buffer, config: RecognizeConfig = {}): Promise<OcrRecognition> {
    let workerError: Error | null = null;
    const worker = await createWorker(this.options.lang, OEM.LSTM_ONLY, {
      ...(this.options.langPath ? { langPath: this.options.langPath } : {}),
      errorHandler: (error) => {
        workerError = error instanceof Error ? error : new Error(String(error));
      }
    });

    try {
      await worker.setParameters({
        tessedit_pageseg_mode: PAGE_SEG_MODES[config.pageSegMode ?? "auto"],
        ...(config.charWhitelist ? { tessedit_char_whitelist: config.charWhitelist } : {})
      });
      const result = await worker.recognize(image);

      if (workerError) {
        throw workerError;
      }

      return {
        text: result.data.text ?? "",
        confidence: Math.max(0, Math.min(1, result.data.confidence / 100))
      };
    } finally {
      await worker.terminate();
    }
  }
}
