import { GoogleAuth } from "google-auth-library";
import { z } from "zod";
import { env } from "../../config/env.js";
import { ProviderError, type OcrBackend, type OcrRecognition } from "../../types/ocr.js";

const visionResponseSchema = z.object({
  responses: z
    .array(
      z.object({
        fullTextAnnotation: z
          .object({
            text: z.string().optional(),
            pages: z.array(z.object({ confidence: z.number().optional() })).optional()
          })
          .optional(),
        textAnnotations: z.array(z.object({ description: z.string().optional() })).optional(),
        error: z.object({ message: z.string().optional() }).optional()
      })
    )
    .optional()
});

/**
 * Google Cloud Vision DOCUMENT_TEXT_DETECTION, authenticated with the
 * service account JSON named by GOOGLE_APPLICATION_CREDENTIALS.
 *
 * Docs: https://cloud.google.com/vision/docs/ocr
 */
export class GoogleCloudVisionAdapter implements OcrBackend {
  private readonly auth: GoogleAuth;

  constructor(private readonly credentialsPath: string | undefined = env.GOOGLE_APPLICATION_CREDENTIALS) {
    this.auth = new GoogleAuth({
      keyFilename: credentialsPath,
      scopes: ["https://www.googleapis.com/auth/cloud-platform"]
    });
  }

  isAvailable(): boolean {
    return Boolean(this.credentialsPath);
  }

  async recognize(image: Buffer): Promise<OcrRecognition> {
    if (!this.credentialsPath) {
      throw new ProviderError("google_cloud_vision", "not_configured", "provider_not_configured");
    }

    const client = await this.auth.getClient();
    const token = await client.getAccessToken();
    if (!token.token) {
      throw new ProviderError("google_cloud_vision", "unavailable", "Google Cloud Vision: failed to obtain access token");
    }

    const response = await fetch("https://vision.googleapis.com/v1/images:annotate", {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${token.token}`
      },
      body: JSON.stringify({
        requests: [
          {
            image: { content: image.toString("base64") },
            features: [{ type: "DOCUMENT_TEXT_DETECTION" }],
            imageContext: { languageHints: ["es"] }
          }
        ]
      })
    });

    if (!response.ok) {
      throw new ProviderError("google_cloud_vision", "failed", `Google Cloud Vision API error: HTTP ${response.status}`);
    }

    const result = visionResponseSchema.parse(await response.json()).responses?.[0];
    if (result?.error) {
      throw new ProviderError(
        "google_cloud_vision",
        "failed",
        `Google Cloud Vision API error: ${result.error.message ?? "unknown"}`
      );
    }

    const text = result?.fullTextAnnotation?.text ?? result?.textAnnotations?.[0]?.description ?? "";
    const pageConfidences = (result?.fullTextAnnotation?.pages ?? [])
      .map((page) => page.confidence)
      .filter((confidence): confidence is number => confidence !== undefined);

    let confidence = 0;
    if (text.trim().length > 0) {
      confidence =
        pageConfidences.length > 0
          ? pageConfidences.reduce((sum, value) => sum + value, 0) / pageConfidences.length
          : 0.95;
    }

    return { text, confidence };
  }
}
