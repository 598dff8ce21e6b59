import sharp from "sharp";
import { decodeGray, encodeGray } from "./grayImage.js";
import { adaptiveThreshold, binarize, closeDarkStrokes } from "./pixelOps.js";
import type { ImageRegion } from "../../types/ocr.js";

export type VariantName =
  | "grayscale"
  | "high_contrast"
  | "adaptive_threshold"
  | "sharpened"
  | "morphological_close"
  | "scaled_up";

export interface ImageVariant {
  name: VariantName;
  image: Buffer;
}

export interface VariantGenerator {
  crop(image: Buffer, region: ImageRegion): Promise<Buffer>;
  variants(crop: Buffer): Promise<ImageVariant[]>;
}

export interface PixelBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** Converts a fractional region to a pixel box clamped inside the page. */
export function toPixelBox(region: ImageRegion, pageWidth: number, pageHeight: number): PixelBox {
  const left = Math.min(pageWidth - 1, Math.max(0, Math.round(region.left * pageWidth)));
  const top = Math.min(pageHeight - 1, Math.max(0, Math.round(region.top * pageHeight)));
  return {
    left,
    top,
    width: Math.max(1, Math.min(pageWidth - left, Math.round(region.width * pageWidth))),
    height: Math.max(1, Math.min(pageHeight - top, Math.round(region.height * pageHeight)))
  };
}

export class SharpVariantGenerator implements VariantGenerator {
  constructor(private readonly minWidth = 1000) {}

  async crop(image: Buffer, region: ImageRegion): Promise<Buffer> {
    const meta = await sharp(image).metadata();
    const width = meta.width ?? 0;
    const height = meta.height ?? 0;
    if (width === 0 || height === 0) {
      throw new Error("image_dimensions_unavailable");
    }
    return sharp(image).extract(toPixelBox(region, width, height)).png().toBuffer();
  }

  async variants(crop: Buffer): Promise<ImageVariant[]> {
    const gray = await decodeGray(crop);

    const [grayscale, highContrast, sharpened, adaptive, closed] = await Promise.all([
      sharp(crop).greyscale().png().toBuffer(),
      sharp(crop).greyscale().linear(2.5, -192).png().toBuffer(),
      sharp(crop).greyscale().sharpen({ sigma: 1.5 }).png().toBuffer(),
      encodeGray(adaptiveThreshold(gray)),
      encodeGray(closeDarkStrokes(binarize(gray)))
    ]);

    const variants: ImageVariant[] = [
      { name: "grayscale", image: grayscale },
      { name: "high_contrast", image: highContrast },
      { name: "adaptive_threshold", image: adaptive },
      { name: "sharpened", image: sharpened },
      { name: "morphological_close", image: closed }
    ];

    if (gray.width < this.minWidth) {
      variants.push({
        name: "scaled_up",
        image: await sharp(crop).greyscale().resize({ width: this.minWidth }).png().toBuffer()
      });
    }

    return variants;
  }
}
