import sharp from "sharp";

/** Single-channel 8-bit raster, row-major. */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export async function decodeGray(image: Buffer): Promise<GrayImage> {
  const { data, info } = await sharp(image)
    .flatten({ background: "#ffffff" })
    .greyscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels === 1) {
    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  }

  const pixels = new Uint8Array(info.width * info.height);
  for (let index = 0; index < pixels.length; index += 1) {
    pixels[index] = data[index * info.channels];
  }
  return { width: info.width, height: info.height, data: pixels };
}

export async function encodeGray(image: GrayImage): Promise<Buffer> {
  return sharp(Buffer.from(image.data), {
    raw: { width: image.width, height: image.height, channels: 1 }
  })
    .png()
    .toBuffer();
}
