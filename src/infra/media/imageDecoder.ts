import path from "node:path";
import sharp from "sharp";
import { MalformedContentError } from "../../domain/errors.js";

export const IMAGE_EXTENSIONS: readonly string[] = [".jpg", ".jpeg", ".png", ".gif", ".webp"];

export interface DecodedImage {
  /** Re-encoded PNG of the first frame, the format sent to the image model. */
  png: Buffer;
  width: number;
  height: number;
}

export function hasImageExtension(fileNameOrPath: string): boolean {
  return IMAGE_EXTENSIONS.includes(path.extname(fileNameOrPath).toLowerCase());
}

/**
 * Fully decodes the payload; a header that parses but pixel data that does
 * not is still rejected.
 */
export async function decodeImage(data: Buffer): Promise<DecodedImage> {
  if (data.length === 0) {
    throw new MalformedContentError("Invalid or corrupted image file: empty payload.");
  }

  try {
    const { data: png, info } = await sharp(data, { failOn: "error" })
      .png()
      .toBuffer({ resolveWithObject: true });

    return { png, width: info.width, height: info.height };
  } catch (error) {
    throw new MalformedContentError(
      `Invalid or corrupted image file: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}
