import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import { BridgeError, describeUnknownError } from "../errors/index.js";
import type { ImageMediaType, ImagePayload } from "./types.js";

const EXTENSION_TYPES: Record<string, ImageMediaType> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

export function sniffImageType(bytes: Uint8Array, filePath = ""): ImageMediaType | null {
  if (bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) return "image/png";
  if (bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return "image/jpeg";
  if (bytes[0] === 0x47 && bytes[1] === 0x49 && bytes[2] === 0x46) return "image/gif";
  const header = Buffer.from(bytes.subarray(0, 12)).toString("latin1");
  if (header.startsWith("RIFF") && header.slice(8, 12) === "WEBP") return "image/webp";
  return EXTENSION_TYPES[path.extname(filePath).toLowerCase()] ?? null;
}

const START_QUALITY = 85;
const MIN_QUALITY = 5;
const QUALITY_STEP = 5;
const SCALE_STEP = 0.9;
const MIN_SCALE = 0.1;

function encodeJpeg(bytes: Buffer, quality: number, width?: number): Promise<Buffer> {
  let pipeline = sharp(bytes).rotate().flatten({ background: "#ffffff" });
  if (width !== undefined) pipeline = pipeline.resize({ width: Math.max(1, width) });
  return pipeline.jpeg({ quality }).toBuffer();
}

/**
 * Re-encodes an image as JPEG, lowering quality in steps and then shrinking
 * the width by 10% at a time. Returns null when nothing fits in `maxBytes`.
 */
export async function compressImage(bytes: Buffer, maxBytes: number): Promise<Buffer | null> {
  let quality = START_QUALITY;
  let output = await encodeJpeg(bytes, quality);
  while (output.length > maxBytes && quality > MIN_QUALITY) {
    quality -= QUALITY_STEP;
    output = await encodeJpeg(bytes, quality);
  }

  // Width of the upright image, after EXIF rotation.
  const { width } = await sharp(output).metadata();
  let scale = SCALE_STEP;
  while (output.length > maxBytes && width !== undefined && scale > MIN_SCALE) {
    output = await encodeJpeg(bytes, quality, Math.round(width * scale));
    scale *= SCALE_STEP;
  }
  return output.length <= maxBytes ? output : null;
}

export async function loadImagePayload(filePath: string, maxBytes: number): Promise<ImagePayload> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    throw new BridgeError({
      code: "TRANSPORT",
      retryable: true,
      message: `Image ${filePath} is unreadable: ${describeUnknownError(error)}`,
      cause: error,
    });
  }
  if (bytes.length === 0) {
    throw new BridgeError({ code: "MALFORMED_INPUT", message: `Image ${filePath} is empty` });
  }
  if (bytes.length > maxBytes) {
    let compressed: Buffer | null;
    try {
      compressed = await compressImage(bytes, maxBytes);
    } catch (error) {
      throw new BridgeError({
        code: "MALFORMED_INPUT",
        message: `Image is ${bytes.length} bytes, limit is ${maxBytes}, and it could not be compressed: ${describeUnknownError(error)}`,
        cause: error,
      });
    }
    if (!compressed) {
      throw new BridgeError({
        code: "MALFORMED_INPUT",
        message: `Image is ${bytes.length} bytes, still over the ${maxBytes} byte limit after compression`,
      });
    }
    return { mediaType: "image/jpeg", base64: compressed.toString("base64") };
  }
  const mediaType = sniffImageType(bytes, filePath);
  if (!mediaType) {
    throw new BridgeError({ code: "MALFORMED_INPUT", message: `Unsupported image format: ${filePath}` });
  }
  return { mediaType, base64: bytes.toString("base64") };
}
