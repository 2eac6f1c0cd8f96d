import sharp from "sharp";
import pngToIco from "png-to-ico";
import * as fs from "fs";
import { promises as fsp } from "fs";
import { DecodeError, InputNotFoundError, ProcessingError } from "./errors.js";
import { errorMessage, LIMIT_INPUT_PIXELS } from "./shared.js";
import { DEFAULT_SIZE_SET, largestSize } from "./sizes.js";

const DEFAULT_DENSITY = 72;
const MAX_SVG_DENSITY = 2400;

/** Decoded source pixels, always 8-bit sRGB with an alpha channel. */
export interface SourceBitmap {
  data: Buffer;
  width: number;
  height: number;
  channels: 4;
  format: string;
  hadAlpha: boolean;
}

export interface Rendition {
  size: number;
  png: Buffer;
}

function svgDensity(width: number, height: number, targetSize: number): number | undefined {
  const shortest = Math.min(width, height);
  if (shortest <= 0 || shortest >= targetSize) return undefined;
  return Math.min(MAX_SVG_DENSITY, Math.ceil((DEFAULT_DENSITY * targetSize) / shortest));
}

/**
 * Reads and decodes the source image once, applying EXIF orientation and
 * normalizing it to RGBA. An existing alpha channel is kept as-is; a missing
 * one is added fully opaque.
 *
 * Vector sources are rasterized at a density where the shorter side covers
 * `maxTargetSize`, so the largest rendition is never upsampled from a small render.
 */
export async function decodeSource(
  inputPath: string,
  maxTargetSize = largestSize(DEFAULT_SIZE_SET)
): Promise<SourceBitmap> {
  if (!fs.existsSync(inputPath)) {
    throw new InputNotFoundError(`Input file not found: ${inputPath}`);
  }

  let buffer: Buffer;
  try {
    buffer = await fsp.readFile(inputPath);
  } catch (err) {
    throw new InputNotFoundError(`Input file not readable: ${inputPath} (${errorMessage(err)})`);
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(buffer, { limitInputPixels: LIMIT_INPUT_PIXELS }).metadata();
  } catch (err) {
    throw new DecodeError(`Failed to decode ${inputPath}: ${errorMessage(err)}`, err);
  }

  const format = metadata.format ?? "unknown";
  const density =
    format === "svg"
      ? svgDensity(metadata.width ?? 0, metadata.height ?? 0, maxTargetSize)
      : undefined;

  try {
    const { data, info } = await sharp(buffer, { limitInputPixels: LIMIT_INPUT_PIXELS, density })
      .rotate()
      .toColourspace("srgb")
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 4) {
      throw new Error(`expected 4 channels after normalization, got ${info.channels.toString()}`);
    }

    return {
      data,
      width: info.width,
      height: info.height,
      channels: 4,
      format,
      hadAlpha: metadata.hasAlpha === true,
    };
  } catch (err) {
    throw new DecodeError(`Failed to decode ${inputPath}: ${errorMessage(err)}`, err);
  }
}

export async function renderRendition(bitmap: SourceBitmap, size: number): Promise<Rendition> {
  try {
    const png = await sharp(bitmap.data, {
      raw: { width: bitmap.width, height: bitmap.height, channels: bitmap.channels },
    })
      .resize(size, size, { fit: "fill", kernel: sharp.kernel.lanczos3 })
      .png({ compressionLevel: 9, adaptiveFiltering: true })
      .toBuffer();
    return { size, png };
  } catch (err) {
    const label = `${size.toString()}x${size.toString()}`;
    throw new ProcessingError(`Failed to render ${label} rendition: ${errorMessage(err)}`, err);
  }
}

/**
 * Packs PNG renditions into one ICO container in the order given; the first
 * rendition becomes the primary frame.
 */
export async function packIcon(renditions: readonly Rendition[]): Promise<Buffer> {
  if (renditions.length === 0) {
    throw new ProcessingError("Cannot pack an icon without renditions.");
  }
  try {
    return await pngToIco(renditions.map((rendition) => rendition.png));
  } catch (err) {
    throw new ProcessingError(`Failed to pack favicon.ico: ${errorMessage(err)}`, err);
  }
}
