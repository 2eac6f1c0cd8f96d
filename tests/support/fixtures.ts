import * as fs from "fs";
import * as path from "path";
import sharp from "sharp";

export interface IcoFrame {
  width: number;
  height: number;
  bitCount: number;
  size: number;
  offset: number;
}

export interface IcoDirectory {
  type: number;
  frames: IcoFrame[];
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const BITMAPINFOHEADER_SIZE = 40;

export function readIcoDirectory(buffer: Buffer): IcoDirectory {
  const type = buffer.readUInt16LE(2);
  const count = buffer.readUInt16LE(4);
  const frames: IcoFrame[] = [];
  for (let index = 0; index < count; index += 1) {
    const base = 6 + index * 16;
    // A zero dimension byte means 256.
    frames.push({
      width: buffer.readUInt8(base) || 256,
      height: buffer.readUInt8(base + 1) || 256,
      bitCount: buffer.readUInt16LE(base + 6),
      size: buffer.readUInt32LE(base + 8),
      offset: buffer.readUInt32LE(base + 12),
    });
  }
  return { type, frames };
}

export function isIcoFramePayload(buffer: Buffer, frame: IcoFrame): boolean {
  if (frame.offset + frame.size > buffer.length) return false;
  const payload = buffer.subarray(frame.offset, frame.offset + frame.size);
  if (payload.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) return true;
  return payload.length >= BITMAPINFOHEADER_SIZE && payload.readUInt32LE(0) === BITMAPINFOHEADER_SIZE;
}

export async function createPng(
  filePath: string,
  width: number,
  height: number,
  background: { r: number; g: number; b: number }
) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await sharp({
    create: {
      width,
      height,
      channels: 3,
      background,
    },
  })
    .png()
    .toFile(filePath);
}

export async function createTranslucentPng(
  filePath: string,
  width: number,
  height: number,
  alpha: number
) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const raw = Buffer.alloc(width * height * 4);
  for (let offset = 0; offset < raw.length; offset += 4) {
    raw[offset] = 200;
    raw[offset + 1] = 40;
    raw[offset + 2] = 90;
    raw[offset + 3] = alpha;
  }
  await sharp(raw, { raw: { width, height, channels: 4 } })
    .png()
    .toFile(filePath);
}

export async function createJpeg(
  filePath: string,
  width: number,
  height: number,
  background: { r: number; g: number; b: number }
) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await sharp({
    create: {
      width,
      height,
      channels: 3,
      background,
    },
  })
    .jpeg({ quality: 90 })
    .toFile(filePath);
}

export function createSvg(filePath: string, size: number) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const dimension = size.toString();
  fs.writeFileSync(
    filePath,
    `<svg xmlns="http://www.w3.org/2000/svg" width="${dimension}" height="${dimension}" viewBox="0 0 ${dimension} ${dimension}"><rect width="${dimension}" height="${dimension}" fill="#39ff14"/></svg>`
  );
}

export async function readDimensions(
  filePath: string
): Promise<{ width: number; height: number; channels: number; hasAlpha: boolean }> {
  const metadata = await sharp(filePath).metadata();
  return {
    width: metadata.width ?? 0,
    height: metadata.height ?? 0,
    channels: metadata.channels ?? 0,
    hasAlpha: metadata.hasAlpha === true,
  };
}

export interface IcoFramePixels {
  width: number;
  height: number;
  /** RGBA of every pixel, top row first. */
  rgba: Buffer;
}

/**
 * Decodes one ICO frame. PNG payloads go through sharp; BMP payloads must be
 * 32-bit BGRA rows stored bottom-up after a BITMAPINFOHEADER, with the
 * header height doubled to account for the AND mask.
 */
export async function decodeIcoFrame(buffer: Buffer, frame: IcoFrame): Promise<IcoFramePixels> {
  const payload = buffer.subarray(frame.offset, frame.offset + frame.size);
  if (payload.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    const { data, info } = await sharp(payload)
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, rgba: data };
  }

  const width = payload.readInt32LE(4);
  const height = payload.readInt32LE(8) / 2;
  const bitCount = payload.readUInt16LE(14);
  if (bitCount !== 32) {
    throw new Error(`unsupported ICO bitmap depth ${bitCount.toString()}`);
  }
  const rowBytes = width * 4;
  const pixelsEnd = BITMAPINFOHEADER_SIZE + rowBytes * height;
  if (pixelsEnd > payload.length) {
    throw new Error("ICO bitmap payload is truncated");
  }

  const rgba = Buffer.alloc(width * height * 4);
  for (let row = 0; row < height; row += 1) {
    const sourceRow = BITMAPINFOHEADER_SIZE + (height - 1 - row) * rowBytes;
    for (let column = 0; column < width; column += 1) {
      const source = sourceRow + column * 4;
      const target = (row * width + column) * 4;
      rgba[target] = payload[source + 2];
      rgba[target + 1] = payload[source + 1];
      rgba[target + 2] = payload[source];
      rgba[target + 3] = payload[source + 3];
    }
  }
  return { width, height, rgba };
}

export async function createWebp(
  filePath: string,
  width: number,
  height: number,
  background: { r: number; g: number; b: number }
) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await sharp({
    create: {
      width,
      height,
      channels: 3,
      background,
    },
  })
    .webp({ lossless: true })
    .toFile(filePath);
}

export async function createGif(
  filePath: string,
  width: number,
  height: number,
  background: { r: number; g: number; b: number }
) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await sharp({
    create: {
      width,
      height,
      channels: 3,
      background,
    },
  })
    .gif()
    .toFile(filePath);
}
