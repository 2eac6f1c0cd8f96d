import { promises as fsp } from "fs";
import * as path from "path";
import { WriteError } from "./errors.js";
import {
  DEFAULT_WEB_MANIFEST_OPTIONS,
  emitWebManifest,
  platformIconFile,
  WEB_MANIFEST_FILE,
} from "./manifest.js";
import { decodeSource, packIcon, renderRendition } from "./processor.js";
import type { Rendition, SourceBitmap } from "./processor.js";
import { errorMessage } from "./shared.js";
import { DEFAULT_SIZE_SET, largestSize, resolveSizeSet } from "./sizes.js";
import type { AssetSizeSet } from "./sizes.js";
import type { AssetKind, GeneratedAsset, GenerationResult, WebManifestOptions } from "./types.js";

export const ICON_FILE = "favicon.ico";
export const TOUCH_ICON_FILE = "apple-touch-icon.png";

export interface GenerateOptions {
  sizes?: AssetSizeSet;
  webManifest?: WebManifestOptions;
  onAsset?: (asset: GeneratedAsset) => void;
}

export function faviconFile(size: number): string {
  return `favicon-${size.toString()}x${size.toString()}.png`;
}

/** Every file name a run writes for the given size set, in write order. */
export function expectedOutputFiles(sizes: AssetSizeSet = DEFAULT_SIZE_SET): string[] {
  return [
    ...sizes.faviconSizes.map(faviconFile),
    ICON_FILE,
    TOUCH_ICON_FILE,
    ...sizes.platformSizes.map(platformIconFile),
    WEB_MANIFEST_FILE,
  ];
}

async function writeAsset(outputDir: string, file: string, contents: Buffer): Promise<void> {
  const target = path.join(outputDir, file);
  try {
    await fsp.writeFile(target, contents);
  } catch (err) {
    throw new WriteError(`Failed to write ${target}: ${errorMessage(err)}`, err);
  }
}

/**
 * Turns one source image into the favicon bundle inside `outputDir`.
 *
 * Steps run strictly in order and the first failure aborts the run. The input
 * is checked and decoded before the output directory is created, so a missing
 * or undecodable source leaves no trace. Files written before a later failure
 * are left in place. Sizes are deduped and sorted first, so the smallest
 * favicon rendition is always the primary ICO frame.
 */
export async function generateFavicons(
  inputPath: string,
  outputDir: string,
  options: GenerateOptions = {}
): Promise<GenerationResult> {
  const sizes = resolveSizeSet(options.sizes);
  const webManifest = options.webManifest ?? DEFAULT_WEB_MANIFEST_OPTIONS;
  const assets: GeneratedAsset[] = [];

  const bitmap: SourceBitmap = await decodeSource(inputPath, largestSize(sizes));

  try {
    await fsp.mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new WriteError(
      `Failed to create output directory ${outputDir}: ${errorMessage(err)}`,
      err
    );
  }

  const record = (file: string, kind: AssetKind, dimension: number, size: number) => {
    const asset: GeneratedAsset = { file, kind, width: dimension, height: dimension, size };
    assets.push(asset);
    options.onAsset?.(asset);
  };

  const emitPng = async (rendition: Rendition, file: string, kind: AssetKind) => {
    await writeAsset(outputDir, file, rendition.png);
    record(file, kind, rendition.size, rendition.png.length);
  };

  const iconFrames: Rendition[] = [];
  for (const size of sizes.faviconSizes) {
    const rendition = await renderRendition(bitmap, size);
    await emitPng(rendition, faviconFile(size), "favicon");
    iconFrames.push(rendition);
  }

  const icon = await packIcon(iconFrames);
  await writeAsset(outputDir, ICON_FILE, icon);
  record(ICON_FILE, "icon", iconFrames[0].size, icon.length);

  const touchIcon = await renderRendition(bitmap, sizes.touchIconSize);
  await emitPng(touchIcon, TOUCH_ICON_FILE, "touch-icon");

  for (const size of sizes.platformSizes) {
    const rendition = await renderRendition(bitmap, size);
    await emitPng(rendition, platformIconFile(size), "platform");
  }

  const manifest = await emitWebManifest(outputDir, webManifest, sizes.platformSizes);
  record(WEB_MANIFEST_FILE, "manifest", 0, manifest.size);

  return {
    inputPath,
    outputDir,
    source: {
      width: bitmap.width,
      height: bitmap.height,
      format: bitmap.format,
      hadAlpha: bitmap.hadAlpha,
    },
    assets,
  };
}
