import * as path from "path";
import { promises as fsp } from "fs";
import { WriteError } from "./errors.js";
import { errorMessage } from "./shared.js";
import { DEFAULT_SIZE_SET } from "./sizes.js";
import type { DisplayMode, WebManifest, WebManifestOptions } from "./types.js";

export const WEB_MANIFEST_FILE = "site.webmanifest";

export const DISPLAY_MODES: readonly DisplayMode[] = [
  "fullscreen",
  "standalone",
  "minimal-ui",
  "browser",
];

export const DEFAULT_WEB_MANIFEST_OPTIONS: Readonly<WebManifestOptions> = Object.freeze({
  name: "Circus Tactics",
  shortName: "CircusTactics",
  themeColor: "#39ff14",
  backgroundColor: "#111111",
  display: "standalone",
});

export function isDisplayMode(value: string): value is DisplayMode {
  return DISPLAY_MODES.some((mode) => mode === value);
}

export function isHexColor(value: string): boolean {
  return /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/iu.test(value);
}

export function platformIconFile(size: number): string {
  return `android-chrome-${size.toString()}x${size.toString()}.png`;
}

// Icon sources are root-relative: the output directory is served as the web root.
export function buildWebManifest(
  options: WebManifestOptions = DEFAULT_WEB_MANIFEST_OPTIONS,
  platformSizes: readonly number[] = DEFAULT_SIZE_SET.platformSizes
): WebManifest {
  return {
    name: options.name,
    short_name: options.shortName,
    icons: platformSizes.map((size) => ({
      src: `/${platformIconFile(size)}`,
      sizes: `${size.toString()}x${size.toString()}`,
      type: "image/png",
    })),
    theme_color: options.themeColor,
    background_color: options.backgroundColor,
    display: options.display,
  };
}

export async function emitWebManifest(
  outputDir: string,
  options: WebManifestOptions = DEFAULT_WEB_MANIFEST_OPTIONS,
  platformSizes: readonly number[] = DEFAULT_SIZE_SET.platformSizes
): Promise<{ path: string; manifest: WebManifest; size: number }> {
  const manifest = buildWebManifest(options, platformSizes);
  const manifestPath = path.join(outputDir, WEB_MANIFEST_FILE);
  const contents = JSON.stringify(manifest, null, 2);
  try {
    await fsp.writeFile(manifestPath, contents);
  } catch (err) {
    throw new WriteError(`Failed to write ${manifestPath}: ${errorMessage(err)}`, err);
  }
  return { path: manifestPath, manifest, size: Buffer.byteLength(contents) };
}
