import * as path from "path";
import { faviconFile, ICON_FILE, TOUCH_ICON_FILE } from "../favicons.js";
import { WEB_MANIFEST_FILE } from "../manifest.js";
import type { AssetSizeSet } from "../sizes.js";
import type { GeneratedAsset } from "../types.js";

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes.toString()}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

export function displayPath(targetPath: string, cwd = process.cwd()): string {
  const relative = path.relative(cwd, targetPath);
  if (relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative)) {
    return relative.split(path.sep).join("/");
  }
  return targetPath;
}

export function describeAsset(asset: GeneratedAsset): string {
  if (asset.kind === "manifest") {
    return `${asset.file} (${formatSize(asset.size)})`;
  }
  if (asset.kind === "icon") {
    return `${asset.file} (multi-size, ${formatSize(asset.size)})`;
  }
  return `${asset.file} (${asset.width.toString()}x${asset.height.toString()}, ${formatSize(asset.size)})`;
}

/**
 * `<link>` tags for a page head, pointing at the generated files from the
 * web root. The two smallest favicon PNGs are listed, larger first.
 */
export function buildHeadSnippets(sizes: AssetSizeSet): string[] {
  const pngSizes = [...sizes.faviconSizes]
    .sort((left, right) => left - right)
    .slice(0, 2)
    .reverse();
  const touch = `${sizes.touchIconSize.toString()}x${sizes.touchIconSize.toString()}`;

  return [
    `<link rel="icon" type="image/x-icon" href="/${ICON_FILE}">`,
    ...pngSizes.map(
      (size) =>
        `<link rel="icon" type="image/png" sizes="${size.toString()}x${size.toString()}" href="/${faviconFile(size)}">`
    ),
    `<link rel="apple-touch-icon" sizes="${touch}" href="/${TOUCH_ICON_FILE}">`,
    `<link rel="manifest" href="/${WEB_MANIFEST_FILE}">`,
  ];
}
