import { ConfigError } from "./errors.js";

export const MIN_SIZE = 1;
export const MAX_ICO_SIZE = 256;
export const MAX_PLATFORM_SIZE = 4096;

export interface AssetSizeSet {
  faviconSizes: readonly number[];
  platformSizes: readonly number[];
  touchIconSize: number;
}

export const DEFAULT_SIZE_SET: Readonly<AssetSizeSet> = Object.freeze({
  faviconSizes: Object.freeze([16, 32, 48, 64, 128, 256]),
  platformSizes: Object.freeze([192, 512]),
  touchIconSize: 180,
});

export function normalizeSizes(sizes: readonly number[]): number[] {
  return Array.from(new Set(sizes)).sort((left, right) => left - right);
}

function assertSize(size: number, max: number, label: string): void {
  if (!Number.isInteger(size) || size < MIN_SIZE || size > max) {
    throw new ConfigError(
      `Invalid ${label} size ${String(size)}: expected an integer between ${MIN_SIZE.toString()} and ${max.toString()}.`
    );
  }
}

function resolveSizeList(
  sizes: readonly number[] | undefined,
  fallback: readonly number[],
  max: number,
  label: string
): number[] {
  if (sizes === undefined) return [...fallback];
  if (sizes.length === 0) {
    throw new ConfigError(`Invalid ${label} sizes: must include at least one size.`);
  }
  for (const size of sizes) {
    assertSize(size, max, label);
  }
  return normalizeSizes(sizes);
}

/**
 * Merges size overrides over {@link DEFAULT_SIZE_SET}. Favicon sizes are capped
 * at 256 because an ICO directory entry stores each dimension in one byte.
 */
export function resolveSizeSet(overrides: Partial<AssetSizeSet> = {}): AssetSizeSet {
  const touchIconSize = overrides.touchIconSize ?? DEFAULT_SIZE_SET.touchIconSize;
  assertSize(touchIconSize, MAX_PLATFORM_SIZE, "touch icon");

  return {
    faviconSizes: resolveSizeList(
      overrides.faviconSizes,
      DEFAULT_SIZE_SET.faviconSizes,
      MAX_ICO_SIZE,
      "favicon"
    ),
    platformSizes: resolveSizeList(
      overrides.platformSizes,
      DEFAULT_SIZE_SET.platformSizes,
      MAX_PLATFORM_SIZE,
      "platform"
    ),
    touchIconSize,
  };
}

export function largestSize(sizes: AssetSizeSet): number {
  return Math.max(...sizes.faviconSizes, ...sizes.platformSizes, sizes.touchIconSize);
}
