import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "./errors.js";
import { isDisplayMode, isHexColor } from "./manifest.js";
import { isRecord } from "./shared.js";
import type { DisplayMode } from "./types.js";

export const CONFIG_FILE = "favikit.config.json";
export const PACKAGE_JSON_KEY = "favikit";

export interface FavikitConfig {
  output?: string;
  name?: string;
  shortName?: string;
  themeColor?: string;
  backgroundColor?: string;
  display?: DisplayMode;
  faviconSizes?: number[];
  platformSizes?: number[];
  touchIconSize?: number;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface LoadedConfig {
  config: FavikitConfig;
  sourcePath: string | null;
}

const ALLOWED_KEYS = new Set([
  "output",
  "name",
  "shortName",
  "themeColor",
  "backgroundColor",
  "display",
  "faviconSizes",
  "platformSizes",
  "touchIconSize",
  "json",
  "verbose",
  "quiet",
]);

function parseString(
  value: unknown,
  key: keyof FavikitConfig,
  sourcePath: string
): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected string.`);
  }
  return value;
}

function parseColor(
  value: unknown,
  key: "themeColor" | "backgroundColor",
  sourcePath: string
): string | undefined {
  const parsed = parseString(value, key, sourcePath);
  if (parsed !== undefined && !isHexColor(parsed)) {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected a hex color like #1a2b3c.`);
  }
  return parsed;
}

function parseDisplay(value: unknown, sourcePath: string): DisplayMode | undefined {
  const parsed = parseString(value, "display", sourcePath);
  if (parsed === undefined) return undefined;
  if (!isDisplayMode(parsed)) {
    throw new ConfigError(
      `Invalid "display" in ${sourcePath}: expected fullscreen, standalone, minimal-ui or browser.`
    );
  }
  return parsed;
}

function parseInteger(
  value: unknown,
  key: keyof FavikitConfig,
  sourcePath: string
): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected integer.`);
  }
  return value;
}

function parseBoolean(
  value: unknown,
  key: keyof FavikitConfig,
  sourcePath: string
): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected boolean.`);
  }
  return value;
}

function parseSizes(
  value: unknown,
  key: "faviconSizes" | "platformSizes",
  sourcePath: string
): number[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected number array.`);
  }
  if (value.length === 0) {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: must include at least one size.`);
  }

  const parsed: number[] = [];
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== "number" || !Number.isInteger(entry)) {
      throw new ConfigError(
        `Invalid "${key}" in ${sourcePath}: expected integer at index ${index.toString()}.`
      );
    }
    parsed.push(entry);
  }
  return parsed;
}

function parseConfig(value: unknown, sourcePath: string): FavikitConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid config in ${sourcePath}: expected a JSON object.`);
  }

  for (const key of Object.keys(value)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigError(`Unknown config key "${key}" in ${sourcePath}.`);
    }
  }

  return {
    output: parseString(value.output, "output", sourcePath),
    name: parseString(value.name, "name", sourcePath),
    shortName: parseString(value.shortName, "shortName", sourcePath),
    themeColor: parseColor(value.themeColor, "themeColor", sourcePath),
    backgroundColor: parseColor(value.backgroundColor, "backgroundColor", sourcePath),
    display: parseDisplay(value.display, sourcePath),
    faviconSizes: parseSizes(value.faviconSizes, "faviconSizes", sourcePath),
    platformSizes: parseSizes(value.platformSizes, "platformSizes", sourcePath),
    touchIconSize: parseInteger(value.touchIconSize, "touchIconSize", sourcePath),
    json: parseBoolean(value.json, "json", sourcePath),
    verbose: parseBoolean(value.verbose, "verbose", sourcePath),
    quiet: parseBoolean(value.quiet, "quiet", sourcePath),
  };
}

function readJsonFile(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : "unknown error";
    throw new ConfigError(`Failed to read config file ${filePath}: ${message}`);
  }
}

export function loadConfig(cwd: string, explicitConfigPath?: string): LoadedConfig {
  if (explicitConfigPath) {
    const configPath = path.resolve(cwd, explicitConfigPath);
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return {
      config: parseConfig(readJsonFile(configPath), configPath),
      sourcePath: configPath,
    };
  }

  const configJsonPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(configJsonPath)) {
    return {
      config: parseConfig(readJsonFile(configJsonPath), configJsonPath),
      sourcePath: configJsonPath,
    };
  }

  const packageJsonPath = path.join(cwd, "package.json");
  if (fs.existsSync(packageJsonPath)) {
    const packageJson = readJsonFile(packageJsonPath);
    if (isRecord(packageJson) && packageJson[PACKAGE_JSON_KEY] !== undefined) {
      const sourcePath = `${packageJsonPath}#${PACKAGE_JSON_KEY}`;
      return {
        config: parseConfig(packageJson[PACKAGE_JSON_KEY], sourcePath),
        sourcePath,
      };
    }
  }

  return {
    config: {},
    sourcePath: null,
  };
}
