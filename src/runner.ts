import chalk from "chalk";
import * as path from "path";
import { FaviconError } from "./errors.js";
import type { FaviconErrorCode } from "./errors.js";
import { generateFavicons } from "./favicons.js";
import { buildWebManifest } from "./manifest.js";
import { resolveSourceImage } from "./resolver.js";
import { buildHeadSnippets, describeAsset, displayPath, formatSize } from "./runner/reporting.js";
import { errorMessage } from "./shared.js";
import type { AssetSizeSet } from "./sizes.js";
import type { GeneratedAsset, SourceInfo, WebManifest, WebManifestOptions } from "./types.js";

export const DEFAULT_OUTPUT_DIR = "./public";

export interface RunOptions {
  version: string;
  cwd: string;
  input: string | null;
  outputDir: string;
  sizes: AssetSizeSet;
  webManifest: WebManifestOptions;
  json: boolean;
  verbose: boolean;
  quiet: boolean;
}

export interface RunnerError {
  code: FaviconErrorCode | "CONFIG_INVALID";
  message: string;
}

export interface RunSummary {
  files: number;
  totalSize: number;
  durationMs: number;
}

export interface RunReport {
  version: string;
  inputPath: string | null;
  outputDir: string;
  options: {
    faviconSizes: number[];
    platformSizes: number[];
    touchIconSize: number;
    json: boolean;
    verbose: boolean;
    quiet: boolean;
  };
  source: SourceInfo | null;
  assets: GeneratedAsset[];
  webManifest: WebManifest | null;
  snippets: string[];
  summary: RunSummary;
  errors: RunnerError[];
}

export interface RunResult {
  exitCode: number;
  report: RunReport;
}

function createInitialReport(options: RunOptions, outputDir: string): RunReport {
  return {
    version: options.version,
    inputPath: null,
    outputDir,
    options: {
      faviconSizes: [...options.sizes.faviconSizes],
      platformSizes: [...options.sizes.platformSizes],
      touchIconSize: options.sizes.touchIconSize,
      json: options.json,
      verbose: options.verbose,
      quiet: options.quiet,
    },
    source: null,
    assets: [],
    webManifest: null,
    snippets: [],
    summary: {
      files: 0,
      totalSize: 0,
      durationMs: 0,
    },
    errors: [],
  };
}

function toRunnerError(err: unknown): RunnerError {
  if (err instanceof FaviconError) {
    return { code: err.code, message: err.message };
  }
  return { code: "PROCESSING_FAILED", message: errorMessage(err) };
}

/**
 * Resolves the source image, generates the bundle and prints progress plus
 * the `<head>` snippets. Every failure is caught here and turned into an
 * error entry with exit code 1; nothing is retried.
 */
export async function runFavicons(options: RunOptions): Promise<RunResult> {
  const startTime = Date.now();
  const outputDir = path.resolve(options.cwd, options.outputDir);
  const report = createInitialReport(options, outputDir);

  const printInfo = (message: string) => {
    if (!options.json) {
      console.log(message);
    }
  };

  const printError = (message: string) => {
    if (!options.json) {
      console.error(message);
    }
  };

  const printPerAsset = (message: string) => {
    if (options.json || options.quiet) return;
    console.log(message);
  };

  const fail = (err: unknown): RunResult => {
    const error = toRunnerError(err);
    report.errors.push(error);
    printError(chalk.red(`Error: ${error.message}`));
    report.summary.durationMs = Date.now() - startTime;
    return { exitCode: 1, report };
  };

  let inputPath: string;
  try {
    inputPath = resolveSourceImage(options.cwd, options.input ?? undefined);
  } catch (err) {
    return fail(err);
  }
  report.inputPath = inputPath;

  printInfo(chalk.bold(`\nfavikit v${options.version}\n`));
  printInfo(`Generating favicons from ${chalk.cyan(displayPath(inputPath, options.cwd))}`);
  printInfo(`Output directory: ${chalk.dim(displayPath(outputDir, options.cwd))}\n`);

  try {
    const result = await generateFavicons(inputPath, outputDir, {
      sizes: options.sizes,
      webManifest: options.webManifest,
      onAsset: (asset) => {
        printPerAsset(`  ${chalk.green("✓")} ${describeAsset(asset)}`);
      },
    });
    report.source = result.source;
    report.assets = result.assets;
  } catch (err) {
    return fail(err);
  }

  report.webManifest = buildWebManifest(options.webManifest, options.sizes.platformSizes);
  report.snippets = buildHeadSnippets(options.sizes);
  report.summary.files = report.assets.length;
  report.summary.totalSize = report.assets.reduce((sum, asset) => sum + asset.size, 0);
  report.summary.durationMs = Date.now() - startTime;

  if (options.verbose && report.source) {
    const { width, height, format, hadAlpha } = report.source;
    printInfo(
      chalk.dim(
        `\n  source: ${format} ${width.toString()}x${height.toString()}${hadAlpha ? " (alpha kept)" : " (opaque alpha added)"}`
      )
    );
  }

  const duration = (report.summary.durationMs / 1000).toFixed(1);
  printInfo(chalk.dim("\n" + "─".repeat(50)));
  printInfo(
    chalk.green(
      `\nGenerated ${report.summary.files.toString()} files (${formatSize(report.summary.totalSize)}) in ${duration}s`
    )
  );
  printInfo(`\nAdd these tags to your page ${chalk.cyan("<head>")}:\n`);
  for (const snippet of report.snippets) {
    printInfo(`  ${snippet}`);
  }
  printInfo("");

  return { exitCode: 0, report };
}
