import { Command } from "commander";
import chalk from "chalk";
import * as fs from "fs";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_WEB_MANIFEST_OPTIONS, isDisplayMode, isHexColor } from "./manifest.js";
import { DEFAULT_OUTPUT_DIR, runFavicons } from "./runner.js";
import type { RunnerError, RunOptions } from "./runner.js";
import { isRecord } from "./shared.js";
import { resolveSizeSet } from "./sizes.js";
import type { DisplayMode } from "./types.js";

export interface CliFlags {
  config?: string;
  name?: string;
  shortName?: string;
  themeColor?: string;
  backgroundColor?: string;
  display?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/** Printed under `--json` when options cannot be resolved and no run starts. */
export interface ConfigFailureReport {
  version: string;
  errors: RunnerError[];
}

export interface ProgramOptions {
  cwd?: string;
  onExit?: (exitCode: number) => void;
}

function readPackageVersion(): string {
  const packageJsonPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
  if (isRecord(parsed) && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "0.0.0";
}

function pickColor(
  flag: string | undefined,
  configured: string | undefined,
  fallback: string,
  label: string
): string {
  const value = flag ?? configured ?? fallback;
  if (!isHexColor(value)) {
    throw new ConfigError(`Invalid ${label}: "${value}". Expected a hex color like #1a2b3c.`);
  }
  return value;
}

function pickDisplay(flag: string | undefined, configured: DisplayMode | undefined): DisplayMode {
  const value = flag ?? configured ?? DEFAULT_WEB_MANIFEST_OPTIONS.display;
  if (!isDisplayMode(value)) {
    throw new ConfigError(
      `Invalid display: "${value}". Use fullscreen, standalone, minimal-ui or browser.`
    );
  }
  return value;
}

export function buildRunOptions(
  cwd: string,
  version: string,
  input: string | undefined,
  output: string | undefined,
  flags: CliFlags
): RunOptions {
  const { config } = loadConfig(cwd, flags.config);

  return {
    version,
    cwd,
    input: input ?? null,
    outputDir: output ?? config.output ?? DEFAULT_OUTPUT_DIR,
    sizes: resolveSizeSet({
      faviconSizes: config.faviconSizes,
      platformSizes: config.platformSizes,
      touchIconSize: config.touchIconSize,
    }),
    webManifest: {
      name: flags.name ?? config.name ?? DEFAULT_WEB_MANIFEST_OPTIONS.name,
      shortName: flags.shortName ?? config.shortName ?? DEFAULT_WEB_MANIFEST_OPTIONS.shortName,
      themeColor: pickColor(
        flags.themeColor,
        config.themeColor,
        DEFAULT_WEB_MANIFEST_OPTIONS.themeColor,
        "theme color"
      ),
      backgroundColor: pickColor(
        flags.backgroundColor,
        config.backgroundColor,
        DEFAULT_WEB_MANIFEST_OPTIONS.backgroundColor,
        "background color"
      ),
      display: pickDisplay(flags.display, config.display),
    },
    json: flags.json ?? config.json ?? false,
    verbose: flags.verbose ?? config.verbose ?? false,
    quiet: flags.quiet ?? config.quiet ?? false,
  };
}

export function createProgram(programOptions: ProgramOptions = {}): Command {
  const cwd = programOptions.cwd ?? process.cwd();
  const onExit =
    programOptions.onExit ??
    ((exitCode: number) => {
      process.exitCode = exitCode;
    });
  const version = readPackageVersion();

  const program = new Command();

  program
    .name("favikit")
    .description("Generate favicons, touch icons and a web manifest from one logo image")
    .version(version)
    .argument("[input]", "Source image (defaults to the first of assets/logo.*, src/logo.*, logo.*)")
    .argument("[output]", `Output directory (default: ${DEFAULT_OUTPUT_DIR})`)
    .option("-c, --config <path>", "Path to a favikit config file")
    .option("--name <name>", "Application name written to site.webmanifest")
    .option("--short-name <name>", "Short application name written to site.webmanifest")
    .option("--theme-color <hex>", "Theme color written to site.webmanifest")
    .option("--background-color <hex>", "Background color written to site.webmanifest")
    .option("--display <mode>", "Display mode: fullscreen, standalone, minimal-ui or browser")
    .option("--json", "Print a JSON report instead of human-readable output")
    .option("--quiet", "Only print errors and the final summary")
    .option("--verbose", "Print details about the source image")
    .action(async (input: string | undefined, output: string | undefined, flags: CliFlags) => {
      let runOptions: RunOptions;
      try {
        runOptions = buildRunOptions(cwd, version, input, output, flags);
      } catch (err) {
        if (err instanceof ConfigError) {
          if (flags.json) {
            const report: ConfigFailureReport = {
              version,
              errors: [{ code: "CONFIG_INVALID", message: err.message }],
            };
            console.log(JSON.stringify(report, null, 2));
          } else {
            console.error(chalk.red(`Error: ${err.message}`));
          }
          onExit(1);
          return;
        }
        throw err;
      }

      const result = await runFavicons(runOptions);
      if (runOptions.json) {
        console.log(JSON.stringify(result.report, null, 2));
      }
      onExit(result.exitCode);
    });

  return program;
}
