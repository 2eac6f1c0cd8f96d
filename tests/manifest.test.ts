import { afterAll, beforeAll, describe, expect, it } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "node:url";
import { WriteError } from "../src/errors.js";
import {
  buildWebManifest,
  DEFAULT_WEB_MANIFEST_OPTIONS,
  emitWebManifest,
  isDisplayMode,
  isHexColor,
  platformIconFile,
} from "../src/manifest.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const OUTPUT = path.join(__dirname, "manifest-output");

const EXPECTED = {
  name: "Circus Tactics",
  short_name: "CircusTactics",
  icons: [
    { src: "/android-chrome-192x192.png", sizes: "192x192", type: "image/png" },
    { src: "/android-chrome-512x512.png", sizes: "512x512", type: "image/png" },
  ],
  theme_color: "#39ff14",
  background_color: "#111111",
  display: "standalone",
};

beforeAll(() => {
  fs.rmSync(OUTPUT, { recursive: true, force: true });
  fs.mkdirSync(OUTPUT, { recursive: true });
});

afterAll(() => {
  fs.rmSync(OUTPUT, { recursive: true, force: true });
});

describe("buildWebManifest", () => {
  it("builds the default manifest", () => {
    expect(buildWebManifest()).toEqual(EXPECTED);
  });

  it("keys appear in the documented order", () => {
    expect(Object.keys(buildWebManifest())).toEqual([
      "name",
      "short_name",
      "icons",
      "theme_color",
      "background_color",
      "display",
    ]);
  });

  it("uses root-relative icon sources for custom platform sizes", () => {
    const manifest = buildWebManifest(DEFAULT_WEB_MANIFEST_OPTIONS, [144, 384]);
    expect(manifest.icons).toEqual([
      { src: "/android-chrome-144x144.png", sizes: "144x144", type: "image/png" },
      { src: "/android-chrome-384x384.png", sizes: "384x384", type: "image/png" },
    ]);
  });
});

describe("emitWebManifest", () => {
  it("writes site.webmanifest as indented JSON", async () => {
    const result = await emitWebManifest(OUTPUT);
    const raw = fs.readFileSync(path.join(OUTPUT, "site.webmanifest"), "utf-8");

    expect(result.path).toBe(path.join(OUTPUT, "site.webmanifest"));
    expect(raw).toBe(JSON.stringify(EXPECTED, null, 2));
    expect(result.size).toBe(Buffer.byteLength(raw));
    expect(raw.split("\n")[1]).toBe('  "name": "Circus Tactics",');
  });

  it("raises WriteError when the directory does not exist", async () => {
    await expect(emitWebManifest(path.join(OUTPUT, "absent"))).rejects.toBeInstanceOf(WriteError);
  });
});

describe("manifest helpers", () => {
  it("names platform icons", () => {
    expect(platformIconFile(192)).toBe("android-chrome-192x192.png");
  });

  it("accepts short and long hex colors only", () => {
    expect(isHexColor("#39ff14")).toBe(true);
    expect(isHexColor("#FFF")).toBe(true);
    expect(isHexColor("39ff14")).toBe(false);
    expect(isHexColor("#39ff1")).toBe(false);
    expect(isHexColor("red")).toBe(false);
  });

  it("recognizes display modes", () => {
    expect(isDisplayMode("standalone")).toBe(true);
    expect(isDisplayMode("minimal-ui")).toBe(true);
    expect(isDisplayMode("window")).toBe(false);
  });
});
