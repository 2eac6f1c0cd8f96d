export type DisplayMode = "fullscreen" | "standalone" | "minimal-ui" | "browser";

export interface WebManifestIcon {
  src: string;
  sizes: string;
  type: "image/png";
}

export interface WebManifest {
  name: string;
  short_name: string;
  icons: WebManifestIcon[];
  theme_color: string;
  background_color: string;
  display: DisplayMode;
}

export interface WebManifestOptions {
  name: string;
  shortName: string;
  themeColor: string;
  backgroundColor: string;
  display: DisplayMode;
}

export type AssetKind = "favicon" | "icon" | "touch-icon" | "platform" | "manifest";

export interface GeneratedAsset {
  file: string;
  kind: AssetKind;
  width: number;
  height: number;
  size: number;
}

export interface SourceInfo {
  width: number;
  height: number;
  format: string;
  hadAlpha: boolean;
}

export interface GenerationResult {
  inputPath: string;
  outputDir: string;
  source: SourceInfo;
  assets: GeneratedAsset[];
}
