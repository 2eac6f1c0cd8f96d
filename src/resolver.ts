import * as fs from "fs";
import * as path from "path";
import { InputNotFoundError } from "./errors.js";

const CANDIDATE_DIRS = ["assets", "src", "."];
const CANDIDATE_EXTENSIONS = ["jpg", "jpeg", "png", "svg"];

/** Conventional logo locations, searched in order when no input is given. */
export const SOURCE_CANDIDATES: readonly string[] = CANDIDATE_DIRS.flatMap((dir) =>
  CANDIDATE_EXTENSIONS.map((ext) => path.posix.join(dir, `logo.${ext}`))
);

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function resolveSourceImage(cwd: string, explicitPath?: string): string {
  if (explicitPath !== undefined && explicitPath.trim() !== "") {
    return path.resolve(cwd, explicitPath);
  }

  for (const candidate of SOURCE_CANDIDATES) {
    const candidatePath = path.resolve(cwd, candidate);
    if (isFile(candidatePath)) {
      return candidatePath;
    }
  }

  throw new InputNotFoundError(
    `No source image found. Looked for: ${SOURCE_CANDIDATES.join(", ")}`
  );
}
