import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import type { Reporter } from "../log/reporter.js";

export const DEFAULT_EXTENSIONS = ["jpg", "JPG", "png", "PNG", "svg"];

export type AssetCopy = { source: string; destination: string };

export type AssetFailure = { source: string; error: string };

export type PropagateResult = {
  datasets: string[];
  copied: AssetCopy[];
  failures: AssetFailure[];
};

/** Top-level directories of `repoPath` whose name matches `pattern`, sorted. */
export function listDatasets(repoPath: string, pattern: string): string[] {
  return fs
    .readdirSync(repoPath, { withFileTypes: true })
    .filter((e) => e.isDirectory() && minimatch(e.name, pattern))
    .map((e) => e.name)
    .sort();
}

function* walkFiles(dir: string): Generator<string> {
  const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) yield* walkFiles(full);
    else if (entry.isFile()) yield full;
  }
}

/** Extension match is case-sensitive: `JPG` must be listed to be copied. */
export function hasAllowedExtension(file: string, extensions: readonly string[]): boolean {
  const ext = path.extname(file);
  return ext.length > 1 && extensions.includes(ext.slice(1));
}

/**
 * Copy media files from every dataset directory into one flat destination,
 * keeping file names and overwriting same-named files. A failing file is
 * reported and skipped.
 */
export function propagateAssets(opts: {
  repoPath: string;
  datasetPattern: string;
  extensions?: readonly string[];
  destination: string;
  reporter: Reporter;
}): PropagateResult {
  const extensions = opts.extensions ?? DEFAULT_EXTENSIONS;

  if (!fs.existsSync(opts.destination) || !fs.statSync(opts.destination).isDirectory()) {
    throw new ConfigurationError("ASSET_DEST_MISSING", `Asset destination directory not found: ${opts.destination}`);
  }
  if (!fs.existsSync(opts.repoPath)) {
    throw new ConfigurationError("ASSET_SOURCE_MISSING", `Asset source repository not found: ${opts.repoPath}`);
  }

  const result: PropagateResult = { datasets: listDatasets(opts.repoPath, opts.datasetPattern), copied: [], failures: [] };

  for (const dataset of result.datasets) {
    opts.reporter.info("ASSET_DATASET", `Directory ${dataset}:`, { stage: "assets" });
    for (const source of walkFiles(path.join(opts.repoPath, dataset))) {
      if (!hasAllowedExtension(source, extensions)) continue;
      const destination = path.join(opts.destination, path.basename(source));
      try {
        fs.copyFileSync(source, destination);
        result.copied.push({ source, destination });
      } catch (e) {
        const error = errorMessage(e);
        result.failures.push({ source, error });
        opts.reporter.warn("ASSET_COPY_FAILED", `cannot copy ${source}: ${error}`, { stage: "assets", path: source });
      }
    }
  }

  opts.reporter.info("ASSETS_COPIED", `copied ${result.copied.length} file(s) into ${opts.destination}`, {
    stage: "assets",
    details: { failures: result.failures.length },
  });
  return result;
}
