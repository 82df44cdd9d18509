import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";

export const DEFAULT_STAMP_INCLUDE = ["**/*.js", "**/*.html"];
export const DEFAULT_STAMP_EXCLUDE = ["node_modules/**", "cypress/**"];

export type StampResult = {
  /** Files rewritten, relative to the root, sorted. */
  files: string[];
  replacements: number;
};

function listFiles(root: string, exclude: readonly string[], rel = ""): string[] {
  const out: string[] = [];
  for (const entry of fs.readdirSync(path.join(root, rel), { withFileTypes: true })) {
    const child = rel ? `${rel}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (entry.name === ".git") continue;
      // Excluded trees are never entered.
      if (exclude.some((p) => minimatch(`${child}/x`, p, { dot: true }))) continue;
      out.push(...listFiles(root, exclude, child));
    } else if (entry.isFile()) {
      out.push(child);
    }
  }
  return out;
}

/** Count of literal occurrences of `token` in `text`. */
export function countOccurrences(text: string, token: string): number {
  if (!token) return 0;
  return text.split(token).length - 1;
}

/**
 * Replace each placeholder with its value in every matching file under `root`.
 * Literal and global; files without a placeholder are left untouched.
 */
export function stampVersions(opts: {
  root: string;
  tokens: Record<string, string>;
  include?: readonly string[];
  exclude?: readonly string[];
}): StampResult {
  const include = opts.include ?? DEFAULT_STAMP_INCLUDE;
  const exclude = opts.exclude ?? DEFAULT_STAMP_EXCLUDE;
  const entries = Object.entries(opts.tokens).filter(([token]) => token.length > 0);

  const result: StampResult = { files: [], replacements: 0 };

  for (const rel of listFiles(opts.root, exclude).sort()) {
    if (!include.some((p) => minimatch(rel, p, { dot: true }))) continue;
    if (exclude.some((p) => minimatch(rel, p, { dot: true }))) continue;

    const file = path.join(opts.root, rel);
    const before = fs.readFileSync(file, "utf8");
    let after = before;
    let count = 0;
    for (const [token, value] of entries) {
      const n = countOccurrences(after, token);
      if (n === 0) continue;
      count += n;
      after = after.split(token).join(value);
    }
    if (count === 0) continue;

    fs.writeFileSync(file, after, "utf8");
    result.files.push(rel);
    result.replacements += count;
  }

  return result;
}
