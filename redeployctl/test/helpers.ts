import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { simpleGit, type SimpleGit } from "simple-git";
import type { RedeployConfig } from "../src/types/config.js";

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `redeployctl-${prefix}-`));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(root, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, "utf8");
  }
}

export async function commitFiles(git: SimpleGit, dir: string, files: Record<string, string>, message: string): Promise<void> {
  writeFiles(dir, files);
  await git.add(".");
  await git.commit(message);
}

/** Local repository on branch `main` with one commit; serves as a clone source. */
export async function createOrigin(dir: string, files: Record<string, string>, message = "Initial import"): Promise<SimpleGit> {
  fs.mkdirSync(dir, { recursive: true });
  const git = simpleGit(dir);
  await git.init();
  await git.checkoutLocalBranch("main");
  await git.addConfig("user.name", "Test Author");
  await git.addConfig("user.email", "author@example.test");
  await git.addConfig("commit.gpgsign", "false");
  await git.addConfig("tag.gpgsign", "false");
  await commitFiles(git, dir, files, message);
  return git;
}

export async function shortHead(git: SimpleGit): Promise<string> {
  return (await git.revparse(["--short", "HEAD"])).trim();
}

export function testConfig(overrides: Partial<RedeployConfig> = {}): RedeployConfig {
  return {
    schema_version: "1.0.0",
    root_dir: ".",
    build_dir: "webapp/vicav-app",
    only_tags: false,
    runs_dir: ".redeploy/runs",
    lock_file: ".redeploy/redeploy.lock",
    repositories: [
      { name: "vicav-app", path: "${build_dir}", role: "webapp" },
      { name: "wibarab-data", path: "wibarab-data", role: "data" },
    ],
    assets: { repository: "wibarab-data", dataset_pattern: "vicav_*", extensions: ["png", "jpg"], destination: "images" },
    stamp: {
      include: ["**/*.html", "**/*.js"],
      exclude: ["node_modules/**"],
      tokens: { "@version@": "vicav-app", "@data-version@": "wibarab-data" },
    },
    provenance: { repository: "wibarab-data", include: ["vicav_*/**/*.xml"], header_element: "teiHeader" },
    batch: { command: "./execute-basex-batch.sh", timeout_s: 60, scripts: [{ name: "deploy-content", file: "deploy.bxs" }] },
    timeouts: { git_s: 60, stage_s: 60 },
    ...overrides,
  };
}
