import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { hasAllowedExtension, listDatasets, propagateAssets } from "../src/assets/propagator.js";
import { DeployError } from "../src/core/errors.js";
import { silentReporter } from "../src/log/reporter.js";
import { tmpDir, writeFiles } from "./helpers.js";

describe("asset propagator", () => {
  let root: string;
  let repo: string;
  let dest: string;

  beforeEach(() => {
    root = tmpDir("assets");
    repo = path.join(root, "wibarab-data");
    dest = path.join(root, "webapp", "images");
    fs.mkdirSync(dest, { recursive: true });
    writeFiles(repo, {
      "vicav_dict/img/a.png": "png-a",
      "vicav_dict/b.JPG": "jpg-b",
      "vicav_dict/c.jpeg": "jpeg-c",
      "vicav_dict/entries.xml": "<entry/>",
      "vicav_texts/deep/nested/d.svg": "<svg/>",
      "other/e.png": "png-e",
      "vicav_file.png": "not a dataset",
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("lists matching dataset directories", () => {
    expect(listDatasets(repo, "vicav_*")).toEqual(["vicav_dict", "vicav_texts"]);
  });

  it("copies media from all dataset directories into one flat directory", () => {
    const res = propagateAssets({ repoPath: repo, datasetPattern: "vicav_*", destination: dest, reporter: silentReporter() });

    expect(res.datasets).toEqual(["vicav_dict", "vicav_texts"]);
    expect(res.failures).toEqual([]);
    expect(fs.readdirSync(dest).sort()).toEqual(["a.png", "b.JPG", "d.svg"]);
    expect(fs.readFileSync(path.join(dest, "a.png"), "utf8")).toBe("png-a");
  });

  it("honours the configured extensions exactly", () => {
    const res = propagateAssets({
      repoPath: repo,
      datasetPattern: "vicav_*",
      extensions: ["jpg", "jpeg"],
      destination: dest,
      reporter: silentReporter(),
    });
    expect(res.copied.map((c) => path.basename(c.destination))).toEqual(["c.jpeg"]);
  });

  it("overwrites files of the same name", () => {
    fs.writeFileSync(path.join(dest, "a.png"), "stale", "utf8");
    propagateAssets({ repoPath: repo, datasetPattern: "vicav_*", destination: dest, reporter: silentReporter() });
    expect(fs.readFileSync(path.join(dest, "a.png"), "utf8")).toBe("png-a");
  });

  it("reports a failing file and continues with the rest", () => {
    fs.mkdirSync(path.join(dest, "a.png"));
    const reporter = silentReporter();
    const res = propagateAssets({ repoPath: repo, datasetPattern: "vicav_*", destination: dest, reporter });

    expect(res.failures.map((f) => f.source)).toEqual([path.join(repo, "vicav_dict", "img", "a.png")]);
    expect(res.copied.map((c) => path.basename(c.destination)).sort()).toEqual(["b.JPG", "d.svg"]);
    expect(reporter.diagnostics().filter((d) => d.code === "ASSET_COPY_FAILED")).toHaveLength(1);
  });

  it("fails when the destination does not exist", () => {
    fs.rmSync(dest, { recursive: true });
    let caught: unknown;
    try {
      propagateAssets({ repoPath: repo, datasetPattern: "vicav_*", destination: dest, reporter: silentReporter() });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(DeployError);
    expect(caught).toMatchObject({ kind: "configuration", code: "ASSET_DEST_MISSING" });
  });

  it("matches extensions case-sensitively", () => {
    expect(hasAllowedExtension("x.PNG", ["png"])).toBe(false);
    expect(hasAllowedExtension("x.PNG", ["png", "PNG"])).toBe(true);
    expect(hasAllowedExtension("README", ["png"])).toBe(false);
  });
});
