import fs from "node:fs";
import path from "node:path";
import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { minimatch } from "minimatch";
import { errorMessage } from "../core/errors.js";
import type { Reporter } from "../log/reporter.js";
import type { ResolvedRevision } from "../types/revision.js";

/**
 * Ordered node as produced by fast-xml-parser with `preserveOrder`:
 * `{ tag: children[], ":@": { "@_attr": value } }` or `{ "#text": value }`.
 */
type OrderedNode = Record<string, unknown>;

const ATTRS = ":@";
const TEXT = "#text";

const XML_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: TEXT,
  commentPropName: "#comment",
  cdataPropName: "#cdata",
  processEntities: false,
  htmlEntities: false,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  allowBooleanAttributes: true,
  suppressEmptyNode: true,
  format: false,
} as const;

export type AnnotateResult =
  | { changed: true; xml: string }
  | { changed: false; reason: "no-header" | "already-recorded" };

function isNode(value: unknown): value is OrderedNode {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNodeList(value: unknown): value is OrderedNode[] {
  return Array.isArray(value) && value.every(isNode);
}

function tagOf(node: OrderedNode): string | undefined {
  return Object.keys(node).find((k) => k !== ATTRS);
}

function childrenOf(node: OrderedNode): OrderedNode[] | undefined {
  const tag = tagOf(node);
  if (!tag || tag === TEXT || tag.startsWith("#") || tag.startsWith("?")) return undefined;
  const children = node[tag];
  return isNodeList(children) ? children : undefined;
}

function attr(node: OrderedNode, name: string): string | undefined {
  const attrs = node[ATTRS];
  if (!isNode(attrs)) return undefined;
  const value = attrs[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function localName(tag: string): string {
  const i = tag.indexOf(":");
  return i === -1 ? tag : tag.slice(i + 1);
}

/** First element named `name` (any namespace prefix), depth-first in document order. */
function findElement(nodes: OrderedNode[], name: string): OrderedNode | undefined {
  for (const node of nodes) {
    const tag = tagOf(node);
    if (tag && localName(tag) === name) return node;
    const children = childrenOf(node);
    if (children) {
      const found = findElement(children, name);
      if (found) return found;
    }
  }
  return undefined;
}

export function escapeXmlText(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function escapeXmlAttr(s: string): string {
  return escapeXmlText(s).replace(/"/g, "&quot;");
}

/** `<change n=… who=… when=…>` node for a revision. */
export function buildChangeRecord(revision: ResolvedRevision): OrderedNode {
  return {
    change: [{ [TEXT]: `\n${escapeXmlText(revision.message)}\n   ` }],
    [ATTRS]: {
      "@_n": escapeXmlAttr(revision.revision),
      "@_who": escapeXmlAttr(revision.author),
      "@_when": escapeXmlAttr(revision.date),
    },
  };
}

/** End of a DOCTYPE declaration starting at `start`, internal subset included. */
function doctypeEnd(xml: string, start: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = start + 2; i < xml.length; i++) {
    const c = xml[i];
    if (quote) {
      if (c === quote) quote = null;
    } else if (c === '"' || c === "'") {
      quote = c;
    } else if (c === "[") {
      depth++;
    } else if (c === "]") {
      depth--;
    } else if (c === ">" && depth === 0) {
      return i + 1;
    }
  }
  return xml.length;
}

/**
 * Offset of the root element. Everything before it (declaration, processing
 * instructions, comments, DOCTYPE and the whitespace between them) is kept
 * verbatim; the parser would drop or reflow it.
 */
export function rootOffset(xml: string): number {
  let i = 0;
  for (;;) {
    while (i < xml.length && /\s/.test(xml[i])) i++;
    let end = -1;
    if (xml.startsWith("<?", i)) {
      const close = xml.indexOf("?>", i);
      end = close === -1 ? -1 : close + 2;
    } else if (xml.startsWith("<!--", i)) {
      const close = xml.indexOf("-->", i);
      end = close === -1 ? -1 : close + 3;
    } else if (xml.startsWith("<!DOCTYPE", i)) {
      end = doctypeEnd(xml, i);
    }
    if (end === -1) return i;
    i = end;
  }
}

/**
 * Entities are not expanded, so attribute values hold their source text; a
 * `"` can only be there from a single-quoted attribute and the builder
 * always writes double quotes.
 */
function escapeAttributeQuotes(nodes: OrderedNode[]): void {
  for (const node of nodes) {
    const attrs = node[ATTRS];
    if (isNode(attrs)) {
      for (const [name, value] of Object.entries(attrs)) {
        if (typeof value === "string") attrs[name] = value.replace(/"/g, "&quot;");
      }
    }
    const children = childrenOf(node);
    if (children) escapeAttributeQuotes(children);
  }
}

/**
 * Record `revision` in the document header.
 *
 * An existing `<revisionDesc>` gets the new `<change>` as its first entry;
 * otherwise a `<revisionDesc>` is appended as the header's last child. A
 * `<change>` carrying the same `n` means the revision is already recorded.
 * Throws on malformed XML.
 */
export function annotateDocument(xml: string, revision: ResolvedRevision, headerElement = "teiHeader"): AnnotateResult {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new Error(`malformed XML at line ${valid.err.line}: ${valid.err.msg}`);
  }

  const prolog = xml.slice(0, rootOffset(xml));
  const body = xml.slice(prolog.length);
  const trailing = /\s*$/.exec(body)?.[0] ?? "";

  const parsed: unknown = new XMLParser(XML_OPTIONS).parse(body);
  if (!isNodeList(parsed)) throw new Error("unexpected parser output");
  escapeAttributeQuotes(parsed);

  const header = findElement(parsed, headerElement);
  const headerChildren = header ? childrenOf(header) : undefined;
  if (!headerChildren) return { changed: false, reason: "no-header" };

  const existing = headerChildren.find((n) => localName(tagOf(n) ?? "") === "revisionDesc");
  const existingChildren = existing ? childrenOf(existing) : undefined;

  if (existingChildren) {
    const recorded = existingChildren.some(
      (n) => localName(tagOf(n) ?? "") === "change" && attr(n, "n") === escapeXmlAttr(revision.revision),
    );
    if (recorded) return { changed: false, reason: "already-recorded" };
    existingChildren.unshift({ [TEXT]: "\n  " }, buildChangeRecord(revision));
  } else {
    headerChildren.push(
      { revisionDesc: [{ [TEXT]: "\n  " }, buildChangeRecord(revision), { [TEXT]: "\n" }] },
      { [TEXT]: "\n" },
    );
  }

  const built = new XMLBuilder(XML_OPTIONS).build(parsed);
  return { changed: true, xml: prolog + built.replace(/\s*$/, "") + trailing };
}

export type AnnotateRepositoryResult = {
  annotated: string[];
  unchanged: string[];
  failures: Array<{ file: string; error: string }>;
};

function listXmlFiles(root: string, include: readonly string[], rel = ""): string[] {
  const out: string[] = [];
  for (const entry of fs.readdirSync(path.join(root, rel), { withFileTypes: true })) {
    const child = rel ? `${rel}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (entry.name === ".git") continue;
      out.push(...listXmlFiles(root, include, child));
    } else if (entry.isFile() && include.some((p) => minimatch(child, p))) {
      out.push(child);
    }
  }
  return out;
}

/**
 * Annotate every XML document under `repoPath` matching `include`.
 * A file that cannot be read, parsed or written is reported and skipped.
 */
export function annotateRepository(opts: {
  repoPath: string;
  include: readonly string[];
  revision: ResolvedRevision;
  headerElement?: string;
  reporter: Reporter;
}): AnnotateRepositoryResult {
  const result: AnnotateRepositoryResult = { annotated: [], unchanged: [], failures: [] };

  for (const rel of listXmlFiles(opts.repoPath, opts.include).sort()) {
    const file = path.join(opts.repoPath, rel);
    try {
      const outcome = annotateDocument(fs.readFileSync(file, "utf8"), opts.revision, opts.headerElement);
      if (outcome.changed) {
        fs.writeFileSync(file, outcome.xml, "utf8");
        result.annotated.push(rel);
      } else {
        result.unchanged.push(rel);
        if (outcome.reason === "no-header") {
          opts.reporter.warn("PROVENANCE_NO_HEADER", `${rel}: no ${opts.headerElement ?? "teiHeader"} element`, {
            stage: "provenance",
            path: file,
          });
        }
      }
    } catch (e) {
      const error = errorMessage(e);
      result.failures.push({ file: rel, error });
      opts.reporter.warn("PROVENANCE_FAILED", `${rel}: ${error}`, { stage: "provenance", path: file });
    }
  }

  return result;
}
