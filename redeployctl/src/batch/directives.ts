import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import type { DatabaseDirective, DirectiveEntry } from "../types/directive.js";
import type { Diagnostic } from "../log/reporter.js";

/** Session options the command scripts are expected to touch. */
export const KNOWN_OPTIONS = new Set([
  "addarchives",
  "addcache",
  "addraw",
  "attrindex",
  "attrinclude",
  "autooptimize",
  "chop",
  "createfilter",
  "csvparser",
  "ftindex",
  "ftinclude",
  "htmlparser",
  "intparse",
  "jsonparser",
  "language",
  "maxcats",
  "maxlen",
  "parser",
  "skipcorrupt",
  "stemming",
  "stripns",
  "stripws",
  "textindex",
  "textinclude",
  "tokenindex",
  "tokeninclude",
  "updindex",
]);

const BOOLEAN_OPTIONS = new Set([
  "addarchives",
  "addcache",
  "addraw",
  "attrindex",
  "autooptimize",
  "chop",
  "ftindex",
  "intparse",
  "skipcorrupt",
  "stemming",
  "stripns",
  "stripws",
  "textindex",
  "tokenindex",
  "updindex",
]);

type OrderedNode = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function requireString(value: unknown, what: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${what} must be a non-empty string`);
  }
  return value;
}

/**
 * Convert YAML entries (`{ set: { option, value } }`, `{ open: name }`, …)
 * into directives. Throws on the first malformed entry.
 */
export function parseDirectives(entries: readonly DirectiveEntry[] | readonly unknown[]): DatabaseDirective[] {
  const list: readonly unknown[] = entries;
  return list.map((entry, i): DatabaseDirective => {
    if (!isRecord(entry)) throw new Error(`directive #${i + 1}: expected a mapping`);
    const keys = Object.keys(entry);
    if (keys.length !== 1) throw new Error(`directive #${i + 1}: expected exactly one command, got ${keys.join(", ") || "none"}`);
    const key = keys[0];
    const arg = entry[key];
    const where = `directive #${i + 1} (${key})`;

    switch (key) {
      case "create-db": {
        if (!isRecord(arg)) throw new Error(`${where}: expected { name, source? }`);
        const name = requireString(arg.name, `${where} name`);
        return arg.source === undefined || arg.source === null
          ? { kind: "create-db", name }
          : { kind: "create-db", name, source: requireString(arg.source, `${where} source`) };
      }
      case "open":
        return { kind: "open", name: requireString(arg, `${where} name`) };
      case "close":
        return { kind: "close" };
      case "delete":
        return { kind: "delete", path: requireString(arg, `${where} path`) };
      case "set": {
        if (!isRecord(arg)) throw new Error(`${where}: expected { option, value }`);
        const value = arg.value;
        if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
          throw new Error(`${where}: value must be a string, number or boolean`);
        }
        return { kind: "set", option: requireString(arg.option, `${where} option`).toLowerCase(), value: String(value) };
      }
      case "optimize-all":
        return { kind: "optimize-all" };
      default:
        throw new Error(`${where}: unknown command`);
    }
  });
}

/** Replace `${build_dir}` in create-db sources. */
export function expandSources(directives: readonly DatabaseDirective[], buildDir: string): DatabaseDirective[] {
  return directives.map((d) =>
    d.kind === "create-db" && d.source !== undefined ? { ...d, source: d.source.split("${build_dir}").join(buildDir) } : d,
  );
}

/**
 * A `.geojson` source is imported with the JSON parser: `set parser json`
 * is placed before its create-db and the previous parser restored after,
 * unless the program already switched to json itself.
 */
export function withImplicitParsers(directives: readonly DatabaseDirective[]): DatabaseDirective[] {
  const out: DatabaseDirective[] = [];
  let parser = "xml";
  for (const d of directives) {
    if (d.kind === "set" && d.option === "parser") parser = d.value;
    const needsJson = d.kind === "create-db" && d.source?.toLowerCase().endsWith(".geojson") === true && parser !== "json";
    if (needsJson) {
      out.push({ kind: "set", option: "parser", value: "json" }, d, { kind: "set", option: "parser", value: parser });
    } else {
      out.push(d);
    }
  }
  return out;
}

function toNode(d: DatabaseDirective): OrderedNode {
  switch (d.kind) {
    case "create-db":
      return { "create-db": d.source === undefined ? [] : [{ "#text": d.source }], ":@": { "@_name": d.name } };
    case "open":
      return { open: [], ":@": { "@_name": d.name } };
    case "close":
      return { close: [] };
    case "delete":
      return { delete: [], ":@": { "@_path": d.path } };
    case "set":
      return { set: [{ "#text": d.value }], ":@": { "@_option": d.option } };
    case "optimize-all":
      return { "optimize-all": [] };
  }
}

/** Render directives as a command script (`<commands>…</commands>`). */
export function renderCommandScript(directives: readonly DatabaseDirective[]): string {
  const children: OrderedNode[] = [];
  for (const d of directives) children.push({ "#text": "\n  " }, toNode(d));
  children.push({ "#text": "\n" });

  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    suppressEmptyNode: true,
    processEntities: true,
    format: false,
  });
  return builder.build([{ commands: children }]) + "\n";
}

export type ParsedScript = {
  directives: DatabaseDirective[];
  /** Commands outside the directive set, in script order. */
  unsupported: string[];
};

function textOf(children: unknown): string {
  if (!Array.isArray(children)) return "";
  return children
    .map((c) => (isRecord(c) && typeof c["#text"] === "string" ? c["#text"] : ""))
    .join("")
    .trim();
}

function attrOf(node: OrderedNode, name: string): string {
  const attrs = node[":@"];
  if (!isRecord(attrs)) return "";
  const v = attrs[`@_${name}`];
  return typeof v === "string" ? v : "";
}

/** Read an existing command script back into directives. */
export function parseCommandScript(xml: string): ParsedScript {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) throw new Error(`malformed command script at line ${valid.err.line}: ${valid.err.msg}`);

  const parsed: unknown = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    commentPropName: "#comment",
    parseTagValue: false,
    parseAttributeValue: false,
  }).parse(xml);

  const root = Array.isArray(parsed) ? parsed.find((n) => isRecord(n) && "commands" in n) : undefined;
  if (!isRecord(root) || !Array.isArray(root.commands)) throw new Error("command script has no <commands> root");

  const result: ParsedScript = { directives: [], unsupported: [] };
  for (const child of root.commands) {
    if (!isRecord(child)) continue;
    const tag = Object.keys(child).find((k) => k !== ":@");
    if (!tag || tag.startsWith("#")) continue;
    const body = child[tag];
    switch (tag) {
      case "create-db": {
        const source = textOf(body);
        result.directives.push(source ? { kind: "create-db", name: attrOf(child, "name"), source } : { kind: "create-db", name: attrOf(child, "name") });
        break;
      }
      case "open":
        result.directives.push({ kind: "open", name: attrOf(child, "name") });
        break;
      case "close":
        result.directives.push({ kind: "close" });
        break;
      case "delete":
        result.directives.push({ kind: "delete", path: attrOf(child, "path") });
        break;
      case "set":
        result.directives.push({ kind: "set", option: attrOf(child, "option").toLowerCase(), value: textOf(body) });
        break;
      case "optimize-all":
        result.directives.push({ kind: "optimize-all" });
        break;
      default:
        result.unsupported.push(tag);
    }
  }
  return result;
}

/**
 * Ordering and argument checks. `create-db` leaves the new database open,
 * the same as `open`.
 */
export function checkProgram(directives: readonly DatabaseDirective[]): Diagnostic[] {
  const out: Diagnostic[] = [];
  let open: string | null = null;

  directives.forEach((d, i) => {
    const at = `#${i + 1} ${d.kind}`;
    switch (d.kind) {
      case "create-db":
      case "open":
        if (!d.name) out.push({ level: "error", code: "DIRECTIVE_NO_NAME", message: `${at}: database name is empty` });
        if (d.kind === "open" && open !== null) {
          out.push({ level: "warn", code: "DIRECTIVE_REOPEN", message: `${at}: ${open} is still open and will be closed` });
        }
        open = d.name;
        break;
      case "close":
        if (open === null) out.push({ level: "warn", code: "DIRECTIVE_CLOSE_NONE", message: `${at}: no database is open` });
        open = null;
        break;
      case "delete":
        if (open === null) out.push({ level: "error", code: "DIRECTIVE_DELETE_OUTSIDE", message: `${at}: delete ${d.path} outside open/close` });
        if (!d.path) out.push({ level: "error", code: "DIRECTIVE_NO_PATH", message: `${at}: path is empty` });
        break;
      case "optimize-all":
        if (open === null) out.push({ level: "error", code: "DIRECTIVE_OPTIMIZE_NONE", message: `${at}: no database is open` });
        break;
      case "set":
        if (!KNOWN_OPTIONS.has(d.option)) {
          out.push({ level: "warn", code: "DIRECTIVE_UNKNOWN_OPTION", message: `${at}: unknown option ${d.option}` });
        } else if (BOOLEAN_OPTIONS.has(d.option) && d.value !== "true" && d.value !== "false") {
          out.push({ level: "error", code: "DIRECTIVE_BAD_VALUE", message: `${at}: ${d.option} expects true or false, got ${d.value}` });
        }
        break;
    }
  });

  return out;
}
