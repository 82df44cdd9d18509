import { describe, expect, it } from "vitest";
import {
  checkProgram,
  expandSources,
  parseCommandScript,
  parseDirectives,
  renderCommandScript,
  withImplicitParsers,
} from "../src/batch/directives.js";
import { applyDirective, initialState, simulateProgram } from "../src/batch/simulator.js";
import type { DatabaseDirective } from "../src/types/directive.js";

describe("parseDirectives", () => {
  it("converts YAML entries in order", () => {
    const directives = parseDirectives([
      { set: { option: "FTINDEX", value: true } },
      { set: { option: "maxlen", value: 96 } },
      { "create-db": { name: "vicav_texts", source: "texts" } },
      { "create-db": { name: "vicav_empty" } },
      { close: true },
      { open: "vicav_texts" },
      { delete: "obsolete.xml" },
      { "optimize-all": true },
    ]);
    expect(directives).toEqual([
      { kind: "set", option: "ftindex", value: "true" },
      { kind: "set", option: "maxlen", value: "96" },
      { kind: "create-db", name: "vicav_texts", source: "texts" },
      { kind: "create-db", name: "vicav_empty" },
      { kind: "close" },
      { kind: "open", name: "vicav_texts" },
      { kind: "delete", path: "obsolete.xml" },
      { kind: "optimize-all" },
    ]);
  });

  it("rejects an entry with two commands", () => {
    expect(() => parseDirectives([{ open: "a", close: true }])).toThrow("directive #1: expected exactly one command, got open, close");
  });

  it("rejects unknown commands", () => {
    expect(() => parseDirectives([{ close: true }, { drop: "x" }])).toThrow("directive #2 (drop): unknown command");
  });

  it("rejects a create-db without a name", () => {
    expect(() => parseDirectives([{ "create-db": { source: "x" } }])).toThrow("directive #1 (create-db) name must be a non-empty string");
  });
});

describe("program rewriting", () => {
  it("expands ${build_dir} in create-db sources only", () => {
    const out = expandSources(
      [
        { kind: "create-db", name: "a", source: "${build_dir}/data" },
        { kind: "delete", path: "${build_dir}" },
      ],
      "/srv/vicav",
    );
    expect(out).toEqual([
      { kind: "create-db", name: "a", source: "/srv/vicav/data" },
      { kind: "delete", path: "${build_dir}" },
    ]);
  });

  it("wraps a .geojson import in parser switches", () => {
    const out = withImplicitParsers([
      { kind: "set", option: "parser", value: "html" },
      { kind: "create-db", name: "geo", source: "data/varieties.GeoJSON" },
    ]);
    expect(out).toEqual([
      { kind: "set", option: "parser", value: "html" },
      { kind: "set", option: "parser", value: "json" },
      { kind: "create-db", name: "geo", source: "data/varieties.GeoJSON" },
      { kind: "set", option: "parser", value: "html" },
    ]);
  });

  it("leaves a program that already selects json alone", () => {
    const program: DatabaseDirective[] = [
      { kind: "set", option: "parser", value: "json" },
      { kind: "create-db", name: "geo", source: "varieties.geojson" },
    ];
    expect(withImplicitParsers(program)).toEqual(program);
  });
});

describe("command scripts", () => {
  const program: DatabaseDirective[] = [
    { kind: "set", option: "ftindex", value: "true" },
    { kind: "create-db", name: "vicav_texts", source: "/srv/texts" },
    { kind: "close" },
    { kind: "open", name: "vicav_texts" },
    { kind: "delete", path: "old.xml" },
    { kind: "optimize-all" },
  ];

  it("renders one command per line", () => {
    expect(renderCommandScript(program)).toBe(
      [
        "<commands>",
        '  <set option="ftindex">true</set>',
        '  <create-db name="vicav_texts">/srv/texts</create-db>',
        "  <close/>",
        '  <open name="vicav_texts"/>',
        '  <delete path="old.xml"/>',
        "  <optimize-all/>",
        "</commands>",
        "",
      ].join("\n"),
    );
  });

  it("reads a rendered script back", () => {
    const parsed = parseCommandScript(renderCommandScript(program));
    expect(parsed.directives).toEqual(program);
    expect(parsed.unsupported).toEqual([]);
  });

  it("collects commands outside the directive set", () => {
    const parsed = parseCommandScript("<commands><xquery>1 + 1</xquery><close/><info/></commands>");
    expect(parsed.directives).toEqual([{ kind: "close" }]);
    expect(parsed.unsupported).toEqual(["xquery", "info"]);
  });

  it("rejects malformed scripts", () => {
    expect(() => parseCommandScript("<commands><close></commands>")).toThrow(/malformed command script/);
  });

  it("rejects scripts without a commands root", () => {
    expect(() => parseCommandScript("<script><close/></script>")).toThrow("command script has no <commands> root");
  });
});

describe("checkProgram", () => {
  function codes(program: DatabaseDirective[]): string[] {
    return checkProgram(program).map((d) => d.code);
  }

  it("accepts a well-ordered program", () => {
    expect(
      codes([
        { kind: "set", option: "skipcorrupt", value: "true" },
        { kind: "create-db", name: "a", source: "x" },
        { kind: "create-db", name: "b", source: "y" },
        { kind: "close" },
        { kind: "open", name: "a" },
        { kind: "delete", path: "old" },
        { kind: "optimize-all" },
        { kind: "close" },
      ]),
    ).toEqual([]);
  });

  it("rejects delete and optimize outside open/close", () => {
    expect(codes([{ kind: "delete", path: "x" }, { kind: "optimize-all" }])).toEqual([
      "DIRECTIVE_DELETE_OUTSIDE",
      "DIRECTIVE_OPTIMIZE_NONE",
    ]);
  });

  it("warns when a database is opened over another", () => {
    const diagnostics = checkProgram([
      { kind: "open", name: "a" },
      { kind: "open", name: "b" },
    ]);
    expect(diagnostics).toEqual([
      { level: "warn", code: "DIRECTIVE_REOPEN", message: "#2 open: a is still open and will be closed" },
    ]);
  });

  it("warns on close with nothing open and on unknown options", () => {
    expect(codes([{ kind: "close" }, { kind: "set", option: "colour", value: "red" }])).toEqual([
      "DIRECTIVE_CLOSE_NONE",
      "DIRECTIVE_UNKNOWN_OPTION",
    ]);
  });

  it("rejects non-boolean values for boolean options", () => {
    const [d] = checkProgram([{ kind: "set", option: "ftindex", value: "yes" }]);
    expect(d).toEqual({ level: "error", code: "DIRECTIVE_BAD_VALUE", message: "#1 set: ftindex expects true or false, got yes" });
  });

  it("rejects empty names and paths", () => {
    expect(codes([{ kind: "create-db", name: "" }, { kind: "delete", path: "" }])).toEqual([
      "DIRECTIVE_NO_NAME",
      "DIRECTIVE_NO_PATH",
    ]);
  });
});

describe("engine simulator", () => {
  it("applies options set before a create-db to that database only", () => {
    const state = simulateProgram([
      { kind: "set", option: "ftindex", value: "true" },
      { kind: "create-db", name: "a", source: "x" },
      { kind: "set", option: "ftindex", value: "false" },
      { kind: "create-db", name: "b", source: "y" },
    ]);
    expect(state.databases.a.options.ftindex).toBe("true");
    expect(state.databases.b.options.ftindex).toBe("false");
    expect(state.databases.a.source).toBe("x");
    expect(state.open).toBe("b");
  });

  it("replaces a database created twice", () => {
    const state = simulateProgram([
      { kind: "create-db", name: "a", source: "x" },
      { kind: "close" },
      { kind: "set", option: "chop", value: "false" },
      { kind: "create-db", name: "a", source: "z" },
    ]);
    expect(Object.keys(state.databases)).toEqual(["a"]);
    expect(state.databases.a.source).toBe("z");
    expect(state.databases.a.options.chop).toBe("false");
  });

  it("records deletes and optimization on the open database", () => {
    const state = simulateProgram([
      { kind: "open", name: "vicav_texts" },
      { kind: "delete", path: "obsolete" },
      { kind: "optimize-all" },
      { kind: "close" },
    ]);
    expect(state.databases.vicav_texts).toEqual({ name: "vicav_texts", options: {}, deleted: ["obsolete"], optimized: true });
    expect(state.open).toBeNull();
  });

  it("does not modify the state it is given", () => {
    const start = initialState();
    const next = applyDirective(start, { kind: "set", option: "parser", value: "json" });
    expect(start.options.parser).toBe("xml");
    expect(next.options.parser).toBe("json");
  });

  it("rejects opening a database that does not exist", () => {
    expect(() => applyDirective(initialState(), { kind: "open", name: "missing" })).toThrow("open missing: database does not exist");
  });

  it("rejects deletes with no database open", () => {
    expect(() => applyDirective(initialState(), { kind: "delete", path: "x" })).toThrow("delete x: no database is open");
  });
});
