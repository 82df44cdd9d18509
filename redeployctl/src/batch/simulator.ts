import type { DatabaseDirective } from "../types/directive.js";

/** Session defaults of the engine for the options a database records at creation. */
export const DEFAULT_SESSION_OPTIONS: Readonly<Record<string, string>> = {
  attrindex: "true",
  autooptimize: "false",
  chop: "true",
  ftindex: "false",
  parser: "xml",
  skipcorrupt: "false",
  stripws: "false",
  textindex: "true",
  tokenindex: "false",
  updindex: "false",
};

export type SimulatedDatabase = {
  name: string;
  source?: string;
  /** Options in effect when the database was (last) created. */
  options: Record<string, string>;
  deleted: string[];
  optimized: boolean;
};

export type EngineState = {
  options: Record<string, string>;
  databases: Record<string, SimulatedDatabase>;
  open: string | null;
};

export function initialState(): EngineState {
  return { options: { ...DEFAULT_SESSION_OPTIONS }, databases: {}, open: null };
}

/**
 * Apply one directive. Pure: returns a new state.
 * create-db replaces an existing database of the same name and leaves it open.
 */
export function applyDirective(state: EngineState, d: DatabaseDirective): EngineState {
  switch (d.kind) {
    case "set":
      return { ...state, options: { ...state.options, [d.option]: d.value } };
    case "create-db": {
      const db: SimulatedDatabase = { name: d.name, options: { ...state.options }, deleted: [], optimized: false };
      if (d.source !== undefined) db.source = d.source;
      return { ...state, databases: { ...state.databases, [d.name]: db }, open: d.name };
    }
    case "open":
      if (!state.databases[d.name]) {
        throw new Error(`open ${d.name}: database does not exist`);
      }
      return { ...state, open: d.name };
    case "close":
      return { ...state, open: null };
    case "delete": {
      const db = state.open ? state.databases[state.open] : undefined;
      if (!db) throw new Error(`delete ${d.path}: no database is open`);
      const updated: SimulatedDatabase = { ...db, deleted: [...db.deleted, d.path] };
      return { ...state, databases: { ...state.databases, [db.name]: updated } };
    }
    case "optimize-all": {
      const db = state.open ? state.databases[state.open] : undefined;
      if (!db) throw new Error("optimize-all: no database is open");
      return { ...state, databases: { ...state.databases, [db.name]: { ...db, optimized: true } } };
    }
  }
}

/**
 * Run a whole program against `start` (default: empty engine). Databases
 * that a program opens without creating are assumed to exist already.
 */
export function simulateProgram(directives: readonly DatabaseDirective[], start: EngineState = initialState()): EngineState {
  let state = start;
  for (const d of directives) {
    if (d.kind === "open" && !state.databases[d.name]) {
      const existing: SimulatedDatabase = { name: d.name, options: {}, deleted: [], optimized: false };
      state = { ...state, databases: { ...state.databases, [d.name]: existing } };
    }
    state = applyDirective(state, d);
  }
  return state;
}
