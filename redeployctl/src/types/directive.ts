/**
 * Database directives: the ordered program a batch script runs against the
 * document database. Order matters; options set before `create-db` apply to it.
 */
export type DatabaseDirective =
  | { kind: "create-db"; name: string; source?: string }
  | { kind: "open"; name: string }
  | { kind: "close" }
  | { kind: "delete"; path: string }
  | { kind: "set"; option: string; value: string }
  | { kind: "optimize-all" };

export type DirectiveKind = DatabaseDirective["kind"];

/** YAML form of a directive, one key per entry. */
export type DirectiveEntry =
  | { "create-db": { name: string; source?: string } }
  | { open: string }
  | { close: true }
  | { delete: string }
  | { set: { option: string; value: string | number | boolean } }
  | { "optimize-all": true };
