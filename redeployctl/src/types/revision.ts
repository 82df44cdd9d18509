/** Outcome of synchronizing one repository. Immutable once resolved. */
export type ResolvedRevision = Readonly<{
  repository: string;
  /** Tag name, `git describe` output or short commit hash. */
  revision: string;
  author: string;
  /** YYYY-MM-DD */
  date: string;
  message: string;
}>;
