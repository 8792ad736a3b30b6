export interface SessionState {
  /** Chapter index, or -1 for the table of contents. */
  page: number;
  /** Scroll offset per chapter index. Holds strictly positive offsets only. */
  offsets: Map<number, number>;
  width: number;
}

/** On-disk shape of a session file. */
export interface SessionFile {
  page: number;
  offsets: Record<string, number>;
  width: number;
}
