export interface Person {
  name: string;
  email: string;
}

export interface Pair {
  giver: string;
  receiver: string;
}

export interface HistoryRecord {
  year: number;
  exclude_pairs: boolean;
  pairs: Pair[];
}

/**
 * Everything a draw needs. Only `people` is required; missing constraint lists
 * are treated as empty.
 */
export interface DrawInput {
  people: Person[];
  whitelist?: Pair[];
  blacklist?: Pair[];
  blacklist_sets?: string[][];
  history?: HistoryRecord[];
}

export type ForbiddenSource =
  | { kind: 'blacklist' }
  | { kind: 'household'; members: string[] }
  | { kind: 'history'; year: number };

/**
 * Merged constraint relations produced by the validator.
 * forbidden: giver -> receiver -> why the edge is forbidden
 * forced: giver -> receiver
 */
export interface ConstraintModel {
  names: string[];
  forbidden: Map<string, Map<string, ForbiddenSource>>;
  forced: Map<string, string>;
}

export interface SolveOptions {
  /** Seed for a reproducible draw. Math.random is used when omitted. */
  seed?: number;
  /** Upper bound on search steps. Unbounded when omitted or 0. */
  maxSteps?: number;
}
