import { Pair } from './types';

export type ConflictKind =
  | 'empty-roster'
  | 'duplicate-person'
  | 'unknown-person'
  | 'malformed-set'
  | 'self-pair'
  | 'duplicate-giver'
  | 'duplicate-receiver'
  | 'forced-two-cycle'
  | 'forced-forbidden';

export interface ConstraintConflict {
  kind: ConflictKind;
  message: string;
  pair?: Pair;
  person?: string;
}

export type InfeasibleCategory =
  | 'giver-without-receiver'
  | 'receiver-without-giver'
  | 'two-cycle'
  | 'exhausted';

export type DrawErrorCode = 'CONFIGURATION' | 'INFEASIBLE' | 'SEARCH_LIMIT';

export abstract class DrawError extends Error {
  abstract readonly code: DrawErrorCode;

  toJSON(): Record<string, unknown> {
    return { code: this.code, error: this.message };
  }
}

export class ConfigurationError extends DrawError {
  readonly code = 'CONFIGURATION';

  constructor(readonly conflicts: ConstraintConflict[]) {
    super(
      conflicts.length === 1
        ? conflicts[0].message
        : `Invalid draw configuration (${conflicts.length} problems)`
    );
    this.name = 'ConfigurationError';
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), conflicts: this.conflicts };
  }
}

export class InfeasibleError extends DrawError {
  readonly code = 'INFEASIBLE';

  constructor(
    message: string,
    readonly category: InfeasibleCategory,
    readonly person?: string
  ) {
    super(message);
    this.name = 'InfeasibleError';
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), category: this.category, person: this.person };
  }
}

export class SearchLimitError extends DrawError {
  readonly code = 'SEARCH_LIMIT';

  constructor(readonly maxSteps: number, readonly steps: number) {
    super(`Search stopped after ${steps} steps without finding assignments; try a larger limit`);
    this.name = 'SearchLimitError';
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), maxSteps: this.maxSteps, steps: this.steps };
  }
}
