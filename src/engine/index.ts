import { ConfigurationError, DrawError } from './errors';
import { SecretSantaMatcher } from './secretSantaMatcher';
import { DrawInput, Pair, SolveOptions } from './types';
import { validateDraw } from './validator';
import { verifySolution } from './verify';

export type DrawResult =
  | { ok: true; pairs: Pair[]; steps: number }
  | { ok: false; error: DrawError };

/**
 * Validate a draw and search for assignments. Configuration problems are
 * reported before any search effort is spent.
 */
export const solveDraw = (input: DrawInput, options: SolveOptions = {}): DrawResult => {
  const validation = validateDraw(input);
  if (!validation.valid) {
    return { ok: false, error: new ConfigurationError(validation.errors) };
  }

  try {
    const matcher = new SecretSantaMatcher(validation.model, options);
    const { pairs, steps } = matcher.generateSecretSantaPairs();

    const violations = verifySolution(validation.model, pairs);
    if (violations.length > 0) {
      throw new Error(`Matcher produced an invalid draw: ${violations.join('; ')}`);
    }
    return { ok: true, pairs, steps };
  } catch (error) {
    if (error instanceof DrawError) return { ok: false, error };
    throw error;
  }
};

export * from './errors';
export * from './history';
export * from './random';
export * from './secretSantaMatcher';
export * from './types';
export * from './validator';
export * from './verify';
