import { InfeasibleError, SearchLimitError } from './errors';
import { RandomSource, seededRandom, shuffle } from './random';
import { ConstraintModel, Pair, SolveOptions } from './types';

export interface MatchResult {
  pairs: Pair[];
  steps: number;
}

interface SearchFrame {
  giver: string;
  candidates: string[];
  cursor: number;
  chosen?: string;
}

/**
 * Secret Santa Matcher using randomized backtracking search.
 * Forced pairs are fixed up front; every other giver is tried against a
 * shuffled list of legal receivers, undoing the latest choice on a dead end.
 */
export class SecretSantaMatcher {
  private names: string[];
  private forbidden: ConstraintModel['forbidden'];
  private forcedGivers: Set<string>;
  private random: RandomSource;
  private maxSteps: number;
  private assignment = new Map<string, string>(); // giver -> receiver
  private takenBy = new Map<string, string>(); // receiver -> giver
  private steps = 0;

  constructor(model: ConstraintModel, options: SolveOptions = {}) {
    this.names = model.names;
    this.forbidden = model.forbidden;
    this.forcedGivers = new Set(model.forced.keys());
    this.random = options.seed !== undefined ? seededRandom(options.seed) : Math.random;
    this.maxSteps = options.maxSteps ?? 0;

    model.forced.forEach((receiver, giver) => this.assign(giver, receiver));
  }

  /**
   * Whether giver may be assigned receiver given the assignments made so far.
   */
  isAllowed(giver: string, receiver: string): boolean {
    if (giver === receiver) return false;
    if (this.forbidden.get(giver)?.has(receiver)) return false;
    if (this.takenBy.has(receiver)) return false;
    // Would close a 2-cycle with an existing assignment
    return this.assignment.get(receiver) !== giver;
  }

  private assign(giver: string, receiver: string): void {
    this.assignment.set(giver, receiver);
    this.takenBy.set(receiver, giver);
  }

  private unassign(giver: string): void {
    const receiver = this.assignment.get(giver);
    if (receiver === undefined) return;
    this.assignment.delete(giver);
    this.takenBy.delete(receiver);
  }

  private openFrame(giver: string): SearchFrame {
    const candidates = this.names.filter((receiver) => this.isAllowed(giver, receiver));
    return { giver, candidates: shuffle(candidates, this.random), cursor: 0 };
  }

  private hasReceiver(giver: string): boolean {
    return this.names.some((receiver) => this.isAllowed(giver, receiver));
  }

  /**
   * Forward check: every pending giver still has a receiver and every
   * untaken receiver still has a pending giver.
   */
  private isDeadEnd(pending: string[]): boolean {
    if (pending.some((giver) => !this.hasReceiver(giver))) return true;
    return this.names.some(
      (receiver) =>
        !this.takenBy.has(receiver) && !pending.some((giver) => this.isAllowed(giver, receiver))
    );
  }

  /**
   * Reject rosters where someone has no possible partner before searching,
   * so the failure can name them.
   */
  private checkFeasibility(pending: string[]): void {
    for (const giver of pending) {
      if (!this.hasReceiver(giver)) {
        throw new InfeasibleError(
          `${giver} has nobody left to give to; every other person is excluded`,
          'giver-without-receiver',
          giver
        );
      }
    }
    for (const receiver of this.names) {
      if (this.takenBy.has(receiver)) continue;
      if (!pending.some((giver) => this.isAllowed(giver, receiver))) {
        throw new InfeasibleError(
          `Nobody is allowed to give to ${receiver}`,
          'receiver-without-giver',
          receiver
        );
      }
    }
  }

  private collect(): MatchResult {
    const pairs = [...this.assignment.entries()]
      .map(([giver, receiver]) => ({ giver, receiver }))
      .sort((a, b) => (a.giver < b.giver ? -1 : a.giver > b.giver ? 1 : 0));
    return { pairs, steps: this.steps };
  }

  /**
   * Generate Secret Santa pairs
   * @throws InfeasibleError when no assignment satisfies the constraints
   * @throws SearchLimitError when maxSteps runs out first
   */
  generateSecretSantaPairs(): MatchResult {
    const givers = shuffle(
      this.names.filter((name) => !this.forcedGivers.has(name)),
      this.random
    );
    this.checkFeasibility(givers);

    if (givers.length === 0) {
      return this.collect();
    }

    const stack: SearchFrame[] = [this.openFrame(givers[0])];
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.chosen !== undefined) {
        this.unassign(frame.giver);
        frame.chosen = undefined;
      }
      if (frame.cursor >= frame.candidates.length) {
        stack.pop();
        continue;
      }
      if (this.maxSteps > 0 && this.steps >= this.maxSteps) {
        throw new SearchLimitError(this.maxSteps, this.steps);
      }

      this.steps++;
      const receiver = frame.candidates[frame.cursor++];
      this.assign(frame.giver, receiver);
      frame.chosen = receiver;

      if (stack.length === givers.length) {
        return this.collect();
      }
      if (this.isDeadEnd(givers.slice(stack.length))) {
        continue;
      }
      stack.push(this.openFrame(givers[stack.length]));
    }

    if (this.names.length === 2) {
      throw new InfeasibleError(
        'Two people can only draw each other, which is not allowed',
        'two-cycle'
      );
    }
    throw new InfeasibleError(
      'No assignment satisfies every rule; try relaxing exclusions or history',
      'exhausted'
    );
  }
}
