import { ConfigurationError, ConstraintConflict } from './errors';
import { ConstraintModel, DrawInput, ForbiddenSource, Pair } from './types';

export type ValidationResult =
  | { valid: true; errors: ConstraintConflict[]; model: ConstraintModel }
  | { valid: false; errors: ConstraintConflict[] };

const describeSource = (source: ForbiddenSource): string => {
  switch (source.kind) {
    case 'blacklist':
      return 'the blacklist';
    case 'household':
      return `household [${source.members.join(', ')}]`;
    case 'history':
      return `history from ${source.year}`;
  }
};

const forbid = (
  forbidden: ConstraintModel['forbidden'],
  giver: string,
  receiver: string,
  source: ForbiddenSource
) => {
  let row = forbidden.get(giver);
  if (!row) {
    row = new Map();
    forbidden.set(giver, row);
  }
  // First source wins so conflict messages point at the most explicit rule
  if (!row.has(receiver)) row.set(receiver, source);
};

/**
 * Check a draw for internal consistency and merge its constraints into a
 * single forbidden relation and a single forced relation.
 */
export const validateDraw = (input: DrawInput): ValidationResult => {
  const errors: ConstraintConflict[] = [];
  const whitelist = input.whitelist ?? [];
  const blacklist = input.blacklist ?? [];
  const sets = input.blacklist_sets ?? [];
  const history = input.history ?? [];

  if (input.people.length === 0) {
    errors.push({ kind: 'empty-roster', message: 'The roster has no people' });
  }

  const names: string[] = [];
  const known = new Set<string>();
  for (const [i, person] of input.people.entries()) {
    const name = person.name;
    if (!name.trim()) {
      errors.push({ kind: 'unknown-person', message: `Person at index ${i} has no name` });
      continue;
    }
    if (known.has(name)) {
      errors.push({ kind: 'duplicate-person', person: name, message: `Person '${name}' appears more than once` });
      continue;
    }
    known.add(name);
    names.push(name);
  }

  const checkName = (name: string, where: string) => {
    if (!known.has(name)) {
      errors.push({
        kind: 'unknown-person',
        person: name,
        message: `${where} named '${name}' is not in the roster`,
      });
    }
  };
  const checkPair = (pair: Pair, where: string) => {
    checkName(pair.giver, `Giver in ${where}`);
    checkName(pair.receiver, `Receiver in ${where}`);
  };

  whitelist.forEach((pair) => checkPair(pair, 'whitelist'));
  blacklist.forEach((pair) => checkPair(pair, 'blacklist'));
  for (const record of history) {
    record.pairs.forEach((pair) => checkPair(pair, `history ${record.year}`));
  }
  for (const [i, set] of sets.entries()) {
    set.forEach((name) => checkName(name, `Member of blacklist set ${i}`));
    if (new Set(set).size < 2) {
      errors.push({
        kind: 'malformed-set',
        message: `Blacklist set ${i} needs at least two different people`,
      });
    }
  }

  const forbidden: ConstraintModel['forbidden'] = new Map();
  blacklist.forEach((pair) => forbid(forbidden, pair.giver, pair.receiver, { kind: 'blacklist' }));
  for (const set of sets) {
    const members = [...new Set(set)];
    for (const a of members) {
      for (const b of members) {
        if (a !== b) forbid(forbidden, a, b, { kind: 'household', members });
      }
    }
  }
  for (const record of history) {
    if (!record.exclude_pairs) continue;
    record.pairs.forEach((pair) =>
      forbid(forbidden, pair.giver, pair.receiver, { kind: 'history', year: record.year })
    );
  }

  const forced = new Map<string, string>();
  const forcedReceivers = new Map<string, string>();
  for (const pair of whitelist) {
    const { giver, receiver } = pair;
    if (forced.get(giver) === receiver) continue;

    if (giver === receiver) {
      errors.push({ kind: 'self-pair', pair, message: `Whitelist pairs '${giver}' with themselves` });
      continue;
    }
    const source = forbidden.get(giver)?.get(receiver);
    if (source) {
      errors.push({
        kind: 'forced-forbidden',
        pair,
        message: `Whitelisted pair ${giver} -> ${receiver} is forbidden by ${describeSource(source)}`,
      });
    }
    if (forced.has(giver)) {
      errors.push({
        kind: 'duplicate-giver',
        pair,
        person: giver,
        message: `'${giver}' is whitelisted as giver more than once`,
      });
      continue;
    }
    if (forcedReceivers.has(receiver)) {
      errors.push({
        kind: 'duplicate-receiver',
        pair,
        person: receiver,
        message: `'${receiver}' is whitelisted as receiver more than once`,
      });
      continue;
    }
    if (forced.get(receiver) === giver) {
      errors.push({
        kind: 'forced-two-cycle',
        pair,
        message: `Whitelist makes ${giver} and ${receiver} each other's secret santa`,
      });
      continue;
    }
    forced.set(giver, receiver);
    forcedReceivers.set(receiver, giver);
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, errors: [], model: { names, forbidden, forced } };
};

export const assertValidDraw = (input: DrawInput): ConstraintModel => {
  const result = validateDraw(input);
  if (!result.valid) throw new ConfigurationError(result.errors);
  return result.model;
};
