import { ConstraintModel, Pair } from './types';

/**
 * List every rule a finished assignment breaks. An empty list means the
 * pairs form a valid draw for the model.
 */
export const verifySolution = (model: ConstraintModel, pairs: Pair[]): string[] => {
  const violations: string[] = [];
  const roster = new Set(model.names);
  const receiverOf = new Map<string, string>();
  const giverOf = new Map<string, string>();

  for (const { giver, receiver } of pairs) {
    if (!roster.has(giver)) violations.push(`Unknown giver ${giver}`);
    if (!roster.has(receiver)) violations.push(`Unknown receiver ${receiver}`);
    if (giver === receiver) violations.push(`${giver} gives to themselves`);
    if (receiverOf.has(giver)) violations.push(`${giver} gives more than once`);
    if (giverOf.has(receiver)) violations.push(`${receiver} receives more than once`);
    receiverOf.set(giver, receiver);
    giverOf.set(receiver, giver);

    if (model.forbidden.get(giver)?.has(receiver)) {
      violations.push(`${giver} -> ${receiver} is forbidden`);
    }
  }

  for (const name of model.names) {
    if (!receiverOf.has(name)) violations.push(`${name} gives to nobody`);
    if (!giverOf.has(name)) violations.push(`${name} receives from nobody`);
  }

  for (const [giver, receiver] of receiverOf) {
    // Report each 2-cycle once
    if (giver < receiver && receiverOf.get(receiver) === giver) {
      violations.push(`${giver} and ${receiver} draw each other`);
    }
  }

  model.forced.forEach((receiver, giver) => {
    if (receiverOf.get(giver) !== receiver) {
      violations.push(`Whitelisted pair ${giver} -> ${receiver} is missing`);
    }
  });

  return violations;
};
