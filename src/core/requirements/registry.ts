/**
 * Requirement registry and evaluator.
 *
 * A requirement is a named boolean predicate checked before a due task is
 * dispatched. The registry is an immutable table: extending it means
 * building a new table, and tests pass their own instead of patching a
 * global.
 */

import { CONTROL_FLAGS } from '../../types/task.js';
import { getLogger } from '../logger.js';
import { createInternetProbe } from './internet.js';
import { selectPowerProbe, type PowerStatusProbe } from './power.js';

/** What a predicate knows about the task it is gating. */
export interface RequirementContext {
  taskId: string;
  command: string;
}

export type RequirementPredicate = (context: RequirementContext) => boolean | Promise<boolean>;

export type RequirementRegistry = ReadonlyMap<string, RequirementPredicate>;

/**
 * Build an immutable registry from name → predicate entries.
 */
export function createRequirementRegistry(
  entries: Record<string, RequirementPredicate>,
): RequirementRegistry {
  return new Map(Object.entries(entries));
}

/**
 * Build the built-in table: `internet`, `ac_power`, `battery`.
 *
 * The power probe is shared so both power requirements see the same
 * detection logic; a status that cannot be determined fails both.
 */
export function createDefaultRequirements(deps?: {
  internet?: () => Promise<boolean>;
  powerStatus?: PowerStatusProbe;
}): RequirementRegistry {
  const internet = deps?.internet ?? createInternetProbe();
  const powerStatus = deps?.powerStatus ?? selectPowerProbe();

  return createRequirementRegistry({
    internet: () => internet(),
    ac_power: async () => (await powerStatus()) === 'ac',
    battery: async () => (await powerStatus()) === 'battery',
  });
}

/**
 * Evaluate a single requirement. Unknown names are unmet; a predicate
 * that throws or rejects counts as unmet and is logged, never propagated.
 */
export async function evaluate(
  registry: RequirementRegistry,
  name: string,
  context: RequirementContext,
): Promise<boolean> {
  const predicate = registry.get(name);
  if (!predicate) {
    return false;
  }
  try {
    return (await predicate(context)) === true;
  } catch (err) {
    getLogger('requirements').debug(
      { err, requirement: name, taskId: context.taskId },
      'requirement check failed',
    );
    return false;
  }
}

/**
 * Evaluate every declared requirement, skipping control flags.
 * Checks run one after another in declaration order.
 *
 * @returns Unmet requirement names, in declaration order
 */
export async function evaluateAll(
  registry: RequirementRegistry,
  names: readonly string[],
  context: RequirementContext,
): Promise<string[]> {
  const unmet: string[] = [];
  for (const name of names) {
    if (CONTROL_FLAGS.has(name)) continue;
    if (!(await evaluate(registry, name, context))) {
      unmet.push(name);
    }
  }
  return unmet;
}
