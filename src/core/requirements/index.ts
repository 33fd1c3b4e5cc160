/**
 * Requirement checks gating task dispatch.
 */

export {
  createRequirementRegistry,
  createDefaultRequirements,
  evaluate,
  evaluateAll,
} from './registry.js';
export type {
  RequirementContext,
  RequirementPredicate,
  RequirementRegistry,
} from './registry.js';
export {
  createInternetProbe,
  tryConnect,
  DEFAULT_INTERNET_TARGETS,
} from './internet.js';
export type { ProbeTarget } from './internet.js';
export {
  createLinuxPowerProbe,
  createMacosPowerProbe,
  createWindowsPowerProbe,
  selectPowerProbe,
} from './power.js';
export type { PowerStatus, PowerStatusProbe, UtilityRunner } from './power.js';
