export type { ExecFn, UnitSource } from './types.js';
export type { Classifier } from './classifier.js';
export type { Educator } from './educator.js';
export type { ServicesByCategory, ServicesOverview } from './discovery.js';
export type { ListUnitsOptions } from './systemd/units-list.js';
export type { ExecOptions } from './exec.js';
export type { Logger } from './logger.js';
export { logger } from './logger.js';
export { DiscoveryUnavailable, RulesValidationError, UnitParseIncomplete } from './errors.js';
export { createExec } from './exec.js';
export { createClassifier, orderRules } from './classifier.js';
export { createEducator, renderTemplate } from './educator.js';
export { resolveCritical } from './critical.js';
export {
  ServiceDiscovery,
  groupByCategory,
  summarizeServices,
} from './discovery.js';
export { DEFAULT_RULES_PATH, loadDiscoveryRules, parseDiscoveryRules } from './rules.js';
export {
  createSystemdUnitSource,
  listUnits,
  listUnitsArgs,
  parseUnitsList,
} from './systemd/units-list.js';
export { unitBaseName, unitTypeOf } from './units.js';
