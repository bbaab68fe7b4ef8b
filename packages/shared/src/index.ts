// Types
export {
  ServiceStatus,
  UnitType,
  CategoryLabel,
  EducationSource,
  LogLevel,
  UNIT_SUFFIXES,
  DEFAULT_SERVER_PORT,
  DEFAULT_SYSTEMCTL_TIMEOUT_MS,
} from './types/common.js';
export { ServerConfig } from './types/server.js';
export type { ApiFailure, ApiResponse, ApiSuccess } from './types/api.js';

// Schemas: Services
export {
  ServiceUnit,
  EducationalContext,
  EnrichedService,
  CriticalServiceStatus,
  ServiceSummary,
} from './schemas/services.js';

// Schemas: Rules
export {
  EducationalText,
  PartialEducationalText,
  ClassificationRule,
  CriticalServiceEntry,
  CategoryDescriptions,
  SystemdPrimer,
  CriticalPrimer,
  DiscoveryRules,
  normalizeUnitName,
} from './schemas/rules.js';
