import { z } from 'zod';
import { CategoryLabel, EducationSource, ServiceStatus, UnitType } from '../types/common.js';

/**
 * One systemd-managed unit as reported by the service manager.
 * Built fresh on every enumeration and never mutated afterwards.
 */
export const ServiceUnit = z.object({
  /** Unit file name, e.g. "nginx.service" */
  name: z.string().min(1),
  /** Normalised lifecycle state */
  status: ServiceStatus,
  unitType: UnitType,
  /** Raw LoadState, e.g. "loaded", "not-found", "masked" */
  loadState: z.string().optional(),
  /** Raw ActiveState, e.g. "active", "reloading" */
  activeState: z.string().optional(),
  /** Raw SubState, e.g. "running", "exited", "dead" */
  subState: z.string().optional(),
  /** The manager's own one-line description of the unit */
  description: z.string().optional(),
});
export type ServiceUnit = z.infer<typeof ServiceUnit>;

export const EducationalContext = z.object({
  description: z.string().min(1),
  importance: z.string().min(1),
  troubleshooting: z.string().min(1),
  source: EducationSource,
});
export type EducationalContext = z.infer<typeof EducationalContext>;

/** Per-unit shape handed to the HTTP layer */
export const EnrichedService = z.object({
  name: z.string(),
  status: ServiceStatus,
  type: UnitType,
  category: CategoryLabel,
  /** Educational description */
  description: z.string(),
  importance: z.string(),
  troubleshooting: z.string(),
  educationSource: EducationSource,
  loadState: z.string().optional(),
  activeState: z.string().optional(),
  subState: z.string().optional(),
  /** The manager's description, when it reported one */
  unitDescription: z.string().optional(),
});
export type EnrichedService = z.infer<typeof EnrichedService>;

export const CriticalServiceStatus = z.object({
  status: ServiceStatus,
  isCritical: z.literal(true),
  /** False when no loaded unit by this name exists on the host */
  found: z.boolean(),
  importance: z.string(),
  troubleshooting: z.string(),
  loadState: z.string().optional(),
  activeState: z.string().optional(),
  subState: z.string().optional(),
});
export type CriticalServiceStatus = z.infer<typeof CriticalServiceStatus>;

export const ServiceSummary = z.object({
  total: z.number().int().nonnegative(),
  active: z.number().int().nonnegative(),
  inactive: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  activating: z.number().int().nonnegative(),
  deactivating: z.number().int().nonnegative(),
  unknown: z.number().int().nonnegative(),
  /** Units whose LoadState is "masked", counted independently of status */
  masked: z.number().int().nonnegative(),
});
export type ServiceSummary = z.infer<typeof ServiceSummary>;
