import { z } from 'zod';

export const ServiceStatus = z.enum([
  'active',
  'inactive',
  'failed',
  'activating',
  'deactivating',
  'unknown',
]);
export type ServiceStatus = z.infer<typeof ServiceStatus>;

export const UnitType = z.enum(['service', 'socket', 'timer', 'mount', 'target', 'other']);
export type UnitType = z.infer<typeof UnitType>;

export const CategoryLabel = z.enum([
  'system-core',
  'networking',
  'media',
  'security',
  'development',
  'monitoring',
  'storage',
  'other',
]);
export type CategoryLabel = z.infer<typeof CategoryLabel>;

/** Which fallback tier supplied a unit's educational description */
export const EducationSource = z.enum(['unit', 'category', 'generic']);
export type EducationSource = z.infer<typeof EducationSource>;

export const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

/** Unit file suffixes systemd recognises; a bare name resolves to `.service` */
export const UNIT_SUFFIXES = [
  'service',
  'socket',
  'device',
  'mount',
  'automount',
  'swap',
  'target',
  'path',
  'timer',
  'slice',
  'scope',
] as const;

/** Default HTTP port */
export const DEFAULT_SERVER_PORT = 5000;

/** Default ceiling on a single systemctl invocation in milliseconds */
export const DEFAULT_SYSTEMCTL_TIMEOUT_MS = 10_000;
