import { z } from 'zod';
import { CategoryLabel, UNIT_SUFFIXES, UnitType } from '../types/common.js';

const KNOWN_SUFFIXES: ReadonlySet<string> = new Set(UNIT_SUFFIXES);

/**
 * Appends `.service` to a bare unit name, the way systemctl resolves it.
 * Names that already carry a known unit suffix are returned unchanged.
 */
export function normalizeUnitName(name: string): string {
  const trimmed = name.trim();
  const dot = trimmed.lastIndexOf('.');
  if (dot > 0) {
    const suffix = trimmed.slice(dot + 1);
    if (KNOWN_SUFFIXES.has(suffix)) return trimmed;
  }
  return `${trimmed}.service`;
}

/** Text attached to a unit: what it is, why it matters, what to check */
export const EducationalText = z.object({
  description: z.string().trim().min(1),
  importance: z.string().trim().min(1),
  troubleshooting: z.string().trim().min(1),
});
export type EducationalText = z.infer<typeof EducationalText>;

export const PartialEducationalText = EducationalText.partial();
export type PartialEducationalText = z.infer<typeof PartialEducationalText>;

/** Name pattern → category. Patterns are matched case-insensitively. */
export const ClassificationRule = z.object({
  pattern: z
    .string()
    .trim()
    .min(1)
    .transform((p) => p.toLowerCase()),
  category: CategoryLabel,
  /** "contains" (default) or "prefix" match against the unit's base name */
  match: z.enum(['contains', 'prefix']).default('contains'),
  /** Restricts the rule to units of one type */
  unitType: UnitType.optional(),
});
export type ClassificationRule = z.infer<typeof ClassificationRule>;

/** A curated critical service with operator-written guidance */
export const CriticalServiceEntry = z.object({
  name: z.string().trim().min(1).transform(normalizeUnitName),
  importance: z.string().trim().min(1),
  troubleshooting: z.string().trim().min(1),
});
export type CriticalServiceEntry = z.infer<typeof CriticalServiceEntry>;

const description = z.string().trim().min(1);

export const CategoryDescriptions = z.object({
  'system-core': description,
  networking: description,
  media: description,
  security: description,
  development: description,
  monitoring: description,
  storage: description,
  other: description,
});
export type CategoryDescriptions = z.infer<typeof CategoryDescriptions>;

/** Host-independent background on systemd shown beside the service list */
export const SystemdPrimer = z.object({
  whatIsSystemd: description,
  whatAreServices: description,
  /** Plain-language meaning of the states a reader meets in the list */
  serviceStates: z.object({
    active: description,
    inactive: description,
    failed: description,
    masked: description,
  }),
  learningCommands: z.array(description).default([]),
});
export type SystemdPrimer = z.infer<typeof SystemdPrimer>;

export const CriticalPrimer = z.object({
  whatAreCriticalServices: description,
  whyMonitorThem: description,
  learningObjective: description,
});
export type CriticalPrimer = z.infer<typeof CriticalPrimer>;

/**
 * Static rule tables consumed by discovery: classification patterns,
 * educational text and the ordered critical-service allow-list.
 */
export const DiscoveryRules = z.object({
  /** Ordered name rules; longer patterns are always tried first */
  classification: z.array(ClassificationRule),
  /** Category for units no name rule matched, by unit type */
  typeDefaults: z.record(UnitType, CategoryLabel).default({}),
  education: z.object({
    /** Overrides keyed by unit base name, e.g. "nginx" for nginx.service */
    units: z
      .record(z.string(), PartialEducationalText)
      .default({})
      .superRefine((units, ctx) => {
        const seen = new Map<string, string>();
        for (const key of Object.keys(units)) {
          const normalized = key.trim().toLowerCase();
          const previous = seen.get(normalized);
          if (previous !== undefined) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [key],
              message: `Unit override "${key}" collides with "${previous}"`,
            });
          } else {
            seen.set(normalized, key);
          }
        }
      })
      .transform((units) =>
        Object.fromEntries(
          Object.entries(units).map(([key, text]) => [key.trim().toLowerCase(), text]),
        ),
      ),
    categories: z.record(CategoryLabel, EducationalText).default({}),
    generic: EducationalText,
  }),
  categoryDescriptions: CategoryDescriptions,
  /** Optional background text returned with the service and critical views */
  primer: z
    .object({
      systemd: SystemdPrimer,
      critical: CriticalPrimer,
    })
    .optional(),
  /** Declared order is the operator's priority order */
  critical: z.array(CriticalServiceEntry).superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `Duplicate critical service "${entry.name}"`,
        });
      }
      seen.add(entry.name);
    });
  }),
});
export type DiscoveryRules = z.infer<typeof DiscoveryRules>;
