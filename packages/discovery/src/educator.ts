import type {
  CategoryLabel,
  DiscoveryRules,
  EducationSource,
  EducationalContext,
  EducationalText,
  PartialEducationalText,
  ServiceUnit,
} from '@homelab/shared';
import { unitBaseName } from './units.js';

export type Educator = (unit: ServiceUnit, category: CategoryLabel) => EducationalContext;

type TextField = keyof EducationalText;

interface Tier {
  source: EducationSource;
  text: PartialEducationalText | undefined;
}

const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g;

function templateValues(unit: ServiceUnit): Record<string, string | undefined> {
  return {
    name: unit.name,
    status: unit.status,
    activeState: unit.activeState,
    subState: unit.subState,
    loadState: unit.loadState,
    description: unit.description,
  };
}

/**
 * Replaces `{{key}}` with the unit's value. Known keys with no value render
 * as "unknown"; unknown keys are left as written.
 */
export function renderTemplate(
  template: string,
  values: Record<string, string | undefined>,
): string {
  return template
    .replace(PLACEHOLDER, (match, key: string) => {
      if (!Object.hasOwn(values, key)) return match;
      const value = values[key]?.trim();
      return value ? value : 'unknown';
    })
    .trim();
}

function resolveField(
  field: TextField,
  tiers: readonly Tier[],
  generic: EducationalText,
  values: Record<string, string | undefined>,
): { text: string; source: EducationSource } {
  for (const tier of tiers) {
    const template = tier.text?.[field];
    if (template === undefined) continue;
    const text = renderTemplate(template, values);
    if (text) return { text, source: tier.source };
  }
  return { text: renderTemplate(generic[field], values), source: 'generic' };
}

/**
 * Attaches explanatory text to a unit. Each field is looked up in order:
 * the unit's own override, its category template, then the generic template.
 */
export function createEducator(education: DiscoveryRules['education']): Educator {
  return (unit, category) => {
    const baseName = unitBaseName(unit.name);
    const tiers: Tier[] = [
      {
        source: 'unit',
        text: Object.hasOwn(education.units, baseName) ? education.units[baseName] : undefined,
      },
      { source: 'category', text: category === 'other' ? undefined : education.categories[category] },
    ];
    const values = templateValues(unit);

    const description = resolveField('description', tiers, education.generic, values);
    const importance = resolveField('importance', tiers, education.generic, values);
    const troubleshooting = resolveField('troubleshooting', tiers, education.generic, values);

    return {
      description: description.text,
      importance: importance.text,
      troubleshooting: troubleshooting.text,
      source: description.source,
    };
  };
}
