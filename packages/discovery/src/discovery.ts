import type {
  CategoryLabel,
  CriticalPrimer,
  CriticalServiceStatus,
  DiscoveryRules,
  EnrichedService,
  ServiceSummary,
  ServiceUnit,
  SystemdPrimer,
} from '@homelab/shared';
import { type Classifier, createClassifier } from './classifier.js';
import { resolveCritical } from './critical.js';
import { type Educator, createEducator } from './educator.js';
import { DiscoveryUnavailable } from './errors.js';
import type { UnitSource } from './types.js';

/** Sparse: categories with no members are absent */
export type ServicesByCategory = Partial<Record<CategoryLabel, EnrichedService[]>>;

export interface ServicesOverview {
  services: EnrichedService[];
  summary: ServiceSummary;
}

export function groupByCategory(services: readonly EnrichedService[]): ServicesByCategory {
  const groups: ServicesByCategory = {};
  for (const service of services) {
    const group = groups[service.category];
    if (group) {
      group.push(service);
    } else {
      groups[service.category] = [service];
    }
  }
  return groups;
}

export function summarizeServices(services: readonly EnrichedService[]): ServiceSummary {
  const summary: ServiceSummary = {
    total: services.length,
    active: 0,
    inactive: 0,
    failed: 0,
    activating: 0,
    deactivating: 0,
    unknown: 0,
    masked: 0,
  };
  for (const service of services) {
    summary[service.status] += 1;
    if (service.loadState === 'masked') summary.masked += 1;
  }
  return summary;
}

/**
 * Read-only queries over the host's systemd units. Every call enumerates
 * afresh; nothing is cached between calls.
 */
export class ServiceDiscovery {
  private source: UnitSource;
  private rules: DiscoveryRules;
  private classify: Classifier;
  private educate: Educator;

  constructor(source: UnitSource, rules: DiscoveryRules) {
    this.source = source;
    this.rules = rules;
    this.classify = createClassifier(rules);
    this.educate = createEducator(rules.education);
  }

  /** Every enumerated unit with its category and educational text */
  async getAllServices(): Promise<EnrichedService[]> {
    const units = await this.enumerate();
    return units.map((unit) => this.enrich(unit));
  }

  async getServicesByCategory(): Promise<ServicesByCategory> {
    return groupByCategory(await this.getAllServices());
  }

  /** The critical allow-list joined with live state, in allow-list order */
  async getCriticalServices(): Promise<Record<string, CriticalServiceStatus>> {
    const units = await this.enumerate();
    return resolveCritical(units, this.rules.critical);
  }

  /** All services plus status counts, from a single enumeration */
  async getServiceSummary(): Promise<ServicesOverview> {
    const services = await this.getAllServices();
    return { services, summary: summarizeServices(services) };
  }

  describeCategories(labels: Iterable<CategoryLabel>): Partial<Record<CategoryLabel, string>> {
    const descriptions: Partial<Record<CategoryLabel, string>> = {};
    for (const label of labels) {
      descriptions[label] = this.rules.categoryDescriptions[label];
    }
    return descriptions;
  }

  /** Background on systemd itself; undefined when the rules carry no primer */
  systemdPrimer(): SystemdPrimer | undefined {
    return this.rules.primer?.systemd;
  }

  criticalPrimer(): CriticalPrimer | undefined {
    return this.rules.primer?.critical;
  }

  enrich(unit: ServiceUnit): EnrichedService {
    const category = this.classify(unit);
    const education = this.educate(unit, category);
    return {
      name: unit.name,
      status: unit.status,
      type: unit.unitType,
      category,
      description: education.description,
      importance: education.importance,
      troubleshooting: education.troubleshooting,
      educationSource: education.source,
      loadState: unit.loadState,
      activeState: unit.activeState,
      subState: unit.subState,
      unitDescription: unit.description,
    };
  }

  private async enumerate(): Promise<ServiceUnit[]> {
    try {
      return await this.source.listUnits();
    } catch (error) {
      if (error instanceof DiscoveryUnavailable) throw error;
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new DiscoveryUnavailable(`Unit enumeration failed: ${message}`, { cause: error });
    }
  }
}
