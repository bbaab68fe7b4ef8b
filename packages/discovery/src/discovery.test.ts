import type { ServiceUnit } from '@homelab/shared';
import { describe, expect, it, vi } from 'vitest';
import { ServiceDiscovery, groupByCategory, summarizeServices } from './discovery.js';
import { DiscoveryUnavailable } from './errors.js';
import { parseDiscoveryRules } from './rules.js';
import type { UnitSource } from './types.js';
import { unitTypeOf } from './units.js';

const rules = parseDiscoveryRules({
  classification: [
    { pattern: 'nginx', category: 'networking' },
    { pattern: 'plex', category: 'media' },
    { pattern: 'fail2ban', category: 'security' },
    { pattern: 'ssh', category: 'security' },
  ],
  education: {
    units: { nginx: { description: 'Reverse proxy.' } },
    categories: {
      networking: {
        description: 'Networking service.',
        importance: 'Reachability.',
        troubleshooting: '{{name}}: {{subState}}',
      },
      security: {
        description: 'Security service.',
        importance: 'Protection.',
        troubleshooting: 'Check {{name}}.',
      },
    },
    generic: {
      description: 'System service: purpose not yet documented.',
      importance: 'Unknown.',
      troubleshooting: 'Check {{name}}.',
    },
  },
  categoryDescriptions: {
    'system-core': 'Core services',
    networking: 'Network services',
    media: 'Media services',
    security: 'Security services',
    development: 'Development services',
    monitoring: 'Monitoring services',
    storage: 'Storage services',
    other: 'Everything else',
  },
  critical: [
    { name: 'nginx.service', importance: 'Proxy', troubleshooting: 'Run nginx -t.' },
    { name: 'plex.service', importance: 'Media', troubleshooting: 'Check mounts.' },
  ],
});

function unit(name: string, overrides: Partial<ServiceUnit> = {}): ServiceUnit {
  return {
    name,
    status: 'active',
    unitType: unitTypeOf(name),
    loadState: 'loaded',
    activeState: 'active',
    subState: 'running',
    ...overrides,
  };
}

function createMockSource(units: ServiceUnit[]): UnitSource {
  return { listUnits: vi.fn().mockResolvedValue(units) };
}

function createFailingSource(error: unknown): UnitSource {
  return { listUnits: vi.fn().mockRejectedValue(error) };
}

const liveUnits = [
  unit('nginx.service', { description: 'A high performance web server' }),
  unit('fail2ban.service'),
  unit('xyz-custom-daemon.service', { status: 'failed', activeState: 'failed', subState: 'failed' }),
  unit('sshd.service', { status: 'inactive', activeState: 'inactive', subState: 'dead' }),
  unit('old.service', { status: 'inactive', loadState: 'masked', activeState: 'inactive' }),
];

describe('ServiceDiscovery', () => {
  it('enriches every unit in enumeration order', async () => {
    const discovery = new ServiceDiscovery(createMockSource(liveUnits), rules);

    const services = await discovery.getAllServices();

    expect(services.map((s) => s.name)).toEqual(liveUnits.map((u) => u.name));
    expect(services[0]).toEqual({
      name: 'nginx.service',
      status: 'active',
      type: 'service',
      category: 'networking',
      description: 'Reverse proxy.',
      importance: 'Reachability.',
      troubleshooting: 'nginx.service: running',
      educationSource: 'unit',
      loadState: 'loaded',
      activeState: 'active',
      subState: 'running',
      unitDescription: 'A high performance web server',
    });
    expect(services[1]).toMatchObject({
      category: 'security',
      description: 'Security service.',
      educationSource: 'category',
    });
    expect(services[2]).toMatchObject({
      category: 'other',
      status: 'failed',
      description: 'System service: purpose not yet documented.',
      educationSource: 'generic',
    });
  });

  it('groups services sparsely by category', async () => {
    const discovery = new ServiceDiscovery(createMockSource(liveUnits), rules);

    const groups = await discovery.getServicesByCategory();

    expect(Object.keys(groups).sort()).toEqual(['networking', 'other', 'security']);
    expect(groups.security?.map((s) => s.name)).toEqual(['fail2ban.service', 'sshd.service']);
    expect(groups.other?.map((s) => s.name)).toEqual(['xyz-custom-daemon.service', 'old.service']);
    expect(groups.media).toBeUndefined();
  });

  it('partitions services without losing or duplicating any', async () => {
    const discovery = new ServiceDiscovery(createMockSource(liveUnits), rules);

    const all = await discovery.getAllServices();
    const groups = await discovery.getServicesByCategory();
    const flattened = Object.values(groups).flat();

    expect(flattened).toHaveLength(all.length);
    expect(flattened.map((s) => s.name).sort()).toEqual(all.map((s) => s.name).sort());
  });

  it('resolves critical services in allow-list order', async () => {
    const discovery = new ServiceDiscovery(
      createMockSource([unit('nginx.service', { activeState: 'active' })]),
      rules,
    );

    const critical = await discovery.getCriticalServices();

    expect(Object.keys(critical)).toEqual(['nginx.service', 'plex.service']);
    expect(critical['nginx.service']?.status).toBe('active');
    expect(critical['plex.service']?.status).toBe('unknown');
    expect(critical['plex.service']?.found).toBe(false);
  });

  it('summarises status counts from one enumeration', async () => {
    const source = createMockSource(liveUnits);
    const discovery = new ServiceDiscovery(source, rules);

    const overview = await discovery.getServiceSummary();

    expect(source.listUnits).toHaveBeenCalledTimes(1);
    expect(overview.services).toHaveLength(5);
    expect(overview.summary).toEqual({
      total: 5,
      active: 2,
      inactive: 2,
      failed: 1,
      activating: 0,
      deactivating: 0,
      unknown: 0,
      masked: 1,
    });
  });

  it('enumerates afresh on every call', async () => {
    const source = createMockSource(liveUnits);
    const discovery = new ServiceDiscovery(source, rules);

    await discovery.getAllServices();
    await discovery.getServicesByCategory();
    await discovery.getCriticalServices();

    expect(source.listUnits).toHaveBeenCalledTimes(3);
  });

  it('fails every operation with the enumerator error', async () => {
    const error = new DiscoveryUnavailable('systemctl list-units failed: Permission denied');
    const discovery = new ServiceDiscovery(createFailingSource(error), rules);

    await expect(discovery.getAllServices()).rejects.toBe(error);
    await expect(discovery.getServicesByCategory()).rejects.toBe(error);
    await expect(discovery.getCriticalServices()).rejects.toBe(error);
    await expect(discovery.getServiceSummary()).rejects.toBe(error);
  });

  it('wraps unexpected source errors in DiscoveryUnavailable', async () => {
    const cause = new Error('bus closed');
    const discovery = new ServiceDiscovery(createFailingSource(cause), rules);

    await expect(discovery.getCriticalServices()).rejects.toMatchObject({
      name: 'DiscoveryUnavailable',
      message: 'Unit enumeration failed: bus closed',
      cause,
    });
  });

  it('has no primer when the rules carry none', () => {
    const discovery = new ServiceDiscovery(createMockSource([]), rules);

    expect(discovery.systemdPrimer()).toBeUndefined();
    expect(discovery.criticalPrimer()).toBeUndefined();
  });

  it('describes only the requested categories', () => {
    const discovery = new ServiceDiscovery(createMockSource([]), rules);

    expect(discovery.describeCategories(['security', 'other'])).toEqual({
      security: 'Security services',
      other: 'Everything else',
    });
  });
});

describe('groupByCategory', () => {
  it('returns an empty mapping for no services', () => {
    expect(groupByCategory([])).toEqual({});
  });
});

describe('summarizeServices', () => {
  it('counts zero everywhere for no services', () => {
    expect(summarizeServices([])).toEqual({
      total: 0,
      active: 0,
      inactive: 0,
      failed: 0,
      activating: 0,
      deactivating: 0,
      unknown: 0,
      masked: 0,
    });
  });
});
