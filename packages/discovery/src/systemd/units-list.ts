import type { ServiceStatus, ServiceUnit, UnitType } from '@homelab/shared';
import { z } from 'zod';
import { DiscoveryUnavailable, UnitParseIncomplete } from '../errors.js';
import { type Logger, logger as defaultLogger } from '../logger.js';
import type { ExecFn, UnitSource } from '../types.js';
import { unitTypeOf } from '../units.js';

export interface ListUnitsOptions {
  /** Types passed to `--type=`; empty lists every type */
  unitTypes?: readonly Exclude<UnitType, 'other'>[];
  logger?: Logger;
}

/** systemd ActiveState → normalised status */
const ACTIVE_STATES: ReadonlyMap<string, ServiceStatus> = new Map<string, ServiceStatus>([
  ['active', 'active'],
  ['reloading', 'active'],
  ['refreshing', 'active'],
  ['inactive', 'inactive'],
  ['failed', 'failed'],
  ['activating', 'activating'],
  ['deactivating', 'deactivating'],
  ['maintenance', 'unknown'],
]);

const UnitName = z.object({ unit: z.string().trim().min(1) });

const UnitStateFields = z.object({
  load: z.string().optional(),
  active: z.string().optional(),
  sub: z.string().optional(),
  description: z.string().optional(),
});

export function listUnitsArgs(unitTypes: readonly string[]): string[] {
  const args = ['list-units'];
  if (unitTypes.length > 0) args.push(`--type=${unitTypes.join(',')}`);
  args.push('--all', '--no-pager', '--output=json');
  return args;
}

/**
 * Runs `systemctl list-units --all --no-pager --output=json` and parses
 * the JSON output. Any failure of the call itself is a DiscoveryUnavailable.
 */
export async function listUnits(
  exec: ExecFn,
  options: ListUnitsOptions = {},
): Promise<ServiceUnit[]> {
  const args = listUnitsArgs(options.unitTypes ?? ['service']);

  let stdout: string;
  try {
    stdout = await exec('systemctl', args);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new DiscoveryUnavailable(`systemctl list-units failed: ${message}`, { cause: error });
  }

  return parseUnitsList(stdout, options.logger ?? defaultLogger);
}

export function parseUnitsList(stdout: string, log: Logger = defaultLogger): ServiceUnit[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    throw new DiscoveryUnavailable('systemctl list-units returned output that is not JSON', {
      cause: error,
    });
  }
  if (!Array.isArray(raw)) {
    throw new DiscoveryUnavailable('systemctl list-units returned JSON that is not a unit list');
  }

  const units: ServiceUnit[] = [];

  raw.forEach((entry: unknown, index) => {
    const named = UnitName.safeParse(entry);
    if (!named.success) {
      log.warn({ index }, 'Skipping unit entry without a name');
      return;
    }

    const name = named.data.unit;
    try {
      units.push(parseUnitEntry(name, entry));
    } catch (error) {
      if (!(error instanceof UnitParseIncomplete)) throw error;
      log.debug({ unit: name, reason: error.message }, 'Unit status incomplete, reporting unknown');
      units.push(unknownUnit(name, entry));
    }
  });

  return units;
}

function parseUnitEntry(name: string, entry: unknown): ServiceUnit {
  const fields = UnitStateFields.safeParse(entry);
  if (!fields.success) {
    throw new UnitParseIncomplete(name, 'state fields are not strings');
  }

  const { load, active, sub, description } = fields.data;
  if (active === undefined || active === '') {
    throw new UnitParseIncomplete(name, 'missing active state');
  }
  const status = ACTIVE_STATES.get(active);
  if (status === undefined) {
    throw new UnitParseIncomplete(name, `unrecognised active state "${active}"`);
  }

  const unit: ServiceUnit = {
    name,
    status,
    unitType: unitTypeOf(name),
    loadState: load,
    activeState: active,
    subState: sub,
    description,
  };
  return Object.freeze(unit);
}

/** Keeps whichever raw fields are usable strings */
function unknownUnit(name: string, entry: unknown): ServiceUnit {
  const field = (key: string): string | undefined => {
    if (typeof entry !== 'object' || entry === null) return undefined;
    const value: unknown = Reflect.get(entry, key);
    return typeof value === 'string' && value !== '' ? value : undefined;
  };

  const unit: ServiceUnit = {
    name,
    status: 'unknown',
    unitType: unitTypeOf(name),
    loadState: field('load'),
    activeState: field('active'),
    subState: field('sub'),
    description: field('description'),
  };
  return Object.freeze(unit);
}

/** Unit source backed by the local systemctl */
export function createSystemdUnitSource(exec: ExecFn, options: ListUnitsOptions = {}): UnitSource {
  return {
    listUnits: () => listUnits(exec, options),
  };
}
