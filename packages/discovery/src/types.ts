import type { ServiceUnit } from '@homelab/shared';

/** Function that executes a command and returns stdout */
export type ExecFn = (command: string, args: string[]) => Promise<string>;

/** Produces the host's current unit list; rejects with DiscoveryUnavailable */
export interface UnitSource {
  listUnits(): Promise<ServiceUnit[]>;
}
