import type { CriticalServiceEntry, CriticalServiceStatus, ServiceUnit } from '@homelab/shared';

/**
 * Joins the critical allow-list with live units by exact name. Every entry
 * appears once, in allow-list order; a unit that is absent (or that systemd
 * reports as not-found) is kept with status `unknown`.
 *
 * `list-units --all` only sees loaded units, so absence means "not loaded",
 * not "not installed": a disabled unit nothing depends on is absent too.
 */
export function resolveCritical(
  units: readonly ServiceUnit[],
  critical: readonly CriticalServiceEntry[],
): Record<string, CriticalServiceStatus> {
  const byName = new Map(units.map((unit) => [unit.name, unit]));
  const result: Record<string, CriticalServiceStatus> = {};

  for (const entry of critical) {
    const unit = byName.get(entry.name);

    if (unit && unit.loadState !== 'not-found') {
      result[entry.name] = {
        status: unit.status,
        isCritical: true,
        found: true,
        importance: entry.importance,
        troubleshooting: entry.troubleshooting,
        loadState: unit.loadState,
        activeState: unit.activeState,
        subState: unit.subState,
      };
      continue;
    }

    const reason = unit
      ? `${entry.name} has no unit file on this host.`
      : `${entry.name} is not loaded on this host; it may be disabled or not installed.`;
    result[entry.name] = {
      status: 'unknown',
      isCritical: true,
      found: false,
      importance: entry.importance,
      troubleshooting: `${reason} ${entry.troubleshooting}`,
      loadState: unit?.loadState,
    };
  }

  return result;
}
