import { UNIT_SUFFIXES, UnitType } from '@homelab/shared';

const KNOWN_SUFFIXES: ReadonlySet<string> = new Set(UNIT_SUFFIXES);

function suffixOf(name: string): string | undefined {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1) : undefined;
}

/** `nginx.service` → service, `dev-sda.device` → other */
export function unitTypeOf(name: string): UnitType {
  const parsed = UnitType.safeParse(suffixOf(name));
  return parsed.success ? parsed.data : 'other';
}

/** Unit name without its type suffix, lowercased: `NetworkManager.service` → networkmanager */
export function unitBaseName(name: string): string {
  const suffix = suffixOf(name);
  if (suffix !== undefined && KNOWN_SUFFIXES.has(suffix)) {
    return name.slice(0, name.length - suffix.length - 1).toLowerCase();
  }
  return name.toLowerCase();
}
