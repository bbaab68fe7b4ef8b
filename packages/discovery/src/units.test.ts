import { describe, expect, it } from 'vitest';
import { unitBaseName, unitTypeOf } from './units.js';

describe('unitTypeOf', () => {
  it.each([
    ['nginx.service', 'service'],
    ['docker.socket', 'socket'],
    ['apt-daily.timer', 'timer'],
    ['mnt-media.mount', 'mount'],
    ['multi-user.target', 'target'],
    ['dev-sda.device', 'other'],
    ['user.slice', 'other'],
    ['nginx', 'other'],
  ])('%s is a %s unit', (name, expected) => {
    expect(unitTypeOf(name)).toBe(expected);
  });

  it('does not treat a leading dot as a suffix', () => {
    expect(unitTypeOf('.service')).toBe('other');
  });
});

describe('unitBaseName', () => {
  it('strips a known suffix and lowercases', () => {
    expect(unitBaseName('NetworkManager.service')).toBe('networkmanager');
    expect(unitBaseName('pihole-FTL.service')).toBe('pihole-ftl');
    expect(unitBaseName('mnt-media.mount')).toBe('mnt-media');
  });

  it('keeps dots that are not unit suffixes', () => {
    expect(unitBaseName('org.freedesktop.Avahi')).toBe('org.freedesktop.avahi');
    expect(unitBaseName('systemd-fsck@dev-disk.service')).toBe('systemd-fsck@dev-disk');
  });
});
