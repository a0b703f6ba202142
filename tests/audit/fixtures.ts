/**
 * Test fixtures shaped like `maas <profile> machines read` output
 */

import { MaasMachine, parseMachine } from '../../src/audit/types/machine';

export const TB = 1_000_000_000_000;

export interface RawDisk {
  id: number;
  name: string;
  size: number;
  tags: string[];
}

export function rawDisk(id: number, name: string, size: number, tags: string[] = ['ssd']): RawDisk {
  return { id, name, size, tags };
}

export function rawNic(name: string, linkSpeed: number | null, interfaceSpeed: number | null = 10000, enabled = true) {
  return {
    name,
    enabled,
    interface_speed: interfaceSpeed,
    link_speed: linkSpeed
  };
}

/**
 * Raw machine record; the boot disk is repeated in blockdevice_set as MAAS does
 */
export function rawMachine(
  hostname: string,
  bootDisk: RawDisk | null,
  otherDisks: RawDisk[] = [],
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    system_id: `sys-${hostname}`,
    hostname,
    fqdn: `${hostname}.maas`,
    tag_names: [],
    boot_disk: bootDisk,
    blockdevice_set: bootDisk ? [bootDisk, ...otherDisks] : otherDisks,
    interface_set: [],
    ...overrides
  };
}

export function machine(
  hostname: string,
  bootDisk: RawDisk | null,
  otherDisks: RawDisk[] = [],
  overrides: Record<string, unknown> = {}
): MaasMachine {
  return parseMachine(rawMachine(hostname, bootDisk, otherDisks, overrides));
}
