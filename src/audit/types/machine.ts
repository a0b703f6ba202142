/**
 * MAAS inventory records
 * Shapes of the `machines read` payload, narrowed from untrusted JSON
 */

export interface MaasBlockDevice {
  /** Block device ID */
  id: number | null;

  /** Kernel device name, e.g. sda or nvme0n1 */
  name: string | null;

  /** Size in bytes */
  size: number;

  /** MAAS tags (ssd, rotary, removable...) */
  tags: string[];
}

export interface MaasInterface {
  name: string | null;
  enabled: boolean;

  /** Maximum supported speed in Mbps */
  interfaceSpeed: number | null;

  /** Negotiated link speed in Mbps, 0 or null when down */
  linkSpeed: number | null;
}

export interface MaasMachine {
  systemId: string | null;
  hostname: string | null;
  fqdn: string | null;

  /** Configured boot disk, null when MAAS has not reported one */
  bootDisk: MaasBlockDevice | null;

  /** null when the record has no blockdevice_set */
  blockDevices: MaasBlockDevice[] | null;

  /** null when the record has no interface_set */
  interfaces: MaasInterface[] | null;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: JsonObject, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' ? value : null;
}

function readNumber(record: JsonObject, key: string): number | null {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function readStringArray(record: JsonObject, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function readObjectArray(record: JsonObject, key: string): JsonObject[] | null {
  const value = record[key];
  if (!Array.isArray(value)) {
    return null;
  }
  return value.filter(isObject);
}

export function parseBlockDevice(record: JsonObject): MaasBlockDevice {
  return {
    id: readNumber(record, 'id'),
    name: readString(record, 'name'),
    size: readNumber(record, 'size') ?? 0,
    tags: readStringArray(record, 'tags')
  };
}

export function parseInterface(record: JsonObject): MaasInterface {
  return {
    name: readString(record, 'name'),
    enabled: record.enabled === true,
    interfaceSpeed: readNumber(record, 'interface_speed'),
    linkSpeed: readNumber(record, 'link_speed')
  };
}

export function parseMachine(record: JsonObject): MaasMachine {
  const bootDisk = record.boot_disk;

  return {
    systemId: readString(record, 'system_id'),
    hostname: readString(record, 'hostname'),
    fqdn: readString(record, 'fqdn'),
    bootDisk: isObject(bootDisk) ? parseBlockDevice(bootDisk) : null,
    blockDevices: readObjectArray(record, 'blockdevice_set')?.map(parseBlockDevice) ?? null,
    interfaces: readObjectArray(record, 'interface_set')?.map(parseInterface) ?? null
  };
}

/**
 * Parse the decoded `machines read` payload.
 * Returns null when the top level is not a list; non-object entries are dropped.
 */
export function parseMachineList(payload: unknown): MaasMachine[] | null {
  if (!Array.isArray(payload)) {
    return null;
  }
  return payload.filter(isObject).map(parseMachine);
}

export function getMachineName(machine: MaasMachine): string {
  return machine.hostname ?? machine.fqdn ?? machine.systemId ?? 'unknown';
}
