/**
 * Storage checks
 *
 * A machine meets the storage requirement when its boot disk is an SSD of at
 * least the configured size and at least one other SSD of that size exists.
 */

import { MaasBlockDevice, MaasMachine } from '../types/machine';

export enum DiskCategory {
  NO_CHANGE_NEEDED = 'no_change_needed',
  NEED_BOOT_DISK_REPLACEMENT = 'need_boot_disk_replacement',
  NEED_SECOND_DISK_REPLACEMENT = 'need_second_disk_replacement',
  NEED_SECOND_DISK_ADDITION = 'need_second_disk_addition',
  NEED_BOTH_BOOT_AND_SECOND_DISK = 'need_both_boot_and_second_disk'
}

/** Summary print order */
export const DISK_CATEGORY_ORDER: readonly DiskCategory[] = [
  DiskCategory.NO_CHANGE_NEEDED,
  DiskCategory.NEED_BOOT_DISK_REPLACEMENT,
  DiskCategory.NEED_SECOND_DISK_REPLACEMENT,
  DiskCategory.NEED_SECOND_DISK_ADDITION,
  DiskCategory.NEED_BOTH_BOOT_AND_SECOND_DISK
];

export interface BootDiskAnalysis {
  id: number | null;
  size: number;
  isSsd: boolean;

  /** SSD at or above the size threshold */
  isLargeSsd: boolean;

  /** One-line description for the report */
  info: string;
}

export interface BlockDeviceAnalysis {
  /** Non-boot SSDs at or above the size threshold */
  additionalLargeSsds: number;

  /** A non-boot SSD exists but is below the threshold */
  hasSmallNonBootSsd: boolean;

  deviceInfo: string[];
}

export interface DiskAnalysis {
  bootDisk: BootDiskAnalysis;
  blockDevices: BlockDeviceAnalysis;
  category: DiskCategory;
}

const TIB = 1024 ** 4;
const TB = 1000 ** 4;

export function formatSize(sizeBytes: number): string {
  return `${(sizeBytes / TIB).toFixed(2)} TiB (${(sizeBytes / TB).toFixed(2)} TB)`;
}

function isSsd(device: MaasBlockDevice): boolean {
  return device.tags.includes('ssd');
}

export function analyzeBootDisk(machine: MaasMachine, minSizeBytes: number): BootDiskAnalysis {
  const bootDisk = machine.bootDisk;
  if (bootDisk === null) {
    return {
      id: null,
      size: 0,
      isSsd: false,
      isLargeSsd: false,
      info: 'No boot disk information available'
    };
  }

  const ssd = isSsd(bootDisk);
  const diskType = ssd ? 'ssd' : 'not ssd';

  return {
    id: bootDisk.id,
    size: bootDisk.size,
    isSsd: ssd,
    isLargeSsd: ssd && bootDisk.size >= minSizeBytes,
    info: `${bootDisk.name ?? 'unknown'} - ${formatSize(bootDisk.size)} (${diskType})`
  };
}

export function analyzeBlockDevices(
  machine: MaasMachine,
  bootDiskId: number | null,
  minSizeBytes: number
): BlockDeviceAnalysis {
  const result: BlockDeviceAnalysis = {
    additionalLargeSsds: 0,
    hasSmallNonBootSsd: false,
    deviceInfo: []
  };

  if (machine.blockDevices === null) {
    return result;
  }

  for (const device of machine.blockDevices) {
    const ssd = isSsd(device);
    const deviceType = ssd ? 'ssd' : device.tags.includes('rotary') ? 'rotary' : 'unknown';

    result.deviceInfo.push(`${device.name ?? 'unnamed'}: ${formatSize(device.size)} (${deviceType})`);

    // The boot disk also appears in blockdevice_set
    if (device.id === bootDiskId || !ssd) {
      continue;
    }

    if (device.size >= minSizeBytes) {
      result.additionalLargeSsds += 1;
    } else {
      result.hasSmallNonBootSsd = true;
    }
  }

  return result;
}

export function meetsDiskRequirements(bootDisk: BootDiskAnalysis, blockDevices: BlockDeviceAnalysis): boolean {
  return bootDisk.isLargeSsd && blockDevices.additionalLargeSsds >= 1;
}

export function categorizeMachine(bootDisk: BootDiskAnalysis, blockDevices: BlockDeviceAnalysis): DiskCategory {
  const hasSecondLargeSsd = blockDevices.additionalLargeSsds >= 1;

  if (bootDisk.isLargeSsd && hasSecondLargeSsd) {
    return DiskCategory.NO_CHANGE_NEEDED;
  }

  if (hasSecondLargeSsd) {
    return DiskCategory.NEED_BOOT_DISK_REPLACEMENT;
  }

  if (bootDisk.isLargeSsd) {
    return blockDevices.hasSmallNonBootSsd
      ? DiskCategory.NEED_SECOND_DISK_REPLACEMENT
      : DiskCategory.NEED_SECOND_DISK_ADDITION;
  }

  return DiskCategory.NEED_BOTH_BOOT_AND_SECOND_DISK;
}

export function analyzeMachineDisks(machine: MaasMachine, minSizeBytes: number): DiskAnalysis {
  const bootDisk = analyzeBootDisk(machine, minSizeBytes);
  const blockDevices = analyzeBlockDevices(machine, bootDisk.id, minSizeBytes);

  return {
    bootDisk,
    blockDevices,
    category: categorizeMachine(bootDisk, blockDevices)
  };
}
