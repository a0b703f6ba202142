/**
 * Disk remediation report
 */

import { getMachineName, MaasMachine } from '../types/machine';
import {
  analyzeMachineDisks,
  DISK_CATEGORY_ORDER,
  DiskAnalysis,
  DiskCategory,
  meetsDiskRequirements
} from '../disk/disk-analyzer';
import { checkMark, formatSizeLabel, heading, RULE_WIDTH, yesNo } from './format';

export type DiskCategoryGroups = Record<DiskCategory, string[]>;

export interface DiskReport {
  categories: DiskCategoryGroups;
  lines: string[];
}

function summaryTitle(category: DiskCategory, sizeLabel: string): string {
  switch (category) {
    case DiskCategory.NO_CHANGE_NEEDED:
      return 'NO CHANGES NEEDED';
    case DiskCategory.NEED_BOOT_DISK_REPLACEMENT:
      return `REPLACE BOOT DISK with ${sizeLabel}+ SSD`;
    case DiskCategory.NEED_SECOND_DISK_REPLACEMENT:
      return `REPLACE SECOND DISK with ${sizeLabel}+ SSD`;
    case DiskCategory.NEED_SECOND_DISK_ADDITION:
      return `ADD SECOND ${sizeLabel}+ SSD`;
    case DiskCategory.NEED_BOTH_BOOT_AND_SECOND_DISK:
      return 'REPLACE BOOT DISK + ADD/REPLACE SECOND DISK';
  }
}

export function emptyDiskCategories(): DiskCategoryGroups {
  return {
    [DiskCategory.NO_CHANGE_NEEDED]: [],
    [DiskCategory.NEED_BOOT_DISK_REPLACEMENT]: [],
    [DiskCategory.NEED_SECOND_DISK_REPLACEMENT]: [],
    [DiskCategory.NEED_SECOND_DISK_ADDITION]: [],
    [DiskCategory.NEED_BOTH_BOOT_AND_SECOND_DISK]: []
  };
}

export function renderDiskMachineDetails(machineName: string, analysis: DiskAnalysis, sizeLabel: string): string[] {
  const { bootDisk, blockDevices } = analysis;
  const lines = [
    '',
    `Machine: ${machineName}`,
    `Boot disk: ${bootDisk.info}`,
    `Block devices (${blockDevices.deviceInfo.length}):`,
    ...blockDevices.deviceInfo.map(info => `  - ${info}`),
    '',
    'Requirements check:',
    `  Boot disk is ${sizeLabel}+ SSD: ${checkMark(bootDisk.isLargeSsd)}`,
    `  Additional ${sizeLabel}+ SSDs: ${blockDevices.additionalLargeSsds} (need ≥1)`,
    `  Machine meets requirements: ${yesNo(meetsDiskRequirements(bootDisk, blockDevices))}`,
    '-'.repeat(RULE_WIDTH)
  ];
  return lines;
}

export function renderDiskSummary(categories: DiskCategoryGroups, sizeLabel: string): string[] {
  const lines = heading('SUMMARY - Changes needed to meet requirements:');

  for (const category of DISK_CATEGORY_ORDER) {
    const machines = categories[category];
    if (machines.length === 0) {
      continue;
    }
    lines.push('', `${summaryTitle(category, sizeLabel)} (${machines.length} machines):`);
    lines.push(...machines.map(machine => `  - ${machine}`));
  }

  const total = DISK_CATEGORY_ORDER.reduce((sum, category) => sum + categories[category].length, 0);
  lines.push('', `Total machines: ${total}`);
  lines.push(`Machines meeting requirements: ${categories[DiskCategory.NO_CHANGE_NEEDED].length}`);

  return lines;
}

export function buildDiskReport(machines: MaasMachine[], minDiskSizeBytes: number): DiskReport {
  const sizeLabel = formatSizeLabel(minDiskSizeBytes);
  const categories = emptyDiskCategories();
  const lines = [`Number of machines returned: ${machines.length}`];

  for (const machine of machines) {
    const machineName = getMachineName(machine);
    const analysis = analyzeMachineDisks(machine, minDiskSizeBytes);

    lines.push(...renderDiskMachineDetails(machineName, analysis, sizeLabel));
    categories[analysis.category].push(machineName);
  }

  lines.push(...renderDiskSummary(categories, sizeLabel));
  return { categories, lines };
}
