/**
 * Network interface report
 */

import { getMachineName, MaasMachine } from '../types/machine';
import { analyzeInterfaces, InterfaceAnalysis } from '../network/nic-analyzer';
import { checkMark, heading, RULE_WIDTH, yesNo } from './format';

export interface NicReport {
  machinesMeeting: string[];
  machinesNotMeeting: string[];
  lines: string[];
}

export function renderNicMachineDetails(
  machineName: string,
  analysis: InterfaceAnalysis,
  minConnected: number
): string[] {
  const lines = [
    '',
    `Machine: ${machineName} ${checkMark(analysis.meetsRequirement)}`,
    `Network interfaces (${analysis.interfaces.length}):`
  ];

  if (analysis.interfaces.length === 0) {
    lines.push('  No interface information available');
  }

  for (const iface of analysis.interfaces) {
    const status = iface.enabled ? 'enabled' : 'disabled';
    const connection = iface.isConnected ? 'connected' : 'disconnected';
    lines.push(`  - ${iface.name}: ${status}, ${connection}`);
    lines.push(`    Interface speed: ${iface.interfaceSpeedFormatted}`);
    lines.push(`    Link speed: ${iface.linkSpeedFormatted}`);
  }

  lines.push(
    '',
    `Connected NICs: ${analysis.connectedCount} (need ≥${minConnected})`,
    `Meets requirement: ${yesNo(analysis.meetsRequirement)}`,
    '-'.repeat(RULE_WIDTH)
  );

  return lines;
}

export function renderNicSummary(
  machinesMeeting: string[],
  machinesNotMeeting: string[],
  totalMachines: number,
  minConnected: number
): string[] {
  const lines = heading('SUMMARY - Network Interface Requirements:');

  lines.push(
    '',
    `Total machines processed: ${totalMachines}`,
    `Machines meeting requirements (≥${minConnected} connected NICs): ${machinesMeeting.length}`,
    `Machines not meeting requirements: ${machinesNotMeeting.length}`
  );

  if (machinesMeeting.length > 0) {
    lines.push('', `✅ MACHINES MEETING REQUIREMENTS (${machinesMeeting.length}):`);
    lines.push(...machinesMeeting.map(machine => `  - ${machine}`));
  }

  if (machinesNotMeeting.length > 0) {
    lines.push('', `❌ MACHINES NOT MEETING REQUIREMENTS (${machinesNotMeeting.length}):`);
    lines.push(...machinesNotMeeting.map(machine => `  - ${machine}`));
  }

  return lines;
}

export function buildNicReport(machines: MaasMachine[], minConnected: number): NicReport {
  const machinesMeeting: string[] = [];
  const machinesNotMeeting: string[] = [];
  const lines = [`Number of machines returned: ${machines.length}`];

  for (const machine of machines) {
    const machineName = getMachineName(machine);
    const analysis = analyzeInterfaces(machine, minConnected);

    lines.push(...renderNicMachineDetails(machineName, analysis, minConnected));

    if (analysis.meetsRequirement) {
      machinesMeeting.push(machineName);
    } else {
      machinesNotMeeting.push(machineName);
    }
  }

  lines.push(...renderNicSummary(machinesMeeting, machinesNotMeeting, machines.length, minConnected));
  return { machinesMeeting, machinesNotMeeting, lines };
}
