/**
 * Network interface checks
 */

import { MaasMachine } from '../types/machine';

export interface InterfaceSummary {
  name: string;
  enabled: boolean;
  interfaceSpeed: number | null;
  linkSpeed: number | null;
  interfaceSpeedFormatted: string;
  linkSpeedFormatted: string;
  isConnected: boolean;
}

export interface InterfaceAnalysis {
  /** Physical interfaces only; VLANs are left out */
  interfaces: InterfaceSummary[];
  connectedCount: number;
  meetsRequirement: boolean;
}

export function formatSpeed(speedMbps: number | null): string {
  if (speedMbps === null) {
    return 'unknown';
  }
  if (speedMbps >= 1000) {
    return `${Math.floor(speedMbps / 1000)} Gbps`;
  }
  return `${speedMbps} Mbps`;
}

/** VLAN interfaces are named <parent>.<vid>, e.g. eth0.100 */
export function isVlanInterface(name: string): boolean {
  return name.includes('.');
}

export function analyzeInterfaces(machine: MaasMachine, minConnected: number): InterfaceAnalysis {
  if (machine.interfaces === null) {
    return { interfaces: [], connectedCount: 0, meetsRequirement: false };
  }

  const interfaces: InterfaceSummary[] = [];
  let connectedCount = 0;

  for (const iface of machine.interfaces) {
    const name = iface.name ?? 'unknown';
    if (isVlanInterface(name)) {
      continue;
    }

    const isConnected = iface.linkSpeed !== null && iface.linkSpeed > 0;
    if (isConnected) {
      connectedCount += 1;
    }

    interfaces.push({
      name,
      enabled: iface.enabled,
      interfaceSpeed: iface.interfaceSpeed,
      linkSpeed: iface.linkSpeed,
      interfaceSpeedFormatted: formatSpeed(iface.interfaceSpeed),
      linkSpeedFormatted: formatSpeed(iface.linkSpeed),
      isConnected
    });
  }

  return {
    interfaces,
    connectedCount,
    meetsRequirement: connectedCount >= minConnected
  };
}
