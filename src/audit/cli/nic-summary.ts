#!/usr/bin/env node

/**
 * maas-nic-summary: which machines have enough connected physical NICs
 */

import { buildNicReport } from '../reports/nic-report';
import { auditErrorHandler } from '../utils/error-handler';
import { createReportProgram, ReportDefinition } from './report-program';

export const nicSummaryReport: ReportDefinition = {
  name: 'maas-nic-summary',
  description: 'Query MAAS machines and show network interface information',
  render: (machines, config) => buildNicReport(machines, config.minConnectedNics).lines
};

export const program = createReportProgram(nicSummaryReport);

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    process.exitCode = auditErrorHandler.handleError(error);
  });
}
