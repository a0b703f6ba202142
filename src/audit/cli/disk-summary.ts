#!/usr/bin/env node

/**
 * maas-disk-summary: which machines need boot or secondary SSD work
 */

import { buildDiskReport } from '../reports/disk-report';
import { auditErrorHandler } from '../utils/error-handler';
import { createReportProgram, ReportDefinition } from './report-program';

export const diskSummaryReport: ReportDefinition = {
  name: 'maas-disk-summary',
  description: 'Query MAAS machines and summarise the disk changes needed to meet storage requirements',
  render: (machines, config) => buildDiskReport(machines, config.minDiskSizeBytes).lines
};

export const program = createReportProgram(diskSummaryReport);

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    process.exitCode = auditErrorHandler.handleError(error);
  });
}
