/**
 * MAAS hardware audit entry point
 */

// Types
export * from './types/machine';

// Utilities
export * from './utils/logger';
export * from './utils/error-handler';

// Configuration
export * from './config-manager';

// MAAS access
export * from './maas/maas-client';

// Checks
export * from './disk/disk-analyzer';
export * from './network/nic-analyzer';

// Reports
export * from './reports/format';
export * from './reports/disk-report';
export * from './reports/nic-report';
export * from './cli/report-program';
