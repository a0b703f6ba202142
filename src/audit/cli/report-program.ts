/**
 * Shared command-line surface of the report scripts:
 * <script> <profile> [--tag TAG] [--hostname HOSTNAME]
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { AuditConfig, AuditConfigManager, ConfigManagerOptions } from '../config-manager';
import { CommandRunner, MaasClient } from '../maas/maas-client';
import { MaasMachine } from '../types/machine';
import { AuditError, AuditErrorHandler, AuditErrorType } from '../utils/error-handler';
import { defaultLogger, isLogLevel } from '../utils/logger';

export interface ReportDefinition {
  name: string;
  description: string;

  /** Turn the fetched machines into report lines */
  render: (machines: MaasMachine[], config: AuditConfig) => string[];
}

export interface ReportCliOptions {
  tag?: string;
  hostname?: string;
  config?: string;
  logLevel?: string;
}

export interface ReportProgramDeps {
  /** Replaces the real maas process (tests) */
  runner?: CommandRunner;
  configOptions?: ConfigManagerOptions;
  errorHandler?: AuditErrorHandler;
}

function resolveLogLevel(value: string | undefined): AuditConfig['logLevel'] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new AuditError(`unknown log level ${value}`, AuditErrorType.CONFIGURATION_ERROR);
  }
  return level;
}

export async function runReport(
  definition: ReportDefinition,
  profile: string,
  options: ReportCliOptions,
  deps: ReportProgramDeps = {}
): Promise<void> {
  const configManager = new AuditConfigManager({
    ...deps.configOptions,
    configPath: options.config ?? deps.configOptions?.configPath
  });
  const config = configManager.load({ logLevel: resolveLogLevel(options.logLevel) });
  defaultLogger.setLevel(config.logLevel);

  const client = new MaasClient({
    command: config.maasCommand,
    timeout: config.commandTimeout,
    runner: deps.runner
  });

  const machines = await client.readMachines(profile, {
    tag: options.tag,
    hostname: options.hostname
  });

  for (const line of definition.render(machines, config)) {
    console.log(line);
  }
}

export function createReportProgram(definition: ReportDefinition, deps: ReportProgramDeps = {}): Command {
  const errorHandler = deps.errorHandler ?? new AuditErrorHandler();
  const program = new Command();

  program
    .name(definition.name)
    .description(definition.description)
    .version('1.0.0')
    .argument('<profile>', 'MAAS profile name')
    .option('--tag <tag>', 'only machines carrying this tag')
    .option('--hostname <hostname>', 'only the machine with this hostname')
    .option('-c, --config <path>', 'configuration file (YAML or JSON)')
    .option('--log-level <level>', 'debug | info | warn | error | fatal')
    .action(async (profile: string, options: ReportCliOptions) => {
      try {
        await runReport(definition, profile, options, deps);
      } catch (error) {
        const exitCode = errorHandler.handleError(error);
        console.error(chalk.red('✗'), errorHandler.normalize(error).message);
        process.exit(exitCode);
      }
    });

  return program;
}
