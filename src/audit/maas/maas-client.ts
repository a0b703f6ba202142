/**
 * MAAS CLI client
 * Runs `maas <profile> machines read` and narrows its JSON output
 */

import { spawn } from 'child_process';
import { MaasMachine, parseMachineList } from '../types/machine';
import { AuditError, AuditErrorType } from '../utils/error-handler';
import { AuditLogger, createModuleLogger } from '../utils/logger';

export interface MachineFilter {
  tag?: string;
  hostname?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export type CommandRunner = (command: string, args: string[], timeout: number) => Promise<CommandResult>;

export interface MaasClientOptions {
  /** maas executable */
  command: string;

  /** Milliseconds before the process is killed */
  timeout: number;

  runner?: CommandRunner;
  logger?: AuditLogger;
}

/**
 * Spawn a process without a shell and collect its output.
 * Resolves with the exit code; rejects only when the process cannot run to completion.
 */
export const spawnCommand: CommandRunner = (command, args, timeout) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let output = '';
    let errorOutput = '';

    // Decode on the stream so multibyte characters split across chunks survive
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (data: string) => {
      output += data;
    });

    child.stderr.on('data', (data: string) => {
      errorOutput += data;
    });

    const timeoutId = setTimeout(() => {
      child.kill('SIGTERM');
      reject(new Error(`Command timed out after ${timeout}ms`));
    }, timeout);

    child.on('close', (code) => {
      clearTimeout(timeoutId);
      resolve({ stdout: output, stderr: errorOutput, exitCode: code });
    });

    child.on('error', (err) => {
      clearTimeout(timeoutId);
      reject(err);
    });
  });
};

/**
 * Arguments for `maas <profile> machines read` with optional filters
 */
export function buildMachinesReadArgs(profile: string, filter: MachineFilter = {}): string[] {
  const args = [profile, 'machines', 'read'];

  if (filter.tag) {
    args.push(`tags=${filter.tag}`);
  }

  if (filter.hostname) {
    args.push(`hostname=${filter.hostname}`);
  }

  return args;
}

export class MaasClient {
  private command: string;
  private timeout: number;
  private runner: CommandRunner;
  private logger: AuditLogger;

  /**
   * Defaults to spawning the real maas executable
   */
  constructor(options: MaasClientOptions) {
    this.command = options.command;
    this.timeout = options.timeout;
    this.runner = options.runner ?? spawnCommand;
    this.logger = options.logger ?? createModuleLogger('maas-client');
  }

  /**
   * List machines visible to a profile, optionally filtered by tag or hostname
   */
  async readMachines(profile: string, filter: MachineFilter = {}): Promise<MaasMachine[]> {
    const args = buildMachinesReadArgs(profile, filter);
    const commandLine = [this.command, ...args].join(' ');

    this.logger.debug(`Running: ${commandLine}`);

    let result: CommandResult;
    try {
      result = await this.runner(this.command, args, this.timeout);
    } catch (error) {
      throw new AuditError(
        `Error running maas command: ${error instanceof Error ? error.message : String(error)}`,
        AuditErrorType.MAAS_COMMAND_ERROR,
        { profile, command: commandLine }
      );
    }

    if (result.exitCode !== 0) {
      throw new AuditError(
        `Error running maas command: exited with status ${result.exitCode ?? 'unknown'}`,
        AuditErrorType.MAAS_COMMAND_ERROR,
        {
          profile,
          command: commandLine,
          details: { exitCode: result.exitCode, stderr: result.stderr.trim() }
        }
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(result.stdout);
    } catch (error) {
      throw new AuditError(
        `Error parsing JSON output: ${error instanceof Error ? error.message : String(error)}`,
        AuditErrorType.OUTPUT_PARSING_ERROR,
        { profile, command: commandLine }
      );
    }

    const machines = parseMachineList(payload);
    if (machines === null) {
      throw new AuditError(
        'Error parsing JSON output: expected a list of machines',
        AuditErrorType.OUTPUT_PARSING_ERROR,
        { profile, command: commandLine }
      );
    }

    this.logger.info(`Fetched ${machines.length} machines`, { profile, ...filter });
    return machines;
  }
}
