/**
 * Remote Executor - runs a shell command on a host and reports the outcome
 *
 * Transport failures (ssh cannot connect, the shell cannot be spawned, the
 * command runs past its deadline) become UnreachableError. A command that ran
 * and exited nonzero is returned as a normal result; callers decide whether
 * that is a failure via {@link checkResult}.
 */

import { execa } from 'execa';
import type { HostConfig } from '../config/schema.js';
import { RemoteCommandFailedError, UnreachableError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { exportEnv, quote, quoteDir } from './shell.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  // Undecoded stdout, when asked for with `binary`
  stdoutBytes?: Buffer;
}

export interface ExecuteOptions {
  // Merged over the host's own env
  env?: Record<string, string>;

  // Directory to run in; a leading ~/ is the remote home
  cwd?: string;

  // Written to the command's stdin
  input?: string | Buffer;

  // Overrides the executor's default deadline
  timeoutMs?: number;

  // Also return stdout as raw bytes
  binary?: boolean;
}

export interface RemoteExecutor {
  execute(host: HostConfig, command: string, options?: ExecuteOptions): Promise<CommandResult>;
}

export const LOCAL_ADDRESSES = ['local', 'localhost', '127.0.0.1'];

export function isLocalAddress(address: string): boolean {
  return LOCAL_ADDRESSES.includes(address);
}

// Exit status used when the working directory is missing
export const CWD_MISSING_EXIT = 97;

/**
 * The `sh` script actually run: env exports, then cd, then the command.
 */
export function buildScript(
  command: string,
  options: { env?: Record<string, string>; cwd?: string } = {}
): string {
  const lines: string[] = [];
  const env = options.env ?? {};
  if (Object.keys(env).length > 0) {
    lines.push(exportEnv(env));
  }
  if (options.cwd) {
    lines.push(`cd ${quoteDir(options.cwd)} || exit ${CWD_MISSING_EXIT}`);
  }
  lines.push(command);
  return lines.join('\n');
}

/**
 * Throw RemoteCommandFailedError for a nonzero exit, else pass the result on.
 */
export function checkResult(host: HostConfig, command: string, result: CommandResult): CommandResult {
  if (result.exitCode !== 0) {
    throw new RemoteCommandFailedError(host.name, command, result.exitCode, result.stdout, result.stderr);
  }
  return result;
}

export interface ShellExecutorOptions {
  timeoutMs?: number;
  connectTimeoutSec?: number;
  maxBuffer?: number;
  // ssh client binary
  sshCommand?: string;
}

interface SpawnOutcome {
  timedOut: boolean;
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  stdoutBytes?: Buffer;
}

// ssh reserves 255 for its own errors
const SSH_TRANSPORT_EXIT = 255;

/**
 * Runs commands over ssh, or through the local `sh` for local addresses.
 */
export class ShellExecutor implements RemoteExecutor {
  private readonly timeoutMs: number;
  private readonly connectTimeoutSec: number;
  private readonly maxBuffer: number;
  private readonly sshCommand: string;

  constructor(options: ShellExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 600000; // 10 minutes, clones can be slow
    this.connectTimeoutSec = options.connectTimeoutSec ?? 10;
    this.maxBuffer = options.maxBuffer ?? 64 * 1024 * 1024;
    this.sshCommand = options.sshCommand ?? 'ssh';
  }

  async execute(host: HostConfig, command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const script = buildScript(command, { env: { ...host.env, ...options.env }, cwd: options.cwd });
    const local = isLocalAddress(host.address);
    const [file, args]: [string, string[]] = local
      ? ['sh', ['-c', script]]
      : [
          this.sshCommand,
          [
            '-o',
            'BatchMode=yes',
            '-o',
            `ConnectTimeout=${this.connectTimeoutSec}`,
            host.address,
            `sh -c ${quote(script)}`,
          ],
        ];
    const timeout = options.timeoutMs ?? this.timeoutMs;

    const preview = command.length > 200 ? command.substring(0, 200) + '...' : command;
    logger.debug('Remote command', { host: host.name, cwd: options.cwd, command: preview });

    const startTime = Date.now();
    const result = await this.spawn(file, args, timeout, options);
    const durationMs = Date.now() - startTime;

    if (result.timedOut) {
      throw new UnreachableError(host.name, `command timed out after ${timeout}ms: ${preview}`);
    }
    if (typeof result.exitCode !== 'number') {
      // Spawn failure: no exit status at all
      throw new UnreachableError(host.name, result.stderr.trim() || `could not run ${file}`);
    }
    if (!local && result.exitCode === SSH_TRANSPORT_EXIT) {
      throw new UnreachableError(host.name, result.stderr.trim() || 'ssh connection failed');
    }

    logger.debug('Remote command finished', {
      host: host.name,
      exitCode: result.exitCode,
      durationMs,
    });

    const outcome: CommandResult = { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
    if (result.stdoutBytes) {
      outcome.stdoutBytes = result.stdoutBytes;
    }
    return outcome;
  }

  private async spawn(file: string, args: string[], timeout: number, options: ExecuteOptions): Promise<SpawnOutcome> {
    const spawnOptions = {
      input: options.input,
      timeout,
      maxBuffer: this.maxBuffer,
      reject: false,
      stripFinalNewline: false,
      env: { GIT_PAGER: 'cat', GIT_TERMINAL_PROMPT: '0' },
    };
    if (!options.binary) {
      return await execa(file, args, spawnOptions);
    }
    const raw = await execa(file, args, { ...spawnOptions, encoding: 'buffer' });
    return {
      timedOut: raw.timedOut,
      exitCode: raw.exitCode,
      stdout: raw.stdout.toString('utf-8'),
      stderr: raw.stderr.toString('utf-8'),
      stdoutBytes: raw.stdout,
    };
  }
}
