import type { HostConfig } from '../config/schema.js';
import { checkResult, type CommandResult, type RemoteExecutor } from '../remote/executor.js';
import { tmuxTarget } from '../layout.js';
import { absoluteFromCwd, quote } from '../remote/shell.js';
import { logger } from '../utils/logger.js';

export interface TmuxManagerOptions {
  remoteRoot: string;
  timeoutMs?: number;
}

// sh: command not found
const COMMAND_NOT_FOUND = 127;

/**
 * tmux session primitives on a host. Session working directories are given
 * relative to the remote root; sessions are addressed by exact name.
 */
export class TmuxManager {
  private readonly remoteRoot: string;
  private readonly timeoutMs?: number;

  constructor(private executor: RemoteExecutor, options: TmuxManagerOptions) {
    this.remoteRoot = options.remoteRoot;
    this.timeoutMs = options.timeoutMs;
  }

  private exec(host: HostConfig, command: string, input?: string | Buffer): Promise<CommandResult> {
    return this.executor.execute(host, command, { cwd: this.remoteRoot, timeoutMs: this.timeoutMs, input });
  }

  private async run(host: HostConfig, command: string, input?: string | Buffer): Promise<CommandResult> {
    return checkResult(host, command, await this.exec(host, command, input));
  }

  async hasSession(host: HostConfig, name: string): Promise<boolean> {
    const result = await this.exec(host, `tmux has-session -t ${quote(tmuxTarget(name))} 2>/dev/null`);
    if (result.exitCode === COMMAND_NOT_FOUND) {
      checkResult(host, 'tmux has-session', result);
    }
    return result.exitCode === 0;
  }

  async createSession(host: HostConfig, name: string, cwd: string, command: string): Promise<void> {
    await this.run(host, `tmux new-session -d -s ${quote(name)} -c ${absoluteFromCwd(cwd)} ${quote(command)}`);
    logger.info('tmux session created', { host: host.name, session: name, cwd });
  }

  async killSession(host: HostConfig, name: string): Promise<void> {
    await this.run(host, `tmux kill-session -t ${quote(tmuxTarget(name))}`);
    logger.info('tmux session killed', { host: host.name, session: name });
  }

  /**
   * Names of every session on the host; empty when no tmux server runs.
   */
  async listSessions(host: HostConfig): Promise<string[]> {
    const command = `tmux list-sessions -F ${quote('#{session_name}')}`;
    const result = await this.exec(host, command);
    if (result.exitCode === COMMAND_NOT_FOUND) {
      checkResult(host, command, result);
    }
    if (result.exitCode !== 0) {
      return [];
    }
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /** Load `payload` (from stdin) into a named paste buffer. */
  async loadBuffer(host: HostConfig, buffer: string, payload: Buffer): Promise<void> {
    await this.run(host, `tmux load-buffer -b ${quote(buffer)} -`, payload);
  }

  /** Paste a named buffer into a session, deleting the buffer, then press Enter. */
  async pasteBuffer(host: HostConfig, buffer: string, session: string): Promise<void> {
    const target = quote(tmuxTarget(session, true));
    await this.run(host, `tmux paste-buffer -d -b ${quote(buffer)} -t ${target} && tmux send-keys -t ${target} Enter`);
  }
}
