import { createHash } from 'crypto';
import type { Attachment, HostConfig } from '../config/schema.js';
import { ValidationError, WorktreeMissingError } from '../errors.js';
import type { RemoteGit } from '../git/remote-git.js';
import { joinRemote, worktreePath } from '../layout.js';
import type { CommandResult, RemoteExecutor } from '../remote/executor.js';
import { quote } from '../remote/shell.js';
import { logger } from '../utils/logger.js';

export type ComposeAction = 'up' | 'down' | 'ps';

const PORT_OFFSET_BASE = 10000;
const PORT_OFFSET_SLOTS = 500;
const PORT_OFFSET_STRIDE = 100;

/**
 * Port offset stable for a (feature, repo) pair, so parallel features can
 * publish the same services without colliding.
 */
export function computePortOffset(feature: string, repo: string): number {
  const digest = createHash('sha256').update(`${feature}/${repo}`).digest('hex');
  return PORT_OFFSET_BASE + (parseInt(digest.slice(0, 8), 16) % PORT_OFFSET_SLOTS) * PORT_OFFSET_STRIDE;
}

export function composeProjectName(feature: string, repo: string): string {
  return `sf-${feature}-${repo}`;
}

export function composeEnv(feature: string, repo: string): Record<string, string> {
  return {
    COMPOSE_PROJECT_NAME: composeProjectName(feature, repo),
    SF_PORT_OFFSET: String(computePortOffset(feature, repo)),
    SF_FEATURE: feature,
    SF_REPO: repo,
  };
}

export function composeCommand(action: ComposeAction, composeFile: string, extraArgs: string[] = []): string {
  const args = action === 'up' ? ['-d', ...extraArgs] : extraArgs;
  return ['docker', 'compose', '-f', quote(composeFile), action, ...args.map(quote)].join(' ');
}

export interface ComposeManagerOptions {
  remoteRoot: string;
  timeoutMs?: number;
}

/**
 * Runs `docker compose` inside a feature worktree on a host.
 */
export class ComposeManager {
  private readonly remoteRoot: string;
  private readonly timeoutMs?: number;

  constructor(private executor: RemoteExecutor, private git: RemoteGit, options: ComposeManagerOptions) {
    this.remoteRoot = options.remoteRoot;
    this.timeoutMs = options.timeoutMs;
  }

  async run(
    action: ComposeAction,
    host: HostConfig,
    feature: string,
    attachment: Attachment,
    extraArgs: string[] = []
  ): Promise<CommandResult> {
    if (!attachment.composeFile) {
      throw new ValidationError(`Repo '${attachment.repo}' of feature '${feature}' has no compose file`);
    }
    const worktree = worktreePath(feature, attachment.repo);
    if (!(await this.git.pathExists(host, worktree))) {
      throw new WorktreeMissingError(host.name, worktree);
    }

    const command = composeCommand(action, attachment.composeFile, extraArgs);
    logger.info(`Running docker compose ${action}`, { host: host.name, feature, repo: attachment.repo });

    const result = await this.executor.execute(host, command, {
      cwd: joinRemote(this.remoteRoot, worktree),
      env: composeEnv(feature, attachment.repo),
      timeoutMs: this.timeoutMs,
    });
    if (result.exitCode !== 0) {
      logger.error(`docker compose ${action} failed`, { host: host.name, exitCode: result.exitCode });
    }
    return result;
  }
}
