/**
 * Git operations against a host's layout, split into observe and transition
 * steps so the sync engine can compute the minimal set of actions from what
 * actually exists on disk.
 *
 * Every command runs with the host's remote root as its working directory and
 * addresses the layout through relative paths.
 */

import type { HostConfig, RepoConfig } from '../config/schema.js';
import { RemoteCommandFailedError, WorktreeConflictError } from '../errors.js';
import { ANCHOR_DIR, FEATURES_DIR, anchorPath, branchName, featureRoot, worktreePath } from '../layout.js';
import { checkResult, type CommandResult, type RemoteExecutor } from '../remote/executor.js';
import { absoluteFromCwd, quote, quoteDir } from '../remote/shell.js';
import { logger } from '../utils/logger.js';

export type SyncAction = 'anchor-cloned' | 'anchor-updated' | 'branch-created' | 'worktree-created';

export type AnchorState = 'absent' | 'bare' | 'working';

export type WorktreeState =
  | { kind: 'absent' }
  | { kind: 'branch'; branch: string; head: string }
  | { kind: 'detached'; head: string };

export interface WorktreeResult {
  path: string;
  branch: string;
  head: string;
  actions: SyncAction[];
}

export interface RemoteGitOptions {
  remoteRoot: string;
  timeoutMs?: number;
}

const ORIGIN_REFSPEC = '+refs/heads/*:refs/remotes/origin/*';

/**
 * A worktree on any branch other than `branch`, or detached, is a conflict.
 */
function assertWorktreeAbsent(host: HostConfig, path: string, branch: string, state: WorktreeState): void {
  if (state.kind === 'absent') {
    return;
  }
  const found = state.kind === 'detached' ? `detached HEAD at ${state.head.slice(0, 12)}` : state.branch;
  throw new WorktreeConflictError(host.name, path, branch, found);
}

export class RemoteGit {
  private readonly remoteRoot: string;
  private readonly timeoutMs?: number;

  constructor(private executor: RemoteExecutor, options: RemoteGitOptions) {
    this.remoteRoot = options.remoteRoot;
    this.timeoutMs = options.timeoutMs;
  }

  /** Run under the remote root without checking the exit status. */
  exec(host: HostConfig, command: string, input?: string | Buffer): Promise<CommandResult> {
    return this.executor.execute(host, command, { cwd: this.remoteRoot, timeoutMs: this.timeoutMs, input });
  }

  async run(host: HostConfig, command: string, input?: string | Buffer): Promise<CommandResult> {
    return checkResult(host, command, await this.exec(host, command, input));
  }

  /** Run under the remote root and return stdout undecoded. */
  async read(host: HostConfig, command: string): Promise<Buffer> {
    const result = checkResult(
      host,
      command,
      await this.executor.execute(host, command, { cwd: this.remoteRoot, timeoutMs: this.timeoutMs, binary: true })
    );
    return result.stdoutBytes ?? Buffer.from(result.stdout, 'utf-8');
  }

  /**
   * Connectivity check; also makes sure the layout's top directories exist.
   */
  async probe(host: HostConfig): Promise<void> {
    const root = quoteDir(this.remoteRoot);
    const command = `mkdir -p ${root}/${ANCHOR_DIR} ${root}/${FEATURES_DIR}`;
    checkResult(host, command, await this.executor.execute(host, command, { timeoutMs: this.timeoutMs }));
  }

  /** Connectivity check that changes nothing on the host. */
  async check(host: HostConfig): Promise<void> {
    checkResult(host, 'true', await this.executor.execute(host, 'true', { timeoutMs: this.timeoutMs }));
  }

  async pathExists(host: HostConfig, path: string): Promise<boolean> {
    const result = await this.exec(host, `test -d ${quote(path)}`);
    return result.exitCode === 0;
  }

  // ─────────────────────────────────────────────────────────────
  // Anchor
  // ─────────────────────────────────────────────────────────────

  async observeAnchor(host: HostConfig, repo: string): Promise<AnchorState> {
    const path = quote(anchorPath(repo));
    const command =
      `if [ -d ${path} ]; then git -C ${path} rev-parse --is-bare-repository 2>/dev/null || echo invalid; ` +
      `else echo absent; fi`;
    const result = await this.run(host, command);
    const state = result.stdout.trim();

    if (state === 'absent') return 'absent';
    if (state === 'true') return 'bare';
    if (state === 'false') return 'working';
    throw new RemoteCommandFailedError(
      host.name,
      command,
      result.exitCode,
      result.stdout,
      `${anchorPath(repo)} exists but is not a git repository`
    );
  }

  /**
   * Clone the anchor when absent, otherwise fetch. A bare anchor is only ever
   * fetched into; a working clone is only fast-forwarded.
   */
  async ensureAnchor(host: HostConfig, repo: RepoConfig): Promise<SyncAction[]> {
    const path = quote(anchorPath(repo.name));
    const state = await this.observeAnchor(host, repo.name);

    if (state === 'absent') {
      await this.run(
        host,
        `git clone --bare --quiet ${quote(repo.url)} ${path} && ` +
          `git -C ${path} config remote.origin.fetch ${quote(ORIGIN_REFSPEC)} && ` +
          `git -C ${path} fetch --prune --quiet origin`
      );
      logger.info('Anchor cloned', { host: host.name, repo: repo.name });
      return ['anchor-cloned'];
    }

    // git fetch only reports on stderr when refs moved
    const fetched = await this.run(host, `git -C ${path} fetch --prune origin`);
    const changed = fetched.stderr.trim().length > 0;

    if (state === 'working') {
      await this.run(host, `git -C ${path} merge --ff-only --quiet ${quote('@{upstream}')}`);
    }

    if (changed) {
      logger.info('Anchor updated', { host: host.name, repo: repo.name });
      return ['anchor-updated'];
    }
    return [];
  }

  async refExists(host: HostConfig, repo: string, ref: string): Promise<boolean> {
    const result = await this.exec(
      host,
      `git -C ${quote(anchorPath(repo))} rev-parse --verify --quiet ${quote(ref)}`
    );
    if (result.exitCode === 0) {
      return true;
    }
    if (result.exitCode === 1) {
      return false;
    }
    throw new RemoteCommandFailedError(host.name, 'git rev-parse --verify', result.exitCode, result.stdout, result.stderr);
  }

  /**
   * Create `feat/<feature>` in the anchor when missing. An upstream feature
   * branch (pushed from another host) takes precedence over the base tip. An
   * existing local branch is left untouched.
   */
  async ensureBranch(host: HostConfig, repo: string, feature: string, baseBranch: string): Promise<SyncAction[]> {
    const branch = branchName(feature);
    if (await this.refExists(host, repo, `refs/heads/${branch}`)) {
      return [];
    }

    const upstream = `refs/remotes/origin/${branch}`;
    const startPoint = (await this.refExists(host, repo, upstream)) ? upstream : `refs/remotes/origin/${baseBranch}`;
    await this.run(host, `git -C ${quote(anchorPath(repo))} branch --no-track ${quote(branch)} ${quote(startPoint)}`);

    logger.info('Feature branch created', { host: host.name, repo, branch, startPoint });
    return ['branch-created'];
  }

  // ─────────────────────────────────────────────────────────────
  // Worktree
  // ─────────────────────────────────────────────────────────────

  async observeWorktree(host: HostConfig, feature: string, repo: string): Promise<WorktreeState> {
    const path = quote(worktreePath(feature, repo));
    const command =
      `if [ -e ${path} ]; then git -C ${path} symbolic-ref --quiet HEAD || echo detached; ` +
      `git -C ${path} rev-parse HEAD; else echo absent; fi`;
    const result = await this.exec(host, command);
    const [first = '', head = ''] = result.stdout.split('\n').map((line) => line.trim());

    if (first === 'absent') {
      return { kind: 'absent' };
    }
    if (result.exitCode !== 0 || !head) {
      throw new WorktreeConflictError(host.name, worktreePath(feature, repo), branchName(feature), 'not a git worktree');
    }
    if (first === 'detached') {
      return { kind: 'detached', head };
    }
    return { kind: 'branch', branch: first.replace(/^refs\/heads\//, ''), head };
  }

  /**
   * Create the worktree when absent. A worktree on any other branch, or
   * detached, is reported as a conflict and left as it is.
   */
  async ensureWorktree(host: HostConfig, repo: string, feature: string): Promise<WorktreeResult> {
    const branch = branchName(feature);
    const path = worktreePath(feature, repo);
    const state = await this.observeWorktree(host, feature, repo);

    if (state.kind === 'branch' && state.branch === branch) {
      return { path, branch, head: state.head, actions: [] };
    }
    assertWorktreeAbsent(host, path, branch, state);

    const anchor = quote(anchorPath(repo));
    await this.run(
      host,
      `git -C ${anchor} worktree prune && mkdir -p ${quote(featureRoot(feature))} && ` +
        `git -C ${anchor} worktree add --quiet ${absoluteFromCwd(path)} ${quote(branch)}`
    );
    const head = (await this.run(host, `git -C ${quote(path)} rev-parse HEAD`)).stdout.trim();

    logger.info('Worktree created', { host: host.name, path, branch, head });
    return { path, branch, head, actions: ['worktree-created'] };
  }

  /**
   * The actions a sync of this target would take, from observation only.
   * Nothing is fetched, so `anchor-updated` is never predicted and `head` is
   * empty for a worktree that does not exist yet.
   */
  async planWorktree(host: HostConfig, repo: string, feature: string): Promise<WorktreeResult> {
    const branch = branchName(feature);
    const path = worktreePath(feature, repo);
    const actions: SyncAction[] = [];

    if ((await this.observeAnchor(host, repo)) === 'absent') {
      actions.push('anchor-cloned', 'branch-created');
    } else if (!(await this.refExists(host, repo, `refs/heads/${branch}`))) {
      actions.push('branch-created');
    }

    const state = await this.observeWorktree(host, feature, repo);
    if (state.kind === 'branch' && state.branch === branch) {
      return { path, branch, head: state.head, actions };
    }
    assertWorktreeAbsent(host, path, branch, state);
    return { path, branch, head: '', actions: [...actions, 'worktree-created'] };
  }

  /**
   * Remove the worktree and the local feature branch. The anchor stays; it may
   * back other features.
   */
  async removeWorktree(host: HostConfig, repo: string, feature: string): Promise<void> {
    const branch = branchName(feature);
    const path = worktreePath(feature, repo);

    if ((await this.observeAnchor(host, repo)) !== 'absent') {
      const anchor = quote(anchorPath(repo));
      const state = await this.exec(host, `test -e ${quote(path)}`);
      if (state.exitCode === 0) {
        await this.run(host, `git -C ${anchor} worktree remove --force ${absoluteFromCwd(path)}`);
      }
      await this.run(host, `git -C ${anchor} worktree prune`);
      if (await this.refExists(host, repo, `refs/heads/${branch}`)) {
        await this.run(host, `git -C ${anchor} branch -D ${quote(branch)}`);
      }
    }

    // Only succeeds once the last repo of the feature is gone
    await this.run(host, `rmdir ${quote(featureRoot(feature))} 2>/dev/null || true`);
    logger.info('Worktree removed', { host: host.name, path, branch });
  }
}
