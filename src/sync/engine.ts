/**
 * Sync Engine - reconciles every (repo, host) target of a feature
 *
 * Per target: connectivity check → anchor clone/fetch and feature branch
 * (under the repo lock) → worktree (under the host+repo lock). Each target
 * reports its own outcome; a failure never stops sibling targets. A dry run
 * only observes and reports the actions a real run would take.
 */

import type { FeatureConfig, HostConfig, RepoConfig, Settings } from '../config/schema.js';
import { CancelledError, ValidationError, describeError, type ErrorDescription } from '../errors.js';
import { RemoteGit, type SyncAction } from '../git/remote-git.js';
import { repoLockScope, worktreeLockScope } from '../layout.js';
import type { LockManager } from '../lock/manager.js';
import type { RemoteExecutor } from '../remote/executor.js';
import { sleep, withReachabilityRetry, type Sleep } from '../remote/reachability.js';
import { assertReferences, requireHost, requireRepo, type StateModel } from '../state/model.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';

export interface TargetSuccess {
  repo: string;
  host: string;
  status: 'ok';
  worktree: string;
  branch: string;
  head: string;
  actions: SyncAction[];
}

export interface TargetFailure {
  repo: string;
  host: string;
  status: 'failed';
  error: ErrorDescription;
}

export type TargetResult = TargetSuccess | TargetFailure;

export interface SyncReport {
  feature: string;
  ok: boolean;
  results: TargetResult[];
  // Set when the actions were planned, not taken
  dryRun?: true;
}

export interface SyncOptions {
  // Limit to these repos / hosts of the feature's attachments
  repos?: string[];
  hosts?: string[];
  signal?: AbortSignal;
  dryRun?: boolean;
}

export interface SyncEngineDeps {
  executor: RemoteExecutor;
  locks: LockManager;
  settings: Settings;
  wait?: Sleep;
}

/**
 * Per-invocation memo, so each host is probed once and each anchor is
 * fetched once however many attachments reference it.
 */
class SyncRun {
  private probes: Map<string, Promise<void>> = new Map();
  private anchors: Map<string, Promise<SyncAction[]>> = new Map();

  probe(host: string, work: () => Promise<void>): Promise<void> {
    let pending = this.probes.get(host);
    if (!pending) {
      pending = work();
      this.probes.set(host, pending);
    }
    return pending;
  }

  /** Actions are reported by the first target only. */
  async anchor(host: string, repo: string, work: () => Promise<SyncAction[]>): Promise<SyncAction[]> {
    const key = `${host}\u0000${repo}`;
    const existing = this.anchors.get(key);
    if (existing) {
      await existing;
      return [];
    }
    const pending = work();
    this.anchors.set(key, pending);
    return pending;
  }
}

export class SyncEngine {
  private readonly git: RemoteGit;
  private readonly locks: LockManager;
  private readonly settings: Settings;
  private readonly wait: Sleep;

  constructor(private model: StateModel, deps: SyncEngineDeps) {
    this.locks = deps.locks;
    this.settings = deps.settings;
    this.wait = deps.wait ?? sleep;
    this.git = new RemoteGit(deps.executor, {
      remoteRoot: deps.settings.remoteRoot,
      timeoutMs: deps.settings.commandTimeoutMs,
    });
  }

  async sync(featureName: string, options: SyncOptions = {}): Promise<SyncReport> {
    const config = await this.model.loadConfig();
    const feature = await this.model.getFeature(featureName);
    assertReferences(config, [feature]);

    const attachedRepos = feature.attachments.map((a) => a.repo);
    const unknownRepos = (options.repos ?? []).filter((r) => !attachedRepos.includes(r));
    if (unknownRepos.length > 0) {
      throw new ValidationError(`Not attached to feature '${feature.name}': ${unknownRepos.join(', ')}`);
    }
    for (const host of options.hosts ?? []) {
      requireHost(config, host);
    }

    const dryRun = options.dryRun ?? false;
    logger.info('Sync started', { feature: feature.name, repos: options.repos, hosts: options.hosts, dryRun });
    const startTime = Date.now();
    const run = new SyncRun();
    const results: TargetResult[] = [];

    for (const attachment of feature.attachments) {
      if (options.repos && !options.repos.includes(attachment.repo)) {
        continue;
      }
      const repo = requireRepo(config, attachment.repo);
      const hosts = attachment.hosts
        .filter((h) => !options.hosts || options.hosts.includes(h))
        .map((h) => requireHost(config, h));

      const targetResults = await mapWithConcurrency(hosts, this.settings.maxParallelHosts, (host) =>
        dryRun ? this.planTarget(run, feature, repo, host) : this.reconcileTarget(run, feature, repo, host, options.signal)
      );
      results.push(...targetResults);
    }

    const failed = results.filter((r) => r.status === 'failed').length;
    logger.info('Sync finished', {
      feature: feature.name,
      targets: results.length,
      failed,
      durationMs: Date.now() - startTime,
    });

    const report: SyncReport = { feature: feature.name, ok: failed === 0, results };
    if (dryRun) {
      report.dryRun = true;
    }
    return report;
  }

  private async planTarget(run: SyncRun, feature: FeatureConfig, repo: RepoConfig, host: HostConfig): Promise<TargetResult> {
    try {
      await run.probe(host.name, () =>
        withReachabilityRetry(host.name, () => this.git.check(host), this.settings.reachability, this.wait)
      );
      const plan = await this.git.planWorktree(host, repo.name, feature.name);
      return {
        repo: repo.name,
        host: host.name,
        status: 'ok',
        worktree: plan.path,
        branch: plan.branch,
        head: plan.head,
        actions: plan.actions,
      };
    } catch (err) {
      const error = describeError(err);
      logger.warn('Sync plan failed', { feature: feature.name, repo: repo.name, host: host.name, ...error });
      return { repo: repo.name, host: host.name, status: 'failed', error };
    }
  }

  private async reconcileTarget(
    run: SyncRun,
    feature: FeatureConfig,
    repo: RepoConfig,
    host: HostConfig,
    signal: AbortSignal | undefined
  ): Promise<TargetResult> {
    const target = `${repo.name}@${host.name}`;
    const checkCancelled = (step: string) => {
      if (signal?.aborted) {
        throw new CancelledError(`${step} for ${target}`);
      }
    };

    try {
      checkCancelled('connectivity check');
      await run.probe(host.name, () =>
        withReachabilityRetry(host.name, () => this.git.probe(host), this.settings.reachability, this.wait)
      );

      checkCancelled('anchor update');
      const baseBranch = feature.baseBranch ?? repo.baseBranch;
      const anchorActions = await run.anchor(host.name, repo.name, () =>
        this.locks.withLock(
          repoLockScope(repo.name),
          async () => [
            ...(await this.git.ensureAnchor(host, repo)),
            ...(await this.git.ensureBranch(host, repo.name, feature.name, baseBranch)),
          ],
          { timeoutMs: this.settings.lockTimeoutMs, signal }
        )
      );

      checkCancelled('worktree update');
      const worktree = await this.locks.withLock(
        worktreeLockScope(host.name, repo.name),
        () => this.git.ensureWorktree(host, repo.name, feature.name),
        { timeoutMs: this.settings.lockTimeoutMs, signal }
      );

      return {
        repo: repo.name,
        host: host.name,
        status: 'ok',
        worktree: worktree.path,
        branch: worktree.branch,
        head: worktree.head,
        actions: [...anchorActions, ...worktree.actions],
      };
    } catch (err) {
      const error = describeError(err);
      logger.warn('Sync target failed', { feature: feature.name, repo: repo.name, host: host.name, ...error });
      return { repo: repo.name, host: host.name, status: 'failed', error };
    }
  }
}
