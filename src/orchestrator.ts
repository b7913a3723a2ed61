/**
 * Orchestrator
 *
 * Wires the state model, executor, locks, sync engine, sessions, prompt
 * delivery and compose runtime together. The CLI and the HTTP server both
 * talk to this class only.
 */

import type { HostConfig, RepoConfig, Settings } from './config/schema.js';
import { StateStore } from './config/store.js';
import { ComposeManager, type ComposeAction } from './compose/manager.js';
import { describeError, ValidationError, type ErrorDescription } from './errors.js';
import { RemoteGit } from './git/remote-git.js';
import { repoLockScope, worktreeLockScope } from './layout.js';
import { DEFAULT_LLM_COMMANDS, llmBinary } from './llm.js';
import { LockManager } from './lock/manager.js';
import { PromptBuilder, type DeliveryResult, type PromptRequest } from './prompt/builder.js';
import { ShellExecutor, type CommandResult, type RemoteExecutor } from './remote/executor.js';
import { sleep, withReachabilityRetry, type Sleep } from './remote/reachability.js';
import { quote } from './remote/shell.js';
import {
  pickHost,
  SessionManager,
  type SessionDescriptor,
  type StartRequest,
  type StartResult,
  type TargetRequest,
} from './session-manager.js';
import { requireAttachment, requireHost, requireRepo, StateModel, type AttachOptions, type AttachResult } from './state/model.js';
import { SyncEngine, type SyncOptions, type SyncReport } from './sync/engine.js';
import { TmuxCommands } from './tmux/commands.js';
import { TmuxManager } from './tmux/session.js';
import { mapWithConcurrency } from './utils/concurrency.js';
import { ownValue } from './utils/record.js';
import { logger } from './utils/logger.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface OrchestratorOptions {
  // Local state root; defaults to $SF_STATE_DIR or ~/.sf
  stateRoot?: string;
  executor?: RemoteExecutor;
  // Backoff sleep, replaceable in tests
  wait?: Sleep;
  lockPollIntervalMs?: number;
}

export interface TeardownTargetResult {
  repo: string;
  host: string;
  status: 'ok' | 'failed';
  killedSessions: string[];
  error?: ErrorDescription;
}

export interface TeardownReport {
  feature: string;
  ok: boolean;
  results: TeardownTargetResult[];
  // True when the feature record (or the detached hosts) were removed from state
  recordUpdated: boolean;
}

export interface AttachOutcome extends AttachResult {
  teardown?: TeardownReport;
}

export interface BootstrapCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface BootstrapHostReport {
  host: string;
  ok: boolean;
  checks: BootstrapCheck[];
}

export interface UpRequest {
  host: { name: string; address: string };
  repo: { name: string; url: string; baseBranch?: string };
  feature: string;
  // Base branch of a feature created here
  baseBranch?: string;
  llm?: string;
  // Delivered once the session runs; skipped on a dry run
  prompt?: Pick<PromptRequest, 'include' | 'exclude' | 'promptFile' | 'maxBytes'>;
  dryRun?: boolean;
}

export interface UpResult {
  sync: SyncReport;
  session?: StartResult;
  prompt?: DeliveryResult;
}

export interface ComposeRequest {
  feature: string;
  repo: string;
  host?: string;
  extraArgs?: string[];
}

// ─────────────────────────────────────────────────────────────
// Orchestrator Implementation
// ─────────────────────────────────────────────────────────────

export class Orchestrator {
  readonly sessions: SessionManager;
  readonly prompts: PromptBuilder;
  readonly engine: SyncEngine;
  readonly compose: ComposeManager;
  private readonly git: RemoteGit;
  private readonly executor: RemoteExecutor;
  private readonly locks: LockManager;
  private readonly wait: Sleep;

  constructor(
    readonly model: StateModel,
    readonly settings: Settings,
    options: OrchestratorOptions = {}
  ) {
    this.wait = options.wait ?? sleep;
    this.executor = options.executor ?? new ShellExecutor({ timeoutMs: settings.commandTimeoutMs });
    this.locks = new LockManager({
      lockDir: model.store.paths.locksDir,
      timeoutMs: settings.lockTimeoutMs,
      pollIntervalMs: options.lockPollIntervalMs,
    });

    const remote = { remoteRoot: settings.remoteRoot, timeoutMs: settings.commandTimeoutMs };
    this.git = new RemoteGit(this.executor, remote);
    const tmux = new TmuxManager(this.executor, remote);

    this.engine = new SyncEngine(model, { executor: this.executor, locks: this.locks, settings, wait: this.wait });
    this.sessions = new SessionManager(model, { git: this.git, tmux });
    this.prompts = new PromptBuilder(model, { git: this.git, tmux, commands: new TmuxCommands(tmux) });
    this.compose = new ComposeManager(this.executor, this.git, remote);
  }

  /**
   * Load settings from the state root and build an orchestrator over it.
   */
  static async open(options: OrchestratorOptions = {}): Promise<Orchestrator> {
    const store = new StateStore(options.stateRoot);
    await store.ensureDirs();
    const config = await store.loadConfig();
    return new Orchestrator(new StateModel(store), config.settings, options);
  }

  // ─────────────────────────────────────────────────────────────
  // Reconciliation
  // ─────────────────────────────────────────────────────────────

  sync(feature: string, options: SyncOptions = {}): Promise<SyncReport> {
    return this.engine.sync(feature, options);
  }

  /**
   * Attach through the state model. Hosts dropped by a narrowing `replace`
   * are torn down when `detachPolicy` is `teardown`, otherwise left in place.
   */
  async attach(feature: string, repo: string, hosts: string[], options: AttachOptions = {}): Promise<AttachOutcome> {
    const result = await this.model.attach(feature, repo, hosts, options);
    if (result.removedHosts.length === 0) {
      return result;
    }

    if (this.settings.detachPolicy === 'orphan') {
      logger.warn('Hosts removed from attachment; worktrees left in place', {
        feature,
        repo,
        hosts: result.removedHosts,
      });
      return result;
    }

    const teardown = await this.teardownTargets(feature, repo, result.removedHosts);
    return { ...result, teardown };
  }

  /**
   * Remove `hosts` (or every host) from an attachment and tear their
   * worktrees down. Only hosts whose teardown succeeded leave the record.
   */
  async detach(feature: string, repo: string, hosts?: string[]): Promise<TeardownReport> {
    const record = await this.model.getFeature(feature);
    const attachment = requireAttachment(record, repo);
    const unknown = (hosts ?? []).filter((h) => !attachment.hosts.includes(h));
    if (unknown.length > 0) {
      throw new ValidationError(`Not attached to '${repo}' of feature '${feature}': ${unknown.join(', ')}`);
    }

    const report = await this.teardownTargets(feature, repo, hosts ?? attachment.hosts);
    const succeeded = report.results.filter((r) => r.status === 'ok').map((r) => r.host);
    if (succeeded.length > 0) {
      await this.model.removeAttachmentHosts(feature, repo, succeeded);
    }
    return { ...report, recordUpdated: succeeded.length > 0 };
  }

  /**
   * Tear down every (repo, host) target and remove the feature record once
   * all of them succeeded. Anchors are kept.
   */
  async destroyFeature(feature: string): Promise<TeardownReport> {
    const record = await this.model.getFeature(feature);
    const results: TeardownTargetResult[] = [];
    for (const attachment of record.attachments) {
      const report = await this.teardownTargets(feature, attachment.repo, attachment.hosts);
      results.push(...report.results);
    }

    const ok = results.every((r) => r.status === 'ok');
    if (ok) {
      await this.model.deleteFeature(feature);
    } else {
      logger.warn('Feature teardown incomplete; record kept', { feature });
    }
    return { feature, ok, results, recordUpdated: ok };
  }

  private async teardownTargets(feature: string, repoName: string, hosts: string[]): Promise<TeardownReport> {
    const config = await this.model.loadConfig();
    const repo = requireRepo(config, repoName);

    const results = await mapWithConcurrency(hosts, this.settings.maxParallelHosts, (hostName) =>
      this.teardownTarget(feature, repo, requireHost(config, hostName))
    );
    return { feature, ok: results.every((r) => r.status === 'ok'), results, recordUpdated: false };
  }

  private async teardownTarget(feature: string, repo: RepoConfig, host: HostConfig): Promise<TeardownTargetResult> {
    const killedSessions: string[] = [];
    try {
      await withReachabilityRetry(host.name, () => this.git.probe(host), this.settings.reachability, this.wait);
      const lockOptions = { timeoutMs: this.settings.lockTimeoutMs };

      await this.locks.withLock(
        worktreeLockScope(host.name, repo.name),
        async () => {
          killedSessions.push(...(await this.sessions.killFeatureSessions(host, feature, repo.name)));
          await this.locks.withLock(
            repoLockScope(repo.name),
            () => this.git.removeWorktree(host, repo.name, feature),
            lockOptions
          );
        },
        lockOptions
      );
      return { repo: repo.name, host: host.name, status: 'ok', killedSessions };
    } catch (err) {
      const error = describeError(err);
      logger.warn('Teardown target failed', { feature, repo: repo.name, host: host.name, ...error });
      return { repo: repo.name, host: host.name, status: 'failed', killedSessions, error };
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Sessions and prompts
  // ─────────────────────────────────────────────────────────────

  startSession(request: StartRequest): Promise<StartResult> {
    return this.sessions.start(request);
  }

  stopSession(request: TargetRequest): Promise<SessionDescriptor> {
    return this.sessions.stop(request);
  }

  sessionStatus(host?: string): Promise<SessionDescriptor[]> {
    return this.sessions.status(host);
  }

  sendPrompt(request: PromptRequest): Promise<DeliveryResult> {
    return this.prompts.buildAndSend(request);
  }

  /**
   * One step from nothing to a running session: register the host and repo
   * (or check them against what is registered), create the feature, attach,
   * sync that one target, start the session and optionally send a prompt.
   * Stops after a failed sync and returns its report.
   */
  async up(request: UpRequest): Promise<UpResult> {
    const { host, repo, feature } = request;
    const config = await this.model.loadConfig();

    const knownHost = ownValue(config.hosts, host.name);
    if (!knownHost) {
      await this.model.addHost(host);
    } else if (knownHost.address !== host.address) {
      throw new ValidationError(`Host '${host.name}' is registered with address '${knownHost.address}'`);
    }

    const knownRepo = ownValue(config.repos, repo.name);
    if (!knownRepo) {
      await this.model.addRepo(repo);
    } else if (knownRepo.url !== repo.url) {
      throw new ValidationError(`Repo '${repo.name}' is registered with url '${knownRepo.url}'`);
    } else if (repo.baseBranch && repo.baseBranch !== knownRepo.baseBranch) {
      await this.model.updateRepo(repo.name, { baseBranch: repo.baseBranch });
    }

    if (!(await this.model.listFeatures()).includes(feature)) {
      await this.model.createFeature(feature, request.baseBranch);
    } else if (request.baseBranch) {
      const existing = await this.model.getFeature(feature);
      if (existing.baseBranch !== request.baseBranch) {
        const current = existing.baseBranch ? `base branch '${existing.baseBranch}'` : "each repo's base branch";
        throw new ValidationError(`Feature '${feature}' already exists on ${current}`);
      }
    }
    await this.attach(feature, repo.name, [host.name]);

    const sync = await this.sync(feature, { repos: [repo.name], hosts: [host.name], dryRun: request.dryRun });
    if (!sync.ok) {
      return { sync };
    }

    const llm = request.llm ?? 'claude';
    const target = { feature, repo: repo.name, llm, host: host.name };
    const session = await this.startSession({ ...target, dryRun: request.dryRun });
    if (!request.prompt || request.dryRun) {
      return { sync, session };
    }
    const prompt = await this.sendPrompt({ ...target, ...request.prompt });
    return { sync, session, prompt };
  }

  // ─────────────────────────────────────────────────────────────
  // Compose runtime
  // ─────────────────────────────────────────────────────────────

  async runCompose(action: ComposeAction, request: ComposeRequest): Promise<CommandResult> {
    const config = await this.model.loadConfig();
    const feature = await this.model.getFeature(request.feature);
    const attachment = requireAttachment(feature, request.repo);
    const host = requireHost(config, pickHost(feature.name, attachment, request.host));
    return this.compose.run(action, host, feature.name, attachment, request.extraArgs);
  }

  // ─────────────────────────────────────────────────────────────
  // Bootstrap
  // ─────────────────────────────────────────────────────────────

  /**
   * Check that each host has git, tmux and the configured llm binaries.
   */
  async bootstrap(hostNames?: string[]): Promise<BootstrapHostReport[]> {
    const config = await this.model.loadConfig();
    const hosts = hostNames ? hostNames.map((h) => requireHost(config, h)) : Object.values(config.hosts);
    const binaries = Array.from(
      new Set(Object.values({ ...DEFAULT_LLM_COMMANDS, ...config.llms }).map(llmBinary))
    ).sort();

    const checks: Array<{ name: string; command: string }> = [
      { name: 'git', command: 'git --version' },
      { name: 'tmux', command: 'tmux -V' },
      ...binaries.map((binary) => ({ name: binary, command: `command -v ${quote(binary)}` })),
    ];

    return mapWithConcurrency(hosts, this.settings.maxParallelHosts, async (host) => {
      const results: BootstrapCheck[] = [];
      try {
        await withReachabilityRetry(host.name, () => this.git.probe(host), this.settings.reachability, this.wait);
      } catch (err) {
        const { message } = describeError(err);
        return { host: host.name, ok: false, checks: [{ name: 'reachable', ok: false, detail: message }] };
      }
      results.push({ name: 'reachable', ok: true, detail: host.address });

      for (const check of checks) {
        try {
          const result = await this.executor.execute(host, check.command, {
            timeoutMs: this.settings.commandTimeoutMs,
          });
          const output = (result.exitCode === 0 ? result.stdout : result.stderr).trim();
          results.push({
            name: check.name,
            ok: result.exitCode === 0,
            detail: output || (result.exitCode === 0 ? 'ok' : `exit ${result.exitCode}`),
          });
        } catch (err) {
          results.push({ name: check.name, ok: false, detail: describeError(err).message });
        }
      }
      return { host: host.name, ok: results.every((c) => c.ok), checks: results };
    });
  }
}
