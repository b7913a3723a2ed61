/**
 * SessionManager
 *
 * Starts, stops and lists the interactive tmux sessions that run inside
 * feature worktrees. Sessions are not persisted: the key
 * `feat:<feature>:<repo>:<llm>` and its tmux session name are derived on
 * demand, and status queries decode live tmux session names.
 */

import { EventEmitter } from 'events';
import { NameSchema, type Attachment, type FeatureConfig, type HostConfig, type RepoConfig, type SfConfig } from './config/schema.js';
import { parseWith } from './config/store.js';
import { SessionNotFoundError, ValidationError, WorktreeMissingError } from './errors.js';
import type { RemoteGit } from './git/remote-git.js';
import { joinRemote, parseTmuxSessionName, sessionKey, tmuxSessionName, worktreePath } from './layout.js';
import { resolveLlmCommand } from './llm.js';
import { requireAttachment, requireHost, requireRepo, type StateModel } from './state/model.js';
import type { TmuxManager } from './tmux/session.js';
import { logger } from './utils/logger.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface SessionDescriptor {
  key: string;
  // tmux session name
  session: string;
  feature: string;
  repo: string;
  llm: string;
  host: string;
}

export interface StartResult extends SessionDescriptor {
  cwd: string;
  command?: string;
  /** False when an already-running session was returned as is. */
  created: boolean;
  // Set when nothing was run on the host
  dryRun?: true;
}

export interface TargetRequest {
  feature: string;
  repo: string;
  llm: string;
  host?: string;
  subdir?: string;
}

export interface StartRequest extends TargetRequest {
  command?: string;
  force?: boolean;
  dryRun?: boolean;
}

/**
 * Everything needed to address one session: the host it lives on, its key,
 * and the paths it works in (relative to the remote root).
 */
export interface SessionTarget {
  config: SfConfig;
  feature: FeatureConfig;
  repo: RepoConfig;
  attachment: Attachment;
  host: HostConfig;
  llm: string;
  key: string;
  session: string;
  worktree: string;
  cwd: string;
}

export interface SessionEvents {
  'session:started': [StartResult];
  'session:stopped': [SessionDescriptor];
}

export interface SessionManagerDeps {
  git: RemoteGit;
  tmux: TmuxManager;
}

// ─────────────────────────────────────────────────────────────
// Target resolution
// ─────────────────────────────────────────────────────────────

/**
 * The requested host, which must be attached, or the attachment's only host.
 */
export function pickHost(feature: string, attachment: Attachment, host?: string): string {
  if (host) {
    if (!attachment.hosts.includes(host)) {
      throw new ValidationError(`Repo '${attachment.repo}' of feature '${feature}' is not attached on host '${host}'`);
    }
    return host;
  }
  if (attachment.hosts.length === 1) {
    return attachment.hosts[0];
  }
  throw new ValidationError(
    `Repo '${attachment.repo}' of feature '${feature}' is attached on several hosts ` +
      `(${attachment.hosts.join(', ')}); specify one`
  );
}

/**
 * Resolve the host and working directory for `(feature, repo, llm)`. The host
 * defaults to the attachment's only host; with several it must be given.
 */
export async function resolveTarget(model: StateModel, request: TargetRequest): Promise<SessionTarget> {
  const config = await model.loadConfig();
  const feature = await model.getFeature(request.feature);
  const repo = requireRepo(config, request.repo);
  const attachment = requireAttachment(feature, repo.name);
  const llm = parseWith(NameSchema, request.llm, 'llm id');

  const hostName = pickHost(feature.name, attachment, request.host);

  const worktree = worktreePath(feature.name, repo.name);
  return {
    config,
    feature,
    repo,
    attachment,
    host: requireHost(config, hostName),
    llm,
    key: sessionKey(feature.name, repo.name, llm),
    session: tmuxSessionName(feature.name, repo.name, llm),
    worktree,
    cwd: joinRemote(worktree, attachment.subdir ?? repo.anchorSubdir, request.subdir),
  };
}

/**
 * Fail with WorktreeMissing unless sync has created the worktree (and the
 * working directory inside it).
 */
export async function assertWorkspace(git: RemoteGit, target: SessionTarget): Promise<void> {
  if (!(await git.pathExists(target.host, target.worktree))) {
    throw new WorktreeMissingError(target.host.name, target.worktree);
  }
  if (target.cwd !== target.worktree && !(await git.pathExists(target.host, target.cwd))) {
    throw new WorktreeMissingError(target.host.name, target.cwd);
  }
}

function describe(target: SessionTarget): SessionDescriptor {
  return {
    key: target.key,
    session: target.session,
    feature: target.feature.name,
    repo: target.repo.name,
    llm: target.llm,
    host: target.host.name,
  };
}

// ─────────────────────────────────────────────────────────────
// Session Manager Implementation
// ─────────────────────────────────────────────────────────────

export class SessionManager extends EventEmitter<SessionEvents> {
  private readonly git: RemoteGit;
  private readonly tmux: TmuxManager;

  constructor(private model: StateModel, deps: SessionManagerDeps) {
    super();
    this.git = deps.git;
    this.tmux = deps.tmux;
  }

  /**
   * Start the session, or return the running one unchanged. `force` replaces
   * a running session; `dryRun` only resolves what would be started.
   */
  async start(request: StartRequest): Promise<StartResult> {
    const target = await resolveTarget(this.model, request);
    if (request.dryRun) {
      const command = this.commandFor(target, request.command);
      return { ...describe(target), cwd: target.cwd, command, created: false, dryRun: true };
    }
    await assertWorkspace(this.git, target);

    const running = await this.tmux.hasSession(target.host, target.session);
    if (running && !request.force) {
      logger.info('Session already running', { session: target.key, host: target.host.name });
      return { ...describe(target), cwd: target.cwd, created: false };
    }
    if (running) {
      await this.tmux.killSession(target.host, target.session);
    }

    const command = this.commandFor(target, request.command);
    await this.tmux.createSession(target.host, target.session, target.cwd, command);

    const result: StartResult = { ...describe(target), cwd: target.cwd, command, created: true };
    this.emit('session:started', result);
    return result;
  }

  private commandFor(target: SessionTarget, override?: string): string {
    return resolveLlmCommand(
      target.llm,
      target.config.llms,
      { feature: target.feature.name, repo: target.repo.name, host: target.host.name, worktree: target.worktree },
      override
    );
  }

  async stop(request: TargetRequest): Promise<SessionDescriptor> {
    const target = await resolveTarget(this.model, request);
    if (!(await this.tmux.hasSession(target.host, target.session))) {
      throw new SessionNotFoundError(target.key, target.host.name);
    }
    await this.tmux.killSession(target.host, target.session);

    const descriptor = describe(target);
    this.emit('session:stopped', descriptor);
    return descriptor;
  }

  /**
   * Live sessions created by this tool, on one host or on every registered
   * host. In the all-hosts form an unreachable host is logged and skipped.
   */
  async status(hostName?: string): Promise<SessionDescriptor[]> {
    const config = await this.model.loadConfig();
    if (hostName) {
      return this.sessionsOn(requireHost(config, hostName));
    }

    const sessions: SessionDescriptor[] = [];
    for (const host of Object.values(config.hosts)) {
      try {
        sessions.push(...(await this.sessionsOn(host)));
      } catch (err) {
        logger.warn('Could not list sessions', { host: host.name, error: err instanceof Error ? err.message : err });
      }
    }
    return sessions;
  }

  /**
   * Kill every session of `feature` (optionally only those for `repo`) on a host.
   */
  async killFeatureSessions(host: HostConfig, feature: string, repo?: string): Promise<string[]> {
    const killed: string[] = [];
    for (const session of await this.sessionsOn(host)) {
      if (session.feature === feature && (!repo || session.repo === repo)) {
        await this.tmux.killSession(host, session.session);
        this.emit('session:stopped', session);
        killed.push(session.key);
      }
    }
    return killed;
  }

  private async sessionsOn(host: HostConfig): Promise<SessionDescriptor[]> {
    const names = await this.tmux.listSessions(host);
    const sessions: SessionDescriptor[] = [];
    for (const name of names) {
      const parts = parseTmuxSessionName(name);
      if (parts) {
        sessions.push({ key: sessionKey(parts.feature, parts.repo, parts.llm), session: name, ...parts, host: host.name });
      }
    }
    return sessions.sort((a, b) => a.key.localeCompare(b.key));
  }
}
