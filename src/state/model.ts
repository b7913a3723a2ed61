import {
  AttachmentSchema,
  FeatureConfigSchema,
  HostConfigSchema,
  NameSchema,
  RepoConfigSchema,
  StateExportSchema,
  type Attachment,
  type FeatureConfig,
  type HostConfig,
  type HostInput,
  type RepoConfig,
  type RepoInput,
  type SfConfig,
  type StateExport,
} from '../config/schema.js';
import { parseWith, type StateStore } from '../config/store.js';
import { ValidationError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { ownValue } from '../utils/record.js';

export type AttachMode = 'union' | 'replace';

export interface AttachOptions {
  mode?: AttachMode;
  subdir?: string;
  composeFile?: string;
}

export interface AttachResult {
  feature: FeatureConfig;
  attachment: Attachment;
  /** Hosts dropped by a `replace` that narrowed the host set. */
  removedHosts: string[];
}

/**
 * Every attachment must reference a registered repo and registered hosts.
 */
export function assertReferences(config: SfConfig, features: Iterable<FeatureConfig>): void {
  const problems: string[] = [];
  for (const feature of features) {
    for (const attachment of feature.attachments) {
      if (!ownValue(config.repos, attachment.repo)) {
        problems.push(`feature '${feature.name}' attaches unknown repo '${attachment.repo}'`);
      }
      for (const host of attachment.hosts) {
        if (!ownValue(config.hosts, host)) {
          problems.push(`feature '${feature.name}' attaches '${attachment.repo}' to unknown host '${host}'`);
        }
      }
    }
  }
  if (problems.length > 0) {
    throw new ValidationError(`State references are inconsistent: ${problems.join('; ')}`);
  }
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Hosts, repos, features and attachments, with their invariants enforced on
 * every write. Anchors and worktrees are not tracked here; they live on the
 * hosts and are observed by the sync engine.
 */
export class StateModel {
  constructor(readonly store: StateStore) {}

  loadConfig(): Promise<SfConfig> {
    return this.store.loadConfig();
  }

  // ─────────────────────────────────────────────────────────────
  // Hosts
  // ─────────────────────────────────────────────────────────────

  async listHosts(): Promise<HostConfig[]> {
    const config = await this.store.loadConfig();
    return Object.values(config.hosts);
  }

  async getHost(name: string): Promise<HostConfig> {
    const config = await this.store.loadConfig();
    return requireHost(config, name);
  }

  async addHost(input: HostInput): Promise<HostConfig> {
    const host = parseWith(HostConfigSchema, input, 'host');
    const config = await this.store.loadConfig();
    if (ownValue(config.hosts, host.name)) {
      throw new ValidationError(`Host '${host.name}' already exists`);
    }
    const added = { ...host, tags: unique(host.tags) };
    config.hosts[host.name] = added;
    await this.store.saveConfig(config);
    logger.info('Host added', { host: host.name, address: host.address });
    return added;
  }

  /**
   * Only tags and env may change after a host is created.
   */
  async updateHost(name: string, update: { tags?: string[]; env?: Record<string, string> }): Promise<HostConfig> {
    const config = await this.store.loadConfig();
    const current = requireHost(config, name);
    const next = parseWith(
      HostConfigSchema,
      {
        ...current,
        tags: update.tags ? unique(update.tags) : current.tags,
        env: update.env ?? current.env,
      },
      `host '${name}'`
    );
    config.hosts[name] = next;
    await this.store.saveConfig(config);
    return next;
  }

  async removeHost(name: string): Promise<void> {
    const config = await this.store.loadConfig();
    requireHost(config, name);
    const users: string[] = [];
    for (const feature of Object.values(await this.store.loadAllFeatures())) {
      for (const attachment of feature.attachments) {
        if (attachment.hosts.includes(name)) {
          users.push(`${feature.name}/${attachment.repo}`);
        }
      }
    }
    if (users.length > 0) {
      throw new ValidationError(`Host '${name}' is still attached to ${users.join(', ')}`);
    }
    delete config.hosts[name];
    await this.store.saveConfig(config);
    logger.info('Host removed', { host: name });
  }

  // ─────────────────────────────────────────────────────────────
  // Repos
  // ─────────────────────────────────────────────────────────────

  async listRepos(): Promise<RepoConfig[]> {
    const config = await this.store.loadConfig();
    return Object.values(config.repos);
  }

  async addRepo(input: RepoInput): Promise<RepoConfig> {
    const repo = parseWith(RepoConfigSchema, input, 'repo');
    const config = await this.store.loadConfig();
    if (ownValue(config.repos, repo.name)) {
      throw new ValidationError(`Repo '${repo.name}' already exists`);
    }
    config.repos[repo.name] = repo;
    await this.store.saveConfig(config);
    logger.info('Repo added', { repo: repo.name, url: repo.url });
    return repo;
  }

  /**
   * The url is fixed once anchors may exist; base branch and anchor subdir
   * only affect work done after the change.
   */
  async updateRepo(
    name: string,
    update: { baseBranch?: string; anchorSubdir?: string | null }
  ): Promise<RepoConfig> {
    const config = await this.store.loadConfig();
    const current = requireRepo(config, name);
    const anchorSubdir =
      update.anchorSubdir === null ? undefined : (update.anchorSubdir ?? current.anchorSubdir);
    const next = parseWith(
      RepoConfigSchema,
      { ...current, baseBranch: update.baseBranch ?? current.baseBranch, anchorSubdir },
      `repo '${name}'`
    );
    config.repos[name] = next;
    await this.store.saveConfig(config);
    return next;
  }

  async removeRepo(name: string): Promise<void> {
    const config = await this.store.loadConfig();
    requireRepo(config, name);
    const users = Object.values(await this.store.loadAllFeatures())
      .filter((feature) => feature.attachments.some((a) => a.repo === name))
      .map((feature) => feature.name);
    if (users.length > 0) {
      throw new ValidationError(`Repo '${name}' is still attached to ${users.join(', ')}`);
    }
    delete config.repos[name];
    await this.store.saveConfig(config);
    logger.info('Repo removed', { repo: name });
  }

  // ─────────────────────────────────────────────────────────────
  // Features and attachments
  // ─────────────────────────────────────────────────────────────

  listFeatures(): Promise<string[]> {
    return this.store.listFeatures();
  }

  getFeature(name: string): Promise<FeatureConfig> {
    return this.store.loadFeature(parseWith(NameSchema, name, 'feature name'));
  }

  async createFeature(name: string, baseBranch?: string): Promise<FeatureConfig> {
    const feature = parseWith(FeatureConfigSchema, { name, baseBranch, attachments: [] }, 'feature');
    if (await this.store.findFeature(feature.name)) {
      throw new ValidationError(`Feature '${feature.name}' already exists`);
    }
    await this.store.saveFeature(feature);
    logger.info('Feature created', { feature: feature.name, baseBranch: feature.baseBranch });
    return feature;
  }

  /**
   * Attach `repo` to `feature` on `hosts`. `union` adds hosts to an existing
   * attachment, `replace` sets the host set exactly.
   */
  async attach(
    featureName: string,
    repoName: string,
    hosts: string[],
    options: AttachOptions = {}
  ): Promise<AttachResult> {
    const mode = options.mode ?? 'union';
    const config = await this.store.loadConfig();
    const feature = await this.getFeature(featureName);
    requireRepo(config, repoName);
    for (const host of hosts) {
      requireHost(config, host);
    }

    const existing = feature.attachments.find((a) => a.repo === repoName);
    const nextHosts = mode === 'union' && existing ? unique([...existing.hosts, ...hosts]) : unique(hosts);
    const attachment = parseWith(
      AttachmentSchema,
      {
        repo: repoName,
        hosts: nextHosts,
        subdir: options.subdir ?? existing?.subdir,
        composeFile: options.composeFile ?? existing?.composeFile,
      },
      `attachment of '${repoName}'`
    );
    const removedHosts = existing ? existing.hosts.filter((h) => !nextHosts.includes(h)) : [];

    feature.attachments = existing
      ? feature.attachments.map((a) => (a.repo === repoName ? attachment : a))
      : [...feature.attachments, attachment];
    await this.store.saveFeature(feature);

    logger.info('Repo attached', {
      feature: feature.name,
      repo: repoName,
      hosts: attachment.hosts,
      mode,
      removedHosts,
    });
    return { feature, attachment, removedHosts };
  }

  /**
   * Drop `hosts` from an attachment, or the whole attachment when `hosts` is
   * omitted or covers every host. Returns the hosts that were removed.
   */
  async removeAttachmentHosts(featureName: string, repoName: string, hosts?: string[]): Promise<string[]> {
    const feature = await this.getFeature(featureName);
    const attachment = requireAttachment(feature, repoName);
    const removed = hosts ? attachment.hosts.filter((h) => hosts.includes(h)) : [...attachment.hosts];
    const remaining = attachment.hosts.filter((h) => !removed.includes(h));

    feature.attachments =
      remaining.length === 0
        ? feature.attachments.filter((a) => a.repo !== repoName)
        : feature.attachments.map((a) => (a.repo === repoName ? { ...a, hosts: remaining } : a));
    await this.store.saveFeature(feature);
    return removed;
  }

  async deleteFeature(name: string): Promise<void> {
    await this.store.deleteFeature(name);
    logger.info('Feature record removed', { feature: name });
  }

  // ─────────────────────────────────────────────────────────────
  // Export / import
  // ─────────────────────────────────────────────────────────────

  exportState(path: string): Promise<StateExport> {
    return this.store.exportState(path);
  }

  /**
   * Restore an interchange document. Without `replace`, hosts, repos, llm
   * templates and features are upserted over the current state.
   */
  async importState(document: unknown, options: { replace?: boolean } = {}): Promise<StateExport> {
    const incoming = parseWith(StateExportSchema, document, 'state document');
    const replace = options.replace ?? false;

    let merged: Pick<StateExport, 'config' | 'features'>;
    if (replace) {
      merged = { config: incoming.config, features: incoming.features };
    } else {
      const current = await this.store.loadConfig();
      merged = {
        config: {
          hosts: { ...current.hosts, ...incoming.config.hosts },
          repos: { ...current.repos, ...incoming.config.repos },
          llms: { ...current.llms, ...incoming.config.llms },
          settings: current.settings,
        },
        features: { ...(await this.store.loadAllFeatures()), ...incoming.features },
      };
    }

    const entries: Array<[string, string, { name: string }]> = [
      ...Object.entries(merged.config.hosts).map(([k, v]): [string, string, { name: string }] => ['Host', k, v]),
      ...Object.entries(merged.config.repos).map(([k, v]): [string, string, { name: string }] => ['Repo', k, v]),
      ...Object.entries(merged.features).map(([k, v]): [string, string, { name: string }] => ['Feature', k, v]),
    ];
    for (const [kind, key, record] of entries) {
      if (key !== record.name) {
        throw new ValidationError(`${kind} entry '${key}' is named '${record.name}'`);
      }
    }
    assertReferences(merged.config, Object.values(merged.features));
    await this.store.writeState(merged, replace);
    logger.info('Imported state', { replace, features: Object.keys(merged.features).length });
    return { version: 1, config: merged.config, features: merged.features };
  }
}

export function requireHost(config: SfConfig, name: string): HostConfig {
  const host = ownValue(config.hosts, name);
  if (!host) {
    throw new ValidationError(`Host '${name}' is not registered`);
  }
  return host;
}

export function requireRepo(config: SfConfig, name: string): RepoConfig {
  const repo = ownValue(config.repos, name);
  if (!repo) {
    throw new ValidationError(`Repo '${name}' is not registered`);
  }
  return repo;
}

export function requireAttachment(feature: FeatureConfig, repo: string): Attachment {
  const attachment = feature.attachments.find((a) => a.repo === repo);
  if (!attachment) {
    throw new ValidationError(`Repo '${repo}' is not attached to feature '${feature.name}'`);
  }
  return attachment;
}
