import { readFile } from 'fs/promises';
import { minimatch } from 'minimatch';
import { SessionNotFoundError, ValidationError } from '../errors.js';
import type { RemoteGit } from '../git/remote-git.js';
import { quote } from '../remote/shell.js';
import { assertWorkspace, resolveTarget, type SessionTarget } from '../session-manager.js';
import type { StateModel } from '../state/model.js';
import type { TmuxCommands } from '../tmux/commands.js';
import type { TmuxManager } from '../tmux/session.js';
import { logger } from '../utils/logger.js';

export interface PromptRequest {
  feature: string;
  repo: string;
  llm: string;
  include?: string[];
  // Globs removing files the include globs matched
  exclude?: string[];
  promptFile?: string;
  maxBytes?: number;
  host?: string;
}

export interface DeliveryResult {
  session: string;
  host: string;
  buffer: string;
  files: string[];
  // Bytes delivered
  bytes: number;
  // Size of the full payload before truncation
  totalBytes: number;
  truncated: boolean;
}

export interface AssembledPayload {
  files: string[];
  payload: Buffer;
}

export interface PromptBuilderDeps {
  git: RemoteGit;
  tmux: TmuxManager;
  commands: TmuxCommands;
}

export function fileHeader(path: string): string {
  return `\n# File: ${path}\n\n`;
}

function matches(path: string, glob: string): boolean {
  return minimatch(path, glob, { dot: true, matchBase: true });
}

/**
 * Files matched by each include glob in order, lexically sorted within a
 * glob. A file matched by an earlier glob is not repeated; a file matched by
 * any exclude glob is dropped.
 */
export function selectFiles(candidates: string[], globs: string[], exclude: string[] = []): string[] {
  const selected: string[] = [];
  const seen = new Set<string>();
  const eligible = candidates.filter((path) => !exclude.some((glob) => matches(path, glob)));
  for (const glob of globs) {
    const matched = eligible.filter((path) => !seen.has(path) && matches(path, glob)).sort();
    for (const path of matched) {
      seen.add(path);
      selected.push(path);
    }
  }
  return selected;
}

/** First `maxBytes` bytes of the payload, or all of it. */
export function truncatePayload(payload: Buffer, maxBytes?: number): { payload: Buffer; truncated: boolean } {
  if (maxBytes === undefined || payload.length <= maxBytes) {
    return { payload, truncated: false };
  }
  return { payload: payload.subarray(0, maxBytes), truncated: true };
}

function isGitPath(path: string): boolean {
  return path === '.git' || path.startsWith('.git/') || path.includes('/.git/') || path.endsWith('/.git');
}

/**
 * Collects remote worktree files and a local prompt file into one payload and
 * pastes it into a running session.
 */
export class PromptBuilder {
  private readonly git: RemoteGit;
  private readonly tmux: TmuxManager;
  private readonly commands: TmuxCommands;

  constructor(private model: StateModel, deps: PromptBuilderDeps) {
    this.git = deps.git;
    this.tmux = deps.tmux;
    this.commands = deps.commands;
  }

  async buildAndSend(request: PromptRequest): Promise<DeliveryResult> {
    if (request.maxBytes !== undefined && request.maxBytes < 1) {
      throw new ValidationError('maxBytes must be a positive number of bytes');
    }
    const target = await resolveTarget(this.model, request);
    await assertWorkspace(this.git, target);
    // Fail before reading anything when delivery is impossible
    if (!(await this.tmux.hasSession(target.host, target.session))) {
      throw new SessionNotFoundError(target.key, target.host.name);
    }

    const assembled = await this.assemble(target, {
      include: request.include ?? [],
      exclude: request.exclude ?? [],
      promptFile: request.promptFile,
    });
    if (assembled.payload.length === 0) {
      throw new ValidationError('Nothing to send: no files matched and no prompt file was given');
    }

    const { payload, truncated } = truncatePayload(assembled.payload, request.maxBytes);
    if (truncated) {
      logger.warn('Prompt payload truncated', {
        session: target.key,
        totalBytes: assembled.payload.length,
        maxBytes: request.maxBytes,
      });
    }

    const buffer = await this.commands.sendPayload(target.host, target, payload);
    return {
      session: target.key,
      host: target.host.name,
      buffer,
      files: assembled.files,
      bytes: payload.length,
      totalBytes: assembled.payload.length,
      truncated,
    };
  }

  /**
   * Remote file sections first, in glob order, then the local prompt file.
   */
  async assemble(
    target: SessionTarget,
    selection: { include: string[]; exclude?: string[]; promptFile?: string }
  ): Promise<AssembledPayload> {
    const { include, exclude = [], promptFile } = selection;
    const parts: Buffer[] = [];
    let files: string[] = [];

    if (include.length > 0) {
      const dir = quote(target.cwd);
      const listing = await this.git.run(target.host, `cd ${dir} && find . -type f`);
      const candidates = listing.stdout
        .split('\n')
        .map((line) => (line.startsWith('./') ? line.slice(2) : line))
        .filter((line) => line.length > 0 && !isGitPath(line));

      files = selectFiles(candidates, include, exclude);
      for (const path of files) {
        const content = await this.git.read(target.host, `cd ${dir} && cat -- ${quote(path)}`);
        parts.push(Buffer.from(fileHeader(path), 'utf-8'), content);
      }
      logger.debug('Prompt files collected', { session: target.key, files: files.length });
    }

    if (promptFile) {
      try {
        parts.push(await readFile(promptFile));
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ValidationError(`Cannot read prompt file ${promptFile}: ${reason}`);
      }
    }

    return { files, payload: Buffer.concat(parts) };
  }
}
