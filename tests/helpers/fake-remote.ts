import type { HostConfig } from '../../src/config/schema.js';
import { UnreachableError } from '../../src/errors.js';
import type { CommandResult, ExecuteOptions, RemoteExecutor } from '../../src/remote/executor.js';

/**
 * In-process stand-in for a fleet of hosts. It understands the exact git,
 * tmux and shell commands the engine issues and keeps the resulting anchors,
 * branches, worktrees, sessions and paste buffers as inspectable state.
 */

export interface FakeAnchor {
  url: string;
  bare: boolean;
  branches: Map<string, string>;
  remotes: Map<string, string>;
  // Working clones: the checked-out branch, and whether it has local commits
  checkedOut?: string;
  diverged?: boolean;
}

export interface FakeWorktree {
  anchor: string;
  branch: string | null;
  head: string;
}

export interface FakeSession {
  cwd: string;
  command: string;
}

export interface RecordedCommand {
  host: string;
  command: string;
  cwd?: string;
  env?: Record<string, string>;
}

export interface Failure {
  host?: string;
  pattern: RegExp;
  result: CommandResult;
  // Remaining times to fail; undefined means always
  times?: number;
}

export class FakeHost {
  unreachableAttempts = 0;
  alwaysUnreachable = false;
  anchors: Map<string, FakeAnchor> = new Map();
  worktrees: Map<string, FakeWorktree> = new Map();
  dirs: Set<string> = new Set();
  // Worktree path -> relative file path -> content
  files: Map<string, Map<string, string | Buffer>> = new Map();
  sessions: Map<string, FakeSession> = new Map();
  buffers: Map<string, Buffer> = new Map();
  pasted: Array<{ session: string; payload: Buffer }> = [];
  binaries: Set<string> = new Set(['claude', 'codex']);

  constructor(readonly name: string) {}

  exists(path: string): boolean {
    if (this.worktrees.has(path) || this.dirs.has(path) || this.anchors.has(path)) {
      return true;
    }
    for (const [worktree, files] of this.files) {
      if (!path.startsWith(`${worktree}/`) || !this.worktrees.has(worktree)) {
        continue;
      }
      const sub = path.slice(worktree.length + 1);
      for (const file of files.keys()) {
        if (file.startsWith(`${sub}/`)) {
          return true;
        }
      }
    }
    return false;
  }

  writeFile(worktree: string, path: string, content: string | Buffer): void {
    const files = this.files.get(worktree) ?? new Map<string, string | Buffer>();
    files.set(path, content);
    this.files.set(worktree, files);
  }
}

const ok = (stdout = '', stderr = ''): CommandResult => ({ exitCode: 0, stdout, stderr });
const fail = (exitCode: number, stderr: string, stdout = ''): CommandResult => ({ exitCode, stdout, stderr });

// tmux stores ':' and '.' in a new session name as '_'
function tmuxName(name: string): string {
  return name.replace(/[:.]/g, '_');
}

/**
 * Session a `-t` target names. The session part ends at the first ':'; '='
 * asks for an exact match, otherwise a unique prefix also matches.
 */
function findSession(host: FakeHost, target: string): string | undefined {
  const exact = target.startsWith('=');
  const colon = target.indexOf(':');
  const name = (colon === -1 ? target : target.slice(0, colon)).slice(exact ? 1 : 0);
  if (host.sessions.has(name)) return name;
  if (exact) return undefined;
  const prefixed = [...host.sessions.keys()].filter((session) => session.startsWith(name));
  return prefixed.length === 1 ? prefixed[0] : undefined;
}

function unquote(value: string): string {
  if (value.startsWith("'") && value.endsWith("'") && value.length >= 2) {
    return value.slice(1, -1).replace(/'\\''/g, "'");
  }
  return value;
}

type Handler = (host: FakeHost, match: RegExpExecArray, options: ExecuteOptions) => CommandResult;

export class FakeRemote implements RemoteExecutor {
  hosts: Map<string, FakeHost> = new Map();
  origins: Map<string, Map<string, string>> = new Map();
  commands: RecordedCommand[] = [];
  failures: Failure[] = [];
  // Runs before each command; lets tests hold a command in flight
  beforeExecute?: (host: string, command: string) => Promise<void>;
  private shaCounter = 0;

  host(name: string): FakeHost {
    let host = this.hosts.get(name);
    if (!host) {
      host = new FakeHost(name);
      this.hosts.set(name, host);
    }
    return host;
  }

  nextSha(): string {
    this.shaCounter += 1;
    return this.shaCounter.toString(16).padStart(40, '0');
  }

  addOrigin(url: string, branches: string[] = ['main']): Map<string, string> {
    const refs = new Map<string, string>();
    for (const branch of branches) {
      refs.set(branch, this.nextSha());
    }
    this.origins.set(url, refs);
    return refs;
  }

  failWhen(pattern: RegExp, result: CommandResult, options: { host?: string; times?: number } = {}): void {
    this.failures.push({ pattern, result, host: options.host, times: options.times });
  }

  commandsOn(host: string): string[] {
    return this.commands.filter((c) => c.host === host).map((c) => c.command);
  }

  async execute(host: HostConfig, command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    if (this.beforeExecute) {
      await this.beforeExecute(host.name, command);
    }
    const state = this.host(host.name);
    this.commands.push({ host: host.name, command, cwd: options.cwd, env: options.env });

    if (state.alwaysUnreachable) {
      throw new UnreachableError(host.name, 'ssh: connect to host: Connection refused');
    }
    if (state.unreachableAttempts > 0) {
      state.unreachableAttempts -= 1;
      throw new UnreachableError(host.name, 'ssh: connect to host: Connection timed out');
    }

    for (const failure of this.failures) {
      if ((failure.host && failure.host !== host.name) || !failure.pattern.test(command)) {
        continue;
      }
      if (failure.times === undefined || failure.times > 0) {
        if (failure.times !== undefined) {
          failure.times -= 1;
        }
        return failure.result;
      }
    }

    for (const [pattern, handler] of this.handlers) {
      const match = pattern.exec(command);
      if (match) {
        return handler(state, match, options);
      }
    }
    throw new Error(`fake remote: unhandled command: ${command}`);
  }

  private handlers: Array<[RegExp, Handler]> = [
    [/^mkdir -p \S+\/repo-cache \S+\/features$/, (h) => {
      h.dirs.add('repo-cache');
      h.dirs.add('features');
      return ok();
    }],

    [/^if \[ -d (\S+) \]; then git -C \S+ rev-parse --is-bare-repository 2>\/dev\/null \|\| echo invalid; else echo absent; fi$/, (h, m) => {
      const anchor = h.anchors.get(m[1]);
      if (anchor) return ok(`${anchor.bare ? 'true' : 'false'}\n`);
      if (h.dirs.has(m[1])) return ok('invalid\n');
      return ok('absent\n');
    }],

    [/^git clone --bare --quiet (\S+) (\S+) && git -C \S+ config remote\.origin\.fetch '\+refs\/heads\/\*:refs\/remotes\/origin\/\*' && git -C \S+ fetch --prune --quiet origin$/, (h, m) => {
      const url = unquote(m[1]);
      const origin = this.origins.get(url);
      if (!origin) return fail(128, `fatal: repository '${url}' does not exist\n`);
      h.anchors.set(m[2], { url, bare: true, branches: new Map(), remotes: new Map(origin) });
      return ok();
    }],

    [/^git -C (\S+) fetch --prune origin$/, (h, m) => {
      const anchor = h.anchors.get(m[1]);
      if (!anchor) return fail(128, 'fatal: not a git repository\n');
      const origin = this.origins.get(anchor.url) ?? new Map<string, string>();
      const changed: string[] = [];
      for (const [branch, sha] of origin) {
        if (anchor.remotes.get(branch) !== sha) changed.push(branch);
      }
      for (const branch of anchor.remotes.keys()) {
        if (!origin.has(branch)) changed.push(branch);
      }
      anchor.remotes = new Map(origin);
      return ok('', changed.map((b) => `   ${b} -> origin/${b}\n`).join(''));
    }],

    [/^git -C (\S+) merge --ff-only --quiet '@\{upstream\}'$/, (h, m) => {
      const anchor = h.anchors.get(m[1]);
      if (!anchor) return fail(128, 'fatal: not a git repository\n');
      if (anchor.bare || !anchor.checkedOut) return fail(128, 'fatal: this operation must be run in a work tree\n');
      const upstream = anchor.remotes.get(anchor.checkedOut);
      if (!upstream) return fail(128, 'fatal: no upstream configured for branch\n');
      if (anchor.diverged) return fail(128, 'fatal: Not possible to fast-forward, aborting.\n');
      anchor.branches.set(anchor.checkedOut, upstream);
      return ok();
    }],

    [/^git -C (\S+) rev-parse --verify --quiet (\S+)$/, (h, m) => {
      const anchor = h.anchors.get(m[1]);
      if (!anchor) return fail(128, 'fatal: not a git repository\n');
      const sha = resolveRef(anchor, m[2]);
      return sha ? ok(`${sha}\n`) : fail(1, '');
    }],

    [/^git -C (\S+) branch --no-track (\S+) (\S+)$/, (h, m) => {
      const anchor = h.anchors.get(m[1]);
      if (!anchor) return fail(128, 'fatal: not a git repository\n');
      if (anchor.branches.has(m[2])) return fail(128, `fatal: a branch named '${m[2]}' already exists\n`);
      const sha = resolveRef(anchor, m[3]);
      if (!sha) return fail(128, `fatal: not a valid object name: '${m[3]}'\n`);
      anchor.branches.set(m[2], sha);
      return ok();
    }],

    [/^if \[ -e (\S+) \]; then git -C \S+ symbolic-ref --quiet HEAD \|\| echo detached; git -C \S+ rev-parse HEAD; else echo absent; fi$/, (h, m) => {
      const worktree = h.worktrees.get(m[1]);
      if (worktree) {
        const ref = worktree.branch ? `refs/heads/${worktree.branch}` : 'detached';
        return ok(`${ref}\n${worktree.head}\n`);
      }
      if (h.exists(m[1])) return fail(128, 'fatal: not a git repository\n', 'detached\n');
      return ok('absent\n');
    }],

    [/^git -C (\S+) worktree prune && mkdir -p (\S+) && git -C \S+ worktree add --quiet "\$PWD"\/(\S+) (\S+)$/, (h, m) => {
      const anchor = h.anchors.get(m[1]);
      if (!anchor) return fail(128, 'fatal: not a git repository\n');
      h.dirs.add(m[2]);
      const path = m[3];
      if (h.exists(path)) return fail(128, `fatal: '${path}' already exists\n`);
      const sha = anchor.branches.get(m[4]);
      if (!sha) return fail(128, `fatal: invalid reference: ${m[4]}\n`);
      for (const [other, wt] of h.worktrees) {
        if (wt.anchor === m[1] && wt.branch === m[4]) {
          return fail(128, `fatal: '${m[4]}' is already checked out at '${other}'\n`);
        }
      }
      h.worktrees.set(path, { anchor: m[1], branch: m[4], head: sha });
      return ok();
    }],

    [/^git -C (\S+) rev-parse HEAD$/, (h, m) => {
      const worktree = h.worktrees.get(m[1]);
      return worktree ? ok(`${worktree.head}\n`) : fail(128, 'fatal: not a git repository\n');
    }],

    [/^test -[de] (\S+)$/, (h, m) => (h.exists(unquote(m[1])) ? ok() : fail(1, ''))],

    [/^git -C (\S+) worktree remove --force "\$PWD"\/(\S+)$/, (h, m) => {
      const worktree = h.worktrees.get(m[2]);
      if (!worktree || worktree.anchor !== m[1]) return fail(128, `fatal: '${m[2]}' is not a working tree\n`);
      h.worktrees.delete(m[2]);
      h.files.delete(m[2]);
      return ok();
    }],

    [/^git -C (\S+) worktree prune$/, () => ok()],

    [/^git -C (\S+) branch -D (\S+)$/, (h, m) => {
      const anchor = h.anchors.get(m[1]);
      if (!anchor || !anchor.branches.has(m[2])) return fail(1, `error: branch '${m[2]}' not found\n`);
      for (const [path, wt] of h.worktrees) {
        if (wt.anchor === m[1] && wt.branch === m[2]) {
          return fail(1, `error: cannot delete branch '${m[2]}' checked out at '${path}'\n`);
        }
      }
      anchor.branches.delete(m[2]);
      return ok();
    }],

    [/^rmdir (\S+) 2>\/dev\/null \|\| true$/, (h, m) => {
      const root = m[1];
      const busy = [...h.worktrees.keys()].some((path) => path.startsWith(`${root}/`));
      if (!busy) h.dirs.delete(root);
      return ok();
    }],

    [/^tmux has-session -t (\S+) 2>\/dev\/null$/, (h, m) => (findSession(h, unquote(m[1])) ? ok() : fail(1, ''))],

    [/^tmux new-session -d -s (\S+) -c "\$PWD"\/(\S+) (.+)$/, (h, m) => {
      const name = tmuxName(unquote(m[1]));
      if (h.sessions.has(name)) return fail(1, `duplicate session: ${name}\n`);
      h.sessions.set(name, { cwd: unquote(m[2]), command: unquote(m[3]) });
      return ok();
    }],

    [/^tmux kill-session -t (\S+)$/, (h, m) => {
      const name = findSession(h, unquote(m[1]));
      if (!name) return fail(1, `can't find session: ${unquote(m[1])}\n`);
      h.sessions.delete(name);
      return ok();
    }],

    [/^tmux list-sessions -F '#\{session_name\}'$/, (h) => {
      if (h.sessions.size === 0) return fail(1, 'no server running on /tmp/tmux-1000/default\n');
      return ok([...h.sessions.keys()].map((name) => `${name}\n`).join(''));
    }],

    [/^tmux load-buffer -b (\S+) -$/, (h, m, options) => {
      const input = options.input ?? '';
      h.buffers.set(unquote(m[1]), Buffer.isBuffer(input) ? input : Buffer.from(input));
      return ok();
    }],

    [/^tmux paste-buffer -d -b (\S+) -t (\S+) && tmux send-keys -t \S+ Enter$/, (h, m) => {
      const buffer = h.buffers.get(unquote(m[1]));
      const session = findSession(h, unquote(m[2]));
      if (!buffer) return fail(1, 'no buffer\n');
      if (!session) return fail(1, `can't find session: ${unquote(m[2])}\n`);
      h.buffers.delete(unquote(m[1]));
      h.pasted.push({ session, payload: buffer });
      return ok();
    }],

    [/^cd (\S+) && find \. -type f$/, (h, m) => {
      const dir = unquote(m[1]);
      const lines: string[] = [];
      for (const [worktree, files] of h.files) {
        if (dir !== worktree && !dir.startsWith(`${worktree}/`)) continue;
        const prefix = dir === worktree ? '' : `${dir.slice(worktree.length + 1)}/`;
        if (h.worktrees.has(worktree) && prefix === '') lines.push('./.git');
        for (const file of files.keys()) {
          if (file.startsWith(prefix)) lines.push(`./${file.slice(prefix.length)}`);
        }
      }
      return ok(lines.map((line) => `${line}\n`).join(''));
    }],

    [/^cd (\S+) && cat -- (\S+)$/, (h, m, options) => {
      const dir = unquote(m[1]);
      const file = unquote(m[2]);
      for (const [worktree, files] of h.files) {
        if (dir !== worktree && !dir.startsWith(`${worktree}/`)) continue;
        const prefix = dir === worktree ? '' : `${dir.slice(worktree.length + 1)}/`;
        const content = files.get(`${prefix}${file}`);
        if (content === undefined) continue;
        const bytes = Buffer.isBuffer(content) ? content : Buffer.from(content, 'utf-8');
        const result = ok(bytes.toString('utf-8'));
        if (options.binary) result.stdoutBytes = bytes;
        return result;
      }
      return fail(1, `cat: ${file}: No such file or directory\n`);
    }],

    [/^docker compose -f (\S+) (up|down|ps)(.*)$/, (_h, m) => ok(`compose ${m[2]} ${unquote(m[1])}\n`)],

    [/^true$/, () => ok()],
    [/^git --version$/, () => ok('git version 2.43.0\n')],
    [/^tmux -V$/, () => ok('tmux 3.4\n')],
    [/^command -v (\S+)$/, (h, m) => {
      const binary = unquote(m[1]);
      return h.binaries.has(binary) ? ok(`/usr/local/bin/${binary}\n`) : fail(1, '');
    }],
  ];
}

function resolveRef(anchor: FakeAnchor, ref: string): string | undefined {
  if (ref.startsWith('refs/heads/')) return anchor.branches.get(ref.slice('refs/heads/'.length));
  if (ref.startsWith('refs/remotes/origin/')) return anchor.remotes.get(ref.slice('refs/remotes/origin/'.length));
  return undefined;
}
