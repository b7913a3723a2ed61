/**
 * Deterministic names shared with existing deployments. These strings are the
 * only link between the state model and what exists on a host, so they must
 * not change.
 */

export const ANCHOR_DIR = 'repo-cache';
export const FEATURES_DIR = 'features';

export function anchorPath(repo: string): string {
  return `${ANCHOR_DIR}/${repo}.anchor`;
}

export function featureRoot(feature: string): string {
  return `${FEATURES_DIR}/${feature}`;
}

export function worktreePath(feature: string, repo: string): string {
  return `${featureRoot(feature)}/${repo}`;
}

export function branchName(feature: string): string {
  return `feat/${feature}`;
}

export function sessionKey(feature: string, repo: string, llm: string): string {
  return `feat:${feature}:${repo}:${llm}`;
}

export interface SessionKeyParts {
  feature: string;
  repo: string;
  llm: string;
}

/**
 * tmux rewrites ':' and '.' in session names and reads ':' in a target as the
 * window separator, so the session for a key is named
 * `feat+<feature>+<repo>+<llm>` with '.' written as ','. Neither '+' nor ','
 * can occur in a name.
 */
export function tmuxSessionName(feature: string, repo: string, llm: string): string {
  return ['feat', feature, repo, llm].map((part) => part.replace(/\./g, ',')).join('+');
}

const TMUX_NAME_PART = /^[A-Za-z0-9][A-Za-z0-9_,-]*$/;

/** Inverse of {@link tmuxSessionName}. */
export function parseTmuxSessionName(name: string): SessionKeyParts | null {
  const parts = name.split('+');
  if (parts.length !== 4 || parts[0] !== 'feat' || !parts.slice(1).every((part) => TMUX_NAME_PART.test(part))) {
    return null;
  }
  const [feature, repo, llm] = parts.slice(1).map((part) => part.replace(/,/g, '.'));
  return { feature, repo, llm };
}

/**
 * `-t` target matching exactly one session; `pane` adds the trailing ':' that
 * window and pane targets need.
 */
export function tmuxTarget(name: string, pane = false): string {
  return `=${name}${pane ? ':' : ''}`;
}

/** Lock scope for anchor work on a repo, across all hosts. */
export function repoLockScope(repo: string): string {
  return `repo:${repo}`;
}

/** Lock scope for worktree work on one host. */
export function worktreeLockScope(host: string, repo: string): string {
  return `worktree:${host}:${repo}`;
}

/** Join path segments, skipping empty ones. */
export function joinRemote(...segments: Array<string | undefined>): string {
  return segments.filter((s): s is string => Boolean(s)).join('/');
}
