import { describe, it, expect } from 'vitest';
import {
  branchName,
  joinRemote,
  parseTmuxSessionName,
  repoLockScope,
  sessionKey,
  tmuxSessionName,
  tmuxTarget,
  worktreeLockScope,
  worktreePath,
} from '../../src/layout.js';
import { knownLlms, llmBinary, resolveLlmCommand } from '../../src/llm.js';
import { mapWithConcurrency } from '../../src/utils/concurrency.js';
import { extractRepoName } from '../../src/utils/repo.js';

describe('layout', () => {
  it('should derive names from feature and repo', () => {
    expect(worktreePath('demo', 'core')).toBe('features/demo/core');
    expect(branchName('demo')).toBe('feat/demo');
    expect(sessionKey('demo', 'core', 'claude')).toBe('feat:demo:core:claude');
    expect(repoLockScope('core')).toBe('repo:core');
    expect(worktreeLockScope('h1', 'core')).toBe('worktree:h1:core');
  });

  it("should name tmux sessions without ':' or '.'", () => {
    expect(tmuxSessionName('demo', 'core', 'claude')).toBe('feat+demo+core+claude');
    expect(tmuxSessionName('v1.2', 'web_app', 'claude')).toBe('feat+v1,2+web_app+claude');
    expect(tmuxTarget('feat+demo+core+claude')).toBe('=feat+demo+core+claude');
    expect(tmuxTarget('feat+demo+core+claude', true)).toBe('=feat+demo+core+claude:');
  });

  it('should decode only tmux names in the session format', () => {
    expect(parseTmuxSessionName('feat+v1,2+web_app+claude')).toEqual({ feature: 'v1.2', repo: 'web_app', llm: 'claude' });
    expect(parseTmuxSessionName('main')).toBeNull();
    expect(parseTmuxSessionName('feat+demo+core')).toBeNull();
    expect(parseTmuxSessionName('feat_demo_core_claude')).toBeNull();
    expect(parseTmuxSessionName('feat++core+claude')).toBeNull();
  });

  it('should join remote segments skipping empty ones', () => {
    expect(joinRemote('features/demo/core', undefined, 'api')).toBe('features/demo/core/api');
    expect(joinRemote('~/.sf', '')).toBe('~/.sf');
  });
});

describe('llm commands', () => {
  const vars = { feature: 'demo', repo: 'core', host: 'h1', worktree: 'features/demo/core' };

  it('should use built-in templates', () => {
    expect(resolveLlmCommand('claude', {}, vars)).toBe('claude');
  });

  it('should let configured templates override and extend', () => {
    const configured = { claude: 'claude --model opus', review: 'review-bot --repo {repo} --host {host}' };
    expect(resolveLlmCommand('claude', configured, vars)).toBe('claude --model opus');
    expect(resolveLlmCommand('review', configured, vars)).toBe('review-bot --repo core --host h1');
    expect(knownLlms(configured)).toEqual(['claude', 'codex', 'review']);
  });

  it('should prefer an explicit command', () => {
    expect(resolveLlmCommand('unknown', {}, vars, 'bash -l')).toBe('bash -l');
  });

  it('should leave unknown placeholders alone', () => {
    expect(resolveLlmCommand('x', { x: 'run {worktree} {other}' }, vars)).toBe('run features/demo/core {other}');
  });

  it('should take the first word as the binary', () => {
    expect(llmBinary('  claude --model opus')).toBe('claude');
  });
});

describe('mapWithConcurrency', () => {
  it('should keep input order and respect the limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (ms, index) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight -= 1;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
    expect(maxInFlight).toBe(2);
  });

  it('should handle an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe('extractRepoName', () => {
  it('should extract from ssh, https and local urls', () => {
    expect(extractRepoName('git@git.example.com:acme/core.git')).toBe('core');
    expect(extractRepoName('https://git.example.com/acme/web.git')).toBe('web');
    expect(extractRepoName('https://git.example.com/acme/web/')).toBe('web');
    expect(extractRepoName('/srv/git/tools')).toBe('tools');
  });

  it('should return null when there is no name', () => {
    expect(extractRepoName('')).toBeNull();
  });
});
