import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ShellExecutor, buildScript, checkResult, CWD_MISSING_EXIT, isLocalAddress } from '../../src/remote/executor.js';
import { absoluteFromCwd, exportEnv, quote, quoteDir } from '../../src/remote/shell.js';
import { RemoteCommandFailedError, UnreachableError } from '../../src/errors.js';

const LOCAL = { name: 'local', address: 'local', tags: [], env: {} };

describe('shell quoting', () => {
  it('should leave safe words bare', () => {
    expect(quote('feat/demo')).toBe('feat/demo');
    expect(quote('git@git.example.com:acme/core.git')).toBe('git@git.example.com:acme/core.git');
  });

  it('should single-quote everything else', () => {
    expect(quote('')).toBe("''");
    expect(quote('a b')).toBe("'a b'");
    expect(quote("it's")).toBe("'it'\\''s'");
    expect(quote('$HOME')).toBe("'$HOME'");
  });

  it('should keep a leading tilde expandable', () => {
    expect(quoteDir('~')).toBe('"$HOME"');
    expect(quoteDir('~/.sf')).toBe('"$HOME"/.sf');
    expect(quoteDir('~/my work')).toBe(`"$HOME"/'my work'`);
    expect(quoteDir('/srv/sf')).toBe('/srv/sf');
  });

  it('should anchor relative paths at the working directory', () => {
    expect(absoluteFromCwd('features/demo/core')).toBe('"$PWD"/features/demo/core');
  });

  it('should export env as quoted assignments', () => {
    expect(exportEnv({ A: '1', B: 'two words' })).toBe("export A=1; export B='two words'");
  });
});

describe('buildScript', () => {
  it('should run the bare command without env or cwd', () => {
    expect(buildScript('git --version')).toBe('git --version');
  });

  it('should export env, then cd, then run', () => {
    expect(buildScript('ls', { env: { SF_FEATURE: 'demo' }, cwd: '~/.sf' })).toBe(
      `export SF_FEATURE=demo\ncd "$HOME"/.sf || exit ${CWD_MISSING_EXIT}\nls`
    );
  });
});

describe('checkResult', () => {
  it('should pass a zero exit through and throw otherwise', () => {
    const ok = { exitCode: 0, stdout: 'x', stderr: '' };
    expect(checkResult(LOCAL, 'true', ok)).toBe(ok);
    expect(() => checkResult(LOCAL, 'false', { exitCode: 1, stdout: '', stderr: 'no' })).toThrow(
      RemoteCommandFailedError
    );
  });
});

describe('ShellExecutor', () => {
  it('should recognise local addresses', () => {
    expect(isLocalAddress('localhost')).toBe(true);
    expect(isLocalAddress('dev@h1.example.com')).toBe(false);
  });

  it('should run local commands through sh in the given directory', async () => {
    const executor = new ShellExecutor({ timeoutMs: 5000 });
    const dir = tmpdir();

    const result = await executor.execute(LOCAL, 'printf "%s|%s" "$SF_VALUE" "$(basename "$PWD")"', {
      cwd: dir,
      env: { SF_VALUE: 'hello' },
    });

    expect(result).toEqual({ exitCode: 0, stdout: `hello|${dir.split('/').pop()}`, stderr: '' });
  });

  it('should report a missing working directory by its exit status', async () => {
    const executor = new ShellExecutor({ timeoutMs: 5000 });

    const result = await executor.execute(LOCAL, 'true', { cwd: join(tmpdir(), 'sf-does-not-exist-7f3a') });

    expect(result.exitCode).toBe(CWD_MISSING_EXIT);
  });

  it('should pass stdin through', async () => {
    const executor = new ShellExecutor({ timeoutMs: 5000 });

    const result = await executor.execute(LOCAL, 'cat', { input: Buffer.from('payload') });

    expect(result.stdout).toBe('payload');
  });

  it('should give up on a command that runs past its deadline', async () => {
    const executor = new ShellExecutor({ timeoutMs: 5000 });

    const run = executor.execute(LOCAL, 'sleep 1', { timeoutMs: 50 });

    await expect(run).rejects.toBeInstanceOf(UnreachableError);
    await expect(run).rejects.toThrow("Host 'local' is unreachable: command timed out after 50ms: sleep 1");
  });

  it('should return stdout bytes undecoded when asked', async () => {
    const executor = new ShellExecutor({ timeoutMs: 5000 });

    const result = await executor.execute(LOCAL, "printf '\\377A'", { binary: true });

    expect(result.stdoutBytes).toEqual(Buffer.from([0xff, 0x41]));
  });
});

describe('ShellExecutor over ssh', () => {
  // Stands in for the ssh client: hosts named "down" fail to connect
  const FAKE_SSH = [
    '#!/bin/sh',
    'case "$5" in',
    '  *down*) echo "ssh: connect to host h9 port 22: Connection refused" >&2; exit 255 ;;',
    'esac',
    "printf '%s\\n' \"$@\"",
    'exit 3',
    '',
  ].join('\n');

  let dir: string;
  let executor: ShellExecutor;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sf-ssh-'));
    const sshCommand = join(dir, 'ssh');
    await writeFile(sshCommand, FAKE_SSH, { mode: 0o755 });
    executor = new ShellExecutor({ timeoutMs: 5000, sshCommand });
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should treat ssh exit 255 as an unreachable host', async () => {
    const host = { name: 'h9', address: 'dev@down.example.com', tags: [], env: {} };

    const run = executor.execute(host, 'true');

    await expect(run).rejects.toBeInstanceOf(UnreachableError);
    await expect(run).rejects.toThrow("Host 'h9' is unreachable: ssh: connect to host h9 port 22: Connection refused");
  });

  it('should return any other exit status of the remote command as a result', async () => {
    const host = { name: 'h1', address: 'dev@up.example.com', tags: [], env: {} };

    const result = await executor.execute(host, 'true');

    expect(result).toEqual({
      exitCode: 3,
      stdout: '-o\nBatchMode=yes\n-o\nConnectTimeout=10\ndev@up.example.com\nsh -c true\n',
      stderr: '',
    });
  });
});
