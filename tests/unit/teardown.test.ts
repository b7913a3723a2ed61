import { describe, it, expect, afterEach } from 'vitest';
import type { Settings } from '../../src/config/schema.js';
import { ValidationError } from '../../src/errors.js';
import { createTestForge, seedDemo, type TestForge } from '../helpers/forge.js';

const WORKTREE = 'features/demo/core';
const ANCHOR = 'repo-cache/core.anchor';

describe('teardown', () => {
  let forge: TestForge;

  afterEach(async () => {
    await forge.cleanup();
  });

  async function syncedDemo(hosts: string[], settings: Partial<Settings> = {}): Promise<void> {
    forge = await createTestForge(settings);
    await seedDemo(forge, hosts);
    const report = await forge.orchestrator.sync('demo');
    expect(report.ok).toBe(true);
  }

  describe('destroyFeature', () => {
    it('should stop sessions, remove worktree and branch, keep the anchor and drop the record', async () => {
      await syncedDemo(['h1']);
      await forge.orchestrator.startSession({ feature: 'demo', repo: 'core', llm: 'claude' });

      const report = await forge.orchestrator.destroyFeature('demo');

      expect(report).toEqual({
        feature: 'demo',
        ok: true,
        recordUpdated: true,
        results: [{ repo: 'core', host: 'h1', status: 'ok', killedSessions: ['feat:demo:core:claude'] }],
      });
      const h1 = forge.remote.host('h1');
      expect(h1.sessions.size).toBe(0);
      expect(h1.worktrees.has(WORKTREE)).toBe(false);
      expect(h1.anchors.get(ANCHOR)?.branches.has('feat/demo')).toBe(false);
      expect(h1.anchors.has(ANCHOR)).toBe(true);
      expect(h1.dirs.has('features/demo')).toBe(false);
      expect(await forge.model.listFeatures()).toEqual([]);
    });

    it('should leave other features on the same host alone', async () => {
      await syncedDemo(['h1']);
      await forge.model.createFeature('other');
      await forge.model.attach('other', 'core', ['h1']);
      await forge.orchestrator.sync('other');
      await forge.orchestrator.startSession({ feature: 'other', repo: 'core', llm: 'claude' });

      await forge.orchestrator.destroyFeature('demo');

      const h1 = forge.remote.host('h1');
      expect(h1.worktrees.get('features/other/core')?.branch).toBe('feat/other');
      expect(h1.sessions.has('feat+other+core+claude')).toBe(true);
      expect(h1.anchors.get(ANCHOR)?.branches.has('feat/other')).toBe(true);
      expect(await forge.model.listFeatures()).toEqual(['other']);
    });

    it('should keep the record when a host cannot be torn down', async () => {
      await syncedDemo(['h1', 'h2']);
      forge.remote.host('h2').alwaysUnreachable = true;

      const report = await forge.orchestrator.destroyFeature('demo');

      expect(report.ok).toBe(false);
      expect(report.recordUpdated).toBe(false);
      expect(report.results.map((r) => [r.host, r.status, r.error?.kind])).toEqual([
        ['h1', 'ok', undefined],
        ['h2', 'failed', 'Unreachable'],
      ]);
      expect(forge.remote.host('h1').worktrees.has(WORKTREE)).toBe(false);
      expect(await forge.model.listFeatures()).toEqual(['demo']);
    });

    it('should converge on a re-run once the host is back', async () => {
      await syncedDemo(['h1', 'h2']);
      forge.remote.host('h2').alwaysUnreachable = true;
      await forge.orchestrator.destroyFeature('demo');
      forge.remote.host('h2').alwaysUnreachable = false;

      const report = await forge.orchestrator.destroyFeature('demo');

      expect(report.ok).toBe(true);
      expect(forge.remote.host('h2').worktrees.has(WORKTREE)).toBe(false);
      expect(await forge.model.listFeatures()).toEqual([]);
    });
  });

  describe('detach', () => {
    it('should remove only the named hosts', async () => {
      await syncedDemo(['h1', 'h2']);

      const report = await forge.orchestrator.detach('demo', 'core', ['h2']);

      expect(report.ok).toBe(true);
      expect(report.recordUpdated).toBe(true);
      expect(report.results.map((r) => r.host)).toEqual(['h2']);
      expect(forge.remote.host('h2').worktrees.has(WORKTREE)).toBe(false);
      expect(forge.remote.host('h1').worktrees.has(WORKTREE)).toBe(true);
      const feature = await forge.model.getFeature('demo');
      expect(feature.attachments).toEqual([{ repo: 'core', hosts: ['h1'] }]);
    });

    it('should drop the attachment when every host is detached', async () => {
      await syncedDemo(['h1']);

      await forge.orchestrator.detach('demo', 'core');

      const feature = await forge.model.getFeature('demo');
      expect(feature.attachments).toEqual([]);
    });

    it('should keep hosts whose teardown failed', async () => {
      await syncedDemo(['h1', 'h2']);
      forge.remote.failWhen(/worktree remove/, { exitCode: 128, stdout: '', stderr: 'fatal: locked\n' }, { host: 'h2' });

      const report = await forge.orchestrator.detach('demo', 'core');

      expect(report.ok).toBe(false);
      expect(report.results[1].error?.kind).toBe('RemoteCommandFailed');
      const feature = await forge.model.getFeature('demo');
      expect(feature.attachments).toEqual([{ repo: 'core', hosts: ['h2'] }]);
    });

    it('should reject hosts that are not attached', async () => {
      await syncedDemo(['h1']);

      await expect(forge.orchestrator.detach('demo', 'core', ['h9'])).rejects.toBeInstanceOf(ValidationError);
      expect(forge.remote.host('h1').worktrees.has(WORKTREE)).toBe(true);
    });
  });

  describe('narrowing attach', () => {
    it('should leave dropped hosts in place under the orphan policy', async () => {
      await syncedDemo(['h1', 'h2']);

      const outcome = await forge.orchestrator.attach('demo', 'core', ['h1'], { mode: 'replace' });

      expect(outcome.removedHosts).toEqual(['h2']);
      expect(outcome.teardown).toBeUndefined();
      expect(forge.remote.host('h2').worktrees.has(WORKTREE)).toBe(true);
    });

    it('should tear dropped hosts down under the teardown policy', async () => {
      await syncedDemo(['h1', 'h2'], { detachPolicy: 'teardown' });

      const outcome = await forge.orchestrator.attach('demo', 'core', ['h1'], { mode: 'replace' });

      expect(outcome.removedHosts).toEqual(['h2']);
      expect(outcome.teardown?.ok).toBe(true);
      expect(outcome.teardown?.results.map((r) => r.host)).toEqual(['h2']);
      expect(forge.remote.host('h2').worktrees.has(WORKTREE)).toBe(false);
      expect(forge.remote.host('h1').worktrees.has(WORKTREE)).toBe(true);
    });

    it('should not tear anything down when hosts are only added', async () => {
      await syncedDemo(['h1'], { detachPolicy: 'teardown' });
      await forge.model.addHost({ name: 'h2', address: 'dev@h2.example.com' });

      const outcome = await forge.orchestrator.attach('demo', 'core', ['h2']);

      expect(outcome.attachment.hosts).toEqual(['h1', 'h2']);
      expect(outcome.removedHosts).toEqual([]);
      expect(outcome.teardown).toBeUndefined();
    });
  });
});
