import { describe, it, expect } from 'vitest';
import { formatServerVersion } from '../../src/domain/server-version.js';
import { BatchProber, createBatchResult, membersByServer, recordOutcome } from '../../src/services/BatchProber.js';
import { groupByVersion } from '../../src/services/aggregate.js';
import type { ProbeOutcome, VersionProbe } from '../../src/types.js';
import { createTestLogger, deferred, failed, ok, StaticProbe, synapse } from '../fixtures/helpers.js';

/** Probe whose outcomes are released by the test, in any order */
class ControlledProbe implements VersionProbe {
  private readonly pending = new Map<string, ReturnType<typeof deferred<ProbeOutcome>>>();

  probe(serverName: string): Promise<ProbeOutcome> {
    const entry = deferred<ProbeOutcome>();
    this.pending.set(serverName, entry);
    return entry.promise;
  }

  settle(serverName: string, outcome: ProbeOutcome): void {
    this.pending.get(serverName)?.resolve(outcome);
  }

  fail(serverName: string, error: unknown): void {
    this.pending.get(serverName)?.reject(error);
  }

  get started(): string[] {
    return [...this.pending.keys()];
  }
}

describe('BatchProber', () => {
  describe('membersByServer', () => {
    it('groups users by server in first-seen order and skips invalid IDs', () => {
      const members = membersByServer(['@a:one.test', '@b:two.test', '@c:one.test', 'invalid', '@d:']);
      expect([...members.entries()]).toEqual([
        ['one.test', ['@a:one.test', '@c:one.test']],
        ['two.test', ['@b:two.test']],
      ]);
    });

    it('keeps the port as part of the server name', () => {
      expect([...membersByServer(['@a:one.test:8448']).keys()]).toEqual(['one.test:8448']);
    });
  });

  describe('recordOutcome', () => {
    it('moves a server between versions and errors', () => {
      const batch = createBatchResult(new Map([['one.test', ['@a:one.test']]]));
      recordOutcome(batch, 'one.test', failed('down'));
      expect(batch.errors.get('one.test')).toBe('down');

      recordOutcome(batch, 'one.test', ok(synapse('1.60.0')));
      expect(batch.errors.has('one.test')).toBe(false);
      expect(batch.versions.has('one.test')).toBe(true);
    });
  });

  describe('probeAll', () => {
    it('probes every server concurrently and records results in any completion order', async () => {
      const probe = new ControlledProbe();
      const prober = new BatchProber(probe, createTestLogger());
      const members = membersByServer(['@a:one.test', '@b:two.test', '@c:three.test']);

      const running = prober.probeAll(members);
      await Promise.resolve();
      expect(probe.started).toEqual(['one.test', 'two.test', 'three.test']);

      probe.settle('three.test', ok(synapse('1.61.0')));
      probe.settle('two.test', failed("Server couldn't be reached"));
      probe.settle('one.test', ok(synapse('1.60.0')));
      const batch = await running;

      expect([...batch.versions.keys()].sort()).toEqual(['one.test', 'three.test']);
      expect([...batch.errors.entries()]).toEqual([['two.test', "Server couldn't be reached"]]);
      expect(groupByVersion(batch).map((group) => formatServerVersion(group.version))).toEqual([
        'Synapse 1.61.0',
        'Synapse 1.60.0',
      ]);
    });

    it('records a rejected probe as an internal error without affecting the others', async () => {
      const probe = new ControlledProbe();
      const prober = new BatchProber(probe, createTestLogger());
      const running = prober.probeAll(membersByServer(['@a:one.test', '@b:two.test', '@c:three.test']));
      await Promise.resolve();

      probe.fail('one.test', new Error('boom'));
      probe.settle('two.test', failed('test timed out'));
      probe.settle('three.test', ok(synapse('1.60.0')));
      const batch = await running;

      expect(batch.errors.get('one.test')).toBe('internal error');
      expect(batch.errors.get('two.test')).toBe('test timed out');
      expect(batch.versions.size).toBe(1);
      expect(batch.members.size).toBe(3);
    });

    it('covers every server in exactly one of versions or errors', async () => {
      const probe = new StaticProbe(new Map([['one.test', ok(synapse('1.60.0'))]]));
      const batch = await new BatchProber(probe, createTestLogger()).probeAll(
        membersByServer(['@a:one.test', '@b:two.test'])
      );

      for (const server of batch.members.keys()) {
        expect(batch.versions.has(server) !== batch.errors.has(server)).toBe(true);
      }
      expect(probe.calls).toEqual(['one.test', 'two.test']);
    });

    it('finishes immediately for an empty room', async () => {
      const batch = await new BatchProber(new StaticProbe(new Map()), createTestLogger()).probeAll(new Map());
      expect(batch.versions.size + batch.errors.size).toBe(0);
    });
  });
});
