import { describe, it, expect, beforeEach } from 'vitest';
import { ConnectivityError, QueryError } from '../src/errors.js';
import { QueryOrchestrator } from '../src/orchestrator.js';
import type { RecordsQuery } from '../src/drivers/base.js';
import { FakeDriver, flush } from './helpers/fake-driver.js';

const users = { database: 'main', name: 'users' };

function rows(offset: number, limit = 5): { kind: 'rows'; query: RecordsQuery } {
  return { kind: 'rows', query: { table: users, offset, limit } };
}

describe('QueryOrchestrator', () => {
  let orchestrator: QueryOrchestrator;
  let pool: FakeDriver;

  beforeEach(() => {
    orchestrator = new QueryOrchestrator({ schedule: (task) => task() });
    pool = new FakeDriver();
  });

  it('should deliver settled results on drain', async () => {
    const token = orchestrator.submit('records', pool, rows(0));
    expect(orchestrator.drain()).toEqual([]);
    expect(orchestrator.isAwaiting('records')).toBe(true);

    await flush();
    const [delivery] = orchestrator.drain();
    expect(delivery.token).toBe(token);
    expect(delivery.kind).toBe('rows');
    expect(delivery.result.ok).toBe(true);
    if (delivery.kind === 'rows' && delivery.result.ok) {
      expect(delivery.result.value.rows).toHaveLength(5);
    }
    expect(orchestrator.isAwaiting('records')).toBe(false);
  });

  it('should start nothing before the scheduler runs', () => {
    const tasks: (() => void)[] = [];
    const deferred = new QueryOrchestrator({ schedule: (task) => tasks.push(task) });
    deferred.submit('records', pool, rows(0));
    expect(pool.calls).toEqual([]);
    tasks.forEach((task) => task());
    expect(pool.calls).toEqual(['fetchRows:0:5']);
  });

  it('should discard an older result that arrives after a newer one', async () => {
    pool.holding = true;
    orchestrator.submit('records', pool, rows(0));
    const newer = orchestrator.submit('records', pool, rows(5));
    await flush();

    // the newer request settles first, the older one last
    pool.waiting[1].resolve();
    await flush();
    pool.waiting[0].resolve();
    await flush();

    const delivered = orchestrator.drain();
    expect(delivered).toHaveLength(1);
    expect(delivered[0].token).toBe(newer);
    expect(orchestrator.discardedCount).toBe(1);
  });

  it('should discard an older result that arrives first', async () => {
    pool.holding = true;
    orchestrator.submit('records', pool, rows(0));
    const newer = orchestrator.submit('records', pool, rows(5));
    await flush();
    pool.releaseNext();
    await flush();
    expect(orchestrator.drain()).toEqual([]);

    pool.releaseNext();
    await flush();
    expect(orchestrator.drain().map((d) => d.token)).toEqual([newer]);
  });

  it('should keep slots independent', async () => {
    orchestrator.submit('records', pool, rows(0));
    orchestrator.submit('columns', pool, { kind: 'columns', table: users });
    await flush();
    expect(orchestrator.drain().map((d) => d.slot).sort()).toEqual(['columns', 'records']);
  });

  it('should drop a superseded slot', async () => {
    orchestrator.submit('records', pool, rows(0));
    orchestrator.supersede('records');
    await flush();
    expect(orchestrator.drain()).toEqual([]);
    expect(orchestrator.discardedCount).toBe(1);
  });

  it('should drop everything after invalidateAll', async () => {
    orchestrator.submit('records', pool, rows(0));
    orchestrator.submit('schema', pool, { kind: 'databases' });
    orchestrator.invalidateAll();
    await flush();
    expect(orchestrator.drain()).toEqual([]);
  });

  it('should turn unknown failures into query errors', async () => {
    pool.failures.set('fetchRows', new Error('syntax error at or near "FORM"'));
    orchestrator.submit('records', pool, rows(0));
    await flush();
    const [delivery] = orchestrator.drain();
    expect(delivery.result.ok).toBe(false);
    if (!delivery.result.ok) {
      expect(delivery.result.error).toBeInstanceOf(QueryError);
      expect(delivery.result.error.message).toBe('syntax error at or near "FORM"');
    }
  });

  it('should treat a failed connect as a connectivity error', async () => {
    pool.failures.set('connect', new Error('refused'));
    orchestrator.submit('connect', pool, { kind: 'connect' });
    await flush();
    const [delivery] = orchestrator.drain();
    expect(!delivery.result.ok && delivery.result.error).toBeInstanceOf(ConnectivityError);
  });

  it('should pass driver connectivity errors through', async () => {
    const lost = new ConnectivityError('connection reset');
    pool.failures.set('fetchRows', lost);
    orchestrator.submit('records', pool, rows(0));
    await flush();
    const [delivery] = orchestrator.drain();
    expect(!delivery.result.ok && delivery.result.error).toBe(lost);
  });

  describe('retire', () => {
    it('should close an idle pool at once', async () => {
      await orchestrator.retire(pool);
      expect(pool.closed).toBe(1);
    });

    it('should wait for in-flight work before closing', async () => {
      pool.holding = true;
      orchestrator.submit('records', pool, rows(0));
      await flush();
      expect(orchestrator.pendingFor(pool)).toBe(1);

      let retired = false;
      const done = orchestrator.retire(pool).then(() => {
        retired = true;
      });
      await flush();
      expect(pool.closed).toBe(0);
      expect(retired).toBe(false);

      pool.releaseNext();
      await done;
      expect(pool.closed).toBe(1);
      expect(orchestrator.pendingFor(pool)).toBe(0);
    });
  });
});
