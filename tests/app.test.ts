import { describe, it, expect, beforeEach, vi } from 'vitest';
import { App } from '../src/app.js';
import { resolveConfig } from '../src/config.js';
import { ConnectivityError } from '../src/errors.js';
import { charKey, namedKey, type KeyEvent } from '../src/keys.js';
import { QueryOrchestrator } from '../src/orchestrator.js';
import { FakeDriver, flush } from './helpers/fake-driver.js';

const config = resolveConfig({
  connections: [
    { type: 'sqlite', path: '/tmp/alpha.db', label: 'alpha' },
    { type: 'sqlite', path: '/tmp/beta.db', label: 'beta' },
  ],
});

const enter = namedKey('enter');
const esc = namedKey('esc');

describe('App', () => {
  let app: App;
  let drivers: FakeDriver[];
  let clipboard: { write: ReturnType<typeof vi.fn> };

  function press(...keys: (KeyEvent | string)[]): void {
    for (const key of keys) app.handleKey(typeof key === 'string' ? charKey(key) : key);
  }

  function type(text: string): void {
    press(...text.split(''));
  }

  /** Let every chained request settle and be applied. */
  async function settle(): Promise<void> {
    for (let i = 0; i < 6; i++) {
      await flush();
      app.tick();
    }
  }

  async function openUsers(): Promise<void> {
    press(enter);
    await settle();
    press(enter);
    await settle();
    press('j', enter);
    await settle();
  }

  beforeEach(() => {
    drivers = [];
    clipboard = { write: vi.fn() };
    app = new App(config, {
      orchestrator: new QueryOrchestrator({ schedule: (task) => task() }),
      createDriver: () => {
        const driver = new FakeDriver();
        drivers.push(driver);
        return driver;
      },
      clipboard: { write: (text) => clipboard.write(text) },
    });
  });

  describe('connecting', () => {
    it('should move to the schema tree and list databases once connected', async () => {
      press(enter);
      expect(drivers).toHaveLength(1);
      expect(app.connectionList.statusOf(0)).toBe('connecting');
      expect(app.focus.current).toBe('connections');

      await settle();
      expect(app.connectionList.statusOf(0)).toBe('connected');
      expect(app.focus.current).toBe('schema');
      expect(drivers[0].calls).toEqual(['connect', 'listDatabases']);
      expect(app.schemaTree.snapshot().items).toEqual([
        { kind: 'database', name: 'main', expanded: false, loading: false, depth: 0 },
      ]);
      expect(app.viewModel().connection).toBe('alpha');
    });

    it('should show a failed connect and return to the connection list', async () => {
      const failing = new FakeDriver();
      failing.failures.set('connect', new Error('unable to open database file'));
      app = new App(config, {
        orchestrator: new QueryOrchestrator({ schedule: (task) => task() }),
        createDriver: () => failing,
      });

      press(enter);
      await settle();
      expect(app.connectionList.statusOf(0)).toBe('failed');
      expect(app.errorOverlay).toEqual({
        kind: 'connectivity',
        message: 'unable to open database file',
        returnFocus: 'connections',
      });
      expect(failing.closed).toBe(1);
      expect(app.activePool).toBeNull();
    });
  });

  describe('browsing', () => {
    it('should list tables lazily and open one', async () => {
      await openUsers();
      expect(drivers[0].calls).toEqual([
        'connect',
        'listDatabases',
        'listTables:main',
        'fetchRows:0:19',
        'fetchColumns',
      ]);
      expect(app.focus.current).toBe('table');
      expect(app.tableView.records.rowCount).toBe(19);
      expect(app.tableView.records.cursor).toEqual({ row: 0, column: 0 });
      expect(app.viewModel().status).toBe('main.users');
    });

    it('should switch to the columns tab', async () => {
      await openUsers();
      press('2');
      const table = app.viewModel().table;
      expect(table.tab).toBe('columns');
      expect(table.table.columns).toEqual(['name', 'type', 'nullable', 'default', 'key']);
      expect(table.table.rowCount).toBe(2);
    });

    it('should ignore tab keys while no table is open', () => {
      expect(app.handleKey(charKey('2'))).toBe('none');
      expect(app.tableView.tab).toBe('records');
    });

    it('should copy the selected block', async () => {
      await openUsers();
      press('y');
      expect(clipboard.write).toHaveBeenLastCalledWith('0');
      expect(app.viewModel().status).toBe('Copied 1 cell.');

      press('J', 'L', 'y');
      expect(clipboard.write).toHaveBeenLastCalledWith('0\tname-0\n1\tname-1');
      expect(app.viewModel().status).toBe('Copied 4 cells.');
    });

    it('should run a statement and reload the records', async () => {
      await openUsers();
      press(':');
      type('DELETE FROM users WHERE id = 1');
      press(enter);
      await settle();

      expect(drivers[0].calls.slice(-2)).toEqual(['execute:DELETE FROM users WHERE id = 1', 'fetchRows:0:19']);
      expect(app.viewModel().status).toBe('2 row(s) affected.');
    });
  });

  describe('errors', () => {
    it('should keep the connection after a query error', async () => {
      await openUsers();
      drivers[0].failures.set('fetchRows', new Error('no such column: nme'));
      press('r');
      await settle();

      expect(app.errorOverlay).toEqual({ kind: 'query', message: 'no such column: nme', returnFocus: 'table' });
      expect(app.tableView.records.loading).toBe(false);
      expect(app.tableView.records.rowCount).toBe(19);

      press('j');
      expect(app.tableView.records.cursor).toEqual({ row: 0, column: 0 });

      press(enter);
      expect(app.errorOverlay).toBeNull();
      expect(app.focus.current).toBe('table');
      expect(app.activePool).toBe(drivers[0]);
      expect(drivers[0].closed).toBe(0);
    });

    it('should drop the connection after a connectivity error', async () => {
      await openUsers();
      drivers[0].failures.set('fetchRows', new ConnectivityError('connection reset'));
      press('r');
      await settle();

      expect(app.errorOverlay?.kind).toBe('connectivity');
      expect(app.connectionList.statusOf(0)).toBe('failed');
      expect(app.activePool).toBeNull();
      expect(drivers[0].closed).toBe(1);

      press(esc);
      expect(app.errorOverlay).toBeNull();
      expect(app.focus.current).toBe('connections');
    });
  });

  describe('switching connections', () => {
    it('should close the old pool only after its in-flight work settles', async () => {
      press(enter);
      await settle();
      drivers[0].holding = true;
      press(enter);
      await flush();
      expect(drivers[0].calls).toContain('listTables:main');

      press('c', 'j', enter);
      expect(drivers).toHaveLength(2);
      await settle();
      expect(drivers[0].closed).toBe(0);
      expect(app.connectionList.statusOf(1)).toBe('connected');
      expect(app.connectionList.statusOf(0)).toBe('idle');

      drivers[0].releaseNext();
      await settle();
      expect(drivers[0].closed).toBe(1);
      expect(app.activePool).toBe(drivers[1]);
      expect(app.schemaTree.snapshot().items).toEqual([
        { kind: 'database', name: 'main', expanded: false, loading: false, depth: 0 },
      ]);
      expect(app.orchestrator.discardedCount).toBe(1);
    });

    it('should close the live pool on shutdown', async () => {
      press(enter);
      await settle();
      await app.shutdown();
      expect(drivers[0].closed).toBe(1);
      expect(app.activePool).toBeNull();
    });
  });

  describe('focus', () => {
    it('should cycle through every pane and wrap', () => {
      const seen: string[] = [];
      for (let i = 0; i < 3; i++) {
        press(namedKey('tab'));
        seen.push(app.focus.current);
      }
      expect(seen).toEqual(['schema', 'table', 'connections']);

      press(namedKey('tab', { shift: true }));
      expect(app.focus.current).toBe('table');
    });

    it('should stop at the edges with the arrow keys', () => {
      press(namedKey('left'));
      expect(app.focus.current).toBe('connections');
      press(namedKey('right'), namedKey('right'), namedKey('right'));
      expect(app.focus.current).toBe('table');
    });

    it('should swallow keys while help is open', () => {
      press('?');
      expect(app.viewModel().help).not.toBeNull();
      press('q');
      expect(app.viewModel().help).toBeNull();
      expect(app.shouldQuit).toBe(false);

      press('q');
      expect(app.shouldQuit).toBe(true);
    });
  });
});
