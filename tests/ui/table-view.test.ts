import { describe, it, expect, beforeEach } from 'vitest';
import { charKey, KeyMap, namedKey, type KeyEvent } from '../../src/keys.js';
import type { PageRequest, TableRequest } from '../../src/table-state.js';
import { TableView, type TableTab } from '../../src/ui/table-view.js';
import { userRows } from '../helpers/fake-driver.js';

const users = { database: 'main', name: 'users' };
const ROWS = userRows(30);

describe('TableView', () => {
  let view: TableView;
  let requests: { tab: TableTab; req: TableRequest }[];
  let copied: { text: string; cells: number }[];
  let executed: string[];

  function press(...keys: (KeyEvent | string)[]): void {
    for (const key of keys) view.handleKey(typeof key === 'string' ? charKey(key) : key);
  }

  function lastRecordsPage(): PageRequest {
    const found = [...requests].reverse().find((r) => r.tab === 'records' && r.req.kind === 'page');
    if (!found || found.req.kind !== 'page') throw new Error('no records page request');
    return found.req;
  }

  beforeEach(() => {
    requests = [];
    copied = [];
    executed = [];
    view = new TableView(new KeyMap(), {
      request: (tab, req) => requests.push({ tab, req }),
      copy: (text, cells) => copied.push({ text, cells }),
      execute: (statement) => executed.push(statement),
    });
    view.resize(120, 5);
    view.open(users);
    const req = lastRecordsPage();
    view.records.ingestPage(req, { columns: ['id', 'name'], rows: ROWS.slice(0, 5) });
  });

  it('should open both tabs on the records tab', () => {
    expect(view.tab).toBe('records');
    expect(requests.map((r) => r.tab)).toEqual(['records', 'columns']);
  });

  it('should apply a filter from the prompt', () => {
    press('/');
    expect(view.snapshot().prompt).toEqual({ kind: 'filter', text: '', cursor: 0 });
    for (const ch of 'id > 2') press(ch);
    press(namedKey('enter'));

    expect(view.snapshot().prompt).toBeNull();
    expect(lastRecordsPage().query.filter).toBe('id > 2');
  });

  it('should narrow rows while typing a search and restore them on cancel', () => {
    press(charKey('f', { ctrl: true }), 'n', 'a', 'm', 'e', '-', '2');
    expect(view.records.rowCount).toBe(1);
    press(namedKey('esc'));
    expect(view.records.rowCount).toBe(5);
    expect(view.records.search).toBe('');
  });

  it('should keep a committed search until escape', () => {
    press(charKey('f', { ctrl: true }), '4', namedKey('enter'));
    expect(view.records.rowCount).toBe(1);
    press(namedKey('esc'));
    expect(view.records.rowCount).toBe(5);
  });

  it('should hand a trimmed statement to execute', () => {
    press(':', ' ', 'V', 'A', 'C', 'U', 'U', 'M', ' ', namedKey('enter'));
    expect(executed).toEqual(['VACUUM']);
  });

  it('should not execute an empty statement', () => {
    press(':', namedKey('enter'));
    expect(executed).toEqual([]);
  });

  it('should copy the cell under the cursor', () => {
    press('j', 'l', 'y');
    expect(copied).toEqual([{ text: 'name-1', cells: 1 }]);
  });

  it('should not filter or sort the columns tab', () => {
    view.setTab('columns');
    const before = requests.length;
    press('/', 's');
    expect(view.snapshot().prompt).toBeNull();
    expect(requests).toHaveLength(before);
  });

  it('should leave unknown keys to the app', () => {
    expect(view.handleKey(charKey('1'))).toBe('unhandled');
    expect(view.handleKey(namedKey('esc'))).toBe('unhandled');
  });
});
