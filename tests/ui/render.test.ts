import { describe, it, expect } from 'vitest';
import { App } from '../../src/app.js';
import { resolveConfig } from '../../src/config.js';
import { NULL_CELL, textCell } from '../../src/cell.js';
import { QueryError } from '../../src/errors.js';
import { charKey, namedKey } from '../../src/keys.js';
import { QueryOrchestrator } from '../../src/orchestrator.js';
import { TableState, type TableRequest } from '../../src/table-state.js';
import { computeLayout } from '../../src/ui/layout.js';
import { fit, footer, render, windowStart } from '../../src/ui/render.js';
import { FakeDriver, flush, userRows } from '../helpers/fake-driver.js';

const config = resolveConfig({
  connections: [
    { type: 'sqlite', path: '/tmp/alpha.db', label: 'alpha' },
    { type: 'sqlite', path: '/tmp/beta.db', label: 'beta', readOnly: false },
  ],
});

function plain(line: string): string {
  return line.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, '');
}

function smallApp(): App {
  const app = new App(config);
  app.resize(60, 10);
  return app;
}

describe('layout', () => {
  it('should split the screen between sidebar and table', () => {
    expect(computeLayout(60, 10, 2)).toEqual({
      width: 60,
      height: 10,
      sidebarWidth: 20,
      connectionRows: 2,
      schemaRows: 5,
      tableWidth: 39,
      tableRows: 5,
    });
  });

  it('should enforce a minimum size', () => {
    const layout = computeLayout(10, 3, 0);
    expect(layout.width).toBe(40);
    expect(layout.height).toBe(8);
    expect(layout.connectionRows).toBe(1);
  });
});

describe('render', () => {
  it('should cut and pad to an exact width', () => {
    expect(fit('abcdef', 4)).toBe('abc…');
    expect(fit('ab', 4)).toBe('ab  ');
    expect(fit('abc', 1)).toBe('a');
    expect(fit('x', 0)).toBe('');
  });

  it('should keep the cursor inside the scroll window', () => {
    expect(windowStart(10, 20, 5)).toBe(8);
    expect(windowStart(19, 20, 5)).toBe(15);
    expect(windowStart(3, 4, 5)).toBe(0);
  });

  it('should fill the screen exactly', () => {
    const lines = render(smallApp().viewModel());
    expect(lines).toHaveLength(10);
    for (const line of lines) expect(plain(line)).toHaveLength(60);
  });

  it('should draw connections beside the empty table pane', () => {
    const lines = render(smallApp().viewModel()).map(plain);
    expect(lines[0].slice(0, 21)).toBe(`${' Connections'.padEnd(20)}│`);
    expect(lines[1]).toBe(`${'  alpha'.padEnd(20)}│${' Select a table in the schema tree.'.padEnd(39)}`);
    expect(lines[2].slice(0, 20)).toBe('  beta (rw)'.padEnd(20));
    expect(lines[9].trimEnd()).toBe('  ? for help');
  });

  it('should style a NULL cell apart from the text NULL', async () => {
    const driver = new FakeDriver();
    driver.columns = ['label', 'value'];
    driver.rows = [
      [textCell('first'), textCell('x')],
      [textCell('NULL'), NULL_CELL],
    ];
    const app = new App(config, {
      orchestrator: new QueryOrchestrator({ schedule: (task) => task() }),
      createDriver: () => driver,
    });
    app.resize(60, 10);
    const settle = async () => {
      for (let i = 0; i < 6; i++) {
        await flush();
        app.tick();
      }
    };
    app.handleKey(namedKey('enter'));
    await settle();
    app.handleKey(namedKey('enter'));
    await settle();
    app.handleKey(charKey('j'));
    app.handleKey(namedKey('enter'));
    await settle();

    const rowLines = render(app.viewModel()).filter((line) => plain(line).includes('NULL'));
    expect(rowLines).toHaveLength(1);
    const [textPart, nullPart] = rowLines[0].split(' │ ');
    expect(plain(textPart).trimEnd().endsWith('NULL')).toBe(true);
    expect(textPart).not.toContain('\x1b[2mNULL');
    expect(nullPart.startsWith('\x1b[2mNULL')).toBe(true);
  });

  it('should draw an error box over the screen', () => {
    const app = smallApp();
    app.showError(new QueryError('no such column: nme'));
    const lines = render(app.viewModel()).map(plain);
    expect(lines[2].trim()).toBe(`┌─ Query error ${'─'.repeat(8)}┐`);
    expect(lines[3].trim()).toBe('│ no such column: nme  │');
    expect(lines[6].trim()).toBe(`└${'─'.repeat(22)}┘`);
  });
});

describe('footer', () => {
  it('should summarise position, search and sort', () => {
    const requests: TableRequest[] = [];
    const state = new TableState({ request: (req) => requests.push(req) });
    state.resize({ width: 80, height: 5 });
    state.open({ database: 'main', name: 'users' });
    const first = requests[0];
    if (first.kind !== 'page') throw new Error('expected a page request');
    state.ingestPage(first, { columns: ['id', 'name'], rows: userRows(30).slice(0, 5) });
    expect(footer(state.snapshot())).toBe(' row 1 of ?');

    state.setSearch('name-1');
    expect(footer(state.snapshot())).toBe(' row 1 of ? | search "name-1" (1 match)');

    state.cycleSort();
    expect(footer(state.snapshot())).toBe(' row 1 of ? | search "name-1" (1 match) | order by id asc | loading…');
  });
});
