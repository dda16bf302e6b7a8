import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { rowEquals } from '../../src/cell.js';
import type { Page } from '../../src/drivers/base.js';
import { MYSQL_TYPE, normalizeMysqlResult } from '../../src/drivers/mysql.js';
import { PG_OID, normalizePgResult } from '../../src/drivers/postgres.js';
import { SqliteDriver } from '../../src/drivers/sqlite.js';

// the same two rows as each client library hands them over
const PG_PAGE = normalizePgResult(
  [
    { name: 'id', dataTypeID: PG_OID.INT4 },
    { name: 'name', dataTypeID: 25 },
    { name: 'score', dataTypeID: PG_OID.FLOAT8 },
    { name: 'born', dataTypeID: PG_OID.DATE },
    { name: 'created', dataTypeID: PG_OID.TIMESTAMP },
  ],
  [
    [1, 'alice', 1.5, '2024-01-02', '2024-01-02 03:04:05'],
    [2, null, null, null, null],
  ],
);

const MYSQL_PAGE = normalizeMysqlResult(
  [
    { name: 'id', columnType: MYSQL_TYPE.LONG },
    { name: 'name', columnType: 253 },
    { name: 'score', columnType: MYSQL_TYPE.DOUBLE },
    { name: 'born', columnType: MYSQL_TYPE.DATE },
    { name: 'created', columnType: MYSQL_TYPE.DATETIME },
  ],
  [
    [1, 'alice', 1.5, '2024-01-02', '2024-01-02 03:04:05'],
    [2, null, null, null, null],
  ],
);

describe('driver parity', () => {
  const driver = new SqliteDriver(':memory:', false);
  let sqlitePage: Page;

  beforeAll(async () => {
    await driver.connect();
    await driver.execute('CREATE TABLE people (id INTEGER, name TEXT, score REAL, born DATE, created TIMESTAMP)');
    await driver.execute("INSERT INTO people VALUES (1, 'alice', 1.5, '2024-01-02', '2024-01-02 03:04:05'), (2, NULL, NULL, NULL, NULL)");
    sqlitePage = await driver.fetchRows({
      table: { database: 'main', name: 'people' },
      offset: 0,
      limit: 10,
      sort: { column: 'id', direction: 'asc' },
    });
  });

  afterAll(async () => {
    await driver.close();
  });

  it('should produce the same header everywhere', () => {
    expect(sqlitePage.columns).toEqual(PG_PAGE.columns);
    expect(MYSQL_PAGE.columns).toEqual(PG_PAGE.columns);
  });

  it('should read a TIMESTAMP column as the same timestamp cell', () => {
    const created = { kind: 'temporal', type: 'timestamp', value: '2024-01-02 03:04:05' };
    expect(sqlitePage.rows[0][4]).toEqual(created);
    expect(PG_PAGE.rows[0][4]).toEqual(created);
    expect(MYSQL_PAGE.rows[0][4]).toEqual(created);
  });

  it('should produce equal cells for equal values', () => {
    expect(sqlitePage.rows).toHaveLength(2);
    for (let i = 0; i < 2; i++) {
      expect(rowEquals(sqlitePage.rows[i], PG_PAGE.rows[i])).toBe(true);
      expect(rowEquals(MYSQL_PAGE.rows[i], PG_PAGE.rows[i])).toBe(true);
    }
  });
});
