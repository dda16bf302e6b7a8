import { writeFileSync } from 'node:fs';
import initSqlJs from 'sql.js';

/** Runs `script` against a fresh database and saves it to `path`. */
export async function writeSqliteFile(path: string, script: string): Promise<void> {
  const SQL = await initSqlJs.default();
  const db = new SQL.Database();
  try {
    db.exec(script);
    writeFileSync(path, db.export());
  } finally {
    db.close();
  }
}
