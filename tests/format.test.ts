import { describe, it, expect } from 'vitest';
import { bytesCell, intCell, NULL_CELL, textCell } from '../src/cell.js';
import { clipboardPayload, csvEscape, formatResults, sanitizeCell } from '../src/format.js';
import type { Page } from '../src/drivers/base.js';

describe('format', () => {
  describe('sanitizeCell', () => {
    it('should show NULL distinctly from the empty string', () => {
      expect(sanitizeCell(NULL_CELL)).toBe('NULL');
      expect(sanitizeCell(textCell(''))).toBe('');
    });

    it('should escape newlines and tabs', () => {
      expect(sanitizeCell(textCell('a\nb\tc'))).toBe('a\\nb\\tc');
    });

    it('should truncate long values', () => {
      const out = sanitizeCell(textCell('x'.repeat(250)));
      expect(out).toHaveLength(200);
      expect(out.endsWith('...')).toBe(true);
    });

    it('should summarize blobs', () => {
      expect(sanitizeCell(bytesCell(new Uint8Array(3)))).toBe('[BLOB 3 bytes]');
    });
  });

  describe('clipboardPayload', () => {
    it('should join cells with tabs and rows with newlines', () => {
      const payload = clipboardPayload([
        [intCell(1), textCell('a')],
        [NULL_CELL, textCell('')],
      ]);
      expect(payload).toBe('1\ta\nNULL\t');
    });
  });

  describe('formatResults', () => {
    const page: Page = {
      columns: ['id', 'name'],
      rows: [
        [intCell(1), textCell('alice')],
        [intCell(22), NULL_CELL],
      ],
    };

    it('should report an empty page', () => {
      expect(formatResults({ columns: ['id'], rows: [] }, 'table')).toBe('No results.');
    });

    it('should format a table', () => {
      expect(formatResults(page, 'table')).toBe(
        ['id | name ', '───┼──────', '1  | alice', '22 | NULL ', '', '(2 rows)'].join('\n'),
      );
    });

    it('should mention the total when more rows exist', () => {
      expect(formatResults(page, 'table', 10).endsWith('\n(showing 2 of 10 rows)')).toBe(true);
    });

    it('should format JSON with NULL as null', () => {
      expect(JSON.parse(formatResults(page, 'json'))).toEqual([
        { id: 1, name: 'alice' },
        { id: 22, name: null },
      ]);
    });

    it('should keep NULL and empty apart in CSV', () => {
      const csv = formatResults(
        {
          columns: ['id', 'name'],
          rows: [
            [intCell(1), textCell('a,b')],
            [intCell(2), NULL_CELL],
            [intCell(3), textCell('')],
          ],
        },
        'csv',
      );
      expect(csv).toBe('id,name\n1,"a,b"\n2,\n3,""');
    });
  });

  describe('csvEscape', () => {
    it('should double embedded quotes', () => {
      expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    });

    it('should leave plain values alone', () => {
      expect(csvEscape('plain')).toBe('plain');
    });
  });
});
