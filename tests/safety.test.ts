import { describe, it, expect } from 'vitest';
import { isReadOnly, stripLiteralsAndComments, validateFilter, validateQuery } from '../src/safety.js';

describe('safety', () => {
  describe('validateQuery', () => {
    it('should allow plain reads', () => {
      expect(validateQuery('SELECT * FROM users', false)).toEqual({ allowed: true });
    });

    it('should block mutations on read-only connections', () => {
      const result = validateQuery('DELETE FROM users', false);
      expect(result.allowed).toBe(false);
      expect(result.reason?.startsWith('DELETE blocked: this connection is read-only.')).toBe(true);
    });

    it('should not be fooled by keywords inside literals', () => {
      expect(validateQuery("SELECT 'DROP me a line' AS msg", false).allowed).toBe(true);
    });

    it('should catch mutations hidden in a CTE', () => {
      const result = validateQuery('WITH gone AS (DELETE FROM users RETURNING *) SELECT * FROM gone', false);
      expect(result.allowed).toBe(false);
    });

    it('should reject more than one statement', () => {
      expect(validateQuery('SELECT 1; DROP TABLE users', false)).toEqual({
        allowed: false,
        reason: 'multiple statements not allowed',
      });
    });

    it('should accept a trailing semicolon', () => {
      expect(validateQuery('SELECT 1;', false).allowed).toBe(true);
    });

    it('should still block a REPLACE statement', () => {
      expect(validateQuery("REPLACE INTO users VALUES (1, 'a')", false).reason).toMatch(/^REPLACE blocked: /);
    });

    it('should allow anything when mutations are allowed', () => {
      expect(validateQuery('DROP TABLE users', true).allowed).toBe(true);
    });
  });

  describe('validateFilter', () => {
    it('should accept ordinary predicates', () => {
      expect(validateFilter("id > 3 AND name <> 'x;y'").allowed).toBe(true);
    });

    it('should accept comment markers inside literals', () => {
      expect(validateFilter("name = 'a--b'").allowed).toBe(true);
    });

    it('should reject a statement separator', () => {
      expect(validateFilter('1=1; DROP TABLE users')).toEqual({
        allowed: false,
        reason: "a filter cannot contain ';'",
      });
    });

    it('should reject comments', () => {
      expect(validateFilter('1=1 -- and the rest')).toEqual({
        allowed: false,
        reason: 'comments are not allowed in a filter',
      });
    });

    it('should reject unbalanced parentheses', () => {
      expect(validateFilter('(id = 1').reason).toBe('unbalanced parentheses');
      expect(validateFilter('id = 1) OR (1 = 1').reason).toBe('unbalanced parentheses');
    });

    it('should reject mutation keywords', () => {
      expect(validateFilter('id IN (DELETE FROM users)').reason).toBe('DELETE is not allowed in a filter');
    });

    it('should accept a call to the replace() string function', () => {
      expect(validateFilter("replace(name, '-', '') = 'ab'")).toEqual({ allowed: true });
      expect(validateFilter("REPLACE (name, 'a', 'b') <> ''").allowed).toBe(true);
    });
  });

  describe('stripLiteralsAndComments', () => {
    it('should drop literals, quoted identifiers and comments', () => {
      const stripped = stripLiteralsAndComments(`SELECT 'a', "b", \`c\` /* d */ -- e`);
      expect(stripped.replace(/\s+/g, ' ').trim()).toBe('SELECT , ,');
    });
  });

  describe('isReadOnly', () => {
    it('should let the connection setting win', () => {
      expect(isReadOnly(false, false)).toBe(false);
      expect(isReadOnly(true, true)).toBe(true);
    });

    it('should fall back to the global setting', () => {
      expect(isReadOnly(undefined, false)).toBe(true);
      expect(isReadOnly(undefined, true)).toBe(false);
    });
  });
});
