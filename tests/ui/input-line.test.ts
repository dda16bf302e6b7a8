import { describe, it, expect } from 'vitest';
import { charKey, namedKey } from '../../src/keys.js';
import { InputLine } from '../../src/ui/input-line.js';

describe('InputLine', () => {
  it('should start with the cursor after the initial text', () => {
    const line = new InputLine('id > 2');
    expect(line.cursor).toBe(6);
  });

  it('should insert typed characters at the cursor', () => {
    const line = new InputLine('ac');
    line.handleKey(namedKey('left'));
    expect(line.handleKey(charKey('b'))).toBe('edit');
    expect(line.text).toBe('abc');
    expect(line.cursor).toBe(2);
  });

  it('should delete on either side of the cursor', () => {
    const line = new InputLine('abcd');
    line.handleKey(namedKey('home'));
    line.handleKey(namedKey('delete'));
    expect(line.text).toBe('bcd');
    line.handleKey(namedKey('end'));
    line.handleKey(namedKey('backspace'));
    expect(line.text).toBe('bc');
    expect(line.cursor).toBe(2);
  });

  it('should kill to the start of the line', () => {
    const line = new InputLine('name = 1');
    line.handleKey(namedKey('left'));
    line.handleKey(charKey('u', { ctrl: true }));
    expect(line.text).toBe('1');
    expect(line.cursor).toBe(0);
  });

  it('should report commit and cancel', () => {
    const line = new InputLine('x');
    expect(line.handleKey(namedKey('enter'))).toBe('commit');
    expect(line.handleKey(namedKey('esc'))).toBe('cancel');
    expect(line.handleKey(charKey('g', { ctrl: true }))).toBe('cancel');
    expect(line.text).toBe('x');
  });
});
