/**
 * Lexloom Tests: Code Writer
 */

import { describe, expect, it } from 'vitest';
import { CodeWriter } from '../../src/index.js';

describe('CodeWriter', () => {
  it('indents nested lines', () => {
    const out = new CodeWriter();
    out.line('if (x) {');
    out.indent();
    out.line('y();');
    out.dedent();
    out.line('}');
    expect(out.toString()).toBe('if (x) {\n  y();\n}\n');
  });

  it('continues the current line with write()', () => {
    const out = new CodeWriter(4);
    out.indent();
    out.line('a');
    out.write(' + ');
    out.write('');
    out.write('b;');
    expect(out.toString()).toBe('    a + b;\n');
  });

  it('writes blank lines without indentation', () => {
    const out = new CodeWriter();
    out.indent();
    out.line('one();');
    out.blankLine();
    out.line('two();');
    expect(out.toString()).toBe('  one();\n\n  two();\n');
  });

  it('does not double the newline after text that ends in one', () => {
    const out = new CodeWriter();
    out.write('// header\n');
    out.blankLine();
    out.line('body();');
    expect(out.toString()).toBe('// header\n\nbody();\n');
  });

  it('returns an empty string when nothing was written', () => {
    expect(new CodeWriter().toString()).toBe('');
  });

  it('refuses to dedent below the first level', () => {
    expect(() => new CodeWriter().dedent()).toThrow(RangeError);
  });
});
