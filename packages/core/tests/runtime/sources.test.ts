/**
 * Lexloom Tests: Character Sources
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  codesToString,
  EOF,
  fileSource,
  stringSource,
  type CharSource,
} from '../../src/index.js';

function drain(source: CharSource): string {
  const codes: number[] = [];
  for (let code = source.read(); code !== EOF; code = source.read()) {
    codes.push(code);
  }
  return codesToString(codes);
}

describe('stringSource', () => {
  it('yields UTF-16 code units then EOF', () => {
    const source = stringSource('aé');
    expect(source.read()).toBe(97);
    expect(source.read()).toBe(0xe9);
    expect(source.read()).toBe(EOF);
    expect(source.read()).toBe(EOF);
  });
});

describe('fileSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lexloom-sources-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a file path to EOF', () => {
    const path = join(dir, 'input.txt');
    writeFileSync(path, 'line one\nline two\n');
    expect(drain(fileSource(path))).toBe('line one\nline two\n');
  });

  it('decodes multi-byte characters split across chunks', () => {
    const path = join(dir, 'utf8.txt');
    // 'é' is two bytes; a chunk size of 1 splits it
    writeFileSync(path, 'xé€y', 'utf-8');
    expect(drain(fileSource(path, { chunkSize: 1 }))).toBe('xé€y');
  });

  it('returns EOF immediately for an empty file', () => {
    const path = join(dir, 'empty.txt');
    writeFileSync(path, '');
    const source = fileSource(path);
    expect(source.read()).toBe(EOF);
    expect(source.read()).toBe(EOF);
  });

  it('closes the path and ends the input when a read fails', () => {
    // a directory opens for reading but fails with EISDIR on read
    const source = fileSource(dir);
    expect(() => source.read()).toThrow(/EISDIR/);
    expect(source.read()).toBe(EOF);
  });
});

describe('codesToString', () => {
  it('converts long code arrays in chunks', () => {
    const codes = new Array<number>(10000).fill(120);
    expect(codesToString(codes)).toBe('x'.repeat(10000));
  });
});
