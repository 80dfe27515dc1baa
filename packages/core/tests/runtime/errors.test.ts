/**
 * Lexloom Tests: Error Taxonomy
 * Tests for error registry, template rendering, error classes and the factory
 */

import { describe, expect, it } from 'vitest';

import {
  ConfigError,
  createError,
  ERROR_REGISTRY,
  formatLocation,
  LexloomError,
  PatternError,
  renderMessage,
  ScanError,
  SpecError,
} from '../../src/index.js';

describe('Lexloom: Error Taxonomy', () => {
  describe('registry', () => {
    it('looks up definitions by ID', () => {
      const definition = ERROR_REGISTRY.get('LEX-R001');
      expect(definition?.category).toBe('runtime');
      expect(definition?.messageTemplate).toBe('Unknown parser {name}');
    });

    it('uses LEX-{category}NNN IDs matching each category', () => {
      const prefixes = { build: 'B', pattern: 'P', runtime: 'R', cli: 'C' };
      for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
        expect(errorId).toMatch(/^LEX-[BPRC]\d{3}$/);
        expect(errorId.charAt(4)).toBe(prefixes[definition.category]);
      }
    });

    it('reports unknown IDs as absent', () => {
      expect(ERROR_REGISTRY.has('LEX-R999')).toBe(false);
      expect(ERROR_REGISTRY.get('LEX-R999')).toBeUndefined();
    });
  });

  describe('renderMessage', () => {
    it('substitutes placeholders', () => {
      expect(renderMessage('Unknown parser {name}', { name: 'comment' })).toBe(
        'Unknown parser comment'
      );
    });

    it('renders missing values as empty strings', () => {
      expect(renderMessage('a{x}b', {})).toBe('ab');
    });

    it('returns templates with an unclosed brace unchanged', () => {
      expect(renderMessage('open {name', { name: 'x' })).toBe('open {name');
    });

    it('stringifies non-string values', () => {
      expect(renderMessage('tag {tag}', { tag: 3 })).toBe('tag 3');
    });
  });

  describe('error classes', () => {
    it('appends the location to the message and strips it from data', () => {
      const err = new SpecError(
        'LEX-B005',
        { name: 'DIGIT' },
        { line: 4, column: 1, offset: 30 },
        'calc.lex'
      );
      expect(err.message).toBe('Duplicate definition DIGIT at 4:1');
      expect(err.name).toBe('SpecError');
      expect(err.toData()).toEqual({
        errorId: 'LEX-B005',
        message: 'Duplicate definition DIGIT',
        location: { line: 4, column: 1, offset: 30 },
        source: 'calc.lex',
        context: { name: 'DIGIT' },
      });
    });

    it('rejects IDs from another category', () => {
      expect(() => new ScanError('LEX-B001', { detail: 'x' })).toThrow(
        'Expected runtime error ID, got: LEX-B001'
      );
    });

    it('rejects unknown IDs', () => {
      expect(() => new ConfigError('LEX-C999', {})).toThrow(
        'Unknown error ID: LEX-C999'
      );
    });

    it('formats through a host formatter', () => {
      const err = new ScanError('LEX-R001', { name: 'x' });
      expect(err.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
        '[LEX-R001] Unknown parser x'
      );
      expect(err.format()).toBe('Unknown parser x');
    });

    it('is an instance of LexloomError and Error', () => {
      const err = new ConfigError('LEX-C002', { path: 'missing.lex' });
      expect(err).toBeInstanceOf(LexloomError);
      expect(err).toBeInstanceOf(Error);
      expect(err.message).toBe('Input not found: missing.lex');
    });
  });

  describe('PatternError', () => {
    it('locates the offending character on line 1', () => {
      const err = new PatternError(
        'LEX-P001',
        'a(b',
        { detail: "unclosed '('" },
        { offset: 1 }
      );
      expect(err.location).toEqual({ line: 1, column: 2, offset: 1 });
      expect(err.context).toEqual({ detail: "unclosed '('", pattern: 'a(b' });
    });

    it('with() replaces options and keeps the rest', () => {
      const err = new PatternError(
        'LEX-P002',
        '{X}',
        { name: 'X' },
        { offset: 0 }
      );
      const moved = err.with({
        location: { line: 7, column: 3, offset: 52 },
        source: 'calc.lex',
      });
      expect(moved.message).toBe('Unknown definition X at 7:3');
      expect(moved.offset).toBe(0);
      expect(moved.source).toBe('calc.lex');
      expect(moved.pattern).toBe('{X}');
    });
  });

  describe('createError', () => {
    it('renders the registry template', () => {
      const err = createError(
        'LEX-R004',
        { location: 'in:1:1' },
        { line: 1, column: 1, offset: 0 }
      );
      expect(err.errorId).toBe('LEX-R004');
      expect(err.message).toBe('No pattern matches input at in:1:1 at 1:1');
    });

    it('throws TypeError for unknown IDs', () => {
      expect(() => createError('LEX-X001', {})).toThrow(TypeError);
    });
  });

  describe('formatLocation', () => {
    it('renders line:column', () => {
      expect(formatLocation({ line: 3, column: 14, offset: 40 })).toBe('3:14');
    });
  });
});
