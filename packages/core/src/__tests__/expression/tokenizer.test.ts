/**
 * Expression Tokenizer Tests
 */

import { describe, it, expect } from 'vitest';

import { ExpressionError } from '../../errors.js';
import { tokenize } from '../../expression/tokenizer.js';

describe('tokenize', () => {
  it('should split a comparison into tokens ending with eof', () => {
    const tokens = tokenize('temp >= 80');

    expect(tokens.map((t) => [t.type, t.text])).toEqual([
      ['identifier', 'temp'],
      ['operator', '>='],
      ['number', '80'],
      ['eof', ''],
    ]);
  });

  it('should record token positions', () => {
    const tokens = tokenize('a == "x"');

    expect(tokens.map((t) => t.position)).toEqual([0, 2, 5, 8]);
  });

  it('should recognize keywords and booleans', () => {
    const tokens = tokenize('not ready and True or false');

    expect(tokens.map((t) => t.type)).toEqual(['not', 'identifier', 'and', 'boolean', 'or', 'boolean', 'eof']);
    expect(tokens[3]?.text).toBe('true');
  });

  it('should read dotted identifiers and decimal numbers', () => {
    const tokens = tokenize('bmc.fw_version > 1.25');

    expect(tokens[0]).toEqual({ type: 'identifier', text: 'bmc.fw_version', position: 0 });
    expect(tokens[2]).toEqual({ type: 'number', text: '1.25', position: 17 });
  });

  it('should unescape quoted strings', () => {
    const tokens = tokenize("name == 'it\\'s'");

    expect(tokens[2]).toEqual({ type: 'string', text: "it's", position: 8 });
  });

  it('should throw on an unterminated string', () => {
    expect(() => tokenize('name == "abc')).toThrow(ExpressionError);
    expect(() => tokenize('name == "abc')).toThrow('Unterminated string literal at position 8');
  });

  it('should throw on an unexpected character', () => {
    expect(() => tokenize('a = 1')).toThrow("Unexpected character '=' at position 2");
  });
});
