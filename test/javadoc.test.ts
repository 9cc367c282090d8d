import { describe, it, expect } from 'vitest';
import { parseJavadoc } from '../src/parser/plugins/java/javadoc.js';

describe('parseJavadoc', () => {
  it('parses a single-line comment', () => {
    expect(parseJavadoc('/** Simple. */')).toEqual({ description: 'Simple.', blockTags: [] });
  });

  it('returns an empty description for an empty block', () => {
    expect(parseJavadoc('/** */')).toEqual({ description: '', blockTags: [] });
  });

  it('splits description from block tags', () => {
    const raw = [
      '/**',
      ' * Adds two numbers.',
      ' * Second line.',
      ' *',
      ' * @param a the first',
      ' *        operand',
      ' * @param b',
      ' * @return the sum',
      ' * @throws ArithmeticException on overflow',
      ' * @since 1.2',
      ' */',
    ].join('\n');

    expect(parseJavadoc(raw)).toEqual({
      description: 'Adds two numbers.\nSecond line.',
      blockTags: [
        { kind: 'param', name: 'a', content: 'the first\noperand' },
        { kind: 'param', name: 'b', content: '' },
        { kind: 'return', content: 'the sum' },
        { kind: 'throws', name: 'ArithmeticException', content: 'on overflow' },
        { kind: 'since', content: '1.2' },
      ],
    });
  });

  it('keeps inline tags in the description', () => {
    const raw = '/**\n * {@link Widget} factory.\n * @return a widget\n */';
    expect(parseJavadoc(raw).description).toBe('{@link Widget} factory.');
  });

  it('handles CRLF line endings', () => {
    const raw = '/**\r\n * Windows doc.\r\n * @param x value\r\n */';
    expect(parseJavadoc(raw)).toEqual({
      description: 'Windows doc.',
      blockTags: [{ kind: 'param', name: 'x', content: 'value' }],
    });
  });

  it('reads exception tags like throws tags', () => {
    const { blockTags } = parseJavadoc('/** @exception IOException if reading fails */');
    expect(blockTags).toEqual([{ kind: 'exception', name: 'IOException', content: 'if reading fails' }]);
  });
});
