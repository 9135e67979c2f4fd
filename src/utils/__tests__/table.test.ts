/**
 * Tests for table formatting utilities
 */

import { describe, it, expect } from 'vitest';
import { formatTable, renderTextTable, type Column, type Row } from '../table.js';

const stripAnsi = (s: string): string => s.replace(/\x1B\[[0-9;]*m/g, '');

describe('formatTable', () => {
  const columns: Column[] = [
    { header: 'Extension', key: 'extension' },
    { header: 'Processor', key: 'processor' },
  ];

  it('renders a boxed table with one line per row', () => {
    const rows: Row[] = [
      { extension: '.py', processor: 'code_processor' },
      { extension: '.json', processor: 'structured_data_processor' },
    ];

    const lines = stripAnsi(formatTable(columns, rows)).split('\n');

    expect(lines).toHaveLength(6);
    expect(lines[0]?.startsWith('┌')).toBe(true);
    expect(lines[1]).toBe('│ Extension │ Processor                 │');
    expect(lines[3]).toBe('│ .py       │ code_processor            │');
    expect(lines[5]?.startsWith('└')).toBe(true);
  });

  it('keeps headers and borders when there are no rows', () => {
    const lines = stripAnsi(formatTable(columns, [])).split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe('│ Extension │ Processor │');
  });

  it('returns empty string when no columns', () => {
    expect(formatTable([], [])).toBe('');
  });

  it('right-aligns and honours minWidth', () => {
    const result = formatTable([{ header: 'N', key: 'n', align: 'right', minWidth: 4 }], [{ n: 7 }]);
    expect(stripAnsi(result).split('\n')[3]).toBe('│    7 │');
  });

  it('renders null and undefined cells as empty', () => {
    const result = formatTable(columns, [{ extension: null, processor: undefined }]);
    expect(stripAnsi(result).split('\n')[3]).toBe('│           │           │');
  });

  it('measures width without ANSI codes', () => {
    const result = formatTable([{ header: 'X', key: 'x' }], [{ x: '\x1B[31mab\x1B[39m' }]);
    expect(stripAnsi(result).split('\n')[0]).toBe('┌────┐');
  });
});

describe('renderTextTable', () => {
  it('left-aligns text and right-aligns numeric columns', () => {
    const text = renderTextTable(['name', 'qty'], [
      ['apple', 3],
      ['pear', 12],
    ]);

    expect(text.split('\n')).toEqual(['name   qty', 'apple    3', 'pear    12']);
  });

  it('treats empty cells in a numeric column as numeric', () => {
    const text = renderTextTable(['id', 'score'], [
      ['a', ''],
      ['b', 5],
    ]);

    expect(text.split('\n')).toEqual(['id  score', 'a', 'b       5']);
  });

  it('left-aligns a column that mixes text and numbers', () => {
    const text = renderTextTable(['v'], [[1], ['x']]);
    expect(text.split('\n')).toEqual(['v', '1', 'x']);
  });

  it('renders only the header line when there are no rows', () => {
    expect(renderTextTable(['a', 'b'], [])).toBe('a  b');
  });

  it('fills missing trailing cells with blanks', () => {
    expect(renderTextTable(['a', 'b'], [['x']]).split('\n')).toEqual(['a  b', 'x']);
  });
});
