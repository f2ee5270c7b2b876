import { describe, it, expect } from 'vitest';
import { formatOutput, isOutputFormat } from '../../src/cli/utils/output.js';

describe('formatOutput', () => {
  it('should pretty-print JSON by default', () => {
    expect(formatOutput({ outcome: 'Initialized', exitCode: 0 })).toBe(
      '{\n  "outcome": "Initialized",\n  "exitCode": 0\n}'
    );
  });

  it('should format an object as aligned key-value pairs', () => {
    expect(formatOutput({ a: 1, bb: [1, 2], c: null }, 'table')).toBe('a   1\nbb  1, 2\nc   ');
  });

  it('should format a list of records as a table', () => {
    const rows = [
      { id: 1, name: 'x' },
      { id: 22, name: 'yy' },
    ];
    expect(formatOutput(rows, 'table')).toBe(
      ['id | name', '---+-----', '1  | x   ', '22 | yy  '].join('\n')
    );
  });

  it('should say so when there is nothing to show', () => {
    expect(formatOutput([], 'table')).toBe('(no results)');
  });
});

describe('isOutputFormat', () => {
  it('should accept json and table only', () => {
    expect(isOutputFormat('table')).toBe(true);
    expect(isOutputFormat('yaml')).toBe(false);
  });
});
