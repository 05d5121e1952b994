import { describe, test, expect } from 'vitest';
import { formatTable, formatStatus, stripAnsi, truncate, namedColor, RED, type Column } from './output.js';

interface Row {
  id: number;
  name: string;
  status: string;
}

describe('formatTable', () => {
  const columns: Column<Row>[] = [
    { header: 'ID', key: 'id' },
    { header: 'Name', key: 'name' },
    { header: 'Status', key: 'status' },
  ];

  test('given empty rows, should return "No results."', () => {
    expect(formatTable([], columns)).toBe('No results.');
  });

  test('given basic rows, should format header, separator, and body', () => {
    const rows: Row[] = [
      { id: 0, name: 'architect', status: 'ready' },
      { id: 1, name: 'frontend', status: 'busy' },
    ];
    const lines = formatTable(rows, columns).split('\n').map(stripAnsi);

    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe('ID  Name       Status');
    expect(lines[1]).toBe('──  ─────────  ──────');
    expect(lines[2]).toBe('0   architect  ready ');
    expect(lines[3]).toBe('1   frontend   busy  ');
  });

  test('given ANSI-colored values, should calculate width from stripped text', () => {
    const colored: Column<Row>[] = [
      { header: 'Status', key: 'status', format: (v) => `\x1b[32m${String(v)}\x1b[0m` },
    ];
    const lines = formatTable([{ id: 0, name: 'x', status: 'starting' }], colored).split('\n');

    expect(stripAnsi(lines[0])).toBe('Status  ');
  });

  test('given explicit column width, should pad to it', () => {
    const fixed: Column<Row>[] = [{ header: 'ID', key: 'id', width: 6 }];
    const dataRow = stripAnsi(formatTable([{ id: 7, name: 'x', status: 'y' }], fixed).split('\n')[2]);

    expect(dataRow).toBe('7     ');
  });
});

describe('formatStatus', () => {
  test('given stuck, should render symbol and name', () => {
    expect(stripAnsi(formatStatus('stuck'))).toBe('✗ stuck');
  });

  test('given ready, should render symbol and name', () => {
    expect(stripAnsi(formatStatus('ready'))).toBe('◎ ready');
  });
});

describe('truncate', () => {
  test('given short text, should return it unchanged', () => {
    expect(truncate('short', 20)).toBe('short');
  });

  test('given text of exact length, should return it unchanged', () => {
    expect(truncate('hello', 5)).toBe('hello');
  });

  test('given long text, should cut and append ellipsis', () => {
    expect(truncate('hello world', 8)).toBe('hello...');
  });

  test('given multi-byte text, should count characters not bytes', () => {
    expect(truncate('こんにちは世界', 5)).toBe('こん...');
  });
});

describe('namedColor', () => {
  test('given a known name in any case, should return its escape code', () => {
    expect(namedColor('Red')).toBe(RED);
  });

  test('given an unknown name, should return empty string', () => {
    expect(namedColor('chartreuse')).toBe('');
  });
});
