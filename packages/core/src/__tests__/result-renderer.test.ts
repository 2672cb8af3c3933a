import { describe, it, expect } from 'vitest';
import { FormatCell, FormatSummary, FormatTimestamp, RenderResultSet } from '../executor/result-renderer';
import { OutputSink } from '../executor/output';
import { EngineError } from '../core/errors';
import { FakeResultSet, MemoryWritable, RecordingTable, Scalar } from './fakes';

function rows(count: number) {
  return Array.from({ length: count }, (_, i) => [Scalar(i)]);
}

async function render(set: FakeResultSet, pageSize: number) {
  const output = new MemoryWritable();
  const sink = new OutputSink(output);
  const tables: RecordingTable[] = [];
  const errors: string[] = [];
  const stats = await RenderResultSet(set, {
    PageSize: pageSize,
    CreateTable: () => {
      const table = new RecordingTable();
      tables.push(table);
      return table;
    },
    Sink: sink,
    OnError: (message) => errors.push(message),
  });
  return { stats, tables, errors, output };
}

describe('FormatTimestamp', () => {
  it('formats as YYYY-MM-DD HH:MM:SS', () => {
    expect(FormatTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02 03:04:05');
    expect(FormatTimestamp(new Date(Date.UTC(1999, 11, 31, 23, 59, 59, 999)))).toBe('1999-12-31 23:59:59');
  });
});

describe('FormatCell', () => {
  it('shows null as NULL', () => {
    expect(FormatCell({ Kind: 'null' })).toBe('NULL');
  });

  it('shows binary as 0x-prefixed hex', () => {
    expect(FormatCell({ Kind: 'binary', Value: Uint8Array.from([0xde, 0xad, 0x01]) })).toBe('0xdead01');
    expect(FormatCell({ Kind: 'binary', Value: new Uint8Array(0) })).toBe('0x');
  });

  it('shows timestamps without fractions', () => {
    expect(FormatCell({ Kind: 'timestamp', Value: new Date(Date.UTC(2024, 5, 30, 12, 0, 0, 250)) })).toBe(
      '2024-06-30 12:00:00'
    );
  });

  it('trims stringified scalars', () => {
    expect(FormatCell(Scalar('  padded  '))).toBe('padded');
    expect(FormatCell(Scalar(42))).toBe('42');
    expect(FormatCell(Scalar(true))).toBe('true');
    expect(FormatCell(Scalar(12345678901234567890n))).toBe('12345678901234567890');
  });
});

describe('FormatSummary', () => {
  it('uses singular wording for exactly one row', () => {
    expect(FormatSummary(1, undefined)).toBe('(1 row affected)');
  });

  it('uses plural wording otherwise', () => {
    expect(FormatSummary(0, undefined)).toBe('(0 rows affected)');
    expect(FormatSummary(3, undefined)).toBe('(3 rows affected)');
  });

  it('combines the row count and return status', () => {
    expect(FormatSummary(3, 0)).toBe('(3 rows affected, return status = 0)');
    expect(FormatSummary(undefined, -4)).toBe('(return status = -4)');
  });

  it('returns null when nothing was reported', () => {
    expect(FormatSummary(undefined, undefined)).toBeNull();
  });
});

describe('RenderResultSet', () => {
  it('renders ceil(R / S) pages', async () => {
    for (const pageSize of [1, 3, 5]) {
      for (const rowCount of [0, 1, 2, 5, 6, 7, 16]) {
        const { tables } = await render(new FakeResultSet({ Columns: ['n'], Rows: rows(rowCount) }), pageSize);
        expect(tables[0].Pages).toHaveLength(Math.ceil(rowCount / pageSize));
      }
    }
  });

  it('splits rows into full pages and a final partial one', async () => {
    const { tables, stats } = await render(new FakeResultSet({ Columns: ['n'], Rows: rows(7) }), 3);
    expect(tables).toHaveLength(1);
    expect(tables[0].Header).toEqual(['n']);
    expect(tables[0].Pages).toEqual([
      [['0'], ['1'], ['2']],
      [['3'], ['4'], ['5']],
      [['6']],
    ]);
    expect(stats).toEqual({ Rows: 7, Pages: 3 });
  });

  it('writes no summary when the engine reported none', async () => {
    const { output } = await render(new FakeResultSet({ Columns: ['x'], Rows: [[Scalar(1)]] }), 10);
    expect(output.Text).toBe('');
  });

  it('writes the summary after the rows', async () => {
    const { output, tables } = await render(
      new FakeResultSet({ Columns: ['x'], Rows: [[Scalar(1)]], RowsAffected: 1 }),
      10
    );
    expect(tables[0].Pages).toEqual([[['1']]]);
    expect(output.Text).toBe('(1 row affected)\n');
  });

  it('renders only the summary for a result set without columns', async () => {
    const { output, tables } = await render(new FakeResultSet({ RowsAffected: 3 }), 10);
    expect(tables).toEqual([]);
    expect(output.Text).toBe('(3 rows affected)\n');
  });

  it('stops at a row error and keeps the rows already fetched', async () => {
    const { tables, errors, stats } = await render(
      new FakeResultSet({ Columns: ['x'], Rows: rows(2), RowError: new Error('conversion failed') }),
      10
    );
    expect(tables[0].Pages).toEqual([[['0'], ['1']]]);
    expect(errors).toEqual(['conversion failed']);
    expect(stats.Rows).toBe(2);
    expect(stats.RowError?.message).toBe('conversion failed');
  });

  it('does not repeat engine errors', async () => {
    const { errors } = await render(
      new FakeResultSet({ Columns: ['x'], RowError: new EngineError(16, 8115, 2, 'Arithmetic overflow') }),
      10
    );
    expect(errors).toEqual([]);
  });
});
