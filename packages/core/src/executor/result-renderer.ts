/**
 * @module executor/result-renderer
 * Turns result sets into paged tables and summary lines.
 */

import { CellValue, ResultSet } from '../db/session';
import { EngineError, ToError } from '../core/errors';
import { OutputSink } from './output';
import { TableRenderer } from './table';

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Formats a timestamp as `YYYY-MM-DD HH:MM:SS`.
 *
 * The driver decodes server date/time values as UTC, so the UTC fields are
 * the server's wall-clock time.
 */
export function FormatTimestamp(value: Date): string {
  return (
    `${value.getUTCFullYear().toString().padStart(4, '0')}-${pad2(value.getUTCMonth() + 1)}-${pad2(value.getUTCDate())} ` +
    `${pad2(value.getUTCHours())}:${pad2(value.getUTCMinutes())}:${pad2(value.getUTCSeconds())}`
  );
}

/**
 * Formats one cell for display.
 */
export function FormatCell(value: CellValue): string {
  switch (value.Kind) {
    case 'null':
      return 'NULL';
    case 'timestamp':
      return FormatTimestamp(value.Value);
    case 'binary':
      return '0x' + Buffer.from(value.Value).toString('hex');
    case 'scalar':
      return String(value.Value).trim();
  }
}

/**
 * Builds the summary line for a result set, or `null` when the engine
 * reported neither a row count nor a return status.
 *
 * @example
 * ```typescript
 * FormatSummary(1, undefined); // '(1 row affected)'
 * FormatSummary(3, 0);         // '(3 rows affected, return status = 0)'
 * ```
 */
export function FormatSummary(rowsAffected: number | undefined, returnStatus: number | undefined): string | null {
  const parts: string[] = [];
  if (rowsAffected !== undefined) {
    parts.push(rowsAffected === 1 ? '1 row affected' : `${rowsAffected} rows affected`);
  }
  if (returnStatus !== undefined) {
    parts.push(`return status = ${returnStatus}`);
  }
  return parts.length > 0 ? `(${parts.join(', ')})` : null;
}

export interface RenderOptions {
  /** Rows per rendered page */
  PageSize: number;

  /** Creates the table for one result set */
  CreateTable: () => TableRenderer;

  Sink: OutputSink;

  /** Receives row fetch failures that the server message handler did not already print */
  OnError?: (message: string) => void;
}

/**
 * Statistics about one rendered result set.
 */
export interface RenderStats {
  Rows: number;
  Pages: number;
  RowError?: Error;
}

/**
 * Renders one result set: its rows in pages of `PageSize`, then the
 * summary line, then flushes the sink.
 *
 * A failure while fetching a row ends this result set but not the batch.
 */
export async function RenderResultSet(resultSet: ResultSet, options: RenderOptions): Promise<RenderStats> {
  const stats: RenderStats = { Rows: 0, Pages: 0 };
  const columns = resultSet.Columns;

  if (columns.length > 0) {
    const table = options.CreateTable();
    table.SetHeader(columns);
    let onPage = 0;

    for (;;) {
      let row: CellValue[] | null;
      try {
        row = await resultSet.NextRow();
      } catch (err) {
        stats.RowError = ToError(err);
        if (!(err instanceof EngineError)) {
          options.OnError?.(stats.RowError.message);
        }
        break;
      }
      if (row === null) {
        break;
      }

      table.Append(row.map(FormatCell));
      stats.Rows++;
      onPage++;
      if (onPage >= options.PageSize) {
        table.Render();
        stats.Pages++;
        onPage = 0;
      }
    }

    if (onPage > 0) {
      table.Render();
      stats.Pages++;
    }
  }

  const summary = FormatSummary(resultSet.RowsAffected, resultSet.ReturnStatus);
  if (summary !== null) {
    options.Sink.WriteLine(summary);
  }
  await options.Sink.Flush();
  return stats;
}
