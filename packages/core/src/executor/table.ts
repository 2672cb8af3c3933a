/**
 * @module executor/table
 * Table rendering for result pages, built on `cli-table3`.
 */

import Table from 'cli-table3';
import { DisplayTheme } from '../core/config';
import { OutputSink } from './output';

/**
 * Accumulates rows under a header and writes them out as a table.
 */
export interface TableRenderer {
  SetHeader(columns: readonly string[]): void;
  Append(row: readonly string[]): void;

  /** Writes the rows appended since the last render, then clears them. The header stays */
  Render(): void;
}

export interface TableStyle {
  Theme: DisplayTheme;
  ColumnSeparator: string;
  NoHeader: boolean;
}

/** Character drawn under the header, per theme */
const RULE_CHARS: Record<DisplayTheme, string> = {
  ASCIICompact: '-',
  UtfCompact: '─',
};

/**
 * Border characters for a compact theme: no outer frame, columns split by
 * the separator, a single rule under the header.
 */
export function ThemeChars(theme: DisplayTheme, separator: string): Partial<Record<Table.CharName, string>> {
  return {
    top: '',
    'top-mid': '',
    'top-left': '',
    'top-right': '',
    bottom: '',
    'bottom-mid': '',
    'bottom-left': '',
    'bottom-right': '',
    left: '',
    'left-mid': '',
    right: '',
    'right-mid': '',
    mid: RULE_CHARS[theme],
    'mid-mid': ' '.repeat(separator.length),
    middle: separator,
  };
}

/**
 * `TableRenderer` writing to an output sink.
 */
export class CliTableRenderer implements TableRenderer {
  private readonly sink: OutputSink;
  private readonly style: TableStyle;
  private header: string[] = [];
  private rows: string[][] = [];

  constructor(sink: OutputSink, style: TableStyle) {
    this.sink = sink;
    this.style = style;
  }

  SetHeader(columns: readonly string[]): void {
    this.header = [...columns];
  }

  Append(row: readonly string[]): void {
    this.rows.push([...row]);
  }

  Render(): void {
    if (this.rows.length === 0) {
      return;
    }
    const table = new Table({
      head: this.style.NoHeader ? [] : this.header,
      chars: ThemeChars(this.style.Theme, this.style.ColumnSeparator),
      style: {
        head: [],
        border: [],
        'padding-left': 0,
        'padding-right': 0,
        compact: true,
      },
    });
    table.push(...this.rows);
    this.sink.WriteLine(table.toString());
    this.rows = [];
  }
}
