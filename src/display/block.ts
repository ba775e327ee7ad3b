/**
 * Table Blocks
 *
 * A block is a table of rows that all come from one record family. It keeps
 * the records behind the rows it last showed so an interactive action can
 * find the record the operator is looking at.
 *
 * Column widths start at MIN_COLUMN_WIDTH and only grow during a run; the
 * width actually drawn is capped by what is left of the screen line.
 */

import { Chalk } from 'chalk';
import type { Cell, DisplayClass, Displayable } from '../types.js';

export const MIN_COLUMN_WIDTH = 6;

/** Gap kept after the longest cell of a column */
const CELL_PADDING = 2;

const emphasis = new Chalk({ level: 1 });

/** What the screen needs from a block to lay it out */
export interface RenderableBlock {
  readonly headers: readonly string[];
  height(): number;
  printLines(height: number, width: number, bold?: boolean): string[];
}

interface Row<T> {
  record: T;
  cells: Cell[];
}

export function cellText(cell: Cell): string {
  if (cell === null || cell === undefined) return '';
  return String(cell).replace(/[\r\n\t]+/g, ' ');
}

export class Block<T extends Displayable> implements RenderableBlock {
  private readonly widths: number[];
  private rows: Row<T>[] = [];

  constructor(
    readonly display: DisplayClass,
    readonly headers: readonly string[],
    private readonly toCells: (record: T) => Cell[],
  ) {
    this.widths = headers.map(() => MIN_COLUMN_WIDTH);
  }

  /** Replace the held rows. Every record must belong to this block's family. */
  reset(records: Iterable<T>): void {
    const rows: Row<T>[] = [];
    for (const record of records) {
      if (record.display !== this.display) {
        throw new Error(`Block "${this.display}" cannot hold a "${record.display}" row`);
      }
      const cells = this.toCells(record);
      if (cells.length > this.headers.length) {
        throw new Error(`Row has ${cells.length} cells but block "${this.display}" has ${this.headers.length} columns`);
      }
      rows.push({ record, cells });
    }
    this.rows = rows;
  }

  /** Row count plus one line for the header and one blank line below. */
  height(): number {
    return this.rows.length + 2;
  }

  /** Header line followed by as many rows as fit in height - 1 lines. */
  printLines(height: number, width: number, bold = false): string[] {
    if (height < 2) {
      throw new Error(`Block "${this.display}" needs at least 2 lines, got ${height}`);
    }

    const lines = [this.printLine(this.headers, width, bold)];
    for (const row of this.rows.slice(0, height - 1)) {
      lines.push(this.printLine(row.cells, width));
    }
    return lines;
  }

  /** Records whose cells match the predicate, in display order. */
  findLines(predicate: (cells: readonly Cell[]) => boolean): T[] {
    return this.rows.filter(row => predicate(row.cells)).map(row => row.record);
  }

  private printLine(cells: readonly Cell[], width: number, bold = false): string {
    let remaining = width;
    let line = '';

    for (let i = 0; i < cells.length; i++) {
      // Drop this and every later column once its header no longer fits
      if (remaining < this.headers[i].length) break;

      const text = cellText(cells[i]);
      this.widths[i] = Math.max(this.widths[i], text.length + CELL_PADDING);
      const columnWidth = Math.min(remaining, this.widths[i]);
      const shown = text.padEnd(columnWidth).slice(0, columnWidth);

      line += bold ? emphasis.bold(shown) : shown;
      remaining -= columnWidth;
    }

    return line;
  }
}
