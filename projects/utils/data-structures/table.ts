import type { IHaveDebugStr } from '../debug.js';

export interface ConstTable<D> extends IHaveDebugStr {
  numRows: number;
  numCols: number;
  getCell(row: number, col: number): D;
}

export interface MutTable<D> extends ConstTable<D> {
  /**
   * Add a row to the table where each
   * cell in the row has the given
   * value.
   */
  addRow(value: () => D): void;

  /**
   * Add a column to the table where each
   * cell in the column has the given value
   */
  addCol(value: () => D): void;

  /**
   * Set the value of the cell at the given row/col to the given value.
   */
  setCell(row: number, col: number, value: D): void;
}

const GRID_KNOT = '+';
const GRID_HORIZONTAL = '-';
const GRID_VERTICAL = '|';

export class Table<D> implements MutTable<D> {
  private rows: D[][] = [];
  private _numCols: number = 0;
  get numRows() {
    return this.rows.length;
  }
  get numCols() {
    return this._numCols;
  }

  static init<D>(numRows: number, numCols: number, value: () => D) {
    let table: Table<D> = new Table();
    for (let row = 0; row < numRows; row++) {
      table.addRow(value);
    }
    for (let col = 0; col < numCols; col++) {
      table.addCol(value);
    }
    return table;
  }

  /**
   * Build a table from a list of rows. Short rows are filled
   * with the given value.
   */
  static fromRows<D>(rows: D[][], fill: () => D) {
    const numCols = Math.max(0, ...rows.map((row) => row.length));
    const table = Table.init(rows.length, numCols, fill);
    rows.forEach((row, ri) =>
      row.forEach((cell, ci) => table.setCell(ri, ci, cell))
    );
    return table;
  }

  addRow(value: () => D) {
    let cols: D[] = [];
    for (let c = 0; c < this._numCols; c++) {
      cols.push(value());
    }
    this.rows.push(cols);
  }

  addCol(value: () => D) {
    this._numCols++;
    for (let rowi = 0; rowi < this.rows.length; rowi++) {
      this.rows[rowi].push(value());
    }
  }

  setCell(row: number, col: number, value: D) {
    if (row < 0 || row >= this.rows.length) {
      throw new Error(
        `TableIndexError: Invalid row ${row}. Must be between 0 and ${this.rows.length} inclusive`
      );
    }
    if (col < 0 || col >= this._numCols) {
      throw new Error(
        `TableIndexError: Invalid col ${col}. Must be between 0 and ${this._numCols} inclusive`
      );
    }
    this.rows[row][col] = value;
  }

  /**
   * @returns The value of the cell with the given row/col
   */
  getCell(row: number, col: number): D {
    return this.rows[row][col];
  }

  /**
   * Render the table as a bordered grid where every column
   * is as wide as the widest cell in the whole table.
   */
  toDebugStr() {
    if (this.numRows == 0) {
      return '';
    }
    let width = 0;
    for (let ri = 0; ri < this.numRows; ri++) {
      for (let ci = 0; ci < this.numCols; ci++) {
        width = Math.max(width, `${this.getCell(ri, ci)}`.length);
      }
    }
    const border =
      GRID_KNOT + (GRID_HORIZONTAL.repeat(width) + GRID_KNOT).repeat(this.numCols);

    let out = border + '\n';
    for (let row = 0; row < this.numRows; row++) {
      out += GRID_VERTICAL;
      for (let col = 0; col < this.numCols; col++) {
        out += `${this.getCell(row, col)}`.padStart(width) + GRID_VERTICAL;
      }
      out += '\n' + border + '\n';
    }
    return out;
  }
}
