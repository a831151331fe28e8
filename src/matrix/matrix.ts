/**
 * Matrix: a dense rows × cols block of float64 values.
 *
 * Values are stored row-major in a single Float64Array, so a row is a
 * contiguous subarray and a column is a strided gather.
 */
export class Matrix {
  /** Number of rows */
  readonly rows: number;

  /** Number of columns */
  readonly cols: number;

  /** Row-major backing storage of length rows * cols */
  readonly data: Float64Array;

  constructor(rows: number, cols: number, data?: Float64Array) {
    if (!Number.isInteger(rows) || rows < 0 || !Number.isInteger(cols) || cols < 0) {
      throw new RangeError(`invalid matrix shape ${rows}x${cols}`);
    }
    if (data && data.length !== rows * cols) {
      throw new RangeError(`expected ${rows * cols} values for ${rows}x${cols}, got ${data.length}`);
    }
    this.rows = rows;
    this.cols = cols;
    this.data = data ?? new Float64Array(rows * cols);
  }

  /**
   * Copies equally sized rows into a new matrix.
   * @throws RangeError if a row does not have `cols` values
   */
  static fromRows(rows: readonly ArrayLike<number>[], cols: number): Matrix {
    const matrix = new Matrix(rows.length, cols);
    for (let i = 0; i < rows.length; i++) {
      const row = rows[i];
      if (row === undefined || row.length !== cols) {
        throw new RangeError(`row ${i} has ${row?.length ?? 0} values, expected ${cols}`);
      }
      matrix.data.set(row, i * cols);
    }
    return matrix;
  }

  /** Get a value, or undefined when out of bounds */
  get(row: number, col: number): number | undefined {
    if (!this.inBounds(row, col)) return undefined;
    return this.data[row * this.cols + col];
  }

  /**
   * Set a value.
   * @throws RangeError when out of bounds
   */
  set(row: number, col: number, value: number): void {
    if (!this.inBounds(row, col)) {
      throw new RangeError(`(${row}, ${col}) is outside ${this.rows}x${this.cols}`);
    }
    this.data[row * this.cols + col] = value;
  }

  /** Zero-copy view of a row, or undefined when out of bounds */
  row(index: number): Float64Array | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.rows) return undefined;
    const start = index * this.cols;
    return this.data.subarray(start, start + this.cols);
  }

  /** Copy of a column, or undefined when out of bounds */
  column(index: number): Float64Array | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.cols) return undefined;
    const out = new Float64Array(this.rows);
    for (let i = 0; i < this.rows; i++) {
      out[i] = this.data[i * this.cols + index] ?? 0;
    }
    return out;
  }

  /** Nested number arrays, one per row */
  toArray(): number[][] {
    const out: number[][] = [];
    for (let i = 0; i < this.rows; i++) {
      const start = i * this.cols;
      out.push(Array.from(this.data.subarray(start, start + this.cols)));
    }
    return out;
  }

  private inBounds(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      col >= 0 &&
      row < this.rows &&
      col < this.cols
    );
  }
}
