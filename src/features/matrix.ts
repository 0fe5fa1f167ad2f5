/**
 * 有理数（bigint による既約分数）
 */
export class Fraction {
  readonly num: bigint;
  readonly den: bigint;

  constructor(num: bigint, den: bigint = 1n) {
    if (den === 0n) throw new RangeError('division by zero');
    const sign = den < 0n ? -1n : 1n;
    const divisor = gcd(num < 0n ? -num : num, den < 0n ? -den : den) || 1n;
    this.num = (sign * num) / divisor;
    this.den = (sign * den) / divisor;
  }

  static readonly ZERO = new Fraction(0n);
  static readonly ONE = new Fraction(1n);

  /**
   * Accepts integers, decimals with an optional exponent, and `a/b`
   */
  static parse(text: string): Fraction | null {
    const ratio = /^([+-]?\d+)\/(\d+)$/.exec(text);
    if (ratio) {
      const den = BigInt(ratio[2] ?? '1');
      return den === 0n ? null : new Fraction(BigInt(ratio[1] ?? '0'), den);
    }
    const decimal = /^([+-]?)(\d*)(?:\.(\d*))?(?:e([+-]?\d+))?$/i.exec(text);
    if (!decimal) return null;
    const [, sign = '', whole = '', fraction = '', exponent = '0'] = decimal;
    if (whole.length + fraction.length === 0) return null;
    let num = BigInt(`${sign}${whole}${fraction}`);
    let den = 10n ** BigInt(fraction.length);
    const shift = Number(exponent);
    if (Math.abs(shift) > 100) return null;
    if (shift >= 0) num *= 10n ** BigInt(shift);
    else den *= 10n ** BigInt(-shift);
    return new Fraction(num, den);
  }

  isZero(): boolean {
    return this.num === 0n;
  }

  add(other: Fraction): Fraction {
    return new Fraction(this.num * other.den + other.num * this.den, this.den * other.den);
  }

  sub(other: Fraction): Fraction {
    return new Fraction(this.num * other.den - other.num * this.den, this.den * other.den);
  }

  mul(other: Fraction): Fraction {
    return new Fraction(this.num * other.num, this.den * other.den);
  }

  div(other: Fraction): Fraction {
    return new Fraction(this.num * other.den, this.den * other.num);
  }

  toString(): string {
    return this.den === 1n ? this.num.toString() : `${this.num}/${this.den}`;
  }
}

function gcd(a: bigint, b: bigint): bigint {
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}

export type Matrix = Fraction[][];

export type MatrixParseResult = { ok: true; matrix: Matrix } | { ok: false; error: string };

export const MATRIX_SYNTAX_RULES = [
  '> Your expression should have entries separated with spaces and rows delimited with `%`.',
  '> You should have the same number of entries in each row of the represented matrix.',
  '> Example: `%rref 2 -5 3 % 0.8 9 3 % -1 -7.5 0`',
].join('\n');

/**
 * Rows are separated by `%` and entries by whitespace. One leading and one trailing `%` are ignored.
 */
export function parseMatrix(expression: string): MatrixParseResult {
  let body = expression.trim();
  if (body.startsWith('%')) body = body.slice(1);
  if (body.endsWith('%')) body = body.slice(0, -1);

  const matrix: Matrix = [];
  for (const rowText of body.split('%')) {
    const row: Fraction[] = [];
    for (const entry of rowText.trim().split(/\s+/).filter(Boolean)) {
      const value = Fraction.parse(entry);
      if (!value) return { ok: false, error: 'the entries of the matrix must be numeric!' };
      row.push(value);
    }
    matrix.push(row);
  }

  const width = matrix[0]?.length ?? 0;
  if (width === 0) return { ok: false, error: 'the matrix must have at least one entry!' };
  if (matrix.some((row) => row.length !== width)) {
    return { ok: false, error: 'the rows of the matrix must have the same length!' };
  }
  return { ok: true, matrix };
}

/**
 * Gauss-Jordan elimination. The input is left untouched.
 */
export function rref(matrix: Matrix): Matrix {
  const rows = matrix.map((row) => [...row]);
  const width = rows[0]?.length ?? 0;
  let pivotRow = 0;

  for (let col = 0; col < width && pivotRow < rows.length; col++) {
    const found = rows.findIndex((row, i) => i >= pivotRow && !(row[col] ?? Fraction.ZERO).isZero());
    if (found === -1) continue;
    const swapped = rows[found];
    const target = rows[pivotRow];
    if (!swapped || !target) continue;
    rows[found] = target;
    rows[pivotRow] = swapped;

    const pivot = swapped[col] ?? Fraction.ONE;
    const normalized = swapped.map((value) => value.div(pivot));
    rows[pivotRow] = normalized;

    rows.forEach((row, i) => {
      if (i === pivotRow) return;
      const factor = row[col] ?? Fraction.ZERO;
      if (factor.isZero()) return;
      rows[i] = row.map((value, j) => value.sub(factor.mul(normalized[j] ?? Fraction.ZERO)));
    });
    pivotRow++;
  }
  return rows;
}

/**
 * One bracketed row per line, entries right-aligned per column
 */
export function formatMatrix(matrix: Matrix): string {
  const cells = matrix.map((row) => row.map((value) => value.toString()));
  const widths: number[] = [];
  for (const row of cells) {
    row.forEach((cell, j) => {
      widths[j] = Math.max(widths[j] ?? 0, cell.length);
    });
  }
  return cells.map((row) => `[${row.map((cell, j) => cell.padStart(widths[j] ?? 0)).join(', ')}]`).join('\n');
}
