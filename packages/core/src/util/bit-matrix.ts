import { InvalidArgumentError } from '../types/errors.js';

/**
 * Square matrix over GF(2) of width 1..32, stored column-wise.
 *
 * Column j holds the image of the basis vector with only bit j set, so a
 * matrix-vector product is the XOR of the columns selected by the vector's
 * set bits. Vectors are uint32 numbers whose bits above `width` are zero.
 */
export class BitMatrix {
  readonly width: number;
  readonly #columns: Uint32Array;

  private constructor(width: number, columns: Uint32Array) {
    this.width = width;
    this.#columns = columns;
  }

  static fromColumns(columns: readonly number[]): BitMatrix {
    const width = columns.length;
    assertWidth(width);
    const mask = widthMask(width);
    const out = new Uint32Array(width);
    for (let j = 0; j < width; j++) {
      const col = columns[j] ?? 0;
      if (!Number.isInteger(col) || col < 0 || col > mask) {
        throw new InvalidArgumentError({
          message: `Matrix column ${j} does not fit in ${width} bits`,
          context: { argument: 'columns', index: j, received: String(col) },
        });
      }
      out[j] = col;
    }
    return new BitMatrix(width, out);
  }

  static zero(width: number): BitMatrix {
    assertWidth(width);
    return new BitMatrix(width, new Uint32Array(width));
  }

  static identity(width: number): BitMatrix {
    return BitMatrix.shift(width, 0);
  }

  /**
   * Matrix of a logical shift: positive n shifts left, negative shifts right.
   * Bits shifted past the width are discarded.
   */
  static shift(width: number, n: number): BitMatrix {
    assertWidth(width);
    const out = new Uint32Array(width);
    for (let j = 0; j < width; j++) {
      const target = j + n;
      out[j] = target >= 0 && target < width ? 2 ** target : 0;
    }
    return new BitMatrix(width, out);
  }

  /**
   * Diagonal matrix keeping only the bits set in `bits` (x ↦ x & bits).
   */
  static diagonal(width: number, bits: number): BitMatrix {
    assertWidth(width);
    const out = new Uint32Array(width);
    for (let j = 0; j < width; j++) {
      out[j] = (bits >>> j) & 1 ? 2 ** j : 0;
    }
    return new BitMatrix(width, out);
  }

  get columns(): readonly number[] {
    return Array.from(this.#columns);
  }

  /** Matrix-vector product over GF(2). */
  dotVec(x: number): number {
    let acc = 0;
    let v = x >>> 0;
    let j = 0;
    while (v !== 0 && j < this.width) {
      if (v & 1) acc ^= this.#columns[j] ?? 0;
      v >>>= 1;
      j++;
    }
    return acc >>> 0;
  }

  /** Sum over GF(2) (element-wise XOR). */
  add(other: BitMatrix): BitMatrix {
    this.#assertSameWidth(other);
    const out = new Uint32Array(this.width);
    for (let j = 0; j < this.width; j++) {
      out[j] = (this.#columns[j] ?? 0) ^ (other.#columns[j] ?? 0);
    }
    return new BitMatrix(this.width, out);
  }

  /** Product `this · other`: apply `other` first, then `this`. */
  mul(other: BitMatrix): BitMatrix {
    this.#assertSameWidth(other);
    const out = new Uint32Array(this.width);
    for (let j = 0; j < this.width; j++) {
      out[j] = this.dotVec(other.#columns[j] ?? 0);
    }
    return new BitMatrix(this.width, out);
  }

  /** Left-shift every column, i.e. `shift(width, n) · this`. */
  shl(n: number): BitMatrix {
    return BitMatrix.shift(this.width, n).mul(this);
  }

  /** Right-shift every column, i.e. `shift(width, -n) · this`. */
  shr(n: number): BitMatrix {
    return BitMatrix.shift(this.width, -n).mul(this);
  }

  equals(other: BitMatrix): boolean {
    if (other.width !== this.width) return false;
    for (let j = 0; j < this.width; j++) {
      if (this.#columns[j] !== other.#columns[j]) return false;
    }
    return true;
  }

  isIdentity(): boolean {
    for (let j = 0; j < this.width; j++) {
      if (this.#columns[j] !== 2 ** j) return false;
    }
    return true;
  }

  #assertSameWidth(other: BitMatrix): void {
    if (other.width !== this.width) {
      throw new InvalidArgumentError({
        message: `Matrix widths differ (${this.width} vs ${other.width})`,
        context: {
          argument: 'other',
          expected: String(this.width),
          received: String(other.width),
        },
      });
    }
  }
}

export function widthMask(width: number): number {
  return width === 32 ? 0xffff_ffff : 2 ** width - 1;
}

function assertWidth(width: number): void {
  if (!Number.isInteger(width) || width < 1 || width > 32) {
    throw new InvalidArgumentError({
      message: `Matrix width must be an integer in 1..32, got ${width}`,
      context: { argument: 'width', expected: '1..32', received: String(width) },
    });
  }
}
