// Fixed-size bitset over a small closed integer domain.

const WORD_BITS = 32;

/** Mask with bits 0..bit (inclusive) set. */
function maskThrough(bit: number): number {
  return bit === WORD_BITS - 1 ? 0xffffffff : (1 << (bit + 1)) - 1;
}

/**
 * An immutable set of integers within `[min, max]`.
 *
 * Membership is a single word lookup; `floor` walks whole words, so the
 * backward search can ask for "the greatest member not above x" in a
 * handful of operations even for the 231-year domain.
 */
export class FieldSet {
  readonly min: number;
  readonly max: number;
  private readonly words: Uint32Array;

  private constructor(min: number, max: number, words: Uint32Array) {
    this.min = min;
    this.max = max;
    this.words = words;
  }

  static of(min: number, max: number, values: Iterable<number>): FieldSet {
    const words = new Uint32Array(((max - min) >>> 5) + 1);
    for (const v of values) {
      if (!Number.isInteger(v) || v < min || v > max) {
        throw new RangeError(`${v} is outside ${min}..${max}`);
      }
      const i = v - min;
      words[i >>> 5] |= 1 << (i & 31);
    }
    return new FieldSet(min, max, words);
  }

  /** The whole domain `[min, max]`. */
  static range(min: number, max: number): FieldSet {
    const values: number[] = [];
    for (let v = min; v <= max; v++) values.push(v);
    return FieldSet.of(min, max, values);
  }

  has(value: number): boolean {
    if (value < this.min || value > this.max) return false;
    const i = value - this.min;
    return (this.words[i >>> 5] & (1 << (i & 31))) !== 0;
  }

  /** Greatest member `<= value`, or null when there is none. */
  floor(value: number): number | null {
    if (value < this.min) return null;
    const i = Math.min(value, this.max) - this.min;
    let w = i >>> 5;
    let word = this.words[w] & maskThrough(i & 31);
    for (;;) {
      if (word !== 0) {
        return this.min + w * WORD_BITS + (WORD_BITS - 1 - Math.clz32(word));
      }
      if (w === 0) return null;
      w--;
      word = this.words[w];
    }
  }

  /** Greatest member, or null for the empty set. */
  last(): number | null {
    return this.floor(this.max);
  }

  get size(): number {
    let n = 0;
    for (const word of this.words) {
      let x = word;
      while (x !== 0) {
        x &= x - 1;
        n++;
      }
    }
    return n;
  }

  /** Ascending list of members. */
  toArray(): number[] {
    const out: number[] = [];
    for (let v = this.min; v <= this.max; v++) {
      if (this.has(v)) out.push(v);
    }
    return out;
  }
}
