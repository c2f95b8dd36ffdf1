/**
 * Exact rational numbers for time arithmetic.
 *
 * Byte offsets into a long capture are derived from seconds × sample rate;
 * doing that in floating point drifts, so every time that reaches a file read
 * is a Fraction. Numerator and denominator must stay safe integers.
 */

function gcd(a: number, b: number): number {
  a = Math.abs(a);
  b = Math.abs(b);
  while (b) {
    const t = a % b;
    a = b;
    b = t;
  }
  return a;
}

function checkSafe(n: number, what: string): number {
  if (!Number.isSafeInteger(n)) {
    throw new RangeError(`Fraction ${what} is not a safe integer: ${n}`);
  }
  return n;
}

export class Fraction {
  static readonly ZERO = new Fraction(0, 1);

  readonly num: number;
  readonly den: number;

  private constructor(num: number, den: number) {
    this.num = num;
    this.den = den;
  }

  static of(num: number, den = 1): Fraction {
    checkSafe(num, 'numerator');
    checkSafe(den, 'denominator');
    if (den === 0) throw new RangeError('Fraction denominator is zero');
    if (num === 0) return Fraction.ZERO;
    const g = gcd(num, den);
    const sign = den < 0 ? -1 : 1;
    return new Fraction((sign * num) / g, (sign * den) / g);
  }

  /** Largest multiple of `step` that is <= `value`. */
  static floorTo(value: number, step: Fraction): Fraction {
    if (!Number.isFinite(value)) throw new RangeError(`Cannot quantize ${value}`);
    return step.times(Math.floor((value * step.den) / step.num));
  }

  add(other: Fraction): Fraction {
    const g = gcd(this.den, other.den);
    const l = (this.den / g) * other.den;
    return Fraction.of(this.num * (l / this.den) + other.num * (l / other.den), l);
  }

  sub(other: Fraction): Fraction {
    return this.add(other.neg());
  }

  neg(): Fraction {
    return this.num === 0 ? this : new Fraction(-this.num, this.den);
  }

  mul(other: Fraction): Fraction {
    // cross-reduce first to keep intermediates small
    const g1 = gcd(this.num, other.den) || 1;
    const g2 = gcd(other.num, this.den) || 1;
    return Fraction.of(
      (this.num / g1) * (other.num / g2),
      (this.den / g2) * (other.den / g1)
    );
  }

  times(k: number): Fraction {
    return this.mul(Fraction.of(k));
  }

  div(other: Fraction): Fraction {
    if (other.num === 0) throw new RangeError('Division by zero fraction');
    return this.mul(Fraction.of(other.den, other.num));
  }

  floor(): number {
    return Math.floor(this.num / this.den);
  }

  ceil(): number {
    return -Math.floor(-this.num / this.den);
  }

  /** Nearest integer, halves rounded up. */
  round(): number {
    return Math.floor((2 * this.num + this.den) / (2 * this.den));
  }

  /** Smallest multiple of `step` that is >= this. */
  ceilTo(step: Fraction): Fraction {
    return step.times(this.div(step).ceil());
  }

  compare(other: Fraction): number {
    const d = this.sub(other);
    return Math.sign(d.num);
  }

  equals(other: Fraction): boolean {
    return this.num === other.num && this.den === other.den;
  }

  isNegative(): boolean {
    return this.num < 0;
  }

  toNumber(): number {
    return this.num / this.den;
  }

  toString(): string {
    return this.den === 1 ? String(this.num) : `${this.num}/${this.den}`;
  }

  toJSON(): number {
    return this.toNumber();
  }
}
