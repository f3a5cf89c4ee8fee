const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const DECIMAL_FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const HEX_PREFIX_RE = /^[+-]?0[xX]/;
const HEX_FLOAT_RE = /^([+-]?)0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?[pP]([+-]?\d+)$/;
const INFINITY_RE = /^([+-]?)(?:inf|infinity)$/i;
const NAN_RE = /^nan$/i;
const DECIMAL_INT_RE = /^([+-]?)(\d+)$/;

const DOUBLE_MANTISSA_BITS = 53;
const DOUBLE_MAX_EXP = 1023;
const DOUBLE_MIN_NORMAL_EXP = -1022;
const DOUBLE_MIN_SUBNORMAL_EXP = -1074;

/**
 * Rounds `mantissa * 2^exp2` to the nearest double, ties to even. The mantissa
 * is cut to the width the result can hold (53 bits, fewer for subnormals)
 * before it becomes a number, so the only float operation left is an exact
 * power-of-two scale.
 */
function roundBinary(mantissa: bigint, exp2: number): number {
  const bitLength = mantissa.toString(2).length;
  const topExp = bitLength - 1 + exp2;
  if (topExp > DOUBLE_MAX_EXP) return Infinity;

  const keep =
    topExp >= DOUBLE_MIN_NORMAL_EXP ? DOUBLE_MANTISSA_BITS : topExp - DOUBLE_MIN_SUBNORMAL_EXP + 1;
  // below half of the smallest subnormal
  if (keep < 0) return 0;

  const shift = bitLength - keep;
  if (shift <= 0) return Number(mantissa) * 2 ** exp2;

  const dropped = BigInt(shift);
  let kept = mantissa >> dropped;
  const remainder = mantissa - (kept << dropped);
  const half = 1n << (dropped - 1n);
  if (remainder > half || (remainder === half && (kept & 1n) === 1n)) kept += 1n;

  return Number(kept) * 2 ** (exp2 + shift);
}

// `_` may only sit between digits, or between the 0x prefix and a digit.
function hexUnderscoresOK(raw: string): boolean {
  let prev: "digit" | "underscore" | "other" = "digit";
  for (const ch of raw.replace(HEX_PREFIX_RE, "")) {
    if (/[0-9a-fA-F]/.test(ch)) {
      prev = "digit";
    } else if (ch === "_") {
      if (prev !== "digit") return false;
      prev = "underscore";
    } else {
      if (prev === "underscore") return false;
      prev = "other";
    }
  }
  return prev !== "underscore";
}

function parseHexFloat(raw: string): number | null {
  if (raw.includes("_") && !hexUnderscoresOK(raw)) return null;
  const match = HEX_FLOAT_RE.exec(raw.replace(/_/g, ""));
  if (!match) return null;

  const [, sign, intDigits = "", fracDigits = "", exponent = "0"] = match;
  if (!intDigits && !fracDigits) return null;

  const mantissa = BigInt(`0x${intDigits}${fracDigits}`);
  const negative = sign === "-";
  if (mantissa === 0n) return negative ? -0 : 0;

  const value = roundBinary(mantissa, Number(exponent) - 4 * fracDigits.length);
  return negative ? -value : value;
}

/**
 * Parses a gauge value with the syntax of a 64-bit float literal: decimal
 * with optional exponent, hexadecimal with a binary `p` exponent (where `_`
 * may separate digits), or the case-insensitive words `inf`, `infinity` and
 * `nan`. Finite literals that overflow a double are rejected; underflow
 * rounds to zero.
 */
export function parseGaugeValue(raw: string): number | null {
  const inf = INFINITY_RE.exec(raw);
  if (inf) return inf[1] === "-" ? -Infinity : Infinity;
  if (NAN_RE.test(raw)) return NaN;

  let value: number | null = null;
  if (DECIMAL_FLOAT_RE.test(raw)) {
    value = Number(raw);
  } else if (HEX_PREFIX_RE.test(raw)) {
    value = parseHexFloat(raw);
  }

  if (value === null || !Number.isFinite(value)) return null;
  return value;
}

/** Parses a counter delta: base-10 signed integer within the int64 range. */
export function parseCounterDelta(raw: string): bigint | null {
  const match = DECIMAL_INT_RE.exec(raw);
  if (!match) return null;
  const [, sign, digits = ""] = match;

  const magnitude = BigInt(digits);
  const delta = sign === "-" ? -magnitude : magnitude;
  if (delta < INT64_MIN || delta > INT64_MAX) return null;
  return delta;
}
