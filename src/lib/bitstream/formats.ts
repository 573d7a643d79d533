import { UintSize } from "semantic-types";

import {
  createInvalidByteStringError,
  createUnalignedByteOrderError,
  createUnboundedReadError,
  createUnterminatedCStringError,
  createValueOutOfRangeError,
} from "../errors.js";
import { BitStream } from "./bit-stream.js";

export enum ByteOrder {
  BigEndian = ">",
  LittleEndian = "<",
}

/**
 * Describes how a logical value maps to a sequence of bits.
 *
 * `R` is the type produced by reads, `W` the type accepted by writes.
 */
export interface Format<R, W = R> {
  readonly name: string;

  encode(value: W): boolean[];

  /**
   * Consumes the bits of one value from the stream.
   *
   * Implementations check the available bits before consuming anything, so
   * a failed read leaves the cursor untouched.
   */
  decode(stream: BitStream): R;
}

export type BitValue = 0 | 1;

export type BitsInput = BitStream | readonly (boolean | number)[];

export function toBit(value: boolean | number): boolean {
  if (value === true || value === 1) {
    return true;
  } else if (value === false || value === 0) {
    return false;
  }
  throw createValueOutOfRangeError("Bit", value);
}

export function bitsToUint(bits: readonly boolean[]): number {
  let result: number = 0;
  for (const bit of bits) {
    result = result * 2 + (bit ? 1 : 0);
  }
  return result;
}

function bitString(bits: readonly boolean[]): string {
  return bits.map((bit: boolean): string => (bit ? "1" : "0")).join("");
}

/**
 * Reads `bits` as an unsigned integer, failing when the value is not exactly
 * representable as a number.
 */
function exactUint(name: string, bits: readonly boolean[]): number {
  const value: number = bitsToUint(bits);
  if (!Number.isSafeInteger(value)) {
    throw createValueOutOfRangeError(name, bitString(bits));
  }
  return value;
}

/**
 * Reads `bits` as a two's complement integer, failing when the value is not
 * exactly representable as a number.
 */
function exactSint(name: string, bits: readonly boolean[]): number {
  if (bits.length === 0 || !bits[0]) {
    return exactUint(name, bits);
  }
  const magnitude: number = bitsToUint(bits.map((bit: boolean): boolean => !bit)) + 1;
  if (!Number.isSafeInteger(magnitude)) {
    throw createValueOutOfRangeError(name, bitString(bits));
  }
  return -magnitude;
}

export function uintToBits(value: number, width: UintSize): boolean[] {
  const bits: boolean[] = new Array(width);
  let rest: number = value;
  for (let i: number = width - 1; i >= 0; i--) {
    bits[i] = rest % 2 === 1;
    rest = Math.floor(rest / 2);
  }
  return bits;
}

export function bitLength(value: number): UintSize {
  let length: UintSize = 0;
  for (let rest: number = value; rest > 0; rest = Math.floor(rest / 2)) {
    length++;
  }
  return length;
}

/**
 * Reverses the order of whole bytes for little-endian formats. The bit order
 * inside each byte is kept.
 */
export function reorderBytes(bits: readonly boolean[], byteOrder: ByteOrder): boolean[] {
  if (byteOrder === ByteOrder.BigEndian) {
    return [...bits];
  }
  if (bits.length % 8 !== 0) {
    throw createUnalignedByteOrderError(bits.length);
  }
  const result: boolean[] = [];
  for (let start: number = bits.length - 8; start >= 0; start -= 8) {
    result.push(...bits.slice(start, start + 8));
  }
  return result;
}

function formatName(base: string, width: UintSize | undefined, byteOrder: ByteOrder): string {
  const params: string[] = [];
  if (width !== undefined) {
    params.push(String(width));
  }
  if (byteOrder === ByteOrder.LittleEndian) {
    params.push(byteOrder);
  }
  return params.length > 0 ? `${base}[${params.join(":")}]` : base;
}

function requireWidth(name: string, width: UintSize | undefined): UintSize {
  if (width === undefined) {
    throw createUnboundedReadError(name);
  }
  return width;
}

function checkByteOrderWidth(width: UintSize, byteOrder: ByteOrder): void {
  if (byteOrder === ByteOrder.LittleEndian && width % 8 !== 0) {
    throw createUnalignedByteOrderError(width);
  }
}

export const Bit: Format<BitValue, boolean | number> = {
  name: "Bit",
  encode(value: boolean | number): boolean[] {
    return [toBit(value)];
  },
  decode(stream: BitStream): BitValue {
    return stream.takeBits(1)[0] ? 1 : 0;
  },
};

/**
 * Unsigned bitfield. Without a width, writes use the minimal bit length of
 * the value and reads fail.
 */
export function UB(width?: UintSize, byteOrder: ByteOrder = ByteOrder.BigEndian): Format<number> {
  const name: string = formatName("UB", width, byteOrder);
  return {
    name,
    encode(value: number): boolean[] {
      if (!Number.isSafeInteger(value) || value < 0) {
        throw createValueOutOfRangeError(name, value);
      }
      const w: UintSize = width ?? Math.max(1, bitLength(value));
      if (value >= Math.pow(2, w)) {
        throw createValueOutOfRangeError(name, value);
      }
      return reorderBytes(uintToBits(value, w), byteOrder);
    },
    decode(stream: BitStream): number {
      const w: UintSize = requireWidth(name, width);
      checkByteOrderWidth(w, byteOrder);
      const value: number = exactUint(name, reorderBytes(stream.peekBits(w), byteOrder));
      stream.takeBits(w);
      return value;
    },
  };
}

export const Byte: Format<number> = UB(8);

/**
 * Signed (two's complement) bitfield.
 */
export function SB(width?: UintSize, byteOrder: ByteOrder = ByteOrder.BigEndian): Format<number> {
  const name: string = formatName("SB", width, byteOrder);
  return {
    name,
    encode(value: number): boolean[] {
      if (!Number.isSafeInteger(value)) {
        throw createValueOutOfRangeError(name, value);
      }
      const w: UintSize = width ?? bitLength(value < 0 ? -value - 1 : value) + 1;
      const half: number = Math.pow(2, w - 1);
      if (value < -half || value >= half) {
        throw createValueOutOfRangeError(name, value);
      }
      const bits: boolean[] = value < 0
        ? uintToBits(-value - 1, w).map((bit: boolean): boolean => !bit)
        : uintToBits(value, w);
      return reorderBytes(bits, byteOrder);
    },
    decode(stream: BitStream): number {
      const w: UintSize = requireWidth(name, width);
      checkByteOrderWidth(w, byteOrder);
      const value: number = exactSint(name, reorderBytes(stream.peekBits(w), byteOrder));
      stream.takeBits(w);
      return value;
    },
  };
}

/**
 * Padding: writes `width` zero bits whatever the value, reads skip them.
 */
export function Zero(width: UintSize): Format<0, number> {
  return {
    name: `Zero[${width}]`,
    encode(): boolean[] {
      return new Array(width).fill(false);
    },
    decode(stream: BitStream): 0 {
      stream.takeBits(width);
      return 0;
    },
  };
}

export function RawBits(width?: UintSize, byteOrder: ByteOrder = ByteOrder.BigEndian): Format<BitStream, BitsInput> {
  const name: string = formatName("BitStream", width, byteOrder);
  return {
    name,
    encode(value: BitsInput): boolean[] {
      const bits: boolean[] = value instanceof BitStream ? value.toArray() : value.map(toBit);
      if (width !== undefined && bits.length !== width) {
        throw createValueOutOfRangeError(name, bits.length);
      }
      return reorderBytes(bits, byteOrder);
    },
    decode(stream: BitStream): BitStream {
      const w: UintSize = requireWidth(name, width);
      checkByteOrderWidth(w, byteOrder);
      return new BitStream(reorderBytes(stream.takeBits(w), byteOrder));
    },
  };
}

function stringToBytes(value: string): number[] {
  const bytes: number[] = [];
  for (let i: number = 0; i < value.length; i++) {
    const code: number = value.charCodeAt(i);
    if (code > 0xff) {
      throw createInvalidByteStringError(i, code);
    }
    bytes.push(code);
  }
  return bytes;
}

function bytesToBits(bytes: readonly number[]): boolean[] {
  const bits: boolean[] = [];
  for (const byte of bytes) {
    bits.push(...uintToBits(byte, 8));
  }
  return bits;
}

// Bounds the argument count of `String.fromCharCode`.
const CHAR_CODE_CHUNK: UintSize = 0x2000;

function bytesToString(bytes: readonly number[]): string {
  let result: string = "";
  for (let start: number = 0; start < bytes.length; start += CHAR_CODE_CHUNK) {
    result += String.fromCharCode(...bytes.slice(start, start + CHAR_CODE_CHUNK));
  }
  return result;
}

function bitsToBytes(bits: readonly boolean[]): number[] {
  const bytes: number[] = [];
  for (let i: number = 0; i + 8 <= bits.length; i += 8) {
    bytes.push(bitsToUint(bits.slice(i, i + 8)));
  }
  return bytes;
}

/**
 * String of whole bytes: every character code must fit in a byte.
 */
export function ByteString(count?: UintSize, byteOrder: ByteOrder = ByteOrder.BigEndian): Format<string> {
  const name: string = formatName("ByteString", count, byteOrder);
  return {
    name,
    encode(value: string): boolean[] {
      if (count !== undefined && value.length !== count) {
        throw createValueOutOfRangeError(name, value);
      }
      const bytes: number[] = stringToBytes(value);
      return bytesToBits(byteOrder === ByteOrder.LittleEndian ? bytes.reverse() : bytes);
    },
    decode(stream: BitStream): string {
      const n: UintSize = requireWidth(name, count);
      const bytes: number[] = bitsToBytes(stream.takeBits(n * 8));
      return bytesToString(byteOrder === ByteOrder.LittleEndian ? bytes.reverse() : bytes);
    },
  };
}

export const CString: Format<string> = {
  name: "CString",
  encode(value: string): boolean[] {
    return bytesToBits([...stringToBytes(value), 0]);
  },
  decode(stream: BitStream): string {
    const available: UintSize = stream.bitsAvailable;
    const bytes: number[] = bitsToBytes(stream.peekBits(available - available % 8));
    const end: number = bytes.indexOf(0);
    if (end < 0) {
      throw createUnterminatedCStringError(stream.cursor);
    }
    stream.takeBits((end + 1) * 8);
    return bytesToString(bytes.slice(0, end));
  },
};

interface FloatLayout {
  exponentBits: UintSize;
  mantissaBits: UintSize;
  bias: number;
}

export type FloatWidth = 16 | 32 | 64;

// The 16-bit layout is the SWF FLOAT16 one: its exponent is biased by 16.
const FLOAT_LAYOUTS: ReadonlyMap<FloatWidth, FloatLayout> = new Map<FloatWidth, FloatLayout>([
  [16, {exponentBits: 5, mantissaBits: 10, bias: 16}],
  [32, {exponentBits: 8, mantissaBits: 23, bias: 127}],
  [64, {exponentBits: 11, mantissaBits: 52, bias: 1023}],
]);

export function roundHalfEven(value: number): number {
  const floor: number = Math.floor(value);
  const diff: number = value - floor;
  if (diff > 0.5) {
    return floor + 1;
  } else if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

interface FloatParts {
  sign: BitValue;
  exponent: number;
  mantissa: number;
}

function splitFloat(value: number, layout: FloatLayout): FloatParts {
  const maxExponent: number = Math.pow(2, layout.exponentBits) - 1;
  const mantissaScale: number = Math.pow(2, layout.mantissaBits);
  if (Number.isNaN(value)) {
    return {sign: 0, exponent: maxExponent, mantissa: mantissaScale / 2};
  }
  const sign: BitValue = value < 0 || Object.is(value, -0) ? 1 : 0;
  const abs: number = Math.abs(value);
  if (abs === Infinity) {
    return {sign, exponent: maxExponent, mantissa: 0};
  } else if (abs === 0) {
    return {sign, exponent: 0, mantissa: 0};
  }

  const minExponent: number = 1 - layout.bias;
  let exp: number = Math.floor(Math.log2(abs));
  if (Math.pow(2, exp) > abs) {
    exp--;
  } else if (Math.pow(2, exp + 1) <= abs) {
    exp++;
  }

  if (exp < minExponent) {
    const mantissa: number = roundHalfEven(abs / Math.pow(2, minExponent - layout.mantissaBits));
    return mantissa >= mantissaScale ? {sign, exponent: 1, mantissa: 0} : {sign, exponent: 0, mantissa};
  }

  let mantissa: number = roundHalfEven((abs / Math.pow(2, exp) - 1) * mantissaScale);
  if (mantissa === mantissaScale) {
    mantissa = 0;
    exp++;
  }
  const exponent: number = exp + layout.bias;
  if (exponent >= maxExponent) {
    return {sign, exponent: maxExponent, mantissa: 0};
  }
  return {sign, exponent, mantissa};
}

function joinFloat(parts: FloatParts, layout: FloatLayout): number {
  const maxExponent: number = Math.pow(2, layout.exponentBits) - 1;
  const mantissaScale: number = Math.pow(2, layout.mantissaBits);
  let magnitude: number;
  if (parts.exponent === maxExponent) {
    magnitude = parts.mantissa === 0 ? Infinity : NaN;
  } else if (parts.exponent === 0) {
    magnitude = parts.mantissa * Math.pow(2, 1 - layout.bias - layout.mantissaBits);
  } else {
    magnitude = (1 + parts.mantissa / mantissaScale) * Math.pow(2, parts.exponent - layout.bias);
  }
  return parts.sign === 1 ? -magnitude : magnitude;
}

/**
 * IEEE-754 style float rebuilt from its sign, exponent and mantissa groups.
 */
export function FloatFormat(width: FloatWidth, byteOrder: ByteOrder = ByteOrder.BigEndian): Format<number> {
  const name: string = formatName("Float", width, byteOrder);
  const layout: FloatLayout | undefined = FLOAT_LAYOUTS.get(width);
  if (layout === undefined) {
    throw createValueOutOfRangeError("FloatFormat width", width);
  }
  return {
    name,
    encode(value: number): boolean[] {
      const parts: FloatParts = splitFloat(value, layout);
      const bits: boolean[] = [
        parts.sign === 1,
        ...uintToBits(parts.exponent, layout.exponentBits),
        ...uintToBits(parts.mantissa, layout.mantissaBits),
      ];
      return reorderBytes(bits, byteOrder);
    },
    decode(stream: BitStream): number {
      const bits: boolean[] = reorderBytes(stream.takeBits(width), byteOrder);
      const exponentEnd: number = 1 + layout.exponentBits;
      return joinFloat(
        {
          sign: bits[0] ? 1 : 0,
          exponent: bitsToUint(bits.slice(1, exponentEnd)),
          mantissa: bitsToUint(bits.slice(exponentEnd)),
        },
        layout,
      );
    },
  };
}

/**
 * Signed fixed-point number: `intBits` integer bits followed by `fracBits`
 * fractional bits.
 */
export function FixedFormat(
  intBits: UintSize,
  fracBits: UintSize,
  byteOrder: ByteOrder = ByteOrder.BigEndian,
): Format<number> {
  const width: UintSize = intBits + fracBits;
  const name: string = byteOrder === ByteOrder.LittleEndian
    ? `Fixed[${intBits}.${fracBits}:<]`
    : `Fixed[${intBits}.${fracBits}]`;
  const raw: Format<number> = SB(width);
  const scale: number = Math.pow(2, fracBits);
  return {
    name,
    encode(value: number): boolean[] {
      if (!Number.isFinite(value)) {
        throw createValueOutOfRangeError(name, value);
      }
      const half: number = Math.pow(2, width - 1);
      const scaled: number = roundHalfEven(value * scale);
      if (scaled < -half || scaled >= half) {
        throw createValueOutOfRangeError(name, value);
      }
      return reorderBytes(raw.encode(scaled), byteOrder);
    },
    decode(stream: BitStream): number {
      checkByteOrderWidth(width, byteOrder);
      const signed: number = exactSint(name, reorderBytes(stream.peekBits(width), byteOrder));
      stream.takeBits(width);
      return signed / scale;
    },
  };
}
