import { ReadableByteStream, ReadableStream, WritableByteStream, WritableStream } from "@open-flash/stream";
import { Sint32, Uint32, Uint8, UintSize } from "semantic-types";

import { createValueOutOfRangeError } from "../errors.js";

export const U32_MAX: Uint32 = 0xffffffff;
export const S32_MAX: Sint32 = 0x7fffffff;
export const S32_MIN: Sint32 = -0x80000000;
export const S24_MAX: Sint32 = 0x7fffff;
export const S24_MIN: Sint32 = -0x800000;

/**
 * Writes a variable-length u32: 7 bits per byte, least significant group
 * first, high bit set on every byte but the last.
 *
 * Negative values are written as their 32-bit two's complement, which always
 * takes 5 bytes.
 */
export function emitU32(byteStream: WritableByteStream, value: number): void {
  if (!Number.isInteger(value) || value > U32_MAX || value < S32_MIN) {
    throw createValueOutOfRangeError("u32", value);
  }
  let rest: Uint32 = value >>> 0;
  while (rest >= 0x80) {
    byteStream.writeUint8((rest & 0x7f) | 0x80);
    rest >>>= 7;
  }
  byteStream.writeUint8(rest);
}

export function serializeU32(value: number): Uint8Array {
  const byteStream: WritableStream = new WritableStream();
  emitU32(byteStream, value);
  return byteStream.getBytes();
}

export function parseU32(byteStream: ReadableByteStream): Uint32 {
  let result: Uint32 = 0;
  for (let shift: UintSize = 0; shift < 35; shift += 7) {
    const byte: Uint8 = byteStream.readUint8();
    result += (byte & 0x7f) * Math.pow(2, shift);
    if ((byte & 0x80) === 0) {
      break;
    }
  }
  return result % 0x100000000;
}

export function deserializeU32(bytes: Uint8Array): Uint32 {
  return parseU32(new ReadableStream(bytes));
}

/**
 * Writes a signed 24-bit little-endian integer (branch offsets).
 */
export function emitS24(byteStream: WritableByteStream, value: Sint32): void {
  if (!Number.isInteger(value) || value > S24_MAX || value < S24_MIN) {
    throw createValueOutOfRangeError("s24", value);
  }
  const raw: number = value < 0 ? value + 0x1000000 : value;
  byteStream.writeUint8(raw & 0xff);
  byteStream.writeUint8((raw >> 8) & 0xff);
  byteStream.writeUint8((raw >> 16) & 0xff);
}

export function parseS24(byteStream: ReadableByteStream): Sint32 {
  const raw: number = byteStream.readUint8() | (byteStream.readUint8() << 8) | (byteStream.readUint8() << 16);
  return raw >= 0x800000 ? raw - 0x1000000 : raw;
}

export function u32Size(value: number): UintSize {
  let rest: Uint32 = value >>> 0;
  let size: UintSize = 1;
  while (rest >= 0x80) {
    rest >>>= 7;
    size++;
  }
  return size;
}
