import { ReadableStream, WritableStream } from "@open-flash/stream";
import { Uint8, UintSize } from "semantic-types";

import {
  createInvalidBitStringError,
  createNoDefaultFormatError,
  createReadOutOfRangeError,
  createSeekOutOfRangeError,
  createUnalignedByteOrderError,
} from "../errors.js";
import { Bit, bitsToUint, ByteString, Format, RawBits, toBit, UB, uintToBits } from "./formats.js";

export enum Whence {
  Set,
  Cur,
  End,
}

/**
 * Values `write` can encode without an explicit format.
 */
export type DefaultWritable = boolean | number | string | BitStream | readonly (boolean | number)[];

/**
 * Ordered, mutable sequence of bits with a read/write cursor.
 *
 * The stream stores no format state: values are read and written through
 * `Format` descriptors.
 */
export class BitStream {
  private readonly bits: boolean[];
  private position: UintSize;

  constructor(source?: string | Iterable<boolean | number>) {
    this.bits = [];
    this.position = 0;
    if (typeof source === "string") {
      let index: UintSize = 0;
      for (const char of source) {
        if (char === "0" || char === "1") {
          this.bits.push(char === "1");
        } else if (char.trim() !== "") {
          throw createInvalidBitStringError(char, index);
        }
        index++;
      }
    } else if (source !== undefined) {
      for (const bit of source) {
        this.bits.push(toBit(bit));
      }
    }
  }

  static fromBytes(bytes: Uint8Array): BitStream {
    const byteStream: ReadableStream = new ReadableStream(bytes);
    const bits: boolean[] = [];
    while (byteStream.available() > 0) {
      const byte: Uint8 = byteStream.readUint8();
      bits.push(...uintToBits(byte, 8));
    }
    return new BitStream(bits);
  }

  get length(): UintSize {
    return this.bits.length;
  }

  get cursor(): UintSize {
    return this.position;
  }

  set cursor(value: UintSize) {
    if (!Number.isInteger(value) || value < 0 || value > this.bits.length) {
      throw createSeekOutOfRangeError(value, this.bits.length);
    }
    this.position = value;
  }

  get bitsAvailable(): UintSize {
    return this.bits.length - this.position;
  }

  read<R>(format: Format<R, unknown>): R {
    return format.decode(this);
  }

  readBits(count: UintSize): BitStream {
    return this.read(RawBits(count));
  }

  write<W>(value: W, format: Format<unknown, W>): void;
  write(value: DefaultWritable): void;
  write(value: unknown, format?: Format<unknown, unknown>): void {
    this.writeBits(format !== undefined ? format.encode(value) : encodeDefault(value));
  }

  /**
   * Writes raw bits at the cursor: existing bits are overwritten, the stream
   * grows once the cursor reaches its end.
   */
  writeBits(bits: readonly boolean[]): void {
    for (const bit of bits) {
      if (this.position < this.bits.length) {
        this.bits[this.position] = bit;
      } else {
        this.bits.push(bit);
      }
      this.position++;
    }
  }

  /**
   * Consumes `count` bits. Nothing is consumed when fewer bits remain.
   */
  takeBits(count: UintSize): boolean[] {
    const bits: boolean[] = this.peekBits(count);
    this.position += count;
    return bits;
  }

  peekBits(count: UintSize): boolean[] {
    if (count > this.bitsAvailable) {
      throw createReadOutOfRangeError(count, this.bitsAvailable);
    }
    return this.bits.slice(this.position, this.position + count);
  }

  seek(offset: number, whence: Whence = Whence.Set): void {
    switch (whence) {
      case Whence.Set:
        this.cursor = offset;
        break;
      case Whence.Cur:
        this.cursor = this.position + offset;
        break;
      case Whence.End:
        this.cursor = this.bits.length - offset;
        break;
    }
  }

  rewind(): void {
    this.seek(0, Whence.Set);
  }

  skipToEnd(): void {
    this.position = this.bits.length;
  }

  /**
   * Pads the stream with zeros up to the next byte boundary (counted from the
   * end of the stream, not from the cursor) and moves the cursor to the end.
   */
  flush(): void {
    while (this.bits.length % 8 !== 0) {
      this.bits.push(false);
    }
    this.skipToEnd();
  }

  toArray(): boolean[] {
    return [...this.bits];
  }

  toBytes(): Uint8Array {
    if (this.bits.length % 8 !== 0) {
      throw createUnalignedByteOrderError(this.bits.length);
    }
    const byteStream: WritableStream = new WritableStream();
    for (let i: number = 0; i < this.bits.length; i += 8) {
      byteStream.writeUint8(bitsToUint(this.bits.slice(i, i + 8)));
    }
    return byteStream.getBytes();
  }

  equals(other: BitStream | readonly (boolean | number)[]): boolean {
    const bits: readonly boolean[] = other instanceof BitStream ? other.bits : other.map(toBit);
    return bits.length === this.bits.length && bits.every((bit: boolean, i: number): boolean => bit === this.bits[i]);
  }

  toString(): string {
    return this.bits.map((bit: boolean): string => bit ? "1" : "0").join("");
  }
}

function encodeDefault(value: unknown): boolean[] {
  if (typeof value === "boolean") {
    return Bit.encode(value);
  } else if (typeof value === "number") {
    return UB().encode(value);
  } else if (typeof value === "string") {
    return ByteString().encode(value);
  } else if (value instanceof BitStream) {
    return RawBits().encode(value);
  } else if (Array.isArray(value)) {
    return RawBits().encode(value);
  }
  throw createNoDefaultFormatError(value);
}
