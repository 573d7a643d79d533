export { BitStream, Whence } from "./bit-stream.js";
export type { DefaultWritable } from "./bit-stream.js";
export { Bit, Byte, ByteOrder, ByteString, CString, FixedFormat, FloatFormat, RawBits, SB, UB, Zero } from "./formats.js";
export type { BitsInput, BitValue, FloatWidth, Format } from "./formats.js";
