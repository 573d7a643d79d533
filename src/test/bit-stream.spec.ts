import chai from "chai";

import { Bit, BitStream, Byte, ByteOrder, ByteString, CString, FloatFormat, RawBits, UB, Whence, Zero } from "../lib/index.js";
import { assertIncident } from "./utils.js";

const LE: ByteOrder = ByteOrder.LittleEndian;

describe("BitStream", function () {
  describe("constructor", function () {
    it("parses bit strings and ignores whitespace", function () {
      chai.assert.deepEqual(new BitStream("10").toArray(), [true, false]);
      chai.assert.strictEqual(new BitStream("  1  ").length, 1);
      chai.assert.strictEqual(new BitStream("1010 0101").toString(), "10100101");
    });

    it("accepts booleans and 0/1 numbers", function () {
      chai.assert.strictEqual(new BitStream([true, 0, 1, false]).toString(), "1010");
    });

    it("rejects other characters", function () {
      assertIncident(() => new BitStream("10a"), "InvalidBitString", {char: "a", index: 2});
    });

    it("builds a stream from bytes", function () {
      chai.assert.strictEqual(BitStream.fromBytes(Uint8Array.from([0x0f, 0x80])).toString(), "0000111110000000");
    });
  });

  describe("bits", function () {
    it("reads single bits", function () {
      const bits: BitStream = new BitStream("1001");
      chai.assert.strictEqual(bits.read(Bit), 1);
      chai.assert.strictEqual(bits.read(Bit), 0);
      chai.assert.strictEqual(bits.read(Bit), 0);
      chai.assert.strictEqual(bits.read(Bit), 1);
      chai.assert.strictEqual(bits.bitsAvailable, 0);
      assertIncident(() => bits.read(Bit), "ReadOutOfRange", {requested: 1, available: 0});
    });

    it("writes single bits", function () {
      const bits: BitStream = new BitStream();
      bits.write(true);
      bits.write(false);
      bits.write(1, Bit);
      bits.write(0, Bit);
      chai.assert.strictEqual(bits.toString(), "1010");
      chai.assert.strictEqual(bits.bitsAvailable, 0);
    });

    it("rejects non-bit values", function () {
      assertIncident(() => new BitStream().write(2, Bit), "ValueOutOfRange", {format: "Bit", value: "2"});
    });
  });

  describe("cursor", function () {
    it("seeks from the start, the cursor and the end", function () {
      const bits: BitStream = new BitStream("01001101");
      bits.seek(1, Whence.End);
      chai.assert.strictEqual(bits.cursor, 7);
      chai.assert.strictEqual(bits.bitsAvailable, 1);
      chai.assert.strictEqual(bits.read(Bit), 1);
      assertIncident(() => bits.read(Bit), "ReadOutOfRange");

      bits.rewind();
      chai.assert.strictEqual(bits.bitsAvailable, 8);
      chai.assert.strictEqual(bits.read(Bit), 0);
      chai.assert.isTrue(bits.readBits(2).equals([1, 0]));
      bits.seek(1, Whence.Cur);
      chai.assert.strictEqual(bits.bitsAvailable, 4);
      chai.assert.isTrue(bits.readBits(2).equals([1, 1]));

      bits.skipToEnd();
      chai.assert.strictEqual(bits.cursor, 8);
      bits.cursor = 0;
      chai.assert.strictEqual(bits.readBits(8).toString(), bits.toString());
    });

    it("rejects positions outside of the stream", function () {
      const bits: BitStream = new BitStream("01001101");
      assertIncident(() => bits.seek(9), "SeekOutOfRange", {target: 9, length: 8});
      assertIncident(() => bits.seek(-1), "SeekOutOfRange", {target: -1, length: 8});
      chai.assert.strictEqual(bits.cursor, 0);
    });

    it("leaves the cursor in place after a failed read", function () {
      const bits: BitStream = new BitStream("1011001");
      chai.assert.isTrue(bits.readBits(4).equals([1, 0, 1, 1]));
      chai.assert.strictEqual(bits.bitsAvailable, 3);
      assertIncident(() => bits.readBits(4), "ReadOutOfRange", {requested: 4, available: 3});
      chai.assert.strictEqual(bits.cursor, 4);
    });
  });

  describe("strings", function () {
    it("reads byte strings in both byte orders", function () {
      const one: BitStream = new BitStream("00101010");
      chai.assert.strictEqual(one.read(ByteString(1)), "*");
      chai.assert.strictEqual(one.bitsAvailable, 0);

      const two: BitStream = new BitStream("00101010 00101111");
      chai.assert.strictEqual(two.read(ByteString(2)), "*/");
      two.rewind();
      chai.assert.strictEqual(two.read(ByteString(2, LE)), "/*");
    });

    it("reads a C string up to its terminator", function () {
      const text: string = "test 123\x01\xFF";
      const bits: BitStream = new BitStream("00101010 00101111");
      bits.rewind();
      bits.write(text, ByteString());
      bits.write(0, Zero(8));
      bits.rewind();
      chai.assert.strictEqual(bits.read(CString), text);
      chai.assert.strictEqual(bits.bitsAvailable, 0);
    });

    it("fails on a C string without terminator", function () {
      const bits: BitStream = new BitStream();
      bits.write("adsf", ByteString());
      bits.rewind();
      assertIncident(() => bits.read(CString), "UnterminatedCString", {start: 0});
      chai.assert.strictEqual(bits.cursor, 0);
    });

    it("writes byte strings and C strings", function () {
      const plain: BitStream = new BitStream();
      plain.write("FWS", ByteString());
      chai.assert.strictEqual(plain.length, 24);
      chai.assert.strictEqual(plain.bitsAvailable, 0);
      plain.rewind();
      chai.assert.deepEqual([plain.read(Byte), plain.read(Byte), plain.read(Byte)], [70, 87, 83]);

      const terminated: BitStream = new BitStream();
      terminated.write("FWS", CString);
      chai.assert.strictEqual(terminated.length, 32);
      terminated.seek(8, Whence.End);
      chai.assert.strictEqual(terminated.read(Byte), 0);
    });

    it("rejects characters that are not bytes", function () {
      assertIncident(() => new BitStream().write("aĀ", ByteString()), "InvalidByteString", {index: 1, code: 256});
    });
  });

  describe("raw bits", function () {
    it("reverses bytes when reading little-endian", function () {
      const bits: BitStream = new BitStream();
      bits.write("SWF", ByteString());
      bits.rewind();
      const reversed: BitStream = bits.read(RawBits(24, LE));
      chai.assert.strictEqual(reversed.read(ByteString(3)), "FWS");
    });

    it("reverses bytes when writing little-endian", function () {
      const bits: BitStream = new BitStream();
      const source: BitStream = new BitStream();
      source.write("SWF", ByteString());
      bits.write(source, RawBits(undefined, LE));
      bits.rewind();
      chai.assert.strictEqual(bits.read(ByteString(3)), "FWS");
    });

    it("overwrites then extends the stream", function () {
      const values: (number | boolean)[] = [1, 0, true, false];
      const fresh: BitStream = new BitStream();
      fresh.write(values);
      chai.assert.strictEqual(fresh.toString(), "1010");

      const existing: BitStream = new BitStream("11");
      existing.write(values);
      chai.assert.strictEqual(existing.toString(), "1010");
    });

    it("checks the width of written bits", function () {
      const bits: BitStream = new BitStream();
      bits.write([false], RawBits(1));
      bits.write([true], RawBits(1));
      chai.assert.strictEqual(bits.toString(), "01");
      assertIncident(() => bits.write([true, false], RawBits(1)), "ValueOutOfRange", {format: "BitStream[1]"});
    });
  });

  describe("integers", function () {
    it("reads unsigned bitfields", function () {
      chai.assert.strictEqual(new BitStream("101010").read(UB(6)), 42);
      const bits: BitStream = new BitStream("01011111111111");
      chai.assert.strictEqual(bits.read(UB(3)), 2);
      chai.assert.strictEqual(bits.read(UB(11)), 2047);
      chai.assert.strictEqual(bits.bitsAvailable, 0);
    });

    it("reads byte-aligned bitfields in both byte orders", function () {
      const bits: BitStream = new BitStream();
      bits.write("\xDD\xEE\xFF", ByteString());
      bits.rewind();
      chai.assert.strictEqual(bits.read(UB(24)), 0xDDEEFF);
      bits.rewind();
      chai.assert.strictEqual(bits.read(UB(24, LE)), 0xFFEEDD);
    });

    it("pads written bitfields to their width", function () {
      const four: BitStream = new BitStream();
      four.write(0b1111, UB(4));
      chai.assert.strictEqual(four.toString(), "1111");
      const eight: BitStream = new BitStream();
      eight.write(0b1111, UB(8));
      chai.assert.strictEqual(eight.toString(), "00001111");
    });

    it("writes the minimal width without an explicit one", function () {
      const big: BitStream = new BitStream();
      big.write(0xDDEEFF, UB());
      big.rewind();
      chai.assert.strictEqual(big.read(ByteString(3)), "\xDD\xEE\xFF");

      const little: BitStream = new BitStream();
      little.write(0xDDEEFF, UB(undefined, LE));
      little.rewind();
      chai.assert.strictEqual(little.read(ByteString(3)), "\xFF\xEE\xDD");

      const implicit: BitStream = new BitStream();
      implicit.write(5);
      chai.assert.strictEqual(implicit.toString(), "101");
    });

    it("needs a width to read", function () {
      assertIncident(() => new BitStream("1010").read(UB()), "UnboundedRead", {format: "UB"});
    });
  });

  describe("floats", function () {
    it("reads 16-bit floats", function () {
      chai.assert.strictEqual(new BitStream("0100000000000000").read(FloatFormat(16)), 1);
      chai.assert.strictEqual(new BitStream("0111110000000000").read(FloatFormat(16)), Infinity);
      chai.assert.strictEqual(new BitStream("1111110000000000").read(FloatFormat(16)), -Infinity);
    });

    it("reads 32-bit floats", function () {
      chai.assert.strictEqual(new BitStream("0 01111100 01000000000000000000000").read(FloatFormat(32)), 0.15625);
      chai.assert.strictEqual(new BitStream("0 10000011 10010000000000000000000").read(FloatFormat(32)), 25);
    });

    it("reads 64-bit floats", function () {
      const bits: BitStream = new BitStream(`001111111111${"0".repeat(52)}`);
      chai.assert.strictEqual(bits.read(FloatFormat(64)), 1);
    });
  });

  describe("flush", function () {
    it("pads to a byte boundary and moves to the end", function () {
      const bits: BitStream = new BitStream("11");
      bits.flush();
      chai.assert.strictEqual(bits.toString(), "11000000");
      chai.assert.strictEqual(bits.cursor, 8);
    });

    it("keeps whole bytes unchanged", function () {
      const bits: BitStream = new BitStream("11111111");
      bits.flush();
      chai.assert.strictEqual(bits.toString(), "11111111");
      chai.assert.strictEqual(bits.bitsAvailable, 0);
    });
  });

  describe("toBytes", function () {
    it("packs whole bytes", function () {
      chai.assert.deepEqual(Array.from(new BitStream("0000000111111111").toBytes()), [1, 255]);
    });

    it("rejects a partial byte", function () {
      assertIncident(() => new BitStream("101").toBytes(), "UnalignedByteOrder", {width: 3});
    });
  });
});
