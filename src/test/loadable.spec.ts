import chai from "chai";

import {
  Argument,
  CodeGenerator,
  Instruction,
  InstructionType,
  Local,
  LoadableRegistry,
  MethodContext,
  QName,
  U32_MAX,
} from "../lib/index.js";
import { assertIncident, listing } from "./utils.js";

interface Loaded {
  gen: CodeGenerator;
  method: MethodContext;
}

function inMethod(options: {loadables?: LoadableRegistry} = {}): Loaded {
  const gen: CodeGenerator = new CodeGenerator({loadables: options.loadables});
  const method: MethodContext = gen.beginMethod("f", {params: [["int", "n"]]});
  return {gen, method};
}

function loadListing(...values: unknown[]): string[] {
  const {gen, method}: Loaded = inMethod();
  gen.load(...values);
  return listing(method.asm.instructions).slice(2);
}

function isDate(value: unknown): value is Date {
  return value instanceof Date;
}

describe("load", function () {
  it("picks the narrowest integer push", function () {
    chai.assert.deepEqual(loadListing(5, -128, 127, 128, U32_MAX, -129, -0x80000000), [
      "pushbyte 5",
      "pushbyte -128",
      "pushbyte 127",
      "pushuint 128",
      "pushuint 4294967295",
      "pushint -129",
      "pushint -2147483648",
    ]);
  });

  it("falls back to doubles", function () {
    chai.assert.deepEqual(loadListing(1.5, -0x80000001, Math.pow(2, 32), Infinity, NaN), [
      "pushdouble 1.5",
      "pushdouble -2147483649",
      "pushdouble 4294967296",
      "pushdouble Infinity",
      "pushnan",
    ]);
  });

  it("pushes negative zero as a double", function () {
    const {gen, method}: Loaded = inMethod();
    gen.load(-0, 0);
    chai.assert.deepEqual(listing(method.asm.instructions).slice(2), ["pushdouble 0", "pushbyte 0"]);
    const instruction: Instruction = method.asm.instructions[2];
    chai.assert.isTrue(instruction.type === InstructionType.Op && Object.is(instruction.operands[0], -0));
  });

  it("pushes strings and booleans", function () {
    chai.assert.deepEqual(loadListing("s", true, false), ["pushstring s", "pushtrue", "pushfalse"]);
  });

  it("builds arrays and objects", function () {
    chai.assert.deepEqual(loadListing([1, "a"]), ["pushbyte 1", "pushstring a", "newarray 2"]);
    chai.assert.deepEqual(loadListing({a: 1, b: [true]}), [
      "pushstring a",
      "pushbyte 1",
      "pushstring b",
      "pushtrue",
      "newarray 1",
      "newobject 2",
    ]);
    chai.assert.deepEqual(loadListing(new Map([["k", false]])), ["pushstring k", "pushfalse", "newobject 1"]);
    chai.assert.deepEqual(loadListing(Object.create(null)), ["newobject 0"]);
  });

  it("looks names up", function () {
    chai.assert.deepEqual(loadListing(new QName("Math")), ["getlex Math"]);
  });

  it("lets values load themselves", function () {
    const {gen, method}: Loaded = inMethod();
    gen.setLocal("tmp");
    gen.load(new Local("this"), new Argument("n"), new Local("tmp"));
    chai.assert.deepEqual(listing(method.asm.instructions).slice(2), [
      "setlocal_2",
      "getlocal_0",
      "getlocal_1",
      "getlocal_2",
    ]);
    chai.assert.strictEqual(new Local("tmp").toString(), "Local(\"tmp\")");
    assertIncident(() => gen.load(new Argument("tmp")), "NotAnArgument", {name: "tmp"});
  });

  it("fails on values without an adapter", function () {
    assertIncident(() => loadListing(null), "NoLoadableAdapter", {value: "null"});
    assertIncident(() => loadListing(undefined), "NoLoadableAdapter", {value: "undefined"});
    assertIncident(() => loadListing(new Date(0)), "NoLoadableAdapter", {value: "object"});
  });

  it("tries the latest adapters first", function () {
    const loadables: LoadableRegistry = LoadableRegistry.withDefaults()
      .register(isDate, (gen: CodeGenerator, value: Date): void => gen.emit("pushdouble", value.getTime()))
      .register(
        (value: unknown): value is number => value === 0,
        (gen: CodeGenerator): void => gen.emit("pushbyte", 0),
      );
    const {gen, method}: Loaded = inMethod({loadables});
    gen.load(new Date(1000), 0, 300);
    chai.assert.deepEqual(listing(method.asm.instructions).slice(2), [
      "pushdouble 1000",
      "pushbyte 0",
      "pushuint 300",
    ]);
  });
});
