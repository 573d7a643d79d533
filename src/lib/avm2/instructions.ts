import { Uint8, UintSize } from "semantic-types";

import { createInvalidOperandError, createUnknownInstructionError } from "../errors.js";
import type { ExceptionInfo } from "./abc-file.js";
import { AnyName, Multiname, QName } from "./qname.js";
import { S32_MAX, S32_MIN, U32_MAX } from "./u32.js";

export enum OperandType {
  /**
   * Single byte, either signed (`pushbyte`) or unsigned (`getscopeobject`).
   */
  Byte,
  U30,
  /**
   * Argument count: also drives the number of values popped.
   */
  ArgCount,
  Label,
  Multiname,
  String,
  Int,
  Uint,
  Double,
}

export type Operand = number | string | Multiname;

export interface OpcodeInfo {
  name: string;
  code: Uint8;
  operands: readonly OperandType[];
  pop: UintSize;
  push: UintSize;
  /**
   * Extra values popped for every unit of the `ArgCount` operand.
   */
  popPerArg: UintSize;
  scope: number;
}

type OpcodeRow = [string, Uint8, OperandType[], UintSize, UintSize, UintSize?, number?];

const T: typeof OperandType = OperandType;

// name, code, operands, pop, push, popPerArg, scope
const OPCODE_ROWS: readonly OpcodeRow[] = [
  ["nop", 0x02, [], 0, 0],
  ["throw", 0x03, [], 1, 0],
  ["kill", 0x08, [T.U30], 0, 0],
  ["ifnlt", 0x0c, [T.Label], 2, 0],
  ["ifnle", 0x0d, [T.Label], 2, 0],
  ["ifngt", 0x0e, [T.Label], 2, 0],
  ["ifnge", 0x0f, [T.Label], 2, 0],
  ["jump", 0x10, [T.Label], 0, 0],
  ["iftrue", 0x11, [T.Label], 1, 0],
  ["iffalse", 0x12, [T.Label], 1, 0],
  ["ifeq", 0x13, [T.Label], 2, 0],
  ["ifne", 0x14, [T.Label], 2, 0],
  ["iflt", 0x15, [T.Label], 2, 0],
  ["ifle", 0x16, [T.Label], 2, 0],
  ["ifgt", 0x17, [T.Label], 2, 0],
  ["ifge", 0x18, [T.Label], 2, 0],
  ["ifstricteq", 0x19, [T.Label], 2, 0],
  ["ifstrictne", 0x1a, [T.Label], 2, 0],
  ["pushwith", 0x1c, [], 1, 0, 0, 1],
  ["popscope", 0x1d, [], 0, 0, 0, -1],
  ["pushnull", 0x20, [], 0, 1],
  ["pushundefined", 0x21, [], 0, 1],
  ["pushbyte", 0x24, [T.Byte], 0, 1],
  ["pushshort", 0x25, [T.U30], 0, 1],
  ["pushtrue", 0x26, [], 0, 1],
  ["pushfalse", 0x27, [], 0, 1],
  ["pushnan", 0x28, [], 0, 1],
  ["pop", 0x29, [], 1, 0],
  ["dup", 0x2a, [], 1, 2],
  ["swap", 0x2b, [], 2, 2],
  ["pushstring", 0x2c, [T.String], 0, 1],
  ["pushint", 0x2d, [T.Int], 0, 1],
  ["pushuint", 0x2e, [T.Uint], 0, 1],
  ["pushdouble", 0x2f, [T.Double], 0, 1],
  ["pushscope", 0x30, [], 1, 0, 0, 1],
  ["newfunction", 0x40, [T.U30], 0, 1],
  ["call", 0x41, [T.ArgCount], 2, 1, 1],
  ["construct", 0x42, [T.ArgCount], 1, 1, 1],
  ["callproperty", 0x46, [T.Multiname, T.ArgCount], 1, 1, 1],
  ["returnvoid", 0x47, [], 0, 0],
  ["returnvalue", 0x48, [], 1, 0],
  ["constructsuper", 0x49, [T.ArgCount], 1, 0, 1],
  ["constructprop", 0x4a, [T.Multiname, T.ArgCount], 1, 1, 1],
  ["callpropvoid", 0x4f, [T.Multiname, T.ArgCount], 1, 0, 1],
  ["applytype", 0x53, [T.ArgCount], 1, 1, 1],
  ["newobject", 0x55, [T.ArgCount], 0, 1, 2],
  ["newarray", 0x56, [T.ArgCount], 0, 1, 1],
  ["newactivation", 0x57, [], 0, 1],
  ["newclass", 0x58, [T.U30], 1, 1],
  ["newcatch", 0x5a, [T.U30], 0, 1],
  ["findpropstrict", 0x5d, [T.Multiname], 0, 1],
  ["findproperty", 0x5e, [T.Multiname], 0, 1],
  ["getlex", 0x60, [T.Multiname], 0, 1],
  ["setproperty", 0x61, [T.Multiname], 2, 0],
  ["getlocal", 0x62, [T.U30], 0, 1],
  ["setlocal", 0x63, [T.U30], 1, 0],
  ["getglobalscope", 0x64, [], 0, 1],
  ["getscopeobject", 0x65, [T.Byte], 0, 1],
  ["getproperty", 0x66, [T.Multiname], 1, 1],
  ["initproperty", 0x68, [T.Multiname], 2, 0],
  ["deleteproperty", 0x6a, [T.Multiname], 1, 1],
  ["getslot", 0x6c, [T.U30], 1, 1],
  ["setslot", 0x6d, [T.U30], 2, 0],
  ["convert_s", 0x70, [], 1, 1],
  ["convert_i", 0x73, [], 1, 1],
  ["convert_u", 0x74, [], 1, 1],
  ["convert_d", 0x75, [], 1, 1],
  ["convert_b", 0x76, [], 1, 1],
  ["convert_o", 0x77, [], 1, 1],
  ["coerce", 0x80, [T.Multiname], 1, 1],
  ["coerce_a", 0x82, [], 1, 1],
  ["coerce_s", 0x85, [], 1, 1],
  ["astype", 0x86, [T.Multiname], 1, 1],
  ["negate", 0x90, [], 1, 1],
  ["increment", 0x91, [], 1, 1],
  ["decrement", 0x93, [], 1, 1],
  ["typeof", 0x95, [], 1, 1],
  ["not", 0x96, [], 1, 1],
  ["add", 0xa0, [], 2, 1],
  ["subtract", 0xa1, [], 2, 1],
  ["multiply", 0xa2, [], 2, 1],
  ["divide", 0xa3, [], 2, 1],
  ["modulo", 0xa4, [], 2, 1],
  ["equals", 0xab, [], 2, 1],
  ["strictequals", 0xac, [], 2, 1],
  ["lessthan", 0xad, [], 2, 1],
  ["lessequals", 0xae, [], 2, 1],
  ["greaterthan", 0xaf, [], 2, 1],
  ["greaterequals", 0xb0, [], 2, 1],
  ["instanceof", 0xb1, [], 2, 1],
  ["istype", 0xb2, [T.Multiname], 1, 1],
  ["istypelate", 0xb3, [], 2, 1],
  ["getlocal_0", 0xd0, [], 0, 1],
  ["getlocal_1", 0xd1, [], 0, 1],
  ["getlocal_2", 0xd2, [], 0, 1],
  ["getlocal_3", 0xd3, [], 0, 1],
  ["setlocal_0", 0xd4, [], 1, 0],
  ["setlocal_1", 0xd5, [], 1, 0],
  ["setlocal_2", 0xd6, [], 1, 0],
  ["setlocal_3", 0xd7, [], 1, 0],
];

export const OPCODES: ReadonlyMap<string, OpcodeInfo> = new Map(
  OPCODE_ROWS.map(([name, code, operands, pop, push, popPerArg, scope]: OpcodeRow): [string, OpcodeInfo] => [
    name,
    {name, code, operands, pop, push, popPerArg: popPerArg ?? 0, scope: scope ?? 0},
  ]),
);

export enum InstructionType {
  Op,
  Label,
  BeginTry,
  EndTry,
  AddExceptionInfo,
}

export interface OpInstruction {
  type: InstructionType.Op;
  opcode: OpcodeInfo;
  operands: readonly Operand[];
}

/**
 * Branch target. Emits no bytes.
 */
export interface LabelInstruction {
  type: InstructionType.Label;
  name: string;
}

/**
 * Receives the byte offsets of try regions and catch targets while a method
 * body is assembled, and patches its exception table with them.
 */
export interface TryRegionOwner {
  /**
   * Called once per assembly, before any offset is reported.
   */
  resetTryRegions(): void;

  beginTryRegion(offset: UintSize): void;

  endTryRegion(offset: UintSize): void;

  resolveException(exception: ExceptionInfo, target: UintSize): void;
}

export interface BeginTryInstruction {
  type: InstructionType.BeginTry;
  owner: TryRegionOwner;
}

export interface EndTryInstruction {
  type: InstructionType.EndTry;
  owner: TryRegionOwner;
}

export interface AddExceptionInfoInstruction {
  type: InstructionType.AddExceptionInfo;
  owner: TryRegionOwner;
  exception: ExceptionInfo;
}

export type Instruction =
  OpInstruction
  | LabelInstruction
  | BeginTryInstruction
  | EndTryInstruction
  | AddExceptionInfoInstruction;

function isValidOperand(type: OperandType, value: Operand): boolean {
  switch (type) {
    case OperandType.Byte:
      return typeof value === "number" && Number.isInteger(value) && value >= -0x80 && value <= 0xff;
    case OperandType.U30:
    case OperandType.ArgCount:
      return typeof value === "number" && Number.isInteger(value) && value >= 0 && value < 0x40000000;
    case OperandType.Int:
      return typeof value === "number" && Number.isInteger(value) && value >= S32_MIN && value <= S32_MAX;
    case OperandType.Uint:
      return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= U32_MAX;
    case OperandType.Double:
      return typeof value === "number";
    case OperandType.Label:
    case OperandType.String:
      return typeof value === "string";
    case OperandType.Multiname:
      return value instanceof QName || value instanceof AnyName;
  }
}

/**
 * Creates the instruction named `name` from the opcode table, checking its
 * operands.
 */
export function createInstruction(name: string, operands: readonly Operand[] = []): OpInstruction {
  const opcode: OpcodeInfo | undefined = OPCODES.get(name);
  if (opcode === undefined) {
    throw createUnknownInstructionError(name);
  }
  if (operands.length !== opcode.operands.length) {
    throw createInvalidOperandError(name, Math.min(operands.length, opcode.operands.length));
  }
  opcode.operands.forEach((type: OperandType, i: number): void => {
    if (!isValidOperand(type, operands[i])) {
      throw createInvalidOperandError(name, i);
    }
  });
  return {type: InstructionType.Op, opcode, operands};
}

export function label(name: string): LabelInstruction {
  return {type: InstructionType.Label, name};
}

export function beginTry(owner: TryRegionOwner): BeginTryInstruction {
  return {type: InstructionType.BeginTry, owner};
}

export function endTry(owner: TryRegionOwner): EndTryInstruction {
  return {type: InstructionType.EndTry, owner};
}

export function addExceptionInfo(owner: TryRegionOwner, exception: ExceptionInfo): AddExceptionInfoInstruction {
  return {type: InstructionType.AddExceptionInfo, owner, exception};
}

export function getlocal(register: UintSize): OpInstruction {
  return register < 4 ? createInstruction(`getlocal_${register}`) : createInstruction("getlocal", [register]);
}

export function setlocal(register: UintSize): OpInstruction {
  return register < 4 ? createInstruction(`setlocal_${register}`) : createInstruction("setlocal", [register]);
}

export function kill(register: UintSize): OpInstruction {
  return createInstruction("kill", [register]);
}

export function pushscope(): OpInstruction {
  return createInstruction("pushscope");
}

export function popscope(): OpInstruction {
  return createInstruction("popscope");
}

export function getscopeobject(index: UintSize): OpInstruction {
  return createInstruction("getscopeobject", [index]);
}

export function getlex(name: Multiname): OpInstruction {
  return createInstruction("getlex", [name]);
}

export function newclass(classIndex: UintSize): OpInstruction {
  return createInstruction("newclass", [classIndex]);
}

export function initproperty(name: Multiname): OpInstruction {
  return createInstruction("initproperty", [name]);
}
