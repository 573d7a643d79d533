import { WritableStream } from "@open-flash/stream";
import { UintSize } from "semantic-types";

import { createUnknownLabelError, createUnknownLocalError } from "../errors.js";
import { ConstantPool } from "./constant-pool.js";
import { Instruction, InstructionType, OpInstruction, Operand, OperandType, TryRegionOwner } from "./instructions.js";
import { AnyName, Multiname, QName } from "./qname.js";
import { emitS24, emitU32, u32Size } from "./u32.js";

export interface AssembledCode {
  code: Uint8Array;
  maxStack: UintSize;
  localCount: UintSize;
  maxScopeDepth: UintSize;
}

function asNumber(value: Operand): number {
  return typeof value === "number" ? value : NaN;
}

function asString(value: Operand): string {
  return typeof value === "string" ? value : String(value);
}

function asMultiname(value: Operand): Multiname {
  return value instanceof QName || value instanceof AnyName ? value : new QName(String(value));
}

/**
 * Instruction sequence of one method body, with its table of named locals
 * (registers).
 */
export class CodeAssembler {
  private readonly sequence: Instruction[];
  private readonly locals: Map<string, UintSize>;
  private readonly freeRegisters: Set<UintSize>;
  private registerCount: UintSize;

  /**
   * @param localNames Names bound to the first registers, in order: `this`
   *   then the parameters.
   */
  constructor(localNames: readonly string[]) {
    this.sequence = [];
    this.locals = new Map();
    this.freeRegisters = new Set();
    this.registerCount = 0;
    for (const name of localNames) {
      this.locals.set(name, this.registerCount++);
    }
  }

  get instructions(): readonly Instruction[] {
    return this.sequence;
  }

  addInstruction(instruction: Instruction): void {
    this.sequence.push(instruction);
  }

  addInstructions(instructions: Iterable<Instruction>): void {
    for (const instruction of instructions) {
      this.sequence.push(instruction);
    }
  }

  /**
   * Removes and returns the instructions from `start` to the end.
   */
  detachFrom(start: UintSize): Instruction[] {
    return this.sequence.splice(start);
  }

  get nextFreeLocal(): UintSize {
    let lowest: UintSize = this.registerCount;
    for (const register of this.freeRegisters) {
      lowest = Math.min(lowest, register);
    }
    return lowest;
  }

  /**
   * Binds `name` to a register (its current one, or the lowest free one).
   */
  setLocal(name: string): UintSize {
    const old: UintSize | undefined = this.locals.get(name);
    if (old !== undefined) {
      return old;
    }
    const register: UintSize = this.nextFreeLocal;
    if (register === this.registerCount) {
      this.registerCount++;
    } else {
      this.freeRegisters.delete(register);
    }
    this.locals.set(name, register);
    return register;
  }

  /**
   * Unbinds `name` and makes its register available again.
   */
  killLocal(name: string): UintSize {
    const register: UintSize = this.getLocal(name);
    this.locals.delete(name);
    this.freeRegisters.add(register);
    return register;
  }

  getLocal(name: string): UintSize {
    const register: UintSize | undefined = this.locals.get(name);
    if (register === undefined) {
      throw createUnknownLocalError(name);
    }
    return register;
  }

  hasLocal(name: string): boolean {
    return this.locals.has(name);
  }

  get localCount(): UintSize {
    return this.registerCount;
  }

  /**
   * Produces the bytecode. Labels resolve to byte offsets, constant operands
   * to constant pool indexes, and the try-region pseudo-instructions report
   * their offsets to their owner.
   *
   * Stack and scope depths come from a linear walk over the sequence.
   */
  assemble(pool: ConstantPool): AssembledCode {
    const labels: Map<string, UintSize> = new Map();
    let offset: UintSize = 0;
    for (const instruction of this.sequence) {
      if (instruction.type === InstructionType.Label) {
        labels.set(instruction.name, offset);
      } else if (instruction.type === InstructionType.Op) {
        offset += instructionSize(instruction, pool);
      }
    }

    const owners: Set<TryRegionOwner> = new Set();
    for (const instruction of this.sequence) {
      if (instruction.type !== InstructionType.Op && instruction.type !== InstructionType.Label) {
        owners.add(instruction.owner);
      }
    }
    for (const owner of owners) {
      owner.resetTryRegions();
    }

    const byteStream: WritableStream = new WritableStream();
    let position: UintSize = 0;
    let stack: number = 0;
    let maxStack: UintSize = 0;
    let scope: number = 0;
    let maxScopeDepth: UintSize = 0;
    for (const instruction of this.sequence) {
      switch (instruction.type) {
        case InstructionType.Op: {
          position += instructionSize(instruction, pool);
          emitInstruction(byteStream, instruction, pool, position, labels);
          stack = Math.max(0, stack - popCount(instruction)) + instruction.opcode.push;
          scope = Math.max(0, scope + instruction.opcode.scope);
          maxStack = Math.max(maxStack, stack);
          maxScopeDepth = Math.max(maxScopeDepth, scope);
          break;
        }
        case InstructionType.Label:
          break;
        case InstructionType.BeginTry:
          instruction.owner.beginTryRegion(position);
          break;
        case InstructionType.EndTry:
          instruction.owner.endTryRegion(position);
          break;
        case InstructionType.AddExceptionInfo:
          instruction.owner.resolveException(instruction.exception, position);
          // The VM pushes the caught value when it enters the handler.
          stack = 1;
          scope = 0;
          maxStack = Math.max(maxStack, stack);
          break;
      }
    }
    return {code: byteStream.getBytes(), maxStack, localCount: this.registerCount, maxScopeDepth};
  }
}

function popCount(instruction: OpInstruction): UintSize {
  const {opcode, operands} = instruction;
  const argIndex: number = opcode.operands.indexOf(OperandType.ArgCount);
  const argCount: number = argIndex < 0 ? 0 : asNumber(operands[argIndex]);
  return opcode.pop + opcode.popPerArg * argCount;
}

function operandSize(type: OperandType, value: Operand, pool: ConstantPool): UintSize {
  switch (type) {
    case OperandType.Byte:
      return 1;
    case OperandType.Label:
      return 3;
    case OperandType.U30:
    case OperandType.ArgCount:
      return u32Size(asNumber(value));
    default:
      return u32Size(poolIndex(type, value, pool));
  }
}

function instructionSize(instruction: OpInstruction, pool: ConstantPool): UintSize {
  let size: UintSize = 1;
  instruction.opcode.operands.forEach((type: OperandType, i: number): void => {
    size += operandSize(type, instruction.operands[i], pool);
  });
  return size;
}

function poolIndex(type: OperandType, value: Operand, pool: ConstantPool): UintSize {
  switch (type) {
    case OperandType.Multiname:
      return pool.multinameIndex(asMultiname(value));
    case OperandType.String:
      return pool.stringIndex(asString(value));
    case OperandType.Int:
      return pool.intIndex(asNumber(value));
    case OperandType.Uint:
      return pool.uintIndex(asNumber(value));
    case OperandType.Double:
      return pool.doubleIndex(asNumber(value));
    default:
      return asNumber(value);
  }
}

function emitInstruction(
  byteStream: WritableStream,
  instruction: OpInstruction,
  pool: ConstantPool,
  end: UintSize,
  labels: ReadonlyMap<string, UintSize>,
): void {
  byteStream.writeUint8(instruction.opcode.code);
  instruction.opcode.operands.forEach((type: OperandType, i: number): void => {
    const value: Operand = instruction.operands[i];
    switch (type) {
      case OperandType.Byte:
        byteStream.writeUint8(asNumber(value) & 0xff);
        break;
      case OperandType.Label: {
        const target: UintSize | undefined = labels.get(asString(value));
        if (target === undefined) {
          throw createUnknownLabelError(asString(value));
        }
        emitS24(byteStream, target - end);
        break;
      }
      default:
        emitU32(byteStream, poolIndex(type, value, pool));
        break;
    }
  });
}
