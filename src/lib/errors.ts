import { Incident } from "incident";
import { UintSize } from "semantic-types";

export type ContextKind = "global" | "script" | "class" | "method";

export interface WrongContextData {
  attempted: string;
  actual: ContextKind | "none";
}

export type WrongContextError = Incident<WrongContextData, "WrongContext">;

export function createWrongContextError(attempted: string, actual: ContextKind | "none"): WrongContextError {
  return new Incident(
    "WrongContext",
    {attempted, actual},
    `You called ${attempted} while the current context was a ${actual} context`,
  );
}

export interface InvalidContextParentData {
  kind: ContextKind;
  parent: ContextKind | null;
}

export type InvalidContextParentError = Incident<InvalidContextParentData, "InvalidContextParent">;

export function createInvalidContextParentError(
  kind: ContextKind,
  parent: ContextKind | null,
): InvalidContextParentError {
  return new Incident("InvalidContextParent", {kind, parent}, `A ${kind} context cannot live in ${parent ?? "no"} context`);
}

export type UnknownLocalError = Incident<{name: string}, "UnknownLocal">;

export function createUnknownLocalError(name: string): UnknownLocalError {
  return new Incident("UnknownLocal", {name}, `No register is bound to the local ${JSON.stringify(name)}`);
}

export type NotAnArgumentError = Incident<{name: string}, "NotAnArgument">;

export function createNotAnArgumentError(name: string): NotAnArgumentError {
  return new Incident(
    "NotAnArgument",
    {name},
    `The local variable ${JSON.stringify(name)} is not an argument in the current method`,
  );
}

export type ConstructorRedefinitionError = Incident<{className: string}, "ConstructorRedefinition">;

export function createConstructorRedefinitionError(className: string): ConstructorRedefinitionError {
  return new Incident(
    "ConstructorRedefinition",
    {className},
    `The constructor parameters of ${className} cannot be redefined`,
  );
}

export interface ReadOutOfRangeData {
  requested: UintSize;
  available: UintSize;
}

export type ReadOutOfRangeError = Incident<ReadOutOfRangeData, "ReadOutOfRange">;

export function createReadOutOfRangeError(requested: UintSize, available: UintSize): ReadOutOfRangeError {
  return new Incident(
    "ReadOutOfRange",
    {requested, available},
    `Cannot read ${requested} bits, only ${available} available`,
  );
}

export interface ValueOutOfRangeData {
  format: string;
  value: string;
}

export type ValueOutOfRangeError = Incident<ValueOutOfRangeData, "ValueOutOfRange">;

export function createValueOutOfRangeError(format: string, value: number | string): ValueOutOfRangeError {
  return new Incident(
    "ValueOutOfRange",
    {format, value: String(value)},
    `The value ${value} cannot be represented by ${format}`,
  );
}

export type UnboundedReadError = Incident<{format: string}, "UnboundedRead">;

export function createUnboundedReadError(format: string): UnboundedReadError {
  return new Incident("UnboundedRead", {format}, `${format} needs an explicit width to be read`);
}

export type NoDefaultFormatError = Incident<{value: string}, "NoDefaultFormat">;

export function createNoDefaultFormatError(value: unknown): NoDefaultFormatError {
  return new Incident("NoDefaultFormat", {value: String(value)}, `No default bit format for ${String(value)}`);
}

export type UnterminatedCStringError = Incident<{start: UintSize}, "UnterminatedCString">;

export function createUnterminatedCStringError(start: UintSize): UnterminatedCStringError {
  return new Incident("UnterminatedCString", {start}, `No null terminator after bit ${start}`);
}

export interface SeekOutOfRangeData {
  target: number;
  length: UintSize;
}

export type SeekOutOfRangeError = Incident<SeekOutOfRangeData, "SeekOutOfRange">;

export function createSeekOutOfRangeError(target: number, length: UintSize): SeekOutOfRangeError {
  return new Incident("SeekOutOfRange", {target, length}, `Cursor ${target} is outside of [0, ${length}]`);
}

export interface InvalidBitStringData {
  char: string;
  index: UintSize;
}

export type InvalidBitStringError = Incident<InvalidBitStringData, "InvalidBitString">;

export function createInvalidBitStringError(char: string, index: UintSize): InvalidBitStringError {
  return new Incident("InvalidBitString", {char, index}, `Unexpected character ${JSON.stringify(char)} at ${index}`);
}

export type UnalignedByteOrderError = Incident<{width: UintSize}, "UnalignedByteOrder">;

export function createUnalignedByteOrderError(width: UintSize): UnalignedByteOrderError {
  return new Incident("UnalignedByteOrder", {width}, `${width} bits do not split into whole bytes`);
}

export interface InvalidByteStringData {
  index: UintSize;
  code: number;
}

export type InvalidByteStringError = Incident<InvalidByteStringData, "InvalidByteString">;

export function createInvalidByteStringError(index: UintSize, code: number): InvalidByteStringError {
  return new Incident("InvalidByteString", {index, code}, `Character code ${code} at ${index} is not a byte`);
}

export type UnknownInstructionError = Incident<{name: string}, "UnknownInstruction">;

export function createUnknownInstructionError(name: string): UnknownInstructionError {
  return new Incident("UnknownInstruction", {name}, `Unknown instruction ${JSON.stringify(name)}`);
}

export interface InvalidOperandData {
  instruction: string;
  index: UintSize;
}

export type InvalidOperandError = Incident<InvalidOperandData, "InvalidOperand">;

export function createInvalidOperandError(instruction: string, index: UintSize): InvalidOperandError {
  return new Incident("InvalidOperand", {instruction, index}, `Invalid operand #${index} for ${instruction}`);
}

export type UnknownLabelError = Incident<{label: string}, "UnknownLabel">;

export function createUnknownLabelError(label: string): UnknownLabelError {
  return new Incident("UnknownLabel", {label}, `Branch to undefined label ${JSON.stringify(label)}`);
}

export type UnbalancedTryRegionError = Incident<{offset: UintSize}, "UnbalancedTryRegion">;

export function createUnbalancedTryRegionError(offset: UintSize): UnbalancedTryRegionError {
  return new Incident("UnbalancedTryRegion", {offset}, `No matching try region at offset ${offset}`);
}

export type NoLoadableAdapterError = Incident<{value: string}, "NoLoadableAdapter">;

export function createNoLoadableAdapterError(value: unknown): NoLoadableAdapterError {
  const description: string = value === null ? "null" : typeof value;
  return new Incident("NoLoadableAdapter", {value: description}, `No loadable adapter for a value of type ${description}`);
}

export type InvalidMethodKindError = Incident<{kind: string}, "InvalidMethodKind">;

export function createInvalidMethodKindError(kind: string): InvalidMethodKindError {
  return new Incident("InvalidMethodKind", {kind}, `Expected method, getter or setter, got ${JSON.stringify(kind)}`);
}
