import { createNoLoadableAdapterError } from "../../errors.js";
import { S32_MIN, U32_MAX } from "../u32.js";
import type { CodeGenerator } from "./generator.js";

/**
 * A value that knows how to push itself on the operand stack.
 */
export interface Loadable {
  load(gen: CodeGenerator): void;
}

export function isLoadable(value: unknown): value is Loadable {
  return typeof value === "object" && value !== null && "load" in value && typeof value.load === "function";
}

/**
 * Pushes the local variable `name`.
 */
export class Local implements Loadable {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  load(gen: CodeGenerator): void {
    gen.pushVar(this.name);
  }

  toString(): string {
    return `Local(${JSON.stringify(this.name)})`;
  }
}

/**
 * Pushes the parameter `name` of the current method.
 */
export class Argument implements Loadable {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  load(gen: CodeGenerator): void {
    gen.pushArg(this.name);
  }

  toString(): string {
    return `Argument(${JSON.stringify(this.name)})`;
  }
}

export type LoadAdapter<T> = (gen: CodeGenerator, value: T) => void;

interface LoadableEntry {
  tryLoad(gen: CodeGenerator, value: unknown): boolean;
}

/**
 * Encoders of constant values, selected by the shape of the value. Adapters
 * registered last are tried first.
 */
export class LoadableRegistry {
  private readonly entries: LoadableEntry[];

  constructor() {
    this.entries = [];
  }

  static withDefaults(): LoadableRegistry {
    return new LoadableRegistry()
      .register(isString, (gen: CodeGenerator, value: string): void => gen.emit("pushstring", value))
      .register(isNumber, loadNumber)
      .register(isBoolean, (gen: CodeGenerator, value: boolean): void => value ? gen.pushTrue() : gen.pushFalse())
      .register(isMapping, (gen: CodeGenerator, value: Mapping): void => gen.initObject(value))
      .register(isArray, (gen: CodeGenerator, value: readonly unknown[]): void => gen.initArray(value));
  }

  register<T>(guard: (value: unknown) => value is T, load: LoadAdapter<T>): this {
    this.entries.unshift({
      tryLoad(gen: CodeGenerator, value: unknown): boolean {
        if (!guard(value)) {
          return false;
        }
        load(gen, value);
        return true;
      },
    });
    return this;
  }

  load(gen: CodeGenerator, value: unknown): void {
    for (const entry of this.entries) {
      if (entry.tryLoad(gen, value)) {
        return;
      }
    }
    throw createNoLoadableAdapterError(value);
  }
}

/**
 * Object initializer members: a `Map`, or a plain object.
 */
export type Mapping = ReadonlyMap<unknown, unknown> | Readonly<Record<string, unknown>>;

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isNumber(value: unknown): value is number {
  return typeof value === "number";
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

function isArray(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

function isMapping(value: unknown): value is Mapping {
  if (value instanceof Map) {
    return true;
  }
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Integers get the narrowest push instruction that holds them.
 */
function loadNumber(gen: CodeGenerator, value: number): void {
  if (!Number.isInteger(value) || Object.is(value, -0)) {
    if (Number.isNaN(value)) {
      gen.emit("pushnan");
    } else {
      gen.emit("pushdouble", value);
    }
  } else if (value >= -0x80 && value <= 0x7f) {
    gen.emit("pushbyte", value);
  } else if (value >= 0 && value <= U32_MAX) {
    gen.emit("pushuint", value);
  } else if (value >= S32_MIN && value < 0) {
    gen.emit("pushint", value);
  } else {
    gen.emit("pushdouble", value);
  }
}
