import { UintSize } from "semantic-types";

import {
  ContextKind,
  createInvalidContextParentError,
  createNotAnArgumentError,
  createWrongContextError,
} from "../../errors.js";
import { AbcFile } from "../abc-file.js";
import { ConstantPool } from "../constant-pool.js";
import {
  beginTry,
  createInstruction,
  endTry,
  getlex,
  getlocal,
  getscopeobject,
  Instruction,
  kill,
  label,
  Operand,
  popscope,
  pushscope,
  setlocal,
} from "../instructions.js";
import { ClassShape, LibraryRegistry } from "../library.js";
import { isNamed, Multiname, QName, toMultiname, toQName } from "../qname.js";
import {
  ClassContext,
  Context,
  GlobalContext,
  MethodContext,
  NewMethodOptions,
  Param,
  ScriptContext,
  TypeRef,
} from "./contexts.js";
import { isLoadable, LoadableRegistry, Mapping } from "./loadable.js";

export interface CodeGeneratorOptions {
  /**
   * File receiving the generated records. A new one by default.
   */
  abc?: AbcFile;
  /**
   * Native classes, used to walk superclass chains.
   */
  library?: LibraryRegistry;
  /**
   * Encoders used by `load` for constant values.
   */
  loadables?: LoadableRegistry;
  /**
   * Create and enter a first script. Defaults to `true`.
   */
  makeScript?: boolean;
}

export interface CallOptions {
  /**
   * Discard the result (`callpropvoid`).
   */
  void?: boolean;
}

const FAST_CASTS: ReadonlyMap<string, string> = new Map([
  [new QName("String").key, "coerce_s"],
  [new QName("Array").key, "coerce_a"],
  [new QName("uint").key, "convert_u"],
  [new QName("int").key, "convert_i"],
  [new QName("Number").key, "convert_d"],
  [new QName("Object").key, "convert_o"],
  [new QName("Boolean").key, "convert_b"],
]);

/**
 * Builds the records of an ABC file through a stack of contexts: global,
 * script, class and method.
 *
 * Operations that emit code act on the current method; the others check the
 * kind of the current context and fail with `WrongContext` on a mismatch.
 */
export class CodeGenerator {
  readonly abc: AbcFile;
  readonly constants: ConstantPool;
  readonly library: LibraryRegistry;
  readonly loadables: LoadableRegistry;
  readonly global: GlobalContext;
  readonly script0: ScriptContext | null;
  private current: Context | null;

  constructor(options: CodeGeneratorOptions = {}) {
    this.abc = options.abc ?? new AbcFile();
    this.constants = this.abc.constants;
    this.library = options.library ?? new LibraryRegistry();
    this.loadables = options.loadables ?? LoadableRegistry.withDefaults();
    this.global = new GlobalContext(this);
    this.current = this.global;
    this.script0 = (options.makeScript ?? true) ? this.global.newScript() : null;
  }

  get context(): Context | null {
    return this.current;
  }

  /**
   * Finds a class by name: native classes first, then the classes pending in
   * `script`.
   */
  findClass(name: QName, script: ScriptContext): ClassShape | undefined {
    return this.library.getType(name) ?? script.getPendingClass(name);
  }

  enterContext(ctx: Context): void {
    if (ctx.parent !== this.current) {
      throw createInvalidContextParentError(ctx.kind, this.current?.kind ?? null);
    }
    this.current = ctx;
  }

  /**
   * Finalizes the current context and makes its parent current.
   */
  exitContext(): Context {
    const ctx: Context = this.requireContext("exitContext");
    this.current = ctx.exit();
    return ctx;
  }

  exitUntilType(kind: ContextKind): void {
    while (this.current !== null && this.current.kind !== kind) {
      this.exitContext();
    }
  }

  exitUntil(context: Context): void {
    while (this.current !== null && this.current !== context) {
      this.exitContext();
    }
  }

  /**
   * Exits every context. The file is complete afterwards.
   */
  finish(): void {
    while (this.current !== null) {
      this.exitContext();
    }
  }

  currentClass(): ClassContext | null {
    let ctx: Context | null = this.current;
    while (ctx !== null) {
      if (ctx.kind === "class") {
        return ctx;
      }
      ctx = ctx.parent;
    }
    return null;
  }

  beginClass(name: string | QName, superName?: string | QName, bases?: readonly TypeRef[]): ClassContext {
    const ctx: Context = this.requireContext("beginClass");
    if (ctx.kind !== "script") {
      throw createWrongContextError("beginClass", ctx.kind);
    }
    return ctx.newClass(name, superName, bases);
  }

  endClass(): Context {
    const ctx: Context = this.requireContext("endClass");
    if (ctx.kind !== "class") {
      throw createWrongContextError("endClass", ctx.kind);
    }
    return this.exitContext();
  }

  beginMethod(name: string | QName, options: NewMethodOptions = {}): MethodContext {
    const ctx: Context = this.requireContext("beginMethod");
    if (ctx.kind !== "class" && ctx.kind !== "script") {
      throw createWrongContextError("beginMethod", ctx.kind);
    }
    return ctx.newMethod(name, options);
  }

  /**
   * Closes a method. Constructors are closed by `endConstructor`.
   */
  endMethod(): Context {
    const ctx: Context = this.requireContext("endMethod");
    if (ctx.kind !== "method" || ctx.isConstructor) {
      throw createWrongContextError("endMethod", ctx.kind);
    }
    return this.exitContext();
  }

  beginConstructor(params?: readonly Param[]): MethodContext {
    const ctx: Context = this.requireContext("beginConstructor");
    if (ctx.kind !== "class") {
      throw createWrongContextError("beginConstructor", ctx.kind);
    }
    return ctx.makeIinit(params);
  }

  endConstructor(): Context {
    const ctx: Context = this.requireContext("endConstructor");
    if (ctx.kind !== "method" || !ctx.isConstructor) {
      throw createWrongContextError("endConstructor", ctx.kind);
    }
    return this.exitContext();
  }

  /**
   * Runs `fn` inside a new class, then closes it. The class stays open if
   * `fn` throws.
   */
  withClass<T>(
    name: string | QName,
    superName: string | QName | undefined,
    fn: (ctx: ClassContext) => T,
    bases?: readonly TypeRef[],
  ): T {
    const result: T = fn(this.beginClass(name, superName, bases));
    this.endClass();
    return result;
  }

  withMethod<T>(name: string | QName, options: NewMethodOptions, fn: (ctx: MethodContext) => T): T {
    const result: T = fn(this.beginMethod(name, options));
    this.endMethod();
    return result;
  }

  withConstructor<T>(params: readonly Param[], fn: (ctx: MethodContext) => T): T {
    const result: T = fn(this.beginConstructor(params));
    this.endConstructor();
    return result;
  }

  // Instructions

  /**
   * Appends instructions to the current method.
   */
  I(...instructions: Instruction[]): void {
    this.requireMethod("I").addInstructions(instructions);
  }

  /**
   * Appends the instruction `name` with its operands.
   */
  emit(name: string, ...operands: Operand[]): void {
    this.I(createInstruction(name, operands));
  }

  pop(): void {
    this.emit("pop");
  }

  dup(): void {
    this.emit("dup");
  }

  swap(): void {
    this.emit("swap");
  }

  throw(): void {
    this.emit("throw");
  }

  returnValue(): void {
    this.emit("returnvalue");
  }

  returnVoid(): void {
    this.emit("returnvoid");
  }

  // Locals

  /**
   * Pops a value into the local `name`, binding a register if needed.
   */
  setLocal(name: string): UintSize {
    const index: UintSize = this.requireMethod("setLocal").setLocal(name);
    this.I(setlocal(index));
    return index;
  }

  getLocal(name: string): UintSize {
    const index: UintSize = this.requireMethod("getLocal").getLocal(name);
    this.I(getlocal(index));
    return index;
  }

  /**
   * Emits `kill` for the local `name`. With `free`, its register is also
   * released for reuse.
   */
  killLocal(name: string, free: boolean = false): UintSize {
    const ctx: MethodContext = this.requireMethod("killLocal");
    const index: UintSize = free ? ctx.killLocal(name) : ctx.getLocal(name);
    this.I(kill(index));
    return index;
  }

  hasLocal(name: string): boolean {
    return this.requireMethod("hasLocal").hasLocal(name);
  }

  storeVar(name: string): UintSize {
    return this.setLocal(name);
  }

  pushVar(name: string): UintSize {
    return this.getLocal(name);
  }

  pushArg(name: string): UintSize {
    if (!this.requireMethod("pushArg").hasParam(name)) {
      throw createNotAnArgumentError(name);
    }
    return this.getLocal(name);
  }

  pushThis(): void {
    this.getLocal("this");
  }

  // Constants

  /**
   * Pushes each value: named values through a lexical lookup, loadable
   * values by themselves, constants through the loadable registry.
   */
  load(...values: unknown[]): void {
    for (const value of values) {
      if (isNamed(value)) {
        this.I(getlex(value.multiname()));
      } else if (isLoadable(value)) {
        value.load(this);
      } else {
        this.loadables.load(this, value);
      }
    }
  }

  pushConst(...values: unknown[]): void {
    this.load(...values);
  }

  pushTrue(): void {
    this.emit("pushtrue");
  }

  pushFalse(): void {
    this.emit("pushfalse");
  }

  pushUndefined(): void {
    this.emit("pushundefined");
  }

  pushNull(): void {
    this.emit("pushnull");
  }

  initArray(members: readonly unknown[] = []): void {
    this.load(...members);
    this.emit("newarray", members.length);
  }

  /**
   * Pushes each key then its value, and builds an object from them.
   */
  initObject(members: Mapping = {}): void {
    const entries: [unknown, unknown][] = members instanceof Map ? [...members.entries()] : Object.entries(members);
    for (const [key, value] of entries) {
      this.load(key, value);
    }
    this.emit("newobject", entries.length);
  }

  /**
   * Creates an `Array` of the given length.
   */
  newArray(length: number = 1): void {
    this.emit("getglobalscope");
    this.pushConst(length);
    this.emit("constructprop", new QName("Array"), 1);
  }

  // Branches

  nextLabel(prefix: string = "label"): string {
    return this.requireMethod("nextLabel").nextLabel(prefix);
  }

  setLabel(name: string): void {
    this.I(label(name));
  }

  branchUnconditionally(label: string): void {
    this.emit("jump", label);
  }

  branchConditionally(ifTrue: boolean, label: string): void {
    if (ifTrue) {
      this.branchIfTrue(label);
    } else {
      this.branchIfFalse(label);
    }
  }

  branchIfTrue(label: string): void {
    this.emit("iftrue", label);
  }

  branchIfFalse(label: string): void {
    this.emit("iffalse", label);
  }

  branchIfEqual(label: string): void {
    this.emit("ifeq", label);
  }

  branchIfStrictEqual(label: string): void {
    this.emit("ifstricteq", label);
  }

  branchIfNotEqual(label: string): void {
    this.emit("ifne", label);
  }

  branchIfStrictNotEqual(label: string): void {
    this.emit("ifstrictne", label);
  }

  branchIfGreaterThan(label: string): void {
    this.emit("ifgt", label);
  }

  branchIfGreaterEquals(label: string): void {
    this.emit("ifge", label);
  }

  branchIfLessThan(label: string): void {
    this.emit("iflt", label);
  }

  branchIfLessEquals(label: string): void {
    this.emit("ifle", label);
  }

  branchIfNotGreaterThan(label: string): void {
    this.emit("ifngt", label);
  }

  branchIfNotGreaterEquals(label: string): void {
    this.emit("ifnge", label);
  }

  branchIfNotLessThan(label: string): void {
    this.emit("ifnlt", label);
  }

  branchIfNotLessEquals(label: string): void {
    this.emit("ifnle", label);
  }

  // Calls and fields

  /**
   * Calls the global function `name` with `argCount` arguments already on
   * the stack.
   */
  callFunction(name: string | QName, argCount: UintSize): void {
    const qName: QName = toQName(name);
    this.emit("findpropstrict", qName);
    this.emit("callproperty", qName, argCount);
  }

  callFunctionConstargs(name: string | QName, args: readonly unknown[], options: CallOptions = {}): void {
    this.emit("findpropstrict", toQName(name));
    this.callMethodConstargs(name, args, options);
  }

  /**
   * Calls the method `name` on the receiver below the `argCount` arguments,
   * then casts the result to `type` if given.
   */
  callMethod(name: string | QName, argCount: UintSize, type?: TypeRef): void {
    this.emit("callproperty", toQName(name), argCount);
    if (type !== undefined) {
      this.downcast(type);
    }
  }

  callMethodConstargs(name: string | QName, args: readonly unknown[], options: CallOptions = {}): void {
    this.load(...args);
    this.emit((options.void ?? false) ? "callpropvoid" : "callproperty", toQName(name), args.length);
  }

  getField(name: string | QName, type?: TypeRef): void {
    this.emit("getproperty", toQName(name));
    if (type !== undefined) {
      this.downcast(type);
    }
  }

  /**
   * Sets the field `name` of the object below the value, casting the value to
   * `type` first if given.
   */
  setField(name: string | QName, type?: TypeRef): void {
    if (type !== undefined) {
      this.downcast(type);
    }
    this.emit("setproperty", toQName(name));
  }

  downcast(type: TypeRef): void {
    const name: Multiname = toMultiname(type);
    const fast: string | undefined = FAST_CASTS.get(name.key);
    if (fast !== undefined) {
      this.emit(fast);
    } else {
      this.emit("coerce", name);
    }
  }

  isInstance(type: TypeRef): void {
    this.emit("istype", toMultiname(type));
  }

  /**
   * Replaces the object on the stack by its constructor.
   */
  getTypeOf(): void {
    this.getField("prototype");
    this.getField("constructor");
  }

  // Exceptions

  beginTry(): void {
    this.I(beginTry(this.requireMethod("beginTry")));
  }

  endTry(): void {
    this.I(endTry(this.requireMethod("endTry")));
  }

  /**
   * Starts a catch block for `type`. The caught value is kept in a local and
   * in the slot of a new scope.
   */
  beginCatch(type: TypeRef): void {
    const ctx: MethodContext = this.requireMethod("beginCatch");
    const index: UintSize = ctx.addException(toMultiname(type));
    ctx.restoreScopes();
    const local: string = ctx.pushCatch();
    this.I(createInstruction("newcatch", [index]), createInstruction("dup"));
    this.storeVar(local);
    this.I(createInstruction("dup"), pushscope(), createInstruction("swap"), createInstruction("setslot", [1]));
  }

  /**
   * Pushes the value caught by the catch block `nest` levels deep (the
   * innermost by default).
   */
  pushException(nest?: UintSize): void {
    const ctx: MethodContext = this.requireMethod("pushException");
    this.I(getscopeobject(nest ?? ctx.scopeNest), createInstruction("getslot", [1]));
  }

  endCatch(): void {
    const ctx: MethodContext = this.requireMethod("endCatch");
    const local: string | undefined = ctx.catchLocal;
    if (local === undefined) {
      throw createWrongContextError("endCatch", ctx.kind);
    }
    this.I(popscope());
    this.killLocal(local, true);
    this.exitContext();
  }

  private requireContext(attempted: string): Context {
    if (this.current === null) {
      throw createWrongContextError(attempted, "none");
    }
    return this.current;
  }

  private requireMethod(attempted: string): MethodContext {
    const ctx: Context = this.requireContext(attempted);
    if (ctx.kind !== "method") {
      throw createWrongContextError(attempted, ctx.kind);
    }
    return ctx;
  }
}
