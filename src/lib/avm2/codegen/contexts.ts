import { UintSize } from "semantic-types";

import {
  createConstructorRedefinitionError,
  createUnbalancedTryRegionError,
  createWrongContextError,
} from "../../errors.js";
import {
  ClassInfo,
  ExceptionInfo,
  InstanceInfo,
  MethodBodyInfo,
  MethodInfo,
  MethodTrait,
  ScriptInfo,
  Trait,
  TraitKind,
} from "../abc-file.js";
import { CodeAssembler } from "../assembler.js";
import {
  addExceptionInfo,
  getlex,
  getlocal,
  getscopeobject,
  initproperty,
  Instruction,
  newclass,
  popscope,
  pushscope,
  TryRegionOwner,
} from "../instructions.js";
import type { ClassShape } from "../library.js";
import { ANY_NAME, Multiname, Named, QName, toMultiname, toQName } from "../qname.js";
import type { CodeGenerator } from "./generator.js";

/**
 * Reference to a type: a dotted path such as `"flash.display.Sprite"`, `"*"`,
 * or any value with a qualified name.
 */
export type TypeRef = string | Named;

/**
 * Method parameter: its type, then its name.
 */
export type Param = readonly [type: TypeRef, name: string];

export type MethodKind = "method" | "getter" | "setter";

export interface NewMethodOptions {
  params?: readonly Param[];
  /**
   * Defaults to `void`.
   */
  returnType?: TypeRef;
  /**
   * Getters take no parameters and return a value, setters take one and
   * return `void`. The caller is responsible for these shapes.
   */
  kind?: MethodKind;
  /**
   * Selects the static traits of a class. Ignored by scripts.
   */
  isStatic?: boolean;
  /**
   * Forces the override flag. Otherwise it is set when a superclass already
   * has a method with the same name.
   */
  override?: boolean;
}

export type Context = GlobalContext | ScriptContext | ClassContext | MethodContext;

const OBJECT_NAME: QName = new QName("Object");
const VOID_NAME: QName = new QName("void");

const TRAIT_KINDS: Readonly<Record<MethodKind, MethodTrait["kind"]>> = {
  method: TraitKind.Method,
  getter: TraitKind.Getter,
  setter: TraitKind.Setter,
};

export class GlobalContext {
  readonly kind = "global";
  readonly gen: CodeGenerator;
  readonly parent: null = null;
  readonly scripts: ScriptContext[];

  constructor(gen: CodeGenerator) {
    this.gen = gen;
    this.scripts = [];
  }

  newScript(): ScriptContext {
    const ctx: ScriptContext = new ScriptContext(this.gen, this);
    this.scripts.push(ctx);
    this.gen.enterContext(ctx);
    return ctx;
  }

  exit(): null {
    return null;
  }
}

/**
 * Shared by the contexts that own methods: scripts and classes.
 */
abstract class MethodOwnerContext {
  readonly gen: CodeGenerator;

  protected constructor(gen: CodeGenerator) {
    this.gen = gen;
  }

  abstract addInstanceTrait(trait: Trait): UintSize;

  abstract addStaticTrait(trait: Trait): UintSize;

  /**
   * Tells if a method called `name` should get the override flag.
   */
  abstract overridden(isStatic: boolean, name: QName): boolean;

  newMethodInfo(name: string, params: readonly Param[], returnType: TypeRef): MethodInfo {
    return {
      name,
      paramTypes: params.map(([type]: Param): Multiname => toMultiname(type)),
      paramNames: params.map(([, paramName]: Param): string => paramName),
      returnType: toMultiname(returnType),
    };
  }

  /**
   * Declares a method trait and enters the context of its body.
   */
  newMethod(name: string | QName, options: NewMethodOptions = {}): MethodContext {
    const params: readonly Param[] = options.params ?? [];
    const isStatic: boolean = options.isStatic ?? false;
    const qName: QName = toQName(name);
    const method: MethodInfo = this.newMethodInfo(qName.toString(), params, options.returnType ?? VOID_NAME);
    const trait: MethodTrait = {
      kind: TRAIT_KINDS[options.kind ?? "method"],
      name: qName,
      method,
      override: (options.override ?? false) || this.overridden(isStatic, qName),
    };
    if (isStatic) {
      this.addStaticTrait(trait);
    } else {
      this.addInstanceTrait(trait);
    }
    const ctx: MethodContext = new MethodContext(this.gen, method, this.asParent(), params);
    this.gen.enterContext(ctx);
    return ctx;
  }

  protected abstract asParent(): ScriptContext | ClassContext;
}

interface PendingClass {
  context: ClassContext;
  /**
   * Classes to put on the scope stack when the class is created, outermost
   * first. `null` means they are found by walking the superclass chain.
   */
  bases: readonly Multiname[] | null;
}

export class ScriptContext extends MethodOwnerContext {
  readonly kind = "script";
  readonly parent: GlobalContext;
  readonly traits: Trait[];
  init: MethodContext | null;
  private readonly pendingClasses: Map<string, PendingClass>;
  private done: boolean;

  constructor(gen: CodeGenerator, parent: GlobalContext) {
    super(gen);
    this.parent = parent;
    this.traits = [];
    this.init = null;
    this.pendingClasses = new Map();
    this.done = false;
  }

  get classes(): ClassContext[] {
    return [...this.pendingClasses.values()].map(({context}: PendingClass): ClassContext => context);
  }

  overridden(): boolean {
    return false;
  }

  /**
   * Enters the script initializer, creating it on first use.
   */
  makeInit(): MethodContext {
    if (this.init === null) {
      const method: MethodInfo = {name: "", paramTypes: [], paramNames: [], returnType: ANY_NAME};
      this.init = new MethodContext(this.gen, method, this, []);
    }
    this.gen.enterContext(this.init);
    return this.init;
  }

  /**
   * Registers a class and enters its context. Declaring a name twice enters
   * the existing class again.
   */
  newClass(name: string | QName, superName?: string | QName, bases?: readonly TypeRef[]): ClassContext {
    const qName: QName = toQName(name);
    const old: PendingClass | undefined = this.pendingClasses.get(qName.key);
    if (old !== undefined) {
      this.gen.enterContext(old.context);
      return old.context;
    }
    const context: ClassContext = new ClassContext(
      this.gen,
      qName,
      superName !== undefined ? toQName(superName) : OBJECT_NAME,
      this,
    );
    this.pendingClasses.set(qName.key, {
      context,
      bases: bases !== undefined ? bases.map((base: TypeRef): Multiname => toMultiname(base)) : null,
    });
    this.gen.enterContext(context);
    return context;
  }

  getPendingClass(name: QName): ClassContext | undefined {
    return this.pendingClasses.get(name.key)?.context;
  }

  addTrait(trait: Trait): UintSize {
    this.traits.push(trait);
    return this.traits.length;
  }

  addInstanceTrait(trait: Trait): UintSize {
    return this.addTrait(trait);
  }

  addStaticTrait(trait: Trait): UintSize {
    return this.addTrait(trait);
  }

  /**
   * Emits the creation of every pending class at the start of the script
   * initializer, then registers the script. Runs once.
   */
  exit(): GlobalContext {
    if (this.done) {
      return this.parent;
    }
    this.done = true;
    const init: MethodContext = this.makeInit();
    // Keep the prologue (`getlocal0; pushscope`) first: the class creation
    // code goes between it and the code already in the initializer.
    const body: Instruction[] = init.asm.detachFrom(2);

    for (const {context, bases} of this.pendingClasses.values()) {
      const records: ClassRecords = context.requireRecords();
      const ancestors: readonly Multiname[] = bases ?? this.ancestorsOf(context);
      this.gen.I(getscopeobject(0));
      for (const ancestor of [...ancestors].reverse()) {
        this.gen.I(getlex(ancestor), pushscope());
      }
      this.traits.push({kind: TraitKind.Class, name: context.name, classInfo: records.classInfo});
      this.gen.I(getlex(context.superName), newclass(records.index));
      for (let i: number = 0; i < ancestors.length; i++) {
        this.gen.I(popscope());
      }
      this.gen.I(initproperty(context.name));
    }

    const script: ScriptInfo = {init: init.method, traits: this.traits};
    this.gen.abc.scripts.indexFor(script);
    this.gen.exitContext();
    init.asm.addInstructions(body);
    return this.parent;
  }

  protected asParent(): ScriptContext {
    return this;
  }

  /**
   * Superclass chain of a pending class, nearest first, always ending with
   * `Object`.
   */
  private ancestorsOf(context: ClassContext): Multiname[] {
    const ancestors: QName[] = [];
    const seen: Set<string> = new Set();
    let shape: ClassShape | undefined = this.gen.findClass(context.superName, this);
    while (shape !== undefined && !seen.has(shape.name.key)) {
      seen.add(shape.name.key);
      ancestors.push(shape.name);
      shape = shape.superName !== null ? this.gen.findClass(shape.superName, this) : undefined;
    }
    if (!ancestors.some((ancestor: QName): boolean => ancestor.equals(OBJECT_NAME))) {
      ancestors.push(OBJECT_NAME);
    }
    return ancestors;
  }
}

export interface ClassRecords {
  instance: InstanceInfo;
  classInfo: ClassInfo;
  /**
   * Shared index of the instance and class records.
   */
  index: UintSize;
}

export class ClassContext extends MethodOwnerContext implements ClassShape {
  readonly kind = "class";
  readonly name: QName;
  readonly superName: QName;
  readonly parent: ScriptContext;
  readonly instanceTraits: Trait[];
  readonly staticTraits: Trait[];
  cinit: MethodContext | null;
  iinit: MethodContext | null;
  records: ClassRecords | null;

  constructor(gen: CodeGenerator, name: QName, superName: QName, parent: ScriptContext) {
    super(gen);
    this.name = name;
    this.superName = superName;
    this.parent = parent;
    this.instanceTraits = [];
    this.staticTraits = [];
    this.cinit = null;
    this.iinit = null;
    this.records = null;
  }

  hasMethod(name: string, isStatic: boolean): boolean {
    return (isStatic ? this.staticTraits : this.instanceTraits).some((trait: Trait): boolean => {
      return trait.kind !== TraitKind.Slot && trait.kind !== TraitKind.Class && trait.name.name === name;
    });
  }

  overridden(isStatic: boolean, name: QName): boolean {
    const seen: Set<string> = new Set([this.name.key]);
    let shape: ClassShape | undefined = this.gen.findClass(this.superName, this.parent);
    while (shape !== undefined && !seen.has(shape.name.key)) {
      if (shape.hasMethod(name.name, isStatic)) {
        return true;
      }
      seen.add(shape.name.key);
      shape = shape.superName !== null ? this.gen.findClass(shape.superName, this.parent) : undefined;
    }
    return false;
  }

  /**
   * Enters the class initializer, which sets up static traits.
   */
  makeCinit(): MethodContext {
    if (this.cinit === null) {
      const method: MethodInfo = {name: "", paramTypes: [], paramNames: [], returnType: ANY_NAME};
      this.cinit = new MethodContext(this.gen, method, this, []);
    }
    this.gen.enterContext(this.cinit);
    return this.cinit;
  }

  /**
   * Enters the instance initializer (constructor). Its parameters are fixed
   * by the first call; the constructor prologue calls the super constructor.
   */
  makeIinit(params: readonly Param[] = []): MethodContext {
    let iinit: MethodContext | null = this.iinit;
    const isNew: boolean = iinit === null;
    if (iinit === null) {
      iinit = new MethodContext(this.gen, this.newMethodInfo("", params, VOID_NAME), this, params);
      iinit.isConstructor = true;
      this.iinit = iinit;
    } else if (params.length > 0) {
      throw createConstructorRedefinitionError(this.name.toString());
    }
    this.gen.enterContext(iinit);
    if (isNew) {
      this.gen.pushThis();
      this.gen.emit("constructsuper", 0);
    }
    return iinit;
  }

  addInstanceTrait(trait: Trait): UintSize {
    this.instanceTraits.push(trait);
    return this.instanceTraits.length;
  }

  addStaticTrait(trait: Trait): UintSize {
    this.staticTraits.push(trait);
    return this.staticTraits.length;
  }

  /**
   * Records of the class, available once it was exited.
   */
  requireRecords(): ClassRecords {
    if (this.records === null) {
      throw createWrongContextError("exitScript", "class");
    }
    return this.records;
  }

  exit(): ScriptContext {
    const iinit: MethodContext = this.iinit ?? this.synthesizeIinit();
    const cinit: MethodContext = this.cinit ?? this.synthesizeCinit();
    if (this.records === null) {
      const instance: InstanceInfo = {
        name: this.name,
        superName: this.superName,
        iinit: iinit.method,
        traits: this.instanceTraits,
      };
      const classInfo: ClassInfo = {cinit: cinit.method, traits: this.staticTraits};
      const index: UintSize = this.gen.abc.instances.indexFor(instance);
      this.gen.abc.classes.indexFor(classInfo);
      this.records = {instance, classInfo, index};
    }
    return this.parent;
  }

  protected asParent(): ClassContext {
    return this;
  }

  private synthesizeIinit(): MethodContext {
    const iinit: MethodContext = this.makeIinit();
    this.gen.returnVoid();
    this.gen.endConstructor();
    return iinit;
  }

  private synthesizeCinit(): MethodContext {
    const cinit: MethodContext = this.makeCinit();
    this.gen.returnVoid();
    this.gen.endMethod();
    return cinit;
  }
}

/**
 * Catch block in progress: one more scope level, holding the caught value in
 * a synthetic local.
 */
interface CatchOverlay {
  scopeNest: UintSize;
  local: string;
}

interface TryRegion {
  from: UintSize;
  to: UintSize;
}

export class MethodContext implements TryRegionOwner {
  readonly kind = "method";
  readonly gen: CodeGenerator;
  readonly method: MethodInfo;
  readonly parent: ScriptContext | ClassContext;
  readonly params: readonly Param[];
  readonly asm: CodeAssembler;
  readonly activationTraits: Trait[];
  readonly exceptions: ExceptionInfo[];
  readonly body: MethodBodyInfo;
  isConstructor: boolean;
  private readonly labelCounters: Map<string, UintSize>;
  private readonly catches: CatchOverlay[];
  private readonly openTries: UintSize[];
  private lastTry: TryRegion | null;

  constructor(
    gen: CodeGenerator,
    method: MethodInfo,
    parent: ScriptContext | ClassContext,
    params: readonly Param[],
    stdPrologue: boolean = true,
  ) {
    this.gen = gen;
    this.method = method;
    this.parent = parent;
    this.params = params;
    this.asm = new CodeAssembler(["this", ...params.map(([, name]: Param): string => name)]);
    this.activationTraits = [];
    this.exceptions = [];
    this.body = {method, code: this.asm, activationTraits: this.activationTraits, exceptions: this.exceptions};
    this.isConstructor = false;
    this.labelCounters = new Map();
    this.catches = [];
    this.openTries = [];
    this.lastTry = null;
    if (stdPrologue) {
      this.restoreScopes();
    }
  }

  /**
   * Number of catch blocks the code is currently nested in.
   */
  get scopeNest(): UintSize {
    return this.catches.length;
  }

  /**
   * Name of the local holding the value caught by the innermost catch block.
   */
  get catchLocal(): string | undefined {
    return this.catches.length > 0 ? this.catches[this.catches.length - 1].local : undefined;
  }

  get nextFreeLocal(): UintSize {
    return this.asm.nextFreeLocal;
  }

  hasParam(name: string): boolean {
    return this.params.some(([, paramName]: Param): boolean => paramName === name);
  }

  /**
   * Returns a fresh label name: `__loop_0`, `__loop_1`, ...
   */
  nextLabel(prefix: string = "label"): string {
    const current: UintSize = this.labelCounters.get(prefix) ?? 0;
    this.labelCounters.set(prefix, current + 1);
    return `__${prefix}_${current}`;
  }

  /**
   * Adds a trait to the activation object of the method.
   */
  addActivationTrait(trait: Trait): UintSize {
    this.activationTraits.push(trait);
    return this.activationTraits.length;
  }

  /**
   * Appends an exception table entry for a catch block starting here. Its
   * offsets are filled in when the body is assembled.
   */
  addException(excType: Multiname): UintSize {
    const exception: ExceptionInfo = {from: -1, to: -1, target: -1, excType, varName: null};
    this.asm.addInstruction(addExceptionInfo(this, exception));
    this.exceptions.push(exception);
    return this.exceptions.length - 1;
  }

  addInstructions(instructions: Iterable<Instruction>): void {
    this.asm.addInstructions(instructions);
  }

  setLocal(name: string): UintSize {
    return this.asm.setLocal(name);
  }

  killLocal(name: string): UintSize {
    return this.asm.killLocal(name);
  }

  getLocal(name: string): UintSize {
    return this.asm.getLocal(name);
  }

  hasLocal(name: string): boolean {
    return this.asm.hasLocal(name);
  }

  /**
   * Pushes `this` and the scope of every enclosing catch block back on the
   * scope stack.
   */
  restoreScopes(): void {
    this.asm.addInstruction(getlocal(0));
    this.asm.addInstruction(pushscope());
    for (const overlay of this.catches) {
      this.asm.addInstruction(getlocal(this.asm.getLocal(overlay.local)));
      this.asm.addInstruction(pushscope());
    }
  }

  /**
   * Starts a catch block and returns the name of the local for the caught
   * value.
   */
  pushCatch(): string {
    const scopeNest: UintSize = this.catches.length + 1;
    const overlay: CatchOverlay = {scopeNest, local: `exception#${scopeNest}`};
    this.catches.push(overlay);
    return overlay.local;
  }

  resetTryRegions(): void {
    this.openTries.length = 0;
    this.lastTry = null;
  }

  beginTryRegion(offset: UintSize): void {
    this.openTries.push(offset);
  }

  endTryRegion(offset: UintSize): void {
    const from: UintSize | undefined = this.openTries.pop();
    if (from === undefined) {
      throw createUnbalancedTryRegionError(offset);
    }
    this.lastTry = {from, to: offset};
  }

  resolveException(exception: ExceptionInfo, target: UintSize): void {
    if (this.lastTry === null) {
      throw createUnbalancedTryRegionError(target);
    }
    exception.from = this.lastTry.from;
    exception.to = this.lastTry.to;
    exception.target = target;
  }

  /**
   * Leaves the innermost catch block if there is one (the method stays
   * current), else registers the method and its body.
   */
  exit(): MethodContext | ScriptContext | ClassContext {
    if (this.catches.length > 0) {
      this.catches.pop();
      return this;
    }
    this.gen.abc.methods.indexFor(this.method);
    this.gen.abc.bodies.indexFor(this.body);
    return this.parent;
  }
}
