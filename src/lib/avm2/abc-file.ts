import { UintSize } from "semantic-types";

import type { CodeAssembler } from "./assembler.js";
import { ConstantPool } from "./constant-pool.js";
import { Multiname, QName } from "./qname.js";

export interface MethodInfo {
  name: string;
  paramTypes: Multiname[];
  paramNames: string[];
  returnType: Multiname;
}

/**
 * Exception table entry. The offsets stay at -1 until the method body is
 * assembled.
 */
export interface ExceptionInfo {
  from: number;
  to: number;
  target: number;
  excType: Multiname;
  varName: QName | null;
}

export enum TraitKind {
  Slot,
  Method,
  Getter,
  Setter,
  Class,
}

export interface SlotTrait {
  kind: TraitKind.Slot;
  name: QName;
  typeName: Multiname;
}

export interface MethodTrait {
  kind: TraitKind.Method | TraitKind.Getter | TraitKind.Setter;
  name: QName;
  method: MethodInfo;
  override: boolean;
}

export interface ClassTrait {
  kind: TraitKind.Class;
  name: QName;
  classInfo: ClassInfo;
}

export type Trait = SlotTrait | MethodTrait | ClassTrait;

export interface MethodBodyInfo {
  method: MethodInfo;
  code: CodeAssembler;
  activationTraits: Trait[];
  exceptions: ExceptionInfo[];
}

export interface InstanceInfo {
  name: QName;
  superName: QName;
  iinit: MethodInfo;
  traits: Trait[];
}

export interface ClassInfo {
  cinit: MethodInfo;
  traits: Trait[];
}

export interface ScriptInfo {
  init: MethodInfo;
  traits: Trait[];
}

/**
 * Append-only table of records. `indexFor` interns records by identity.
 */
export class IndexedTable<T> {
  private readonly indexes: Map<T, UintSize>;
  private readonly records: T[];

  constructor() {
    this.indexes = new Map();
    this.records = [];
  }

  indexFor(record: T): UintSize {
    const old: UintSize | undefined = this.indexes.get(record);
    if (old !== undefined) {
      return old;
    }
    const index: UintSize = this.records.length;
    this.records.push(record);
    this.indexes.set(record, index);
    return index;
  }

  has(record: T): boolean {
    return this.indexes.has(record);
  }

  get(index: UintSize): T | undefined {
    return this.records[index];
  }

  get length(): UintSize {
    return this.records.length;
  }

  get items(): readonly T[] {
    return this.records;
  }
}

export class AbcFile {
  readonly constants: ConstantPool;
  readonly methods: IndexedTable<MethodInfo>;
  readonly bodies: IndexedTable<MethodBodyInfo>;
  readonly instances: IndexedTable<InstanceInfo>;
  readonly classes: IndexedTable<ClassInfo>;
  readonly scripts: IndexedTable<ScriptInfo>;

  constructor() {
    this.constants = new ConstantPool();
    this.methods = new IndexedTable();
    this.bodies = new IndexedTable();
    this.instances = new IndexedTable();
    this.classes = new IndexedTable();
    this.scripts = new IndexedTable();
  }
}
