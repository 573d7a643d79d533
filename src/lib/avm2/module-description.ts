import { CaseStyle } from "kryo";
import { ArrayIoType, ArrayType } from "kryo/array";
import { $Boolean } from "kryo/boolean";
import { RecordIoType, RecordType } from "kryo/record";
import { Ucs2StringType } from "kryo/ucs2-string";

import { createInvalidMethodKindError } from "../errors.js";
import { AbcFile, ExceptionInfo, InstanceInfo, MethodBodyInfo, ScriptInfo, Trait, TraitKind } from "./abc-file.js";
import { AssembledCode } from "./assembler.js";
import { ClassContext, MethodKind, NewMethodOptions, Param } from "./codegen/contexts.js";
import { CodeGenerator } from "./codegen/generator.js";
import { LibraryRegistry } from "./library.js";
import { toMultiname, toQName } from "./qname.js";

const $Name: Ucs2StringType = new Ucs2StringType({maxLength: Infinity});

export interface TypedName {
  name: string;
  type: string;
}

export const $TypedName: RecordIoType<TypedName> = new RecordType<TypedName>({
  properties: {
    name: {type: $Name},
    type: {type: $Name},
  },
  changeCase: CaseStyle.SnakeCase,
});

const $TypedNames: ArrayIoType<TypedName> = new ArrayType({itemType: $TypedName, maxLength: Infinity});

export interface MethodDescription {
  name: string;
  params?: TypedName[];
  returnType?: string;
  /**
   * `method` (default), `getter` or `setter`.
   */
  kind?: string;
  isStatic?: boolean;
  /**
   * String constant returned by the method. Without it, the method returns
   * nothing.
   */
  returns?: string;
}

export const $MethodDescription: RecordIoType<MethodDescription> = new RecordType<MethodDescription>({
  properties: {
    name: {type: $Name},
    params: {type: $TypedNames, optional: true},
    returnType: {type: $Name, optional: true},
    kind: {type: $Name, optional: true},
    isStatic: {type: $Boolean, optional: true},
    returns: {type: $Name, optional: true},
  },
  changeCase: CaseStyle.SnakeCase,
});

export interface ClassDescription {
  name: string;
  superName?: string;
  fields?: TypedName[];
  constructorParams?: TypedName[];
  methods?: MethodDescription[];
}

export const $ClassDescription: RecordIoType<ClassDescription> = new RecordType<ClassDescription>({
  properties: {
    name: {type: $Name},
    superName: {type: $Name, optional: true},
    fields: {type: $TypedNames, optional: true},
    constructorParams: {type: $TypedNames, optional: true},
    methods: {type: new ArrayType({itemType: $MethodDescription, maxLength: Infinity}), optional: true},
  },
  changeCase: CaseStyle.SnakeCase,
});

/**
 * Classes of one script, in declaration order.
 */
export interface ModuleDescription {
  classes: ClassDescription[];
}

export const $ModuleDescription: RecordIoType<ModuleDescription> = new RecordType<ModuleDescription>({
  properties: {
    classes: {type: new ArrayType({itemType: $ClassDescription, maxLength: Infinity})},
  },
  changeCase: CaseStyle.SnakeCase,
});

const METHOD_KINDS: ReadonlyMap<string, MethodKind> = new Map([
  ["method", "method"],
  ["getter", "getter"],
  ["setter", "setter"],
]);

function toMethodKind(kind: string): MethodKind {
  const methodKind: MethodKind | undefined = METHOD_KINDS.get(kind);
  if (methodKind === undefined) {
    throw createInvalidMethodKindError(kind);
  }
  return methodKind;
}

function toParams(params: readonly TypedName[] = []): Param[] {
  return params.map(({name, type}: TypedName): Param => [type, name]);
}

/**
 * Generates the ABC records of the described classes.
 */
export function generateModule(description: ModuleDescription, library?: LibraryRegistry): AbcFile {
  const gen: CodeGenerator = new CodeGenerator({library});
  for (const cls of description.classes) {
    gen.withClass(cls.name, cls.superName, (ctx: ClassContext): void => {
      for (const field of cls.fields ?? []) {
        ctx.addInstanceTrait({kind: TraitKind.Slot, name: toQName(field.name), typeName: toMultiname(field.type)});
      }
      gen.withConstructor(toParams(cls.constructorParams), (): void => gen.returnVoid());
      for (const method of cls.methods ?? []) {
        const options: NewMethodOptions = {
          params: toParams(method.params),
          returnType: method.returnType ?? (method.returns !== undefined ? "String" : "void"),
          kind: toMethodKind(method.kind ?? "method"),
          isStatic: method.isStatic ?? false,
        };
        gen.withMethod(method.name, options, (): void => {
          if (method.returns !== undefined) {
            gen.load(method.returns);
            gen.returnValue();
          } else {
            gen.returnVoid();
          }
        });
      }
    });
  }
  gen.finish();
  return gen.abc;
}

export interface TraitSummary {
  kind: "slot" | "method" | "getter" | "setter" | "class";
  name: string;
  override?: boolean;
}

export interface ClassSummary {
  name: string;
  superName: string;
  instanceTraits: TraitSummary[];
  staticTraits: TraitSummary[];
}

export interface ExceptionSummary {
  from: number;
  to: number;
  target: number;
  type: string;
}

export interface BodySummary {
  method: string;
  code: string;
  maxStack: number;
  localCount: number;
  maxScopeDepth: number;
  exceptions: ExceptionSummary[];
}

export interface AbcSummary {
  scripts: TraitSummary[][];
  classes: ClassSummary[];
  methods: number;
  bodies: BodySummary[];
}

const TRAIT_KIND_NAMES: Readonly<Record<TraitKind, TraitSummary["kind"]>> = {
  [TraitKind.Slot]: "slot",
  [TraitKind.Method]: "method",
  [TraitKind.Getter]: "getter",
  [TraitKind.Setter]: "setter",
  [TraitKind.Class]: "class",
};

function summarizeTrait(trait: Trait): TraitSummary {
  const summary: TraitSummary = {kind: TRAIT_KIND_NAMES[trait.kind], name: trait.name.toString()};
  if (trait.kind === TraitKind.Method || trait.kind === TraitKind.Getter || trait.kind === TraitKind.Setter) {
    summary.override = trait.override;
  }
  return summary;
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

function summarizeBody(body: MethodBodyInfo, abc: AbcFile): BodySummary {
  // Assembling resolves the exception offsets.
  const assembled: AssembledCode = body.code.assemble(abc.constants);
  return {
    method: body.method.name,
    code: toHex(assembled.code),
    maxStack: assembled.maxStack,
    localCount: assembled.localCount,
    maxScopeDepth: assembled.maxScopeDepth,
    exceptions: body.exceptions.map(({from, to, target, excType}: ExceptionInfo): ExceptionSummary => ({
      from,
      to,
      target,
      type: excType.toString(),
    })),
  };
}

/**
 * JSON-friendly view of a generated file: traits of each script and class,
 * and the assembled code of each method body as hex.
 */
export function summarizeAbc(abc: AbcFile): AbcSummary {
  return {
    scripts: abc.scripts.items.map(({traits}: ScriptInfo): TraitSummary[] => traits.map(summarizeTrait)),
    classes: abc.instances.items.map((instance: InstanceInfo, i: number): ClassSummary => ({
      name: instance.name.toString(),
      superName: instance.superName.toString(),
      instanceTraits: instance.traits.map(summarizeTrait),
      staticTraits: (abc.classes.get(i)?.traits ?? []).map(summarizeTrait),
    })),
    methods: abc.methods.length,
    bodies: abc.bodies.items.map((body: MethodBodyInfo): BodySummary => summarizeBody(body, abc)),
  };
}
