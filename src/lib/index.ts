export * from "./errors.js";
export * from "./bitstream/index.js";

export { AbcFile, IndexedTable, TraitKind } from "./avm2/abc-file.js";
export type {
  ClassInfo,
  ClassTrait,
  ExceptionInfo,
  InstanceInfo,
  MethodBodyInfo,
  MethodInfo,
  MethodTrait,
  ScriptInfo,
  SlotTrait,
  Trait,
} from "./avm2/abc-file.js";
export { CodeAssembler } from "./avm2/assembler.js";
export type { AssembledCode } from "./avm2/assembler.js";
export { ClassContext, GlobalContext, MethodContext, ScriptContext } from "./avm2/codegen/contexts.js";
export type { ClassRecords, Context, MethodKind, NewMethodOptions, Param, TypeRef } from "./avm2/codegen/contexts.js";
export { CodeGenerator } from "./avm2/codegen/generator.js";
export type { CallOptions, CodeGeneratorOptions } from "./avm2/codegen/generator.js";
export { Argument, isLoadable, Local, LoadableRegistry } from "./avm2/codegen/loadable.js";
export type { Loadable, LoadAdapter, Mapping } from "./avm2/codegen/loadable.js";
export { ConstantPool } from "./avm2/constant-pool.js";
export {
  addExceptionInfo,
  beginTry,
  createInstruction,
  endTry,
  InstructionType,
  label,
  OPCODES,
  OperandType,
} from "./avm2/instructions.js";
export type { Instruction, OpcodeInfo, OpInstruction, Operand, TryRegionOwner } from "./avm2/instructions.js";
export { ClassDesc, Library, LibraryRegistry, PackageNode } from "./avm2/library.js";
export type { ClassShape } from "./avm2/library.js";
export { $ClassDocument, $LibraryDocument } from "./avm2/library-document.js";
export type { ClassDocument, LibraryDocument } from "./avm2/library-document.js";
export { $ModuleDescription, generateModule, summarizeAbc } from "./avm2/module-description.js";
export type { AbcSummary, ClassDescription, MethodDescription, ModuleDescription } from "./avm2/module-description.js";
export {
  ANY_NAME,
  AnyName,
  isNamed,
  Namespace,
  NamespaceKind,
  packagedQName,
  parseQName,
  PUBLIC_NAMESPACE,
  QName,
  toMultiname,
  toQName,
} from "./avm2/qname.js";
export type { Multiname, Named } from "./avm2/qname.js";
export { deserializeU32, emitS24, emitU32, parseS24, parseU32, serializeU32, u32Size, U32_MAX } from "./avm2/u32.js";
