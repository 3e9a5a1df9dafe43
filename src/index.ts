export { CodeGenerator, generateCode, compileToVM, MAIN_ENTRY_LABEL } from "./compiler/CodeGenerator";
export { SymbolTable, mangledNameOf, isSubprogram } from "./compiler/SymbolTable";
export type {
    ArrayDetails,
    SubprogramKind,
    SymbolEntry,
    SymbolKind,
    SymbolScope,
    TypeCategory,
} from "./compiler/SymbolTable";
export { SymbolCollector } from "./compiler/SymbolCollector";
export { TypeMapper } from "./compiler/TypeMapper";
export { Emitter } from "./compiler/Emitter";
export type { Instruction, Mnemonic } from "./compiler/Emitter";
export { Context } from "./compiler/Context";
export { CodeGenError, CodeGenErrorCode, CodeGenErrorMessages } from "./compiler/CodeGenError";
export { loadProgram, decodeProgram, ProgramFormatError } from "./compiler/ProgramLoader";
export * from "./compiler/AST";
