/**
 * AST - Typed syntax tree handed to the code generator
 *
 * Produced upstream by parsing and semantic analysis. Every expression carries
 * the type the analyzer determined for it, and call sites carry the overload
 * the analyzer picked.
 */

import type { SymbolEntry, SymbolKind, SymbolScope, TypeCategory } from "./SymbolTable";

export type PrimitiveCategory = "INTEGER" | "REAL" | "BOOLEAN";

export interface StandardTypeNode {
    kind: "StandardType";
    category: PrimitiveCategory;
}

export interface ArrayTypeNode {
    kind: "ArrayType";
    low: number;
    high: number;
    elementType: StandardTypeNode;
}

export type TypeNode = StandardTypeNode | ArrayTypeNode;

/**
 * `var a, b: integer;` - one declaration group
 */
export interface VarDecl {
    kind: "VarDecl";
    names: string[];
    type: TypeNode;
}

export interface ParameterGroup {
    names: string[];
    type: TypeNode;
}

export interface FunctionHead {
    kind: "FunctionHead";
    name: string;
    params: ParameterGroup[];
    returnType: StandardTypeNode;
}

export interface ProcedureHead {
    kind: "ProcedureHead";
    name: string;
    params: ParameterGroup[];
}

export type SubprogramHead = FunctionHead | ProcedureHead;

export interface Subprogram {
    kind: "Subprogram";
    head: SubprogramHead;
    declarations: VarDecl[];
    body: CompoundStatement;
    entry?: SymbolEntry;    // Set by symbol collection; skips the mangled-key lookup
}

export interface Program {
    kind: "Program";
    name: string;
    declarations: VarDecl[];
    subprograms: Subprogram[];
    body: CompoundStatement;
}

// Statements

export interface CompoundStatement {
    kind: "Compound";
    statements: Statement[];
}

export interface AssignStatement {
    kind: "Assign";
    target: VariableNode;
    value: Expression;
}

export interface IfStatement {
    kind: "If";
    condition: Expression;
    thenBranch: Statement;
    elseBranch?: Statement;
}

export interface WhileStatement {
    kind: "While";
    condition: Expression;
    body: Statement;
}

export interface ProcedureCallStatement {
    kind: "ProcedureCall";
    name: string;
    args: Expression[];
    resolvedEntry?: SymbolEntry;
}

export interface ReturnStatement {
    kind: "Return";
    value?: Expression;
}

export type Statement =
    | CompoundStatement
    | AssignStatement
    | IfStatement
    | WhileStatement
    | ProcedureCallStatement
    | ReturnStatement;

// Expressions

/**
 * Variable reference, optionally indexed. Also the target of assignments.
 */
export interface VariableNode {
    kind: "Variable";
    name: string;
    scope: SymbolScope;
    index?: Expression;
    determinedType: TypeCategory;
}

/**
 * Bare identifier in expression position. When the analyzer classified it as
 * a FUNCTION it denotes a call with no arguments.
 */
export interface IdentifierExpression {
    kind: "Identifier";
    name: string;
    scope: SymbolScope;
    symbolKind?: SymbolKind;
    determinedType: TypeCategory;
}

export interface FunctionCallExpression {
    kind: "FunctionCall";
    name: string;
    args: Expression[];
    resolvedEntry?: SymbolEntry;
    determinedType: TypeCategory;
}

export interface IntLiteral {
    kind: "IntLiteral";
    value: number;
    determinedType: TypeCategory;
}

export interface RealLiteral {
    kind: "RealLiteral";
    value: number;
    determinedType: TypeCategory;
}

export interface BooleanLiteral {
    kind: "BooleanLiteral";
    value: boolean;
    determinedType: TypeCategory;
}

export interface StringLiteral {
    kind: "StringLiteral";
    value: string;
    determinedType: TypeCategory;
}

/**
 * `op` is "-" or "not"
 */
export interface UnaryExpression {
    kind: "Unary";
    op: string;
    operand: Expression;
    determinedType: TypeCategory;
}

/**
 * `op` is one of + - * / div = <> < <= > >= and or
 */
export interface BinaryExpression {
    kind: "Binary";
    op: string;
    left: Expression;
    right: Expression;
    determinedType: TypeCategory;
}

export type Expression =
    | VariableNode
    | IdentifierExpression
    | FunctionCallExpression
    | IntLiteral
    | RealLiteral
    | BooleanLiteral
    | StringLiteral
    | UnaryExpression
    | BinaryExpression;

/**
 * Built-in I/O procedures; never looked up in the symbol table
 */
export const BUILTIN_PROCEDURES: ReadonlySet<string> = new Set(["write", "writeln", "read", "readln"]);
