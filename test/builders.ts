import type {
    AssignStatement,
    BinaryExpression,
    CompoundStatement,
    Expression,
    FunctionCallExpression,
    IdentifierExpression,
    IfStatement,
    PrimitiveCategory,
    ProcedureCallStatement,
    Program,
    ReturnStatement,
    StandardTypeNode,
    Statement,
    Subprogram,
    TypeNode,
    UnaryExpression,
    VarDecl,
    VariableNode,
    WhileStatement,
} from "../src/compiler/AST";
import type { SymbolScope, TypeCategory } from "../src/compiler/SymbolTable";
import { generateCode } from "../src/compiler/CodeGenerator";
import { SymbolCollector } from "../src/compiler/SymbolCollector";

export const INTEGER: StandardTypeNode = { kind: "StandardType", category: "INTEGER" };
export const REAL: StandardTypeNode = { kind: "StandardType", category: "REAL" };
export const BOOLEAN: StandardTypeNode = { kind: "StandardType", category: "BOOLEAN" };

export function arrayOf(low: number, high: number, element: PrimitiveCategory = "INTEGER"): TypeNode {
    return { kind: "ArrayType", low, high, elementType: { kind: "StandardType", category: element } };
}

export function varDecl(names: string[], type: TypeNode): VarDecl {
    return { kind: "VarDecl", names, type };
}

export function program(
    declarations: VarDecl[],
    body: Statement[],
    subprograms: Subprogram[] = []
): Program {
    return { kind: "Program", name: "test", declarations, subprograms, body: block(...body) };
}

export function fn(
    name: string,
    params: [string[], TypeNode][],
    returnType: StandardTypeNode,
    declarations: VarDecl[],
    body: Statement[]
): Subprogram {
    return {
        kind: "Subprogram",
        head: { kind: "FunctionHead", name, params: params.map(([names, type]) => ({ names, type })), returnType },
        declarations,
        body: block(...body),
    };
}

export function proc(
    name: string,
    params: [string[], TypeNode][],
    declarations: VarDecl[],
    body: Statement[]
): Subprogram {
    return {
        kind: "Subprogram",
        head: { kind: "ProcedureHead", name, params: params.map(([names, type]) => ({ names, type })) },
        declarations,
        body: block(...body),
    };
}

// Statements

export function block(...statements: Statement[]): CompoundStatement {
    return { kind: "Compound", statements };
}

export function assign(target: VariableNode, value: Expression): AssignStatement {
    return { kind: "Assign", target, value };
}

export function ifThen(condition: Expression, thenBranch: Statement, elseBranch?: Statement): IfStatement {
    return { kind: "If", condition, thenBranch, elseBranch };
}

export function whileDo(condition: Expression, body: Statement): WhileStatement {
    return { kind: "While", condition, body };
}

export function call(name: string, ...args: Expression[]): ProcedureCallStatement {
    return { kind: "ProcedureCall", name, args };
}

export function ret(value?: Expression): ReturnStatement {
    return { kind: "Return", value };
}

// Expressions

export function global(name: string, type: TypeCategory = "INTEGER", index?: Expression): VariableNode {
    return { kind: "Variable", name, scope: "GLOBAL", index, determinedType: type };
}

export function local(name: string, type: TypeCategory = "INTEGER", index?: Expression): VariableNode {
    return { kind: "Variable", name, scope: "LOCAL", index, determinedType: type };
}

export function ident(name: string, type: TypeCategory = "INTEGER", scope: SymbolScope = "LOCAL"): IdentifierExpression {
    return { kind: "Identifier", name, scope, determinedType: type };
}

export function fnRef(name: string, type: TypeCategory = "INTEGER"): IdentifierExpression {
    return { kind: "Identifier", name, scope: "GLOBAL", symbolKind: "FUNCTION", determinedType: type };
}

export function callFn(name: string, type: TypeCategory, ...args: Expression[]): FunctionCallExpression {
    return { kind: "FunctionCall", name, args, determinedType: type };
}

export function int(value: number): Expression {
    return { kind: "IntLiteral", value, determinedType: "INTEGER" };
}

export function real(value: number): Expression {
    return { kind: "RealLiteral", value, determinedType: "REAL" };
}

export function bool(value: boolean): Expression {
    return { kind: "BooleanLiteral", value, determinedType: "BOOLEAN" };
}

export function str(value: string): Expression {
    return { kind: "StringLiteral", value, determinedType: "UNKNOWN" };
}

export function unary(op: string, operand: Expression, type: TypeCategory = operand.determinedType): UnaryExpression {
    return { kind: "Unary", op, operand, determinedType: type };
}

export function binary(op: string, left: Expression, right: Expression, type: TypeCategory = "INTEGER"): BinaryExpression {
    return { kind: "Binary", op, left, right, determinedType: type };
}

/**
 * Listing split into lines, without the trailing empty line
 */
export function lines(output: string): string[] {
    return output.split("\n").slice(0, -1);
}

/**
 * Collect symbols and generate, returning the listing lines
 */
export function compile(p: Program): string[] {
    return lines(generateCode(p, new SymbolCollector().collect(p)));
}
