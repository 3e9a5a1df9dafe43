/**
 * ProgramLoader - Reads a typed AST from a JSON file
 *
 * The file holds the AST exactly as declared in AST.ts, nodes discriminated
 * by their `kind` field. Anything else is rejected with the JSON path of the
 * offending value, e.g. `$.body.statements[2].value.op`.
 */

import * as fs from "fs";
import * as path from "path";
import type {
    ArrayTypeNode,
    CompoundStatement,
    Expression,
    ParameterGroup,
    PrimitiveCategory,
    Program,
    StandardTypeNode,
    Statement,
    Subprogram,
    SubprogramHead,
    TypeNode,
    VarDecl,
    VariableNode,
} from "./AST";
import type { SymbolKind, SymbolScope, TypeCategory } from "./SymbolTable";

type JsonObject = Record<string, unknown>;

const PRIMITIVE_CATEGORIES: readonly PrimitiveCategory[] = ["INTEGER", "REAL", "BOOLEAN"];
const TYPE_CATEGORIES: readonly TypeCategory[] = ["INTEGER", "REAL", "BOOLEAN", "ARRAY", "UNKNOWN"];
const SCOPES: readonly SymbolScope[] = ["GLOBAL", "LOCAL"];
const SYMBOL_KINDS: readonly SymbolKind[] = ["VARIABLE", "PARAMETER", "FUNCTION", "PROCEDURE"];

export class ProgramFormatError extends Error {
    readonly jsonPath: string;

    constructor(jsonPath: string, message: string) {
        super(`${jsonPath}: ${message}`);
        this.name = "ProgramFormatError";
        this.jsonPath = jsonPath;
    }
}

/**
 * Read and validate a program file
 */
export function loadProgram(filePath: string): Program {
    const source = fs.readFileSync(path.resolve(filePath), "utf-8");
    let data: unknown;
    try {
        data = JSON.parse(source);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ProgramFormatError("$", `Invalid JSON: ${reason}`);
    }
    return decodeProgram(data);
}

/**
 * Validate an already parsed JSON value as a program
 */
export function decodeProgram(data: unknown): Program {
    const obj = expectObject(data, "$");
    expectKind(obj, "Program", "$");
    return {
        kind: "Program",
        name: expectString(obj, "name", "$"),
        declarations: expectArray(obj, "declarations", "$").map((d, i) => decodeVarDecl(d, `$.declarations[${i}]`)),
        subprograms: expectArray(obj, "subprograms", "$").map((s, i) => decodeSubprogram(s, `$.subprograms[${i}]`)),
        body: decodeCompound(obj.body, "$.body"),
    };
}

function decodeVarDecl(data: unknown, at: string): VarDecl {
    const obj = expectObject(data, at);
    expectKind(obj, "VarDecl", at);
    return {
        kind: "VarDecl",
        names: expectNames(obj, at),
        type: decodeType(obj.type, `${at}.type`),
    };
}

function decodeType(data: unknown, at: string): TypeNode {
    const obj = expectObject(data, at);
    const kind = expectString(obj, "kind", at);
    if (kind === "StandardType") {
        return decodeStandardType(obj, at);
    }
    if (kind === "ArrayType") {
        const array: ArrayTypeNode = {
            kind: "ArrayType",
            low: expectInteger(obj, "low", at),
            high: expectInteger(obj, "high", at),
            elementType: decodeStandardType(expectObject(obj.elementType, `${at}.elementType`), `${at}.elementType`),
        };
        return array;
    }
    throw new ProgramFormatError(`${at}.kind`, `Unknown type kind "${kind}"`);
}

function decodeStandardType(obj: JsonObject, at: string): StandardTypeNode {
    expectKind(obj, "StandardType", at);
    return {
        kind: "StandardType",
        category: expectOneOf(obj.category, PRIMITIVE_CATEGORIES, `${at}.category`),
    };
}

function decodeSubprogram(data: unknown, at: string): Subprogram {
    const obj = expectObject(data, at);
    expectKind(obj, "Subprogram", at);
    return {
        kind: "Subprogram",
        head: decodeHead(obj.head, `${at}.head`),
        declarations: expectArray(obj, "declarations", at).map((d, i) => decodeVarDecl(d, `${at}.declarations[${i}]`)),
        body: decodeCompound(obj.body, `${at}.body`),
    };
}

function decodeHead(data: unknown, at: string): SubprogramHead {
    const obj = expectObject(data, at);
    const kind = expectString(obj, "kind", at);
    const name = expectString(obj, "name", at);
    const params = expectArray(obj, "params", at).map((p, i) => decodeParameterGroup(p, `${at}.params[${i}]`));

    if (kind === "FunctionHead") {
        const returnType = decodeStandardType(expectObject(obj.returnType, `${at}.returnType`), `${at}.returnType`);
        return { kind: "FunctionHead", name, params, returnType };
    }
    if (kind === "ProcedureHead") {
        return { kind: "ProcedureHead", name, params };
    }
    throw new ProgramFormatError(`${at}.kind`, `Unknown subprogram head kind "${kind}"`);
}

function decodeParameterGroup(data: unknown, at: string): ParameterGroup {
    const obj = expectObject(data, at);
    return {
        names: expectNames(obj, at),
        type: decodeType(obj.type, `${at}.type`),
    };
}

function decodeCompound(data: unknown, at: string): CompoundStatement {
    const obj = expectObject(data, at);
    expectKind(obj, "Compound", at);
    return {
        kind: "Compound",
        statements: expectArray(obj, "statements", at).map((s, i) => decodeStatement(s, `${at}.statements[${i}]`)),
    };
}

function decodeStatement(data: unknown, at: string): Statement {
    const obj = expectObject(data, at);
    const kind = expectString(obj, "kind", at);
    switch (kind) {
        case "Compound":
            return decodeCompound(obj, at);
        case "Assign":
            return {
                kind: "Assign",
                target: decodeVariable(expectObject(obj.target, `${at}.target`), `${at}.target`),
                value: decodeExpression(obj.value, `${at}.value`),
            };
        case "If":
            return {
                kind: "If",
                condition: decodeExpression(obj.condition, `${at}.condition`),
                thenBranch: decodeStatement(obj.thenBranch, `${at}.thenBranch`),
                elseBranch: obj.elseBranch === undefined ? undefined : decodeStatement(obj.elseBranch, `${at}.elseBranch`),
            };
        case "While":
            return {
                kind: "While",
                condition: decodeExpression(obj.condition, `${at}.condition`),
                body: decodeStatement(obj.body, `${at}.body`),
            };
        case "ProcedureCall":
            return {
                kind: "ProcedureCall",
                name: expectString(obj, "name", at),
                args: decodeArguments(obj, at),
            };
        case "Return":
            return {
                kind: "Return",
                value: obj.value === undefined ? undefined : decodeExpression(obj.value, `${at}.value`),
            };
        default:
            throw new ProgramFormatError(`${at}.kind`, `Unknown statement kind "${kind}"`);
    }
}

function decodeVariable(obj: JsonObject, at: string): VariableNode {
    expectKind(obj, "Variable", at);
    return {
        kind: "Variable",
        name: expectString(obj, "name", at),
        scope: expectOneOf(obj.scope, SCOPES, `${at}.scope`),
        index: obj.index === undefined ? undefined : decodeExpression(obj.index, `${at}.index`),
        determinedType: decodeDeterminedType(obj, at),
    };
}

function decodeExpression(data: unknown, at: string): Expression {
    const obj = expectObject(data, at);
    const kind = expectString(obj, "kind", at);
    switch (kind) {
        case "Variable":
            return decodeVariable(obj, at);
        case "Identifier":
            return {
                kind: "Identifier",
                name: expectString(obj, "name", at),
                scope: expectOneOf(obj.scope, SCOPES, `${at}.scope`),
                symbolKind: obj.symbolKind === undefined ? undefined : expectOneOf(obj.symbolKind, SYMBOL_KINDS, `${at}.symbolKind`),
                determinedType: decodeDeterminedType(obj, at),
            };
        case "FunctionCall":
            return {
                kind: "FunctionCall",
                name: expectString(obj, "name", at),
                args: decodeArguments(obj, at),
                determinedType: decodeDeterminedType(obj, at),
            };
        case "IntLiteral":
            return { kind: "IntLiteral", value: expectInteger(obj, "value", at), determinedType: "INTEGER" };
        case "RealLiteral":
            return { kind: "RealLiteral", value: expectNumber(obj, "value", at), determinedType: "REAL" };
        case "BooleanLiteral":
            return { kind: "BooleanLiteral", value: expectBoolean(obj, "value", at), determinedType: "BOOLEAN" };
        case "StringLiteral":
            return { kind: "StringLiteral", value: expectString(obj, "value", at), determinedType: "UNKNOWN" };
        case "Unary":
            return {
                kind: "Unary",
                op: expectString(obj, "op", at),
                operand: decodeExpression(obj.operand, `${at}.operand`),
                determinedType: decodeDeterminedType(obj, at),
            };
        case "Binary":
            return {
                kind: "Binary",
                op: expectString(obj, "op", at),
                left: decodeExpression(obj.left, `${at}.left`),
                right: decodeExpression(obj.right, `${at}.right`),
                determinedType: decodeDeterminedType(obj, at),
            };
        default:
            throw new ProgramFormatError(`${at}.kind`, `Unknown expression kind "${kind}"`);
    }
}

function decodeArguments(obj: JsonObject, at: string): Expression[] {
    return expectArray(obj, "args", at).map((a, i) => decodeExpression(a, `${at}.args[${i}]`));
}

function decodeDeterminedType(obj: JsonObject, at: string): TypeCategory {
    return expectOneOf(obj.determinedType, TYPE_CATEGORIES, `${at}.determinedType`);
}

function expectObject(data: unknown, at: string): JsonObject {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        throw new ProgramFormatError(at, "Expected an object");
    }
    return Object.fromEntries(Object.entries(data));
}

function expectKind(obj: JsonObject, kind: string, at: string): void {
    if (obj.kind !== kind) {
        throw new ProgramFormatError(`${at}.kind`, `Expected "${kind}"`);
    }
}

function expectString(obj: JsonObject, key: string, at: string): string {
    const value = obj[key];
    if (typeof value !== "string") {
        throw new ProgramFormatError(`${at}.${key}`, "Expected a string");
    }
    return value;
}

function expectNumber(obj: JsonObject, key: string, at: string): number {
    const value = obj[key];
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ProgramFormatError(`${at}.${key}`, "Expected a number");
    }
    return value;
}

function expectInteger(obj: JsonObject, key: string, at: string): number {
    const value = expectNumber(obj, key, at);
    if (!Number.isInteger(value)) {
        throw new ProgramFormatError(`${at}.${key}`, "Expected an integer");
    }
    if (!Number.isSafeInteger(value)) {
        throw new ProgramFormatError(`${at}.${key}`, "Integer out of range");
    }
    return value;
}

function expectBoolean(obj: JsonObject, key: string, at: string): boolean {
    const value = obj[key];
    if (typeof value !== "boolean") {
        throw new ProgramFormatError(`${at}.${key}`, "Expected a boolean");
    }
    return value;
}

function expectArray(obj: JsonObject, key: string, at: string): unknown[] {
    const value = obj[key];
    if (!Array.isArray(value)) {
        throw new ProgramFormatError(`${at}.${key}`, "Expected an array");
    }
    return value;
}

function expectNames(obj: JsonObject, at: string): string[] {
    return expectArray(obj, "names", at).map((name, i) => {
        if (typeof name !== "string") {
            throw new ProgramFormatError(`${at}.names[${i}]`, "Expected a string");
        }
        return name;
    });
}

function expectOneOf<T extends string>(value: unknown, allowed: readonly T[], at: string): T {
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
        throw new ProgramFormatError(at, `Expected one of ${allowed.join(", ")}`);
    }
    return match;
}
