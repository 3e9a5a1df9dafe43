/**
 * SymbolCollector - Populates a symbol table from a typed AST
 *
 * Does what the generator expects of semantic analysis, and nothing more:
 * - global variables get slots in declaration order (an array's slot holds its handle)
 * - subprograms are registered under their mangled keys
 * - call sites get the overload they resolve to
 *
 * No type checking happens here; `determinedType` is trusted as given.
 */

import type { Expression, Program, Statement, Subprogram } from "./AST";
import { BUILTIN_PROCEDURES } from "./AST";
import { TypeMapper } from "./TypeMapper";
import { SymbolTable } from "./SymbolTable";
import type { SubprogramKind, SymbolEntry, TypeCategory } from "./SymbolTable";

export class SymbolCollector {
    private symbolTable: SymbolTable;
    private subprograms: SymbolEntry[] = [];
    private globalOffset: number = 0;

    constructor(symbolTable?: SymbolTable) {
        this.symbolTable = symbolTable || new SymbolTable();
    }

    /**
     * Register every global declaration and resolve every call in the program
     */
    collect(program: Program): SymbolTable {
        for (const decl of program.declarations) {
            const category = TypeMapper.categoryOf(decl.type);
            const arrayDetails = decl.type.kind === "ArrayType" ? TypeMapper.arrayDetailsOf(decl.type) : undefined;
            for (const name of decl.names) {
                this.symbolTable.declareVariable(name, category, this.globalOffset++, arrayDetails);
            }
        }

        for (const subprogram of program.subprograms) {
            this.registerSubprogram(subprogram);
        }

        for (const subprogram of program.subprograms) {
            this.visitStatement(subprogram.body);
        }
        this.visitStatement(program.body);

        return this.symbolTable;
    }

    private registerSubprogram(node: Subprogram): void {
        const head = node.head;
        const parameterTypes = TypeMapper.parameterTypesOf(head);
        const entry = head.kind === "FunctionHead"
            ? this.symbolTable.declareSubprogram("FUNCTION", head.name, parameterTypes, head.returnType.category)
            : this.symbolTable.declareSubprogram("PROCEDURE", head.name, parameterTypes);
        this.subprograms.push(entry);
        node.entry = entry;
    }

    /**
     * Find the overload for a call: the exact signature first, otherwise the
     * only candidate whose parameters accept the arguments with integer-to-real
     * promotion
     */
    resolveCall(kind: SubprogramKind, name: string, argTypes: TypeCategory[]): SymbolEntry | undefined {
        const exact = this.symbolTable.lookupSubprogram(TypeMapper.mangle(kind, name, argTypes));
        if (exact) {
            return exact;
        }

        const candidates = this.subprograms.filter(entry =>
            entry.kind === kind &&
            entry.name === name &&
            entry.numParameters === argTypes.length &&
            entry.parameterTypes.every((paramType, i) =>
                paramType === argTypes[i] || (paramType === "REAL" && argTypes[i] === "INTEGER")
            )
        );
        return candidates.length === 1 ? candidates[0] : undefined;
    }

    private visitStatement(node: Statement): void {
        switch (node.kind) {
            case "Compound":
                for (const statement of node.statements) {
                    this.visitStatement(statement);
                }
                return;
            case "Assign":
                if (node.target.index) this.visitExpression(node.target.index);
                this.visitExpression(node.value);
                return;
            case "If":
                this.visitExpression(node.condition);
                this.visitStatement(node.thenBranch);
                if (node.elseBranch) this.visitStatement(node.elseBranch);
                return;
            case "While":
                this.visitExpression(node.condition);
                this.visitStatement(node.body);
                return;
            case "ProcedureCall":
                node.args.forEach(arg => this.visitExpression(arg));
                if (!BUILTIN_PROCEDURES.has(node.name)) {
                    node.resolvedEntry = this.resolveCall("PROCEDURE", node.name, node.args.map(arg => arg.determinedType));
                }
                return;
            case "Return":
                if (node.value) this.visitExpression(node.value);
                return;
        }
    }

    private visitExpression(node: Expression): void {
        switch (node.kind) {
            case "Variable":
                if (node.index) this.visitExpression(node.index);
                return;
            case "FunctionCall":
                node.args.forEach(arg => this.visitExpression(arg));
                node.resolvedEntry = this.resolveCall("FUNCTION", node.name, node.args.map(arg => arg.determinedType));
                return;
            case "Unary":
                this.visitExpression(node.operand);
                return;
            case "Binary":
                this.visitExpression(node.left);
                this.visitExpression(node.right);
                return;
            default:
                return;
        }
    }
}
