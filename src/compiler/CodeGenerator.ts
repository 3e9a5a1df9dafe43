import type {
    AssignStatement,
    CompoundStatement,
    Expression,
    FunctionCallExpression,
    IdentifierExpression,
    IfStatement,
    ParameterGroup,
    ProcedureCallStatement,
    Program,
    ReturnStatement,
    Statement,
    Subprogram,
    VarDecl,
    VariableNode,
    UnaryExpression,
    BinaryExpression,
    WhileStatement,
} from "./AST";
import { Emitter } from "./Emitter";
import { Context } from "./Context";
import { TypeMapper } from "./TypeMapper";
import { SymbolTable, mangledNameOf } from "./SymbolTable";
import type { ArrayDetails, SymbolEntry, SymbolScope } from "./SymbolTable";
import { CodeGenError, CodeGenErrorCode } from "./CodeGenError";
import { loadProgram } from "./ProgramLoader";
import { SymbolCollector } from "./SymbolCollector";

export const MAIN_ENTRY_LABEL = "main_entry";

/**
 * CodeGenerator - Walks a type-checked AST and emits stack machine assembly
 *
 * Subprograms are emitted first, each guarded by a jump over its body, then
 * the `main_entry` label, global storage and the main block.
 */
export class CodeGenerator {
    private emitter: Emitter;
    private context: Context;
    private symbolTable: SymbolTable;

    constructor(symbolTable: SymbolTable, emitter?: Emitter) {
        this.symbolTable = symbolTable;
        this.emitter = emitter || new Emitter();
        this.context = new Context();
    }

    /**
     * Generate the whole program and return the listing
     */
    generate(program: Program): string {
        this.visitProgram(program);
        return this.emitter.getOutput();
    }

    private visitProgram(node: Program): void {
        this.emitter.emit("start");
        if (node.subprograms.length > 0) {
            this.emitter.emit("jump", MAIN_ENTRY_LABEL);
        }
        for (const subprogram of node.subprograms) {
            this.visitSubprogram(subprogram);
        }
        this.emitter.emitLabel(MAIN_ENTRY_LABEL);
        this.visitDeclarations(node.declarations);
        this.visitCompound(node.body);
        this.emitter.emit("stop");
    }

    /**
     * Process a declaration list. Globals get one reservation for the whole
     * list; locals get one per declaration group (see visitVarDecl).
     */
    private visitDeclarations(declarations: VarDecl[]): void {
        if (this.symbolTable.isGlobalScope()) {
            let varCount = 0;
            for (const decl of declarations) {
                if (decl.type.kind === "ArrayType") continue;
                varCount += decl.names.length;
            }
            if (varCount > 0) {
                this.emitter.emit("pushn", varCount);
            }
        }
        for (const decl of declarations) {
            this.visitVarDecl(decl);
        }
    }

    /**
     * Process one declaration group: local registration and reservation, and
     * allocation of array storage in either scope
     */
    private visitVarDecl(node: VarDecl): void {
        const isGlobal = this.symbolTable.isGlobalScope();
        let arrayDetails: ArrayDetails | undefined;
        if (node.type.kind === "ArrayType") {
            arrayDetails = TypeMapper.arrayDetailsOf(node.type);
            if (arrayDetails.highBound - arrayDetails.lowBound + 1 <= 0) {
                throw new CodeGenError(
                    CodeGenErrorCode.INVALID_ARRAY_BOUNDS,
                    `${node.names.join(", ")} [${arrayDetails.lowBound}..${arrayDetails.highBound}]`
                );
            }
        }

        if (!isGlobal) {
            const category = TypeMapper.categoryOf(node.type);
            for (const name of node.names) {
                // Arrays take a slot too; it holds the handle
                this.symbolTable.declareVariable(name, category, this.context.nextLocalOffset(), arrayDetails);
            }
            if (!arrayDetails && node.names.length > 0) {
                this.emitter.emit("pushn", node.names.length);
            }
        }

        if (arrayDetails) {
            const size = arrayDetails.highBound - arrayDetails.lowBound + 1;
            for (const name of node.names) {
                const entry = this.resolve(name, "array allocation");
                this.emitter.emit("alloc", size);
                this.emitter.emit(isGlobal ? "storeg" : "storel", entry.offset);
            }
        }
    }

    /**
     * Process a function or procedure definition
     */
    private visitSubprogram(node: Subprogram): void {
        const entry = node.entry ?? this.symbolTable.lookupSubprogram(TypeMapper.mangleHead(node.head));
        if (!entry) {
            throw new CodeGenError(CodeGenErrorCode.UNRESOLVED_SYMBOL, `subprogram ${node.head.name}`);
        }

        this.context.withSubprogram(entry, () => {
            const mangledName = mangledNameOf(entry);
            const endLabel = `${mangledName}_end`;

            this.emitter.emit("jump", endLabel);
            this.emitter.emitLabel(mangledName);

            this.symbolTable.enterScope();
            try {
                this.visitParameters(node.head.params);
                this.visitDeclarations(node.declarations);
                this.visitCompound(node.body);
            } finally {
                this.symbolTable.exitScope();
            }

            // Functions end with an explicit return statement
            if (node.head.kind === "ProcedureHead") {
                this.emitter.emit("return");
            }
            this.emitter.emitLabel(endLabel);
        });
    }

    /**
     * Register the formal parameters in the subprogram's fresh scope
     */
    private visitParameters(groups: ParameterGroup[]): void {
        for (const group of groups) {
            const category = TypeMapper.categoryOf(group.type);
            const arrayDetails = group.type.kind === "ArrayType" ? TypeMapper.arrayDetailsOf(group.type) : undefined;
            for (const name of group.names) {
                this.symbolTable.declareParameter(name, category, this.context.nextParamOffset(), arrayDetails);
            }
        }
    }

    private visitStatement(node: Statement): void {
        switch (node.kind) {
            case "Compound":
                return this.visitCompound(node);
            case "Assign":
                return this.visitAssign(node);
            case "If":
                return this.visitIf(node);
            case "While":
                return this.visitWhile(node);
            case "ProcedureCall":
                return this.visitProcedureCall(node);
            case "Return":
                return this.visitReturn(node);
            default: {
                const unhandled: never = node;
                return unhandled;
            }
        }
    }

    private visitCompound(node: CompoundStatement): void {
        for (const statement of node.statements) {
            this.visitStatement(statement);
        }
    }

    /**
     * Process an assignment to a variable or an array element
     */
    private visitAssign(node: AssignStatement): void {
        const target = node.target;
        const needsConversion = target.determinedType === "REAL" && node.value.determinedType === "INTEGER";

        if (target.index) {
            const entry = this.resolve(target.name, "assignment");
            const { lowBound } = this.arrayDetailsFor(entry);
            this.pushSlot(entry, target.scope);

            if (target.index.kind === "IntLiteral") {
                this.visitExpression(node.value);
                if (needsConversion) this.emitter.emit("itof");
                this.emitter.emit("store", target.index.value - lowBound);
            } else {
                this.visitExpression(target.index);
                this.emitter.emit("pushi", lowBound);
                this.emitter.emit("sub");
                this.visitExpression(node.value);
                if (needsConversion) this.emitter.emit("itof");
                this.emitter.emit("storen");
            }
            return;
        }

        this.visitExpression(node.value);
        if (needsConversion) {
            this.emitter.emit("itof");
        }
        const entry = this.resolve(target.name, "assignment");
        this.storeSlot(entry, target.scope);
    }

    /**
     * Process an if statement
     *
     * Generates:
     *     <condition>
     *     jz L_ELSE_n
     *     <then>
     *     jump L_END_IF_m      (only with an else branch)
     * L_ELSE_n:
     *     <else>
     * L_END_IF_m:
     */
    private visitIf(node: IfStatement): void {
        const elseLabel = this.context.nextLabel("ELSE");
        const endLabel = this.context.nextLabel("END_IF");

        this.visitExpression(node.condition);
        this.emitter.emit("jz", elseLabel);
        this.visitStatement(node.thenBranch);
        if (node.elseBranch) {
            this.emitter.emit("jump", endLabel);
        }
        this.emitter.emitLabel(elseLabel);
        if (node.elseBranch) {
            this.visitStatement(node.elseBranch);
        }
        this.emitter.emitLabel(endLabel);
    }

    private visitWhile(node: WhileStatement): void {
        const startLabel = this.context.nextLabel("WHILE_START");
        const endLabel = this.context.nextLabel("WHILE_END");

        this.emitter.emitLabel(startLabel);
        this.visitExpression(node.condition);
        this.emitter.emit("jz", endLabel);
        this.visitStatement(node.body);
        this.emitter.emit("jump", startLabel);
        this.emitter.emitLabel(endLabel);
    }

    /**
     * Process a procedure call: built-in output or a user-defined procedure
     */
    private visitProcedureCall(node: ProcedureCallStatement): void {
        if (node.name === "write" || node.name === "writeln") {
            for (const arg of node.args) {
                this.visitExpression(arg);
                if (arg.kind === "StringLiteral") {
                    this.emitter.emit("writes");
                } else if (arg.determinedType === "INTEGER" || arg.determinedType === "BOOLEAN") {
                    this.emitter.emit("writei");
                } else if (arg.determinedType === "REAL") {
                    this.emitter.emit("writef");
                }
            }
            if (node.name === "writeln") {
                this.emitter.emit("pushs", quoteString("\n"));
                this.emitter.emit("writes");
            }
            return;
        }
        if (node.name === "read" || node.name === "readln") {
            // Input is not generated
            return;
        }

        if (!node.resolvedEntry) {
            throw new CodeGenError(CodeGenErrorCode.UNRESOLVED_CALL, `procedure '${node.name}'`);
        }
        this.emitCall(node.resolvedEntry, node.args);
    }

    /**
     * Process a return statement. A value goes to the slot reserved by the
     * caller beneath all parameters.
     */
    private visitReturn(node: ReturnStatement): void {
        if (node.value) {
            const entry = this.context.currentSubprogram;
            if (!entry) {
                throw new CodeGenError(CodeGenErrorCode.MISSING_SUBPROGRAM_CONTEXT);
            }
            this.visitExpression(node.value);
            if (entry.functionReturnType === "REAL" && node.value.determinedType === "INTEGER") {
                this.emitter.emit("itof");
            }
            this.emitter.emit("storel", -(entry.numParameters + 1));
        }
        this.emitter.emit("return");
    }

    private visitExpression(node: Expression): void {
        switch (node.kind) {
            case "Variable":
                return this.visitVariable(node);
            case "Identifier":
                return this.visitIdentifier(node);
            case "FunctionCall":
                return this.visitFunctionCall(node);
            case "IntLiteral":
                return this.emitter.emit("pushi", node.value);
            case "RealLiteral":
                return this.emitter.emit("pushf", formatReal(node.value));
            case "BooleanLiteral":
                return this.emitter.emit("pushi", node.value ? 1 : 0);
            case "StringLiteral":
                return this.emitter.emit("pushs", quoteString(node.value));
            case "Unary":
                return this.visitUnary(node);
            case "Binary":
                return this.visitBinary(node);
            default: {
                const unhandled: never = node;
                return unhandled;
            }
        }
    }

    /**
     * Push the value of a variable or of one array element
     */
    private visitVariable(node: VariableNode): void {
        const entry = this.resolve(node.name, "variable reference");
        if (!node.index) {
            this.pushSlot(entry, node.scope);
            return;
        }

        const { lowBound } = this.arrayDetailsFor(entry);
        this.pushSlot(entry, node.scope);
        if (node.index.kind === "IntLiteral") {
            this.emitter.emit("load", node.index.value - lowBound);
        } else {
            this.visitExpression(node.index);
            this.emitter.emit("pushi", lowBound);
            this.emitter.emit("sub");
            this.emitter.emit("loadn");
        }
    }

    private visitIdentifier(node: IdentifierExpression): void {
        if (node.symbolKind === "FUNCTION") {
            // Bare function name: call with no arguments
            this.emitter.emit("pushn", 1);
            this.emitter.emit("pusha", TypeMapper.mangle("FUNCTION", node.name, []));
            this.emitter.emit("call");
            return;
        }
        const entry = this.resolve(node.name, "identifier");
        this.pushSlot(entry, node.scope);
    }

    /**
     * Reserve the return slot, call, and leave the result on the stack
     */
    private visitFunctionCall(node: FunctionCallExpression): void {
        if (!node.resolvedEntry) {
            throw new CodeGenError(CodeGenErrorCode.UNRESOLVED_CALL, `function '${node.name}'`);
        }
        this.emitter.emit("pushn", 1);
        this.emitCall(node.resolvedEntry, node.args);
    }

    private visitUnary(node: UnaryExpression): void {
        this.visitExpression(node.operand);
        switch (node.op) {
            case "-":
                if (node.operand.determinedType === "REAL") {
                    this.emitter.emit("pushf", "0.0");
                    this.emitter.emit("swap");
                    this.emitter.emit("fsub");
                } else {
                    this.emitter.emit("pushi", 0);
                    this.emitter.emit("swap");
                    this.emitter.emit("sub");
                }
                return;
            case "not":
                this.emitter.emit("not");
                return;
            default:
                throw new CodeGenError(CodeGenErrorCode.UNSUPPORTED_OPERATOR, `unary '${node.op}'`);
        }
    }

    /**
     * Evaluate both operands, promoting integers when the operation is real
     */
    private visitBinary(node: BinaryExpression): void {
        const isReal = TypeMapper.isRealOperation(node.op, node.left.determinedType, node.right.determinedType);

        this.visitExpression(node.left);
        if (isReal && node.left.determinedType === "INTEGER") {
            this.emitter.emit("itof");
        }
        this.visitExpression(node.right);
        if (isReal && node.right.determinedType === "INTEGER") {
            this.emitter.emit("itof");
        }

        this.emitter.emitAll(TypeMapper.getBinaryOp(node.op, isReal));
    }

    /**
     * Push arguments last-to-first, call, and drop the arguments afterwards
     */
    private emitCall(target: SymbolEntry, args: Expression[]): void {
        for (let i = args.length - 1; i >= 0; i--) {
            this.visitExpression(args[i]);
        }
        this.emitter.emit("pusha", mangledNameOf(target));
        this.emitter.emit("call");
        if (target.numParameters > 0) {
            this.emitter.emit("pop", target.numParameters);
        }
    }

    /**
     * Push a variable's slot. Parameters live below the frame base.
     */
    private pushSlot(entry: SymbolEntry, scope: SymbolScope): void {
        if (entry.kind === "PARAMETER") {
            this.emitter.emit("pushl", -(entry.offset + 1));
        } else if (scope === "LOCAL") {
            this.emitter.emit("pushl", entry.offset);
        } else {
            this.emitter.emit("pushg", entry.offset);
        }
    }

    private storeSlot(entry: SymbolEntry, scope: SymbolScope): void {
        if (entry.kind === "PARAMETER") {
            this.emitter.emit("storel", -(entry.offset + 1));
        } else if (scope === "LOCAL") {
            this.emitter.emit("storel", entry.offset);
        } else {
            this.emitter.emit("storeg", entry.offset);
        }
    }

    private resolve(name: string, site: string): SymbolEntry {
        const entry = this.symbolTable.lookupSymbol(name);
        if (!entry) {
            throw new CodeGenError(CodeGenErrorCode.UNRESOLVED_SYMBOL, `${name} (${site})`);
        }
        return entry;
    }

    private arrayDetailsFor(entry: SymbolEntry): ArrayDetails {
        if (!entry.arrayDetails) {
            throw new CodeGenError(CodeGenErrorCode.MISSING_ARRAY_METADATA, entry.name);
        }
        return entry.arrayDetails;
    }
}

/**
 * Six fractional digits, e.g. `2.500000`, never in exponent form
 */
function formatReal(value: number): string {
    if (Number.isFinite(value) && Math.abs(value) >= 1e21) {
        // toFixed switches to exponent notation here; such doubles are whole numbers
        return `${BigInt(value)}.000000`;
    }
    return value.toFixed(6);
}

function quoteString(value: string): string {
    const escaped = value
        .replace(/\\/g, "\\\\")
        .replace(/"/g, '\\"')
        .replace(/\n/g, "\\n")
        .replace(/\r/g, "\\r")
        .replace(/\t/g, "\\t");
    return `"${escaped}"`;
}

/**
 * Generate code for a program whose symbol table is already populated
 */
export function generateCode(program: Program, symbolTable: SymbolTable): string {
    return new CodeGenerator(symbolTable).generate(program);
}

/**
 * Load a typed AST from a JSON file, collect its symbols and generate code
 */
export function compileToVM(inputPath: string): string {
    const program = loadProgram(inputPath);
    const symbolTable = new SymbolCollector().collect(program);
    return generateCode(program, symbolTable);
}
