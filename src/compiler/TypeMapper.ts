import type { ArrayTypeNode, SubprogramHead, TypeNode } from "./AST";
import type { Instruction } from "./Emitter";
import type { ArrayDetails, SubprogramKind, TypeCategory } from "./SymbolTable";
import { CodeGenError, CodeGenErrorCode } from "./CodeGenError";

/**
 * TypeMapper - Type categories, name mangling and operator selection
 */
export class TypeMapper {
    /**
     * Map a declared type node to its symbol table category
     */
    static categoryOf(type: TypeNode): TypeCategory {
        if (type.kind === "ArrayType") {
            return "ARRAY";
        }
        return type.category;
    }

    /**
     * Bounds and element type of an array type. Bounds are taken as written.
     */
    static arrayDetailsOf(type: ArrayTypeNode): ArrayDetails {
        return {
            lowBound: type.low,
            highBound: type.high,
            elementType: type.elementType.category,
        };
    }

    /**
     * One-letter code used in mangled names
     */
    static typeCode(category: TypeCategory): string {
        switch (category) {
            case "INTEGER":
                return "i";
            case "REAL":
                return "r";
            case "BOOLEAN":
                return "b";
            case "ARRAY":
                return "a";
            default:
                return "u";
        }
    }

    /**
     * Mangled key of a subprogram, e.g. `f_max_i_i` or `p_show_r`
     */
    static mangle(kind: SubprogramKind, name: string, parameterTypes: readonly TypeCategory[]): string {
        const prefix = kind === "FUNCTION" ? "f_" : "p_";
        const suffix = parameterTypes.map(t => "_" + this.typeCode(t)).join("");
        return prefix + name + suffix;
    }

    /**
     * Parameter categories of a head in declaration order, one per name
     */
    static parameterTypesOf(head: SubprogramHead): TypeCategory[] {
        const types: TypeCategory[] = [];
        for (const group of head.params) {
            const category = this.categoryOf(group.type);
            for (let i = 0; i < group.names.length; i++) {
                types.push(category);
            }
        }
        return types;
    }

    /**
     * Rebuild the mangled key from a subprogram's own declaration
     */
    static mangleHead(head: SubprogramHead): string {
        const kind: SubprogramKind = head.kind === "FunctionHead" ? "FUNCTION" : "PROCEDURE";
        return this.mangle(kind, head.name, this.parameterTypesOf(head));
    }

    static isFloat(category: TypeCategory): boolean {
        return category === "REAL";
    }

    /**
     * Whether a binary operation runs on reals. `and`/`or` are always integer
     * arithmetic over the 0/1 boolean encoding.
     */
    static isRealOperation(op: string, left: TypeCategory, right: TypeCategory): boolean {
        if (op === "and" || op === "or") {
            return false;
        }
        return this.isFloat(left) || this.isFloat(right) || op === "/";
    }

    /**
     * Instructions that combine the two operands on top of the stack
     */
    static getBinaryOp(op: string, isReal: boolean): Instruction[] {
        switch (op) {
            case "+":
                return [{ mnemonic: isReal ? "fadd" : "add" }];
            case "-":
                return [{ mnemonic: isReal ? "fsub" : "sub" }];
            case "*":
                return [{ mnemonic: isReal ? "fmul" : "mul" }];
            case "/":
                return [{ mnemonic: "fdiv" }];
            case "div":
                return [{ mnemonic: "div" }];
            case "=":
                return [{ mnemonic: "equal" }];
            case "<>":
                return [{ mnemonic: "equal" }, { mnemonic: "not" }];
            case "<":
                return [{ mnemonic: isReal ? "finf" : "inf" }];
            case "<=":
                return [{ mnemonic: isReal ? "finfeq" : "infeq" }];
            case ">":
                return [{ mnemonic: isReal ? "fsup" : "sup" }];
            case ">=":
                return [{ mnemonic: isReal ? "fsupeq" : "supeq" }];
            case "and":
                return [{ mnemonic: "mul" }];
            case "or":
                return [{ mnemonic: "add" }, { mnemonic: "pushi", operand: 0 }, { mnemonic: "sup" }];
            default:
                throw new CodeGenError(CodeGenErrorCode.UNSUPPORTED_OPERATOR, `'${op}'`);
        }
    }
}
