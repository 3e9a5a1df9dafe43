import { describe, expect, it } from "vitest";

import type { SubprogramHead } from "../src/compiler/AST";
import { CodeGenError } from "../src/compiler/CodeGenError";
import { TypeMapper } from "../src/compiler/TypeMapper";
import { BOOLEAN, INTEGER, REAL, arrayOf } from "./builders";

describe("TypeMapper", () => {
    it("maps type nodes to categories", () => {
        expect(TypeMapper.categoryOf(REAL)).toBe("REAL");
        expect(TypeMapper.categoryOf(arrayOf(1, 3))).toBe("ARRAY");
    });

    it("extracts array bounds as written", () => {
        expect(TypeMapper.arrayDetailsOf({
            kind: "ArrayType",
            low: -3,
            high: 3,
            elementType: REAL,
        })).toEqual({ lowBound: -3, highBound: 3, elementType: "REAL" });
    });

    it("mangles names with one letter per parameter", () => {
        expect(TypeMapper.mangle("FUNCTION", "f", [])).toBe("f_f");
        expect(TypeMapper.mangle("PROCEDURE", "p", ["INTEGER", "REAL", "BOOLEAN", "ARRAY", "UNKNOWN"])).toBe(
            "p_p_i_r_b_a_u"
        );
    });

    it("expands parameter groups into one type per name", () => {
        const head: SubprogramHead = {
            kind: "FunctionHead",
            name: "mix",
            params: [
                { names: ["a", "b"], type: INTEGER },
                { names: ["flag"], type: BOOLEAN },
                { names: ["xs"], type: arrayOf(0, 1) },
            ],
            returnType: REAL,
        };

        expect(TypeMapper.parameterTypesOf(head)).toEqual(["INTEGER", "INTEGER", "BOOLEAN", "ARRAY"]);
        expect(TypeMapper.mangleHead(head)).toBe("f_mix_i_i_b_a");
    });

    it("treats / and any real operand as a real operation, but never and/or", () => {
        expect(TypeMapper.isRealOperation("+", "INTEGER", "INTEGER")).toBe(false);
        expect(TypeMapper.isRealOperation("+", "INTEGER", "REAL")).toBe(true);
        expect(TypeMapper.isRealOperation("/", "INTEGER", "INTEGER")).toBe(true);
        expect(TypeMapper.isRealOperation("or", "REAL", "REAL")).toBe(false);
    });

    it("returns instruction sequences for operators", () => {
        expect(TypeMapper.getBinaryOp("<>", false)).toEqual([{ mnemonic: "equal" }, { mnemonic: "not" }]);
        expect(TypeMapper.getBinaryOp("or", false)).toEqual([
            { mnemonic: "add" },
            { mnemonic: "pushi", operand: 0 },
            { mnemonic: "sup" },
        ]);
        expect(TypeMapper.getBinaryOp("div", true)).toEqual([{ mnemonic: "div" }]);
    });

    it("throws on operators it does not know", () => {
        expect(() => TypeMapper.getBinaryOp("xor", false)).toThrow(CodeGenError);
    });
});
