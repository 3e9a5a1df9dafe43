import { describe, expect, it } from "vitest";

import type { FunctionCallExpression, ProcedureCallStatement } from "../src/compiler/AST";
import { SymbolCollector } from "../src/compiler/SymbolCollector";
import {
    INTEGER,
    REAL,
    arrayOf,
    assign,
    call,
    callFn,
    fn,
    global,
    int,
    proc,
    program,
    real,
    ret,
    varDecl,
} from "./builders";

describe("SymbolCollector", () => {
    it("gives globals consecutive offsets, arrays included", () => {
        const p = program([varDecl(["x", "y"], INTEGER), varDecl(["a"], arrayOf(1, 3)), varDecl(["z"], REAL)], []);
        const table = new SymbolCollector().collect(p);

        expect(table.lookupSymbol("x")?.offset).toBe(0);
        expect(table.lookupSymbol("y")?.offset).toBe(1);
        expect(table.lookupSymbol("a")?.offset).toBe(2);
        expect(table.lookupSymbol("a")?.arrayDetails).toEqual({ lowBound: 1, highBound: 3, elementType: "INTEGER" });
        expect(table.lookupSymbol("z")?.offset).toBe(3);
        expect(table.lookupSymbol("z")?.scope).toBe("GLOBAL");
    });

    it("registers subprograms and links each definition to its entry", () => {
        const max = fn("max", [[["a", "b"], INTEGER]], INTEGER, [], [ret(int(0))]);
        const log = proc("log", [[["v"], REAL]], [], []);
        const table = new SymbolCollector().collect(program([], [], [max, log]));

        expect(max.entry).toBe(table.lookupSubprogram("f_max_i_i"));
        expect(max.entry?.functionReturnType).toBe("INTEGER");
        expect(log.entry).toBe(table.lookupSubprogram("p_log_r"));
    });

    it("resolves calls by exact signature", () => {
        const statement: ProcedureCallStatement = call("log", real(1));
        const p = program([], [statement], [proc("log", [[["v"], REAL]], [], [])]);
        new SymbolCollector().collect(p);

        expect(statement.resolvedEntry?.name).toBe("log");
        expect(statement.resolvedEntry?.parameterTypes).toEqual(["REAL"]);
    });

    it("promotes integer arguments when there is a single matching overload", () => {
        const expr: FunctionCallExpression = callFn("half", "REAL", int(4));
        const p = program(
            [varDecl(["r"], REAL)],
            [assign(global("r", "REAL"), expr)],
            [fn("half", [[["x"], REAL]], REAL, [], [ret(real(0))])]
        );
        new SymbolCollector().collect(p);

        expect(expr.resolvedEntry?.parameterTypes).toEqual(["REAL"]);
    });

    it("leaves an ambiguous promoted call unresolved", () => {
        const collector = new SymbolCollector();
        collector.collect(program([], [], [
            proc("pair", [[["a"], REAL], [["b"], INTEGER]], [], []),
            proc("pair", [[["a"], INTEGER], [["b"], REAL]], [], []),
        ]));

        expect(collector.resolveCall("PROCEDURE", "pair", ["INTEGER", "INTEGER"])).toBeUndefined();
        expect(collector.resolveCall("PROCEDURE", "pair", ["INTEGER", "REAL"])?.parameterTypes).toEqual([
            "INTEGER",
            "REAL",
        ]);
    });

    it("does not match a procedure for a function call", () => {
        const collector = new SymbolCollector();
        collector.collect(program([], [], [proc("go", [], [], [])]));
        expect(collector.resolveCall("FUNCTION", "go", [])).toBeUndefined();
    });

    it("resolves calls nested in subprogram bodies and arguments", () => {
        const inner = callFn("sq", "INTEGER", int(2));
        const outer = callFn("sq", "INTEGER", inner);
        const p = program(
            [],
            [],
            [
                fn("sq", [[["n"], INTEGER]], INTEGER, [], [ret(int(0))]),
                proc("show", [], [], [call("write", outer)]),
            ]
        );
        new SymbolCollector().collect(p);

        expect(outer.resolvedEntry?.name).toBe("sq");
        expect(inner.resolvedEntry?.name).toBe("sq");
    });

    it("never resolves a call to a variable sharing the mangled key", () => {
        const collector = new SymbolCollector();
        collector.collect(program([varDecl(["p_go"], INTEGER)], []));
        expect(collector.resolveCall("PROCEDURE", "go", [])).toBeUndefined();
    });

    it("leaves built-in procedures alone", () => {
        const statement = call("writeln", int(1));
        new SymbolCollector().collect(program([], [statement]));
        expect(statement.resolvedEntry).toBeUndefined();
    });
});
