/**
 * SymbolTable - Scoped mapping from identifiers to symbol entries
 *
 * Variables and parameters are keyed by their declared name, subprograms by
 * their mangled name so that overloads can coexist in one scope. The two live
 * in separate maps: a variable named `p_x` and `procedure x` never collide.
 */

import { TypeMapper } from "./TypeMapper";

export type SymbolKind = "VARIABLE" | "PARAMETER" | "FUNCTION" | "PROCEDURE";
export type TypeCategory = "INTEGER" | "REAL" | "BOOLEAN" | "ARRAY" | "UNKNOWN";
export type SymbolScope = "GLOBAL" | "LOCAL";

export interface ArrayDetails {
    lowBound: number;
    highBound: number;
    elementType: TypeCategory;
}

export interface SymbolEntry {
    readonly name: string;
    readonly kind: SymbolKind;
    readonly typeCategory: TypeCategory;
    readonly scope: SymbolScope;
    readonly offset: number;                        // Global/local slot, or parameter index
    readonly arrayDetails?: ArrayDetails;           // Present iff typeCategory is ARRAY
    readonly numParameters: number;
    readonly parameterTypes: readonly TypeCategory[];
    readonly functionReturnType?: TypeCategory;     // FUNCTION only
}

export type SubprogramKind = "FUNCTION" | "PROCEDURE";

export function isSubprogram(entry: SymbolEntry): boolean {
    return entry.kind === "FUNCTION" || entry.kind === "PROCEDURE";
}

/**
 * Entry label of a subprogram, e.g. `f_max_i_i`
 */
export function mangledNameOf(entry: SymbolEntry): string {
    const kind: SubprogramKind = entry.kind === "FUNCTION" ? "FUNCTION" : "PROCEDURE";
    return TypeMapper.mangle(kind, entry.name, entry.parameterTypes);
}

interface Scope {
    variables: Map<string, SymbolEntry>;
    subprograms: Map<string, SymbolEntry>;
}

export class SymbolTable {
    private scopes: Scope[] = [];

    constructor() {
        // Start with global scope
        this.enterScope();
    }

    /**
     * Push a new scope (entering a subprogram)
     */
    enterScope(): void {
        this.scopes.push({ variables: new Map(), subprograms: new Map() });
    }

    /**
     * Pop the current scope, discarding its entries. The global scope is never popped.
     */
    exitScope(): void {
        if (this.scopes.length > 1) {
            this.scopes.pop();
        }
    }

    isGlobalScope(): boolean {
        return this.scopes.length === 1;
    }

    /**
     * Register an entry in the current scope, replacing any entry of the same
     * family (variable or subprogram) with the same key there
     */
    addSymbol(entry: SymbolEntry): SymbolEntry {
        const scope = this.currentScope();
        if (isSubprogram(entry)) {
            scope.subprograms.set(mangledNameOf(entry), entry);
        } else {
            scope.variables.set(entry.name, entry);
        }
        return entry;
    }

    /**
     * Look up a variable or parameter by name, innermost scope first
     */
    lookupSymbol(name: string): SymbolEntry | undefined {
        for (let i = this.scopes.length - 1; i >= 0; i--) {
            const entry = this.scopes[i].variables.get(name);
            if (entry) {
                return entry;
            }
        }
        return undefined;
    }

    /**
     * Look up a function or procedure by mangled key, innermost scope first
     */
    lookupSubprogram(mangledName: string): SymbolEntry | undefined {
        for (let i = this.scopes.length - 1; i >= 0; i--) {
            const entry = this.scopes[i].subprograms.get(mangledName);
            if (entry) {
                return entry;
            }
        }
        return undefined;
    }

    /**
     * Declare a variable in the current scope at a fixed slot
     */
    declareVariable(
        name: string,
        typeCategory: TypeCategory,
        offset: number,
        arrayDetails?: ArrayDetails
    ): SymbolEntry {
        return this.addSymbol({
            name,
            kind: "VARIABLE",
            typeCategory,
            scope: this.currentScopeKind(),
            offset,
            arrayDetails,
            numParameters: 0,
            parameterTypes: [],
        });
    }

    /**
     * Declare a formal parameter; `offset` is its index in the parameter list
     */
    declareParameter(
        name: string,
        typeCategory: TypeCategory,
        offset: number,
        arrayDetails?: ArrayDetails
    ): SymbolEntry {
        return this.addSymbol({
            name,
            kind: "PARAMETER",
            typeCategory,
            scope: "LOCAL",
            offset,
            arrayDetails,
            numParameters: 0,
            parameterTypes: [],
        });
    }

    /**
     * Declare a function or procedure under its mangled key
     */
    declareSubprogram(
        kind: SubprogramKind,
        name: string,
        parameterTypes: TypeCategory[],
        returnType?: TypeCategory
    ): SymbolEntry {
        const isFunction = kind === "FUNCTION";
        return this.addSymbol({
            name,
            kind,
            typeCategory: isFunction && returnType ? returnType : "UNKNOWN",
            scope: this.currentScopeKind(),
            offset: 0,
            numParameters: parameterTypes.length,
            parameterTypes,
            functionReturnType: isFunction ? returnType ?? "UNKNOWN" : undefined,
        });
    }

    private currentScopeKind(): SymbolScope {
        return this.isGlobalScope() ? "GLOBAL" : "LOCAL";
    }

    private currentScope(): Scope {
        return this.scopes[this.scopes.length - 1];
    }
}
