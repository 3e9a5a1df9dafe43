/**
 * Context - Generation-time state for one traversal
 *
 * Tracks the label counter, the offset counters of the subprogram being
 * generated, and which subprogram that is.
 */

import type { SymbolEntry } from "./SymbolTable";

export class Context {
    private labelCounter: number = 0;
    private localOffset: number = 0;
    private paramOffset: number = 0;
    private current: SymbolEntry | undefined;

    /**
     * Generate a unique control-flow label, e.g. `L_ELSE_0`. Never reset.
     */
    nextLabel(prefix: string): string {
        return `L_${prefix}_${this.labelCounter++}`;
    }

    /**
     * Next free local slot
     */
    nextLocalOffset(): number {
        return this.localOffset++;
    }

    /**
     * Next free parameter index
     */
    nextParamOffset(): number {
        return this.paramOffset++;
    }

    /**
     * The entry of the subprogram being generated, if any
     */
    get currentSubprogram(): SymbolEntry | undefined {
        return this.current;
    }

    /**
     * Run `body` with `entry` as the current subprogram and fresh offset
     * counters, then restore the enclosing subprogram
     */
    withSubprogram<T>(entry: SymbolEntry, body: () => T): T {
        const previous = this.current;
        this.current = entry;
        this.localOffset = 0;
        this.paramOffset = 0;
        try {
            return body();
        } finally {
            this.current = previous;
        }
    }
}
