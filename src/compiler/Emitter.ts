/**
 * Emitter - Stack machine assembly text builder
 *
 * Every instruction is one line, indented four spaces, with at most one
 * operand. Labels sit in column zero.
 */

export type Mnemonic =
    | "start" | "stop"
    | "jump" | "jz"
    | "pushn" | "pop"
    | "pusha" | "call" | "return"
    | "pushg" | "pushl" | "storeg" | "storel"
    | "alloc" | "load" | "store" | "loadn" | "storen"
    | "pushi" | "pushf" | "pushs"
    | "itof" | "swap"
    | "add" | "sub" | "mul" | "div"
    | "fadd" | "fsub" | "fmul" | "fdiv"
    | "equal" | "not"
    | "inf" | "infeq" | "sup" | "supeq"
    | "finf" | "finfeq" | "fsup" | "fsupeq"
    | "writei" | "writef" | "writes";

export interface Instruction {
    mnemonic: Mnemonic;
    operand?: string | number;
}

export class Emitter {
    private buffer: string[] = [];

    /**
     * Append an instruction line
     */
    emit(mnemonic: Mnemonic, operand?: string | number): void {
        if (operand === undefined) {
            this.buffer.push(`    ${mnemonic}`);
        } else {
            this.buffer.push(`    ${mnemonic} ${operand}`);
        }
    }

    /**
     * Append a sequence of instructions in order
     */
    emitAll(instructions: Instruction[]): void {
        for (const instruction of instructions) {
            this.emit(instruction.mnemonic, instruction.operand);
        }
    }

    /**
     * Emit a label line
     */
    emitLabel(label: string): void {
        this.buffer.push(`${label}:`);
    }

    /**
     * Lines emitted so far, without trailing newlines
     */
    getLines(): readonly string[] {
        return this.buffer;
    }

    /**
     * Get the complete listing, one newline-terminated line per entry
     */
    getOutput(): string {
        return this.buffer.map(line => line + "\n").join("");
    }
}
