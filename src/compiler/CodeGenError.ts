/**
 * CodeGenError - Contract violations between the generator and its upstream collaborators
 */

export enum CodeGenErrorCode {
    UNRESOLVED_SYMBOL = "CG001",
    UNRESOLVED_CALL = "CG002",
    MISSING_ARRAY_METADATA = "CG003",
    INVALID_ARRAY_BOUNDS = "CG004",
    MISSING_SUBPROGRAM_CONTEXT = "CG005",
    UNSUPPORTED_OPERATOR = "CG006",
}

export const CodeGenErrorMessages: Record<CodeGenErrorCode, string> = {
    [CodeGenErrorCode.UNRESOLVED_SYMBOL]: "Symbol not found",
    [CodeGenErrorCode.UNRESOLVED_CALL]: "Call was not resolved by semantic analysis",
    [CodeGenErrorCode.MISSING_ARRAY_METADATA]: "Array details not found",
    [CodeGenErrorCode.INVALID_ARRAY_BOUNDS]: "Array size must be positive",
    [CodeGenErrorCode.MISSING_SUBPROGRAM_CONTEXT]: "Return with a value outside any subprogram",
    [CodeGenErrorCode.UNSUPPORTED_OPERATOR]: "Unsupported operator",
};

export class CodeGenError extends Error {
    readonly code: CodeGenErrorCode;

    constructor(code: CodeGenErrorCode, detail?: string) {
        const baseMessage = CodeGenErrorMessages[code];
        super(detail ? `CodeGen: ${baseMessage}: ${detail}` : `CodeGen: ${baseMessage}`);
        this.name = "CodeGenError";
        this.code = code;
    }
}
