/**
 * Typed failures raised by proof operations.
 * Surfaces (MCP, HTTP) map the kind to their own error shapes.
 */

export type ProofErrorKind = "not_found" | "invalid_input" | "unauthorized" | "unprocessable";

export class ProofError extends Error {
    readonly kind: ProofErrorKind;

    constructor(kind: ProofErrorKind, message: string) {
        super(message);
        this.name = "ProofError";
        this.kind = kind;
    }
}

export function isProofError(error: unknown): error is ProofError {
    return error instanceof ProofError;
}

/**
 * HTTP status for each error kind
 */
export const HTTP_STATUS_BY_KIND: Record<ProofErrorKind, number> = {
    not_found: 404,
    invalid_input: 400,
    unauthorized: 401,
    unprocessable: 422,
};
