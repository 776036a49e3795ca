/**
 * Error types
 *
 * ParseError: malformed Newick, callers skip the tree and continue the batch.
 * ClassifierError: unusable target set for one classification.
 * StructuralError: a pruning request the engine refuses (root deletion in strict mode).
 * UsageError: bad command-line input.
 */

export type CladekitErrorCode = 'parse' | 'classifier' | 'structural' | 'usage';

export class CladekitError extends Error {
    readonly code: CladekitErrorCode;

    constructor(code: CladekitErrorCode, message: string) {
        super(message);
        this.name = 'CladekitError';
        this.code = code;
    }
}

export class ParseError extends CladekitError {
    /** Character offset in the statement where parsing stopped */
    readonly position: number;

    constructor(message: string, position: number) {
        super('parse', `${message} (at ${position})`);
        this.name = 'ParseError';
        this.position = position;
    }
}

export class ClassifierError extends CladekitError {
    constructor(message: string) {
        super('classifier', message);
        this.name = 'ClassifierError';
    }
}

export class StructuralError extends CladekitError {
    constructor(message: string) {
        super('structural', message);
        this.name = 'StructuralError';
    }
}

export class UsageError extends CladekitError {
    constructor(message: string) {
        super('usage', message);
        this.name = 'UsageError';
    }
}

export function isParseError(err: unknown): err is ParseError {
    return err instanceof ParseError;
}
