import type { SourceSpan } from '../syntax/position';

/** Base class of every error thrown by parsing or analysis. */
export abstract class AnalysisError extends Error {
    public abstract readonly code: string;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ParseError extends AnalysisError {
    public readonly code = 'parse';

    constructor(message: string, public readonly fileName: string, public readonly span: SourceSpan) {
        super(`${fileName}:${span.startPosition.line + 1}:${span.startPosition.character + 1}: ${message}`);
    }
}

/** A scope declaration that cannot be satisfied, e.g. `nonlocal` without an enclosing function. */
export class ScopeError extends AnalysisError {
    public readonly code = 'scope';

    constructor(message: string, public readonly variableName: string, public readonly span: SourceSpan) {
        super(`${span.startPosition.line + 1}:${span.startPosition.character + 1}: ${message}`);
    }
}

export class ConfigurationError extends AnalysisError {
    public readonly code = 'configuration';

    constructor(message: string, public readonly issues: readonly string[] = []) {
        super(issues.length === 0 ? message : `${message}: ${issues.join('; ')}`);
    }
}
