export interface ValidationIssue {
    path: string;
    message: string;
}

/**
 * Raised while building the reaction table. Fatal to startup: an engine with
 * an inconsistent table must not resolve damage.
 */
export class ConfigurationError extends Error {
    issues: ValidationIssue[];
    constructor(message: string, issues: ValidationIssue[] = []) {
        super(message);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

export class ContractValidationError extends ConfigurationError {
    constructor(kind: 'ReactionPack', issues: ValidationIssue[]) {
        super(`${kind} validation failed:\n${issues.map(i => `${i.path}: ${i.message}`).join('\n')}`, issues);
        this.name = 'ContractValidationError';
    }
}

export class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

export class OutOfRangeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'OutOfRangeError';
    }
}
