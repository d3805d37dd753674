/**
 * Thrown when a caller breaks an API contract (null inputs, mismatched
 * arrays, impossible options). Data-quality problems never throw; they are
 * reported as mismatches or input failures on the result.
 */
export class ContractViolationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContractViolationError';
    }
}

export class ConfigurationError extends Error {
    constructor(readonly issues: string[]) {
        super(`Configuration validation failed:\n${issues.join('\n')}`);
        this.name = 'ConfigurationError';
    }
}
