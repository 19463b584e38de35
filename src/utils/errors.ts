/**
 * Errors that abort an aggregation run. Problems with individual records are
 * diagnostics (see warnings.ts), never exceptions.
 */
export class AggregationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A derived count disagrees with the set it is derived from.
 * Indicates a bug in merge logic, not bad input.
 */
export class InvariantViolationError extends AggregationError {
    constructor(
        readonly categoryKey: string,
        readonly field: 'facultyCount' | 'departmentCount',
        readonly expected: number,
        readonly actual: number
    ) {
        super(`${field} of "${categoryKey}" is ${actual}, but its backing set holds ${expected}`);
    }
}

/**
 * An operation was invoked in a phase that does not allow it,
 * e.g. refinement before the raw pass is sealed.
 */
export class PhaseError extends AggregationError {
    constructor(operation: string, phase: string, allowed: readonly string[]) {
        super(`${operation} is not allowed in phase "${phase}" (allowed: ${allowed.join(', ')})`);
    }
}
