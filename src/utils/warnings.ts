import { getLogger } from './logger.js';

export type DiagnosticKind =
    | 'MalformedRecord'
    | 'DuplicateRecord'
    | 'KnownRecord'
    | 'OutOfRange'
    | 'AmbiguousIdentity';

export interface Diagnostic {
    kind: DiagnosticKind;
    message: string;
    /** Record id or name the diagnostic is about, when there is one */
    subject: string | null;
    details?: Record<string, unknown>;
}

// Expected during normal runs; the others deserve a human look.
const QUIET_KINDS: ReadonlySet<DiagnosticKind> = new Set(['DuplicateRecord', 'KnownRecord', 'OutOfRange']);

/**
 * Accumulates non-fatal diagnostics for a run and mirrors each one to the log.
 */
export class WarningCollector {
    private readonly entries: Diagnostic[] = [];

    add(kind: DiagnosticKind, message: string, subject: string | null = null, details?: Record<string, unknown>): void {
        const diagnostic: Diagnostic = { kind, message, subject, ...(details ? { details } : {}) };
        this.entries.push(diagnostic);

        const logger = getLogger();
        if (QUIET_KINDS.has(kind)) {
            logger.debug({ kind, subject, ...details }, message);
        } else {
            logger.warn({ kind, subject, ...details }, message);
        }
    }

    /**
     * Take over another collector's entries (already logged by it).
     */
    absorb(other: WarningCollector): void {
        this.entries.push(...other.list());
    }

    list(kind?: DiagnosticKind): Diagnostic[] {
        return kind ? this.entries.filter((d) => d.kind === kind) : [...this.entries];
    }

    count(kind?: DiagnosticKind): number {
        return kind ? this.list(kind).length : this.entries.length;
    }

    /**
     * Diagnostic counts keyed by kind, for run summaries.
     */
    summary(): Partial<Record<DiagnosticKind, number>> {
        const result: Partial<Record<DiagnosticKind, number>> = {};
        for (const entry of this.entries) {
            result[entry.kind] = (result[entry.kind] ?? 0) + 1;
        }
        return result;
    }
}
