export class ControlActasError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type CertificateFailureReason = 'missing-sheet' | 'missing-columns' | 'unreadable';

/**
 * A certificate that cannot be read. Recoverable: the batch skips the file.
 */
export class CertificateParseError extends ControlActasError {
    constructor(
        public readonly file: string,
        public readonly reason: CertificateFailureReason,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, reason, options);
    }
}

/**
 * The ledger could not be persisted. Fatal for the run.
 */
export class LedgerWriteError extends ControlActasError {
    constructor(public readonly path: string, options?: { cause?: unknown }) {
        super(`Could not write ledger database at ${path}`, 'ledger-write', options);
    }
}

export class ConfigError extends ControlActasError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'config', options);
    }
}

export class PriceStoreError extends ControlActasError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'price-store', options);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
