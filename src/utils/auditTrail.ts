import { AuditEntry, AuditStep } from '../types/output.js';

export function createAuditEntry(step: AuditStep, details: string, file?: string): AuditEntry {
    return {
        step,
        timestamp: new Date().toISOString(),
        details,
        file,
    };
}

export function formatAuditEntry(entry: AuditEntry): string {
    const scope = entry.file ? ` ${entry.file}:` : '';
    return `[${entry.step.toUpperCase()}]${scope} ${entry.details}`;
}
