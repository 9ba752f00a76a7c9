import { Category, Period } from './certificate.js';
import { ResolverMode } from './reference.js';

// Output Contract Types
export type Deviation = 'overpaid' | 'underpaid';

export interface ReconciliationRecord {
    year: number;
    month: string;
    sourceFile: string;
    contractor: string;
    itemCode: string;
    description: string;
    unit: string;
    declaredUnitPrice: number;
    referenceUnitPrice: number;
    declaredQuantity: number;
    adjustedValue: number;
    deviation: Deviation;
    mode: ResolverMode;
}

export interface RegisterRow extends ReconciliationRecord {
    paidValue: number;
    discount: number;
}

export type CategoryAmounts = Record<Category, number>;

export interface CategoryTotals extends CategoryAmounts {
    year: number;
    month: string;
    sourceFile: string;
    contractor: string;
    mode: ResolverMode;
}

export interface ContractorSummary {
    contractor: string;
    itemCount: number;
    adjustedTotal: number;
}

export interface ContractorCategorySummary extends CategoryAmounts {
    contractor: string;
}

export interface PeriodContractorSummary extends ContractorSummary {
    year: number;
    month: string;
}

export type ItemState = 'EXCLUDED' | 'NO_REFERENCE' | 'WITHIN_TOLERANCE' | 'FLAGGED';

export interface CellAnnotation {
    row: number;
    column: string;
    deviation: Deviation;
}

export type QuantityTable = Record<Category, number[]>;

export interface CertificateReconciliation {
    sourceFile: string;
    contractor: string;
    records: ReconciliationRecord[];
    totals: CategoryTotals;
    annotations: CellAnnotation[];
    quantities: QuantityTable;
    outcomes: Record<ItemState, number>;
}

export interface CertificateFailure {
    file: string;
    code: string;
    message: string;
}

export interface RunReport {
    found: number;
    processed: number;
    failures: CertificateFailure[];
}

export interface PeriodArtifacts {
    certificates: string[];
    summary: string | null;
    globalSummary: string | null;
}

export type AuditStep = 'parse' | 'reconcile' | 'artifact' | 'aggregate' | 'persist';

export interface AuditEntry {
    step: AuditStep;
    timestamp: string;
    details: string;
    file?: string;
}

export interface PeriodResult {
    period: Period;
    mode: ResolverMode;
    records: ReconciliationRecord[];
    categoryTotals: CategoryTotals[];
    contractorSummaries: ContractorSummary[];
    categorySummaries: ContractorCategorySummary[];
    artifacts: PeriodArtifacts;
    report: RunReport;
    auditTrail: AuditEntry[];
}
