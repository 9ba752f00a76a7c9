import * as path from 'path';
import { Period } from '../types/certificate.js';
import {
    AuditEntry,
    CategoryTotals,
    CertificateFailure,
    PeriodResult,
    ReconciliationRecord,
} from '../types/output.js';
import { ResolverMode } from '../types/reference.js';
import { AppConfig } from '../config.js';
import { ControlActasError, describeError } from '../errors.js';
import { createAuditEntry } from '../utils/auditTrail.js';
import { Logger, createLogger } from '../utils/logger.js';
import {
    ProjectLayout,
    listCertificateFiles,
    listPeriodFolders,
    parsePeriodFolder,
    periodLabel,
} from '../utils/periods.js';
import { openPriceStore, loadReferenceEntries } from '../store/priceStore.js';
import { Ledger, openLedger, replacePeriod, getLedgerRecords } from '../store/ledgerStore.js';
import { Resolver, createResolver } from './resolver.js';
import { parseCertificate } from './parser.js';
import { reconcileCertificate } from './reconcile.js';
import { writeCertificateArtifact, writeGlobalSummary, writePeriodSummary } from './artifacts.js';
import { summarizeByContractor, summarizeCategories, summarizeLedger } from './aggregate.js';

export interface RunContext {
    resolver: Resolver;
    ledger: Ledger | null;
    logger: Logger;
}

export interface PeriodInput {
    period: Period;
    certificates: string[];
    outputDir?: string;
    summaryPath?: string;
    globalSummaryPath?: string;
}

export interface RunContextOptions {
    mode?: ResolverMode;
    logger?: Logger;
    withLedger?: boolean;
    /** Ledger file; config.ledgerDbPath when omitted. */
    ledgerPath?: string;
}

/**
 * Builds the resolver once for the whole run. Exact mode snapshots the
 * price database; keyword mode uses the configured critical activities.
 */
export async function createRunContext(config: AppConfig, options: RunContextOptions = {}): Promise<RunContext> {
    const mode = options.mode ?? config.mode;
    const logger = options.logger ?? createLogger({ level: config.logLevel });

    let resolver: Resolver;
    if (mode === 'exact') {
        const store = await openPriceStore(config.priceDbPath);
        resolver = createResolver({ mode, entries: loadReferenceEntries(store) });
    } else {
        resolver = createResolver({ mode, keywords: config.criticalActivities, policy: config.keywordMatch });
    }
    logger.debug(`Resolver ready (${mode}, ${resolver.size} reference keys)`);

    const ledger = options.withLedger === false
        ? null
        : await openLedger(options.ledgerPath ?? config.ledgerDbPath);
    return { resolver, ledger, logger };
}

function failureFrom(file: string, error: unknown, stage: 'parse' | 'write'): CertificateFailure {
    if (error instanceof ControlActasError) {
        return { file, code: error.code, message: error.message };
    }
    return {
        file,
        code: stage === 'write' ? 'artifact-write' : 'unreadable',
        message: describeError(error),
    };
}

/**
 * Processes every certificate of one period, one at a time. A certificate
 * that cannot be read is reported and skipped; a ledger write failure is
 * thrown.
 */
export async function runPeriod(input: PeriodInput, context: RunContext): Promise<PeriodResult> {
    const { period } = input;
    const { resolver, ledger, logger } = context;
    const label = periodLabel(period);

    const records: ReconciliationRecord[] = [];
    const categoryTotals: CategoryTotals[] = [];
    const failures: CertificateFailure[] = [];
    const certificateArtifacts: string[] = [];
    const auditTrail: AuditEntry[] = [];

    logger.info(`Processing ${label}: ${input.certificates.length} certificate(s), ${resolver.mode} mode`);

    for (const filePath of input.certificates) {
        const file = path.basename(filePath);
        let stage: 'parse' | 'write' = 'parse';

        try {
            const certificate = await parseCertificate(filePath);
            const skippedRows = Object.values(certificate.skipped).reduce((sum, n) => sum + n, 0);
            auditTrail.push(createAuditEntry(
                'parse',
                `${certificate.items.length} line items from sheet "${certificate.sheetName}" (${skippedRows} rows skipped), contractor "${certificate.contractor}"`,
                file
            ));

            const reconciliation = reconcileCertificate(certificate, resolver, period);
            const { outcomes } = reconciliation;
            auditTrail.push(createAuditEntry(
                'reconcile',
                `${outcomes.FLAGGED} flagged, ${outcomes.WITHIN_TOLERANCE} within tolerance, ${outcomes.NO_REFERENCE} without reference, ${outcomes.EXCLUDED} excluded`,
                file
            ));

            if (input.outputDir) {
                stage = 'write';
                certificateArtifacts.push(
                    await writeCertificateArtifact(certificate.document, reconciliation, input.outputDir)
                );
            }

            records.push(...reconciliation.records);
            categoryTotals.push(reconciliation.totals);
            logger.success(`Reviewed ${file} (${reconciliation.records.length} flagged)`);
        } catch (error) {
            const failure = failureFrom(file, error, stage);
            failures.push(failure);
            auditTrail.push(createAuditEntry(stage === 'write' ? 'artifact' : 'parse', `skipped: ${failure.message}`, file));
            logger.warn(`Skipping ${file}: ${failure.message}`);
        }
    }

    const contractorSummaries = summarizeByContractor(records);
    const categorySummaries = summarizeCategories(categoryTotals);
    auditTrail.push(createAuditEntry(
        'aggregate',
        `${records.length} flagged records across ${contractorSummaries.length} contractor(s)`
    ));

    let summary: string | null = null;
    if (input.summaryPath) {
        summary = await writePeriodSummary(
            { contractors: contractorSummaries, records, categories: categorySummaries },
            input.summaryPath
        );
    }

    let globalSummary: string | null = null;
    if (ledger) {
        replacePeriod(ledger, period, records, categoryTotals);
        auditTrail.push(createAuditEntry('persist', `ledger period ${label} replaced with ${records.length} records`));

        if (input.globalSummaryPath) {
            const history = getLedgerRecords(ledger);
            globalSummary = await writeGlobalSummary(summarizeLedger(history), history, input.globalSummaryPath);
        }
    }

    const report = {
        found: input.certificates.length,
        processed: input.certificates.length - failures.length,
        failures,
    };
    const reportLine = `${label}: ${report.processed}/${report.found} certificate(s) processed`;
    if (failures.length > 0) {
        logger.warn(reportLine);
    } else {
        logger.success(reportLine);
    }

    return {
        period,
        mode: resolver.mode,
        records,
        categoryTotals,
        contractorSummaries,
        categorySummaries,
        artifacts: { certificates: certificateArtifacts, summary, globalSummary },
        report,
        auditTrail,
    };
}

/**
 * Runs several periods in sequence, each with its own accumulators.
 */
export async function runBatch(inputs: PeriodInput[], context: RunContext): Promise<PeriodResult[]> {
    const results: PeriodResult[] = [];
    for (const input of inputs) {
        results.push(await runPeriod(input, context));
    }
    context.logger.info(`Processed ${results.length} period(s)`);
    return results;
}

export function periodInputFor(layout: ProjectLayout, period: Period): PeriodInput {
    const folder = period.folder ?? `${period.month}${period.year}`;
    return {
        period,
        certificates: listCertificateFiles(path.join(layout.actas, folder)),
        outputDir: path.join(layout.outputs, folder),
        summaryPath: path.join(layout.summaries, folder, `resumen_${folder}.xlsx`),
        globalSummaryPath: path.join(layout.summaries, 'resumen_global.xlsx'),
    };
}

export async function runProjectPeriod(layout: ProjectLayout, folder: string, context: RunContext): Promise<PeriodResult> {
    const period = parsePeriodFolder(folder);
    if (!period) {
        throw new ControlActasError(`Cannot read a year and month from folder "${folder}"`, 'period');
    }
    return runPeriod(periodInputFor(layout, period), context);
}

/**
 * Every month folder of the project, oldest first.
 */
export async function runProject(layout: ProjectLayout, context: RunContext): Promise<PeriodResult[]> {
    const { periods, unrecognized } = listPeriodFolders(layout.actas);
    for (const folder of unrecognized) {
        context.logger.warn(`Ignoring folder without year/month: ${folder}`);
    }
    if (periods.length === 0) {
        context.logger.warn(`No month folders found for project "${layout.project}"`);
        return [];
    }
    return runBatch(periods.map(period => periodInputFor(layout, period)), context);
}
