import { AppConfig, loadConfig } from './config.js';
import { ResolverMode } from './types/reference.js';
import { PeriodResult } from './types/output.js';
import { Logger } from './utils/logger.js';
import { resolveProjectLayout } from './utils/periods.js';
import { closeAllDatabases } from './db/connection.js';
import { createRunContext, runProject, runProjectPeriod } from './services/batch.js';

export interface ProjectRunOptions {
    config?: AppConfig;
    mode?: ResolverMode;
    logger?: Logger;
    /** Single month folder; all month folders when omitted. */
    folder?: string;
}

/**
 * Reviews the certificates of a project folder tree and updates the
 * project's own ledger.
 */
export async function reviewProject(project: string, options: ProjectRunOptions = {}): Promise<PeriodResult[]> {
    const config = options.config ?? loadConfig();
    const layout = resolveProjectLayout(config.baseRoot, project);
    const context = await createRunContext(config, {
        mode: options.mode,
        logger: options.logger,
        ledgerPath: layout.ledger,
    });

    if (options.folder) {
        return [await runProjectPeriod(layout, options.folder, context)];
    }
    return runProject(layout, context);
}

/**
 * Close database connections
 */
export function shutdown(): void {
    closeAllDatabases();
}

// Export all types
export * from './types/index.js';
export * from './errors.js';
export { loadConfig, DEFAULT_CRITICAL_ACTIVITIES } from './config.js';
export type { AppConfig, LoadConfigOptions } from './config.js';
export { normalizeText, normalizeUnit } from './utils/normalize.js';
export { classifyActivity, CATEGORY_LABELS } from './utils/classify.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { parsePeriodFolder, listPeriodFolders, resolveProjectLayout, makePeriod } from './utils/periods.js';
export type { ProjectLayout } from './utils/periods.js';
export { ExactModeResolver, KeywordModeResolver, createResolver } from './services/resolver.js';
export type { Resolver, ResolverSource } from './services/resolver.js';
export { parseCertificate, parseWorkbook } from './services/parser.js';
export { reconcileCertificate, reconcileLineItem, PRICE_TOLERANCE } from './services/reconcile.js';
export type { ItemOutcome } from './services/reconcile.js';
export { writeCertificateArtifact, writePeriodSummary, writeGlobalSummary } from './services/artifacts.js';
export { summarizeByContractor, summarizeCategories, summarizeLedger, toRegisterRow } from './services/aggregate.js';
export { createRunContext, runPeriod, runBatch, runProject, runProjectPeriod } from './services/batch.js';
export type { RunContext, RunContextOptions, PeriodInput } from './services/batch.js';
export { openPriceStore, loadReferenceEntries, upsertPrices, removeActivity, getPriceLog, checkIntegrity } from './store/priceStore.js';
export type { PriceStore } from './store/priceStore.js';
export { openLedger, replacePeriod, getLedgerRecords, getLedgerCategoryTotals, listLedgerPeriods } from './store/ledgerStore.js';
export type { Ledger } from './store/ledgerStore.js';
