import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import {
    loadConfig,
    reviewProject,
    openPriceStore,
    upsertPrices,
    openLedger,
    getLedgerRecords,
    shutdown,
} from '../src/index.js';
import { PriceInput } from '../src/types/reference.js';
import { PeriodResult } from '../src/types/output.js';
import { CATEGORIES } from '../src/types/certificate.js';
import { CATEGORY_LABELS } from '../src/utils/classify.js';
import { formatAuditEntry } from '../src/utils/auditTrail.js';
import { resolveProjectLayout } from '../src/utils/periods.js';
import { writeCertificate, CertificateRow } from '../fixtures/certificateWorkbook.js';

// ==========================================
// DEMO RUNNER - Certificate price control
// ==========================================

const DIVIDER = '='.repeat(80);
const SECTION = '-'.repeat(80);
const PROJECT = 'Proyecto Demo';
const MONTH_FOLDER = 'actas_julio2025';

interface DemoCertificate {
    file: string;
    contractor: string;
    rows: CertificateRow[];
}

function loadData() {
    const dataDir = path.join(process.cwd(), 'demo', 'data');

    const prices: PriceInput[] = JSON.parse(
        fs.readFileSync(path.join(dataDir, 'reference_prices.json'), 'utf-8')
    );

    const certificates: DemoCertificate[] = JSON.parse(
        fs.readFileSync(path.join(dataDir, 'certificates.json'), 'utf-8')
    );

    return { prices, certificates };
}

function printHeader(text: string) {
    console.log('\n' + chalk.cyan(DIVIDER));
    console.log(chalk.cyan.bold(`  ${text.toUpperCase()}`));
    console.log(chalk.cyan(DIVIDER));
}

function printSubHeader(text: string) {
    console.log('\n' + chalk.yellow(SECTION));
    console.log(chalk.yellow.bold(`  ${text}`));
    console.log(chalk.yellow(SECTION));
}

const money = (value: number) => value.toLocaleString('es-CO', { maximumFractionDigits: 2 });

function printResult(result: PeriodResult) {
    console.log('\n' + chalk.white.bold('Run report:'));
    console.log(chalk.white(`  Certificates found: ${result.report.found}, processed: ${result.report.processed}`));
    result.report.failures.forEach(f => {
        console.log(chalk.red(`  [${f.code}] ${f.file}: ${f.message}`));
    });

    console.log('\n' + chalk.white.bold('Flagged items:'));
    if (result.records.length === 0) {
        console.log(chalk.gray('  (No price deviations)'));
    }
    result.records.forEach(r => {
        const tag = r.deviation === 'overpaid' ? chalk.red('[OVERPAID]') : chalk.blue('[UNDERPAID]');
        console.log(`  ${tag} ${chalk.white(r.itemCode)} ${r.description} (${r.contractor})`);
        console.log(`    ${chalk.gray('Declared:')} ${money(r.declaredUnitPrice)}  ${chalk.gray('Reference:')} ${money(r.referenceUnitPrice)}  ${chalk.gray('Qty:')} ${r.declaredQuantity}`);
        console.log(`    ${chalk.gray('Adjusted value:')} ${chalk.green(money(r.adjustedValue))}`);
    });

    console.log('\n' + chalk.white.bold('Contractor summary:'));
    result.contractorSummaries.forEach(s => {
        console.log(chalk.gray(`  - ${s.contractor}: ${s.itemCount} item(s), adjusted ${money(s.adjustedTotal)}`));
    });

    console.log('\n' + chalk.white.bold('Quantities by category:'));
    result.categorySummaries.forEach(s => {
        const parts = CATEGORIES.map(c => `${CATEGORY_LABELS[c]}: ${s[c]}`);
        console.log(chalk.gray(`  - ${s.contractor}: ${parts.join(', ')}`));
    });

    console.log('\n' + chalk.white.bold('Audit Trail:'));
    result.auditTrail.forEach(entry => {
        const line = formatAuditEntry(entry);
        console.log(chalk.gray(`  ${line.substring(0, 110)}${line.length > 110 ? '...' : ''}`));
    });

    console.log('\n' + chalk.white.bold('Artifacts:'));
    [...result.artifacts.certificates, result.artifacts.summary, result.artifacts.globalSummary]
        .filter((file): file is string => Boolean(file))
        .forEach(file => console.log(chalk.gray(`  ${file}`)));
}

async function main() {
    const baseRoot = path.join(process.cwd(), 'data', 'demo');
    fs.rmSync(baseRoot, { recursive: true, force: true });

    const config = loadConfig({
        overrides: {
            baseRoot,
            priceDbPath: path.join(baseRoot, 'precios_referencia.db'),
        },
    });
    const { prices, certificates } = loadData();

    printHeader('Setting up reference prices and certificates');
    const store = await openPriceStore(config.priceDbPath);
    const changed = upsertPrices(store, prices);
    console.log(chalk.gray(`  ${changed} reference price(s) loaded into ${config.priceDbPath}`));

    const layout = resolveProjectLayout(baseRoot, PROJECT);
    for (const cert of certificates) {
        await writeCertificate(path.join(layout.actas, MONTH_FOLDER), cert.file, {
            contractor: cert.contractor,
            rows: cert.rows,
        });
    }
    // A file without the CORTE sheet, to show the failure report
    await writeCertificate(path.join(layout.actas, MONTH_FOLDER), 'acta_03_sin_corte.xlsx', {
        sheetName: 'RESUMEN',
        rows: [],
    });
    console.log(chalk.gray(`  ${certificates.length + 1} certificate(s) written to ${path.join(layout.actas, MONTH_FOLDER)}`));

    printHeader('Exact mode (reference price database)');
    const exact = await reviewProject(PROJECT, { config, mode: 'exact', folder: MONTH_FOLDER });
    exact.forEach(printResult);

    printSubHeader('Re-running the same month (ledger is replaced, not duplicated)');
    await reviewProject(PROJECT, { config, mode: 'exact', folder: MONTH_FOLDER });
    const ledger = await openLedger(layout.ledger);
    console.log(chalk.white(`  Ledger records after two runs: ${getLedgerRecords(ledger).length}`));

    printHeader('Critical mode (keyword table)');
    const critical = await reviewProject(PROJECT, { config, mode: 'keyword', folder: MONTH_FOLDER });
    critical.forEach(printResult);

    shutdown();
    console.log('\n' + chalk.green.bold('Demo complete.'));
}

main().catch(error => {
    console.error(chalk.red('Demo failed:'), error);
    shutdown();
    process.exitCode = 1;
});
