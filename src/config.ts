import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

// Keyword -> reference price for the critical-activity check.
export const DEFAULT_CRITICAL_ACTIVITIES: Record<string, number> = {
    'EXCAVACION MECANICA': 1000,
    'BASE GRANULAR': 1000,
    'SUBBASE GRANULAR': 1000,
    'ESTABILIZACION DE SUBRASANTE': 4500,
    'ESTABILIZACION CON RAJON': 4500,
    'ESTABILIZACION CON RCD': 4500,
};

const ConfigSchema = z.object({
    baseRoot: z.string().min(1),
    priceDbPath: z.string().min(1),
    ledgerDbPath: z.string().min(1),
    mode: z.enum(['exact', 'keyword']),
    keywordMatch: z.enum(['substring', 'word']),
    criticalActivities: z.record(z.string().min(1), z.number().positive()),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

const FileConfigSchema = ConfigSchema.partial();

export interface LoadConfigOptions {
    configFile?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: Partial<AppConfig>;
}

function defaults(cwd: string): AppConfig {
    const dataDir = path.join(cwd, 'data');
    return {
        baseRoot: dataDir,
        priceDbPath: path.join(dataDir, 'precios_referencia.db'),
        ledgerDbPath: path.join(dataDir, 'ledger.db'),
        mode: 'exact',
        keywordMatch: 'substring',
        criticalActivities: { ...DEFAULT_CRITICAL_ACTIVITIES },
        logLevel: 'info',
    };
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
    const mapped: Record<string, string> = {};
    const pairs: Array<[string, string | undefined]> = [
        ['baseRoot', env.CONTROL_ACTAS_BASE_ROOT],
        ['priceDbPath', env.CONTROL_ACTAS_PRICE_DB],
        ['ledgerDbPath', env.CONTROL_ACTAS_LEDGER_DB],
        ['mode', env.CONTROL_ACTAS_MODE],
        ['keywordMatch', env.CONTROL_ACTAS_KEYWORD_MATCH],
        ['logLevel', env.CONTROL_ACTAS_LOG_LEVEL],
    ];
    for (const [key, value] of pairs) {
        if (value) mapped[key] = value;
    }
    return mapped;
}

function readConfigFile(file: string): z.infer<typeof FileConfigSchema> {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Could not read config file ${file}`, { cause: error });
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${file}: ${parsed.error.message}`);
    }
    return parsed.data;
}

/**
 * Loads the run configuration once: defaults, then the optional JSON file,
 * then environment variables, then explicit overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
    const env = options.env ?? process.env;
    const configFile = options.configFile ?? env.CONTROL_ACTAS_CONFIG;

    const merged = {
        ...defaults(process.cwd()),
        ...(configFile ? readConfigFile(configFile) : {}),
        ...fromEnv(env),
        ...options.overrides,
    };

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration: ${result.error.message}`);
    }
    return Object.freeze(result.data);
}
