// src/config/index.ts
import path from 'path';

// --- Interfaces ---

export interface StorageConfig {
    readonly ledgerFile: string;
    readonly importReportFile: string;
    readonly clientRegistryFile: string;
}

export interface TimesheetConfig {
    readonly technicianAliasesFile: string;
    /** A save whose total falls below `previousTotal * dropGuardRatio` is rejected */
    readonly dropGuardRatio: number;
    readonly uploadMaxFileMb: number;
}

export interface MatchingConfig {
    readonly fuzzyMinRatio: number;
    readonly fuzzyMinMargin: number;
    readonly prefilterCutoff: number;
    readonly prefilterLimit: number;
    readonly fallbackScanLimit: number;
}

// Define the structure of our main application configuration
export interface AppConfig {
    readonly nodeEnv: 'development' | 'production' | 'test';
    readonly port: number;
    readonly logLevel: 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';
    readonly storage: StorageConfig;
    readonly timesheets: TimesheetConfig;
    readonly matching: MatchingConfig;
}

// src/config -> project root (also holds for dist/config after build)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

// --- Helper Functions ---
function parseIntEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueInt = parseInt(valueStr, 10);
        if (!isNaN(valueInt)) {
            return valueInt;
        }
        throw new Error(`Invalid integer format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${varName}`);
}

function parseFloatEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueFloat = parseFloat(valueStr);
        if (!isNaN(valueFloat)) {
            return valueFloat;
        }
        throw new Error(`Invalid float format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${varName}`);
}

function parseNodeEnv(value: string | undefined): AppConfig['nodeEnv'] {
    if (value === 'production' || value === 'test') return value;
    return 'development';
}

const validLogLevels: ReadonlyArray<AppConfig['logLevel']> = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function parseLogLevel(value: string | undefined, nodeEnv: AppConfig['nodeEnv']): AppConfig['logLevel'] {
    const fallback: AppConfig['logLevel'] = nodeEnv === 'test' ? 'error' : 'info';
    if (!value) return fallback;
    const match = validLogLevels.find(level => level === value);
    if (!match) {
        // Logger is not available yet: it is built from this config
        console.warn(`Invalid LOG_LEVEL: ${value}. Defaulting to '${fallback}'.`);
        return fallback;
    }
    return match;
}

function resolvePathEnv(varName: string, defaultRelative: string): string {
    const valueStr = process.env[varName];
    return path.resolve(valueStr && valueStr.trim() ? valueStr.trim() : path.join(PROJECT_ROOT, defaultRelative));
}

// --- Load, Validate, and Export Configuration ---
const nodeEnv = parseNodeEnv(process.env.NODE_ENV);

const config: AppConfig = {
    nodeEnv,
    port: parseIntEnv('APP_PORT', 3000),
    logLevel: parseLogLevel(process.env.LOG_LEVEL, nodeEnv),

    storage: {
        ledgerFile: resolvePathEnv('LEDGER_FILE', 'storage/timesheet-ledger.json'),
        importReportFile: resolvePathEnv('IMPORT_REPORT_FILE', 'storage/timesheet-import-report.json'),
        clientRegistryFile: resolvePathEnv('CLIENT_REGISTRY_FILE', 'storage/clients.json'),
    },

    timesheets: {
        technicianAliasesFile: resolvePathEnv('TECHNICIAN_ALIASES_FILE', 'data/technician-aliases.json'),
        dropGuardRatio: parseFloatEnv('LEDGER_DROP_GUARD_RATIO', 0.5),
        uploadMaxFileMb: parseIntEnv('UPLOAD_MAX_FILE_MB', 20),
    },

    matching: {
        fuzzyMinRatio: parseFloatEnv('MATCH_FUZZY_MIN_RATIO', 0.92),
        fuzzyMinMargin: parseFloatEnv('MATCH_FUZZY_MIN_MARGIN', 0.03),
        prefilterCutoff: parseFloatEnv('MATCH_PREFILTER_CUTOFF', 0.8),
        prefilterLimit: parseIntEnv('MATCH_PREFILTER_LIMIT', 20),
        fallbackScanLimit: parseIntEnv('MATCH_FALLBACK_SCAN_LIMIT', 200),
    },
};

// --- Validation ---
if (config.timesheets.dropGuardRatio < 0 || config.timesheets.dropGuardRatio > 1) {
    throw new Error(`LEDGER_DROP_GUARD_RATIO must be between 0 and 1, got ${config.timesheets.dropGuardRatio}`);
}

// --- Freeze Configuration ---
Object.freeze(config);
Object.freeze(config.storage);
Object.freeze(config.timesheets);
Object.freeze(config.matching);

/** Lines describing the loaded configuration, logged once at bootstrap. */
export function describeConfig(cfg: AppConfig = config): string[] {
    return [
        `NODE_ENV: ${cfg.nodeEnv}`,
        `PORT: ${cfg.port}`,
        `LOG_LEVEL: ${cfg.logLevel}`,
        `Ledger file: ${cfg.storage.ledgerFile}`,
        `Import report file: ${cfg.storage.importReportFile}`,
        `Client registry file: ${cfg.storage.clientRegistryFile}`,
        `Technician aliases: ${cfg.timesheets.technicianAliasesFile}`,
        `Drop guard ratio: ${cfg.timesheets.dropGuardRatio}`,
        `Fuzzy match: ratio >= ${cfg.matching.fuzzyMinRatio}, margin >= ${cfg.matching.fuzzyMinMargin}`,
    ];
}

// --- Export ---
export default config;
