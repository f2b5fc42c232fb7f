// src/config/index.ts
import path from 'path';
import { ConfigurationError } from '../core/common/errors';

// --- Interfaces ---

type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

// Define the structure for Database Configuration (used by the database mapping store)
interface DatabaseConfig {
    readonly type: 'mssql'; // Currently fixed to mssql
    readonly host: string;
    readonly port: number;
    readonly username: string;
    readonly password?: string;
    readonly database: string;
    readonly synchronize: boolean;
    readonly logging: boolean;
}

// Define the structure of our main application configuration
interface AppConfig {
    readonly nodeEnv: 'development' | 'production' | 'test';
    readonly port: number;
    readonly logLevel: LogLevel;
    readonly reconciliation: {
        readonly keyFields: readonly string[];
        /** null means "every field the supplier row carries" */
        readonly inputFields: readonly string[] | null;
        readonly ambiguityPolicy: 'first' | 'review';
    };
    readonly mapping: {
        readonly similarityThreshold: number;
        readonly store: 'file' | 'database';
        readonly directory: string;
        readonly vocabularyFile: string;
        readonly staticMappingsFile: string;
    };
    readonly offers: {
        readonly discountRate: number;
        readonly priceField: string;
        readonly codeField: string;
        readonly descriptionField: string;
    };
    readonly upload: {
        readonly maxFileSizeMb: number;
    };
    readonly sessions: {
        /** Idle time after which a price list session is dropped */
        readonly ttlMinutes: number;
    };
    readonly database: DatabaseConfig;
}

// src/config and dist/config both sit two levels below the project root
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

// --- Helper Functions ---
function parseIntEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueInt = parseInt(valueStr, 10);
        if (!isNaN(valueInt)) {
            return valueInt;
        }
        throw new ConfigurationError(`Invalid integer format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function parseFloatEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueFloat = parseFloat(valueStr);
        if (!isNaN(valueFloat)) {
            return valueFloat;
        }
        throw new ConfigurationError(`Invalid float format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

/** Comma separated list; blank entries are dropped. Unset returns the default. */
function parseListEnv(varName: string, defaultValue: readonly string[] | null): readonly string[] | null {
    const valueStr = process.env[varName];
    if (valueStr === undefined || valueStr.trim() === '') {
        return defaultValue;
    }
    return valueStr.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

function parseEnumEnv<T extends string>(varName: string, allowed: readonly T[], defaultValue: T): T {
    const valueStr = process.env[varName];
    if (!valueStr) {
        return defaultValue;
    }
    const match = allowed.find(a => a === valueStr);
    if (match === undefined) {
        throw new ConfigurationError(`Invalid value for ${varName}: ${valueStr}. Expected one of: ${allowed.join(', ')}`);
    }
    return match;
}

function resolvePath(varName: string, defaultRelative: string): string {
    return path.resolve(PROJECT_ROOT, process.env[varName] || defaultRelative);
}

// --- Load, Validate, and Export Configuration ---
const keyFields = parseListEnv('RECON_KEY_FIELDS', ['codice', 'codice fornitore', 'Codice EAN']);

const config: AppConfig = {
    nodeEnv: parseEnumEnv('NODE_ENV', ['development', 'production', 'test'], 'development'),
    port: parseIntEnv('APP_PORT', 3000),
    logLevel: parseEnumEnv('LOG_LEVEL', ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'], 'info'),

    reconciliation: {
        keyFields: keyFields ?? [],
        inputFields: parseListEnv('RECON_INPUT_FIELDS', null),
        ambiguityPolicy: parseEnumEnv('RECON_AMBIGUITY_POLICY', ['first', 'review'], 'first'),
    },

    mapping: {
        similarityThreshold: parseFloatEnv('MAPPING_SIMILARITY_THRESHOLD', 72),
        store: parseEnumEnv('MAPPING_STORE', ['file', 'database'], 'file'),
        directory: resolvePath('MAPPING_DIR', 'mappings'),
        vocabularyFile: resolvePath('CANONICAL_FIELDS_FILE', 'config/canonical-fields.json'),
        staticMappingsFile: resolvePath('SUPPLIER_MAPPINGS_FILE', 'config/supplier-mappings.json'),
    },

    offers: {
        discountRate: parseFloatEnv('OFFER_DISCOUNT_RATE', 0.10),
        priceField: process.env.OFFER_PRICE_FIELD || 'prezzo di listino',
        codeField: process.env.OFFER_CODE_FIELD || 'codice',
        descriptionField: process.env.OFFER_DESCRIPTION_FIELD || 'Descrizione articolo',
    },

    upload: {
        maxFileSizeMb: parseIntEnv('UPLOAD_MAX_FILE_MB', 20),
    },

    sessions: {
        ttlMinutes: parseIntEnv('SESSION_TTL_MINUTES', 120),
    },

    database: {
        type: 'mssql',
        host: process.env.DB_HOST || 'localhost',
        port: parseIntEnv('DB_PORT', 1433),
        username: process.env.DB_USER || 'sa',
        password: process.env.DB_PASS,
        database: process.env.DB_NAME || 'listino',
        synchronize: process.env.DB_SYNCHRONIZE === 'true', // Default to false
        logging: process.env.DB_LOGGING === 'true',
    },
};

// --- Validation ---
if (config.reconciliation.keyFields.length === 0) {
    throw new ConfigurationError('RECON_KEY_FIELDS must name at least one key field.');
}
if (config.mapping.similarityThreshold < 0 || config.mapping.similarityThreshold > 100) {
    throw new ConfigurationError(`MAPPING_SIMILARITY_THRESHOLD must be between 0 and 100, got ${config.mapping.similarityThreshold}.`);
}
if (config.offers.discountRate < 0 || config.offers.discountRate > 1) {
    throw new ConfigurationError(`OFFER_DISCOUNT_RATE must be between 0 and 1, got ${config.offers.discountRate}.`);
}
if (config.sessions.ttlMinutes <= 0) {
    throw new ConfigurationError(`SESSION_TTL_MINUTES must be positive, got ${config.sessions.ttlMinutes}.`);
}
if (config.mapping.store === 'database' && !config.database.password) {
    // Log using console as the logger depends on this config
    console.warn('Database password (DB_PASS) is not set. The database mapping store will likely fail to connect.');
}

// --- Freeze Configuration ---
Object.freeze(config);
Object.freeze(config.reconciliation);
Object.freeze(config.mapping);
Object.freeze(config.offers);
Object.freeze(config.upload);
Object.freeze(config.sessions);
Object.freeze(config.database);

// --- Export ---
export type { AppConfig, DatabaseConfig, LogLevel };
export default config;
