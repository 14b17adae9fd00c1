import * as fs from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import logger, { isLogLevel, type LogLevel } from '../../logger';

export interface DatabaseSettings {
    /** SQLite file, or ':memory:' for a disposable store. */
    path: string;
    /** How long a writer waits for another connection's write lock. */
    busyTimeoutMs: number;
}

export interface IngestionSettings {
    /** Object detections below this confidence are dropped before insert. */
    minConfidence: number;
}

export interface FaceSettings {
    /** Expected length of every face encoding; null disables the check. */
    encodingLength: number | null;
}

export interface QuerySettings {
    topClassesLimit: number;
    defaultPageSize: number;
}

export interface LoggingSettings {
    level: LogLevel;
    dir: string | null;
}

export interface AnalysisSettings {
    supportedExtensions: string[];
}

export interface StoreConfig {
    database: DatabaseSettings;
    ingestion: IngestionSettings;
    faces: FaceSettings;
    query: QuerySettings;
    logging: LoggingSettings;
    analysis: AnalysisSettings;
}

export const DEFAULT_CONFIG: StoreConfig = {
    database: { path: './data/photo-metadata.db', busyTimeoutMs: 5000 },
    ingestion: { minConfidence: 0 },
    faces: { encodingLength: 128 },
    query: { topClassesLimit: 10, defaultPageSize: 20 },
    logging: { level: 'info', dir: null },
    analysis: { supportedExtensions: ['.jpg', '.jpeg', '.png', '.bmp', '.tif', '.tiff'] }
};

const ConfigFileSchema = z.object({
    database: z.object({
        path: z.string().min(1),
        busyTimeoutMs: z.number().int().nonnegative()
    }).partial().optional(),
    ingestion: z.object({
        minConfidence: z.number().min(0).max(1)
    }).partial().optional(),
    faces: z.object({
        encodingLength: z.number().int().positive().nullable()
    }).partial().optional(),
    query: z.object({
        topClassesLimit: z.number().int().positive(),
        defaultPageSize: z.number().int().positive()
    }).partial().optional(),
    logging: z.object({
        level: z.enum(['debug', 'info', 'warn', 'error']),
        dir: z.string().nullable()
    }).partial().optional(),
    analysis: z.object({
        supportedExtensions: z.array(z.string().startsWith('.'))
    }).partial().optional()
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Resolves the store configuration for command-line use. The store itself
 * never calls this: it receives a StoreConfig value at construction.
 */
export class ConfigService {
    static load(configPath?: string, env: NodeJS.ProcessEnv = process.env): StoreConfig {
        dotenv.config();

        const file = this.readConfigFile(configPath ?? env.PHOTO_STORE_CONFIG);
        const merged = this.merge(file);
        return this.applyEnv(merged, env);
    }

    private static readConfigFile(configPath: string | undefined): ConfigFile {
        if (!configPath) return {};
        try {
            if (!fs.existsSync(configPath)) {
                logger.warn(`[ConfigService] Config file not found: ${configPath}, using defaults.`);
                return {};
            }
            const raw = fs.readFileSync(configPath, 'utf8');
            return ConfigFileSchema.parse(JSON.parse(raw));
        } catch (e) {
            logger.error(`[ConfigService] Failed to load config ${configPath}, using defaults:`, e);
            return {};
        }
    }

    // Section-by-section so a partial file keeps the remaining defaults
    private static merge(file: ConfigFile): StoreConfig {
        return {
            database: { ...DEFAULT_CONFIG.database, ...(file.database ?? {}) },
            ingestion: { ...DEFAULT_CONFIG.ingestion, ...(file.ingestion ?? {}) },
            faces: { ...DEFAULT_CONFIG.faces, ...(file.faces ?? {}) },
            query: { ...DEFAULT_CONFIG.query, ...(file.query ?? {}) },
            logging: { ...DEFAULT_CONFIG.logging, ...(file.logging ?? {}) },
            analysis: {
                supportedExtensions: (file.analysis?.supportedExtensions ?? DEFAULT_CONFIG.analysis.supportedExtensions)
                    .map(ext => ext.toLowerCase())
            }
        };
    }

    private static applyEnv(config: StoreConfig, env: NodeJS.ProcessEnv): StoreConfig {
        const next: StoreConfig = {
            ...config,
            database: { ...config.database },
            ingestion: { ...config.ingestion },
            logging: { ...config.logging }
        };

        if (env.PHOTO_STORE_DB) next.database.path = env.PHOTO_STORE_DB;

        if (env.PHOTO_STORE_MIN_CONFIDENCE) {
            const value = Number(env.PHOTO_STORE_MIN_CONFIDENCE);
            if (Number.isFinite(value) && value >= 0 && value <= 1) {
                next.ingestion.minConfidence = value;
            } else {
                logger.warn(`[ConfigService] Ignoring PHOTO_STORE_MIN_CONFIDENCE=${env.PHOTO_STORE_MIN_CONFIDENCE}`);
            }
        }

        if (env.PHOTO_STORE_LOG_LEVEL) {
            const level = env.PHOTO_STORE_LOG_LEVEL.toLowerCase();
            if (isLogLevel(level)) next.logging.level = level;
            else logger.warn(`[ConfigService] Ignoring PHOTO_STORE_LOG_LEVEL=${env.PHOTO_STORE_LOG_LEVEL}`);
        }

        if (env.PHOTO_STORE_LOG_DIR) next.logging.dir = env.PHOTO_STORE_LOG_DIR;

        return next;
    }
}
