// src/config/index.ts

import path from 'path';
import { createLogger } from '../utils/logger';

const logger = createLogger('config');

export interface AppConfig {
    PORT: number;
    HOST: string;
    UPLOAD_DIR: string;
    MAX_UPLOAD_BYTES: number;
    ALLOWED_EXTENSIONS: string[];
    RECENT_FILES_LIMIT: number;
    GROQ_API_KEY: string;
    MODEL_NAME: string;
    MAX_TOKENS: number;
    TEMPERATURE: number;
    LOG_LEVEL: string;
    NODE_ENV: string;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

// Helper to read environment variables with defaults and critical checks
const getEnvVar = (env: Env, key: string, defaultValue?: string, isCritical: boolean = false): string => {
    const value = env[key];
    if (value === undefined || value === '') {
        if (defaultValue !== undefined) {
            logger.debug(`Environment variable ${key} is not set, using default value`, { key, defaultValue });
            return defaultValue;
        }
        if (isCritical) {
            const errorMessage = `Environment variable ${key} is missing or empty and has no default. This is required.`;
            logger.error(errorMessage);
            throw new Error(errorMessage);
        }
        logger.warn(`Environment variable ${key} is not set or empty, no default provided.`, { key });
        return '';
    }
    return value;
};

const getIntVar = (env: Env, key: string, defaultValue: number, min: number): number => {
    const raw = getEnvVar(env, key, String(defaultValue));
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed) || parsed < min) {
        logger.warn(`Environment variable ${key} is not a valid integer, using default value`, { key, raw, defaultValue });
        return defaultValue;
    }
    return parsed;
};

const getFloatVar = (env: Env, key: string, defaultValue: number): number => {
    const raw = getEnvVar(env, key, String(defaultValue));
    const parsed = Number.parseFloat(raw);
    if (!Number.isFinite(parsed)) {
        logger.warn(`Environment variable ${key} is not a valid number, using default value`, { key, raw, defaultValue });
        return defaultValue;
    }
    return parsed;
};

/**
 * Builds the application configuration from an environment map.
 * A missing GROQ_API_KEY is not fatal: chat degrades to a warning message.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const nodeEnv = getEnvVar(env, 'NODE_ENV', 'development');

    const config: AppConfig = {
        PORT: getIntVar(env, 'PORT', 5000, 0),
        HOST: getEnvVar(env, 'HOST', '0.0.0.0'),
        UPLOAD_DIR: path.resolve(getEnvVar(env, 'UPLOAD_DIR', 'uploads')),
        MAX_UPLOAD_BYTES: getIntVar(env, 'MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES, 1),
        ALLOWED_EXTENSIONS: ['.pdf'],
        RECENT_FILES_LIMIT: getIntVar(env, 'RECENT_FILES_LIMIT', 5, 1),
        GROQ_API_KEY: getEnvVar(env, 'GROQ_API_KEY', ''),
        MODEL_NAME: getEnvVar(env, 'MODEL_NAME', 'llama-3.1-8b-instant'),
        MAX_TOKENS: getIntVar(env, 'MAX_TOKENS', 500, 1),
        TEMPERATURE: getFloatVar(env, 'TEMPERATURE', 0.7),
        LOG_LEVEL: getEnvVar(env, 'LOG_LEVEL', 'info'),
        NODE_ENV: nodeEnv,
    };

    if (!config.GROQ_API_KEY) {
        logger.warn('GROQ_API_KEY is not set; chat will answer with a configuration warning.');
    }

    return config;
}
