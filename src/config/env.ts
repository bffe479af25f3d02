/**
 * Environment variable loading and validation.
 */

import 'dotenv/config';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or empty.
 */
export function requireEnv(key: string): string {
    const value = process.env[key];
    if (value === undefined || value === '') {
        throw new ConfigError(`Missing required environment variable: ${key}`);
    }
    return value;
}

export function optionalEnv(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value !== undefined && value !== '' ? value : defaultValue;
}

export function optionalEnvInt(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (value === undefined || value === '') {
        return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${value}`);
    }
    return parsed;
}

export interface RegistryConfig {
    port: number;
    dbPath: string;
    owner: string; // Hex identity of the registry owner
}

export function loadConfig(): RegistryConfig {
    const owner = requireEnv('REGISTRY_OWNER');
    if (!/^[0-9a-fA-F]{64}$/.test(owner)) {
        throw new ConfigError('REGISTRY_OWNER must be a 32-byte hex public key');
    }
    return {
        port: optionalEnvInt('REGISTRY_PORT', 3000),
        dbPath: optionalEnv('REGISTRY_DB_PATH', 'registry.db'),
        owner
    };
}
