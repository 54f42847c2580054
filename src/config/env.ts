import { config } from 'dotenv';

// Load .env file if present
config();

export const MONITOR_MODES = ['interactive', 'demo', 'file'] as const;

export type MonitorMode = (typeof MONITOR_MODES)[number];

export interface AppConfig {
    mode: MonitorMode;
    contracts: {
        path: string;
    };
    readings: {
        path: string;
    };
    input: {
        maxAttempts: number;
    };
    log: {
        level: string;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = process.env[key];
    if (!value) return defaultValue;
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
        throw new Error(
            `Invalid value for environment variable ${key}: ${value} (expected one of ${choices.join(', ')})`,
        );
    }
    return match;
}

export function loadConfig(): AppConfig {
    const maxAttempts = getEnvNumber('INPUT_MAX_ATTEMPTS', 5);
    if (maxAttempts < 1) {
        throw new Error(`INPUT_MAX_ATTEMPTS must be at least 1, got ${maxAttempts}`);
    }

    return {
        mode: getEnvChoice('MONITOR_MODE', MONITOR_MODES, 'interactive'),
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        readings: {
            path: getEnv('READINGS_PATH', './readings.json'),
        },
        input: {
            maxAttempts,
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}
