import { readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import { requireReadings } from '../rules/engine.js';
import type { ReadingSet } from '../rules/types.js';
import { ReadingsFileError } from './errors.js';

export interface ReadingsFile {
    readings: ReadingSet;
    recordedAt?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadReadingsFile(path: string, validator: SchemaValidator): ReadingsFile {
    let data: unknown;
    try {
        data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        throw new ReadingsFileError(path, `Failed to read readings from ${path}: ${err}`);
    }

    const validationResult = validator.validateReadingsFile(data);
    if (!validationResult.valid || !isRecord(data) || !isRecord(data.readings)) {
        throw new ReadingsFileError(
            path,
            `Invalid readings file ${path}: ${validationResult.errors ?? 'not an object'}`,
        );
    }

    const recordedAt = typeof data.recorded_at === 'string' ? data.recorded_at : undefined;
    logger.info({ path, recordedAt }, 'Readings file loaded');

    return { readings: requireReadings(data.readings), recordedAt };
}
