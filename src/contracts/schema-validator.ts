import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';
import type { SchemaObject } from 'ajv';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';

export const READINGS_FILE_SCHEMA_ID = 'https://vitals-monitor.local/schemas/readings-file.json';

function isSchemaObject(value: unknown): value is SchemaObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ValidationResult {
    valid: boolean;
    errors?: string;
}

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            strict: false,
            allErrors: true,
        });
        addFormats(this.ajv);
    }

    /**
     * Load all JSON schemas from the contracts directory
     */
    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            throw new Error(`Contracts directory not found: ${this.contractsPath}`);
        }

        const files = this.getAllJsonFiles(this.contractsPath);
        logger.debug({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        for (const file of files) {
            const schema: unknown = JSON.parse(readFileSync(file, 'utf-8'));

            if (isSchemaObject(schema) && typeof schema.$id === 'string') {
                this.ajv.addSchema(schema);
                logger.debug({ $id: schema.$id, file }, 'Schema loaded');
            } else {
                logger.warn({ file }, 'Schema missing $id, skipped');
            }
        }

        this.schemasLoaded = true;
    }

    /**
     * Recursively get all JSON files from a directory
     */
    private getAllJsonFiles(dir: string): string[] {
        const files: string[] = [];
        const entries = readdirSync(dir, { withFileTypes: true });

        for (const entry of entries) {
            const fullPath = join(dir, entry.name);

            if (entry.isDirectory()) {
                files.push(...this.getAllJsonFiles(fullPath));
            } else if (entry.isFile() && entry.name.endsWith('.json')) {
                files.push(fullPath);
            }
        }

        return files;
    }

    /**
     * Validate data against a schema by its $id
     */
    validate(schemaId: string, data: unknown): ValidationResult {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return {
                valid: false,
                errors: 'Schemas not loaded',
            };
        }

        const validateFn = this.ajv.getSchema(schemaId);

        if (!validateFn) {
            logger.error({ schemaId }, 'Schema not found');
            return {
                valid: false,
                errors: `Schema not found: ${schemaId}`,
            };
        }

        const valid = validateFn(data);

        if (!valid) {
            const errors = this.ajv.errorsText(validateFn.errors);
            return {
                valid: false,
                errors,
            };
        }

        return { valid: true };
    }

    validateReadingsFile(data: unknown): ValidationResult {
        return this.validate(READINGS_FILE_SCHEMA_ID, data);
    }
}
