import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';
import type { ErrorObject, SchemaObject } from 'ajv';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';
import type { DeviceRegisterRequest, VitalIn, VitalsRecordedEvent } from './types.js';

const SCHEMA_BASE = 'https://vitals-ingest.example.com/schemas';

export const SchemaIds = {
    vitalIn: `${SCHEMA_BASE}/http/vital-in.json`,
    deviceRegister: `${SCHEMA_BASE}/http/device-register.json`,
    vitalsRecorded: `${SCHEMA_BASE}/events/vitals-recorded.json`,
} as const;

export type FieldErrors = Record<string, string[]>;

export type ValidationResult<T = unknown> =
    | { valid: true; value: T; errors?: undefined; details?: undefined }
    | { valid: false; value?: undefined; errors: string; details?: FieldErrors };

function isIdentifiedSchema(value: unknown): value is SchemaObject & { $id: string } {
    return typeof value === 'object'
        && value !== null
        && !Array.isArray(value)
        && '$id' in value
        && typeof value.$id === 'string';
}

function unescapePointer(segment: string): string {
    return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Dotted field path an Ajv error refers to, e.g. `bp.systolic`.
 * Errors against the document root are reported under `_schema`.
 */
export function fieldOf(error: ErrorObject): string {
    const segments = error.instancePath.split('/').filter(Boolean).map(unescapePointer);

    if (error.keyword === 'required') {
        segments.push(String(error.params.missingProperty));
    } else if (error.keyword === 'additionalProperties') {
        segments.push(String(error.params.additionalProperty));
    }

    return segments.length > 0 ? segments.join('.') : '_schema';
}

export function toFieldErrors(errors: ErrorObject[]): FieldErrors {
    const details: FieldErrors = {};
    for (const error of errors) {
        const field = fieldOf(error);
        const message = error.message ?? error.keyword;
        (details[field] ??= []).push(message);
    }
    return details;
}

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            validateSchema: false,
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
            logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return;
        }

        try {
            const files = this.getAllJsonFiles(this.contractsPath);
            logger.info({ count: files.length, path: this.contractsPath }, 'Loading schemas');

            files.forEach((file) => {
                try {
                    const content = readFileSync(file, 'utf-8');
                    const schema: unknown = JSON.parse(content);

                    if (isIdentifiedSchema(schema)) {
                        this.ajv.addSchema(schema);
                        logger.debug({ $id: schema.$id, file }, 'Schema loaded');
                    } else {
                        logger.warn({ file }, 'Schema missing $id, skipped');
                    }
                } catch (err) {
                    logger.error({ file, error: err }, 'Failed to load schema');
                }
            });

            this.schemasLoaded = true;
            logger.info('All schemas loaded successfully');
        } catch (err) {
            logger.error({ error: err }, 'Failed to load schemas');
        }
    }

    /**
     * Recursively get all JSON files from a directory
     */
    private getAllJsonFiles(dir: string): string[] {
        const files: string[] = [];

        try {
            const entries = readdirSync(dir, { withFileTypes: true });

            for (const entry of entries) {
                const fullPath = join(dir, entry.name);

                if (entry.isDirectory()) {
                    files.push(...this.getAllJsonFiles(fullPath));
                } else if (entry.isFile() && entry.name.endsWith('.json')) {
                    files.push(fullPath);
                }
            }
        } catch (err) {
            logger.error({ dir, error: err }, 'Failed to read directory');
        }

        return files;
    }

    /**
     * Validate data against a schema by its $id
     */
    validate<T>(schemaId: string, data: unknown): ValidationResult<T> {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return {
                valid: false,
                errors: 'Schemas not loaded',
            };
        }

        if (!this.ajv.getSchema(schemaId)) {
            logger.error({ schemaId }, 'Schema not found');
            return {
                valid: false,
                errors: `Schema not found: ${schemaId}`,
            };
        }

        if (this.ajv.validate<T>(schemaId, data)) {
            return { valid: true, value: data };
        }

        const failures = this.ajv.errors ?? [];
        return {
            valid: false,
            errors: this.ajv.errorsText(failures),
            details: toFieldErrors(failures),
        };
    }

    isReady(): boolean {
        return this.schemasLoaded;
    }

    validateVitalIn(data: unknown): ValidationResult<VitalIn> {
        return this.validate<VitalIn>(SchemaIds.vitalIn, data);
    }

    validateDeviceRegister(data: unknown): ValidationResult<DeviceRegisterRequest> {
        return this.validate<DeviceRegisterRequest>(SchemaIds.deviceRegister, data);
    }

    /**
     * Validate vitals.recorded event
     */
    validateVitalsRecorded(data: unknown): ValidationResult<VitalsRecordedEvent> {
        return this.validate<VitalsRecordedEvent>(SchemaIds.vitalsRecorded, data);
    }
}
