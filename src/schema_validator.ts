/**
 * Schema Validator - JSON schema subset used for policy files and
 * persisted value state.
 *
 * Supported keywords: type (incl. "integer"), properties, required, items,
 * enum, pattern, minimum, maximum, additionalProperties (schema form).
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonPrimitive = string | number | boolean | null;

export interface JsonSchema {
    type: 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';
    properties?: Record<string, JsonSchema>;
    required?: string[];
    items?: JsonSchema;
    enum?: readonly JsonPrimitive[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
    additionalProperties?: JsonSchema;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPrimitive(value: unknown): value is JsonPrimitive {
    return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    hasSchema(schemaId: string): boolean {
        return this.schemas.has(schemaId);
    }

    validate(document: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(document, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        const actualType = this.getType(value);
        const typeOk = schema.type === actualType
            || (schema.type === 'number' && actualType === 'integer');
        if (!typeOk) {
            errors.push({
                path,
                message: `Expected type ${schema.type}, got ${actualType}`,
            });
            return;
        }

        if (schema.type === 'object' && isRecord(value)) {
            for (const req of schema.required ?? []) {
                if (!(req in value)) {
                    errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                }
            }

            for (const [key, child] of Object.entries(value)) {
                const propSchema = schema.properties?.[key] ?? schema.additionalProperties;
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                }
            }
        }

        if (schema.type === 'array' && schema.items && Array.isArray(value)) {
            for (let i = 0; i < value.length; i++) {
                this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
            }
        }

        if (schema.enum && !(isPrimitive(value) && schema.enum.includes(value))) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): JsonSchema['type'] | 'undefined' | 'function' | 'symbol' | 'bigint' {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
        return typeof value;
    }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
    return errors.map(e => `${e.path || '<root>'}: ${e.message}`);
}
