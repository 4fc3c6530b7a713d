/**
 * Schema Validator - minimal JSON schema validation for settings files
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export interface JsonSchema {
    type: string;
    properties?: Record<string, JsonSchema>;
    required?: string[];
    additionalProperties?: boolean;
    enum?: readonly unknown[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(value: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(value, schema, '', errors);

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
        if (schema.type && actualType !== schema.type && !(schema.type === 'integer' && actualType === 'number')) {
            errors.push({
                path,
                message: `Expected type ${schema.type}, got ${actualType}`,
            });
            return;
        }

        if (schema.type === 'integer' && !Number.isInteger(value)) {
            errors.push({ path, message: 'Expected an integer' });
            return;
        }

        if (schema.type === 'object' && schema.properties && this.isRecord(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            for (const [key, propSchema] of Object.entries(schema.properties)) {
                if (key in value) {
                    this.validateValue(value[key], propSchema, `${path}.${key}`, errors);
                }
            }

            if (schema.additionalProperties === false) {
                for (const key of Object.keys(value)) {
                    if (!(key in schema.properties)) {
                        errors.push({ path: `${path}.${key}`, message: 'Unknown field' });
                    }
                }
            }
        }

        if (schema.enum && !schema.enum.includes(value)) {
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

    private isRecord(value: unknown): value is Record<string, unknown> {
        return typeof value === 'object' && value !== null && !Array.isArray(value);
    }

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        return typeof value;
    }
}
