/**
 * Schema Validator - minimal JSON schema validation for configuration files
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
    type?: 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean';
    properties?: Record<string, JsonSchema>;
    /** Schema applied to every key not listed in `properties`. */
    additionalProperties?: JsonSchema;
    required?: string[];
    items?: JsonSchema;
    minItems?: number;
    minLength?: number;
    enum?: readonly unknown[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
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
        // Type validation
        if (schema.type) {
            const actualType = this.getType(value);
            const matches = schema.type === 'integer'
                ? actualType === 'number' && Number.isInteger(value)
                : actualType === schema.type;
            if (!matches) {
                errors.push({
                    path,
                    message: `Expected type ${schema.type}, got ${actualType}`,
                });
                return;
            }
        }

        // Object validation
        if (isRecord(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            const known = schema.properties ?? {};
            for (const [key, child] of Object.entries(value)) {
                const propSchema = known[key] ?? schema.additionalProperties;
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                }
            }
        }

        // Array validation
        if (Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} item(s)` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        // Enum validation
        if (schema.enum && !schema.enum.includes(value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        if (typeof value === 'string') {
            if (schema.minLength !== undefined && value.length < schema.minLength) {
                errors.push({ path, message: `Value shorter than ${schema.minLength} char(s)` });
            }
            if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        // Number range validation
        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        return typeof value;
    }
}
