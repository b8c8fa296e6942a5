/**
 * Schema Validator - JSON schema validation for package configuration files
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
    /** Schema for keys not listed in `properties`; false rejects them. */
    additionalProperties?: JsonSchema | boolean;
    required?: string[];
    items?: JsonSchema;
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

    validate(artifact: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(artifact, schema, '', errors);

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
        const actualType = this.getType(value);
        if (schema.type && actualType !== schema.type) {
            errors.push({
                path,
                message: `Expected type ${schema.type}, got ${actualType}`,
            });
            return;
        }

        // Object validation
        if (schema.type === 'object' && isRecord(value)) {
            const properties = schema.properties ?? {};

            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            for (const [key, child] of Object.entries(value)) {
                const propSchema = properties[key];
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                } else if (schema.additionalProperties === false) {
                    errors.push({ path: `${path}.${key}`, message: 'Unknown field' });
                } else if (typeof schema.additionalProperties === 'object') {
                    this.validateValue(child, schema.additionalProperties, `${path}.${key}`, errors);
                }
            }
        }

        // Array validation
        if (schema.type === 'array' && schema.items && Array.isArray(value)) {
            for (let i = 0; i < value.length; i++) {
                this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
            }
        }

        // Enum validation
        if (schema.enum && !schema.enum.includes(value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        // Pattern validation
        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
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
