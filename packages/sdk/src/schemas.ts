import { z, ZodTypeAny } from 'zod';
import { SchemaValidationError } from './errors';

const booleanish = z.union([
    z.boolean(),
    z
        .string()
        .trim()
        .toLowerCase()
        .pipe(z.enum(['true', 'false']))
        .transform((v) => v === 'true'),
]);

const BUILTIN_SCHEMAS: Record<string, ZodTypeAny> = {
    string: z.string(),
    number: z.coerce.number().refine((n) => Number.isFinite(n), 'Expected a finite number'),
    boolean: booleanish,
    object: z.record(z.unknown()),
    array: z.array(z.unknown()),
};

// Schemas that accept a plain string as-is. Everything else is JSON-decoded first
// when the incoming value is text (e.g. a raw LLM completion).
const TEXT_SCHEMAS = new Set(['string', 'number', 'boolean']);

/**
 * Named structural schemas referenced by `output_schema` / `input_schema`.
 */
export class SchemaRegistry {
    private schemas = new Map<string, ZodTypeAny>(Object.entries(BUILTIN_SCHEMAS));

    register(name: string, schema: ZodTypeAny): void {
        if (BUILTIN_SCHEMAS[name]) {
            throw new Error(`Schema "${name}" is built in and cannot be replaced`);
        }
        this.schemas.set(name, schema);
    }

    has(name: string): boolean {
        return this.schemas.has(name);
    }

    list(): string[] {
        return Array.from(this.schemas.keys());
    }

    validate(name: string, value: unknown): unknown {
        const schema = this.schemas.get(name);
        if (!schema) {
            throw new SchemaValidationError(name, [`schema "${name}" is not registered`]);
        }

        let candidate = value;
        if (typeof value === 'string' && !TEXT_SCHEMAS.has(name)) {
            try {
                candidate = JSON.parse(extractJson(value));
            } catch {
                throw new SchemaValidationError(name, ['response is not valid JSON']);
            }
        }

        const parsed = schema.safeParse(candidate);
        if (!parsed.success) {
            throw new SchemaValidationError(
                name,
                parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)),
            );
        }
        return parsed.data;
    }
}

// Models often wrap JSON in a fenced code block.
function extractJson(text: string): string {
    const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
    return (fenced ? fenced[1] : text).trim();
}
