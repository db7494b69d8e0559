import { ExpressionError } from './errors';

// Expressions are dotted/bracketed lookups only:
//   step_results['Generate Question'].response.text
//   runtime.context.user
//   config.tools[0]
// Nothing is ever evaluated as code.

export type ExpressionRoot = 'step_results' | 'runtime' | 'config' | 'inputs' | 'args';

export type ExpressionScope = Partial<Record<ExpressionRoot, unknown>>;

export type PathSegment = string | number;

export interface ParsedPath {
    root: string;
    segments: PathSegment[];
}

const PLACEHOLDER = /\{\{([\s\S]*?)\}\}/g;
const SINGLE_PLACEHOLDER = /^\s*\{\{((?:(?!\{\{|\}\})[\s\S])*)\}\}\s*$/;
const IDENT = /^[A-Za-z_][A-Za-z0-9_]*/;
const ROOTS = new Set<string>(['step_results', 'runtime', 'config', 'inputs', 'args']);

function isRoot(name: string): name is ExpressionRoot {
    return ROOTS.has(name);
}

export function parsePath(expression: string): ParsedPath {
    const source = expression.trim();
    const rootMatch = IDENT.exec(source);
    if (!rootMatch) {
        throw new ExpressionError('Expected an identifier', expression);
    }

    const root = rootMatch[0];
    const segments: PathSegment[] = [];
    let pos = root.length;

    while (pos < source.length) {
        const ch = source[pos];
        if (ch === '.') {
            const ident = IDENT.exec(source.slice(pos + 1));
            if (!ident) {
                throw new ExpressionError(`Expected a property name at position ${pos + 1}`, expression);
            }
            segments.push(ident[0]);
            pos += 1 + ident[0].length;
        } else if (ch === '[') {
            const close = source.indexOf(']', pos);
            if (close === -1) {
                throw new ExpressionError('Unterminated "["', expression);
            }
            segments.push(parseIndex(source.slice(pos + 1, close).trim(), expression));
            pos = close + 1;
        } else {
            throw new ExpressionError(`Unexpected "${ch}" at position ${pos}`, expression);
        }
    }

    return { root, segments };
}

function parseIndex(raw: string, expression: string): PathSegment {
    if (/^\d+$/.test(raw)) {
        return Number(raw);
    }
    const quote = raw[0];
    if ((quote === "'" || quote === '"') && raw.length >= 2 && raw[raw.length - 1] === quote) {
        const key = raw.slice(1, -1);
        if (key.includes(quote)) {
            throw new ExpressionError('Quotes are not allowed inside a key', expression);
        }
        return key;
    }
    throw new ExpressionError(`Invalid index [${raw}]`, expression);
}

function hasOwn(target: object, key: PropertyKey): boolean {
    return Object.prototype.hasOwnProperty.call(target, key);
}

export function evaluate(expression: string, scope: ExpressionScope): unknown {
    const { root, segments } = parsePath(expression);

    if (!isRoot(root)) {
        throw new ExpressionError(`Unknown variable "${root}"`, expression);
    }
    if (!hasOwn(scope, root)) {
        throw new ExpressionError(`"${root}" is not available here`, expression);
    }

    let current: unknown = scope[root];
    let walked: string = root;

    for (const segment of segments) {
        walked += typeof segment === 'number' ? `[${segment}]` : `.${segment}`;

        if (Array.isArray(current) && typeof segment === 'number') {
            if (segment >= current.length) {
                throw new ExpressionError(`Unresolved reference "${walked}"`, expression);
            }
            current = current[segment];
            continue;
        }
        const property = current !== null && typeof current === 'object'
            ? Object.getOwnPropertyDescriptor(current, String(segment))
            : undefined;
        if (!property) {
            throw new ExpressionError(`Unresolved reference "${walked}"`, expression);
        }
        current = property.value;
    }

    if (current === undefined) {
        throw new ExpressionError(`Unresolved reference "${walked}"`, expression);
    }
    return current;
}

function stringify(value: unknown): string {
    if (value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}

/** Substitutes every `{{ path }}` in `text`. */
export function renderTemplate(text: string, scope: ExpressionScope): string {
    return text.replace(PLACEHOLDER, (_match, expression: string) => stringify(evaluate(expression.trim(), scope)));
}

/**
 * Renders strings nested anywhere inside `value`. A string that is exactly one
 * placeholder resolves to the raw value, so `"{{ step_results['n'].output }}"`
 * stays a number when the step produced one.
 */
export function renderValue(value: unknown, scope: ExpressionScope): unknown {
    if (typeof value === 'string') {
        const single = SINGLE_PLACEHOLDER.exec(value);
        if (single) {
            return evaluate(single[1].trim(), scope);
        }
        return renderTemplate(value, scope);
    }
    if (Array.isArray(value)) {
        return value.map((item) => renderValue(item, scope));
    }
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const [key, item] of Object.entries(value)) {
            out[key] = renderValue(item, scope);
        }
        return out;
    }
    return value;
}

export function findExpressions(text: string): string[] {
    return Array.from(text.matchAll(PLACEHOLDER), (m) => m[1].trim());
}

/** Step names referenced as `step_results[...]` anywhere inside `value`. */
export function collectStepReferences(value: unknown): string[] {
    const refs = new Set<string>();

    const visit = (node: unknown): void => {
        if (typeof node === 'string') {
            for (const expression of findExpressions(node)) {
                const { root, segments } = parsePath(expression);
                if (root === 'step_results' && segments.length > 0) {
                    refs.add(String(segments[0]));
                }
            }
        } else if (Array.isArray(node)) {
            node.forEach(visit);
        } else if (node !== null && typeof node === 'object') {
            Object.values(node).forEach(visit);
        }
    };

    visit(value);
    return Array.from(refs);
}
