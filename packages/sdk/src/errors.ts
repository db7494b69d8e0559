/**
 * Raised when a dialog template is structurally invalid: unknown step
 * references, duplicate names, or a document that fails validation.
 * Always surfaced at load/compile time, never while a dialog runs.
 */
export class TemplateError extends Error {
    constructor(
        message: string,
        public readonly templateName?: string,
    ) {
        super(templateName ? `Template "${templateName}": ${message}` : message);
        this.name = 'TemplateError';
    }
}

/** A `{{ … }}` expression that could not be parsed or resolved. */
export class ExpressionError extends Error {
    constructor(
        message: string,
        public readonly expression: string,
    ) {
        super(`${message} in {{ ${expression} }}`);
        this.name = 'ExpressionError';
    }
}

export class SchemaValidationError extends Error {
    constructor(
        public readonly schemaName: string,
        public readonly issues: string[],
    ) {
        super(`Value does not match schema "${schemaName}": ${issues.join('; ')}`);
        this.name = 'SchemaValidationError';
    }
}
