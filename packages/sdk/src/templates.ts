import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { TemplateError } from './errors';
import { dialogConfigSchema, toDialogTemplate } from './template-schema';
import type { DialogTemplate } from './types';

/** Read-only view of the loaded templates, as the engine consumes it. */
export interface TemplateSource {
    get(name: string): DialogTemplate | undefined;
    list(): string[];
}

export class TemplateRegistry implements TemplateSource {
    private templates = new Map<string, DialogTemplate>();
    private static readonly NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
    private static readonly MAX_NAME_LENGTH = 100;

    register(template: DialogTemplate): DialogTemplate {
        const { name } = template;
        if (!name || name.length === 0) {
            throw new TemplateError('Template name cannot be empty');
        }
        if (name.length > TemplateRegistry.MAX_NAME_LENGTH) {
            throw new TemplateError(`Template name exceeds maximum length of ${TemplateRegistry.MAX_NAME_LENGTH} characters`);
        }
        if (!TemplateRegistry.NAME_PATTERN.test(name)) {
            throw new TemplateError('Template name must contain only alphanumeric characters, dashes, and underscores');
        }
        if (this.templates.has(name)) {
            throw new TemplateError(`Template "${name}" is already registered.`);
        }
        const frozen: DialogTemplate = Object.freeze({ ...template, steps: [...template.steps] });
        this.templates.set(name, frozen);
        return frozen;
    }

    get(name: string): DialogTemplate | undefined {
        return this.templates.get(name);
    }

    list(): string[] {
        return Array.from(this.templates.keys());
    }
}

/** Named prompt bodies referenced by a step's `template:` field. */
export class PromptLibrary {
    private prompts = new Map<string, string>();

    register(name: string, body: string): void {
        if (this.prompts.has(name)) {
            throw new TemplateError(`Prompt "${name}" is already registered`);
        }
        this.prompts.set(name, body);
    }

    get(name: string): string | undefined {
        return this.prompts.get(name);
    }

    has(name: string): boolean {
        return this.prompts.has(name);
    }

    list(): string[] {
        return Array.from(this.prompts.keys());
    }
}

export interface DialogConfig {
    templates: DialogTemplate[];
    prompts: Record<string, string>;
}

function formatZodError(err: ZodError): string {
    return err.issues
        .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

export function parseDialogConfig(raw: string, source = '<string>'): DialogConfig {
    let document: unknown;
    try {
        document = parseYaml(raw);
    } catch (err) {
        throw new TemplateError(`${source}: invalid YAML (${err instanceof Error ? err.message : String(err)})`);
    }

    const parsed = dialogConfigSchema.safeParse(document ?? {});
    if (!parsed.success) {
        throw new TemplateError(`${source}: ${formatZodError(parsed.error)}`);
    }

    return {
        templates: Object.entries(parsed.data.dialog_templates).map(([name, t]) => toDialogTemplate(name, t)),
        prompts: parsed.data.prompts,
    };
}

export async function loadDialogConfigFile(filePath: string): Promise<DialogConfig> {
    const raw = await readFile(filePath, 'utf-8');
    return parseDialogConfig(raw, filePath);
}

export function buildRegistries(config: DialogConfig): { templates: TemplateRegistry; prompts: PromptLibrary } {
    const templates = new TemplateRegistry();
    const prompts = new PromptLibrary();
    for (const template of config.templates) {
        templates.register(template);
    }
    for (const [name, body] of Object.entries(config.prompts)) {
        prompts.register(name, body);
    }
    return { templates, prompts };
}
