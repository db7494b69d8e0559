// public api for @parley/sdk
// usage:
//   import { loadDialogConfigFile, buildRegistries, renderTemplate } from '@parley/sdk';
//   const { templates, prompts } = buildRegistries(await loadDialogConfigFile('config/dialog_templates.yaml'));

export * from './types';
export { TemplateError, ExpressionError, SchemaValidationError } from './errors';
export {
    evaluate,
    parsePath,
    renderTemplate,
    renderValue,
    findExpressions,
    collectStepReferences,
} from './expressions';
export type { ExpressionRoot, ExpressionScope, ParsedPath, PathSegment } from './expressions';
export { SchemaRegistry } from './schemas';
export { CallableRegistry, addNumbers, createBuiltinCallables } from './callables';
export type { CallableFn } from './callables';
export {
    TemplateRegistry,
    PromptLibrary,
    parseDialogConfig,
    loadDialogConfigFile,
    buildRegistries,
} from './templates';
export type { TemplateSource, DialogConfig } from './templates';
export { dialogConfigSchema, templateSchema, stepSchema, toStepDefinition } from './template-schema';
export {
    serialize,
    deserialize,
    toJsonColumn,
    fromJsonColumn,
    SerializationError,
} from './utils/serialization';
export { createDialogClient } from './grpc-client';
export type { DialogClient, DialogReply, DialogReplyMessage, DialogServiceStub } from './grpc-client';
