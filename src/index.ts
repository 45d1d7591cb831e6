export { initialize, getModelClient, supportsSystemPrompt, SUPPORTS_SYSTEM_PROMPT } from './providers/chat/index.js';
export type { IModelClient } from './providers/chat/IModelClient.js';
export { buildMessages, renderUserPrompt } from './services/prompts.js';
export { generate, extractContent } from './services/generator.js';
export type { GenerateOptions } from './services/generator.js';
export { createResponder, getResponder } from './services/responder.js';
export type { Responder, ResponderOptions } from './services/responder.js';
export { serializeRequest } from './utils/http-dump.js';
export { cleanResponse, validateResponse } from './utils/response-cleaning.js';
export * from './utils/errors.js';
export * from './types/index.js';
export { getConfig, providerConfigFromEnv } from './config.js';
export type { Config } from './config.js';
