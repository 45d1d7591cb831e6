import { z } from 'zod';
import dotenv from 'dotenv';
import type { RawProviderConfig } from './types/index.js';
import { ValidationError } from './utils/errors.js';

dotenv.config();

const DEFAULT_SYSTEM_PROMPT = `Your task is to mimic a web application's HTTP response to the given HTTP request.
Always answer with a JSON object containing exactly two keys: "headers" (an object of response header names to string values) and "body" (the response body as a string).
Do not include the HTTP status line. Do not wrap the JSON in markdown.`;

const DEFAULT_USER_PROMPT = `No talk; just do. Respond to the following HTTP request in JSON:

%s`;

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Provider Selection
  // Checked against the supported providers when the client is initialized
  llmProvider: z.string().min(1).default('openai'),
  llmApiKey: z.string().optional(),
  llmModel: z.string().min(1).default('gpt-4o-mini'),
  llmServerUrl: z.string().url().optional(),

  // Vertex AI
  llmCloudProject: z.string().optional(),
  llmCloudLocation: z.string().optional(),

  // Generation
  llmTemperature: z.coerce.number().min(0).max(2).default(1),
  llmTimeoutMs: z.coerce.number().int().positive().default(60000),

  // Prompts
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  userPrompt: z
    .string()
    .refine((value) => value.includes('%s'), { message: 'USER_PROMPT must contain a %s placeholder' })
    .default(DEFAULT_USER_PROMPT),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse an environment map into a validated config.
 * Empty strings are treated as unset so `FOO=` in a .env file falls back to the default.
 */
export function parseConfig(env: Record<string, string | undefined>): ReturnType<typeof configSchema.safeParse> {
  const read = (key: string): string | undefined => (env[key] === '' ? undefined : env[key]);

  const raw = {
    nodeEnv: read('NODE_ENV'),
    llmProvider: read('LLM_PROVIDER'),
    llmApiKey: read('LLM_API_KEY'),
    llmModel: read('LLM_MODEL'),
    llmServerUrl: read('LLM_SERVER_URL'),
    llmCloudProject: read('LLM_CLOUD_PROJECT'),
    llmCloudLocation: read('LLM_CLOUD_LOCATION'),
    llmTemperature: read('LLM_TEMPERATURE'),
    llmTimeoutMs: read('LLM_TIMEOUT_MS'),
    systemPrompt: read('SYSTEM_PROMPT'),
    userPrompt: read('USER_PROMPT'),
    logLevel: read('LOG_LEVEL'),
  };

  return configSchema.safeParse(raw);
}

function loadConfig(): Config {
  const result = parseConfig(process.env);
  if (!result.success) {
    // Embedded in a host process: report, never exit
    throw new ValidationError(
      `Configuration validation failed: ${JSON.stringify(result.error.format())}`,
      result.error.errors,
    );
  }

  return result.data;
}

// Lazy load config to allow env vars to be set before validation
let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

export const config: Readonly<Config> = new Proxy({} as Config, {
  get(_target, prop: string) {
    return getConfig()[prop as keyof Config];
  },
});

export function providerConfigFromEnv(source: Config = getConfig()): RawProviderConfig {
  return {
    provider: source.llmProvider,
    apiKey: source.llmApiKey,
    endpoint: source.llmServerUrl,
    cloudProject: source.llmCloudProject,
    cloudLocation: source.llmCloudLocation,
    model: source.llmModel,
    temperature: source.llmTemperature,
  };
}
