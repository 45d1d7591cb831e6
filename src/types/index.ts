import { z } from 'zod';

// Supported LLM backends
export const PROVIDERS = ['openai', 'googleai', 'gcp-vertex', 'anthropic', 'cohere', 'ollama'] as const;
export const ProviderSchema = z.enum(PROVIDERS);
export type Provider = z.infer<typeof ProviderSchema>;

export function isProvider(value: string): value is Provider {
  return (PROVIDERS as readonly string[]).includes(value);
}

// Provider configuration (credentials, model, endpoint)
export const ProviderConfigSchema = z.object({
  provider: ProviderSchema,
  apiKey: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  cloudProject: z.string().min(1).optional(),
  cloudLocation: z.string().min(1).optional(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
});
export type ProviderConfig = Readonly<z.infer<typeof ProviderConfigSchema>>;

// Same shape with the provider left unchecked, e.g. when read from a file
export type RawProviderConfig = Omit<ProviderConfig, 'provider'> & { readonly provider: string };

// Conversation messages
export const MessageRoleSchema = z.enum(['system', 'human']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export interface Message {
  role: MessageRole;
  text: string;
}

// Raw backend output, normalized across providers
export interface ModelChoice {
  content: string;
  stopReason?: string;
}

export interface ModelResponse {
  choices: ModelChoice[];
}

export interface GenerateContentOptions {
  temperature: number;
  jsonMode: boolean;
  signal?: AbortSignal;
}

// Validated model output
export const GeneratedResponseSchema = z.object({
  headers: z
    .record(z.string())
    .refine((headers) => Object.keys(headers).length > 0, { message: 'headers must not be empty' }),
  body: z.string(),
});
export type GeneratedResponse = z.infer<typeof GeneratedResponseSchema>;

// HTTP request as captured by the embedding server
export interface CapturedRequest {
  method: string;
  /** Request target as received, including the query string. */
  url: string;
  /** Defaults to 1.1. */
  httpVersion?: string;
  headers: Record<string, string | string[] | undefined>;
  body?: string | Buffer;
}
