import type { IModelClient } from './IModelClient.js';
import type { GenerateContentOptions, Message, ModelResponse, ProviderConfig } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { buildGeminiPayload, parseGeminiResponse, type GeminiResponse } from './gemini.js';
import { joinUrl, postJson } from './http.js';

const logger = createChildLogger('vertex-chat');

// The global location has no regional prefix
export function vertexHost(cloudLocation: string): string {
  return cloudLocation === 'global'
    ? 'https://aiplatform.googleapis.com'
    : `https://${cloudLocation}-aiplatform.googleapis.com`;
}

/**
 * Gemini models on Google Cloud Vertex AI.
 * `apiKey` carries an OAuth access token (e.g. `gcloud auth print-access-token`).
 */
export class VertexModelClient implements IModelClient {
  readonly name = 'gcp-vertex';
  private accessToken: string;
  private url: string;

  constructor(providerConfig: ProviderConfig) {
    const { cloudProject, cloudLocation, apiKey, model } = providerConfig;
    if (!cloudProject || !cloudLocation) {
      throw new Error('cloudProject and cloudLocation are required for Vertex AI provider');
    }
    if (!apiKey) {
      throw new Error('apiKey (access token) is required for Vertex AI provider');
    }
    this.accessToken = apiKey;

    this.url = joinUrl(
      providerConfig.endpoint ?? vertexHost(cloudLocation),
      `/v1/projects/${encodeURIComponent(cloudProject)}/locations/${encodeURIComponent(cloudLocation)}` +
        `/publishers/google/models/${encodeURIComponent(model)}:generateContent`,
    );
    logger.info({ model, cloudProject, cloudLocation }, 'Vertex AI model client initialized');
  }

  async generateContent(messages: Message[], options: GenerateContentOptions): Promise<ModelResponse> {
    logger.debug({ messageCount: messages.length }, 'Generating content');

    const data = await postJson<GeminiResponse>(this.name, this.url, buildGeminiPayload(messages, options), {
      headers: { Authorization: `Bearer ${this.accessToken}` },
      signal: options.signal,
    });

    return parseGeminiResponse(data);
  }
}
