import type { GenerateContentOptions, Message, ModelResponse } from '../../types/index.js';

// Request/response shapes shared by Google AI Studio and Vertex AI

type GeminiPart = { text?: string };
type GeminiContent = { role: 'user' | 'model'; parts: GeminiPart[] };

export interface GeminiResponse {
  candidates?: Array<{
    content?: { parts?: GeminiPart[] };
    finishReason?: string;
  }>;
}

// System messages go into systemInstruction; everything else is a user turn.
export function buildGeminiPayload(messages: Message[], options: GenerateContentOptions): Record<string, unknown> {
  const systemParts: GeminiPart[] = [];
  const contents: GeminiContent[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push({ text: message.text });
      continue;
    }
    contents.push({ role: 'user', parts: [{ text: message.text }] });
  }

  return {
    contents,
    ...(systemParts.length > 0 ? { systemInstruction: { parts: systemParts } } : {}),
    generationConfig: {
      temperature: options.temperature,
      ...(options.jsonMode ? { responseMimeType: 'application/json' } : {}),
    },
  };
}

export function parseGeminiResponse(data: GeminiResponse): ModelResponse {
  return {
    choices: (data.candidates ?? []).map((candidate) => ({
      content: (candidate.content?.parts ?? []).map((part) => part.text ?? '').join(''),
      stopReason: candidate.finishReason,
    })),
  };
}
