import { ChatInsightGateway } from './chat_gateway';
import { postJson } from './http';
import { InsightError } from './types';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

function extractContent(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('choices' in body)) return null;
  const { choices } = body;
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) return null;
  const { message } = first;
  if (typeof message !== 'object' || message === null || !('content' in message)) return null;
  return typeof message.content === 'string' ? message.content : null;
}

export class OpenAiInsightGateway extends ChatInsightGateway {
  readonly name = 'openai';

  protected async complete(system: string, user: string, signal?: AbortSignal): Promise<string> {
    const body = await postJson(
      `${this.baseUrl ?? DEFAULT_BASE_URL}/chat/completions`,
      {
        model: this.model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
        temperature: 0.3,
        response_format: { type: 'json_object' },
      },
      {
        provider: this.name,
        headers: { authorization: `Bearer ${this.apiKey}` },
        fetchFn: this.fetchFn,
        signal,
      }
    );

    const content = extractContent(body);
    if (content === null) {
      throw new InsightError('OpenAI response has no message content', this.name);
    }
    return content;
  }
}
