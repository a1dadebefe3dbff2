import { ChatInsightGateway } from './chat_gateway';
import { postJson } from './http';
import { InsightError } from './types';

const DEFAULT_BASE_URL = 'https://api.anthropic.com/v1';
const API_VERSION = '2023-06-01';

function extractText(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('content' in body)) return null;
  const { content } = body;
  if (!Array.isArray(content)) return null;
  for (const item of content) {
    const block: unknown = item;
    if (typeof block === 'object' && block !== null && 'text' in block && typeof block.text === 'string') {
      return block.text;
    }
  }
  return null;
}

export class AnthropicInsightGateway extends ChatInsightGateway {
  readonly name = 'anthropic';

  protected async complete(system: string, user: string, signal?: AbortSignal): Promise<string> {
    const body = await postJson(
      `${this.baseUrl ?? DEFAULT_BASE_URL}/messages`,
      {
        model: this.model,
        max_tokens: 2048,
        system,
        messages: [{ role: 'user', content: user }],
      },
      {
        provider: this.name,
        headers: { 'x-api-key': this.apiKey, 'anthropic-version': API_VERSION },
        fetchFn: this.fetchFn,
        signal,
      }
    );

    const text = extractText(body);
    if (text === null) {
      throw new InsightError('Anthropic response has no text block', this.name);
    }
    return text;
  }
}
