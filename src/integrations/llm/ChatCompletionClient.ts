import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { TextCompletion } from '../../core/types';
import { LlmResponseError } from '../../core/errors';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  user?: string;
}

export interface ChatCompletionResponse {
  id: string;
  choices: {
    index: number;
    message: { role: string; content: string | null };
    finish_reason: string;
  }[];
  created: number;
}

export interface ChatCompletionConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs?: number;
  temperature?: number;
  /** Swaps the HTTP transport; tests use it to answer in process. */
  adapter?: AxiosAdapter;
}

/** TextCompletion over an OpenAI-compatible `/v1/chat/completions` endpoint. */
export class ChatCompletionClient implements TextCompletion {
  private client: AxiosInstance;

  constructor(private readonly config: ChatCompletionConfig) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs ?? 30000,
      adapter: config.adapter,
      headers: {
        'Content-Type': 'application/json',
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
      },
    });
  }

  async complete(systemPrompt: string, userPrompt: string, conversationId?: string, signal?: AbortSignal): Promise<string> {
    const body: ChatCompletionRequest = {
      model: this.config.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      temperature: this.config.temperature ?? 0.2,
      user: conversationId,
    };

    const response = await this.client.post<ChatCompletionResponse>('/v1/chat/completions', body, { signal });
    const content = response.data.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new LlmResponseError('Completion response had no message content', JSON.stringify(response.data));
    }
    return content;
  }

  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.client.get('/v1/models', { timeout: 5000 });
      return response.status === 200;
    } catch {
      return false;
    }
  }
}
