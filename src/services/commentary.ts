import { GoogleGenAI } from '@google/genai';
import { z } from 'zod';
import { pickRandom, type Rng } from '../engine';
import { createLogger, describeError, type Logger } from '../lib/log';
import { createHttpClient, type HttpClient } from './http';

export const FALLBACK_TAUNTS: readonly string[] = [
  'Are you even trying? 😂',
  'My grandmother could do better...',
  'This is painful to watch.',
  "Maybe memory games aren't your thing?",
];

export interface CommentaryProvider {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

export interface Commentator {
  readonly provider: string;
  // Never rejects: any provider failure becomes a canned taunt
  comment(prompt: string): Promise<string>;
}

const OllamaResponseSchema = z.object({ response: z.string() });

export interface OllamaOptions {
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  client?: HttpClient;
}

export function createOllamaProvider(options: OllamaOptions = {}): CommentaryProvider {
  const model = options.model ?? 'llama3.2';
  const client = options.client ?? createHttpClient(options.baseUrl ?? 'http://localhost:11434', options.timeoutMs ?? 3000);
  return {
    name: 'ollama',
    async generate(prompt) {
      const { data } = await client.post('/api/generate', { model, prompt, stream: false });
      return OllamaResponseSchema.parse(data).response.trim();
    },
  };
}

export interface GeminiClient {
  models: {
    generateContent(params: { model: string; contents: string }): Promise<{ text?: string }>;
  };
}

export interface GeminiOptions {
  apiKey?: string;
  model?: string;
  client?: GeminiClient;
}

export function createGeminiProvider(options: GeminiOptions): CommentaryProvider {
  const model = options.model ?? 'gemini-2.5-flash';
  const client: GeminiClient = options.client ?? new GoogleGenAI({ apiKey: options.apiKey });
  return {
    name: 'gemini',
    async generate(prompt) {
      const response = await client.models.generateContent({ model, contents: prompt });
      return (response.text ?? '').trim();
    },
  };
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

export interface CommentatorOptions {
  provider: CommentaryProvider | null;
  timeoutMs?: number;
  rng?: Rng;
  logger?: Logger;
}

export function createCommentator(options: CommentatorOptions): Commentator {
  const { provider } = options;
  const timeoutMs = options.timeoutMs ?? 3000;
  const rng = options.rng ?? Math.random;
  const logger = options.logger ?? createLogger('commentary');

  return {
    provider: provider ? provider.name : 'none',
    async comment(prompt) {
      if (!provider) return pickRandom([...FALLBACK_TAUNTS], rng);
      try {
        const text = (await withTimeout(provider.generate(prompt), timeoutMs)).trim();
        if (text) return text;
        logger.warn('empty response, using fallback', { provider: provider.name });
      } catch (error) {
        logger.warn('provider failed, using fallback', { provider: provider.name, error: describeError(error) });
      }
      return pickRandom([...FALLBACK_TAUNTS], rng);
    },
  };
}
