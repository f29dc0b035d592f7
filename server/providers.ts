import { createLogger, type Logger } from '../src/lib/log';
import { createGeminiProvider, createOllamaProvider, type CommentaryProvider } from '../src/services/commentary';
import type { AppConfig } from './config';

export function createCommentaryProvider(
  config: AppConfig['commentary'],
  logger: Logger = createLogger('server')
): CommentaryProvider | null {
  switch (config.provider) {
    case 'ollama':
      return createOllamaProvider({ baseUrl: config.ollamaUrl, model: config.ollamaModel, timeoutMs: config.timeoutMs });
    case 'gemini':
      if (!config.geminiApiKey) {
        logger.warn('GEMINI_API_KEY is not set, commentary falls back to canned lines');
        return null;
      }
      return createGeminiProvider({ apiKey: config.geminiApiKey, model: config.geminiModel });
    case 'none':
      return null;
  }
}
