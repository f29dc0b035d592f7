import { z } from 'zod';

const flag = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().min(1).default('0.0.0.0'),
  GAME_TTL_MINUTES: z.coerce.number().nonnegative().default(360),
  PREVIEW_CARDS: flag.default('false'),
  COMMENTARY_PROVIDER: z.enum(['ollama', 'gemini', 'none']).default('ollama'),
  COMMENTARY_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  OLLAMA_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('llama3.2'),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  POKEAPI_URL: z.string().url().default('https://pokeapi.co/api/v2'),
  POKEAPI_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
});

export type CommentaryProviderName = z.infer<typeof EnvSchema>['COMMENTARY_PROVIDER'];

export interface AppConfig {
  port: number;
  host: string;
  // 0 disables eviction
  gameTtlMs: number;
  previewCards: boolean;
  commentary: {
    provider: CommentaryProviderName;
    timeoutMs: number;
    ollamaUrl: string;
    ollamaModel: string;
    geminiApiKey: string | undefined;
    geminiModel: string;
  };
  pokeApi: {
    baseUrl: string;
    timeoutMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
  const parsed = EnvSchema.parse(present);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    gameTtlMs: parsed.GAME_TTL_MINUTES * 60_000,
    previewCards: parsed.PREVIEW_CARDS,
    commentary: {
      provider: parsed.COMMENTARY_PROVIDER,
      timeoutMs: parsed.COMMENTARY_TIMEOUT_MS,
      ollamaUrl: parsed.OLLAMA_URL,
      ollamaModel: parsed.OLLAMA_MODEL,
      geminiApiKey: parsed.GEMINI_API_KEY,
      geminiModel: parsed.GEMINI_MODEL,
    },
    pokeApi: {
      baseUrl: parsed.POKEAPI_URL,
      timeoutMs: parsed.POKEAPI_TIMEOUT_MS,
    },
  };
}
