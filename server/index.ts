import { createLogger } from '../src/lib/log';
import { createCommentator } from '../src/services/commentary';
import { createPokeApiIllustrations } from '../src/services/illustrations';
import { createApp } from './app';
import { loadConfig } from './config';
import { createCommentaryProvider } from './providers';
import { createGameService } from './service';
import { GameStore } from './store';

const logger = createLogger('server');
const config = loadConfig();

const provider = createCommentaryProvider(config.commentary, logger);
const service = createGameService({
  store: new GameStore({ ttlMs: config.gameTtlMs }),
  illustrations: createPokeApiIllustrations({ baseUrl: config.pokeApi.baseUrl, timeoutMs: config.pokeApi.timeoutMs }),
  commentator: createCommentator({ provider, timeoutMs: config.commentary.timeoutMs }),
  previewCards: config.previewCards,
});

const app = createApp(service);

app.listen(config.port, config.host, () => {
  const url = `http://${config.host === '0.0.0.0' ? 'localhost' : config.host}:${config.port}`;
  console.log('='.repeat(50));
  console.log('🎮 Memory Duel');
  console.log('='.repeat(50));
  console.log(`Commentary: ${provider ? provider.name : 'canned lines only'}`);
  if (provider?.name === 'ollama') {
    console.log(`   ollama pull ${config.commentary.ollamaModel} && ollama serve`);
  }
  console.log(`API: ${url}/api/game`);
  console.log('='.repeat(50));
  logger.info('listening', { port: config.port, host: config.host });
});
