import 'dotenv/config';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { GalleryStore } from './gallery.js';
import { createLogger, setLogLevel } from './logger.js';
import { InferenceClient } from './services/inference.js';
import { Studio } from './studio.js';

const log = createLogger('Server');

const isMain = process.argv[1] === fileURLToPath(import.meta.url) || process.argv[1]?.endsWith('server.ts');

if (isMain) {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  if (!config.apiKey) {
    log.warn('HUGGINGFACE_API_KEY is not set; generation requests will fail until it is');
  }

  const studio = new Studio({
    config,
    client: new InferenceClient({ config }),
    gallery: new GalleryStore({ dir: config.galleryDir }),
  });
  const app = createApp({ studio, allowedOrigins: config.allowedOrigins });

  process.on('SIGINT', () => {
    studio.cancel();
    process.exit();
  });

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info(`🚀 server at http://localhost:${info.port} (gallery: ${config.galleryDir})`);
  });
}
