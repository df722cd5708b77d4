import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

import { createApp } from './app';
import { loadConfig } from './config';
import { createContext } from './context';
import { errorMessage } from './errors';
import { createLogger } from './utils/logger';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

const log = createLogger('server');

const main = async () => {
  const config = loadConfig();
  const ctx = await createContext(config);
  const app = createApp(ctx);

  app.listen(config.port, () => {
    log.info(`BIM Insight API running on ${config.port}`, { collection: config.collectionName, dataDir: config.dataDir });
  });
};

main().catch(err => {
  log.error('Failed to start server', { error: errorMessage(err) });
  process.exitCode = 1;
});
