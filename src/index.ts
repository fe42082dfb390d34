import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { getStorage } from './store/index.js';

const config = loadConfig();
const storage = getStorage();
const { app } = createApp(storage, { statsIncludeInProgress: config.statsIncludeInProgress });

export { app };

if (process.env.NODE_ENV !== 'test') {
  app.listen(config.port, () =>
    console.log(`tallyboard listening on :${config.port} (${storage.kind} storage)`)
  );
}
