import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { SessionStore } from './sessionStore.js';

const config = loadConfig();
const app = createApp(new SessionStore(), { corsOrigin: config.corsOrigin });

app.listen(config.port, () => {
  console.log(`[Server] API server running on http://localhost:${config.port}`);
});
