import * as dotenv from 'dotenv';
dotenv.config();

import path from 'path';
import { ConfigurationError } from './errors';
import { ProxyServer } from './ProxyServer';
import { loadSettings } from './settings';

async function main() {
  const settingsPath = process.env.SETTINGS_PATH ?? path.join(__dirname, 'settings.json');
  const settings = loadSettings({ settingsPath });
  const server = new ProxyServer(settings);
  await server.start();

  const shutdown = () => {
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[main] Shutdown failed:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`[main] ${err.message}`);
  } else {
    console.error('[main] Gateway failed to start:', err);
  }
  process.exit(1);
});
