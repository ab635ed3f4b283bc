import { buildServer } from './api/server.js';
import { ConfigError, loadConfig } from './config.js';
import type { AppConfig } from './config.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const app = buildServer({ docApiUrl: config.docApiUrl, logLevel: config.logLevel });

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

process.on('SIGTERM', () => {
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error(err);
      process.exit(1);
    },
  );
});
