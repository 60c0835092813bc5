/**
 * Deckhand backend entry point.
 *
 * HTTP gateway in front of the presentation assistant: chat transports post
 * button presses, commands and uploads; replies come back as JSON.
 */

import { ConfigError, loadConfig } from './config.js';
import { createHttpServer } from './http/server.js';
import { initializeSubsystems, shutdown, startListening } from './lifecycle.js';

async function startup(): Promise<void> {
  const config = loadConfig();
  const assistant = await initializeSubsystems(config);
  const server = createHttpServer({ assistant, apiToken: config.apiToken });

  // Wrap shutdown for signal handlers
  const handleShutdown = () => {
    shutdown(server, assistant)
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('Shutdown error:', err);
        process.exit(1);
      });
    // Force exit after 2 seconds if graceful shutdown hangs
    setTimeout(() => process.exit(0), 2000).unref();
  };

  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  startListening(server, config);
}

startup().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error('Failed to start server:', err);
  }
  process.exit(1);
});
