/**
 * Server lifecycle: initialization, listening, shutdown.
 */

import type { Server } from 'http';
import { mkdir, rm } from 'fs/promises';
import type { AppConfig } from './config.js';
import { createAssistant, type PresentationAssistant } from './assistant.js';
import type { Session } from './sessions/index.js';

/**
 * Remove what an abandoned session left behind. Uploads of sessions that
 * reached `saved` are kept alongside their output.
 */
export async function reclaimArtifacts(session: Session): Promise<void> {
  if (session.state === 'saved' || !session.sourcePath) return;
  await rm(session.sourcePath, { force: true });
  console.log(`[Lifecycle] Removed abandoned upload ${session.sourcePath}`);
}

/**
 * Create storage directories and the assistant, and start the expiry sweeper.
 */
export async function initializeSubsystems(config: AppConfig): Promise<PresentationAssistant> {
  await Promise.all([
    mkdir(config.uploadDir, { recursive: true }),
    mkdir(config.outputDir, { recursive: true }),
  ]);

  const assistant = createAssistant(config, { onReclaim: reclaimArtifacts });
  assistant.store.startSweeper(config.sessionTtlMs, config.sweepIntervalMs);

  const templates = await assistant.listTemplates();
  console.log(`Template catalog ready: ${templates.length} template(s) in ${config.templatesDir}`);

  return assistant;
}

export function startListening(server: Server, config: AppConfig): void {
  server.listen(config.port, config.host, () => {
    console.log(`Deckhand server running at http://${config.host}:${config.port}`);
    console.log(`Uploads: ${config.uploadDir}`);
    console.log(`Saved decks: ${config.outputDir}`);
    if (config.generatedToken) {
      console.log('');
      console.log('No DECKHAND_API_TOKEN set; generated one for this process:');
      console.log(`  ${config.apiToken}`);
      console.log('');
    }
  });
}

export async function shutdown(server: Server, assistant: PresentationAssistant): Promise<void> {
  console.log('\nShutting down...');

  assistant.store.clear();

  await new Promise<void>((resolve) => {
    server.close((err) => {
      if (err) console.error('Error while closing HTTP server:', err);
      resolve();
    });
    server.closeAllConnections();
  });
}
