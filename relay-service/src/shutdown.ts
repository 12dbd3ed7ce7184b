import type { Server } from 'http';
import { SERVICE } from './config.js';
import { errorMessage } from './errors.js';
import type { RelayPipeline } from './pipeline.js';

export function registerShutdown(pipeline: RelayPipeline, server: Server | null) {
  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    console.log(`[${SERVICE}] shutting down...`);
    server?.close();
    void pipeline
      .stop()
      .catch((e) => {
        console.error(`[${SERVICE}] shutdown failed:`, errorMessage(e));
        process.exitCode = 1;
      })
      .finally(() => process.exit());
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
