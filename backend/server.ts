import type { Server } from 'http';
import { createApp } from './app';
import { MODEL_CONFIG } from './config/model';
import { modelRegistry, predictionPipeline } from './services/prediction';
import { ErrorHandler } from './utils/errorHandler';

const DEFAULT_PORT = parseInt(process.env['PORT'] || '5001', 10);

const app = createApp({ registry: modelRegistry, pipeline: predictionPipeline });

const shutdown = (server: Server, signal: string): void => {
  console.log(`\n👋 ${signal} received, shutting down`);
  server.close(() => {
    modelRegistry.unload()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('❌ Failed to unload model:', ErrorHandler.describe(error));
        process.exit(1);
      });
  });
};

/**
 * Load the model, then start listening.
 * A missing model leaves the service up (predictions answer 503 until a reload);
 * a label/model mismatch aborts startup.
 */
async function startServer(port: number): Promise<void> {
  console.log('='.repeat(50));
  console.log('🏥 Brain Scan Classifier API');
  console.log('='.repeat(50));

  const state = await modelRegistry.initialize({ placeholder: MODEL_CONFIG.usePlaceholder });
  if (state.errorCode === 'CONFIG_MISMATCH') {
    console.error(`❌ ${state.lastError}. Exiting...`);
    process.exit(1);
  }
  if (state.state !== 'loaded') {
    console.warn(`⚠️ Starting without a model: ${state.lastError}`);
  }

  const server = app.listen(port, () => {
    console.log(`🚀 Server listening on port ${port} (model: ${state.kind ?? 'none'})`);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`❌ Port ${port} is already in use. Please kill the process using port ${port} and try again.`);
      process.exit(1);
    }
    console.error('❌ Server error:', err);
    process.exit(1);
  });

  process.on('SIGINT', () => shutdown(server, 'SIGINT'));
  process.on('SIGTERM', () => shutdown(server, 'SIGTERM'));
}

if (require.main === module) {
  startServer(DEFAULT_PORT).catch((error: unknown) => {
    console.error('❌ Startup failed:', ErrorHandler.describe(error));
    process.exit(1);
  });
}

export default app;
