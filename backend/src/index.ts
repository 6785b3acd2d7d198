// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';
dotenv.config();

import http from 'http';
import { createApp } from './app';
import { loadEnv } from './config/env';
import { createOpenAIClassifier } from './services/openaiClassifier';
import { loadTriageContext } from './services/triageContext';
import { logAppEvent, logError } from './utils/logger';

async function main(): Promise<void> {
  const env = loadEnv();
  const classifier = createOpenAIClassifier(env);
  const context = await loadTriageContext(env, classifier, classifier.model);

  const app = createApp(context, { corsOrigin: env.FRONTEND_URL });
  const server = http.createServer(app);

  server.listen(env.PORT, () => {
    logAppEvent('Server is running', { port: env.PORT, ready: context.exemplars.readySpecializations() });
  });

  const shutdown = (signal: string) => {
    logAppEvent('Shutting down gracefully', { signal });
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logError('Failed to start server', error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
