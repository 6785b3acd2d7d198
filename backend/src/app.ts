import express, { Express } from 'express';
import cors from 'cors';
import { createSpecializationController } from './controllers/specializationController';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createSpecializationRoutes } from './routes/specializations';
import { createTriageRoutes } from './routes/triage';
import { TriageContext } from './services/triageContext';

export function createApp(
  context: Pick<TriageContext, 'session' | 'specializations' | 'exemplars' | 'matcher'>,
  options: { corsOrigin?: string } = {}
): Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: options.corsOrigin || 'http://localhost:3001',
    credentials: true,
  }));
  app.use(express.json({ limit: '64kb' }));
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', createSpecializationController(context).health);

  // API Routes
  app.use('/api/triage', createTriageRoutes(context));
  app.use('/api/specializations', createSpecializationRoutes(context));

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
