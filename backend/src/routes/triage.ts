import { Router } from 'express';
import { createTriageController } from '../controllers/triageController';
import { TriageContext } from '../services/triageContext';
import { triageRequestSchema, validateBody } from '../utils/validation';

export function createTriageRoutes(context: Pick<TriageContext, 'session'>): Router {
  const router = Router();
  const { triage } = createTriageController(context);

  router.post('/', validateBody(triageRequestSchema), triage);

  return router;
}
