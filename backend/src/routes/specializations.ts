import { Router } from 'express';
import { createSpecializationController } from '../controllers/specializationController';
import { TriageContext } from '../services/triageContext';
import { specializationParamSchema, validateParams } from '../utils/validation';

export function createSpecializationRoutes(
  context: Pick<TriageContext, 'specializations' | 'exemplars' | 'matcher'>
): Router {
  const router = Router();
  const { listSpecializations, getSpecialization } = createSpecializationController(context);

  router.get('/', listSpecializations);
  router.get('/:id', validateParams(specializationParamSchema), getSpecialization);

  return router;
}
