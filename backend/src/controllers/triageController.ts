import { Request, Response, NextFunction } from 'express';
import { TriageContext } from '../services/triageContext';
import { TriageRequestInput } from '../utils/validation';

export function createTriageController(context: Pick<TriageContext, 'session'>) {
  // POST /api/triage (body validated by triageRequestSchema)
  const triage = async (
    req: Request<Record<string, string>, unknown, TriageRequestInput>,
    res: Response,
    next: NextFunction
  ) => {
    const controller = new AbortController();
    // Client went away before the answer: stop the classifier call
    const onClose = () => {
      if (!res.writableEnded) controller.abort();
    };
    res.on('close', onClose);

    try {
      const { symptoms, specialization } = req.body;
      const result = await context.session.triage(symptoms, {
        specialization,
        signal: controller.signal,
      });

      res.json({
        status: 'success',
        data: result,
      });
    } catch (error) {
      next(error);
    } finally {
      res.off('close', onClose);
    }
  };

  return { triage };
}
