import { Request, Response, NextFunction } from 'express';
import { SpecializationProfile } from '../types/triage';
import { TriageContext } from '../services/triageContext';

type ListingContext = Pick<TriageContext, 'specializations' | 'exemplars' | 'matcher'>;

function readiness(context: ListingContext, profile: SpecializationProfile) {
  const set = context.exemplars.get(profile.id);
  return {
    ready: Boolean(set),
    version: set?.version ?? null,
    compiledAt: set?.compiledAt.toISOString() ?? null,
  };
}

export function createSpecializationController(context: ListingContext) {
  // GET /api/specializations
  const listSpecializations = (req: Request, res: Response) => {
    const specializations = context.specializations.list().map(profile => ({
      id: profile.id,
      displayName: profile.displayName,
      description: profile.description,
      focusKeywords: Array.from(profile.focusKeywords).slice(0, 5),
      ...readiness(context, profile),
    }));

    res.json({
      status: 'success',
      data: {
        total: specializations.length,
        specializations,
      },
    });
  };

  // GET /api/specializations/:id
  const getSpecialization = (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const profile = context.specializations.get(req.params.id);
      const set = context.exemplars.get(profile.id);

      res.json({
        status: 'success',
        data: {
          id: profile.id,
          displayName: profile.displayName,
          description: profile.description,
          focusKeywords: Array.from(profile.focusKeywords),
          focusProtocolIds: Array.from(profile.focusProtocolIds),
          minTrainingCases: profile.minTrainingCases,
          ...readiness(context, profile),
          exemplarCount: set?.exemplars.length ?? 0,
          bootstrapPoolSize: set?.bootstrapPool.length ?? 0,
        },
      });
    } catch (error) {
      next(error);
    }
  };

  // GET /health
  const health = (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      protocols: context.matcher.size,
      specializations: context.specializations.list().length,
      ready: context.exemplars.readySpecializations(),
    });
  };

  return { listSpecializations, getSpecialization, health };
}
