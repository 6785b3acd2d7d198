/**
 * Input Validation with Zod
 * Schemas for API payloads and for the JSON data files the service loads
 */

import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { AcuityLevel, parseAcuityLevel } from '../types/triage';

// ==================== Shared ====================

export const acuityLevelSchema = z.string().transform((value, ctx): AcuityLevel => {
  const level = parseAcuityLevel(value);
  if (!level) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Must be one of: Emergency, Urgent, Moderate, HomeCare',
    });
    return z.NEVER;
  }
  return level;
});

const specializationIdSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-z0-9_]+$/, 'Specialization id must be lowercase letters, digits or underscores');

// ==================== Triage API ====================

export const triageRequestSchema = z.object({
  symptoms: z.string()
    .trim()
    .min(1, 'Symptoms cannot be empty')
    .max(5000, 'Symptoms too long (max 5000 characters)'),
  specialization: specializationIdSchema.optional(),
});

export const specializationParamSchema = z.object({
  id: specializationIdSchema,
});

// ==================== Data files ====================

export const protocolRecordSchema = z.object({
  title: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  body: z.string(),
});

// protocol id -> record
export const protocolCorpusSchema = z.record(z.string().min(1), protocolRecordSchema);

export const labeledCaseSchema = z.object({
  id: z.string().min(1),
  symptoms: z.string().min(1),
  goldLevel: acuityLevelSchema,
  rationale: z.string(),
  specialization: specializationIdSchema.optional(),
});

export const caseStoreSchema = z.array(labeledCaseSchema);

export const specializationProfileSchema = z.object({
  id: specializationIdSchema,
  displayName: z.string().min(1),
  description: z.string(),
  focusKeywords: z.array(z.string().min(1)),
  focusProtocolIds: z.array(z.string().min(1)),
  minTrainingCases: z.number().int().positive(),
});

export const specializationConfigSchema = z.array(specializationProfileSchema).min(1);

export const persistedExemplarSetSchema = z.object({
  specialization: specializationIdSchema,
  version: z.string().min(1),
  compiledAt: z.string().datetime(),
  exemplars: z.array(labeledCaseSchema),
  bootstrapPool: z.array(labeledCaseSchema),
});

// ==================== Validation Middleware ====================

function issueDetails(error: z.ZodError) {
  return error.issues.map((e: z.ZodIssue) => ({
    field: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Creates an Express middleware that validates request body
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({
        status: 'error',
        code: 'VALIDATION_FAILED',
        message: 'Validation failed',
        details: issueDetails(result.error),
      });
      return;
    }
    req.body = result.data;
    next();
  };
}

/**
 * Creates an Express middleware that validates request params
 */
export function validateParams(schema: z.ZodType<Record<string, string>, z.ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      res.status(400).json({
        status: 'error',
        code: 'VALIDATION_FAILED',
        message: 'Invalid URL parameters',
        details: issueDetails(result.error),
      });
      return;
    }
    req.params = result.data;
    next();
  };
}

export type TriageRequestInput = z.infer<typeof triageRequestSchema>;
export type PersistedExemplarSet = z.infer<typeof persistedExemplarSetSchema>;
