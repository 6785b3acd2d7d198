/**
 * Loads the protocol corpus, labeled cases and specialization profiles from
 * JSON files. Everything is validated once at load and returned read-only.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { LabeledCase, Protocol, SpecializationProfile } from '../types/triage';
import { InvalidConfigurationError } from '../middleware/errorHandler';
import { logAppEvent } from '../utils/logger';
import {
  caseStoreSchema,
  protocolCorpusSchema,
  specializationConfigSchema,
} from '../utils/validation';
import { normalizeKeyword } from './keywordIndex';
import { SpecializationRegistry } from './specializationRegistry';

function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new InvalidConfigurationError(`${label} file not found: ${resolved}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigurationError(`${label} file is not valid JSON (${resolved}): ${reason}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .slice(0, 5)
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigurationError(`${label} file failed validation (${resolved}): ${details}`);
  }
  return result.data;
}

function normalizedSet(values: readonly string[]): ReadonlySet<string> {
  return new Set(values.map(normalizeKeyword).filter(v => v.length > 0));
}

export function loadProtocols(filePath: string): Protocol[] {
  const corpus = readJsonFile(filePath, protocolCorpusSchema, 'Protocol corpus');

  const protocols = Object.entries(corpus).map(([id, record]): Protocol => Object.freeze({
    id,
    title: record.title,
    keywords: normalizedSet(record.keywords),
    body: record.body,
  }));

  logAppEvent('Protocol corpus loaded', { protocols: protocols.length });
  return protocols;
}

export function loadCases(filePath: string): LabeledCase[] {
  const cases = readJsonFile(filePath, caseStoreSchema, 'Case store');

  const seen = new Set<string>();
  for (const c of cases) {
    if (seen.has(c.id)) {
      throw new InvalidConfigurationError(`Case store has duplicate case id "${c.id}"`);
    }
    seen.add(c.id);
  }

  logAppEvent('Labeled cases loaded', { cases: cases.length });
  return cases.map(c => Object.freeze({ ...c }));
}

export function loadSpecializations(filePath: string): SpecializationRegistry {
  const profiles = readJsonFile(filePath, specializationConfigSchema, 'Specialization config');

  const registry = new SpecializationRegistry(
    profiles.map((p): SpecializationProfile => Object.freeze({
      id: p.id,
      displayName: p.displayName,
      description: p.description,
      focusKeywords: normalizedSet(p.focusKeywords),
      focusProtocolIds: new Set(p.focusProtocolIds),
      minTrainingCases: p.minTrainingCases,
    }))
  );

  logAppEvent('Specializations loaded', { specializations: registry.list().length });
  return registry;
}
