/**
 * File persistence for compiled ExemplarSets.
 * One JSON file per specialization, so specialists update independently.
 * Writes go to a temp file renamed over the target.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ExemplarSet, LabeledCase } from '../types/triage';
import { InvalidConfigurationError } from '../middleware/errorHandler';
import { logAppEvent, logger } from '../utils/logger';
import { PersistedExemplarSet, persistedExemplarSetSchema } from '../utils/validation';
import { ExemplarRegistry } from './exemplarRegistry';

function toRecord(c: LabeledCase): LabeledCase {
  return {
    id: c.id,
    symptoms: c.symptoms,
    goldLevel: c.goldLevel,
    rationale: c.rationale,
    ...(c.specialization ? { specialization: c.specialization } : {}),
  };
}

export function serializeExemplarSet(set: ExemplarSet): PersistedExemplarSet {
  return {
    specialization: set.specialization,
    version: set.version,
    compiledAt: set.compiledAt.toISOString(),
    exemplars: set.exemplars.map(toRecord),
    bootstrapPool: set.bootstrapPool.map(toRecord),
  };
}

export function deserializeExemplarSet(data: unknown): ExemplarSet {
  const parsed = persistedExemplarSetSchema.parse(data);
  return Object.freeze({
    specialization: parsed.specialization,
    version: parsed.version,
    compiledAt: new Date(parsed.compiledAt),
    exemplars: Object.freeze(parsed.exemplars.map(c => Object.freeze(c))),
    bootstrapPool: Object.freeze(parsed.bootstrapPool.map(c => Object.freeze(c))),
  });
}

export class ExemplarStore {
  constructor(private readonly directory: string) {}

  pathFor(specialization: string): string {
    return path.join(this.directory, `compiled_${specialization}.json`);
  }

  async save(set: ExemplarSet): Promise<string> {
    await fs.promises.mkdir(this.directory, { recursive: true });

    const target = this.pathFor(set.specialization);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.promises.writeFile(temp, JSON.stringify(serializeExemplarSet(set), null, 2), 'utf-8');
    await fs.promises.rename(temp, target);

    logAppEvent('Exemplar set saved', { specialization: set.specialization, version: set.version, path: target });
    return target;
  }

  /**
   * Returns undefined when nothing has been compiled for the specialization
   */
  async load(specialization: string): Promise<ExemplarSet | undefined> {
    const file = this.pathFor(specialization);
    let raw: string;
    try {
      raw = await fs.promises.readFile(file, 'utf-8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    let set: ExemplarSet;
    try {
      set = deserializeExemplarSet(JSON.parse(raw));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigurationError(`Compiled exemplar file is invalid (${file}): ${reason}`);
    }

    if (set.specialization !== specialization) {
      throw new InvalidConfigurationError(
        `Compiled exemplar file ${file} belongs to "${set.specialization}", expected "${specialization}"`
      );
    }
    return set;
  }

  /**
   * Load every listed specialization that has a compiled file and publish it.
   * Returns the ids that were published.
   */
  async loadInto(registry: ExemplarRegistry, specializations: readonly string[]): Promise<string[]> {
    const loaded: string[] = [];
    for (const specialization of specializations) {
      const set = await this.load(specialization);
      if (set) {
        registry.publish(set);
        loaded.push(specialization);
      } else {
        logger.info(`No compiled exemplars for ${specialization}, using baseline`);
      }
    }
    return loaded;
  }
}
