/**
 * Exemplar Registry
 * Publication point for compiled ExemplarSets. Each publish swaps one map
 * entry for a frozen set, so a reader holding a snapshot keeps seeing the set
 * it captured even after a newer one is published.
 */

import { ExemplarSet, GENERAL_SPECIALIZATION } from '../types/triage';
import { logAppEvent } from '../utils/logger';

export class ExemplarRegistry {
  private readonly published = new Map<string, ExemplarSet>();

  publish(set: ExemplarSet): void {
    const frozen = freezeSet(set);
    const previous = this.published.get(frozen.specialization);
    this.published.set(frozen.specialization, frozen);

    logAppEvent('Exemplar set published', {
      specialization: frozen.specialization,
      version: frozen.version,
      replaced: previous?.version,
    });
  }

  get(specialization: string): ExemplarSet | undefined {
    return this.published.get(specialization);
  }

  /**
   * Published set for the specialization, else the general set, else undefined
   */
  resolve(specialization: string): ExemplarSet | undefined {
    return this.published.get(specialization) ?? this.published.get(GENERAL_SPECIALIZATION);
  }

  isReady(specialization: string): boolean {
    return this.published.has(specialization);
  }

  readySpecializations(): string[] {
    return Array.from(this.published.keys());
  }
}

function freezeSet(set: ExemplarSet): ExemplarSet {
  if (Object.isFrozen(set) && Object.isFrozen(set.exemplars) && Object.isFrozen(set.bootstrapPool)) {
    return set;
  }
  return Object.freeze({
    ...set,
    exemplars: Object.freeze([...set.exemplars]),
    bootstrapPool: Object.freeze([...set.bootstrapPool]),
  });
}
