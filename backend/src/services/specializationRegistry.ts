/**
 * Specialization Registry
 * Open mapping from specialization id to profile, validated when built.
 */

import { GENERAL_SPECIALIZATION, SpecializationProfile } from '../types/triage';
import { InvalidConfigurationError, UnknownSpecializationError } from '../middleware/errorHandler';

export class SpecializationRegistry {
  private readonly profiles: ReadonlyMap<string, SpecializationProfile>;

  constructor(profiles: Iterable<SpecializationProfile>) {
    const byId = new Map<string, SpecializationProfile>();

    for (const profile of profiles) {
      if (byId.has(profile.id)) {
        throw new InvalidConfigurationError(`Duplicate specialization id "${profile.id}"`);
      }
      if (!Number.isInteger(profile.minTrainingCases) || profile.minTrainingCases <= 0) {
        throw new InvalidConfigurationError(
          `Specialization "${profile.id}" must require a positive number of training cases`
        );
      }
      if (profile.id !== GENERAL_SPECIALIZATION && profile.focusKeywords.size === 0) {
        throw new InvalidConfigurationError(`Specialization "${profile.id}" has no focus keywords`);
      }
      byId.set(profile.id, profile);
    }

    if (!byId.has(GENERAL_SPECIALIZATION)) {
      throw new InvalidConfigurationError(`Registry is missing the "${GENERAL_SPECIALIZATION}" profile`);
    }

    this.profiles = byId;
  }

  has(id: string): boolean {
    return this.profiles.has(id);
  }

  get(id: string): SpecializationProfile {
    const profile = this.profiles.get(id);
    if (!profile) {
      throw new UnknownSpecializationError(id);
    }
    return profile;
  }

  general(): SpecializationProfile {
    return this.get(GENERAL_SPECIALIZATION);
  }

  list(): SpecializationProfile[] {
    return Array.from(this.profiles.values());
  }

  /**
   * Profiles eligible for routing (everything except the general fallback)
   */
  specialists(): SpecializationProfile[] {
    return this.list().filter(p => p.id !== GENERAL_SPECIALIZATION);
  }
}
