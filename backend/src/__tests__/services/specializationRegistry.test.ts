import { SpecializationRegistry } from '../../services/specializationRegistry';
import { InvalidConfigurationError, UnknownSpecializationError } from '../../middleware/errorHandler';
import { fixtureRegistry, makeProfile } from '../helpers/fixtures';

describe('Specialization Registry', () => {
  const general = makeProfile('general', [], [], 10);

  it('should list profiles and separate out the specialists', () => {
    const registry = fixtureRegistry();

    expect(registry.list().map(p => p.id)).toEqual([
      'chf_nurse',
      'ed_nurse',
      'respiratory_nurse',
      'pediatric_nurse',
      'general',
    ]);
    expect(registry.specialists().map(p => p.id)).not.toContain('general');
    expect(registry.general().id).toBe('general');
    expect(registry.has('ed_nurse')).toBe(true);
    expect(registry.has('oncology_nurse')).toBe(false);
  });

  it('should accept profiles added through configuration alone', () => {
    const registry = new SpecializationRegistry([
      general,
      makeProfile('oncology_nurse', ['chemotherapy', 'neutropenia']),
    ]);
    expect(registry.get('oncology_nurse').focusKeywords.has('neutropenia')).toBe(true);
  });

  it('should throw UnknownSpecializationError for an unknown id', () => {
    expect(() => fixtureRegistry().get('oncology_nurse')).toThrow(UnknownSpecializationError);
  });

  it('should reject duplicate ids', () => {
    expect(() => new SpecializationRegistry([general, general])).toThrow('Duplicate specialization id "general"');
  });

  it('should require a general profile', () => {
    expect(() => new SpecializationRegistry([makeProfile('chf_nurse', ['edema'])])).toThrow(
      InvalidConfigurationError
    );
  });

  it('should require focus keywords on specialists', () => {
    expect(() => new SpecializationRegistry([general, makeProfile('chf_nurse', [])])).toThrow(
      'Specialization "chf_nurse" has no focus keywords'
    );
  });

  it('should require a positive training minimum', () => {
    expect(() => new SpecializationRegistry([makeProfile('general', [], [], 0)])).toThrow(
      InvalidConfigurationError
    );
  });
});
