import {
  VALIDATION_MESSAGES,
  parseAge,
  validateConsent,
  validateDemographics,
  validateExit,
  validateTask,
} from '../usabilityValidation';
import { DemographicDraft } from '../../types/usability';

const STAMP = '2026-02-10 10:00:00';

function demographics(overrides: Partial<DemographicDraft> = {}): DemographicDraft {
  return {
    name: '  Ada ',
    age: '36',
    occupation: ' Engineer ',
    familiarity: 'Somewhat Familiar',
    ...overrides,
  };
}

describe('validateConsent', () => {
  it('requires the agreement box', () => {
    expect(validateConsent({ agreed: false }, STAMP)).toEqual({
      ok: false,
      message: VALIDATION_MESSAGES.consentRequired,
    });
    expect(validateConsent({ agreed: true }, STAMP)).toEqual({
      ok: true,
      record: { timestamp: STAMP, consentGiven: true },
    });
  });
});

describe('validateDemographics', () => {
  it('trims text fields and converts the age', () => {
    expect(validateDemographics(demographics(), STAMP)).toEqual({
      ok: true,
      record: {
        timestamp: STAMP,
        name: 'Ada',
        age: 36,
        occupation: 'Engineer',
        familiarity: 'Somewhat Familiar',
      },
    });
  });

  it('accepts both ends of the age range', () => {
    for (const age of ['0', '100']) {
      const result = validateDemographics(demographics({ age }), STAMP);
      expect(result.ok && result.record.age).toBe(Number(age));
    }
  });

  it('rejects ages outside 0-100 or with a fraction', () => {
    for (const age of ['-1', '101', '36.5', 'abc']) {
      expect(validateDemographics(demographics({ age }), STAMP)).toEqual({
        ok: false,
        message: VALIDATION_MESSAGES.ageOutOfRange,
      });
    }
  });

  it('rejects familiarity outside the three levels', () => {
    for (const familiarity of ['', 'Expert']) {
      expect(validateDemographics(demographics({ familiarity }), STAMP)).toEqual({
        ok: false,
        message: VALIDATION_MESSAGES.demographicsIncomplete,
      });
    }
  });

  it('requires occupation and age but not name', () => {
    expect(validateDemographics(demographics({ occupation: '   ' }), STAMP).ok).toBe(false);
    expect(validateDemographics(demographics({ age: '' }), STAMP)).toEqual({
      ok: false,
      message: VALIDATION_MESSAGES.demographicsIncomplete,
    });
    expect(validateDemographics(demographics({ name: '' }), STAMP).ok).toBe(true);
  });
});

describe('parseAge', () => {
  it('returns null for blanks and out-of-range values', () => {
    expect(parseAge(' 42 ')).toBe(42);
    expect(parseAge('')).toBeNull();
    expect(parseAge('250')).toBeNull();
  });

  it('accepts only plain decimal digits', () => {
    expect(parseAge('0x10')).toBeNull();
    expect(parseAge('1e2')).toBeNull();
    expect(parseAge('30.0')).toBeNull();
    expect(parseAge('-0')).toBeNull();
    expect(parseAge('007')).toBe(7);
  });
});

describe('validateTask', () => {
  it('requires a known task label', () => {
    expect(validateTask({ taskName: '', outcome: 'Yes', notes: '' }, null, STAMP)).toEqual({
      ok: false,
      message: VALIDATION_MESSAGES.taskRequired,
    });
  });

  it('requires an outcome', () => {
    expect(validateTask({ taskName: 'Task 9: Cache Expiry', outcome: null, notes: '' }, 1.5, STAMP)).toEqual({
      ok: false,
      message: VALIDATION_MESSAGES.outcomeRequired,
    });
  });

  it('builds the record with the supplied duration', () => {
    expect(validateTask({ taskName: 'Task 9: Cache Expiry', outcome: 'Partial', notes: ' needed a hint ' }, 1.5, STAMP)).toEqual({
      ok: true,
      record: {
        timestamp: STAMP,
        taskName: 'Task 9: Cache Expiry',
        outcome: 'Partial',
        durationSeconds: 1.5,
        notes: 'needed a hint',
      },
    });
  });
});

describe('validateExit', () => {
  it('accepts whole ratings from 1 to 5', () => {
    expect(validateExit({ satisfaction: 5, difficulty: 1, openFeedback: '' }, STAMP).ok).toBe(true);
  });

  it('rejects ratings outside the scale', () => {
    expect(validateExit({ satisfaction: 0, difficulty: 3, openFeedback: '' }, STAMP)).toEqual({
      ok: false,
      message: VALIDATION_MESSAGES.ratingOutOfRange,
    });
    expect(validateExit({ satisfaction: 3, difficulty: 2.5, openFeedback: '' }, STAMP).ok).toBe(false);
  });
});
