import { describe, it, expect } from 'vitest';
import {
  adjustedValue,
  clampUnit,
  createPersonaState,
  describePersona,
} from '../../../src/persona/traits.js';
import { DEFAULT_CONFIG } from '../../../src/config/config-schema.js';

describe('adjustedValue', () => {
  it('adds the delta', () => {
    expect(adjustedValue(0.5, 0.2)).toBeCloseTo(0.7);
    expect(adjustedValue(0.5, -0.2)).toBeCloseTo(0.3);
  });

  it('clamps to [0, 1]', () => {
    expect(adjustedValue(0.9, 5)).toBe(1);
    expect(adjustedValue(0.1, -5)).toBe(0);
    expect(adjustedValue(0.5, Number.POSITIVE_INFINITY)).toBe(1);
    expect(adjustedValue(0.5, Number.NEGATIVE_INFINITY)).toBe(0);
  });

  it('keeps the old value for a NaN delta', () => {
    expect(adjustedValue(0.4, Number.NaN)).toBe(0.4);
  });
});

describe('clampUnit', () => {
  it('bounds values', () => {
    expect(clampUnit(-0.1)).toBe(0);
    expect(clampUnit(0.25)).toBe(0.25);
    expect(clampUnit(1.5)).toBe(1);
  });
});

describe('createPersonaState', () => {
  it('seeds core traits and clamps configured values', () => {
    const state = createPersonaState({
      ...DEFAULT_CONFIG.persona,
      traits: { curiosity: 2, humour: Number.NaN },
    });

    expect(state.traits).toEqual({
      curiosity: 1,
      friendliness: 0.5,
      analytical: 0.5,
      empathy: 0.5,
      humour: 0.5,
    });
    expect(state.counters).toEqual({ interactions: 0, discoveries: 0, evaluations: 0 });
    expect(state.identityStatements).toEqual([]);
  });

  it('copies arrays from the seed', () => {
    const seed = { ...DEFAULT_CONFIG.persona, interests: ['astronomy'] };
    const state = createPersonaState(seed);
    state.interests.push('geology');

    expect(seed.interests).toEqual(['astronomy']);
  });
});

describe('describePersona', () => {
  it('renders name, traits and interests', () => {
    const state = createPersonaState({
      name: 'Aria',
      traits: {},
      interests: ['astronomy'],
      originStory: 'Origin.',
      worldview: 'Listen first.',
      personalValues: ['honesty'],
    });

    expect(describePersona(state).split('\n')).toEqual([
      'You are Aria.',
      'Origin.',
      'Worldview: Listen first.',
      'Values: honesty',
      'Traits (0-1): curiosity 0.50, friendliness 0.50, analytical 0.50, empathy 0.50',
      'Interests: astronomy',
      'Speak in the first person as yourself, never as "an AI" or "the assistant".',
    ]);
  });
});
