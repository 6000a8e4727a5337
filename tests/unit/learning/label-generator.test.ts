import { describe, it, expect } from 'vitest';
import {
  clampTypeWeights,
  computeSeverity,
  generateTypeWeights,
  interpretOutcome,
} from '../../../src/learning/label-generator.js';
import { computeSituationHash } from '../../../src/learning/situation-bucket.js';
import type { InterpretedOutcome } from '../../../src/learning/types.js';
import { createFeatures } from '../../helpers/factories.js';

const outcome = (overrides: Partial<InterpretedOutcome> = {}): InterpretedOutcome => ({
  success: false,
  regret: 0.2,
  recoveryLong: false,
  secondaryDamage: false,
  ...overrides,
});

const severe = createFeatures({
  situation: { decisionIrreversible: 0.9, decisionReversible: 0.1, timePressure: 1 },
  constraints: { irreversibilityScore: 1, downsideAsymmetry: 1, fragilityScore: 1 },
});

describe('interpretOutcome', () => {
  it('clamps regret and flags long recovery', () => {
    expect(
      interpretOutcome({ success: false, regretScore: 1.4, recoveryTimeDays: 91, secondaryDamage: true })
    ).toEqual({ success: false, regret: 1, recoveryLong: true, secondaryDamage: true });
    expect(
      interpretOutcome({ success: true, regretScore: 0.1, recoveryTimeDays: 90, secondaryDamage: false })
        .recoveryLong
    ).toBe(false);
  });
});

describe('computeSeverity', () => {
  it('weights irreversibility most', () => {
    expect(
      computeSeverity(
        { timePressure: 0 },
        { irreversibilityScore: 1, downsideAsymmetry: 0, fragilityScore: 0 }
      )
    ).toBeCloseTo(0.4);
    expect(computeSeverity(severe.situation, severe.constraints)).toBeCloseTo(1);
  });
});

describe('generateTypeWeights', () => {
  it('raises warnings and principles after a failed irreversible decision', () => {
    const w = generateTypeWeights(severe.situation, severe.constraints, severe.usage, outcome());

    expect(w.warning).toBeCloseTo(1.3);
    expect(w.principle).toBeCloseTo(1.2);
    expect(w.rule).toBe(1);
    expect(w.claim).toBe(1);
    expect(w.advice).toBe(1);
  });

  it('clamps at the ceiling when rules stack', () => {
    const w = generateTypeWeights(
      severe.situation,
      severe.constraints,
      severe.usage,
      outcome({ recoveryLong: true })
    );

    expect(w.warning).toBe(1.3);
    expect(w.principle).toBeCloseTo(1.3);
  });

  it('rewards the knowledge that served a successful decision', () => {
    const features = createFeatures({
      situation: { ...severe.situation, horizonLong: 1, riskHigh: 0 },
      constraints: severe.constraints,
      usage: { usedWarning: 1, usedRule: 1 },
    });

    const w = generateTypeWeights(
      features.situation,
      features.constraints,
      features.usage,
      outcome({ success: true, regret: 0 })
    );

    expect(w.principle).toBeCloseTo(1.2);
    expect(w.warning).toBeCloseTo(1.2);
    expect(w.rule).toBeCloseTo(1.2);
  });

  it('scales penalties by severity', () => {
    const features = createFeatures({ usage: { usedAdvice: 1 } });

    const w = generateTypeWeights(
      features.situation,
      features.constraints,
      features.usage,
      outcome({ regret: 0.8 })
    );

    // severity 0.22: advice -0.066 for failure, -0.044 for regret
    expect(w.advice).toBeCloseTo(0.89);
    expect(w.rule).toBeCloseTo(0.978);
    expect(w.warning).toBe(1);
  });

  it('lowers principles after secondary damage', () => {
    const w = generateTypeWeights(
      severe.situation,
      severe.constraints,
      severe.usage,
      outcome({ success: true, secondaryDamage: true })
    );

    expect(w.principle).toBeCloseTo(1.05);
  });
});

describe('clampTypeWeights', () => {
  it('keeps every weight within the safety band', () => {
    expect(clampTypeWeights({ principle: 0.2, rule: 1.9, warning: 1, claim: 0.7, advice: 1.3 })).toEqual({
      principle: 0.7,
      rule: 1.3,
      warning: 1,
      claim: 0.7,
      advice: 1.3,
    });
  });
});

describe('computeSituationHash', () => {
  it('buckets by reversibility, risk and irreversibility score', () => {
    expect(
      computeSituationHash({
        decisionIrreversible: 0.8,
        decisionReversible: 0.2,
        riskHigh: 1,
        riskMedium: 0,
        irreversibilityScore: 0.8,
      })
    ).toBe('irreversible_high_h');
    expect(
      computeSituationHash({
        decisionIrreversible: 0.1,
        decisionReversible: 0.8,
        riskHigh: 0,
        riskMedium: 1,
        irreversibilityScore: 0.7,
      })
    ).toBe('reversible_medium_l');
    expect(
      computeSituationHash({
        decisionIrreversible: 0,
        decisionReversible: 0.3,
        riskHigh: 0,
        riskMedium: 0,
        irreversibilityScore: 0,
      })
    ).toBe('exploratory_low_l');
  });
});
