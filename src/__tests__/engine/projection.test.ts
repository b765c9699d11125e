import {
  buildTrajectory,
  project,
  projectAll,
  rankResults,
  selectBest,
} from '../../engine/projection';
import { ProductSpec, ProductSpecInput } from '../../models/ProductSpec';
import {
  InvalidContributionPlanError,
  InvalidEconomicScenarioError,
  InvalidProductSpecError,
} from '../../utils/errors';
import { balanceAtMonth } from '../../utils/math';
import { contributionOnlyPlan, defaultPlan, depositOnlyPlan, shortPlan } from '../fixtures/plans';
import { cdiLCI, defaultProducts, ipcaLCA, prefixedCDB, zeroRateExempt } from '../fixtures/products';
import { defaultScenario } from '../fixtures/scenarios';

describe('buildTrajectory', () => {
  it('should start at the initial deposit and have horizonMonths + 1 points', () => {
    const trajectory = buildTrajectory(defaultPlan, 0.01);
    expect(trajectory).toHaveLength(37);
    expect(trajectory[0]).toBe(1000);
  });

  it('should compound then add the contribution each month', () => {
    const trajectory = buildTrajectory(defaultPlan, 0.01);
    for (let month = 1; month < trajectory.length; month++) {
      expect(trajectory[month]).toBe(trajectory[month - 1] * 1.01 + 500);
    }
  });

  it('should add contributions linearly at a zero rate', () => {
    expect(buildTrajectory(contributionOnlyPlan, 0)).toEqual([
      0, 100, 200, 300, 400, 500, 600, 700, 800, 900, 1000, 1100, 1200,
    ]);
  });

  it('should match the closed-form balance', () => {
    const trajectory = buildTrajectory(defaultPlan, 0.0093);
    expect(trajectory[36]).toBeCloseTo(balanceAtMonth(1000, 500, 0.0093, 36), 6);
  });
});

describe('project - taxed product', () => {
  const result = project(prefixedCDB, defaultPlan, defaultScenario);

  it('should resolve the monthly rate from the annual fixed rate', () => {
    expect(result.effectiveMonthlyRate).toBeCloseTo(0.0093008, 6);
  });

  it('should build the month-one balance from the deposit and one contribution', () => {
    expect(result.trajectory[1]).toBeCloseTo(1509.30, 2);
  });

  it('should compute gross gain over the total invested', () => {
    expect(result.totalInvested).toBe(19000);
    expect(result.trajectory[36]).toBeCloseTo(22659.30, 2);
    expect(result.grossGain).toBeCloseTo(3659.30, 2);
    expect(result.grossGain).toBe(result.trajectory[36] - 19000);
  });

  it('should withhold tax at the 1080-day bracket', () => {
    expect(result.taxRate).toBe(0.15);
    expect(result.taxWithheld).toBe(result.grossGain * 0.15);
    expect(result.taxWithheld).toBeCloseTo(548.90, 2);
  });

  it('should net the tax out of the final balance and the net gain', () => {
    expect(result.finalBalance).toBe(result.trajectory[36] - result.grossGain * 0.15);
    expect(result.finalBalance).toBeCloseTo(22110.41, 2);
    expect(result.netGain).toBe(result.grossGain - result.taxWithheld);
  });

  it('should carry the product identity', () => {
    expect(result.productName).toBe('CDB - Prefixada');
    expect(result.indexerKind).toBe('fixed');
    expect(result.taxExempt).toBe(false);
  });

  it('should use the 22.5% bracket for a six-month horizon', () => {
    const short = project({ ...prefixedCDB, rateParameter: 0.12 }, shortPlan, defaultScenario);
    expect(short.taxRate).toBe(0.225);
    expect(short.taxWithheld).toBe(short.grossGain * 0.225);
  });
});

describe('project - tax-exempt product', () => {
  it('should keep the full final balance', () => {
    const result = project(ipcaLCA, defaultPlan, defaultScenario);
    expect(result.taxRate).toBe(0);
    expect(result.taxWithheld).toBe(0);
    expect(result.finalBalance).toBe(result.trajectory[36]);
    expect(result.netGain).toBe(result.grossGain);
    expect(result.finalBalance).toBeCloseTo(22268.39, 2);
  });

  it('should report no gain at a zero rate', () => {
    const result = project(zeroRateExempt, depositOnlyPlan, defaultScenario);
    expect(result.trajectory).toEqual(new Array(13).fill(10000));
    expect(result.grossGain).toBe(0);
    expect(result.finalBalance).toBe(10000);
  });
});

describe('project - invariants', () => {
  it('should produce a non-decreasing trajectory for non-negative rates', () => {
    for (const spec of defaultProducts) {
      const { trajectory, effectiveMonthlyRate } = project(spec, defaultPlan, defaultScenario);
      expect(effectiveMonthlyRate).toBeGreaterThanOrEqual(0);
      for (let month = 1; month < trajectory.length; month++) {
        expect(trajectory[month]).toBeGreaterThanOrEqual(trajectory[month - 1]);
      }
    }
  });

  it('should not mutate its inputs', () => {
    const plan = { ...defaultPlan };
    const spec = { ...prefixedCDB };
    project(spec, plan, defaultScenario);
    expect(plan).toEqual(defaultPlan);
    expect(spec).toEqual(prefixedCDB);
  });
});

describe('project - invalid input', () => {
  it('should reject a zero horizon instead of returning a single point', () => {
    expect(() =>
      project(prefixedCDB, { ...defaultPlan, horizonMonths: 0 }, defaultScenario)
    ).toThrow(InvalidContributionPlanError);
  });

  it('should reject a fractional horizon', () => {
    expect(() =>
      project(prefixedCDB, { ...defaultPlan, horizonMonths: 1.5 }, defaultScenario)
    ).toThrow(InvalidContributionPlanError);
  });

  it('should reject a negative deposit or contribution', () => {
    expect(() =>
      project(prefixedCDB, { ...defaultPlan, initialDeposit: -1 }, defaultScenario)
    ).toThrow(InvalidContributionPlanError);
    expect(() =>
      project(prefixedCDB, { ...defaultPlan, monthlyContribution: -1 }, defaultScenario)
    ).toThrow(InvalidContributionPlanError);
  });

  it('should reject a negative scenario rate', () => {
    expect(() =>
      project(prefixedCDB, defaultPlan, { ...defaultScenario, cdiAnnual: -0.01 })
    ).toThrow(InvalidEconomicScenarioError);
  });

  it('should reject an unknown indexer kind', () => {
    const spec: ProductSpecInput = { ...prefixedCDB, indexerKind: 'selic' };
    expect(() => project(spec, defaultPlan, defaultScenario)).toThrow(InvalidProductSpecError);
  });

  it('should reject a negative rate parameter', () => {
    expect(() =>
      project({ ...prefixedCDB, rateParameter: -0.05 }, defaultPlan, defaultScenario)
    ).toThrow(InvalidProductSpecError);
  });
});

describe('projectAll', () => {
  it('should project every product in input order', () => {
    const summary = projectAll(defaultProducts, defaultPlan, defaultScenario);
    expect(summary.results.map((r) => r.productName)).toEqual([
      'CDB - Prefixada',
      'LCI - Pós CDI',
      'LCA - IPCA +',
    ]);
    expect(summary.failures).toEqual([]);
  });

  it('should match single-product projections', () => {
    const summary = projectAll(defaultProducts, defaultPlan, defaultScenario);
    expect(summary.results[0]).toEqual(project(prefixedCDB, defaultPlan, defaultScenario));
    expect(summary.results[2]).toEqual(project(ipcaLCA, defaultPlan, defaultScenario));
  });

  it('should pick the highest final balance as best and the next as runner-up', () => {
    const summary = projectAll(defaultProducts, defaultPlan, defaultScenario);
    expect(summary.best?.productName).toBe('LCI - Pós CDI');
    expect(summary.best?.finalBalance).toBeCloseTo(87538.21, 2);
    expect(summary.runnerUp?.productName).toBe('LCA - IPCA +');
  });

  it('should resolve ties to the earlier product', () => {
    const twin: ProductSpec = { ...prefixedCDB, name: 'CDB twin' };
    const summary = projectAll([prefixedCDB, twin], defaultPlan, defaultScenario);
    expect(summary.results[0].finalBalance).toBe(summary.results[1].finalBalance);
    expect(summary.best?.productName).toBe('CDB - Prefixada');
    expect(summary.runnerUp?.productName).toBe('CDB twin');
  });

  it('should keep projecting after an invalid product', () => {
    const broken: ProductSpecInput = { name: 'Broken', indexerKind: 'selic', rateParameter: 0.1, taxExempt: false };
    const summary = projectAll([broken, ipcaLCA], defaultPlan, defaultScenario);

    expect(summary.results).toHaveLength(1);
    expect(summary.results[0].productName).toBe('LCA - IPCA +');
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0].productName).toBe('Broken');
    expect(summary.failures[0].index).toBe(0);
    expect(summary.failures[0].error).toBe('InvalidProductSpec');
    expect(summary.failures[0].message).toBe('Invalid product specification "Broken"');
    expect(summary.failures[0].issues[0]).toMatch(/^indexerKind: /);
    expect(summary.best?.productName).toBe('LCA - IPCA +');
    expect(summary.runnerUp).toBeNull();
  });

  it('should report a negative rate parameter as a product failure', () => {
    const summary = projectAll(
      [cdiLCI, { ...ipcaLCA, rateParameter: -0.01 }],
      defaultPlan,
      defaultScenario
    );
    expect(summary.results).toHaveLength(1);
    expect(summary.failures[0].index).toBe(1);
    expect(summary.failures[0].issues[0]).toMatch(/^rateParameter: /);
  });

  it('should fail the whole batch on an invalid plan', () => {
    expect(() =>
      projectAll(defaultProducts, { ...defaultPlan, horizonMonths: 0 }, defaultScenario)
    ).toThrow(InvalidContributionPlanError);
  });

  it('should fail the whole batch on an invalid plan even with no products', () => {
    expect(() =>
      projectAll([], { ...defaultPlan, initialDeposit: -5 }, defaultScenario)
    ).toThrow(InvalidContributionPlanError);
  });

  it('should return no best result for an empty product list', () => {
    const summary = projectAll([], defaultPlan, defaultScenario);
    expect(summary.results).toEqual([]);
    expect(summary.best).toBeNull();
    expect(summary.runnerUp).toBeNull();
  });
});

describe('rankResults and selectBest', () => {
  const results = projectAll(defaultProducts, defaultPlan, defaultScenario).results;

  it('should rank by final balance, highest first', () => {
    expect(rankResults(results).map((r) => r.productName)).toEqual([
      'LCI - Pós CDI',
      'LCA - IPCA +',
      'CDB - Prefixada',
    ]);
  });

  it('should not reorder the input array', () => {
    const copy = [...results];
    rankResults(results);
    expect(results).toEqual(copy);
  });

  it('should agree with the head of the ranking', () => {
    expect(selectBest(results)).toBe(rankResults(results)[0]);
  });

  it('should return null for no results', () => {
    expect(selectBest([])).toBeNull();
  });
});
