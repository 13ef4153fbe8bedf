import { describe, it, expect } from "vitest";
import { DEFAULT_FUEL_COMPOSITION, EXHAUST_SPECIES_IDS } from "@shared/species-library";
import {
  calculateAverageMolecularWeight,
  calculateExhaustBalance,
  calculateMolarFlow,
  calculateTheoreticalO2,
  composeExhaust,
  computeExhaust,
  exhaustO2Fraction,
  parseFuelComposition,
  solveAirRequirement,
} from "./combustion";
import { CombustionError } from "./combustionErrors";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected call to throw");
}

const defaultFractions = Object.fromEntries(
  Object.entries(DEFAULT_FUEL_COMPOSITION).map(([id, pct]) => [id, (pct ?? 0) / 100]),
);

describe("calculateMolarFlow", () => {
  it("divides mass flow by the mole-weighted molecular weight", () => {
    expect(calculateMolarFlow(1, { CH4: 1 })).toBeCloseTo(1 / 16.04, 12);
    expect(calculateAverageMolecularWeight({ CH4: 0.5, N2: 0.5 })).toBeCloseTo(22.025, 10);
    expect(calculateMolarFlow(22.025, { CH4: 0.5, N2: 0.5 })).toBeCloseTo(1, 10);
  });

  it("rejects species outside the registry", () => {
    const err = thrownBy(() => calculateMolarFlow(1, { CH4: 0.9, Ar: 0.1 }));
    expect(err).toBeInstanceOf(CombustionError);
    expect(err).toMatchObject({ kind: "UnknownSpecies", details: { species: ["Ar"] } });
  });
});

describe("parseFuelComposition", () => {
  it("keeps registry species and skips undefined entries", () => {
    expect(parseFuelComposition({ CH4: 0.8, N2: 0.2, He: undefined })).toEqual({ CH4: 0.8, N2: 0.2 });
  });
});

describe("calculateExhaustBalance", () => {
  it("balances methane with air at 1.5x stoichiometric O2", () => {
    const state = calculateExhaustBalance(1, { CH4: 1 }, 3);
    expect(state.theoreticalO2).toBe(2);
    expect(state.molarFlows.CO2).toBe(1);
    expect(state.molarFlows.H2O).toBe(2);
    expect(state.molarFlows.N2).toBeCloseTo((3 / 0.21) * 0.79, 10);
    expect(state.residualO2).toBe(1);
    expect(state.totalExhaust).toBeCloseTo(4 + (3 / 0.21) * 0.79, 10);
  });

  it("turns hydrogen sulfide into sulfur dioxide and water", () => {
    const state = calculateExhaustBalance(1, { H2S: 1 }, 1.5);
    expect(state.molarFlows.SO2).toBe(1);
    expect(state.molarFlows.H2O).toBe(1);
    expect(state.molarFlows.CO2).toBe(0);
    expect(state.residualO2).toBe(0);
  });

  it("passes fuel inerts and products through to the exhaust", () => {
    const state = calculateExhaustBalance(2, { CH4: 0.5, He: 0.2, N2: 0.2, H2O: 0.05, CO2: 0.05 }, 2);
    expect(state.molarFlows.CO2).toBeCloseTo(1.1, 12);
    expect(state.molarFlows.H2O).toBeCloseTo(2.1, 12);
    expect(state.molarFlows.He).toBeCloseTo(0.4, 12);
    expect(state.molarFlows.N2).toBeCloseTo((2 / 0.21) * 0.79 + 0.4, 10);
    expect(state.residualO2).toBeCloseTo(0, 12);
  });

  it("adds fuel-borne O2 to the residual", () => {
    const state = calculateExhaustBalance(1, { CH4: 0.9, O2: 0.1 }, 1.8);
    expect(state.theoreticalO2).toBeCloseTo(1.8, 12);
    expect(state.residualO2).toBeCloseTo(0.1, 12);
  });

  it("reports a negative residual below the theoretical demand", () => {
    expect(calculateExhaustBalance(1, { CH4: 1 }, 1).residualO2).toBe(-1);
  });
});

describe("calculateTheoreticalO2", () => {
  it("sums the O2 coefficient of every combustible", () => {
    expect(calculateTheoreticalO2(10, { CH4: 0.5, C2H6: 0.2, C3H8: 0.1, H2S: 0.1, N2: 0.1 })).toBeCloseTo(
      10 * (0.5 * 2 + 0.2 * 3.5 + 0.1 * 5 + 0.1 * 1.5),
      10,
    );
  });
});

describe("solveAirRequirement", () => {
  const methaneFlow = 1 / 16.04;

  it("converges on the target O2 fraction", () => {
    const air = solveAirRequirement(methaneFlow, { CH4: 1 }, 0.03);
    expect(air.iterations).toBe(32);
    expect(air.targetReached).toBe(true);
    const fraction = exhaustO2Fraction(calculateExhaustBalance(methaneFlow, { CH4: 1 }, air.o2Supply));
    expect(Math.abs(fraction - 0.03)).toBeLessThan(1e-4);
    expect(air.airMolarFlow).toBeCloseTo(air.o2Supply / 0.21, 12);
  });

  it("rejects a fuel with no combustibles", () => {
    const err = thrownBy(() => solveAirRequirement(1, { He: 0.5, N2: 0.5 }, 0.03));
    expect(err).toMatchObject({ kind: "DegenerateComposition" });
  });

  it("rejects a target above what 5x stoichiometric O2 reaches", () => {
    const err = thrownBy(() => solveAirRequirement(methaneFlow, { CH4: 1 }, 0.2));
    expect(err).toBeInstanceOf(CombustionError);
    expect(err).toMatchObject({ kind: "UnreachableTarget", details: { targetO2Fraction: 0.2 } });
  });

  it("returns the bracket end for an unreachable target when clamping", () => {
    const air = solveAirRequirement(methaneFlow, { CH4: 1 }, 0.2, { unreachableTarget: "clamp" });
    expect(air.targetReached).toBe(false);
    expect(air.o2Supply).toBeCloseTo(5 * 2 * methaneFlow, 9);
  });

  it("rejects a target below the fraction left by fuel-borne O2", () => {
    const err = thrownBy(() => solveAirRequirement(1, { CH4: 0.5, O2: 0.5 }, 0.001));
    expect(err).toMatchObject({ kind: "UnreachableTarget" });
  });

  it("meets the target at gram-per-second and smaller flows", () => {
    for (const massFlow of [1e-3, 1e-6, 1e-9]) {
      const fuelFlow = massFlow / 16.04;
      const air = solveAirRequirement(fuelFlow, { CH4: 1 }, 0.03);
      const fraction = exhaustO2Fraction(calculateExhaustBalance(fuelFlow, { CH4: 1 }, air.o2Supply));
      expect(Math.abs(fraction - 0.03)).toBeLessThan(1e-6);
      expect(air.iterations).toBe(32);
    }
  });

  it("stops within the iteration cap for very large flows", () => {
    const air = solveAirRequirement(1e12, { CH4: 1 }, 0.03);
    expect(air.iterations).toBeLessThanOrEqual(200);
    const fraction = exhaustO2Fraction(calculateExhaustBalance(1e12, { CH4: 1 }, air.o2Supply));
    expect(Math.abs(fraction - 0.03)).toBeLessThan(1e-4);
  });
});

describe("composeExhaust", () => {
  it("derives the excess air ratio from supply over demand", () => {
    const exhaust = composeExhaust(1, { CH4: 1 }, 3 / 0.21);
    expect(exhaust.o2Supply).toBeCloseTo(3, 12);
    expect(exhaust.excessAirRatio).toBeCloseTo(1.5, 12);
    expect(exhaust.massFlows.CO2).toBeCloseTo(44.01, 10);
  });
});

describe("computeExhaust", () => {
  it("burns 1 kg/s of methane to 3% exhaust O2", () => {
    const result = computeExhaust(1, { CH4: 1 }, 0.03);

    expect(result.solverIterations).toBe(32);
    expect(result.targetReached).toBe(true);
    expect(result.airMassFlow).toBeCloseTo(20.2832, 3);
    expect(result.composition.O2).toBeCloseTo(3, 3);
    expect(result.composition.N2).toBeCloseTo(72.5656, 2);
    expect(result.composition.CO2).toBeCloseTo(8.1448, 3);
    expect(result.composition.H2O).toBeCloseTo(16.2895, 3);
    expect(result.composition.SO2).toBe(0);
    expect(result.composition.He).toBe(0);
  });

  it("keeps the exhaust composition summing to 100 percent", () => {
    const result = computeExhaust(2.5, defaultFractions, 0.05);
    const total = EXHAUST_SPECIES_IDS.reduce((sum, id) => sum + result.composition[id], 0);
    expect(total).toBeCloseTo(100, 6);
  });

  it("conserves mass between fuel plus air and exhaust", () => {
    const result = computeExhaust(2.5, defaultFractions, 0.05);
    const inflow = 2.5 + result.airMassFlow;
    expect(Math.abs(result.totalMassFlow - inflow) / inflow).toBeLessThan(1e-3);
    expect(result.massFlows.SO2).toBeGreaterThan(0);
    expect(result.massFlows.He).toBeGreaterThan(0);
  });

  it("meets the requested O2 fraction", () => {
    for (const target of [0.01, 0.05, 0.1]) {
      const result = computeExhaust(1, { CH4: 0.9, C2H6: 0.05, N2: 0.05 }, target);
      expect(Math.abs(result.molarFlows.O2 / result.totalMolarFlow - target)).toBeLessThan(1e-4);
    }
  });

  it("needs more air for a higher O2 target", () => {
    const low = computeExhaust(1, { CH4: 1 }, 0.03);
    const high = computeExhaust(1, { CH4: 1 }, 0.05);
    expect(high.airMassFlow).toBeGreaterThan(low.airMassFlow);
  });

  it("returns identical results for identical inputs", () => {
    expect(computeExhaust(1, { CH4: 1 }, 0.03)).toStrictEqual(computeExhaust(1, { CH4: 1 }, 0.03));
  });

  it("returns a frozen result", () => {
    const result = computeExhaust(1, { CH4: 1 }, 0.03);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.composition)).toBe(true);
    expect(Object.isFrozen(result.massFlows)).toBe(true);
    expect(Object.isFrozen(result.molarFlows)).toBe(true);
  });

  it("meets the target for a 1 g/s fuel flow", () => {
    const result = computeExhaust(0.001, { CH4: 1 }, 0.03);
    expect(Math.abs(result.molarFlows.O2 / result.totalMolarFlow - 0.03)).toBeLessThan(1e-4);
    expect(result.airMassFlow).toBeCloseTo(0.020283, 5);
  });

  it("rejects a non-positive fuel mass flow", () => {
    expect(thrownBy(() => computeExhaust(0, { CH4: 1 }, 0.03))).toMatchObject({ kind: "InvalidFlow" });
    expect(thrownBy(() => computeExhaust(Number.NaN, { CH4: 1 }, 0.03))).toMatchObject({ kind: "InvalidFlow" });
  });

  it("rejects a target outside (0, 1)", () => {
    expect(thrownBy(() => computeExhaust(1, { CH4: 1 }, 0))).toMatchObject({ kind: "InvalidFlow" });
    expect(thrownBy(() => computeExhaust(1, { CH4: 1 }, 1))).toMatchObject({ kind: "InvalidFlow" });
  });

  it("rejects negative mole fractions", () => {
    const err = thrownBy(() => computeExhaust(1, { CH4: 1.1, N2: -0.1 }, 0.03));
    expect(err).toMatchObject({ kind: "InvalidComposition", details: { species: ["N2"] } });
  });

  it("rejects unknown species even at zero fraction", () => {
    expect(thrownBy(() => computeExhaust(1, { CH4: 1, Xe: 0 }, 0.03))).toMatchObject({ kind: "UnknownSpecies" });
  });

  it("rejects an all-inert fuel", () => {
    expect(thrownBy(() => computeExhaust(1, { He: 1 }, 0.03))).toMatchObject({ kind: "DegenerateComposition" });
  });
});
