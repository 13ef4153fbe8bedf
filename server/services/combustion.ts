import {
  AIR_COMPOSITION,
  AIR_MOLECULAR_WEIGHT,
  EXHAUST_SPECIES_IDS,
  MOLECULAR_WEIGHTS,
  PASS_THROUGH,
  REACTION_COEFFICIENTS,
  isSpeciesId,
  type ExhaustSpeciesId,
  type SpeciesId,
} from "@shared/species-library";
import type { ExhaustResult, FuelComposition, UnreachableTargetPolicy } from "@shared/schema";
import { CombustionError } from "./combustionErrors";

// 1e-6 mol/s, tightened in proportion for demands below 1 kmol/s
const BRACKET_TOLERANCE = 1e-9;
const BRACKET_MULTIPLIER = 5;
const MAX_ITERATIONS = 200;

export type ExhaustFlows = Record<ExhaustSpeciesId, number>;

/** Solver-internal snapshot of the exhaust at one trial O2 supply. */
export interface CombustionState {
  o2Supply: number;
  theoreticalO2: number;
  molarFlows: ExhaustFlows;
  totalExhaust: number;
  residualO2: number;
}

export interface AirRequirement {
  o2Supply: number;
  airMolarFlow: number;
  iterations: number;
  targetReached: boolean;
}

export interface CombustionOptions {
  unreachableTarget?: UnreachableTargetPolicy;
}

function emptyFlows(): ExhaustFlows {
  return { CO2: 0, H2O: 0, SO2: 0, He: 0, O2: 0, N2: 0 };
}

function entriesOf(composition: FuelComposition): Array<[SpeciesId, number]> {
  const entries: Array<[SpeciesId, number]> = [];
  for (const [key, fraction] of Object.entries(composition)) {
    if (isSpeciesId(key) && fraction !== undefined) entries.push([key, fraction]);
  }
  return entries;
}

/**
 * Narrows caller-supplied keys to the species registry. Any key outside it
 * fails the whole calculation.
 */
export function parseFuelComposition(raw: Readonly<Record<string, number | undefined>>): FuelComposition {
  const composition: FuelComposition = {};
  const unknown: string[] = [];
  for (const [key, fraction] of Object.entries(raw)) {
    if (fraction === undefined) continue;
    if (isSpeciesId(key)) {
      composition[key] = fraction;
    } else {
      unknown.push(key);
    }
  }
  if (unknown.length > 0) {
    throw new CombustionError("UnknownSpecies", `Unknown species in fuel composition: ${unknown.join(", ")}`, { species: unknown });
  }
  return composition;
}

export function calculateAverageMolecularWeight(composition: Readonly<Record<string, number | undefined>>): number {
  const parsed = parseFuelComposition(composition);
  return entriesOf(parsed).reduce((sum, [id, fraction]) => sum + fraction * MOLECULAR_WEIGHTS[id], 0);
}

/** Fuel mass flow (kg/s) to molar flow (kmol/s). */
export function calculateMolarFlow(massFlow: number, composition: Readonly<Record<string, number | undefined>>): number {
  return massFlow / calculateAverageMolecularWeight(composition);
}

export function calculateTheoreticalO2(fuelMolarFlow: number, composition: FuelComposition): number {
  return entriesOf(composition).reduce(
    (sum, [id, fraction]) => sum + fuelMolarFlow * fraction * REACTION_COEFFICIENTS[id].o2,
    0,
  );
}

/**
 * Exhaust molar flows for a trial O2 supply. Residual O2 goes negative when the
 * supply is below the theoretical demand; the solver never evaluates there.
 */
export function calculateExhaustBalance(
  fuelMolarFlow: number,
  composition: FuelComposition,
  o2Supply: number,
): CombustionState {
  const flows = emptyFlows();
  let theoreticalO2 = 0;

  for (const [id, fraction] of entriesOf(composition)) {
    const moles = fuelMolarFlow * fraction;
    const coeff = REACTION_COEFFICIENTS[id];
    theoreticalO2 += moles * coeff.o2;
    flows.CO2 += moles * coeff.co2;
    flows.H2O += moles * coeff.h2o;
    flows.SO2 += moles * coeff.so2;

    const passesAs = PASS_THROUGH[id];
    if (passesAs) flows[passesAs] += moles;
  }

  flows.N2 += (o2Supply / AIR_COMPOSITION.O2) * AIR_COMPOSITION.N2;
  flows.O2 += o2Supply - theoreticalO2;

  const totalExhaust = EXHAUST_SPECIES_IDS.reduce((sum, id) => sum + flows[id], 0);

  return {
    o2Supply,
    theoreticalO2,
    molarFlows: flows,
    totalExhaust,
    residualO2: flows.O2,
  };
}

export function exhaustO2Fraction(state: CombustionState): number {
  return state.residualO2 / state.totalExhaust;
}

/**
 * Bisects the O2 supply between stoichiometric and 5× stoichiometric until the
 * residual O2 mole fraction in the exhaust meets the target.
 */
export function solveAirRequirement(
  fuelMolarFlow: number,
  composition: FuelComposition,
  targetO2Fraction: number,
  options: CombustionOptions = {},
): AirRequirement {
  const policy = options.unreachableTarget ?? "error";
  const theoreticalO2 = calculateTheoreticalO2(fuelMolarFlow, composition);

  if (!(theoreticalO2 > 0)) {
    throw new CombustionError(
      "DegenerateComposition",
      "Fuel composition contains no combustible species; theoretical O2 demand is zero",
      { theoreticalO2 },
    );
  }

  let low = theoreticalO2;
  let high = theoreticalO2 * BRACKET_MULTIPLIER;

  const lowFraction = exhaustO2Fraction(calculateExhaustBalance(fuelMolarFlow, composition, low));
  const highFraction = exhaustO2Fraction(calculateExhaustBalance(fuelMolarFlow, composition, high));
  const targetReached = targetO2Fraction >= lowFraction && targetO2Fraction <= highFraction;

  if (!targetReached && policy === "error") {
    throw new CombustionError(
      "UnreachableTarget",
      `Target O2 fraction ${targetO2Fraction} is outside the reachable range ` +
        `[${lowFraction.toFixed(6)}, ${highFraction.toFixed(6)}] for 1-${BRACKET_MULTIPLIER}× stoichiometric O2`,
      { targetO2Fraction, minFraction: lowFraction, maxFraction: highFraction },
    );
  }

  const tolerance = BRACKET_TOLERANCE * Math.min(1, theoreticalO2);
  let iterations = 0;
  while (high - low > tolerance && iterations < MAX_ITERATIONS) {
    iterations++;
    const mid = (low + high) / 2;
    const fraction = exhaustO2Fraction(calculateExhaustBalance(fuelMolarFlow, composition, mid));
    if (fraction < targetO2Fraction) {
      low = mid;
    } else {
      high = mid;
    }
  }

  return {
    o2Supply: high,
    airMolarFlow: high / AIR_COMPOSITION.O2,
    iterations,
    targetReached,
  };
}

function mapFlows(fn: (id: ExhaustSpeciesId) => number): ExhaustFlows {
  const out = emptyFlows();
  for (const id of EXHAUST_SPECIES_IDS) out[id] = fn(id);
  return out;
}

/** Final exhaust at the converged air rate, evaluated once. */
export function composeExhaust(
  fuelMolarFlow: number,
  composition: FuelComposition,
  airMolarFlow: number,
): Omit<ExhaustResult, "solverIterations" | "targetReached"> {
  const o2Supply = airMolarFlow * AIR_COMPOSITION.O2;
  const state = calculateExhaustBalance(fuelMolarFlow, composition, o2Supply);
  const molarFlows = { ...state.molarFlows };
  const massFlows = mapFlows(id => molarFlows[id] * MOLECULAR_WEIGHTS[id]);
  const percent = mapFlows(id => (molarFlows[id] / state.totalExhaust) * 100);
  const totalMassFlow = EXHAUST_SPECIES_IDS.reduce((sum, id) => sum + massFlows[id], 0);

  return {
    composition: percent,
    massFlows,
    molarFlows,
    totalMassFlow,
    totalMolarFlow: state.totalExhaust,
    airMassFlow: airMolarFlow * AIR_MOLECULAR_WEIGHT,
    airMolarFlow,
    fuelMolarFlow,
    theoreticalO2: state.theoreticalO2,
    o2Supply,
    excessAirRatio: o2Supply / state.theoreticalO2,
  };
}

function assertInputs(fuelMassFlow: number, fuelComposition: Readonly<Record<string, number>>, targetO2Fraction: number): void {
  if (!Number.isFinite(fuelMassFlow) || fuelMassFlow <= 0) {
    throw new CombustionError("InvalidFlow", `Fuel mass flow must be a positive number (got ${fuelMassFlow})`, { fuelMassFlow });
  }
  if (!Number.isFinite(targetO2Fraction) || targetO2Fraction <= 0 || targetO2Fraction >= 1) {
    throw new CombustionError("InvalidFlow", `Target O2 fraction must lie between 0 and 1 (got ${targetO2Fraction})`, { targetO2Fraction });
  }
  const invalid = Object.entries(fuelComposition)
    .filter(([, fraction]) => !Number.isFinite(fraction) || fraction < 0)
    .map(([key]) => key);
  if (invalid.length > 0) {
    throw new CombustionError("InvalidComposition", `Mole fractions must be non-negative numbers: ${invalid.join(", ")}`, { species: invalid });
  }
}

export function computeExhaust(
  fuelMassFlow: number,
  fuelComposition: Readonly<Record<string, number>>,
  targetO2Fraction: number,
  options: CombustionOptions = {},
): ExhaustResult {
  assertInputs(fuelMassFlow, fuelComposition, targetO2Fraction);
  const composition = parseFuelComposition(fuelComposition);
  const fuelMolarFlow = calculateMolarFlow(fuelMassFlow, composition);
  const air = solveAirRequirement(fuelMolarFlow, composition, targetO2Fraction, options);
  const exhaust = composeExhaust(fuelMolarFlow, composition, air.airMolarFlow);

  return Object.freeze({
    ...exhaust,
    composition: Object.freeze(exhaust.composition),
    massFlows: Object.freeze(exhaust.massFlows),
    molarFlows: Object.freeze(exhaust.molarFlows),
    solverIterations: air.iterations,
    targetReached: air.targetReached,
  });
}
