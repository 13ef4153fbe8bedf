import type {
  CalculationStep,
  CombustionRequest,
  CombustionRun,
  CombustionRunResults,
  CombustionSettingsValues,
  DisplayRow,
  ExhaustResult,
  FuelComposition,
  ValidationWarning,
} from "@shared/schema";
import {
  AIR_COMPOSITION,
  AIR_MOLECULAR_WEIGHT,
  EXHAUST_SPECIES_IDS,
  REACTION_COEFFICIENTS,
  getSpeciesProfile,
  isCombustible,
  isSpeciesId,
} from "@shared/species-library";
import type { IStorage } from "../storage";
import { normalizeFuelComposition, validateFuelComposition } from "../validation";
import { calculateAverageMolecularWeight, computeExhaust, parseFuelComposition } from "./combustion";
import { CombustionError } from "./combustionErrors";

// Display cut-offs for trace components
const MIN_DISPLAY_MOLE_PERCENT = 0.01;
const MIN_DISPLAY_MASS_FLOW = 0.001;

function fmt(val: number, decimals: number = 4): string {
  return val.toLocaleString("en-US", { minimumFractionDigits: decimals, maximumFractionDigits: decimals });
}

function buildDisplayRows(exhaust: ExhaustResult): { compositionRows: DisplayRow[]; massFlowRows: DisplayRow[] } {
  const rows: DisplayRow[] = EXHAUST_SPECIES_IDS.map(id => ({
    species: id,
    label: getSpeciesProfile(id)?.formula ?? id,
    molePercent: exhaust.composition[id],
    massFlow: exhaust.massFlows[id],
  }));
  return {
    compositionRows: rows.filter(r => r.molePercent > MIN_DISPLAY_MOLE_PERCENT),
    massFlowRows: rows.filter(r => r.massFlow > MIN_DISPLAY_MASS_FLOW),
  };
}

function buildCalculationSteps(
  fuelMassFlow: number,
  composition: FuelComposition,
  targetO2Fraction: number,
  exhaust: ExhaustResult,
): CalculationStep[] {
  const steps: CalculationStep[] = [];
  const avgMW = calculateAverageMolecularWeight(composition);

  steps.push({
    category: "Fuel",
    label: "Average Molecular Weight",
    formula: "Σ xᵢ × MWᵢ",
    inputs: Object.entries(composition).map(([id, x]) => ({ name: `x(${id})`, value: fmt(x ?? 0, 6), unit: "mol/mol" })),
    result: { value: fmt(avgMW), unit: "kg/kmol" },
  });
  steps.push({
    category: "Fuel",
    label: "Fuel Molar Flow",
    formula: "Mass Flow ÷ Average MW",
    inputs: [
      { name: "Mass Flow", value: fmt(fuelMassFlow), unit: "kg/s" },
      { name: "Average MW", value: fmt(avgMW), unit: "kg/kmol" },
    ],
    result: { value: fmt(exhaust.fuelMolarFlow, 6), unit: "kmol/s" },
  });

  const demandInputs = Object.entries(composition).flatMap(([id, x]) => {
    if (!isSpeciesId(id) || !isCombustible(id)) return [];
    return [{ name: `${id} (${REACTION_COEFFICIENTS[id].o2} O₂/mol)`, value: fmt(x ?? 0, 6), unit: "mol/mol" }];
  });
  steps.push({
    category: "Stoichiometry",
    label: "Theoretical O₂ Demand",
    formula: "Σ n × xᵢ × O₂ coefficientᵢ",
    inputs: demandInputs,
    result: { value: fmt(exhaust.theoreticalO2, 6), unit: "kmol/s" },
  });
  steps.push({
    category: "Air Requirement",
    label: "O₂ Supply",
    formula: "Bisection on O₂ supply over [D, 5D] until residual O₂ fraction = target",
    inputs: [
      { name: "Target O₂", value: fmt(targetO2Fraction * 100, 3), unit: "mol %" },
      { name: "Theoretical O₂ (D)", value: fmt(exhaust.theoreticalO2, 6), unit: "kmol/s" },
    ],
    result: { value: fmt(exhaust.o2Supply, 6), unit: "kmol/s" },
    notes: `${exhaust.solverIterations} bisection iterations; excess air ratio ${fmt(exhaust.excessAirRatio, 3)}`,
  });
  steps.push({
    category: "Air Requirement",
    label: "Air Mass Flow",
    formula: `O₂ Supply ÷ ${AIR_COMPOSITION.O2} × Air MW`,
    inputs: [
      { name: "Air Molar Flow", value: fmt(exhaust.airMolarFlow, 6), unit: "kmol/s" },
      { name: "Air MW", value: fmt(AIR_MOLECULAR_WEIGHT), unit: "kg/kmol" },
    ],
    result: { value: fmt(exhaust.airMassFlow), unit: "kg/s" },
  });
  steps.push({
    category: "Exhaust",
    label: "Total Exhaust Mass Flow",
    formula: "Σ molar flowᵢ × MWᵢ",
    inputs: EXHAUST_SPECIES_IDS.map(id => ({ name: id, value: fmt(exhaust.massFlows[id]), unit: "kg/s" })),
    result: { value: fmt(exhaust.totalMassFlow), unit: "kg/s" },
  });

  return steps;
}

function raiseOnErrors(warnings: ValidationWarning[]): void {
  const errors = warnings.filter(w => w.severity === "error");
  if (errors.length === 0) return;
  throw new CombustionError(
    errors[0].kind ?? "InvalidComposition",
    errors.map(e => e.message).join(" "),
    { warnings: errors },
  );
}

/**
 * Normalizes and validates a request, runs the engine and records the run.
 */
export async function runCombustionCalculation(
  request: CombustionRequest,
  store: IStorage,
  settings: CombustionSettingsValues,
): Promise<CombustionRun> {
  const normalized = normalizeFuelComposition(
    request.fuelComposition,
    request.compositionUnit,
    settings.compositionSumTolerance,
  );
  const validation = validateFuelComposition(normalized.composition, settings.compositionSumTolerance);
  raiseOnErrors(validation);

  const composition = parseFuelComposition(normalized.composition);
  const targetO2Fraction = request.targetO2Percent / 100;
  const exhaust = computeExhaust(request.fuelMassFlow, composition, targetO2Fraction, {
    unreachableTarget: settings.unreachableTargetPolicy,
  });

  const warnings: ValidationWarning[] = [...normalized.warnings, ...validation];
  if (!exhaust.targetReached) {
    warnings.push({
      field: "Target O₂",
      section: "Air Requirement",
      message: `Target ${fmt(request.targetO2Percent, 2)}% O₂ is outside the reachable range; exhaust O₂ is ${fmt(exhaust.composition.O2, 2)}%.`,
      severity: "warning",
    });
  }

  const combustibles = Object.keys(composition).filter(id => isSpeciesId(id) && isCombustible(id));
  const results: CombustionRunResults = {
    exhaust,
    calculationSteps: buildCalculationSteps(request.fuelMassFlow, composition, targetO2Fraction, exhaust),
    assumptions: [
      { parameter: "Air Composition", value: `${(AIR_COMPOSITION.O2 * 100).toFixed(0)}% O₂ / ${(AIR_COMPOSITION.N2 * 100).toFixed(0)}% N₂`, source: "Standard dry air" },
      { parameter: "Combustion", value: `Complete oxidation of ${combustibles.join(", ")}`, source: "Fixed stoichiometry" },
      { parameter: "Fuel Inerts", value: "He, N₂, H₂O, CO₂, SO₂ and O₂ pass through unreacted", source: "Mass balance" },
    ],
    warnings,
    ...buildDisplayRows(exhaust),
  };

  const run = await store.createCombustionRun({
    name: request.name ?? `Combustion run ${new Date().toISOString()}`,
    input: {
      fuelMassFlow: request.fuelMassFlow,
      fuelComposition: composition,
      targetO2Fraction,
      unreachableTargetPolicy: settings.unreachableTargetPolicy,
    },
    results,
  });
  console.log(`[combustion] Run ${run.id}: air ${fmt(exhaust.airMassFlow, 3)} kg/s, exhaust ${fmt(exhaust.totalMassFlow, 3)} kg/s in ${exhaust.solverIterations} iterations`);
  return run;
}
