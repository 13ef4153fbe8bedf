import { isCombustible, isSpeciesId } from "@shared/species-library";
import type { ValidationWarning } from "@shared/schema";

export type { ValidationWarning };

export type CompositionUnit = "percent" | "fraction";

export interface NormalizedComposition {
  composition: Record<string, number>;
  originalTotal: number;
  rescaled: boolean;
  warnings: ValidationWarning[];
}

const SECTION = "Fuel Composition";

function fmtPct(fraction: number): string {
  return `${Number((fraction * 100).toPrecision(8))}%`;
}

/**
 * Converts a caller composition to mole fractions. Zero entries of known
 * species are dropped.
 * Percent input is divided by its own total. Fraction input is rescaled only
 * when it sums above 1; a shortfall is left for validation to report.
 */
export function normalizeFuelComposition(
  raw: Readonly<Record<string, number>>,
  unit: CompositionUnit,
  tolerance: number,
): NormalizedComposition {
  const warnings: ValidationWarning[] = [];
  const composition: Record<string, number> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (value === 0 && isSpeciesId(key)) continue;
    composition[key] = value;
  }

  const scale = unit === "percent" ? 100 : 1;
  const rawTotal = Object.values(composition).reduce((sum, v) => sum + v, 0);
  const originalTotal = rawTotal / scale;
  const divisor = (unit === "percent" && rawTotal > 0) || rawTotal > 1 ? rawTotal : scale;
  const rescaled = divisor !== scale;

  for (const key of Object.keys(composition)) {
    composition[key] = composition[key] / divisor;
  }

  if (rescaled && Math.abs(originalTotal - 1) > tolerance) {
    warnings.push({
      field: "Total",
      section: SECTION,
      message: `Composition summed to ${fmtPct(originalTotal)}; fractions were rescaled to 100%.`,
      severity: "warning",
    });
  }

  return { composition, originalTotal, rescaled, warnings };
}

export function validateFuelComposition(
  composition: Readonly<Record<string, number>>,
  tolerance: number,
): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];
  let hasCombustible = false;

  for (const [key, fraction] of Object.entries(composition)) {
    if (!isSpeciesId(key)) {
      warnings.push({ field: key, section: SECTION, message: `Unknown species "${key}".`, severity: "error", kind: "UnknownSpecies" });
      continue;
    }
    if (!Number.isFinite(fraction) || fraction < 0) {
      warnings.push({ field: key, section: SECTION, message: `Mole fraction for ${key} must be a non-negative number.`, severity: "error", kind: "InvalidComposition" });
      continue;
    }
    if (fraction > 0 && isCombustible(key)) hasCombustible = true;
  }

  const total = Object.values(composition).reduce((sum, v) => sum + v, 0);
  if (Math.abs(total - 1) > tolerance) {
    warnings.push({
      field: "Total",
      section: SECTION,
      message: `Composition must sum to 100% (currently ${fmtPct(total)}).`,
      severity: "error",
      kind: "InvalidComposition",
    });
  }

  if (!hasCombustible) {
    warnings.push({
      field: "Combustibles",
      section: SECTION,
      message: "Fuel contains no combustible species (CH4, C2H6, C3H8, C6H6 or H2S).",
      severity: "error",
      kind: "DegenerateComposition",
    });
  }

  return warnings;
}
