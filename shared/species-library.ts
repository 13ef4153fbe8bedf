export const SPECIES_IDS = [
  "CH4",
  "C2H6",
  "C3H8",
  "C6H6",
  "He",
  "N2",
  "H2O",
  "H2S",
  "O2",
  "CO2",
  "SO2",
] as const;

export type SpeciesId = (typeof SPECIES_IDS)[number];

export const EXHAUST_SPECIES_IDS = ["CO2", "H2O", "SO2", "He", "O2", "N2"] as const;

export type ExhaustSpeciesId = (typeof EXHAUST_SPECIES_IDS)[number];

/** Stoichiometric products and O2 demand per mole of a fuel species burned. */
export interface ReactionCoefficient {
  o2: number;
  co2: number;
  h2o: number;
  so2: number;
}

export interface SpeciesProfile {
  id: SpeciesId;
  displayName: string;
  formula: string;
  molecularWeight: number;
  group: "hydrocarbon" | "sulfur" | "inert" | "oxidizer" | "product";
  reaction: string | null;
}

// kg/kmol
export const MOLECULAR_WEIGHTS: Readonly<Record<SpeciesId, number>> = Object.freeze({
  CH4: 16.04,
  C2H6: 30.07,
  C3H8: 44.1,
  C6H6: 78.11,
  He: 4.003,
  N2: 28.01,
  H2O: 18.02,
  H2S: 34.08,
  O2: 32.0,
  CO2: 44.01,
  SO2: 64.06,
});

const NO_REACTION: ReactionCoefficient = Object.freeze({ o2: 0, co2: 0, h2o: 0, so2: 0 });

export const REACTION_COEFFICIENTS: Readonly<Record<SpeciesId, Readonly<ReactionCoefficient>>> = Object.freeze({
  CH4: Object.freeze({ o2: 2, co2: 1, h2o: 2, so2: 0 }), // CH4 + 2O2 -> CO2 + 2H2O
  C2H6: Object.freeze({ o2: 3.5, co2: 2, h2o: 3, so2: 0 }), // C2H6 + 3.5O2 -> 2CO2 + 3H2O
  C3H8: Object.freeze({ o2: 5, co2: 3, h2o: 4, so2: 0 }), // C3H8 + 5O2 -> 3CO2 + 4H2O
  C6H6: Object.freeze({ o2: 7.5, co2: 6, h2o: 3, so2: 0 }), // C6H6 + 7.5O2 -> 6CO2 + 3H2O
  H2S: Object.freeze({ o2: 1.5, co2: 0, h2o: 1, so2: 1 }), // H2S + 1.5O2 -> SO2 + H2O
  He: NO_REACTION,
  N2: NO_REACTION,
  H2O: NO_REACTION,
  O2: NO_REACTION,
  CO2: NO_REACTION,
  SO2: NO_REACTION,
});

/** Species that leave the burner unchanged, keyed to the exhaust species they become. */
export const PASS_THROUGH: Readonly<Record<SpeciesId, ExhaustSpeciesId | null>> = Object.freeze({
  CH4: null,
  C2H6: null,
  C3H8: null,
  C6H6: null,
  H2S: null,
  He: "He",
  N2: "N2",
  H2O: "H2O",
  O2: "O2",
  CO2: "CO2",
  SO2: "SO2",
});

export const AIR_COMPOSITION = Object.freeze({
  O2: 0.21,
  N2: 0.79,
});

export const AIR_MOLECULAR_WEIGHT =
  AIR_COMPOSITION.O2 * MOLECULAR_WEIGHTS.O2 + AIR_COMPOSITION.N2 * MOLECULAR_WEIGHTS.N2;

export const SPECIES_LIBRARY: SpeciesProfile[] = [
  { id: "CH4", displayName: "Methane", formula: "CH₄", molecularWeight: MOLECULAR_WEIGHTS.CH4, group: "hydrocarbon", reaction: "CH₄ + 2O₂ → CO₂ + 2H₂O" },
  { id: "C2H6", displayName: "Ethane", formula: "C₂H₆", molecularWeight: MOLECULAR_WEIGHTS.C2H6, group: "hydrocarbon", reaction: "C₂H₆ + 3.5O₂ → 2CO₂ + 3H₂O" },
  { id: "C3H8", displayName: "Propane", formula: "C₃H₈", molecularWeight: MOLECULAR_WEIGHTS.C3H8, group: "hydrocarbon", reaction: "C₃H₈ + 5O₂ → 3CO₂ + 4H₂O" },
  { id: "C6H6", displayName: "Benzene", formula: "C₆H₆", molecularWeight: MOLECULAR_WEIGHTS.C6H6, group: "hydrocarbon", reaction: "C₆H₆ + 7.5O₂ → 6CO₂ + 3H₂O" },
  { id: "H2S", displayName: "Hydrogen Sulfide", formula: "H₂S", molecularWeight: MOLECULAR_WEIGHTS.H2S, group: "sulfur", reaction: "H₂S + 1.5O₂ → SO₂ + H₂O" },
  { id: "He", displayName: "Helium", formula: "He", molecularWeight: MOLECULAR_WEIGHTS.He, group: "inert", reaction: null },
  { id: "N2", displayName: "Nitrogen", formula: "N₂", molecularWeight: MOLECULAR_WEIGHTS.N2, group: "inert", reaction: null },
  { id: "H2O", displayName: "Water Vapor", formula: "H₂O", molecularWeight: MOLECULAR_WEIGHTS.H2O, group: "product", reaction: null },
  { id: "CO2", displayName: "Carbon Dioxide", formula: "CO₂", molecularWeight: MOLECULAR_WEIGHTS.CO2, group: "product", reaction: null },
  { id: "SO2", displayName: "Sulfur Dioxide", formula: "SO₂", molecularWeight: MOLECULAR_WEIGHTS.SO2, group: "product", reaction: null },
  { id: "O2", displayName: "Oxygen", formula: "O₂", molecularWeight: MOLECULAR_WEIGHTS.O2, group: "oxidizer", reaction: null },
];

export const speciesGroupLabels: Record<SpeciesProfile["group"], string> = {
  hydrocarbon: "Hydrocarbons",
  sulfur: "Sulfur Compounds",
  inert: "Inerts",
  oxidizer: "Oxidizer",
  product: "Combustion Products",
};

// Typical associated-gas fuel, mol %
export const DEFAULT_FUEL_COMPOSITION: Readonly<Partial<Record<SpeciesId, number>>> = Object.freeze({
  CH4: 58.57,
  C2H6: 0.08,
  C3H8: 0.01,
  C6H6: 0.0023,
  He: 0.15,
  N2: 36.9,
  H2O: 0.45,
  H2S: 0.0004,
  CO2: 3.8,
});

const SPECIES_ID_SET: ReadonlySet<string> = new Set(SPECIES_IDS);

export function isSpeciesId(key: string): key is SpeciesId {
  return SPECIES_ID_SET.has(key);
}

export function isCombustible(id: SpeciesId): boolean {
  return REACTION_COEFFICIENTS[id].o2 > 0;
}

export function getSpeciesProfile(id: SpeciesId): SpeciesProfile | undefined {
  return SPECIES_LIBRARY.find(s => s.id === id);
}
