/**
 * Shared data model for the fuel gas combustion calculator.
 * Defines the database tables, request schemas and result types used by the
 * calculation engine, the storage layer and the HTTP routes.
 */

import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, jsonb } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import type { ExhaustSpeciesId, SpeciesId } from "./species-library";

/** Fuel species → mole fraction in [0, 1]. */
export type FuelComposition = Partial<Record<SpeciesId, number>>;

export type UnreachableTargetPolicy = "error" | "clamp";

/**
 * ExhaustResult: the outcome of one combustion calculation.
 * Molar flows are in kmol/s, mass flows in kg/s, composition in mol %.
 */
export interface ExhaustResult {
  composition: Readonly<Record<ExhaustSpeciesId, number>>;
  massFlows: Readonly<Record<ExhaustSpeciesId, number>>;
  molarFlows: Readonly<Record<ExhaustSpeciesId, number>>;
  totalMassFlow: number;
  totalMolarFlow: number;
  airMassFlow: number;
  airMolarFlow: number;
  fuelMolarFlow: number;
  theoreticalO2: number;
  o2Supply: number;
  excessAirRatio: number;
  solverIterations: number;
  targetReached: boolean;
}

export interface ValidationWarning {
  field: string;
  section: string;
  message: string;
  severity: "error" | "warning" | "info";
  kind?: "UnknownSpecies" | "InvalidComposition" | "DegenerateComposition";
}

export type CalculationStep = {
  category: string;
  label: string;
  formula: string;
  inputs: Array<{ name: string; value: string; unit: string }>;
  result: { value: string; unit: string };
  notes?: string;
};

export type DisplayRow = {
  species: ExhaustSpeciesId;
  label: string;
  molePercent: number;
  massFlow: number;
};

export type CombustionRunResults = {
  exhaust: ExhaustResult;
  calculationSteps: CalculationStep[];
  assumptions: Array<{ parameter: string; value: string; source: string }>;
  warnings: ValidationWarning[];
  compositionRows: DisplayRow[];
  massFlowRows: DisplayRow[];
};

/**
 * Combustion request: what a client posts to run a calculation.
 * The fuel composition is keyed by species id; unknown keys are rejected by
 * the engine, not here, so the caller gets an UnknownSpecies error.
 */
export const combustionRequestSchema = z.object({
  name: z.string().trim().min(1).max(200).optional(),
  fuelMassFlow: z.number().positive(),
  fuelComposition: z.record(z.string(), z.number()),
  compositionUnit: z.enum(["percent", "fraction"]).default("percent"),
  targetO2Percent: z.number().gt(0).lt(100),
});

export type CombustionRequest = z.infer<typeof combustionRequestSchema>;

/**
 * Combustion runs table: every calculation the service performs.
 * Stores the normalized input alongside the full results for later export.
 */
export const combustionRuns = pgTable("combustion_runs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull(),
  input: jsonb("input").$type<{
    fuelMassFlow: number;
    fuelComposition: FuelComposition;
    targetO2Fraction: number;
    unreachableTargetPolicy: UnreachableTargetPolicy;
  }>().notNull(),
  results: jsonb("results").$type<CombustionRunResults>().notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type InsertCombustionRun = typeof combustionRuns.$inferInsert;
export type CombustionRun = typeof combustionRuns.$inferSelect;

/**
 * Combustion settings table: solver and validation settings editable at runtime.
 */
export const combustionSettings = pgTable("combustion_settings", {
  key: text("key").primaryKey(),
  value: jsonb("value").$type<unknown>().notNull(),
  description: text("description"),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// Insert schema for settings - validates the row written on PATCH
export const insertCombustionSettingSchema = createInsertSchema(combustionSettings).omit({ updatedAt: true });
export type InsertCombustionSetting = typeof combustionSettings.$inferInsert;
export type CombustionSetting = typeof combustionSettings.$inferSelect;

export const settingValueSchemas = {
  unreachableTargetPolicy: z.enum(["error", "clamp"]),
  compositionSumTolerance: z.number().positive().lt(0.5),
} as const;

export type SettingKey = keyof typeof settingValueSchemas;

export type CombustionSettingsValues = {
  [K in SettingKey]: z.infer<(typeof settingValueSchemas)[K]>;
};

