/**
 * REST API routes for the combustion calculator.
 *
 * - Species registry, stoichiometry and the default fuel composition
 * - Combustion calculations, persisted as runs
 * - Excel and PDF export of a run
 * - Runtime settings for the solver and input validation
 */
import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { storage, type IStorage } from "./storage";
import { combustionRequestSchema, insertCombustionSettingSchema, settingValueSchemas } from "@shared/schema";
import {
  AIR_COMPOSITION,
  DEFAULT_FUEL_COMPOSITION,
  PASS_THROUGH,
  REACTION_COEFFICIENTS,
  SPECIES_LIBRARY,
  speciesGroupLabels,
} from "@shared/species-library";
import { runCombustionCalculation } from "./services/combustionRuns";
import { isCombustionError } from "./services/combustionErrors";
import { exportCombustionExcel, exportCombustionPDF } from "./services/exportService";
import { getSettings, invalidateSettingsCache, isSettingKey, DEFAULT_SETTINGS, SETTING_DESCRIPTIONS } from "./settings-loader";

function safeFileName(name: string): string {
  return (name || "combustion-run").replace(/[^a-zA-Z0-9_-]/g, "_");
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  store: IStorage = storage,
): Promise<Server> {
  // =========================================================================
  // Species & Reference Data
  // =========================================================================

  app.get("/api/species", (_req: Request, res: Response) => {
    res.json({
      species: SPECIES_LIBRARY.map(s => ({
        ...s,
        coefficients: REACTION_COEFFICIENTS[s.id],
        passesThroughAs: PASS_THROUGH[s.id],
      })),
      groups: speciesGroupLabels,
      air: AIR_COMPOSITION,
    });
  });

  app.get("/api/fuel-compositions/default", (_req: Request, res: Response) => {
    res.json({ unit: "percent", composition: DEFAULT_FUEL_COMPOSITION });
  });

  // =========================================================================
  // Combustion Calculations
  // =========================================================================

  app.post("/api/combustion/calculate", async (req: Request, res: Response) => {
    try {
      const request = combustionRequestSchema.parse(req.body);
      const settings = await getSettings(store);
      const run = await runCombustionCalculation(request, store, settings);
      res.status(201).json(run);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return res.status(400).json({ error: error.errors });
      }
      if (isCombustionError(error)) {
        console.warn(`Combustion calculation rejected (${error.kind}): ${error.message}`);
        return res.status(422).json({ error: error.message, kind: error.kind, details: error.details });
      }
      console.error("Error running combustion calculation:", error);
      res.status(500).json({ error: "Failed to run combustion calculation" });
    }
  });

  app.get("/api/combustion-runs", async (_req: Request, res: Response) => {
    try {
      const runs = await store.getAllCombustionRuns();
      res.json(runs);
    } catch (error) {
      console.error("Error fetching combustion runs:", error);
      res.status(500).json({ error: "Failed to fetch combustion runs" });
    }
  });

  app.get("/api/combustion-runs/:id", async (req: Request, res: Response) => {
    try {
      const run = await store.getCombustionRun(req.params.id);
      if (!run) return res.status(404).json({ error: "Combustion run not found" });
      res.json(run);
    } catch (error) {
      console.error("Error fetching combustion run:", error);
      res.status(500).json({ error: "Failed to fetch combustion run" });
    }
  });

  app.delete("/api/combustion-runs/:id", async (req: Request, res: Response) => {
    try {
      await store.deleteCombustionRun(req.params.id);
      res.json({ success: true });
    } catch (error) {
      console.error("Error deleting combustion run:", error);
      res.status(500).json({ error: "Failed to delete combustion run" });
    }
  });

  // =========================================================================
  // Export
  // =========================================================================

  app.get("/api/combustion-runs/:id/export-excel", async (req: Request, res: Response) => {
    try {
      const run = await store.getCombustionRun(req.params.id);
      if (!run) return res.status(404).json({ error: "Combustion run not found" });
      const xlsxBuffer = await exportCombustionExcel(run);
      res.set({
        "Content-Type": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
        "Content-Disposition": `attachment; filename="Combustion-${safeFileName(run.name)}.xlsx"`,
        "Content-Length": xlsxBuffer.length.toString(),
      });
      res.send(xlsxBuffer);
    } catch (error) {
      console.error("Error exporting combustion Excel:", error);
      res.status(500).json({ error: "Failed to export combustion Excel" });
    }
  });

  app.get("/api/combustion-runs/:id/export-pdf", async (req: Request, res: Response) => {
    try {
      const run = await store.getCombustionRun(req.params.id);
      if (!run) return res.status(404).json({ error: "Combustion run not found" });
      const pdfBuffer = await exportCombustionPDF(run);
      res.set({
        "Content-Type": "application/pdf",
        "Content-Disposition": `attachment; filename="Combustion-${safeFileName(run.name)}.pdf"`,
        "Content-Length": pdfBuffer.length.toString(),
      });
      res.send(pdfBuffer);
    } catch (error) {
      console.error("Error exporting combustion PDF:", error);
      res.status(500).json({ error: "Failed to export combustion PDF" });
    }
  });

  // =========================================================================
  // Settings
  // =========================================================================

  app.get("/api/settings", async (_req: Request, res: Response) => {
    try {
      const values = await getSettings(store);
      res.json({ values, defaults: DEFAULT_SETTINGS, descriptions: SETTING_DESCRIPTIONS });
    } catch (error) {
      console.error("Error fetching settings:", error);
      res.status(500).json({ error: "Failed to fetch settings" });
    }
  });

  app.get("/api/settings/:key", async (req: Request, res: Response) => {
    try {
      const key = req.params.key;
      if (!isSettingKey(key)) {
        return res.status(404).json({ error: "Setting not found" });
      }
      const stored = await store.getSetting(key);
      res.json(stored ?? { key, value: DEFAULT_SETTINGS[key], description: SETTING_DESCRIPTIONS[key], updatedAt: null });
    } catch (error) {
      console.error("Error fetching setting:", error);
      res.status(500).json({ error: "Failed to fetch setting" });
    }
  });

  app.patch("/api/settings/:key", async (req: Request, res: Response) => {
    try {
      const key = req.params.key;
      if (!isSettingKey(key)) {
        return res.status(404).json({ error: "Setting not found" });
      }
      const value = settingValueSchemas[key].parse(req.body?.value);
      const row = insertCombustionSettingSchema.parse({
        key,
        value,
        description: req.body?.description ?? SETTING_DESCRIPTIONS[key],
      });
      const updated = await store.upsertSetting(row);
      invalidateSettingsCache();
      console.log(`[settings] ${key} set to ${JSON.stringify(value)}`);
      res.json(updated);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return res.status(400).json({ error: error.errors });
      }
      console.error("Error updating setting:", error);
      res.status(500).json({ error: "Failed to update setting" });
    }
  });

  return httpServer;
}
