import { describe, it, expect, beforeAll, vi } from "vitest";
import type { CombustionRun } from "@shared/schema";
import { MemoryStorage } from "../testing/memoryStorage";
import { DEFAULT_SETTINGS } from "../settings-loader";
import { runCombustionCalculation } from "./combustionRuns";
import { buildCombustionWorkbook, exportCombustionExcel, exportCombustionPDF } from "./exportService";

describe("exportService", () => {
  let run: CombustionRun;

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    run = await runCombustionCalculation(
      { name: "Flare A", fuelMassFlow: 1, fuelComposition: { CH4: 90, N2: 10 }, compositionUnit: "percent", targetO2Percent: 3 },
      new MemoryStorage(),
      DEFAULT_SETTINGS,
    );
  });

  it("lays out inputs, exhaust and calculation steps", () => {
    const wb = buildCombustionWorkbook(run);
    expect(wb.worksheets.map(ws => ws.name)).toEqual(["Inputs", "Exhaust", "Calculation Steps"]);

    const inputs = wb.getWorksheet("Inputs");
    expect(inputs?.getCell("A1").value).toBe("Fuel Input - Flare A");
    expect(inputs?.getCell("A3").value).toBe("Methane");
    expect(inputs?.getCell("C3").value).toBeCloseTo(0.9, 12);

    const exhaust = wb.getWorksheet("Exhaust");
    expect(exhaust?.getCell("A3").value).toBe("Carbon Dioxide");
    expect(exhaust?.getCell("A9").value).toBe("Total");
    expect(exhaust?.getCell("D9").value).toBe(run.results.exhaust.totalMassFlow);

    const steps = wb.getWorksheet("Calculation Steps");
    expect(steps?.getCell("B3").value).toBe("Average Molecular Weight");
    expect(steps?.rowCount).toBe(2 + run.results.calculationSteps.length);
  });

  it("writes an xlsx buffer", async () => {
    const buffer = await exportCombustionExcel(run);
    expect(buffer.subarray(0, 2).toString("latin1")).toBe("PK");
  });

  it("writes a PDF buffer", async () => {
    const buffer = await exportCombustionPDF(run);
    expect(buffer.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("writes a PDF for a run that carries warnings", async () => {
    const rescaled = await runCombustionCalculation(
      { fuelMassFlow: 1, fuelComposition: { CH4: 60, N2: 60 }, compositionUnit: "percent", targetO2Percent: 3 },
      new MemoryStorage(),
      DEFAULT_SETTINGS,
    );
    expect(rescaled.results.warnings).toHaveLength(1);
    const buffer = await exportCombustionPDF(rescaled);
    expect(buffer.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });
});
