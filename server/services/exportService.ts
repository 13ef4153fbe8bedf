import PDFDocument from "pdfkit";
import ExcelJS from "exceljs";
import type { CombustionRun } from "@shared/schema";
import { EXHAUST_SPECIES_IDS, getSpeciesProfile, isSpeciesId } from "@shared/species-library";

type PdfDoc = InstanceType<typeof PDFDocument>;

const PAGE = { left: 50, top: 50, width: 512, bottom: 732 } as const;
const TABLE = {
  fontSize: 8,
  padding: 3,
  minRowHeight: 16,
  headerFill: "#323F4F",
  altFill: "#E9E9EB",
  border: "#CFD1D4",
  text: "#44546A",
} as const;

// Standard PDF fonts have no subscript digits
function pdfText(text: string): string {
  return text.replace(/[₀-₉]/g, ch => String(ch.charCodeAt(0) - 0x2080));
}

function fmtNum(val: number, decimals: number = 1): string {
  return val.toLocaleString("en-US", { minimumFractionDigits: decimals, maximumFractionDigits: decimals });
}

function speciesLabel(id: string): string {
  return (isSpeciesId(id) && getSpeciesProfile(id)?.displayName) || id;
}

function drawTable(doc: PdfDoc, headers: string[], rows: string[][], startY: number, colWidths: number[]): number {
  const tableWidth = colWidths.reduce((a, b) => a + b, 0);
  let y = startY;

  const useFont = (header: boolean) => doc.font(header ? "Helvetica-Bold" : "Helvetica").fontSize(TABLE.fontSize);

  const drawRow = (cells: string[], header: boolean, fill?: string): void => {
    const text = cells.map(pdfText);
    useFont(header);
    const rowHeight = Math.max(
      TABLE.minRowHeight,
      ...text.map((t, i) => doc.heightOfString(t, { width: colWidths[i] - TABLE.padding * 2 }) + TABLE.padding * 2),
    );
    if (y + rowHeight > PAGE.bottom) {
      doc.addPage();
      y = PAGE.top;
      if (!header) drawRow(headers, true, TABLE.headerFill);
      useFont(header);
    }
    if (fill) doc.rect(PAGE.left, y, tableWidth, rowHeight).fill(fill);
    doc.fillColor(header ? "#FFFFFF" : TABLE.text);
    let x = PAGE.left;
    text.forEach((t, i) => {
      doc.text(t, x + TABLE.padding, y + TABLE.padding, { width: colWidths[i] - TABLE.padding * 2 });
      x += colWidths[i];
    });
    doc.rect(PAGE.left, y, tableWidth, rowHeight).lineWidth(0.5).strokeColor(TABLE.border).stroke();
    y += rowHeight;
  };

  drawRow(headers, true, TABLE.headerFill);
  rows.forEach((row, idx) => drawRow(row, false, idx % 2 === 1 ? TABLE.altFill : undefined));
  return y;
}

function sectionHeading(doc: PdfDoc, title: string, startY: number): number {
  let y = startY;
  if (y > 700) {
    doc.addPage();
    y = PAGE.top;
  }
  doc.font("Helvetica-Bold").fontSize(12).fillColor("#00B050").text(title, PAGE.left, y, { width: PAGE.width });
  y += 20;
  doc.moveTo(PAGE.left, y).lineTo(PAGE.left + PAGE.width, y).lineWidth(0.5).strokeColor(TABLE.border).stroke();
  return y + 8;
}

export function exportCombustionPDF(run: CombustionRun): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "letter", margins: { top: 50, bottom: 50, left: 50, right: 50 } });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    const { input, results } = run;
    const exhaust = results.exhaust;

    doc.font("Helvetica-Bold").fontSize(18).fillColor("#323F4F")
      .text("Combustion Exhaust Report", PAGE.left, PAGE.top, { align: "center", width: PAGE.width });
    doc.font("Helvetica").fontSize(10).fillColor("#8496B0")
      .text(`Run: ${pdfText(run.name)}`, PAGE.left, 75, { align: "center", width: PAGE.width })
      .text(`Generated: ${new Date().toLocaleDateString("en-US")}`, PAGE.left, 88, { align: "center", width: PAGE.width });

    let y = 115;

    y = sectionHeading(doc, "Fuel Input", y);
    const inputRows = Object.entries(input.fuelComposition).map(([id, x]) => [
      speciesLabel(id),
      id,
      fmtNum((x ?? 0) * 100, 4),
    ]);
    y = drawTable(doc, ["Component", "Species", "Mol %"], inputRows, y, [200, 150, 162]);
    y += 10;
    y = drawTable(doc, ["Parameter", "Value", "Unit"], [
      ["Fuel Mass Flow", fmtNum(input.fuelMassFlow, 3), "kg/s"],
      ["Target Exhaust O2", fmtNum(input.targetO2Fraction * 100, 2), "mol %"],
    ], y, [200, 150, 162]);
    y += 15;

    y = sectionHeading(doc, "Exhaust Gas", y);
    const exhaustRows = EXHAUST_SPECIES_IDS.map(id => [
      speciesLabel(id),
      fmtNum(exhaust.composition[id], 4),
      fmtNum(exhaust.molarFlows[id], 6),
      fmtNum(exhaust.massFlows[id], 4),
    ]);
    exhaustRows.push(["Total", fmtNum(100, 4), fmtNum(exhaust.totalMolarFlow, 6), fmtNum(exhaust.totalMassFlow, 4)]);
    y = drawTable(doc, ["Component", "Mol %", "Molar Flow (kmol/s)", "Mass Flow (kg/s)"], exhaustRows, y, [152, 100, 130, 130]);
    y += 15;

    y = sectionHeading(doc, "Air Requirement", y);
    y = drawTable(doc, ["Parameter", "Value", "Unit"], [
      ["Theoretical O2", fmtNum(exhaust.theoreticalO2, 6), "kmol/s"],
      ["O2 Supply", fmtNum(exhaust.o2Supply, 6), "kmol/s"],
      ["Excess Air Ratio", fmtNum(exhaust.excessAirRatio, 3), "-"],
      ["Air Mass Flow", fmtNum(exhaust.airMassFlow, 4), "kg/s"],
    ], y, [200, 150, 162]);
    y += 15;

    if (results.assumptions.length > 0) {
      y = sectionHeading(doc, "Assumptions", y);
      const assRows = results.assumptions.map(a => [a.parameter, a.value, a.source]);
      y = drawTable(doc, ["Parameter", "Value", "Source"], assRows, y, [150, 212, 150]);
      y += 15;
    }

    if (results.warnings.length > 0) {
      y = sectionHeading(doc, "Warnings", y);
      const warnRows = results.warnings.map(w => [w.severity.toUpperCase(), w.field, w.message]);
      drawTable(doc, ["Severity", "Field", "Message"], warnRows, y, [70, 100, 342]);
    }

    doc.end();
  });
}

function solidFill(argb: string): ExcelJS.FillPattern {
  return { type: "pattern", pattern: "solid", fgColor: { argb } };
}

const THIN: Partial<ExcelJS.Border> = { style: "thin", color: { argb: "FFCFD1D4" } };
const BORDER: Partial<ExcelJS.Borders> = { top: THIN, bottom: THIN, left: THIN, right: THIN };
const SHEET = {
  headerFill: solidFill("FF323F4F"),
  titleFill: solidFill("FF00B050"),
  altFill: solidFill("FFE9E9EB"),
  whiteBold: (size: number): Partial<ExcelJS.Font> => ({ bold: true, color: { argb: "FFFFFFFF" }, size }),
};

function writeHeader(ws: ExcelJS.Worksheet, row: number, headers: string[], widths?: number[]): void {
  const r = ws.getRow(row);
  headers.forEach((h, i) => {
    const cell = r.getCell(i + 1);
    cell.value = h;
    cell.fill = SHEET.headerFill;
    cell.font = SHEET.whiteBold(11);
    cell.alignment = { horizontal: "center", vertical: "middle", wrapText: true };
    cell.border = BORDER;
  });
  r.height = 22;
  widths?.forEach((w, i) => { ws.getColumn(i + 1).width = w; });
}

function writeTitle(ws: ExcelJS.Worksheet, row: number, title: string, colSpan: number): void {
  const r = ws.getRow(row);
  r.getCell(1).value = title;
  for (let c = 1; c <= colSpan; c++) r.getCell(c).fill = SHEET.titleFill;
  r.getCell(1).font = SHEET.whiteBold(12);
  ws.mergeCells(row, 1, row, colSpan);
  r.height = 26;
}

function writeRow(ws: ExcelJS.Worksheet, row: number, values: (string | number)[], shaded: boolean): void {
  const r = ws.getRow(row);
  values.forEach((v, i) => {
    const cell = r.getCell(i + 1);
    cell.value = v;
    cell.border = BORDER;
    cell.alignment = { vertical: "middle", wrapText: true, horizontal: i === 0 ? "left" : "center" };
    if (shaded) cell.fill = SHEET.altFill;
  });
  r.height = 18;
}

export function buildCombustionWorkbook(run: CombustionRun): ExcelJS.Workbook {
  const wb = new ExcelJS.Workbook();
  wb.creator = "Combustion Calculator";
  wb.created = new Date();
  const { input, results } = run;
  const exhaust = results.exhaust;

  // ==========================================
  // TAB 1: Inputs
  // ==========================================
  const wsInput = wb.addWorksheet("Inputs", { properties: { tabColor: { argb: "FF44546A" } } });
  let ir = 1;
  writeTitle(wsInput, ir++, `Fuel Input - ${run.name}`, 3);
  writeHeader(wsInput, ir++, ["Component", "Species", "Mole Fraction"], [24, 14, 18]);
  Object.entries(input.fuelComposition).forEach(([id, x], idx) => {
    writeRow(wsInput, ir++, [speciesLabel(id), id, x ?? 0], idx % 2 === 1);
  });
  ir++;
  writeHeader(wsInput, ir++, ["Parameter", "Value", "Unit"]);
  writeRow(wsInput, ir++, ["Fuel Mass Flow", input.fuelMassFlow, "kg/s"], false);
  writeRow(wsInput, ir++, ["Target Exhaust O₂", input.targetO2Fraction, "mol/mol"], true);
  writeRow(wsInput, ir++, ["Unreachable Target Policy", input.unreachableTargetPolicy, "-"], false);

  // ==========================================
  // TAB 2: Exhaust
  // ==========================================
  const wsExhaust = wb.addWorksheet("Exhaust", { properties: { tabColor: { argb: "FF00B050" } } });
  let er = 1;
  writeTitle(wsExhaust, er++, "Exhaust Gas Composition", 4);
  writeHeader(wsExhaust, er++, ["Component", "Mol %", "Molar Flow (kmol/s)", "Mass Flow (kg/s)"], [24, 14, 22, 20]);
  EXHAUST_SPECIES_IDS.forEach((id, idx) => {
    writeRow(wsExhaust, er++, [speciesLabel(id), exhaust.composition[id], exhaust.molarFlows[id], exhaust.massFlows[id]], idx % 2 === 1);
  });
  writeRow(wsExhaust, er++, ["Total", 100, exhaust.totalMolarFlow, exhaust.totalMassFlow], false);
  er++;
  writeTitle(wsExhaust, er++, "Air Requirement", 4);
  writeHeader(wsExhaust, er++, ["Parameter", "Value", "Unit", ""]);
  const airRows: [string, number, string][] = [
    ["Theoretical O₂", exhaust.theoreticalO2, "kmol/s"],
    ["O₂ Supply", exhaust.o2Supply, "kmol/s"],
    ["Air Molar Flow", exhaust.airMolarFlow, "kmol/s"],
    ["Air Mass Flow", exhaust.airMassFlow, "kg/s"],
    ["Excess Air Ratio", exhaust.excessAirRatio, "-"],
    ["Solver Iterations", exhaust.solverIterations, "-"],
  ];
  airRows.forEach((row, idx) => writeRow(wsExhaust, er++, row, idx % 2 === 1));

  // ==========================================
  // TAB 3: Calculation Steps
  // ==========================================
  const wsSteps = wb.addWorksheet("Calculation Steps");
  let sr = 1;
  writeTitle(wsSteps, sr++, "Calculation Steps", 5);
  writeHeader(wsSteps, sr++, ["Category", "Step", "Formula", "Result", "Unit"], [18, 28, 48, 16, 12]);
  results.calculationSteps.forEach((step, idx) => {
    writeRow(wsSteps, sr++, [step.category, step.label, step.formula, step.result.value, step.result.unit], idx % 2 === 1);
  });

  return wb;
}

export async function exportCombustionExcel(run: CombustionRun): Promise<Buffer> {
  const wb = buildCombustionWorkbook(run);
  const arrayBuffer = await wb.xlsx.writeBuffer();
  return Buffer.from(arrayBuffer);
}
