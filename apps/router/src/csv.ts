import { readFile } from "node:fs/promises";
import { z } from "zod";
import { compareNodeIds } from "@roadsearch/pathfinding";
import type { NodeId, Point, StaticEdge, VolumeHistory } from "@roadsearch/pathfinding";
import { CsvFormatError } from "./errors.js";
import { parseNodeId } from "./problem-file.js";

export type CsvRow = Record<string, string>;

// Location names arrive with inconsistent casing and padding
export function normalizeLocation(raw: string): string {
  return raw.trim().toUpperCase();
}

function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

/**
 * Parse CSV text with a header row into records keyed by column name.
 * Quoted fields may contain commas and doubled quotes, not newlines.
 */
export function parseCsv(text: string, file = "<inline>"): CsvRow[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== "");
  if (lines.length === 0) {
    return [];
  }

  const header = splitCsvLine(lines[0]).map((name) => name.trim());
  return lines.slice(1).map((line, index) => {
    const fields = splitCsvLine(line);
    if (fields.length !== header.length) {
      throw new CsvFormatError(`expected ${header.length} fields, found ${fields.length}`, file, index + 2);
    }
    const row: CsvRow = {};
    header.forEach((name, column) => {
      row[name] = fields[column];
    });
    return row;
  });
}

function parseRows<T>(rows: CsvRow[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, file: string): T[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new CsvFormatError(issues, file, index + 2);
    }
    return result.data;
  });
}

const location = z.string().trim().min(1).transform(normalizeLocation);

const requiredNumber = z.string().trim().min(1).pipe(z.coerce.number().finite());

const optionalNumber = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === "") return undefined;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

export const edgeRowSchema = z.object({
  from: location,
  to: location,
  distance_km: optionalNumber.pipe(z.number().nonnegative().optional())
});

export const coordinateRowSchema = z.object({
  location,
  longitude: requiredNumber,
  latitude: requiredNumber
});

export const volumeRowSchema = z.object({
  Location: location,
  SiteID: z.string().trim().min(1),
  Volume: requiredNumber,
  Datetime: z.coerce.date()
});

export function edgesFromRows(rows: CsvRow[], file = "<inline>"): StaticEdge[] {
  return parseRows(rows, edgeRowSchema, file).map((row) => ({
    from: row.from,
    to: row.to,
    cost: row.distance_km
  }));
}

export function coordinatesFromRows(rows: CsvRow[], file = "<inline>"): Map<string, Point> {
  const coords = new Map<string, Point>();
  for (const row of parseRows(rows, coordinateRowSchema, file)) {
    coords.set(row.location, [row.longitude, row.latitude]);
  }
  return coords;
}

/**
 * Group volume observations by location. Each location reads the series of
 * the lowest-numbered site recorded there, ordered by time.
 */
export function volumeHistoryFromRows(rows: CsvRow[], file = "<inline>"): VolumeHistory {
  const parsed = parseRows(rows, volumeRowSchema, file);
  const siteByLocation = new Map<string, NodeId>();
  const seriesBySite = new Map<NodeId, { at: number; volume: number }[]>();

  for (const row of parsed) {
    const site = parseNodeId(row.SiteID);
    const current = siteByLocation.get(row.Location);
    if (current === undefined || compareNodeIds(site, current) < 0) {
      siteByLocation.set(row.Location, site);
    }

    let series = seriesBySite.get(site);
    if (!series) {
      series = [];
      seriesBySite.set(site, series);
    }
    series.push({ at: row.Datetime.getTime(), volume: row.Volume });
  }

  const history: VolumeHistory = new Map();
  for (const [loc, site] of siteByLocation) {
    const series = seriesBySite.get(site) ?? [];
    const ordered = [...series].sort((a, b) => a.at - b.at);
    history.set(loc, ordered.map((point) => point.volume));
  }
  return history;
}

export async function readEdgesCsv(path: string): Promise<StaticEdge[]> {
  const text = await readFile(path, "utf8");
  return edgesFromRows(parseCsv(text, path), path);
}

export async function readCoordinatesCsv(path: string): Promise<Map<string, Point>> {
  const text = await readFile(path, "utf8");
  return coordinatesFromRows(parseCsv(text, path), path);
}

export async function loadVolumeHistory(path: string): Promise<VolumeHistory> {
  const text = await readFile(path, "utf8");
  return volumeHistoryFromRows(parseCsv(text, path), path);
}
