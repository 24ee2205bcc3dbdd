/**
 * INDICATOR FILE READER
 *
 * Loads tabular time series (CSV, header row) from the data directory.
 *
 * - Malformed rows are skipped and logged; the read fails only when no row parses
 * - Empty value cells are explicit gaps (value: null)
 * - No file at all -> flagged sample placeholder
 * - Successful reads are cached for the life of the process, keyed by path
 */

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { EmptyDatasetError, MissingFileError } from '../../../common/errors.js';
import { logger as defaultLogger, type Logger } from '../../../common/logger.js';
import type {
  Indicator,
  IndicatorFileSchema,
  IndicatorLoadResult,
  IndicatorMeta,
  SeriesPoint,
} from '../contracts/indicator.contracts.js';
import { resolveIndicatorSpec, type PreferredDirection } from '../data/indicator_sources.registry.js';
import { parseDay } from '../utils/time.utils.js';
import { indicatorFileCandidates, resolveDataDirs } from './data_dirs.js';
import { generateSampleIndicator } from './sample_data.generator.js';

export const DEFAULT_SCHEMA: IndicatorFileSchema = {
  dateColumn: 'Date',
  valueColumn: 'value',
  extraColumns: ['yearly_adjustment'],
};

const GAP_TOKENS = new Set(['', '.', 'na', 'n/a', 'nan', 'null']);

const DIRECTIONS: readonly PreferredDirection[] = ['up', 'down', 'neutral'];

const ParsedRecord = z.object({
  info: z.object({ lines: z.number() }),
  record: z.array(z.string()),
});

// ═══════════════════════════════════════════════════════════════
// CACHE
// ═══════════════════════════════════════════════════════════════

/**
 * Per-process cache of parsed files. Source files are static within a
 * session, so entries are never invalidated. Cached indicators are shared:
 * treat them as read-only.
 */
export class IndicatorFileCache {
  private readonly entries = new Map<string, Indicator>();

  get(filePath: string): Indicator | undefined {
    return this.entries.get(path.resolve(filePath));
  }

  set(filePath: string, indicator: Indicator): void {
    this.entries.set(path.resolve(filePath), indicator);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export const fileCache = new IndicatorFileCache();

// ═══════════════════════════════════════════════════════════════
// CSV PARSING
// ═══════════════════════════════════════════════════════════════

interface RawTable {
  header: string[];
  rows: Array<{ line: number; cells: string[] }>;
  undecodable: number;
}

function readTable(filePath: string, content: string, logger: Logger): RawTable {
  let undecodable = 0;

  const parsed: unknown = parse(content, {
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_records_with_error: true,
    info: true,
    on_skip: (err) => {
      undecodable++;
      logger.warn({ file: filePath, reason: err?.message }, 'Skipping undecodable CSV record');
    },
  });

  const records = z.array(ParsedRecord).parse(parsed);
  if (records.length === 0) {
    return { header: [], rows: [], undecodable };
  }

  const [head, ...body] = records;
  return {
    header: head.record,
    rows: body.map((r) => ({ line: r.info.lines, cells: r.record })),
    undecodable,
  };
}

function columnIndex(header: string[], name: string): number {
  const wanted = name.trim().toLowerCase();
  return header.findIndex((h) => h.trim().toLowerCase() === wanted);
}

function cellAt(cells: string[], index: number): string | undefined {
  return index >= 0 && index < cells.length ? cells[index] : undefined;
}

type CellValue = { ok: true; value: number | null } | { ok: false };

function parseValueCell(cell: string | undefined): CellValue {
  if (cell === undefined) return { ok: false };
  if (GAP_TOKENS.has(cell.trim().toLowerCase())) return { ok: true, value: null };

  const value = Number(cell.replace(/,/g, ''));
  return Number.isFinite(value) ? { ok: true, value } : { ok: false };
}

function firstText(rows: RawTable['rows'], index: number): string | undefined {
  if (index < 0) return undefined;
  for (const row of rows) {
    const cell = cellAt(row.cells, index);
    if (cell) return cell;
  }
  return undefined;
}

function asDirection(text: string | undefined): PreferredDirection | undefined {
  return DIRECTIONS.find((d) => d === text?.toLowerCase());
}

// ═══════════════════════════════════════════════════════════════
// READ SINGLE FILE
// ═══════════════════════════════════════════════════════════════

export interface ReadOptions {
  indicatorId?: string;
  schema?: Partial<IndicatorFileSchema>;
  logger?: Logger;
}

/**
 * Read one indicator file.
 *
 * @throws MissingFileError when the file does not exist
 * @throws EmptyDatasetError when no row parses
 */
export function readIndicatorFile(filePath: string, opts: ReadOptions = {}): Indicator {
  const logger = opts.logger ?? defaultLogger;
  const schema: IndicatorFileSchema = { ...DEFAULT_SCHEMA, ...opts.schema };
  const indicatorId = opts.indicatorId ?? path.basename(filePath, path.extname(filePath));

  if (!fs.existsSync(filePath)) {
    throw new MissingFileError(filePath);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const table = readTable(filePath, content, logger);

  const dateIdx = columnIndex(table.header, schema.dateColumn);
  const valueIdx = columnIndex(table.header, schema.valueColumn);

  if (dateIdx < 0 || valueIdx < 0) {
    logger.error(
      { file: filePath, header: table.header, expected: [schema.dateColumn, schema.valueColumn] },
      'Required columns missing',
    );
    throw new EmptyDatasetError(filePath, table.rows.length + table.undecodable);
  }

  const extraIdx = schema.extraColumns
    .map((name) => ({ name, index: columnIndex(table.header, name) }))
    .filter((c) => c.index >= 0);

  type Row = { point: SeriesPoint; extras: Record<string, number | null> };
  const parsed: Row[] = [];
  const seen = new Set<number>();
  let skipped = table.undecodable;

  const skip = (line: number, reason: string) => {
    skipped++;
    logger.warn({ file: filePath, line, reason }, 'Skipping malformed row');
  };

  for (const row of table.rows) {
    const ts = parseDay(cellAt(row.cells, dateIdx));
    if (!ts) {
      skip(row.line, `unparseable date "${cellAt(row.cells, dateIdx) ?? ''}"`);
      continue;
    }

    const cell = parseValueCell(cellAt(row.cells, valueIdx));
    if (!cell.ok) {
      skip(row.line, `non-numeric value "${cellAt(row.cells, valueIdx) ?? ''}"`);
      continue;
    }

    if (seen.has(ts.getTime())) {
      skip(row.line, `duplicate timestamp ${ts.toISOString()}`);
      continue;
    }
    seen.add(ts.getTime());

    const extras: Record<string, number | null> = {};
    for (const { name, index } of extraIdx) {
      const extra = parseValueCell(cellAt(row.cells, index));
      extras[name] = extra.ok ? extra.value : null;
    }

    parsed.push({ point: { ts, value: cell.value }, extras });
  }

  if (parsed.length === 0) {
    logger.error({ file: filePath, skipped }, 'No parseable rows');
    throw new EmptyDatasetError(filePath, skipped);
  }

  parsed.sort((a, b) => a.point.ts.getTime() - b.point.ts.getTime());

  const spec = resolveIndicatorSpec(indicatorId);
  const meta: IndicatorMeta = {
    indicatorId,
    displayName: spec.displayName,
    unit: firstText(table.rows, columnIndex(table.header, 'unit')) ?? spec.unit,
    source: firstText(table.rows, columnIndex(table.header, 'source')) ?? spec.source,
    description: firstText(table.rows, columnIndex(table.header, 'description')) ?? spec.description,
    preferredDirection:
      asDirection(firstText(table.rows, columnIndex(table.header, 'preferred_direction'))) ??
      spec.preferredDirection,
    category: spec.category,
  };

  const extras: Indicator['extras'] = {};
  for (const { name } of extraIdx) {
    extras[name] = parsed.map((r) => r.extras[name] ?? null);
  }

  logger.info(
    { file: filePath, indicatorId, rows: parsed.length, skipped },
    'Loaded indicator file',
  );

  return {
    name: indicatorId,
    points: parsed.map((r) => r.point),
    meta,
    synthetic: false,
    dataSource: `Data from file: ${path.basename(filePath)}`,
    filePath: path.resolve(filePath),
    skippedRows: skipped,
    extras,
  };
}

// ═══════════════════════════════════════════════════════════════
// LOAD BY INDICATOR ID
// ═══════════════════════════════════════════════════════════════

export interface LoadOptions {
  dataDir: string;
  now?: Date;
  sampleMonths?: number;
  schema?: Partial<IndicatorFileSchema>;
  cache?: IndicatorFileCache | null;
  logger?: Logger;
}

export function loadIndicator(indicatorId: string, opts: LoadOptions): IndicatorLoadResult {
  const logger = opts.logger ?? defaultLogger;
  const cache = opts.cache === undefined ? fileCache : opts.cache;
  const dirs = resolveDataDirs(opts.dataDir);

  const existing = indicatorFileCandidates(dirs, indicatorId).filter((p) => fs.existsSync(p));

  for (const filePath of existing) {
    const cached = cache?.get(filePath);
    if (cached) {
      return { state: 'LOADED', indicatorId, indicator: cached };
    }

    try {
      const indicator = readIndicatorFile(filePath, { indicatorId, schema: opts.schema, logger });
      cache?.set(filePath, indicator);
      return { state: 'LOADED', indicatorId, indicator };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ file: filePath, indicatorId, err: message }, 'Failed to read indicator file');
    }
  }

  if (existing.length > 0) {
    return {
      state: 'NO_DATA',
      indicatorId,
      reason: `No parseable rows in ${existing.map((p) => path.basename(p)).join(', ')}`,
      triedPaths: existing,
    };
  }

  logger.warn({ indicatorId }, 'No data files found, using sample data');
  const indicator = generateSampleIndicator(indicatorId, {
    now: opts.now ?? new Date(),
    months: opts.sampleMonths ?? 24,
  });
  return { state: 'PLACEHOLDER', indicatorId, indicator };
}

export function loadIndicators(indicatorIds: string[], opts: LoadOptions): IndicatorLoadResult[] {
  return indicatorIds.map((id) => loadIndicator(id, opts));
}
