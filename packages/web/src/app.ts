import express, { type Express, type Request, type Response } from 'express';
import * as fs from 'fs';
import * as path from 'path';
import {
  type AnyCombinadicEngine,
  type CombinadicEngine,
  type RankValue,
  type WidthName,
  CombinadicError,
  InvalidArgumentError,
  MAX_TABLE_CELLS,
  SUPPORTED_WIDTHS,
  createEngine,
  isWideEngine,
  tableCellCount
} from '@combinadic/core';
import {
  type CombinationFormatOptions,
  generateExportFilename,
  listExportFiles,
  writeCombinationsFile
} from '@combinadic/storage';
import type { ServerConfig } from './config.js';

/** Largest page served by /api/combinations */
export const MAX_PAGE_SIZE = 1000;

/** Largest system /api/exports will write */
export const MAX_EXPORT_COMBINATIONS = 1000000;

const MAX_CACHED_ENGINES = 64;

/** Table cells the engine cache may hold across all engines */
const MAX_CACHED_CELLS = 4 * MAX_TABLE_CELLS;

type Params = Record<string, unknown>;

function isRecord(value: unknown): value is Params {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readInteger(params: Params, name: string, fallback?: number): number {
  const raw = params[name];
  if (raw === undefined || raw === '') {
    if (fallback !== undefined) return fallback;
    throw new InvalidArgumentError(`${name} is required`);
  }
  const value = typeof raw === 'string' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidArgumentError(`${name} must be an integer`);
  }
  return value;
}

function readWidth(params: Params): WidthName {
  const raw = params.width;
  if (raw === undefined) return 'int32';
  const match = SUPPORTED_WIDTHS.find(w => w === raw);
  if (!match) {
    throw new InvalidArgumentError(`width must be one of: ${SUPPORTED_WIDTHS.join(', ')}`);
  }
  return match;
}

/** Ranks as JSON: numbers for 32-bit engines, decimal strings for 64-bit ones */
function rankToJSON(value: RankValue): number | string {
  return typeof value === 'bigint' ? value.toString() : value;
}

function rankText(params: Params, name: string): string {
  const raw = params[name];
  if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'bigint') {
    return String(raw);
  }
  throw new InvalidArgumentError(`${name} is required`);
}

function readFormatOptions(body: Params): CombinationFormatOptions {
  const options: CombinationFormatOptions = {};
  if (typeof body.labels === 'string') options.labels = body.labels;
  if (Array.isArray(body.labels)) options.labels = body.labels.map(String);
  if (typeof body.separator === 'string') options.separator = body.separator;
  if (typeof body.groupSeparator === 'string') options.groupSeparator = body.groupSeparator;
  if (body.maxLineLength !== undefined) options.maxLineLength = readInteger(body, 'maxLineLength');
  if (typeof body.reverse === 'boolean') options.reverse = body.reverse;
  if (body.elementOrder === 'ascending' || body.elementOrder === 'descending') {
    options.elementOrder = body.elementOrder;
  }
  return options;
}

interface RankedCombination {
  rank: number | string;
  combination: number[];
}

function entryAt<R extends RankValue>(engine: CombinadicEngine<R>, rank: R): RankedCombination {
  return { rank: rankToJSON(rank), combination: engine.unrank(rank) };
}

function page<R extends RankValue>(engine: CombinadicEngine<R>, offsetText: string, limit: number): RankedCombination[] {
  const { width } = engine;
  const combinations: RankedCombination[] = [];
  let rank = engine.parseRank(offsetText);
  for (let i = 0; i < limit && engine.isRank(rank); i++) {
    combinations.push(entryAt(engine, rank));
    rank = width.add(rank, width.one);
  }
  return combinations;
}

function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof CombinadicError) {
    res.status(400).json({ error: error.message, type: error.name });
    return;
  }
  console.error(`${fallback}:`, error);
  res.status(500).json({ error: fallback, details: String(error) });
}

/**
 * Build the HTTP API. Engines are cached per (width, N, K) so repeated
 * queries against one system reuse its tables; the oldest are dropped once
 * the cache passes its engine or table-cell budget.
 */
export function createApp(config: Pick<ServerConfig, 'dataDir'>): Express {
  const app = express();
  const engines = new Map<string, AnyCombinadicEngine>();
  let cachedCells = 0;

  function evictOldest(): void {
    const oldest = engines.entries().next();
    if (oldest.done) return;
    const [key, engine] = oldest.value;
    engines.delete(key);
    cachedCells -= tableCellCount(engine.itemCount, engine.groupSize);
  }

  function getEngine(params: Params): AnyCombinadicEngine {
    const n = readInteger(params, 'n');
    const k = readInteger(params, 'k');
    const width = readWidth(params);
    const key = `${width}:${n}:${k}`;

    const cached = engines.get(key);
    if (cached) return cached;

    const engine = createEngine(n, k, width);
    const cells = tableCellCount(n, k);
    while (engines.size > 0 && (engines.size >= MAX_CACHED_ENGINES || cachedCells + cells > MAX_CACHED_CELLS)) {
      evictOldest();
    }
    engines.set(key, engine);
    cachedCells += cells;
    return engine;
  }

  function exportPath(filename: string): string | undefined {
    if (path.basename(filename) !== filename || !filename.endsWith('.txt')) {
      return undefined;
    }
    return path.join(config.dataDir, filename);
  }

  app.use(express.json());

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Supported integer widths
  app.get('/api/widths', (req: Request, res: Response) => {
    res.json(SUPPORTED_WIDTHS);
  });

  // C(N, K)
  app.get('/api/count', (req: Request, res: Response) => {
    try {
      const engine = getEngine(req.query);
      res.json({
        n: engine.itemCount,
        k: engine.groupSize,
        width: engine.width.name,
        total: rankToJSON(engine.totalCombinations)
      });
    } catch (error) {
      sendError(res, error, 'Failed to count combinations');
    }
  });

  // Rank of a combination
  app.post('/api/rank', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        return res.status(400).json({ error: 'Request body must be a JSON object' });
      }
      const { combination, sorted = false } = body;
      if (!Array.isArray(combination) || !combination.every((v): v is number => typeof v === 'number')) {
        return res.status(400).json({ error: 'combination must be an array of numbers' });
      }
      const engine = getEngine(body);
      const rank = engine.rank(combination, sorted === true);
      res.json({ rank: rankToJSON(rank) });
    } catch (error) {
      sendError(res, error, 'Failed to rank combination');
    }
  });

  // Combination at a rank
  app.get('/api/unrank', (req: Request, res: Response) => {
    try {
      const engine = getEngine(req.query);
      const text = rankText(req.query, 'rank');
      const entry = isWideEngine(engine)
        ? entryAt(engine, engine.parseRank(text))
        : entryAt(engine, engine.parseRank(text));
      res.json(entry);
    } catch (error) {
      sendError(res, error, 'Failed to unrank');
    }
  });

  // A page of combinations in rank order
  app.get('/api/combinations', (req: Request, res: Response) => {
    try {
      const engine = getEngine(req.query);
      const offset = req.query.offset === undefined ? '0' : rankText(req.query, 'offset');
      const limit = readInteger(req.query, 'limit', 100);
      if (limit < 1 || limit > MAX_PAGE_SIZE) {
        throw new InvalidArgumentError(`limit must be between 1 and ${MAX_PAGE_SIZE}`);
      }
      const combinations = isWideEngine(engine)
        ? page(engine, offset, limit)
        : page(engine, offset, limit);
      res.json({ total: rankToJSON(engine.totalCombinations), combinations });
    } catch (error) {
      sendError(res, error, 'Failed to list combinations');
    }
  });

  // Index tables (diagnostic)
  app.get('/api/tables', (req: Request, res: Response) => {
    try {
      const engine = getEngine(req.query);
      const tables: (number | string)[][] = [];
      for (const row of engine.tables()) {
        const cells: (number | string)[] = [];
        for (const cell of row) {
          cells.push(rankToJSON(cell));
        }
        tables.push(cells);
      }
      res.json({ tables });
    } catch (error) {
      sendError(res, error, 'Failed to read tables');
    }
  });

  // Write a new export file
  app.post('/api/exports', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        return res.status(400).json({ error: 'Request body must be a JSON object' });
      }
      const engine = getEngine(body);
      if (BigInt(engine.totalCombinations) > BigInt(MAX_EXPORT_COMBINATIONS)) {
        return res.status(400).json({
          error: `Exports are limited to ${MAX_EXPORT_COMBINATIONS} combinations`
        });
      }

      const filename = generateExportFilename(engine);
      const lines = writeCombinationsFile(engine, path.join(config.dataDir, filename), readFormatOptions(body));
      console.log(`Export complete. Saved to ${filename}`);

      res.json({ success: true, filename, lines });
    } catch (error) {
      sendError(res, error, 'Export failed');
    }
  });

  // List saved exports
  app.get('/api/exports', (req: Request, res: Response) => {
    try {
      const exports = listExportFiles(config.dataDir).map(file => {
        const stats = fs.statSync(file);
        return {
          filename: path.basename(file),
          size: stats.size,
          createdAt: stats.mtime.toISOString()
        };
      });
      res.json(exports);
    } catch (error) {
      sendError(res, error, 'Failed to list exports');
    }
  });

  // Read one export
  app.get('/api/exports/:filename', (req: Request, res: Response) => {
    try {
      const filePath = exportPath(req.params.filename);
      if (!filePath || !fs.existsSync(filePath)) {
        return res.status(404).json({ error: 'Export not found' });
      }
      res.type('text/plain').send(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      sendError(res, error, 'Failed to load export');
    }
  });

  // Delete an export
  app.delete('/api/exports/:filename', (req: Request, res: Response) => {
    try {
      const filePath = exportPath(req.params.filename);
      if (!filePath || !fs.existsSync(filePath)) {
        return res.status(404).json({ error: 'Export not found' });
      }
      fs.unlinkSync(filePath);
      console.log(`Deleted export: ${req.params.filename}`);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'Failed to delete export');
    }
  });

  return app;
}
