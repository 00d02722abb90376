import { Router, Request, Response } from 'express';
import { getDecoderDefaults, getParseCacheTtl } from '../config/decoder';
import {
  Gs1OptionsError,
  encodeElementString,
  getCatalog,
  parseGs1,
  rebuildCatalog,
  resolveRequestOptions,
  toFieldMap,
  toHumanReadable,
} from '../gs1';
import type { AIDefinition, ElementInput, ParseOptions, ParseResult } from '../gs1';
import { cacheGetOrSet, invalidateParseCache, parseCacheKey } from '../utils/cache';

const router = Router();

export const MAX_BATCH_SIZE = 500;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Request options layered over the environment defaults */
const requestOptions = (body: Record<string, unknown>): ParseOptions =>
  resolveRequestOptions(body.options, getDecoderDefaults());

const decodeCached = (barcode: string, options: ParseOptions): Promise<ParseResult> =>
  cacheGetOrSet(parseCacheKey(barcode, options), getParseCacheTtl(), async () => parseGs1(barcode, options));

const describeAi = (definition: AIDefinition) => ({
  ai: definition.code,
  title: definition.title,
  dataType: definition.dataType,
  fixedLength: definition.fixedLength,
  minLength: definition.minLength,
  maxLength: definition.maxLength,
  separatorRequired: definition.separatorRequired,
  checkDigit: definition.checkDigit,
  dateFormat: definition.dateFormat,
  decimalPositions: definition.decimalPositions,
  requiredAis: definition.requiredAis,
  exclusiveAis: definition.exclusiveAis,
  digitalLinkKey: definition.digitalLinkKey,
});

/** 400 for bad options, 500 for anything else */
const sendError = (res: Response, error: unknown, context: string, fallback: string) => {
  if (error instanceof Gs1OptionsError) {
    res.status(400).json({ error: error.message, field: error.field });
    return;
  }
  console.error(`${context} error:`, error);
  res.status(500).json({ error: fallback });
};

/**
 * POST /api/gs1/parse
 * Decode one scanned element string
 */
router.post('/parse', async (req: Request, res: Response) => {
  try {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.barcode !== 'string') {
      return res.status(400).json({ error: 'barcode (string) is required' });
    }

    const options = requestOptions(body);
    const result = await decodeCached(body.barcode, options);

    if (process.env.NODE_ENV === 'development') {
      console.log(`🔎 Decoded ${result.elements.length} element(s) via ${result.strategy} (confidence ${result.confidence})`);
    }
    res.json({ success: true, result });
  } catch (error) {
    sendError(res, error, 'GS1 parse', 'Failed to parse barcode');
  }
});

/**
 * POST /api/gs1/parse/batch
 * Decode up to MAX_BATCH_SIZE element strings with shared options
 */
router.post('/parse/batch', async (req: Request, res: Response) => {
  try {
    const body: unknown = req.body;
    if (!isRecord(body) || !Array.isArray(body.barcodes)) {
      return res.status(400).json({ error: 'barcodes (string[]) is required' });
    }
    const barcodes: unknown[] = body.barcodes;
    if (!barcodes.every((b): b is string => typeof b === 'string')) {
      return res.status(400).json({ error: 'barcodes must only contain strings' });
    }
    if (barcodes.length > MAX_BATCH_SIZE) {
      return res.status(400).json({ error: `At most ${MAX_BATCH_SIZE} barcodes per batch` });
    }

    const options = requestOptions(body);
    const results = await Promise.all(barcodes.map((barcode) => decodeCached(barcode, options)));
    res.json({ success: true, count: results.length, results });
  } catch (error) {
    sendError(res, error, 'GS1 batch parse', 'Failed to parse barcodes');
  }
});

/**
 * POST /api/gs1/fields
 * Decode and flatten into friendly field names
 */
router.post('/fields', async (req: Request, res: Response) => {
  try {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.barcode !== 'string') {
      return res.status(400).json({ error: 'barcode (string) is required' });
    }

    const result = await decodeCached(body.barcode, requestOptions(body));
    const fields = toFieldMap(result, {
      includeConfidence: body.includeConfidence === true,
      includeRaw: body.includeRaw === true,
    });
    res.json({ success: true, fields });
  } catch (error) {
    sendError(res, error, 'GS1 fields', 'Failed to parse barcode');
  }
});

/**
 * POST /api/gs1/encode
 * Build an element string from AI/value pairs
 */
router.post('/encode', (req: Request, res: Response) => {
  try {
    const body: unknown = req.body;
    const list: unknown = isRecord(body) ? body.elements : undefined;
    if (!Array.isArray(list) || list.length === 0) {
      return res.status(400).json({ error: 'elements ([{ ai, value }]) is required' });
    }

    const elements: ElementInput[] = [];
    for (const item of list) {
      if (!isRecord(item) || typeof item.ai !== 'string' || typeof item.value !== 'string') {
        return res.status(400).json({ error: 'Each element needs string ai and value' });
      }
      if (!getCatalog().lookup(item.ai)) {
        return res.status(400).json({ error: `Unknown AI: ${item.ai}` });
      }
      elements.push({ ai: item.ai, value: item.value });
    }

    res.json({
      success: true,
      elementString: encodeElementString(elements, getCatalog()),
      humanReadable: toHumanReadable(elements),
    });
  } catch (error) {
    sendError(res, error, 'GS1 encode', 'Failed to encode elements');
  }
});

/**
 * GET /api/gs1/ai
 * List the AI catalog
 */
router.get('/ai', (_req: Request, res: Response) => {
  try {
    const catalog = getCatalog();
    res.json({
      success: true,
      count: catalog.size,
      skippedRows: catalog.skippedRows,
      ais: catalog.entries().map(describeAi),
    });
  } catch (error) {
    sendError(res, error, 'GS1 catalog', 'Failed to load AI catalog');
  }
});

/**
 * GET /api/gs1/ai/:code
 * One AI definition
 */
router.get('/ai/:code', (req: Request, res: Response) => {
  try {
    const definition = getCatalog().lookup(req.params.code);
    if (!definition) {
      return res.status(404).json({ error: 'AI not found' });
    }
    res.json({ success: true, ai: describeAi(definition) });
  } catch (error) {
    sendError(res, error, 'GS1 AI lookup', 'Failed to load AI catalog');
  }
});

/**
 * POST /api/gs1/catalog/reload
 * Rebuild the AI catalog from its table file and drop cached parses
 */
router.post('/catalog/reload', async (_req: Request, res: Response) => {
  try {
    const catalog = rebuildCatalog();
    await invalidateParseCache();
    console.log(`📚 AI catalog reloaded: ${catalog.size} AIs (${catalog.skippedRows} rows skipped)`);
    res.json({ success: true, count: catalog.size, skippedRows: catalog.skippedRows });
  } catch (error) {
    sendError(res, error, 'GS1 catalog reload', 'Failed to reload AI catalog');
  }
});

export default router;
