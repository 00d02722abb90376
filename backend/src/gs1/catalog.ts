/**
 * Application Identifier catalog
 *
 * Built from a whitespace-aligned table (backend/data/gs1-ai-table.txt):
 *
 *   AI  [*]  component...  [attribute...]  # title
 *
 * - "*" marks a predefined-length AI (no separator after it)
 * - components look like N14,csum / X..20 / N6,yymmd0
 * - "310n" expands into 3100..3109 with 0..9 implied decimals, "91-99" into each code
 *
 * Rows that do not fit the grammar are skipped and counted, never fatal.
 */
import fs from 'fs';
import path from 'path';
import type { AIComponent, AIDefinition, ComponentCharset, DateFormat } from './types';

export const MAX_AI_LENGTH = 4;

const COMPONENT_PATTERN = /^([NXY])(\.\.)?(\d+)$/;

const CHARSET_BY_TYPE: Record<string, ComponentCharset> = {
  N: 'numeric',
  X: 'cset82',
  Y: 'cset39',
};

const DATE_LINTERS: Record<string, DateFormat> = {
  yymmdd: 'YYMMDD',
  yymmd0: 'YYMMD0',
  yyyymmdd: 'YYYYMMDD',
  yymmddhh: 'YYMMDDHH',
};

const isAttributeToken = (token: string) =>
  token.startsWith('req=') || token.startsWith('ex=') || token.startsWith('dlpkey');

export function parseComponent(token: string): AIComponent | null {
  const [typeLength, ...linters] = token.split(',');
  const match = COMPONENT_PATTERN.exec(typeLength);
  if (!match) return null;

  const length = Number(match[3]);
  if (!Number.isInteger(length) || length < 1) return null;

  let checkDigit = false;
  let dateFormat: DateFormat | null = null;
  const extraLinters: string[] = [];
  for (const linter of linters) {
    if (linter === 'csum') {
      checkDigit = true;
    } else if (DATE_LINTERS[linter]) {
      dateFormat = DATE_LINTERS[linter];
    } else if (linter) {
      extraLinters.push(linter);
    }
  }

  return {
    charset: CHARSET_BY_TYPE[match[1]],
    minLength: match[2] ? 1 : length,
    maxLength: length,
    checkDigit,
    dateFormat,
    extraLinters,
  };
}

/** Codes a table AI column stands for, with their implied decimal places */
function expandCodes(aiSpec: string): Array<{ code: string; decimals: number | null }> | null {
  const family = /^(\d{3})n$/.exec(aiSpec);
  if (family) {
    return Array.from({ length: 10 }, (_, n) => ({ code: `${family[1]}${n}`, decimals: n }));
  }

  const range = /^(\d{2,4})-(\d{2,4})$/.exec(aiSpec);
  if (range) {
    const [, from, to] = range;
    if (from.length !== to.length || Number(from) > Number(to)) return null;
    const codes: Array<{ code: string; decimals: number | null }> = [];
    for (let i = Number(from); i <= Number(to); i++) {
      codes.push({ code: String(i).padStart(from.length, '0'), decimals: null });
    }
    return codes;
  }

  if (/^\d{2,4}$/.test(aiSpec)) return [{ code: aiSpec, decimals: null }];
  return null;
}

/**
 * Parse one table row into the definitions it expands to.
 * Returns null for comments, blank lines and malformed rows.
 */
export function parseTableRow(line: string): AIDefinition[] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;

  const hash = trimmed.indexOf('#');
  if (hash < 0) return null;
  const title = trimmed.slice(hash + 1).trim();
  const tokens = trimmed.slice(0, hash).trim().split(/\s+/);
  if (!title || tokens.length < 2) return null;

  const codes = expandCodes(tokens[0]);
  if (!codes) return null;

  let i = 1;
  const predefined = tokens[i] === '*';
  if (predefined) i++;

  const components: AIComponent[] = [];
  for (; i < tokens.length && !isAttributeToken(tokens[i]); i++) {
    const component = parseComponent(tokens[i]);
    if (!component) return null;
    components.push(component);
  }
  if (components.length === 0) return null;

  let requiredAis: string[] = [];
  let exclusiveAis: string[] = [];
  let digitalLinkKey = false;
  for (; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.startsWith('req=')) requiredAis = token.slice(4).split(',').filter(Boolean);
    else if (token.startsWith('ex=')) exclusiveAis = token.slice(3).split(',').filter(Boolean);
    else if (token.startsWith('dlpkey')) digitalLinkKey = true;
    else return null;
  }

  const minLength = components.reduce((sum, c) => sum + c.minLength, 0);
  const maxLength = components.reduce((sum, c) => sum + c.maxLength, 0);
  const last = components[components.length - 1];
  const dateComponent = components.find((c) => c.dateFormat !== null);

  return codes.map(({ code, decimals }) => ({
    code,
    title,
    dataType: last.charset === 'numeric' ? 'numeric' : 'alphanumeric',
    fixedLength: predefined ? maxLength : null,
    minLength: predefined ? maxLength : minLength,
    maxLength,
    separatorRequired: !predefined,
    checkDigit: components.some((c) => c.checkDigit),
    dateFormat: dateComponent ? dateComponent.dateFormat : null,
    decimalPositions: decimals,
    requiredAis,
    exclusiveAis,
    digitalLinkKey,
    components,
  }));
}

class TrieNode {
  readonly children = new Map<string, TrieNode>();
  definition: AIDefinition | null = null;
}

export interface AIMatch {
  definition: AIDefinition | null;
  length: number;
}

export class AiTrie {
  private readonly root = new TrieNode();

  insert(definition: AIDefinition): void {
    let node = this.root;
    for (const ch of definition.code) {
      let next = node.children.get(ch);
      if (!next) {
        next = new TrieNode();
        node.children.set(ch, next);
      }
      node = next;
    }
    node.definition = definition;
  }

  /** Every registered code prefixing text at pos, longest first */
  matchesAt(text: string, pos: number): AIDefinition[] {
    const found: AIDefinition[] = [];
    let node = this.root;
    for (let i = pos; i < text.length && i < pos + MAX_AI_LENGTH; i++) {
      const next = node.children.get(text[i]);
      if (!next) break;
      node = next;
      if (node.definition) found.push(node.definition);
    }
    return found.reverse();
  }

  longestMatch(text: string, pos: number): AIMatch {
    const [longest] = this.matchesAt(text, pos);
    return longest ? { definition: longest, length: longest.code.length } : { definition: null, length: 0 };
  }
}

export class Catalog {
  private readonly trie = new AiTrie();
  private readonly byCode = new Map<string, AIDefinition>();

  constructor(definitions: readonly AIDefinition[], public readonly skippedRows = 0) {
    for (const definition of definitions) {
      this.byCode.set(definition.code, definition);
      this.trie.insert(definition);
    }
  }

  get size(): number {
    return this.byCode.size;
  }

  lookup(code: string): AIDefinition | null {
    return this.byCode.get(code) ?? null;
  }

  longestMatch(text: string, pos: number): AIMatch {
    return this.trie.longestMatch(text, pos);
  }

  matchesAt(text: string, pos: number): AIDefinition[] {
    return this.trie.matchesAt(text, pos);
  }

  /** Does a registered AI start at pos with room for its shortest data? */
  startsPlausibleAi(text: string, pos: number): boolean {
    const { definition, length } = this.longestMatch(text, pos);
    if (!definition) return false;
    return text.length - (pos + length) >= (definition.fixedLength ?? definition.minLength);
  }

  entries(): AIDefinition[] {
    return [...this.byCode.values()];
  }
}

export function buildCatalog(table: string): Catalog {
  const definitions: AIDefinition[] = [];
  let skipped = 0;
  for (const line of table.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const parsed = parseTableRow(trimmed);
    if (parsed) definitions.push(...parsed);
    else skipped++;
  }
  return new Catalog(definitions, skipped);
}

export const resolveTablePath = (): string =>
  process.env.GS1_AI_TABLE_PATH || path.resolve(__dirname, '..', '..', 'data', 'gs1-ai-table.txt');

let cachedCatalog: Catalog | null = null;

/** Process-wide catalog, built from the table file on first use */
export const getCatalog = (): Catalog => {
  if (!cachedCatalog) {
    cachedCatalog = buildCatalog(fs.readFileSync(resolveTablePath(), 'utf8'));
  }
  return cachedCatalog;
};

/** Replace the process-wide catalog, from the given table or the file */
export const rebuildCatalog = (table?: string): Catalog => {
  cachedCatalog = buildCatalog(table ?? fs.readFileSync(resolveTablePath(), 'utf8'));
  return cachedCatalog;
};
