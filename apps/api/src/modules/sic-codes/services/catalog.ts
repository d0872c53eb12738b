import * as XLSX from 'xlsx';
import { readFile } from 'node:fs/promises';
import type { SicEntry } from '@sicmatch/types';

export const UNKNOWN_SIC_DESCRIPTION = 'Unknown SIC Code';

const CODE_HEADER_ALIASES = ['SIC CODE', 'CODE', 'SIC'];
const DESCRIPTION_HEADER_ALIASES = ['DESCRIPTION', 'DESC', 'TITLE'];

export class CatalogLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogLoadError';
  }
}

export interface SicCatalog {
  /** Entries in source order; frozen. */
  readonly entries: readonly SicEntry[];
  readonly size: number;
  /** File the catalog was read from, when it came from one. */
  readonly source: string | null;
  readonly loadedAt: Date;
  get(code: string): SicEntry | undefined;
  /** Description for a code, or "Unknown SIC Code". */
  describe(code: string): string;
  search(text?: string, limit?: number): { total: number; items: SicEntry[] };
}

export type CreateSicCatalogOptions = { source?: string | null; loadedAt?: Date };

export function createSicCatalog(
  input: ReadonlyArray<SicEntry>,
  options: CreateSicCatalogOptions = {}
): SicCatalog {
  const byCode = new Map<string, SicEntry>();
  const entries: SicEntry[] = [];

  input.forEach((raw, i) => {
    const code = raw.code.trim();
    const description = raw.description.trim();
    if (!code || !description) {
      throw new CatalogLoadError(`SIC catalog entry #${i + 1} is missing a code or description`);
    }
    if (byCode.has(code)) {
      throw new CatalogLoadError(`Duplicate SIC code "${code}" at entry #${i + 1}`);
    }
    const entry = Object.freeze({ code, description });
    byCode.set(code, entry);
    entries.push(entry);
  });

  const frozen = Object.freeze(entries);

  return Object.freeze({
    entries: frozen,
    size: frozen.length,
    source: options.source ?? null,
    loadedAt: options.loadedAt ?? new Date(),
    get: (code: string) => byCode.get(code.trim()),
    describe: (code: string) => byCode.get(code.trim())?.description ?? UNKNOWN_SIC_DESCRIPTION,
    search(text?: string, limit = 50) {
      const q = (text ?? '').trim().toLowerCase();
      const hits = q
        ? frozen.filter(
            (e) => e.code.toLowerCase().startsWith(q) || e.description.toLowerCase().includes(q)
          )
        : frozen;
      return { total: hits.length, items: hits.slice(0, Math.max(0, limit)) };
    },
  });
}

/** First header matching an alias; aliases are tried in priority order. */
function pickHeader(headers: string[], aliases: string[], taken = -1): number {
  const normalized = headers.map((h) => h.toUpperCase().replace(/\s+/g, ''));
  for (const alias of aliases) {
    const wanted = alias.replace(/\s+/g, '');
    const idx = normalized.findIndex((h, i) => i !== taken && h.includes(wanted));
    if (idx >= 0) return idx;
  }
  return -1;
}

/**
 * Column indexes for code and description. A two-column table whose headers
 * match no alias is read positionally, code first.
 */
function resolveColumns(headers: string[]): { codeIdx: number; descIdx: number } | null {
  const codeIdx = pickHeader(headers, CODE_HEADER_ALIASES);
  const descIdx = pickHeader(headers, DESCRIPTION_HEADER_ALIASES, codeIdx);
  if (codeIdx >= 0 && descIdx >= 0) return { codeIdx, descIdx };
  if (headers.length !== 2) return null;
  if (codeIdx >= 0) return { codeIdx, descIdx: 1 - codeIdx };
  if (descIdx >= 0) return { codeIdx: 1 - descIdx, descIdx };
  return { codeIdx: 0, descIdx: 1 };
}

// XLSX is a ZIP archive, legacy XLS an OLE compound file; anything else is text.
const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE_MAGIC = Buffer.from([0xd0, 0xcf, 0x11, 0xe0]);

function isBinaryWorkbook(data: Buffer): boolean {
  const head = data.subarray(0, 4);
  return head.equals(ZIP_MAGIC) || head.equals(OLE_MAGIC);
}

/** Delimited text is decoded as UTF-8, dropping a leading BOM. */
function readWorkbook(data: Buffer | string): XLSX.WorkBook {
  if (typeof data !== 'string' && isBinaryWorkbook(data)) {
    return XLSX.read(data, { type: 'buffer', raw: true });
  }
  const text = typeof data === 'string' ? data : data.toString('utf8');
  return XLSX.read(text.replace(/^\uFEFF/, ''), { type: 'string', raw: true });
}

function cellText(value: unknown): string {
  return value == null ? '' : String(value).trim();
}

function resolveWorksheet(workbook: XLSX.WorkBook, selector?: string | number): XLSX.WorkSheet {
  const names = workbook.SheetNames;
  if (!names.length) throw new CatalogLoadError('SIC catalog workbook has no sheets');

  const name =
    typeof selector === 'number'
      ? names[selector]
      : typeof selector === 'string'
        ? names.find((n) => n === selector)
        : names[0];
  const sheet = name === undefined ? undefined : workbook.Sheets[name];
  if (!sheet) throw new CatalogLoadError(`SIC catalog sheet "${String(selector)}" not found`);
  return sheet;
}

export type ParseSicCatalogOptions = { source?: string; sheet?: string | number };

/** Parse a (code, description) table with a header row. CSV, XLSX or XLS. */
export function parseSicCatalog(
  data: Buffer | string,
  options: ParseSicCatalogOptions = {}
): SicCatalog {
  const label = options.source ?? 'SIC catalog';

  let workbook: XLSX.WorkBook;
  try {
    workbook = readWorkbook(data);
  } catch (err) {
    throw new CatalogLoadError(`${label} could not be parsed`, { cause: err });
  }

  const sheet = resolveWorksheet(workbook, options.sheet);
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: false,
    blankrows: false,
  });

  const [headerRow, ...dataRows] = rows;
  const headers = (headerRow ?? []).map(cellText);
  const columns = resolveColumns(headers);
  if (!columns) {
    throw new CatalogLoadError(
      `${label} is missing a code or description column. Headers: ${headers.join(', ') || '(none)'}`
    );
  }
  const { codeIdx, descIdx } = columns;
  if (!dataRows.length) throw new CatalogLoadError(`${label} contains no entries`);

  const entries = dataRows.map((row, i) => {
    const code = cellText(row[codeIdx]);
    const description = cellText(row[descIdx]);
    if (!code || !description) {
      throw new CatalogLoadError(`${label} row ${i + 2} is missing a code or description`);
    }
    return { code, description };
  });

  return createSicCatalog(entries, { source: options.source ?? null });
}

export async function loadSicCatalog(
  path: string,
  options: Omit<ParseSicCatalogOptions, 'source'> = {}
): Promise<SicCatalog> {
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogLoadError(`Cannot read SIC catalog at ${path}: ${reason}`, { cause: err });
  }
  return parseSicCatalog(data, { ...options, source: path });
}
