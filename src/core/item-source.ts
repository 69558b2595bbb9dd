import { SourceError } from "./errors.js";
import { parseJsonlObjects, splitLines } from "./jsonl.js";
import type { BatchItem } from "./record.js";
import { readTextFile } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ItemDraft = Omit<BatchItem, "id">;

/** Returns null for rows that lack the fields a job needs; those rows are skipped. */
export type JsonlItemExtractor = (row: Record<string, unknown>, id: number) => ItemDraft | null;

export type TextItemExtractor = (line: string, id: number) => ItemDraft | null;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function loadJsonlItems(
  sourcePath: string,
  extract: JsonlItemExtractor,
): Promise<BatchItem[]> {
  const raw = await readSource(sourcePath);
  const { rows } = parseJsonlObjects(raw);

  const items: BatchItem[] = [];
  for (const row of rows) {
    const draft = extract(row.value, row.line);
    if (draft) items.push({ id: row.line, ...draft });
  }

  return ensureNonEmpty(items, sourcePath);
}

export async function loadTextItems(
  sourcePath: string,
  extract: TextItemExtractor,
): Promise<BatchItem[]> {
  const raw = await readSource(sourcePath);

  const items: BatchItem[] = [];
  splitLines(raw).forEach((text, index) => {
    const trimmed = text.trim();
    if (trimmed.length === 0) return;

    const id = index + 1;
    const draft = extract(trimmed, id);
    if (draft) items.push({ id, ...draft });
  });

  return ensureNonEmpty(items, sourcePath);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readSource(sourcePath: string): Promise<string> {
  try {
    return await readTextFile(sourcePath);
  } catch (err) {
    throw new SourceError(`Failed to read input source at ${sourcePath}`, err);
  }
}

function ensureNonEmpty(items: BatchItem[], sourcePath: string): BatchItem[] {
  if (items.length === 0) {
    throw new SourceError(`No usable items found in ${sourcePath}`);
  }
  return items;
}
