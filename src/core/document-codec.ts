import { DocumentMeta, META_KEY, NoteBody, NoteDocument } from '../types/index.js';

export interface EncodeOptions {
  /** Two-space indentation, used for the local file. */
  pretty?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function toMeta(value: unknown): DocumentMeta | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const { id_count: idCount, old_ids: oldIds } = value;
  if (!isNonNegativeInteger(idCount) || !Array.isArray(oldIds)) {
    return undefined;
  }
  if (!oldIds.every(isNonNegativeInteger)) {
    return undefined;
  }
  return { id_count: idCount, old_ids: [...oldIds] };
}

function toNote(value: unknown): NoteBody | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const { title, content } = value;
  if (typeof title !== 'string' || typeof content !== 'string') {
    return undefined;
  }
  return { title, content };
}

export function emptyDocument(): NoteDocument {
  return { notes: {} };
}

/**
 * Decode the raw document text.
 *
 * Unparseable text or a top-level value that is not an object decodes to an
 * empty document. Entries whose key is not a decimal id, or whose value is
 * not a `{title, content}` pair, are dropped.
 */
export function decode(text: string): NoteDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return emptyDocument();
  }
  if (!isRecord(parsed)) {
    return emptyDocument();
  }

  const document: NoteDocument = emptyDocument();
  for (const [key, value] of Object.entries(parsed)) {
    if (key === META_KEY) {
      document.meta = toMeta(value);
      continue;
    }
    if (!/^\d+$/.test(key) || String(Number(key)) !== key) {
      continue;
    }
    const note = toNote(value);
    if (note) {
      document.notes[key] = note;
    }
  }
  return document;
}

export function encode(document: NoteDocument, options: EncodeOptions = {}): string {
  const out: Record<string, NoteBody | DocumentMeta> = {};
  for (const [key, note] of Object.entries(document.notes)) {
    out[key] = { title: note.title, content: note.content };
  }
  if (document.meta) {
    out[META_KEY] = { id_count: document.meta.id_count, old_ids: [...document.meta.old_ids] };
  }
  return options.pretty ? JSON.stringify(out, null, 2) : JSON.stringify(out);
}

export function withMeta(document: NoteDocument, meta: DocumentMeta): NoteDocument {
  return { notes: { ...document.notes }, meta: { id_count: meta.id_count, old_ids: [...meta.old_ids] } };
}

/**
 * The notes of a document as a plain key → note map, without `_meta`.
 */
export function hideMeta(document: NoteDocument): Record<string, NoteBody> {
  const notes: Record<string, NoteBody> = {};
  for (const [key, note] of Object.entries(document.notes)) {
    notes[key] = { ...note };
  }
  return notes;
}
