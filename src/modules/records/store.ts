import { readFile } from 'fs/promises';
import { candidateSetSchema } from '../matching/schemas.js';
import type { MedicationMetadata, MedicationRecord } from '../matching/types.js';
import { assertValid } from '../matching/validation.js';

export class DuplicateRecordError extends Error {
  readonly statusCode = 409;

  constructor(readonly recordId: string) {
    super(`Record already exists: ${recordId}`);
    this.name = 'DuplicateRecordError';
  }
}

function freezeMetadata(metadata: MedicationMetadata): MedicationMetadata {
  const { brandNames, ...rest } = metadata;
  return Object.freeze({
    ...rest,
    ...(brandNames ? { brandNames: Object.freeze([...brandNames]) } : {}),
  });
}

function freezeRecord(
  id: string,
  name: string,
  metadata: MedicationMetadata | null | undefined
): MedicationRecord {
  const record: MedicationRecord = { id, name };
  if (metadata !== undefined) {
    record.metadata = metadata === null ? null : freezeMetadata(metadata);
  }
  return Object.freeze(record);
}

/**
 * In-memory medication store.
 *
 * Keeps insertion order, which is the candidate order handed to the ranker
 * (and therefore the tie-break order). Stored records are frozen copies that
 * share nothing with the caller, and are replaced on update, so a list()
 * snapshot taken for one request is unaffected by later writes.
 */
export class RecordStore {
  private records = new Map<string, MedicationRecord>();

  constructor(initial: readonly MedicationRecord[] = []) {
    for (const record of initial) this.create(record);
  }

  get size(): number {
    return this.records.size;
  }

  list(): MedicationRecord[] {
    return [...this.records.values()];
  }

  get(id: string): MedicationRecord | undefined {
    return this.records.get(id);
  }

  create(record: MedicationRecord): MedicationRecord {
    if (this.records.has(record.id)) {
      throw new DuplicateRecordError(record.id);
    }
    const stored = freezeRecord(record.id, record.name, record.metadata);
    this.records.set(stored.id, stored);
    return stored;
  }

  /**
   * Replace a record's metadata. The id never changes.
   * Returns undefined if the record does not exist.
   */
  setMetadata(id: string, metadata: MedicationMetadata | null): MedicationRecord | undefined {
    const existing = this.records.get(id);
    if (!existing) return undefined;

    const updated = freezeRecord(existing.id, existing.name, metadata);
    this.records.set(id, updated);
    return updated;
  }

  remove(id: string): boolean {
    return this.records.delete(id);
  }
}

export interface StoreLogger {
  info(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

/**
 * Load a JSON array of records (e.g. an export of the app's medication list).
 * Throws InputValidationError if the file does not hold valid records.
 */
export async function loadRecordsFile(
  path: string,
  logger?: StoreLogger
): Promise<MedicationRecord[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    logger?.error({ error: err, path }, 'Failed to read records file');
    throw err;
  }

  const records = assertValid(candidateSetSchema, raw, `records file ${path}`);
  logger?.info({ path, count: records.length }, 'Loaded records file');
  return records;
}
