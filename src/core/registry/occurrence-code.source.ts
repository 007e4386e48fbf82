import { promises as fs } from 'fs';
import bundledCodes from './data/occurrence-codes.json';

/**
 * Registry row before validation; field types are checked on load
 */
export interface RawOccurrenceCode {
  carrier?: unknown;
  code?: unknown;
  description?: unknown;
  canonicalStatus?: unknown;
  severity?: unknown;
  isTerminal?: unknown;
  type?: unknown;
  process?: unknown;
}

/**
 * Where a registry table comes from
 */
export interface OccurrenceCodeSource {
  readonly name: string;
  load(): Promise<RawOccurrenceCode[]>;
}

/**
 * The seed shipped with the engine (SSW taxonomy plus generic codes)
 */
export class BundledCodeSource implements OccurrenceCodeSource {
  readonly name = 'bundled';

  async load(): Promise<RawOccurrenceCode[]> {
    return bundledCodes.map((entry) => ({ ...entry }));
  }
}

/**
 * A JSON file holding an array of occurrence code rows
 */
export class JsonFileCodeSource implements OccurrenceCodeSource {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = `file:${filePath}`;
  }

  async load(): Promise<RawOccurrenceCode[]> {
    const content = await fs.readFile(this.filePath, 'utf8');
    const parsed: unknown = JSON.parse(content);

    if (!Array.isArray(parsed)) {
      throw new Error(`${this.filePath} must contain a JSON array`);
    }

    return parsed.map((row: unknown): RawOccurrenceCode =>
      typeof row === 'object' && row !== null ? { ...row } : {},
    );
  }
}

/**
 * In-memory rows; used by tests and by hosts that keep codes elsewhere
 */
export class StaticCodeSource implements OccurrenceCodeSource {
  constructor(
    private readonly rows: RawOccurrenceCode[],
    readonly name = 'static',
  ) {}

  async load(): Promise<RawOccurrenceCode[]> {
    return this.rows.map((row) => ({ ...row }));
  }
}
