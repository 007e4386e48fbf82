import { Logger } from '@nestjs/common';
import {
  CanonicalStatus,
  OccurrenceSeverity,
  isCanonicalStatus,
  isOccurrenceSeverity,
  isTerminalStatus,
} from '../domain/enums';
import { OccurrenceCode } from '../domain/models';
import { RegistryReloadError } from '../errors';
import {
  BundledCodeSource,
  OccurrenceCodeSource,
  RawOccurrenceCode,
} from './occurrence-code.source';

/**
 * Carrier value for codes that apply to every carrier
 */
export const GENERIC_CARRIER = '*';

export type OccurrenceLookup =
  | { kind: 'known'; occurrence: OccurrenceCode }
  | { kind: 'unknown'; code: string; carrier: string | null };

/**
 * One immutable generation of the code table
 */
interface RegistrySnapshot {
  readonly entries: ReadonlyMap<string, OccurrenceCode>;
  readonly generation: number;
  readonly sourceName: string;
  readonly loadedAt: Date;
}

/**
 * Occurrence code registry
 *
 * Lookups read a single snapshot reference. Loads build and validate the
 * complete new table first and only then swap the reference, so readers
 * see either the old table or the new one, never a mix.
 */
export class OccurrenceCodeRegistry {
  private readonly logger = new Logger(OccurrenceCodeRegistry.name);
  private snapshot: RegistrySnapshot = {
    entries: new Map(),
    generation: 0,
    sourceName: 'empty',
    loadedAt: new Date(0),
  };

  /**
   * Registry populated from the bundled seed
   */
  static async withBundledCodes(): Promise<OccurrenceCodeRegistry> {
    const registry = new OccurrenceCodeRegistry();
    await registry.load(new BundledCodeSource());
    return registry;
  }

  /**
   * Initial load at startup
   */
  async load(source: OccurrenceCodeSource): Promise<void> {
    await this.swapFrom(source);
  }

  /**
   * Replace the table at runtime. On any validation problem the current
   * table stays in effect and RegistryReloadError is thrown.
   */
  async reload(source: OccurrenceCodeSource): Promise<void> {
    await this.swapFrom(source);
  }

  /**
   * Synchronous variant of reload for callers that already hold the rows
   */
  replace(rows: RawOccurrenceCode[], sourceName = 'inline'): void {
    const entries = this.buildTable(rows);
    this.install(entries, sourceName);
  }

  /**
   * Resolve a code; a carrier-specific entry wins over a generic one
   */
  lookup(code: string, carrier?: string | null): OccurrenceLookup {
    const normalizedCode = code.trim();
    const entries = this.snapshot.entries;

    if (carrier) {
      const specific = entries.get(
        OccurrenceCode.keyOf(carrier.toLowerCase(), normalizedCode),
      );
      if (specific) {
        return { kind: 'known', occurrence: specific };
      }
    }

    const generic = entries.get(
      OccurrenceCode.keyOf(GENERIC_CARRIER, normalizedCode),
    );
    if (generic) {
      return { kind: 'known', occurrence: generic };
    }

    return { kind: 'unknown', code: normalizedCode, carrier: carrier ?? null };
  }

  list(carrier?: string): OccurrenceCode[] {
    const all = Array.from(this.snapshot.entries.values());
    return carrier ? all.filter((entry) => entry.carrier === carrier) : all;
  }

  get size(): number {
    return this.snapshot.entries.size;
  }

  /**
   * Monotonic counter bumped on each successful load
   */
  get generation(): number {
    return this.snapshot.generation;
  }

  describe(): { generation: number; size: number; source: string; loadedAt: Date } {
    return {
      generation: this.snapshot.generation,
      size: this.snapshot.entries.size,
      source: this.snapshot.sourceName,
      loadedAt: this.snapshot.loadedAt,
    };
  }

  private async swapFrom(source: OccurrenceCodeSource): Promise<void> {
    let rows: RawOccurrenceCode[];
    try {
      rows = await source.load();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RegistryReloadError(
        `Failed to read occurrence codes from ${source.name}: ${message}`,
        [message],
      );
    }

    const entries = this.buildTable(rows);
    this.install(entries, source.name);
  }

  private install(entries: Map<string, OccurrenceCode>, sourceName: string): void {
    this.snapshot = Object.freeze({
      entries,
      generation: this.snapshot.generation + 1,
      sourceName,
      loadedAt: new Date(),
    });

    this.logger.log(
      `Loaded ${entries.size} occurrence codes from ${sourceName} (generation ${this.snapshot.generation})`,
    );
  }

  /**
   * Validate every row and build the lookup map; nothing is installed here
   */
  private buildTable(rows: RawOccurrenceCode[]): Map<string, OccurrenceCode> {
    const problems: string[] = [];
    const entries = new Map<string, OccurrenceCode>();

    if (rows.length === 0) {
      problems.push('table is empty');
    }

    rows.forEach((row, index) => {
      const parsed = this.parseRow(row, index, problems);
      if (!parsed) {
        return;
      }

      if (entries.has(parsed.key)) {
        problems.push(`row ${index}: duplicate entry for ${parsed.key}`);
        return;
      }

      entries.set(parsed.key, Object.freeze(parsed));
    });

    if (problems.length > 0) {
      throw new RegistryReloadError(
        `Occurrence code table rejected (${problems.length} problem(s))`,
        problems,
      );
    }

    return entries;
  }

  private parseRow(
    row: RawOccurrenceCode,
    index: number,
    problems: string[],
  ): OccurrenceCode | null {
    const code = typeof row.code === 'string' ? row.code.trim() : '';
    const carrier =
      typeof row.carrier === 'string' ? row.carrier.trim().toLowerCase() : '';
    const label = `row ${index} (${carrier || '?'}:${code || '?'})`;
    const before = problems.length;

    if (!code) {
      problems.push(`${label}: code is required`);
    }
    if (!carrier) {
      problems.push(`${label}: carrier is required`);
    }
    if (typeof row.description !== 'string') {
      problems.push(`${label}: description must be a string`);
    }
    if (!isCanonicalStatus(row.canonicalStatus)) {
      problems.push(`${label}: unknown canonical status ${String(row.canonicalStatus)}`);
    } else if (row.canonicalStatus === CanonicalStatus.UNCLASSIFIED) {
      problems.push(`${label}: unclassified is reserved for unknown codes`);
    }
    if (!isOccurrenceSeverity(row.severity)) {
      problems.push(`${label}: unknown severity ${String(row.severity)}`);
    }
    if (typeof row.isTerminal !== 'boolean') {
      problems.push(`${label}: isTerminal must be a boolean`);
    }

    if (
      problems.length > before ||
      !isCanonicalStatus(row.canonicalStatus) ||
      !isOccurrenceSeverity(row.severity) ||
      typeof row.isTerminal !== 'boolean' ||
      typeof row.description !== 'string'
    ) {
      return null;
    }

    const terminalStatus = isTerminalStatus(row.canonicalStatus);
    if (row.isTerminal !== terminalStatus) {
      problems.push(
        `${label}: isTerminal=${row.isTerminal} contradicts status ${row.canonicalStatus}`,
      );
      return null;
    }
    if ((row.severity === OccurrenceSeverity.TERMINAL) !== row.isTerminal) {
      problems.push(
        `${label}: severity ${row.severity} inconsistent with isTerminal=${row.isTerminal}`,
      );
      return null;
    }

    return new OccurrenceCode(
      code,
      carrier,
      row.description,
      row.canonicalStatus,
      row.severity,
      row.isTerminal,
      typeof row.type === 'string' ? row.type : null,
      typeof row.process === 'string' ? row.process : null,
    );
  }
}
