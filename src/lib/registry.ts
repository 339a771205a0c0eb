import type { CleanTable } from '../cleaning/pipeline';
import type { CleanAircraftRecord } from '../cleaning/record';
import type { CleaningStats } from '../cleaning/types';
import { normalizeTailNumber } from '../ingest/utils';

export type RegistrySnapshot = {
  table: CleanTable;
  stats: CleaningStats;
  loadedAt: Date;
  dataVersion: string | null;
};

/** Latest cleaned RAB snapshot, replaced wholesale on every refresh. */
export class AircraftRegistry {
  private snapshot: RegistrySnapshot | null = null;
  private byTailNumber = new Map<string, CleanAircraftRecord>();

  replace(snapshot: RegistrySnapshot): void {
    const index = new Map<string, CleanAircraftRecord>();
    for (const record of snapshot.table.rows) {
      const key = normalizeTailNumber(record.tail_number);
      if (key && !index.has(key)) {
        index.set(key, record);
      }
    }

    this.snapshot = snapshot;
    this.byTailNumber = index;
  }

  getSnapshot(): RegistrySnapshot | null {
    return this.snapshot;
  }

  findByTailNumber(tailNumber: string): CleanAircraftRecord | null {
    return this.byTailNumber.get(normalizeTailNumber(tailNumber)) ?? null;
  }

  clear(): void {
    this.snapshot = null;
    this.byTailNumber = new Map();
  }
}

let registry: AircraftRegistry | null = null;

export const getAircraftRegistry = (): AircraftRegistry => {
  if (!registry) {
    registry = new AircraftRegistry();
  }

  return registry;
};
