export type SnapshotValue = number | string | boolean | null;

export type FieldUpdate = {
  value: SnapshotValue;
  unit: string | null;
};

export type FieldUpdates = Record<string, FieldUpdate>;

export type SnapshotField = FieldUpdate & {
  updatedAt: string;
  job: string;
};

export type SnapshotReading = ({ status: 'present' } & SnapshotField) | { status: 'no_data' };

export const NO_DATA: SnapshotReading = Object.freeze({ status: 'no_data' });

export type SnapshotListener = (job: string, fields: string[]) => void;

/**
 * Latest known-good value of every field for one vehicle. Each merge replaces
 * the field map in a single synchronous step, so a reader sees either none or
 * all of a job's updates. Nothing is ever removed by a failed poll.
 */
export class SnapshotStore {
  private fields: ReadonlyMap<string, SnapshotField> = new Map();

  private revision = 0;

  private readonly listeners = new Set<SnapshotListener>();

  merge(job: string, updates: FieldUpdates, updatedAt: Date = new Date()): void {
    const names = Object.keys(updates);
    if (names.length === 0) {
      return;
    }

    const timestamp = updatedAt.toISOString();
    const next = new Map(this.fields);
    names.forEach((name) => {
      const update = updates[name];
      next.set(name, { value: update.value, unit: update.unit, updatedAt: timestamp, job });
    });

    this.fields = next;
    this.revision += 1;
    this.listeners.forEach((listener) => listener(job, names));
  }

  read(field: string): SnapshotReading {
    const entry = this.fields.get(field);
    return entry ? { status: 'present', ...entry } : NO_DATA;
  }

  readAll(): Record<string, SnapshotField> {
    return Object.fromEntries(
      Array.from(this.fields.entries()).map(([name, entry]) => [name, { ...entry }]),
    );
  }

  get version(): number {
    return this.revision;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
