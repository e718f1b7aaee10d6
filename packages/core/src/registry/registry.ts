/**
 * In-process registry
 *
 * Maps opaque ids to records for the lifetime of the process. Writers own
 * the records they create; readers look records up by id only. Stored
 * values are frozen snapshots, so a reader can never mutate a record it
 * was handed.
 *
 * @module @autopr/core/registry
 */

import { NotFoundError, ValidationError } from '../reliability/errors.js';

export interface RegistryRecord {
  id: string;
}

export class Registry<T extends RegistryRecord> {
  private records = new Map<string, Readonly<T>>();

  constructor(private readonly entity: string) {}

  /**
   * Insert a new record; ids are never reused
   */
  create(record: T): Readonly<T> {
    if (this.records.has(record.id)) {
      throw new ValidationError(`${this.entity} ${record.id} already exists`, {
        context: { entity: this.entity, id: record.id },
      });
    }
    const stored = Object.freeze({ ...record });
    this.records.set(record.id, stored);
    return stored;
  }

  get(id: string): Readonly<T> | undefined {
    return this.records.get(id);
  }

  /**
   * Get a record or throw NotFoundError
   */
  require(id: string): Readonly<T> {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(`${this.entity} ${id} not found`, {
        resource: this.entity,
        context: { id },
      });
    }
    return record;
  }

  /**
   * Replace a record with the result of `updater`; the id cannot change
   */
  update(id: string, updater: (current: Readonly<T>) => T): Readonly<T> {
    const current = this.require(id);
    const next = Object.freeze({ ...updater(current), id });
    this.records.set(id, next);
    return next;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Drop every record (for testing)
   */
  clear(): void {
    this.records.clear();
  }
}
