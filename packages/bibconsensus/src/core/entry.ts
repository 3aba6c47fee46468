/**
 * Bibliographic Entry
 *
 * A citation key, an entry type and a case-insensitive field map. The key is
 * fixed at construction; fields are mutated in place by the driver only.
 */

import type { FieldLookup } from './types/index.js';

/**
 * Serialized form used by the JSON interchange files
 */
export interface EntryRecord {
  readonly key: string;
  readonly type: string;
  readonly fields: Readonly<Record<string, string>>;
}

/**
 * Strip BibTeX grouping braces and surrounding whitespace
 */
export function plainValue(value: string): string {
  return value.replace(/[{}]/g, '').trim();
}

export class Entry implements FieldLookup {
  readonly key: string;
  readonly type: string;
  private readonly values = new Map<string, string>();

  constructor(key: string, type: string, fields: Iterable<readonly [string, string]> = []) {
    this.key = key;
    this.type = type.trim().toLowerCase();
    for (const [field, value] of fields) {
      this.set(field, value);
    }
  }

  static fromRecord(record: EntryRecord): Entry {
    return new Entry(record.key, record.type, Object.entries(record.fields));
  }

  get(field: string): string | undefined {
    return this.values.get(field.toLowerCase());
  }

  /**
   * True when the field holds a non-empty value (braces ignored)
   */
  has(field: string): boolean {
    const value = this.get(field);
    return value !== undefined && plainValue(value) !== '';
  }

  set(field: string, value: string): void {
    this.values.set(field.toLowerCase(), value);
  }

  delete(field: string): boolean {
    return this.values.delete(field.toLowerCase());
  }

  fieldNames(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }

  clone(): Entry {
    return new Entry(this.key, this.type, this.values);
  }

  toJSON(): EntryRecord {
    return {
      key: this.key,
      type: this.type,
      fields: Object.fromEntries(this.values),
    };
  }
}
