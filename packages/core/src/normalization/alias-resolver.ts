import {
  FIELD_ALIAS_TABLE,
  LINE_ITEM_NUMERIC_FIELDS,
  LINE_ITEM_TEXT_FIELDS,
  normalizeFieldKey,
  type CanonicalField,
  type FieldAliasTable,
} from '@tariffline/shared';

export interface ResolvedAlias {
  field: CanonicalField;
  factor: number;
}

/**
 * Lookup from normalized source keys to canonical fields, built once per table.
 */
export class AliasResolver {
  private readonly lookup = new Map<string, ResolvedAlias>();

  constructor(readonly table: FieldAliasTable = FIELD_ALIAS_TABLE) {
    const fields: CanonicalField[] = [...LINE_ITEM_TEXT_FIELDS, ...LINE_ITEM_NUMERIC_FIELDS];
    for (const field of fields) {
      this.register(field, field, 1);
      for (const alias of table.fields[field]) {
        this.register(alias, field, 1);
      }
    }
    for (const entry of table.scaled) {
      this.register(entry.alias, entry.field, entry.factor);
    }
  }

  get version(): number {
    return this.table.version;
  }

  resolve(key: string): ResolvedAlias | null {
    return this.lookup.get(normalizeFieldKey(key)) ?? null;
  }

  /** Number of keys that resolve to a canonical field */
  countKnown(keys: readonly string[]): number {
    return keys.filter((key) => this.resolve(key) !== null).length;
  }

  private register(alias: string, field: CanonicalField, factor: number): void {
    const key = normalizeFieldKey(alias);
    // first registration wins so canonical names cannot be shadowed
    if (!this.lookup.has(key)) {
      this.lookup.set(key, { field, factor });
    }
  }
}

export const defaultAliasResolver = new AliasResolver();
