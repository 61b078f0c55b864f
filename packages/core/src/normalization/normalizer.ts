/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * NORMALIZER
 * Raw rows → canonical line items
 *
 * Policy:
 * - absent or unparsable numbers are 0, absent text is ""
 * - value is always recomputed from quantity × unitPrice
 * - gross weight falls back to net weight when the source has no gross column
 *   and the unit defaults to EA; both can be deferred until a pair is combined
 * - rows with neither sku nor htsCode are dropped and counted
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
  BLANK_TEXT_MARKERS,
  DEFAULT_QTY_UNIT,
  type CanonicalField,
  type LineItem,
  type RawRow,
  type SourceTag,
} from '@tariffline/shared';
import { AliasResolver, defaultAliasResolver } from './alias-resolver.js';
import { parseNonNegative, roundMoney } from './numbers.js';

/** Everything a line item carries except its derived value and source tag */
export type LineItemInput = {
  -readonly [K in Exclude<keyof LineItem, 'value' | 'sourceTag'>]: LineItem[K];
};

export interface NormalizeOptions {
  /** Keep only rows of this invoice (case-insensitive exact match) */
  invoiceNumber?: string;
  aliases?: AliasResolver;
  /** Leave a missing gross weight at 0 and a missing unit empty */
  deferDefaults?: boolean;
}

export interface NormalizationResult {
  items: LineItem[];
  /** Rows dropped for missing identity */
  skippedRows: number;
  /** Rows excluded by the invoice number filter (not errors) */
  filteredRows: number;
}

interface ResolvedValue {
  raw: string;
  factor: number;
}

const BLANK_MARKERS = new Set(BLANK_TEXT_MARKERS);

function cleanText(raw: string | undefined): string {
  if (raw === undefined) return '';
  const text = raw.replace(/\s+/g, ' ').trim();
  return BLANK_MARKERS.has(text.toUpperCase()) ? '' : text;
}

/** Build an immutable line item with a recomputed value */
export function createLineItem(input: LineItemInput, sourceTag: SourceTag): LineItem {
  return Object.freeze({
    ...input,
    value: roundMoney(input.quantity * input.unitPrice),
    sourceTag,
  });
}

/** Gross weight from net weight when it is 0, EA when the unit is empty */
export function applyLineItemDefaults(item: LineItem): LineItem {
  const fillGross = item.grossWeightKg === 0 && item.netWeightKg > 0;
  if (!fillGross && item.qtyUnit) return item;
  const { value: _value, sourceTag, ...input } = item;
  return createLineItem(
    {
      ...input,
      grossWeightKg: fillGross ? item.netWeightKg : item.grossWeightKg,
      qtyUnit: item.qtyUnit || DEFAULT_QTY_UNIT,
    },
    sourceTag
  );
}

export function normalizeRow(
  row: RawRow,
  sourceTag: SourceTag,
  aliases: AliasResolver = defaultAliasResolver,
  deferDefaults = false
): LineItem | null {
  const resolved = new Map<CanonicalField, ResolvedValue>();
  for (const [key, raw] of Object.entries(row)) {
    const alias = aliases.resolve(key);
    if (alias && !resolved.has(alias.field)) {
      resolved.set(alias.field, { raw, factor: alias.factor });
    }
  }

  const text = (field: CanonicalField): string => cleanText(resolved.get(field)?.raw);
  const numeric = (field: CanonicalField): number => {
    const entry = resolved.get(field);
    return entry ? parseNonNegative(entry.raw) * entry.factor : 0;
  };

  const sku = text('sku');
  const htsCode = text('htsCode');
  if (!sku && !htsCode) {
    return null;
  }

  const netWeightKg = numeric('netWeightKg');

  return createLineItem(
    {
      sku,
      description: text('description'),
      htsCode,
      countryOfOrigin: text('countryOfOrigin'),
      packageCount: Math.trunc(numeric('packageCount')),
      quantity: numeric('quantity'),
      netWeightKg,
      grossWeightKg: resolved.has('grossWeightKg') || deferDefaults ? numeric('grossWeightKg') : netWeightKg,
      unitPrice: numeric('unitPrice'),
      qtyUnit: text('qtyUnit').toUpperCase() || (deferDefaults ? '' : DEFAULT_QTY_UNIT),
      invoiceNumber: text('invoiceNumber'),
    },
    sourceTag
  );
}

export function matchesInvoiceNumber(item: LineItem, invoiceNumber: string): boolean {
  return item.invoiceNumber.trim().toUpperCase() === invoiceNumber.trim().toUpperCase();
}

export function normalizeRows(
  rows: readonly RawRow[],
  sourceTag: SourceTag,
  options: NormalizeOptions = {}
): NormalizationResult {
  const aliases = options.aliases ?? defaultAliasResolver;
  const filter = options.invoiceNumber?.trim();
  const items: LineItem[] = [];
  let skippedRows = 0;
  let filteredRows = 0;

  for (const row of rows) {
    const item = normalizeRow(row, sourceTag, aliases, options.deferDefaults);
    if (!item) {
      skippedRows++;
      continue;
    }
    if (filter && !matchesInvoiceNumber(item, filter)) {
      filteredRows++;
      continue;
    }
    items.push(item);
  }

  return { items, skippedRows, filteredRows };
}
