/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * FIELD ALIAS TABLE
 * Source column names → canonical line item fields.
 * New source layouts are added here, extraction code stays untouched.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { CanonicalField } from '../types/invoice.js';

export interface ScaledFieldAlias {
  alias: string;
  field: CanonicalField;
  /** Multiplier into the canonical unit (kg for weights) */
  factor: number;
}

export interface FieldAliasTable {
  version: number;
  /** Aliases per field; the canonical name itself always resolves too */
  fields: Readonly<Record<CanonicalField, readonly string[]>>;
  scaled: readonly ScaledFieldAlias[];
}

const POUNDS_TO_KG = 0.45359237;

export const FIELD_ALIAS_TABLE: FieldAliasTable = {
  version: 1,
  fields: {
    sku: ['PART', 'PART_NO', 'PART NUMBER', 'SKU', 'ITEM', 'ITEM_NO', 'MATERIAL'],
    description: ['PART_DESC', 'DESCRIPTION', 'DESC', 'ITEM_DESC'],
    htsCode: ['HTTS', 'HTS', 'HTS_CODE', 'HTSUS', 'HS_CODE', 'TARIFF'],
    countryOfOrigin: ['C/N', 'COO', 'COUNTRY', 'COUNTRY OF ORIGIN', 'ORIGIN'],
    packageCount: ['NO. OF PACKAGE', 'PACKAGES', 'PKGS', 'CARTONS', 'PACKAGE_COUNT'],
    quantity: ['QUANTITY', 'QTY'],
    netWeightKg: ['WEIGHT', 'NET WEIGHT', 'NET_WT', 'NW', 'NET_WEIGHT_KG'],
    grossWeightKg: ['GROSS WEIGHT', 'GROSS_WT', 'GW', 'GROSS_WEIGHT_KG'],
    unitPrice: ['AMT', 'UNIT PRICE', 'PRICE'],
    value: ['VALUE', 'EXT_AMT', 'LINE_TOTAL', 'AMOUNT', 'TOTAL'],
    qtyUnit: ['QTY UNIT', 'UOM', 'UNIT'],
    invoiceNumber: ['INVOICE_NBR', 'INVOICE_NUMBER', 'INVOICE NO', 'INVOICE', 'INV_NO'],
  },
  scaled: [
    { alias: 'WEIGHT_LB', field: 'netWeightKg', factor: POUNDS_TO_KG },
    { alias: 'NET WEIGHT LB', field: 'netWeightKg', factor: POUNDS_TO_KG },
    { alias: 'NET_WT_LBS', field: 'netWeightKg', factor: POUNDS_TO_KG },
    { alias: 'GROSS WEIGHT LB', field: 'grossWeightKg', factor: POUNDS_TO_KG },
    { alias: 'GROSS_WT_LBS', field: 'grossWeightKg', factor: POUNDS_TO_KG },
  ],
};

/**
 * Key form used for alias lookups: trimmed, upper-cased, with runs of
 * spaces, underscores and dashes collapsed to a single underscore.
 */
export function normalizeFieldKey(key: string): string {
  return key.trim().toUpperCase().replace(/[\s_-]+/g, '_');
}
