/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * AGGREGATOR
 * Invoice summary and per-SKU grouping over one normalized row-set
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ENGINE_DEFAULTS, type HtsValueEntry, type InvoiceSummary, type LineItem } from '@tariffline/shared';
import { fromScaled, roundMoney, roundTo, toScaled } from '../normalization/numbers.js';

export interface SummaryOptions {
  topHtsLimit?: number;
  now?: Date;
}

function addScaled(map: Map<string, number>, key: string, amount: number): void {
  map.set(key, (map.get(key) ?? 0) + toScaled(amount));
}

function money(scaled: number): number {
  return roundMoney(fromScaled(scaled));
}

/**
 * Pure summary of a row-set. Empty keys are left out of the breakdowns but the
 * rows still count toward the totals.
 */
export function summarizeLineItems(
  items: readonly LineItem[],
  invoiceNumber: string,
  options: SummaryOptions = {}
): InvoiceSummary {
  const topHtsLimit = options.topHtsLimit ?? ENGINE_DEFAULTS.TOP_HTS_LIMIT;

  let quantity = 0;
  let netWeight = 0;
  let grossWeight = 0;
  let value = 0;
  const countries = new Map<string, number>();
  const valueByHts = new Map<string, number>();
  const quantityBySku = new Map<string, number>();

  for (const item of items) {
    quantity += toScaled(item.quantity);
    netWeight += toScaled(item.netWeightKg);
    grossWeight += toScaled(item.grossWeightKg);
    value += toScaled(item.value);

    if (item.countryOfOrigin) {
      countries.set(item.countryOfOrigin, (countries.get(item.countryOfOrigin) ?? 0) + 1);
    }
    if (item.htsCode) addScaled(valueByHts, item.htsCode, item.value);
    if (item.sku) addScaled(quantityBySku, item.sku, item.quantity);
  }

  const topHtsCodes: HtsValueEntry[] = [...valueByHts]
    .sort(([codeA, a], [codeB, b]) => b - a || (codeA < codeB ? -1 : codeA > codeB ? 1 : 0))
    .slice(0, topHtsLimit)
    .map(([htsCode, scaled]) => ({ htsCode, value: money(scaled) }));

  return {
    invoiceNumber,
    generatedAt: (options.now ?? new Date()).toISOString(),
    totalLines: items.length,
    totalQuantity: money(quantity),
    totalNetWeight: money(netWeight),
    totalGrossWeight: money(grossWeight),
    totalValue: money(value),
    uniqueHtsCodes: valueByHts.size,
    uniqueSkus: quantityBySku.size,
    countries: Object.fromEntries(countries),
    topHtsCodes,
    quantityBySku: Object.fromEntries(
      [...quantityBySku].map(([sku, scaled]) => [sku, money(scaled)])
    ),
  };
}

interface SkuGroup {
  first: LineItem;
  packageCount: number;
  quantity: number;
  netWeight: number;
  grossWeight: number;
  value: number;
}

/**
 * One row per distinct SKU in first-seen order, with summed quantities,
 * weights, packages and value. Unit price is the value-weighted average.
 */
export function aggregateBySku(items: readonly LineItem[]): LineItem[] {
  const groups = new Map<string, SkuGroup>();

  for (const item of items) {
    let group = groups.get(item.sku);
    if (!group) {
      group = { first: item, packageCount: 0, quantity: 0, netWeight: 0, grossWeight: 0, value: 0 };
      groups.set(item.sku, group);
    }
    group.packageCount += item.packageCount;
    group.quantity += toScaled(item.quantity);
    group.netWeight += toScaled(item.netWeightKg);
    group.grossWeight += toScaled(item.grossWeightKg);
    group.value += toScaled(item.value);
  }

  return [...groups.values()].map((group) => {
    const quantity = roundTo(fromScaled(group.quantity), 4);
    const value = money(group.value);
    return Object.freeze({
      sku: group.first.sku,
      description: group.first.description,
      htsCode: group.first.htsCode,
      countryOfOrigin: group.first.countryOfOrigin,
      packageCount: group.packageCount,
      quantity,
      netWeightKg: roundTo(fromScaled(group.netWeight), 4),
      grossWeightKg: roundTo(fromScaled(group.grossWeight), 4),
      unitPrice: quantity > 0 ? value / quantity : 0,
      value,
      qtyUnit: group.first.qtyUnit,
      invoiceNumber: group.first.invoiceNumber,
      sourceTag: group.first.sourceTag,
    });
  });
}
