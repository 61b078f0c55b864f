/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * COMBINER
 * Merges the PDF-sourced and TXT-sourced line items of one file pair
 *
 * TXT rows are authoritative. Each one is backfilled from the first PDF row
 * whose identity does not conflict: only empty text and zero numbers are filled.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
  LINE_ITEM_NUMERIC_FIELDS,
  LINE_ITEM_TEXT_FIELDS,
  type LineItem,
  type LineItemNumericField,
  type LineItemTextField,
} from '@tariffline/shared';
import { createLineItem, type LineItemInput } from '../normalization/normalizer.js';

const BACKFILL_TEXT_FIELDS: readonly LineItemTextField[] = LINE_ITEM_TEXT_FIELDS;

// value is derived, never copied
const BACKFILL_NUMERIC_FIELDS: readonly Exclude<LineItemNumericField, 'value'>[] =
  LINE_ITEM_NUMERIC_FIELDS.filter(
    (field): field is Exclude<LineItemNumericField, 'value'> => field !== 'value'
  );

function sameOrEmpty(left: string, right: string): boolean {
  return !left || !right || left.toUpperCase() === right.toUpperCase();
}

export function identitiesCompatible(txt: LineItem, pdf: LineItem): boolean {
  return sameOrEmpty(txt.sku, pdf.sku) && sameOrEmpty(txt.htsCode, pdf.htsCode);
}

function backfill(txt: LineItem, pdf: LineItem | undefined): LineItem {
  const input: LineItemInput = {
    sku: txt.sku,
    description: txt.description,
    htsCode: txt.htsCode,
    countryOfOrigin: txt.countryOfOrigin,
    packageCount: txt.packageCount,
    quantity: txt.quantity,
    netWeightKg: txt.netWeightKg,
    grossWeightKg: txt.grossWeightKg,
    unitPrice: txt.unitPrice,
    qtyUnit: txt.qtyUnit,
    invoiceNumber: txt.invoiceNumber,
  };

  if (pdf) {
    for (const field of BACKFILL_TEXT_FIELDS) {
      if (!input[field]) input[field] = pdf[field];
    }
    for (const field of BACKFILL_NUMERIC_FIELDS) {
      if (input[field] === 0) input[field] = pdf[field];
    }
  }

  return createLineItem(input, 'combined');
}

export function combineLineItems(
  pdfItems: readonly LineItem[],
  txtItems: readonly LineItem[]
): LineItem[] {
  if (txtItems.length === 0) {
    return [...pdfItems];
  }
  return txtItems.map((txt) =>
    backfill(
      txt,
      pdfItems.find((pdf) => identitiesCompatible(txt, pdf))
    )
  );
}
