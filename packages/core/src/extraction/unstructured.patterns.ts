/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * UNSTRUCTURED FIELD PATTERNS
 * Ordered per-field expressions run over a whole document.
 * The first capture group is the raw value; the first pattern that hits wins.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { CanonicalField } from '@tariffline/shared';

export interface FieldPattern {
  field: CanonicalField;
  patterns: readonly RegExp[];
}

const NUMBER = String.raw`(\d[\d,.]*)`;
const MONEY_PREFIX = String.raw`(?:USD|US\$|\$)?\s*`;

export const UNSTRUCTURED_FIELD_PATTERNS: readonly FieldPattern[] = [
  {
    field: 'invoiceNumber',
    patterns: [
      /\b(\d{3,}[A-Z]-\d{8,})\b/, // 074M-22005749
      /\b(\d{3,}[A-Z]\d{8,})\b/, // 074M22005749
      /\bInvoice\s*(?:No\.?|Number|Nbr|#)\s*[:#]?\s*([A-Z0-9][A-Z0-9-]{2,})/i,
    ],
  },
  {
    field: 'htsCode',
    patterns: [
      /\b(?:HTSUS|HTTS|HTS|H\.T\.S\.|HS)(?:\s*(?:Code|No\.?|#))?\s*[:#]?\s*(\d{4}\.\d{2}(?:\.\d{2,4}){0,2})/i,
      /\b(\d{4}\.\d{2}\.\d{4})\b/,
    ],
  },
  {
    field: 'sku',
    patterns: [
      /\b(?:Part\s*(?:No\.?|Number|#)?|SKU|Item\s*(?:No\.?|Number|#)|P\/N)\s*[:#]\s*\*?([A-Z0-9][A-Z0-9-]+)/i,
      /\*([A-Z0-9]{6,7})\b/, // *214N53
    ],
  },
  {
    field: 'description',
    patterns: [/\b(?:PART_DESC|Description|Desc\.?)\s*:\s*([^\n]{1,120})/i],
  },
  {
    field: 'countryOfOrigin',
    patterns: [/\b(?:Country\s+of\s+Origin|C\/N|COO|Origin)\s*:\s*([^\n]{1,40})/i],
  },
  {
    field: 'quantity',
    patterns: [new RegExp(String.raw`\b(?:QTY|Quantity)\.?\s*[:#]?\s*${NUMBER}`, 'i')],
  },
  {
    field: 'unitPrice',
    patterns: [new RegExp(String.raw`\b(?:Unit\s*Price|AMT|Price)\s*[:#]?\s*${MONEY_PREFIX}${NUMBER}`, 'i')],
  },
  {
    field: 'value',
    patterns: [
      new RegExp(String.raw`\b(?:Total\s*Value|Line\s*Total|Amount|Total|Value)\s*[:#]?\s*${MONEY_PREFIX}${NUMBER}`, 'i'),
    ],
  },
  {
    field: 'netWeightKg',
    patterns: [new RegExp(String.raw`\b(?:Net\s*Weight|Net\s*Wt\.?|N\.W\.)\s*[:#]?\s*${NUMBER}`, 'i')],
  },
  {
    field: 'grossWeightKg',
    patterns: [new RegExp(String.raw`\b(?:Gross\s*Weight|Gross\s*Wt\.?|G\.W\.)\s*[:#]?\s*${NUMBER}`, 'i')],
  },
  {
    field: 'packageCount',
    patterns: [/\b(?:No\.?\s*of\s*Packages?|Packages|Pkgs|Cartons)\s*[:#]?\s*(\d[\d,]*)/i],
  },
  {
    field: 'qtyUnit',
    patterns: [/\b(?:Qty\s*Unit|UOM|Unit\s*of\s*Measure)\s*[:#]?\s*([A-Z]{2,4})\b/i],
  },
];
