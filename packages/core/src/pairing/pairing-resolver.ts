/**
 * Pairing Resolver
 * Proposes PDF↔TXT pairs by filename similarity.
 *
 * Greedy: PDFs are visited in input order and each takes its best remaining
 * TXT, so a TXT is never assigned twice.
 */
import { ENGINE_DEFAULTS, type FilePair, type PairingResult } from '@tariffline/shared';

interface Named {
  filename: string;
}

/** Strip the extension, lower-case and drop everything but letters and digits */
export function normalizeStem(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? filename;
  const dot = base.lastIndexOf('.');
  const stem = dot > 0 ? base.slice(0, dot) : base;
  return stem.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/** Length of the longest common substring */
export function longestCommonSubstring(a: string, b: string): number {
  if (!a || !b) return 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  let longest = 0;

  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        const run = (previous[j - 1] ?? 0) + 1;
        current[j] = run;
        if (run > longest) longest = run;
      }
    }
    previous = current;
  }

  return longest;
}

/** 2 × LCS / (len(a) + len(b)) over normalized stems, 0-1 */
export function filenameSimilarity(a: string, b: string): number {
  const left = normalizeStem(a);
  const right = normalizeStem(b);
  if (!left || !right) return 0;
  return (2 * longestCommonSubstring(left, right)) / (left.length + right.length);
}

export function resolvePairs<F extends Named>(
  pdfs: readonly F[],
  txts: readonly F[],
  threshold: number = ENGINE_DEFAULTS.PAIRING_SIMILARITY_THRESHOLD
): PairingResult<F> {
  const available = new Set<F>(txts);
  const pairs: FilePair<F>[] = [];
  const unmatched: F[] = [];

  for (const pdf of pdfs) {
    let best: { txt: F; score: number } | null = null;

    for (const txt of available) {
      const score = filenameSimilarity(pdf.filename, txt.filename);
      if (score <= threshold) continue;
      if (
        !best ||
        score > best.score ||
        (score === best.score && txt.filename < best.txt.filename)
      ) {
        best = { txt, score };
      }
    }

    if (best) {
      available.delete(best.txt);
      pairs.push({ pdf, txt: best.txt, score: best.score });
    } else {
      unmatched.push(pdf);
    }
  }

  // leftover TXTs keep their input order
  for (const txt of txts) {
    if (available.has(txt)) unmatched.push(txt);
  }

  return { pairs, unmatched };
}
