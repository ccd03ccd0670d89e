/**
 * Version ordering for layer stems such as "0.2.1" or "0.10.0".
 *
 * Runs of digits compare numerically and everything else compares
 * ordinally, so "0.10.0" sorts after "0.9.0". Strings that tie on that
 * comparison ("1.01" and "1.1") fall back to plain ordinal order, which
 * keeps the ordering total and stable across runs.
 */

const CHUNK_RE = /(\d+)/;

/**
 * Ordinal string comparison, independent of locale.
 */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareChunks(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);

  if (aNumeric && bNumeric) {
    const diff = BigInt(a) - BigInt(b);
    return diff < 0n ? -1 : diff > 0n ? 1 : 0;
  }
  return compareOrdinal(a, b);
}

export function compareVersions(a: string, b: string): number {
  const aChunks = a.split(CHUNK_RE);
  const bChunks = b.split(CHUNK_RE);
  const length = Math.min(aChunks.length, bChunks.length);

  for (let i = 0; i < length; i++) {
    const result = compareChunks(aChunks[i] ?? "", bChunks[i] ?? "");
    if (result !== 0) return result;
  }

  if (aChunks.length !== bChunks.length) {
    return aChunks.length - bChunks.length;
  }
  return compareOrdinal(a, b);
}
