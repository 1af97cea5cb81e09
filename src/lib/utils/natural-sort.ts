/**
 * Numeric-aware ordering for seat labels ("2" < "10", "A2" < "A10")
 */

const CHUNK_PATTERN = /(\d+)/;

function chunks(value: string): string[] {
  return value.split(CHUNK_PATTERN).filter((part) => part.length > 0);
}

function isDigits(value: string): boolean {
  return /^\d+$/.test(value);
}

export function naturalCompare(a: string, b: string): number {
  const left = chunks(a);
  const right = chunks(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i];
    const r = right[i];
    if (l === r) continue;

    if (isDigits(l) && isDigits(r)) {
      const diff = Number(l) - Number(r);
      if (diff !== 0) return diff;
      // "07" vs "7": fall back to string order so the result stays total
    }
    return l < r ? -1 : 1;
  }

  return left.length - right.length;
}

/**
 * Last run of digits in a seat label, or null when it has none.
 */
export function parseSeatNumber(label: string): number | null {
  const matches = label.match(/\d+/g);
  if (!matches || matches.length === 0) return null;
  return Number(matches[matches.length - 1]);
}
