/**
 * Dump Diff Engine
 *
 * Compares a freshly generated dump with the committed reference and
 * produces the lines that were added or removed. Line endings are not
 * significant.
 */

import { DumpChange, DumpCheckReport } from './types';

// ─── Normalization ──────────────────────────────────────────────────────────

/**
 * Split dump text into lines, ignoring line-ending style and trailing blank lines.
 */
export function normalizeDump(text: string): string[] {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
    lines.pop();
  }
  return lines;
}

// ─── Line Diff ──────────────────────────────────────────────────────────────

interface Matches {
  readonly a: number[];
  readonly b: number[];
}

/**
 * Line diff over a shortest edit script (Myers, linear space). Within each
 * changed region the removed lines come before the added ones.
 */
export function diffDumps(expected: string, actual: string): DumpChange[] {
  const a = normalizeDump(expected);
  const b = normalizeDump(actual);
  const matches: Matches = { a: [], b: [] };
  collectMatches(a, b, 0, a.length, 0, b.length, matches);

  const changes: DumpChange[] = [];
  let i = 0;
  let j = 0;
  const flush = (untilA: number, untilB: number): void => {
    for (; i < untilA; i++) changes.push({ type: 'removed', line: a[i], lineNumber: i + 1 });
    for (; j < untilB; j++) changes.push({ type: 'added', line: b[j], lineNumber: j + 1 });
  };

  matches.a.forEach((matchA, k) => {
    flush(matchA, matches.b[k]);
    i++;
    j++;
  });
  flush(a.length, b.length);

  return changes;
}

/**
 * Append the matching line pairs of a[aLo, aHi) and b[bLo, bHi) to `out`, in order.
 */
function collectMatches(
  a: string[],
  b: string[],
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
  out: Matches
): void {
  while (aLo < aHi && bLo < bHi && a[aLo] === b[bLo]) {
    out.a.push(aLo++);
    out.b.push(bLo++);
  }
  let suffix = 0;
  while (aHi > aLo && bHi > bLo && a[aHi - 1] === b[bHi - 1]) {
    aHi--;
    bHi--;
    suffix++;
  }

  if (aLo < aHi && bLo < bHi) {
    const split = middleSnake(a, b, aLo, aHi, bLo, bHi);
    if (split !== null) {
      const [x, y] = split;
      collectMatches(a, b, aLo, x, bLo, y, out);
      collectMatches(a, b, x, aHi, y, bHi, out);
    }
  }

  for (let k = 0; k < suffix; k++) {
    out.a.push(aHi + k);
    out.b.push(bHi + k);
  }
}

/**
 * Point where the forward and reverse searches for a shortest edit script
 * meet, or null when the ranges share no line.
 */
function middleSnake(
  a: string[],
  b: string[],
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): [number, number] | null {
  const n = aHi - aLo;
  const m = bHi - bLo;
  const maxD = Math.ceil((n + m) / 2);
  const offset = maxD;
  const size = 2 * maxD + 2;
  const forward = new Int32Array(size).fill(-1);
  const reverse = new Int32Array(size).fill(-1);
  forward[offset + 1] = 0;
  reverse[offset + 1] = 0;

  const delta = n - m;
  const overlapOnForward = delta % 2 !== 0;
  let forwardStart = 0;
  let forwardEnd = 0;
  let reverseStart = 0;
  let reverseEnd = 0;

  for (let d = 0; d < maxD; d++) {
    for (let k = -d + forwardStart; k <= d - forwardEnd; k += 2) {
      const index = offset + k;
      let x =
        k === -d || (k !== d && forward[index - 1] < forward[index + 1])
          ? forward[index + 1]
          : forward[index - 1] + 1;
      let y = x - k;
      while (x < n && y < m && a[aLo + x] === b[bLo + y]) {
        x++;
        y++;
      }
      forward[index] = x;

      if (x > n) {
        forwardEnd += 2;
      } else if (y > m) {
        forwardStart += 2;
      } else if (overlapOnForward) {
        const other = offset + delta - k;
        if (other >= 0 && other < size && reverse[other] !== -1 && x >= n - reverse[other]) {
          return [aLo + x, bLo + y];
        }
      }
    }

    for (let k = -d + reverseStart; k <= d - reverseEnd; k += 2) {
      const index = offset + k;
      let x =
        k === -d || (k !== d && reverse[index - 1] < reverse[index + 1])
          ? reverse[index + 1]
          : reverse[index - 1] + 1;
      let y = x - k;
      while (x < n && y < m && a[aHi - x - 1] === b[bHi - y - 1]) {
        x++;
        y++;
      }
      reverse[index] = x;

      if (x > n) {
        reverseEnd += 2;
      } else if (y > m) {
        reverseStart += 2;
      } else if (!overlapOnForward) {
        const other = offset + delta - k;
        if (other >= 0 && other < size && forward[other] !== -1) {
          const forwardX = forward[other];
          const forwardY = offset + forwardX - other;
          if (forwardX >= n - x) {
            return [aLo + forwardX, bLo + forwardY];
          }
        }
      }
    }
  }

  return null;
}

// ─── Report ─────────────────────────────────────────────────────────────────

/**
 * Compare the reference dump with the generated one.
 */
export function createCheckReport(name: string, expected: string, actual: string): DumpCheckReport {
  const changes = diffDumps(expected, actual);
  const added = changes.filter((c) => c.type === 'added').length;
  const removed = changes.filter((c) => c.type === 'removed').length;

  return {
    name,
    timestamp: new Date().toISOString(),
    changes,
    summary: { added, removed, total: changes.length },
    hasChanges: changes.length > 0,
  };
}
