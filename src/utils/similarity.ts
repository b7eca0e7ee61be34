/**
 * Sequence similarity in [0, 1]: twice the number of matching characters over the
 * combined length, where matches are found by taking the longest common block and
 * recursing on the pieces to its left and right. Case-insensitive.
 */
export function similarity(a: string, b: string): number {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  const total = x.length + y.length;
  if (total === 0) return 1;
  return (2 * countMatches(x, y)) / total;
}

type Range = [aLo: number, aHi: number, bLo: number, bHi: number];
type Block = { i: number; j: number; size: number };

function countMatches(a: string, b: string): number {
  const positions = indexPositions(b);
  const pending: Range[] = [[0, a.length, 0, b.length]];
  let matched = 0;

  for (let range = pending.pop(); range; range = pending.pop()) {
    const [aLo, aHi, bLo, bHi] = range;
    const { i, j, size } = longestBlock(a, positions, aLo, aHi, bLo, bHi);
    if (size === 0) continue;
    matched += size;
    if (aLo < i && bLo < j) pending.push([aLo, i, bLo, j]);
    if (i + size < aHi && j + size < bHi) pending.push([i + size, aHi, j + size, bHi]);
  }
  return matched;
}

function indexPositions(s: string): Map<string, number[]> {
  const out = new Map<string, number[]>();
  for (let j = 0; j < s.length; j++) {
    const ch = s[j];
    const list = out.get(ch);
    if (list) list.push(j);
    else out.set(ch, [j]);
  }
  return out;
}

// Earliest longest block wins: lowest i first, then lowest j.
function longestBlock(
  a: string,
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): Block {
  let best: Block = { i: aLo, j: bLo, size: 0 };
  let runs = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const size = (runs.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) best = { i: i - size + 1, j: j - size + 1, size };
    }
    runs = next;
  }
  return best;
}
