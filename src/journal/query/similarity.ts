interface MatchingBlock {
  readonly aStart: number;
  readonly bStart: number;
  readonly size: number;
}

// a[aLow, aHigh) と b[bLow, bHigh) の最長共通部分文字列。同じ長さなら a 側で先に見つかったものを採用する。
const findLongestMatch = (
  a: string,
  b: string,
  aLow: number,
  aHigh: number,
  bLow: number,
  bHigh: number,
): MatchingBlock => {
  let best: MatchingBlock = { aStart: aLow, bStart: bLow, size: 0 };
  let previous = new Map<number, number>();

  for (let i = aLow; i < aHigh; i += 1) {
    const current = new Map<number, number>();
    for (let j = bLow; j < bHigh; j += 1) {
      if (a[i] !== b[j]) {
        continue;
      }

      const size = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
};

const countMatchingCharacters = (a: string, b: string): number => {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [
    [0, a.length, 0, b.length],
  ];

  while (pending.length > 0) {
    const range = pending.pop();
    if (range === undefined) {
      break;
    }

    const [aLow, aHigh, bLow, bHigh] = range;
    const block = findLongestMatch(a, b, aLow, aHigh, bLow, bHigh);
    if (block.size === 0) {
      continue;
    }

    matched += block.size;

    if (aLow < block.aStart && bLow < block.bStart) {
      pending.push([aLow, block.aStart, bLow, block.bStart]);
    }

    const aNext = block.aStart + block.size;
    const bNext = block.bStart + block.size;
    if (aNext < aHigh && bNext < bHigh) {
      pending.push([aNext, aHigh, bNext, bHigh]);
    }
  }

  return matched;
};

/**
 * Ratcliff/Obershelp の類似度 `2 * M / T`。M は一致ブロックの文字数合計、T は両文字列の長さの合計。
 * 両方とも空なら 1 を返す。
 */
export const similarityRatio = (a: string, b: string): number => {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }

  return (2 * countMatchingCharacters(a, b)) / total;
};

export const DEFAULT_FUZZY_MAX_RESULTS = 10;
export const DEFAULT_FUZZY_CUTOFF = 0.5;

/**
 * `query` との類似度が `cutoff` 以上のタイトルを類似度の高い順に最大 `maxResults` 件返す。
 * 大文字小文字は区別しない。同率のものは入力順を保つ。
 */
export const fuzzySearchTitles = (
  titles: readonly string[],
  query: string,
  maxResults: number = DEFAULT_FUZZY_MAX_RESULTS,
  cutoff: number = DEFAULT_FUZZY_CUTOFF,
): string[] => {
  if (!Number.isInteger(maxResults) || maxResults <= 0) {
    throw new RangeError(`maxResults must be a positive integer: ${maxResults}`);
  }

  if (!(cutoff >= 0 && cutoff <= 1)) {
    throw new RangeError(`cutoff must be within [0, 1]: ${cutoff}`);
  }

  const normalizedQuery = query.toLowerCase();

  return titles
    .map((title, index) => ({
      title,
      index,
      score: similarityRatio(title.toLowerCase(), normalizedQuery),
    }))
    .filter(({ score }) => score >= cutoff)
    .sort((left, right) => right.score - left.score || left.index - right.index)
    .slice(0, maxResults)
    .map(({ title }) => title);
};
