export type RankedItem<T> = {
  item: T;
  position: number;
};

/**
 * Orders items by ascending score and assigns "min" positions: tied scores
 * share a position equal to the number of strictly lower scores plus one, so
 * 1, 1, 3 rather than 1, 1, 2. Tied items keep their input order.
 */
export const rankByMin = <T>(
  items: readonly T[],
  score: (item: T) => number,
): Array<RankedItem<T>> => {
  const ordered = items
    .map((item, index) => ({ item, index, value: score(item) }))
    .sort((left, right) => left.value - right.value || left.index - right.index);

  const ranked: Array<RankedItem<T>> = [];
  let previousValue: number | null = null;
  let previousPosition = 0;

  ordered.forEach((entry, index) => {
    const position = previousValue !== null && entry.value === previousValue ? previousPosition : index + 1;
    ranked.push({ item: entry.item, position });
    previousValue = entry.value;
    previousPosition = position;
  });

  return ranked;
};
