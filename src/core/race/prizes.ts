export const DEFAULT_PRIZE_SPLIT: readonly number[] = [0.5, 0.3, 0.2];

/**
 * `full-share`: every entry takes the full share of its position, so a tie at
 * the top pays the winner's share more than once and can exceed the pot.
 * `split`: a tied group pools the shares of the places it occupies and divides
 * them equally.
 */
export type PodiumTieMode = 'full-share' | 'split';

export type PrizeDistributionOptions = {
  split?: readonly number[];
  tieMode?: PodiumTieMode;
};

export const sumFees = (fees: readonly number[]): number =>
  fees.reduce((total, fee) => total + fee, 0);

export const shareForPosition = (position: number, split: readonly number[]): number =>
  split[position - 1] ?? 0;

/** Prize money for each position, in the order given. */
export const computePrizeMoney = (
  positions: readonly number[],
  pot: number,
  options: PrizeDistributionOptions = {},
): number[] => {
  const split = options.split ?? DEFAULT_PRIZE_SPLIT;
  const tieMode = options.tieMode ?? 'full-share';

  if (tieMode === 'full-share') {
    return positions.map((position) => pot * shareForPosition(position, split));
  }

  const groupSizes = new Map<number, number>();
  for (const position of positions) {
    groupSizes.set(position, (groupSizes.get(position) ?? 0) + 1);
  }

  return positions.map((position) => {
    const size = groupSizes.get(position) ?? 1;
    if (size === 1) {
      return pot * shareForPosition(position, split);
    }

    let pooled = 0;
    for (let offset = 0; offset < size; offset += 1) {
      pooled += shareForPosition(position + offset, split);
    }

    return pot * (pooled / size);
  });
};
