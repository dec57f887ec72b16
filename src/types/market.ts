export interface TradingPair {
  readonly base: string;
  readonly quote: string;
}

/** `BASE/QUOTE` */
export type PairSymbol = `${string}/${string}`;

export function formatPair(pair: TradingPair): PairSymbol {
  return `${pair.base}/${pair.quote}`;
}
