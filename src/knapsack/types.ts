export type KnapsackItem = {
  readonly name: string;
  readonly weight: number;
  readonly value: number;
};

export type Bit = 0 | 1;

/** Bit `i` set means item `i` is packed. Length always equals the item count. */
export type Chromosome = readonly Bit[];

export type KnapsackSelection = {
  readonly selectedItems: readonly KnapsackItem[];
  readonly selectedIndices: readonly number[];
  readonly totalValue: number;
  readonly totalWeight: number;
};
