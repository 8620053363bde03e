import type { Bit, Chromosome, KnapsackItem, KnapsackSelection } from "./types.js";

export type ChromosomeEvaluation = {
  readonly totalWeight: number;
  readonly totalValue: number;
  readonly feasible: boolean;
  /** Total value when feasible, otherwise 0. */
  readonly fitness: number;
};

/** Fresh arrays on every call, so no two results share them. */
export function emptySelection(): KnapsackSelection {
  return {
    selectedItems: [],
    selectedIndices: [],
    totalValue: 0,
    totalWeight: 0,
  };
}

function assertMatchingLength(bits: Chromosome, items: readonly KnapsackItem[]): void {
  if (bits.length !== items.length) {
    throw new Error(
      `Chromosome length ${bits.length} does not match item count ${items.length}.`,
    );
  }
}

export function evaluateChromosome(
  bits: Chromosome,
  items: readonly KnapsackItem[],
  maxWeight: number,
): ChromosomeEvaluation {
  assertMatchingLength(bits, items);
  let totalWeight = 0;
  let totalValue = 0;
  items.forEach((item, index) => {
    if (bits[index] === 1) {
      totalWeight += item.weight;
      totalValue += item.value;
    }
  });
  const feasible = totalWeight <= maxWeight;
  return {
    totalWeight,
    totalValue,
    feasible,
    fitness: feasible ? totalValue : 0,
  };
}

/**
 * Turns a chromosome into the items it packs. Totals are recomputed from the bits; an
 * overweight chromosome decodes to the empty selection.
 */
export function decodeChromosome(
  bits: Chromosome,
  items: readonly KnapsackItem[],
  maxWeight: number,
): KnapsackSelection {
  const evaluation = evaluateChromosome(bits, items, maxWeight);
  if (!evaluation.feasible) {
    return emptySelection();
  }
  const selectedItems: KnapsackItem[] = [];
  const selectedIndices: number[] = [];
  items.forEach((item, index) => {
    if (bits[index] === 1) {
      selectedItems.push(item);
      selectedIndices.push(index);
    }
  });
  return {
    selectedItems,
    selectedIndices,
    totalValue: evaluation.totalValue,
    totalWeight: evaluation.totalWeight,
  };
}

export function chromosomeFromIndices(length: number, indices: Iterable<number>): Bit[] {
  const bits: Bit[] = new Array<Bit>(length).fill(0);
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new Error(`Item index ${index} is out of range for ${length} items.`);
    }
    bits[index] = 1;
  }
  return bits;
}

export function chromosomeKey(bits: Chromosome): string {
  return bits.join("");
}
