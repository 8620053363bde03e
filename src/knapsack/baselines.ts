import { chromosomeFromIndices, decodeChromosome } from "./chromosome.js";
import type { KnapsackItem, KnapsackSelection } from "./types.js";
import { validateKnapsackProblem } from "./validation.js";

function valueDensity(item: KnapsackItem): number {
  if (item.weight === 0) {
    return item.value > 0 ? Number.POSITIVE_INFINITY : 0;
  }
  return item.value / item.weight;
}

/**
 * Packs items in descending value/weight order, skipping any that no longer fit.
 * Equal densities keep input order.
 */
export function solveGreedyByRatio(
  items: readonly KnapsackItem[],
  maxWeight: number,
): KnapsackSelection {
  const problem = validateKnapsackProblem(items, maxWeight);
  const order = problem.items
    .map((item, index) => ({ index, density: valueDensity(item), weight: item.weight }))
    .sort((left, right) =>
      left.density === right.density ? 0 : right.density - left.density,
    );

  const chosen: number[] = [];
  let remaining = problem.maxWeight;
  for (const entry of order) {
    if (entry.weight <= remaining) {
      chosen.push(entry.index);
      remaining -= entry.weight;
    }
  }
  return decodeChromosome(
    chromosomeFromIndices(problem.items.length, chosen),
    problem.items,
    problem.maxWeight,
  );
}

/** Exact optimum by dynamic programming over capacities, O(items * maxWeight). */
export function solveExactly(items: readonly KnapsackItem[], maxWeight: number): KnapsackSelection {
  const problem = validateKnapsackProblem(items, maxWeight);
  const capacity = problem.maxWeight;
  const best = new Array<number>(capacity + 1).fill(0);
  const taken: Uint8Array[] = [];

  problem.items.forEach((item) => {
    const row = new Uint8Array(capacity + 1);
    for (let room = capacity; room >= item.weight; room -= 1) {
      const withItem = (best[room - item.weight] ?? 0) + item.value;
      if (withItem > (best[room] ?? 0)) {
        best[room] = withItem;
        row[room] = 1;
      }
    }
    taken.push(row);
  });

  const chosen: number[] = [];
  let room = capacity;
  for (let index = problem.items.length - 1; index >= 0; index -= 1) {
    const item = problem.items[index];
    if (item && taken[index]?.[room] === 1) {
      chosen.push(index);
      room -= item.weight;
    }
  }
  return decodeChromosome(
    chromosomeFromIndices(problem.items.length, chosen),
    problem.items,
    problem.maxWeight,
  );
}
