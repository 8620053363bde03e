import { describe, expect, it, vi } from "vitest";

import type { ChromosomeEvaluation } from "../src/knapsack/chromosome.js";
import {
  createInitialPopulation,
  createRandomChromosome,
  mutateChromosome,
  singlePointCrossover,
  tournamentSelect,
  type EvaluatedIndividual,
} from "../src/knapsack/geneticSolver.js";
import type { Bit } from "../src/knapsack/types.js";
import { randomSequence } from "./helpers/randomSequence.js";

function individual(bits: readonly Bit[], fitness: number): EvaluatedIndividual {
  const evaluation: ChromosomeEvaluation = {
    totalWeight: 0,
    totalValue: fitness,
    feasible: true,
    fitness,
  };
  return { bits, evaluation };
}

describe("createRandomChromosome", () => {
  it("sets a bit when the draw falls below the inclusion probability", () => {
    expect(createRandomChromosome(4, 0.5, randomSequence([0.1, 0.6, 0.49, 0.5]))).toEqual([
      1, 0, 1, 0,
    ]);
  });

  it("never sets bits with zero inclusion probability", () => {
    expect(createRandomChromosome(3, 0, () => 0)).toEqual([0, 0, 0]);
  });
});

describe("createInitialPopulation", () => {
  it("redraws duplicates until the attempt budget runs out", () => {
    const random = vi.fn(randomSequence([0.1, 0.2, 0.9]));
    const population = createInitialPopulation({
      length: 1,
      populationSize: 3,
      inclusionProbability: 0.5,
      unique: true,
      random,
    });

    // [1], [1] (skipped), [0], then 27 more skipped [0] draws before a duplicate is accepted.
    expect(population).toEqual([[1], [0], [0]]);
    expect(random).toHaveBeenCalledTimes(31);
  });

  it("keeps duplicates when uniqueness is off", () => {
    const population = createInitialPopulation({
      length: 1,
      populationSize: 3,
      inclusionProbability: 0.5,
      unique: false,
      random: randomSequence([0.1, 0.2, 0.9]),
    });
    expect(population).toEqual([[1], [1], [0]]);
  });
});

describe("tournamentSelect", () => {
  const population = [
    individual([1, 0], 5),
    individual([0, 1], 9),
    individual([1, 1], 9),
    individual([0, 0], 1),
  ];

  it("returns the fittest drawn candidate", () => {
    const winner = tournamentSelect(population, 3, randomSequence([0, 0.3, 0.6]));
    expect(winner).toBe(population[1]);
  });

  it("resolves ties in favour of the first draw", () => {
    const winner = tournamentSelect(population, 2, randomSequence([0.6, 0.3]));
    expect(winner).toBe(population[2]);
  });

  it("draws with replacement", () => {
    const winner = tournamentSelect(population, 3, randomSequence([0.8, 0.8, 0.8]));
    expect(winner).toBe(population[3]);
  });

  it("rejects an empty population", () => {
    expect(() => tournamentSelect([], 2, () => 0)).toThrow(
      "Cannot pick an index from an empty range.",
    );
  });
});

describe("singlePointCrossover", () => {
  const parentA: Bit[] = [1, 1, 1, 1];
  const parentB: Bit[] = [0, 0, 0, 0];

  it("takes the head from the first parent and the tail from the second", () => {
    expect(singlePointCrossover(parentA, parentB, () => 0.5)).toEqual([1, 1, 0, 0]);
  });

  it("keeps the cut inside [1, length - 1]", () => {
    expect(singlePointCrossover(parentA, parentB, () => 0)).toEqual([1, 0, 0, 0]);
    expect(singlePointCrossover(parentA, parentB, () => 0.99)).toEqual([1, 1, 1, 0]);
  });

  it("copies the first parent for single-bit chromosomes without drawing", () => {
    const random = vi.fn(() => 0.5);
    expect(singlePointCrossover([1], [0], random)).toEqual([1]);
    expect(random).not.toHaveBeenCalled();
  });

  it("rejects parents of different lengths", () => {
    expect(() => singlePointCrossover([1, 0], [1], () => 0.5)).toThrow(
      "Cannot cross chromosomes of different lengths (2 and 1).",
    );
  });
});

describe("mutateChromosome", () => {
  it("flips each bit whose draw falls below the mutation rate", () => {
    expect(mutateChromosome([1, 0, 1], 0.5, randomSequence([0.4, 0.6, 0.1]))).toEqual([
      0, 0, 0,
    ]);
  });

  it("leaves bits alone at rate 0 and flips all at rate 1", () => {
    expect(mutateChromosome([1, 0, 1], 0, () => 0)).toEqual([1, 0, 1]);
    expect(mutateChromosome([1, 0, 1], 1, () => 0.99)).toEqual([0, 1, 0]);
  });

  it("does not modify its input", () => {
    const bits: Bit[] = [1, 1];
    mutateChromosome(bits, 1, () => 0);
    expect(bits).toEqual([1, 1]);
  });
});
