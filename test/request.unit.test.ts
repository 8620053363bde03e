import { describe, expect, it } from "vitest";

import { KnapsackInputError } from "../src/knapsack/errors.js";
import type { GenerationSnapshot } from "../src/knapsack/geneticSolver.js";
import {
  parseKnapsackRequest,
  solveKnapsackRequest,
} from "../src/knapsack/request.js";
import { resolveGeneticSolverConfig } from "../src/knapsack/solverConfig.js";
import { issuePaths } from "./helpers/issuePaths.js";
import { randomSequence } from "./helpers/randomSequence.js";

const classicPayload = {
  max_weight: 50,
  items: [
    { name: "a", weight: 10, value: 60 },
    { name: "b", weight: 20, value: 100 },
    { name: "c", weight: 30, value: 120 },
  ],
};

describe("solveKnapsackRequest", () => {
  it("answers with the wire-shaped response", () => {
    expect(solveKnapsackRequest({ ...classicPayload, seed: 3 })).toEqual({
      selected_items: [
        { name: "b", weight: 20, value: 100 },
        { name: "c", weight: 30, value: 120 },
      ],
      total_value: 220,
      total_weight: 50,
    });
  });

  it("treats an empty item list as the trivial solution", () => {
    expect(solveKnapsackRequest({ max_weight: 10, items: [] })).toEqual({
      selected_items: [],
      total_value: 0,
      total_weight: 0,
    });
  });

  it("reports where the payload is invalid", () => {
    expect(
      issuePaths(() =>
        solveKnapsackRequest({
          max_weight: 10,
          items: [
            { name: "ok", weight: 1, value: 1 },
            { name: "bad", weight: -4, value: 1 },
          ],
        }),
      ),
    ).toEqual(["items.1.weight"]);
    expect(issuePaths(() => solveKnapsackRequest({ ...classicPayload, max_weight: -1 }))).toEqual([
      "max_weight",
    ]);
    expect(issuePaths(() => solveKnapsackRequest({ max_weight: 5 }))).toEqual(["items"]);
  });

  it("rejects payloads that are not objects", () => {
    expect(() => solveKnapsackRequest(null)).toThrow(KnapsackInputError);
    expect(() => solveKnapsackRequest("knapsack")).toThrow(KnapsackInputError);
  });

  it("lets request tuning fields override configured defaults", () => {
    const generations: number[] = [];
    solveKnapsackRequest(
      { ...classicPayload, generations: 5, seed: 1 },
      {
        config: resolveGeneticSolverConfig({ generations: 3, populationSize: 10 }),
        onGeneration: (snapshot) => generations.push(snapshot.generation),
      },
    );
    expect(generations).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("keeps a single-member population evolving", () => {
    const snapshots: GenerationSnapshot[] = [];
    // Initial draw 0.9 leaves the item out; every later draw is 0.5, so the one child
    // (crossover over a single bit is a copy) gets its bit flipped at mutation rate 0.6.
    const response = solveKnapsackRequest(
      {
        max_weight: 5,
        items: [{ name: "a", weight: 1, value: 1 }],
        population_size: 1,
        generations: 1,
        mutation_rate: 0.6,
      },
      {
        random: randomSequence([0.9]),
        onGeneration: (snapshot) => snapshots.push(snapshot),
      },
    );

    expect(snapshots.map((snapshot) => snapshot.population.map((member) => member.bits))).toEqual([
      [[0]],
      [[1]],
    ]);
    expect(response).toEqual({
      selected_items: [{ name: "a", weight: 1, value: 1 }],
      total_value: 1,
      total_weight: 1,
    });
  });

  it("derives one elite for a two-member population", () => {
    const snapshots: GenerationSnapshot[] = [];
    solveKnapsackRequest(
      { ...classicPayload, population_size: 2, generations: 1, seed: 4 },
      { onGeneration: (snapshot) => snapshots.push(snapshot) },
    );
    const initial = snapshots[0]?.population ?? [];
    const fittest = [...initial].sort(
      (left, right) => right.evaluation.fitness - left.evaluation.fitness,
    )[0];
    expect(snapshots[1]?.population).toHaveLength(2);
    expect(snapshots[1]?.population[0]).toBe(fittest);
  });

  it("hands out fresh arrays for every empty response", () => {
    const first = solveKnapsackRequest({ max_weight: 5, items: [] });
    const second = solveKnapsackRequest({ max_weight: 5, items: [] });
    expect(first.selected_items).not.toBe(second.selected_items);
    expect(second.selected_items).toEqual([]);
  });

  it("rejects an explicit elite count larger than the population", () => {
    expect(
      issuePaths(() =>
        solveKnapsackRequest({ ...classicPayload, population_size: 4, elite_count: 6 }),
      ),
    ).toEqual(["eliteCount"]);
  });

  it("is reproducible for a fixed seed", () => {
    const payload = { ...classicPayload, seed: 21, population_size: 8, generations: 10 };
    expect(solveKnapsackRequest(payload)).toEqual(solveKnapsackRequest(payload));
  });
});

describe("parseKnapsackRequest", () => {
  it("drops unknown fields", () => {
    const request = parseKnapsackRequest({ ...classicPayload, colour: "blue" });
    expect(request).toEqual(classicPayload);
  });
});
