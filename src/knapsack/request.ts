import { z } from "zod";

import { createSeededRandom, type RandomSource } from "../utils/random.js";
import { inputErrorFromZod } from "./errors.js";
import { KnapsackGeneticSolver, type GenerationSnapshot } from "./geneticSolver.js";
import {
  DEFAULT_GENETIC_SOLVER_CONFIG,
  defaultEliteCount,
  ProbabilitySchema,
  resolveGeneticSolverConfig,
  type GeneticSolverConfig,
} from "./solverConfig.js";
import type { KnapsackItem } from "./types.js";
import { CapacitySchema, KnapsackItemSchema } from "./validation.js";

export const KnapsackRequestSchema = z.object({
  max_weight: CapacitySchema,
  items: z.array(KnapsackItemSchema),
  population_size: z.number().int().min(1).optional(),
  generations: z.number().int().min(0).optional(),
  mutation_rate: ProbabilitySchema.optional(),
  crossover_rate: ProbabilitySchema.optional(),
  tournament_size: z.number().int().min(2).optional(),
  elite_count: z.number().int().min(0).optional(),
  seed: z.number().int().optional(),
});

export type KnapsackRequest = z.infer<typeof KnapsackRequestSchema>;

export type KnapsackResponse = {
  readonly selected_items: readonly KnapsackItem[];
  readonly total_value: number;
  readonly total_weight: number;
};

export type KnapsackRequestOptions = {
  /** Defaults for tuning fields the request leaves out. */
  readonly config?: GeneticSolverConfig;
  /** Used when the request carries no `seed`. */
  readonly random?: RandomSource;
  readonly onGeneration?: (snapshot: GenerationSnapshot) => void;
};

export function parseKnapsackRequest(payload: unknown): KnapsackRequest {
  const parsed = KnapsackRequestSchema.safeParse(payload);
  if (!parsed.success) {
    throw inputErrorFromZod("Invalid knapsack request", parsed.error);
  }
  return parsed.data;
}

export function runKnapsackRequest(
  request: KnapsackRequest,
  options: KnapsackRequestOptions = {},
): KnapsackResponse {
  const base = options.config ?? DEFAULT_GENETIC_SOLVER_CONFIG;
  const populationSize = request.population_size ?? base.populationSize;
  const config = resolveGeneticSolverConfig({
    ...base,
    populationSize,
    generations: request.generations ?? base.generations,
    mutationRate: request.mutation_rate ?? base.mutationRate,
    crossoverRate: request.crossover_rate ?? base.crossoverRate,
    tournamentSize: request.tournament_size ?? base.tournamentSize,
    // A requested population size re-derives an elite count the request leaves out.
    eliteCount:
      request.elite_count ??
      (request.population_size === undefined
        ? base.eliteCount
        : defaultEliteCount(populationSize, base.eliteCount)),
  });
  const random = request.seed !== undefined ? createSeededRandom(request.seed) : options.random;

  const solver = new KnapsackGeneticSolver({
    ...config,
    random,
    onGeneration: options.onGeneration,
  });
  const solution = solver.solve(request.items, request.max_weight);
  return {
    selected_items: solution.selectedItems,
    total_value: solution.totalValue,
    total_weight: solution.totalWeight,
  };
}

/** Validates an untrusted payload, solves it and returns the wire-shaped response. */
export function solveKnapsackRequest(
  payload: unknown,
  options: KnapsackRequestOptions = {},
): KnapsackResponse {
  return runKnapsackRequest(parseKnapsackRequest(payload), options);
}
