import { z } from "zod";

import { inputErrorFromZod } from "./knapsack/errors.js";
import {
  resolveGeneticSolverConfig,
  type GeneticSolverConfig,
} from "./knapsack/solverConfig.js";

const optionalNumber = z
  .string()
  .trim()
  .optional()
  .transform((raw, ctx) => {
    if (raw === undefined || raw === "") {
      return undefined;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      ctx.addIssue({ code: "custom", message: `Expected a number, received "${raw}"` });
      return z.NEVER;
    }
    return value;
  });

const optionalBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .optional()
  .transform((raw, ctx) => {
    if (raw === undefined || raw === "") {
      return undefined;
    }
    if (raw === "true" || raw === "1") {
      return true;
    }
    if (raw === "false" || raw === "0") {
      return false;
    }
    ctx.addIssue({ code: "custom", message: `Expected true/false, received "${raw}"` });
    return z.NEVER;
  });

const SolverEnvSchema = z.object({
  KNAPSACK_POPULATION_SIZE: optionalNumber,
  KNAPSACK_GENERATIONS: optionalNumber,
  KNAPSACK_MUTATION_RATE: optionalNumber,
  KNAPSACK_CROSSOVER_RATE: optionalNumber,
  KNAPSACK_TOURNAMENT_SIZE: optionalNumber,
  KNAPSACK_ELITE_COUNT: optionalNumber,
  KNAPSACK_INCLUSION_PROBABILITY: optionalNumber,
  KNAPSACK_UNIQUE_INITIAL_POPULATION: optionalBoolean,
});

/** Solver defaults from `KNAPSACK_*` variables, falling back to the built-in defaults. */
export function resolveSolverConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): GeneticSolverConfig {
  const parsed = SolverEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw inputErrorFromZod("Invalid KNAPSACK_* environment", parsed.error);
  }
  const vars = parsed.data;
  return resolveGeneticSolverConfig({
    populationSize: vars.KNAPSACK_POPULATION_SIZE,
    generations: vars.KNAPSACK_GENERATIONS,
    mutationRate: vars.KNAPSACK_MUTATION_RATE,
    crossoverRate: vars.KNAPSACK_CROSSOVER_RATE,
    tournamentSize: vars.KNAPSACK_TOURNAMENT_SIZE,
    eliteCount: vars.KNAPSACK_ELITE_COUNT,
    inclusionProbability: vars.KNAPSACK_INCLUSION_PROBABILITY,
    uniqueInitialPopulation: vars.KNAPSACK_UNIQUE_INITIAL_POPULATION,
  });
}
