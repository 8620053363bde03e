import { z } from "zod";

import { inputErrorFromZod } from "./errors.js";

export const ProbabilitySchema = z.number().min(0).max(1);

const DEFAULT_ELITE_COUNT = 2;

/** Keeps at least one offspring slot so a small population still evolves. */
export function defaultEliteCount(
  populationSize: number,
  preferred: number = DEFAULT_ELITE_COUNT,
): number {
  return Math.min(preferred, Math.max(0, populationSize - 1));
}

export const GeneticSolverConfigSchema = z
  .object({
    populationSize: z.number().int().min(1).default(100),
    generations: z.number().int().min(0).default(100),
    /** Per-bit flip probability applied to every child. */
    mutationRate: ProbabilitySchema.default(0.01),
    /** Chance a child comes from single-point crossover instead of a copy of parent A. */
    crossoverRate: ProbabilitySchema.default(1),
    tournamentSize: z.number().int().min(2).default(3),
    /** Derived from `populationSize` when left out. */
    eliteCount: z.number().int().min(0).optional(),
    /** Chance each bit of an initial chromosome is set. */
    inclusionProbability: ProbabilitySchema.default(0.5),
    uniqueInitialPopulation: z.boolean().default(true),
  })
  .transform((config, ctx) => {
    const eliteCount = config.eliteCount ?? defaultEliteCount(config.populationSize);
    if (eliteCount > config.populationSize) {
      ctx.addIssue({
        code: "custom",
        path: ["eliteCount"],
        message: `eliteCount (${eliteCount}) cannot exceed populationSize (${config.populationSize})`,
      });
      return z.NEVER;
    }
    return { ...config, eliteCount };
  });

export type GeneticSolverConfig = z.output<typeof GeneticSolverConfigSchema>;
export type GeneticSolverConfigInput = z.input<typeof GeneticSolverConfigSchema>;

export const DEFAULT_GENETIC_SOLVER_CONFIG: GeneticSolverConfig = GeneticSolverConfigSchema.parse(
  {},
);

export function resolveGeneticSolverConfig(
  overrides: GeneticSolverConfigInput = {},
): GeneticSolverConfig {
  const parsed = GeneticSolverConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw inputErrorFromZod("Invalid genetic solver configuration", parsed.error);
  }
  return parsed.data;
}
