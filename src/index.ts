export {
  KnapsackGeneticSolver,
  createInitialPopulation,
  createRandomChromosome,
  mutateChromosome,
  singlePointCrossover,
  solveKnapsack,
  tournamentSelect,
} from "./knapsack/geneticSolver.js";

export type {
  EvaluatedIndividual,
  GenerationSnapshot,
  GenerationStats,
  GeneticSolverOptions,
  KnapsackSolution,
} from "./knapsack/geneticSolver.js";

export {
  chromosomeFromIndices,
  decodeChromosome,
  emptySelection,
  evaluateChromosome,
} from "./knapsack/chromosome.js";
export type { ChromosomeEvaluation } from "./knapsack/chromosome.js";

export {
  DEFAULT_GENETIC_SOLVER_CONFIG,
  GeneticSolverConfigSchema,
  resolveGeneticSolverConfig,
} from "./knapsack/solverConfig.js";
export type { GeneticSolverConfig, GeneticSolverConfigInput } from "./knapsack/solverConfig.js";

export { solveExactly, solveGreedyByRatio } from "./knapsack/baselines.js";

export {
  KnapsackRequestSchema,
  parseKnapsackRequest,
  runKnapsackRequest,
  solveKnapsackRequest,
} from "./knapsack/request.js";
export type {
  KnapsackRequest,
  KnapsackRequestOptions,
  KnapsackResponse,
} from "./knapsack/request.js";

export { KnapsackInputError } from "./knapsack/errors.js";
export type { KnapsackInputIssue } from "./knapsack/errors.js";

export { KnapsackItemSchema, validateKnapsackProblem } from "./knapsack/validation.js";
export type { KnapsackProblem } from "./knapsack/validation.js";

export type { Bit, Chromosome, KnapsackItem, KnapsackSelection } from "./knapsack/types.js";

export { createSeededRandom, normalizeRandom } from "./utils/random.js";
export type { RandomSource } from "./utils/random.js";

export { resolveSolverConfigFromEnv } from "./config.js";
export { loadLocalEnv } from "./utils/env.js";
