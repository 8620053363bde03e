import { normalizeRandom, randomIndex, type RandomSource } from "../utils/random.js";
import {
  chromosomeKey,
  decodeChromosome,
  emptySelection,
  evaluateChromosome,
  type ChromosomeEvaluation,
} from "./chromosome.js";
import {
  resolveGeneticSolverConfig,
  type GeneticSolverConfig,
  type GeneticSolverConfigInput,
} from "./solverConfig.js";
import type { Bit, Chromosome, KnapsackItem, KnapsackSelection } from "./types.js";
import { validateKnapsackProblem } from "./validation.js";

export type EvaluatedIndividual = {
  readonly bits: Chromosome;
  readonly evaluation: ChromosomeEvaluation;
};

export type GenerationStats = {
  /** 0 is the initial population. */
  readonly generation: number;
  readonly bestFitness: number;
  readonly meanFitness: number;
  readonly feasibleCount: number;
  readonly runningBestFitness: number;
};

export type GenerationSnapshot = GenerationStats & {
  readonly population: readonly EvaluatedIndividual[];
};

export type GeneticSolverOptions = GeneticSolverConfigInput & {
  readonly random?: RandomSource;
  readonly onGeneration?: (snapshot: GenerationSnapshot) => void;
};

export type KnapsackSolution = KnapsackSelection & {
  /** Fitness of the running best; 0 when there are no items. */
  readonly bestFitness: number;
  readonly generations: readonly GenerationStats[];
};

export function createRandomChromosome(
  length: number,
  inclusionProbability: number,
  random: RandomSource,
): Bit[] {
  const bits: Bit[] = [];
  for (let index = 0; index < length; index += 1) {
    bits.push(random() < inclusionProbability ? 1 : 0);
  }
  return bits;
}

/**
 * Draws `populationSize` chromosomes. With `unique`, repeats are redrawn until
 * `10 * populationSize` draws have been spent; after that duplicates are accepted so
 * small instances (fewer than `populationSize` distinct subsets) still fill up.
 */
export function createInitialPopulation(input: {
  readonly length: number;
  readonly populationSize: number;
  readonly inclusionProbability: number;
  readonly unique: boolean;
  readonly random: RandomSource;
}): Chromosome[] {
  const { length, populationSize, inclusionProbability, unique, random } = input;
  const population: Chromosome[] = [];
  const seen = new Set<string>();
  let attemptsLeft = unique ? populationSize * 10 : 0;

  while (population.length < populationSize) {
    const bits = createRandomChromosome(length, inclusionProbability, random);
    if (attemptsLeft > 0) {
      attemptsLeft -= 1;
      const key = chromosomeKey(bits);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
    }
    population.push(bits);
  }
  return population;
}

/** Draws with replacement; the first-drawn candidate wins ties. */
export function tournamentSelect(
  population: readonly EvaluatedIndividual[],
  tournamentSize: number,
  random: RandomSource,
): EvaluatedIndividual {
  let best: EvaluatedIndividual | null = null;
  for (let draw = 0; draw < tournamentSize; draw += 1) {
    const candidate = population[randomIndex(population.length, random)];
    if (candidate && (!best || candidate.evaluation.fitness > best.evaluation.fitness)) {
      best = candidate;
    }
  }
  if (!best) {
    throw new Error("Tournament selection needs a non-empty population and tournament.");
  }
  return best;
}

/** Bits [0, cut) from `parentA`, [cut, length) from `parentB`, cut uniform in [1, length - 1]. */
export function singlePointCrossover(
  parentA: Chromosome,
  parentB: Chromosome,
  random: RandomSource,
): Bit[] {
  if (parentA.length !== parentB.length) {
    throw new Error(
      `Cannot cross chromosomes of different lengths (${parentA.length} and ${parentB.length}).`,
    );
  }
  if (parentA.length <= 1) {
    return [...parentA];
  }
  const cut = 1 + randomIndex(parentA.length - 1, random);
  return [...parentA.slice(0, cut), ...parentB.slice(cut)];
}

export function mutateChromosome(
  bits: Chromosome,
  mutationRate: number,
  random: RandomSource,
): Bit[] {
  return bits.map((bit): Bit => {
    if (random() < mutationRate) {
      return bit === 1 ? 0 : 1;
    }
    return bit;
  });
}

function pickRunningBest(
  current: EvaluatedIndividual | null,
  candidates: readonly EvaluatedIndividual[],
): EvaluatedIndividual | null {
  let best = current;
  for (const candidate of candidates) {
    if (!best || candidate.evaluation.fitness > best.evaluation.fitness) {
      best = candidate;
    }
  }
  return best;
}

function summarizeGeneration(
  generation: number,
  population: readonly EvaluatedIndividual[],
  runningBestFitness: number,
): GenerationStats {
  let bestFitness = 0;
  let fitnessSum = 0;
  let feasibleCount = 0;
  for (const individual of population) {
    bestFitness = Math.max(bestFitness, individual.evaluation.fitness);
    fitnessSum += individual.evaluation.fitness;
    if (individual.evaluation.feasible) {
      feasibleCount += 1;
    }
  }
  return {
    generation,
    bestFitness,
    meanFitness: population.length > 0 ? fitnessSum / population.length : 0,
    feasibleCount,
    runningBestFitness,
  };
}

/**
 * Genetic search for the 0/1 knapsack problem.
 *
 * Overweight chromosomes score 0, so any feasible packing dominates them. The best
 * chromosome ever evaluated is tracked across generations (strict improvement only, so
 * the first of equally fit chromosomes is kept) and decoded at the end.
 *
 * All randomness flows through the `random` option; pass a seeded source
 * (see `createSeededRandom`) for reproducible runs.
 */
export class KnapsackGeneticSolver {
  readonly config: GeneticSolverConfig;
  private readonly random: RandomSource;
  private readonly onGeneration?: (snapshot: GenerationSnapshot) => void;

  constructor(options: GeneticSolverOptions = {}) {
    const { random, onGeneration, ...config } = options;
    this.config = resolveGeneticSolverConfig(config);
    this.random = normalizeRandom(random);
    this.onGeneration = onGeneration;
  }

  solve(items: readonly KnapsackItem[], maxWeight: number): KnapsackSolution {
    const problem = validateKnapsackProblem(items, maxWeight);
    if (problem.items.length === 0) {
      return { ...emptySelection(), bestFitness: 0, generations: [] };
    }

    const evaluate = (bits: Chromosome): EvaluatedIndividual => ({
      bits,
      evaluation: evaluateChromosome(bits, problem.items, problem.maxWeight),
    });

    let population = createInitialPopulation({
      length: problem.items.length,
      populationSize: this.config.populationSize,
      inclusionProbability: this.config.inclusionProbability,
      unique: this.config.uniqueInitialPopulation,
      random: this.random,
    }).map(evaluate);

    let runningBest: EvaluatedIndividual | null = null;
    const history: GenerationStats[] = [];
    for (let generation = 0; generation <= this.config.generations; generation += 1) {
      if (generation > 0) {
        population = this.nextGeneration(population, evaluate);
      }
      runningBest = pickRunningBest(runningBest, population);
      const stats = summarizeGeneration(
        generation,
        population,
        runningBest?.evaluation.fitness ?? 0,
      );
      history.push(stats);
      this.onGeneration?.({ ...stats, population });
    }

    const selection = runningBest
      ? decodeChromosome(runningBest.bits, problem.items, problem.maxWeight)
      : emptySelection();
    return {
      ...selection,
      bestFitness: runningBest?.evaluation.fitness ?? 0,
      generations: history,
    };
  }

  private nextGeneration(
    population: readonly EvaluatedIndividual[],
    evaluate: (bits: Chromosome) => EvaluatedIndividual,
  ): EvaluatedIndividual[] {
    const { populationSize, eliteCount, tournamentSize, crossoverRate, mutationRate } =
      this.config;
    // Array#sort is stable, so equally fit elites keep their population order.
    const next = [...population]
      .sort((left, right) => right.evaluation.fitness - left.evaluation.fitness)
      .slice(0, eliteCount);

    while (next.length < populationSize) {
      const parentA = tournamentSelect(population, tournamentSize, this.random);
      const parentB = tournamentSelect(population, tournamentSize, this.random);
      const child =
        this.random() < crossoverRate
          ? singlePointCrossover(parentA.bits, parentB.bits, this.random)
          : [...parentA.bits];
      next.push(evaluate(mutateChromosome(child, mutationRate, this.random)));
    }
    return next;
  }
}

export function solveKnapsack(
  items: readonly KnapsackItem[],
  maxWeight: number,
  options: GeneticSolverOptions = {},
): KnapsackSolution {
  return new KnapsackGeneticSolver(options).solve(items, maxWeight);
}
