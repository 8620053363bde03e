#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";

import { z } from "zod";

import { resolveSolverConfigFromEnv } from "./config.js";
import { inputErrorFromZod } from "./knapsack/errors.js";
import { parseKnapsackRequest, runKnapsackRequest } from "./knapsack/request.js";
import { loadLocalEnv } from "./utils/env.js";

const HELP = `Usage: knapsack-ga <request.json | -> [options]

Solves a 0/1 knapsack request with a genetic search and prints the response JSON.

Options:
  --seed <n>              Seed for a reproducible run
  --population-size <n>   Chromosomes per generation
  --generations <n>       Generations to evolve
  --mutation-rate <x>     Per-bit flip probability
  --pretty                Indent the JSON output
  --verbose               Print per-generation progress to stderr
  -h, --help              Show this help

Defaults come from KNAPSACK_* variables (also read from .env.local).
`;

const CliFlagsSchema = z.object({
  seed: z.coerce.number().int().optional(),
  populationSize: z.coerce.number().int().min(1).optional(),
  generations: z.coerce.number().int().min(0).optional(),
  mutationRate: z.coerce.number().min(0).max(1).optional(),
});

async function readRequestText(source: string): Promise<string> {
  if (source === "-") {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf8");
  }
  return readFile(source, "utf8");
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    options: {
      seed: { type: "string" },
      "population-size": { type: "string" },
      generations: { type: "string" },
      "mutation-rate": { type: "string" },
      pretty: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const source = positionals[0];
  if (values.help || !source) {
    process.stdout.write(HELP);
    if (!values.help) {
      process.exitCode = 1;
    }
    return;
  }

  const parsedFlags = CliFlagsSchema.safeParse({
    seed: values.seed,
    populationSize: values["population-size"],
    generations: values.generations,
    mutationRate: values["mutation-rate"],
  });
  if (!parsedFlags.success) {
    throw inputErrorFromZod("Invalid command-line options", parsedFlags.error);
  }
  const flags = parsedFlags.data;

  loadLocalEnv();
  const config = resolveSolverConfigFromEnv();

  const payload: unknown = JSON.parse(await readRequestText(source));
  const request = parseKnapsackRequest(payload);
  const response = runKnapsackRequest(
    {
      ...request,
      seed: flags.seed ?? request.seed,
      population_size: flags.populationSize ?? request.population_size,
      generations: flags.generations ?? request.generations,
      mutation_rate: flags.mutationRate ?? request.mutation_rate,
    },
    {
      config,
      onGeneration: values.verbose
        ? (snapshot) => {
            process.stderr.write(
              `generation ${snapshot.generation}: best=${snapshot.bestFitness} ` +
                `mean=${snapshot.meanFitness.toFixed(2)} feasible=${snapshot.feasibleCount} ` +
                `running-best=${snapshot.runningBestFitness}\n`,
            );
          }
        : undefined,
    },
  );

  process.stdout.write(`${JSON.stringify(response, null, values.pretty ? 2 : undefined)}\n`);
}

void main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
