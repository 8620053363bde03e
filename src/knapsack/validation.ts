import { z } from "zod";

import { inputErrorFromZod } from "./errors.js";
import type { KnapsackItem } from "./types.js";

export const KnapsackItemSchema = z.object({
  name: z.string(),
  weight: z.number().int().nonnegative(),
  value: z.number().int().nonnegative(),
});

export const CapacitySchema = z.number().int().nonnegative();

const KnapsackProblemSchema = z.object({
  items: z.array(KnapsackItemSchema),
  maxWeight: CapacitySchema,
});

export type KnapsackProblem = {
  readonly items: readonly KnapsackItem[];
  readonly maxWeight: number;
};

/**
 * Rejects negative or fractional weights, values and capacities before any search work.
 * Returns fresh item records so a solve never aliases the caller's objects.
 */
export function validateKnapsackProblem(
  items: readonly KnapsackItem[],
  maxWeight: number,
): KnapsackProblem {
  const parsed = KnapsackProblemSchema.safeParse({ items, maxWeight });
  if (!parsed.success) {
    throw inputErrorFromZod("Invalid knapsack problem", parsed.error);
  }
  return parsed.data;
}
