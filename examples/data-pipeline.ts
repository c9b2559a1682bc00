/**
 * @fileoverview Linear pipeline: parse raw readings, summarise them and store
 * the summary. Each stage declares the keys it reads and returns the keys the
 * next stage reads.
 */

import {z} from "zod";
import type {Pipeline} from "../graph.js";
import {createLinearPipeline} from "../graphBuilder.js";
import {task} from "../task.js";

export const summarySchema = z.object({
  count: z.number().int(),
  mean: z.number(),
  max: z.number(),
});

export type Summary = z.infer<typeof summarySchema>;

/**
 * Builds the pipeline. Summaries are written to `store` under the key given
 * by the `save_results` node's fixed input.
 *
 * @example
 * const store = new Map<string, Summary>();
 * const report = await createDataPipeline(store).execute({ raw: "3, 4, 8" });
 * store.get("latest"); // { count: 3, mean: 5, max: 8 }
 */
export function createDataPipeline(store: Map<string, Summary>, key = "latest"): Pipeline {
  const load = task({
    name: "load_data",
    description: "Parse comma-separated readings",
    inputSchema: z.object({raw: z.string()}),
    outputSchema: z.object({readings: z.array(z.number())}),
    body: ({raw}) => ({
      readings: raw
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map(Number),
    }),
  });

  const summarise = task({
    name: "process_data",
    description: "Scale readings and summarise them",
    inputSchema: z.object({
      readings: z.array(z.number()),
      scale: z.number().default(1),
    }),
    outputSchema: z.object({summary: summarySchema}),
    body: ({readings, scale}) => {
      if (readings.length === 0) {
        throw new Error("No readings to summarise");
      }
      const scaled = readings.map((reading) => reading * scale);
      const total = scaled.reduce((sum, value) => sum + value, 0);
      return {
        summary: {
          count: scaled.length,
          mean: total / scaled.length,
          max: Math.max(...scaled),
        },
      };
    },
  });

  const save = task({
    name: "save_results",
    description: "Store the summary",
    inputSchema: z.object({summary: summarySchema, key: z.string()}),
    fixedInputs: {key},
    body: async ({summary, key}) => {
      store.set(key, summary);
      return {savedAs: key};
    },
  });

  return createLinearPipeline(
    "data-pipeline",
    [load, summarise, save],
    "Load readings, summarise them, store the summary",
  );
}
