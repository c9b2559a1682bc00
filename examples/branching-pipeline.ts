/**
 * @fileoverview Fan-out into two branches followed by a join.
 *
 * A node with several predecessors runs once, on the first arrival. Here both
 * branches sit at the same depth, so the queue reaches `combine` only after
 * both have run; a join behind branches of unequal length has to read every
 * value it needs inside one body, as `combine` does with `words` and `letters`.
 */

import {z} from "zod";
import {Pipeline} from "../graph.js";
import {task} from "../task.js";

export function createBranchingPipeline(text: string): Pipeline {
  return Pipeline.builder({
    name: "branching-pipeline",
    description: "Count words and letters of a text, then combine the counts",
  })
    .start(task({
      name: "ingest",
      inputSchema: z.object({text: z.string()}),
      fixedInputs: {text},
      body: ({text}) => ({normalized: text.trim().toLowerCase()}),
    }))
    .node(task({
      name: "count_words",
      inputSchema: z.object({normalized: z.string()}),
      outputSchema: z.object({words: z.number()}),
      body: ({normalized}) => ({
        words: normalized.split(/\s+/).filter((word) => word.length > 0).length,
      }),
    }))
    .node(task({
      name: "count_letters",
      inputSchema: z.object({normalized: z.string()}),
      outputSchema: z.object({letters: z.number()}),
      body: ({normalized}) => ({letters: normalized.replace(/[^a-z]/g, "").length}),
    }))
    .node(task({
      name: "combine",
      description: "Join both branches",
      inputSchema: z.object({words: z.number(), letters: z.number()}),
      body: ({words, letters}) => ({
        report: `${words} words, ${letters} letters`,
        averageWordLength: words === 0 ? 0 : letters / words,
      }),
    }))
    .connect("ingest", "count_words")
    .connect("ingest", "count_letters")
    .connect("count_words", "combine")
    .connect("count_letters", "combine")
    .build();
}
