/**
 * @file reporter.ts
 * @description Text and structural renderings of pipelines and run reports.
 */

import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { ErrorEvent, LogEvent, isLevelEnabled } from "./events.js";
import type { LogLevel, PipelineEvent } from "./events.js";
import type { PipelineStructure, RunReport } from "./scheduler.js";
import type { NodeStatus } from "./task.js";

const nodeDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  fixedInputs: z.record(z.unknown()).default({}),
});

/**
 * Schema of an exported pipeline document.
 */
export const pipelineDefinitionSchema = z
  .object({
    pipelineName: z.string(),
    description: z.string().default(""),
    nodes: z.array(nodeDefinitionSchema),
    edges: z.array(z.object({ from: z.string(), to: z.string() })).default([]),
    startNodes: z.array(z.string()).default([]),
  })
  .superRefine((definition, ctx) => {
    const names = new Set<string>();
    definition.nodes.forEach((node, index) => {
      if (names.has(node.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["nodes", index, "name"],
          message: `Duplicate node name '${node.name}'`,
        });
      }
      names.add(node.name);
    });
    definition.edges.forEach((edge, index) => {
      for (const end of ["from", "to"] as const) {
        if (!names.has(edge[end])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["edges", index, end],
            message: `Unknown node '${edge[end]}'`,
          });
        }
      }
    });
    definition.startNodes.forEach((name, index) => {
      if (!names.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["startNodes", index],
          message: `Unknown node '${name}'`,
        });
      }
    });
  });

export type PipelineDefinition = z.infer<typeof pipelineDefinitionSchema>;
export type NodeDefinition = z.infer<typeof nodeDefinitionSchema>;

/**
 * Renders the pipeline as a tree, starting at each start node in order.
 * A node reachable along several paths is printed once per path; a node
 * already on the current path is marked `(cycle)` and not expanded.
 *
 * @example
 * Pipeline: numbers
 * Flow:
 * load
 *   └─ double
 *   └─ square
 */
export function visualizePipeline(pipeline: PipelineStructure): string {
  const lines = [`Pipeline: ${pipeline.name}`];
  if (pipeline.description) {
    lines.push(`Description: ${pipeline.description}`);
  }
  lines.push("Flow:");

  if (pipeline.startNodes.length === 0) {
    lines.push("  (no start nodes)");
    return lines.join("\n");
  }

  const render = (name: string, depth: number, path: readonly string[]): void => {
    const prefix = depth > 0 ? `${"  ".repeat(depth)}└─ ` : "";
    const status = pipeline.nodes.get(name)?.status ?? "pending";
    const label = `${prefix}${name}${status === "pending" ? "" : ` [${status}]`}`;

    if (path.includes(name)) {
      lines.push(`${label} (cycle)`);
      return;
    }
    lines.push(label);

    const nextPath = [...path, name];
    for (const successor of pipeline.successors(name)) {
      render(successor, depth + 1, nextPath);
    }
  };

  for (const name of pipeline.startNodes) {
    render(name, 0, []);
  }
  return lines.join("\n");
}

/**
 * Structural description of a pipeline: node names, descriptions, fixed
 * inputs, edges and start nodes. Bodies and schemas are not data and are left out.
 */
export function exportPipeline(pipeline: PipelineStructure): PipelineDefinition {
  const nodes: NodeDefinition[] = [];
  const edges: PipelineDefinition["edges"] = [];

  for (const [name, node] of pipeline.nodes) {
    nodes.push({ name, description: node.description, fixedInputs: { ...node.fixedInputs } });
    for (const to of pipeline.successors(name)) {
      edges.push({ from: name, to });
    }
  }

  return {
    pipelineName: pipeline.name,
    description: pipeline.description,
    nodes,
    edges,
    startNodes: [...pipeline.startNodes],
  };
}

export function serializeDefinition(definition: PipelineDefinition): string {
  return JSON.stringify(definition, null, 2);
}

/**
 * Parses an exported document. The result describes shape only; pass it to
 * `Pipeline.fromDefinition` with task factories to get something runnable.
 *
 * @throws SyntaxError when the text is not JSON
 * @throws ZodError when the document does not describe a valid pipeline
 */
export function parsePipelineDefinition(text: string): PipelineDefinition {
  const raw: unknown = JSON.parse(text);
  return pipelineDefinitionSchema.parse(raw);
}

export async function saveDefinition(pipeline: PipelineStructure, filePath: string): Promise<void> {
  await writeFile(filePath, `${serializeDefinition(exportPipeline(pipeline))}\n`, "utf8");
}

export async function loadDefinition(filePath: string): Promise<PipelineDefinition> {
  return parsePipelineDefinition(await readFile(filePath, "utf8"));
}

const STATUS_SYMBOLS: Record<NodeStatus, string> = {
  pending: "○",
  running: "○",
  succeeded: "✓",
  failed: "✗",
  skipped: "○",
};

/**
 * Human-readable summary of a run report.
 */
export function formatSummary(report: RunReport, pipelineName: string): string {
  const rule = "=".repeat(60);
  const lines = [
    rule,
    "Pipeline Execution Summary",
    rule,
    `Pipeline: ${pipelineName}`,
    `Status: ${report.status}`,
    `Total Time: ${report.totalTime}ms`,
    "",
    "Node Results:",
  ];

  for (const [name, node] of Object.entries(report.nodes)) {
    const time = node.executionTime === null ? "N/A" : `${node.executionTime}ms`;
    lines.push(`  ${STATUS_SYMBOLS[node.status]} ${name}: ${node.status} (${time})`);
    if (node.error) {
      lines.push(`    Error: [${node.error.code}] ${node.error.message}`);
    }
  }

  lines.push(rule);
  return lines.join("\n");
}

/**
 * Level at which an event is reported.
 */
export function eventLevel(event: PipelineEvent): LogLevel {
  if (event instanceof LogEvent) return event.level;
  if (event instanceof ErrorEvent) return "error";
  return "info";
}

/**
 * One-line rendering of an event.
 */
export function formatEvent(event: PipelineEvent): string {
  const prefix = event.runnableName ? `[${event.runnableName}] ` : "";

  if (event instanceof LogEvent) {
    return `${prefix}${event.message}`;
  }
  if (event instanceof ErrorEvent) {
    const node = event.nodeName ? `${event.nodeName}: ` : "";
    return `${prefix}✗ ${node}${event.error.message}`;
  }

  const node = event.nodeName ?? "";
  switch (event.status) {
    case "running":
      return `${prefix}▶ Executing: ${node}`;
    case "succeeded":
      return `${prefix}✓ ${node} completed in ${event.executionTime ?? 0}ms`;
    case "failed":
      return `${prefix}✗ ${node} failed after ${event.executionTime ?? 0}ms`;
    case "skipped":
      return `${prefix}○ ${node} skipped`;
    default:
      return `${prefix}${node} ${event.status}`;
  }
}

export type ConsoleLike = Pick<Console, "debug" | "info" | "warn" | "error">;

export type ConsoleListenerOptions = {
  /**
   * Destination, `globalThis.console` by default
   */
  logger?: ConsoleLike;
  /**
   * Events below this level are dropped, `info` by default
   */
  level?: LogLevel;
};

/**
 * Creates an `onEvent` listener that writes events through a console-like logger.
 *
 * @example
 * await pipeline.execute({}, { onEvent: createConsoleListener({ level: "debug" }) });
 */
export function createConsoleListener(options: ConsoleListenerOptions = {}): (event: PipelineEvent) => void {
  const logger = options.logger ?? globalThis.console;
  const minimum = options.level ?? "info";

  return (event) => {
    const level = eventLevel(event);
    if (!isLevelEnabled(level, minimum)) return;
    logger[level](formatEvent(event));
  };
}
