/**
 * @file schema-validator.ts
 * @description Static checks over a pipeline and the zod schemas of its tasks,
 *              run before execution.
 */

import {z} from 'zod';
import {objectShape} from "./binding.js";
import type {PipelineStructure} from "./scheduler.js";
import type {TaskNode} from "./task.js";

/**
 * Result of a validation
 */
export type ValidationResult = {
  /**
   * False when at least one error was found
   */
  compatible: boolean;
  warnings: string[];
  errors: string[];
};

/**
 * Information about a schema structure
 */
export type SchemaInfo = {
  /**
   * The base type (string, number, object, array, etc.)
   */
  type: string;
  optional: boolean;
  nullable: boolean;
  /**
   * For object types, the properties schema info
   */
  properties?: Record<string, SchemaInfo>;
  /**
   * For array types, the element schema info
   */
  element?: SchemaInfo;
  /**
   * For union types, the possible schemas
   */
  union?: SchemaInfo[];
  /**
   * For enum types, the possible values
   */
  enum?: unknown[];
  /**
   * For literal types, the literal value
   */
  literal?: unknown;
};

function plain(type: string): SchemaInfo {
  return {type, optional: false, nullable: false};
}

/**
 * Extracts schema information from a Zod schema
 */
export function extractSchemaInfo(schema: z.ZodTypeAny): SchemaInfo {
  if (schema instanceof z.ZodOptional) {
    return {...extractSchemaInfo(schema.unwrap()), optional: true};
  }
  if (schema instanceof z.ZodNullable) {
    return {...extractSchemaInfo(schema.unwrap()), nullable: true};
  }
  // Defaults make the key effectively optional
  if (schema instanceof z.ZodDefault) {
    return {...extractSchemaInfo(schema.removeDefault()), optional: true};
  }
  if (schema instanceof z.ZodEffects) {
    return extractSchemaInfo(schema.innerType());
  }

  if (schema instanceof z.ZodString) return plain("string");
  if (schema instanceof z.ZodNumber) return plain("number");
  if (schema instanceof z.ZodBoolean) return plain("boolean");
  if (schema instanceof z.ZodDate) return plain("date");
  if (schema instanceof z.ZodAny) return plain("any");
  if (schema instanceof z.ZodUnknown) return plain("unknown");
  if (schema instanceof z.ZodVoid) return plain("void");
  if (schema instanceof z.ZodUndefined) return {type: "undefined", optional: true, nullable: false};
  if (schema instanceof z.ZodNull) return {type: "null", optional: false, nullable: true};
  if (schema instanceof z.ZodRecord) return plain("object");

  if (schema instanceof z.ZodArray) {
    return {...plain("array"), element: extractSchemaInfo(schema.element)};
  }
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    const properties: Record<string, SchemaInfo> = {};
    for (const [key, value] of Object.entries(shape)) {
      properties[key] = extractSchemaInfo(value);
    }
    return {...plain("object"), properties};
  }
  if (schema instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = schema.options;
    return {...plain("union"), union: options.map(extractSchemaInfo)};
  }
  if (schema instanceof z.ZodEnum) {
    const values: readonly string[] = schema.options;
    return {...plain("enum"), enum: [...values]};
  }
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    return {...plain("literal"), literal: value};
  }

  return plain("unknown");
}

/**
 * One-line description of a schema, for help text.
 */
export function formatZodSchema(schema: z.ZodTypeAny): string {
  return formatSchemaInfo(extractSchemaInfo(schema));
}

function formatSchemaInfo(info: SchemaInfo): string {
  let text: string;
  switch (info.type) {
    case "array":
      text = `array of ${info.element ? formatSchemaInfo(info.element) : "unknown"}`;
      break;
    case "object":
      if (!info.properties) {
        text = "object";
        break;
      }
      text = `{ ${Object.entries(info.properties)
        .map(([key, property]) =>
          `${key}${property.optional ? "?" : ""}: ${formatSchemaInfo({...property, optional: false})}`)
        .join(", ")} }`;
      break;
    case "union":
      text = (info.union ?? []).map(formatSchemaInfo).join(" | ");
      break;
    case "enum":
      text = (info.enum ?? []).map((value) => JSON.stringify(value)).join(" | ");
      break;
    case "literal":
      text = JSON.stringify(info.literal);
      break;
    default:
      text = info.type;
  }
  if (info.nullable && info.type !== "null") text += " | null";
  if (info.optional && info.type !== "undefined") text += " (optional)";
  return text;
}

/**
 * Checks if two basic types are compatible. Values are handed to the input
 * schema unconverted, so there is no coercion between primitives.
 */
function areBasicTypesCompatible(outputType: string, inputType: string): boolean {
  if (["any", "unknown"].includes(outputType) || ["any", "unknown"].includes(inputType)) {
    return true;
  }
  // Unions are compared option by option by the caller
  if (outputType === "union" || inputType === "union" || outputType === inputType) {
    return true;
  }

  switch (inputType) {
    case "string":
      return outputType === "enum" || outputType === "literal";
    case "enum":
    case "literal":
      return ["string", "number", "boolean", "enum", "literal"].includes(outputType);
    default:
      return false;
  }
}

function merge(target: ValidationResult, source: ValidationResult): void {
  target.warnings.push(...source.warnings);
  target.errors.push(...source.errors);
  if (!source.compatible) target.compatible = false;
}

function emptyResult(): ValidationResult {
  return {compatible: true, warnings: [], errors: []};
}

function validateObjectCompatibility(output: SchemaInfo, input: SchemaInfo): ValidationResult {
  const result = emptyResult();
  if (!output.properties || !input.properties) {
    result.warnings.push("Object schema properties not available for detailed validation");
    return result;
  }

  for (const [key, inputProperty] of Object.entries(input.properties)) {
    const outputProperty = output.properties[key];
    if (!outputProperty) {
      if (!inputProperty.optional) {
        result.errors.push(`Required input property '${key}' is not provided by output schema`);
        result.compatible = false;
      }
      continue;
    }
    const propertyResult = validateSchemaCompatibility(outputProperty, inputProperty);
    if (!propertyResult.compatible) {
      result.errors.push(
        `Property '${key}' has incompatible types: output is ${outputProperty.type}, input is ${inputProperty.type}`);
    }
    merge(result, propertyResult);
  }
  return result;
}

function validateUnionOutput(output: SchemaInfo, input: SchemaInfo): ValidationResult {
  const result = emptyResult();

  for (const option of output.union ?? []) {
    if (!validateSchemaCompatibility(option, input).compatible) {
      result.errors.push(`Output union option '${option.type}' is not accepted by input type '${input.type}'`);
      result.compatible = false;
    }
  }
  return result;
}

/**
 * Validates that values described by `output` can be given to something
 * described by `input`
 */
function validateSchemaCompatibility(output: SchemaInfo, input: SchemaInfo): ValidationResult {
  const result = emptyResult();

  if (output.type === "void" || output.type === "undefined") {
    if (!input.optional) {
      result.errors.push("Output is void/undefined but input is required");
      result.compatible = false;
    }
    return result;
  }

  if (output.nullable && !input.nullable) {
    result.errors.push("Output can be null but input does not accept null");
    result.compatible = false;
  }
  if (output.optional && !input.optional) {
    result.warnings.push("Output is optional but input is required");
  }

  if (!areBasicTypesCompatible(output.type, input.type)) {
    result.errors.push(
      `Incompatible types: Output type '${output.type}' is not compatible with input type '${input.type}'`);
    result.compatible = false;
    return result;
  }

  if (output.type === "union") {
    merge(result, validateUnionOutput(output, input));
    return result;
  }

  if (input.type === "union") {
    const options = input.union ?? [];
    if (!options.some((option) => validateSchemaCompatibility(output, option).compatible)) {
      result.errors.push(`Output type '${output.type}' matches no option of the input union`);
      result.compatible = false;
    }
    return result;
  }

  if (input.type === "object" && output.type === "object") {
    merge(result, validateObjectCompatibility(output, input));
  } else if (input.type === "array" && output.type === "array" && output.element && input.element) {
    const elementResult = validateSchemaCompatibility(output.element, input.element);
    if (!elementResult.compatible) {
      result.errors.push(
        `Array element type incompatibility: ${output.element.type} is not compatible with ${input.element.type}`);
    }
    merge(result, elementResult);
  } else if (input.type === "enum" && output.type === "enum") {
    const common = (output.enum ?? []).filter((value) => (input.enum ?? []).includes(value));
    if (common.length === 0) {
      result.errors.push("Output and input enums have no common values");
      result.compatible = false;
    } else if (common.length !== output.enum?.length) {
      result.warnings.push("Output enum contains values the input does not accept");
    }
  } else if (input.type === "literal" && output.type === "literal" && output.literal !== input.literal) {
    result.errors.push(
      `Literal values don't match: output ${JSON.stringify(output.literal)} vs input ${JSON.stringify(input.literal)}`);
    result.compatible = false;
  }

  return result;
}

/**
 * Validates compatibility between two Zod schemas
 */
export function validateZodTypeCompatibility(
  outputSchema: z.ZodTypeAny,
  inputSchema: z.ZodTypeAny,
): ValidationResult {
  return validateSchemaCompatibility(extractSchemaInfo(outputSchema), extractSchemaInfo(inputSchema));
}

export type PipelineValidationOptions = {
  /**
   * Keys the caller will supply in the initial context
   */
  contextKeys?: Iterable<string>;
  /**
   * Print warnings through `console.warn`
   */
  log?: boolean;
};

/**
 * Checks a pipeline without running it.
 *
 * Warnings: unreachable nodes, nodes with several predecessors, cycles, and
 * upstream nodes without an output schema. Errors: required parameters that
 * nothing can provide, and upstream outputs whose types do not fit the
 * parameters they feed.
 */
export function validatePipeline(
  pipeline: PipelineStructure,
  options: PipelineValidationOptions = {},
): ValidationResult {
  const result = emptyResult();
  const contextKeys = new Set(options.contextKeys ?? []);
  const predecessors = collectPredecessors(pipeline);
  const reachable = reachableFrom(pipeline.startNodes, (name) => pipeline.successors(name));

  for (const name of pipeline.nodes.keys()) {
    if (!reachable.has(name)) {
      result.warnings.push(`Node '${name}' is not reachable from any start node and will be skipped`);
    }
    const sources = predecessors.get(name) ?? [];
    if (sources.length > 1) {
      result.warnings.push(
        `Node '${name}' has ${sources.length} predecessors (${sources.join(", ")}); ` +
        `it runs once, on the first arrival, without waiting for the others`);
    }
  }

  result.warnings.push(...findCycles(pipeline));

  for (const [name, node] of pipeline.nodes) {
    if (!reachable.has(name)) continue;
    const ancestors = reachableFrom(predecessors.get(name) ?? [], (n) => predecessors.get(n) ?? []);
    ancestors.delete(name);
    checkParameters(pipeline, node, ancestors, contextKeys, result);
  }

  if (options.log && result.warnings.length > 0) {
    globalThis.console.warn("Pipeline validation warnings:");
    for (const warning of result.warnings) {
      globalThis.console.warn(`- ${warning}`);
    }
  }

  return result;
}

function checkParameters(
  pipeline: PipelineStructure,
  node: TaskNode,
  ancestors: ReadonlySet<string>,
  contextKeys: ReadonlySet<string>,
  result: ValidationResult,
): void {
  const undeclared: string[] = [];
  const providers = new Map<string, Array<{name: string; schema: z.ZodTypeAny}>>();

  for (const ancestorName of ancestors) {
    const ancestor = pipeline.nodes.get(ancestorName);
    const shape = ancestor?.outputSchema ? objectShape(ancestor.outputSchema) : undefined;
    if (!shape) {
      undeclared.push(ancestorName);
      continue;
    }
    for (const [key, schema] of Object.entries(shape)) {
      const list = providers.get(key) ?? [];
      list.push({name: ancestorName, schema});
      providers.set(key, list);
    }
  }

  for (const parameter of node.parameters) {
    if (Object.hasOwn(node.fixedInputs, parameter.name) || contextKeys.has(parameter.name)) continue;

    const sources = providers.get(parameter.name) ?? [];
    for (const source of sources) {
      const compatibility = validateZodTypeCompatibility(source.schema, parameter.schema);
      if (!compatibility.compatible) {
        result.errors.push(
          `Output '${parameter.name}' of '${source.name}' does not fit parameter '${parameter.name}' of '${node.name}': ` +
          compatibility.errors.join(", "));
        result.compatible = false;
      }
    }

    if (sources.length > 0 || !parameter.required) continue;
    if (undeclared.length > 0) {
      result.warnings.push(
        `Cannot verify parameter '${parameter.name}' of '${node.name}': ` +
        `upstream node(s) ${undeclared.map((n) => `'${n}'`).join(", ")} declare no output schema`);
    } else {
      result.errors.push(
        `Required parameter '${parameter.name}' of node '${node.name}' is not provided by ` +
        `fixed inputs, the initial context or any upstream node`);
      result.compatible = false;
    }
  }
}

function collectPredecessors(pipeline: PipelineStructure): Map<string, string[]> {
  const predecessors = new Map<string, string[]>();
  for (const from of pipeline.nodes.keys()) {
    for (const to of pipeline.successors(from)) {
      const list = predecessors.get(to) ?? [];
      if (!list.includes(from)) list.push(from);
      predecessors.set(to, list);
    }
  }
  return predecessors;
}

function reachableFrom(roots: Iterable<string>, next: (name: string) => readonly string[]): Set<string> {
  const seen = new Set<string>();
  const stack = [...roots];
  while (stack.length > 0) {
    const name = stack.pop();
    if (name === undefined || seen.has(name)) continue;
    seen.add(name);
    stack.push(...next(name));
  }
  return seen;
}

function findCycles(pipeline: PipelineStructure): string[] {
  const warnings: string[] = [];
  const state = new Map<string, "visiting" | "done">();

  const visit = (name: string): void => {
    state.set(name, "visiting");
    for (const successor of new Set(pipeline.successors(name))) {
      const current = state.get(successor);
      if (current === "visiting") {
        warnings.push(`Edge '${name}' -> '${successor}' closes a cycle; '${successor}' will not run again`);
      } else if (current === undefined) {
        visit(successor);
      }
    }
    state.set(name, "done");
  };

  for (const name of pipeline.nodes.keys()) {
    if (!state.has(name)) visit(name);
  }
  return warnings;
}
