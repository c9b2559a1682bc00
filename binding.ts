/**
 * @file binding.ts
 * @description Parameter introspection and binding for task bodies.
 *
 * A task declares its parameters with a zod object schema; the keys of the
 * schema are the parameter names and a key declared `.optional()` or
 * `.default(...)` is a parameter with a default.
 */

import { z } from "zod";
import type { ExecutionContext } from "./context.js";

/**
 * A declared parameter of a task body.
 */
export type TaskParameter = {
  name: string;
  /** False when the key is declared optional or defaulted */
  required: boolean;
  schema: z.ZodTypeAny;
};

export type BindingResult =
  | { ok: true; inputs: Record<string, unknown> }
  | { ok: false; missing: string[] };

/**
 * Returns the shape of an object schema, looking through refinements and
 * transforms. Undefined for any other schema.
 */
export function objectShape(schema: z.ZodTypeAny): z.ZodRawShape | undefined {
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    return shape;
  }
  if (schema instanceof z.ZodEffects) {
    return objectShape(schema.innerType());
  }
  if (schema instanceof z.ZodLazy) {
    return objectShape(schema.schema);
  }
  return undefined;
}

/**
 * Whether a parameter schema is declared optional or defaulted. Schemas that
 * merely accept `undefined`, such as `z.unknown()`, still require a value.
 */
function hasDefault(schema: z.ZodTypeAny): boolean {
  if (schema instanceof z.ZodEffects) {
    return hasDefault(schema.innerType());
  }
  if (schema instanceof z.ZodNullable) {
    return hasDefault(schema.unwrap());
  }
  return schema instanceof z.ZodDefault || schema instanceof z.ZodOptional;
}

/**
 * Lists the parameters declared by a task's input schema, in declaration order.
 *
 * @throws Error when the schema is not an object schema
 */
export function describeParameters(schema: z.ZodTypeAny, taskName: string): TaskParameter[] {
  const shape = objectShape(schema);
  if (!shape) {
    throw new Error(`Task '${taskName}' must declare its inputs with a zod object schema`);
  }
  return Object.entries(shape).map(([name, field]) => ({
    name,
    required: !hasDefault(field),
    schema: field,
  }));
}

/**
 * Resolves a value for every declared parameter.
 *
 * Precedence: fixed inputs, then the execution context, then the parameter's
 * own default (left out so the schema applies it). Keys that are not declared
 * are never passed.
 */
export function bindParameters(
  parameters: readonly TaskParameter[],
  fixedInputs: Readonly<Record<string, unknown>>,
  context: ExecutionContext,
): BindingResult {
  const inputs: Record<string, unknown> = {};
  const missing: string[] = [];

  for (const parameter of parameters) {
    if (Object.hasOwn(fixedInputs, parameter.name)) {
      inputs[parameter.name] = fixedInputs[parameter.name];
    } else if (context.has(parameter.name)) {
      inputs[parameter.name] = context.get(parameter.name);
    } else if (parameter.required) {
      missing.push(parameter.name);
    }
  }

  return missing.length > 0 ? { ok: false, missing } : { ok: true, inputs };
}
