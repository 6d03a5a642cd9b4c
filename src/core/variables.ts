import { z } from "zod";
import { UnknownVariableError, UnresolvedValueError } from "./errors.js";
import { KeyDataVariable, StringFormat, Variable } from "./instructions.js";
import { Pending } from "./models.js";

export type VariablePool = ReadonlyMap<string, unknown>;

const RecordSchema = z.record(z.string(), z.unknown());

const PLACEHOLDER = /\{([^{}]+)\}/g;

export function lookupVariable(pool: VariablePool, name: string): unknown {
  if (!pool.has(name)) {
    throw new UnknownVariableError(name);
  }
  return pool.get(name);
}

export function formatString(format: StringFormat, pool: VariablePool): string {
  const values = new Map<string, string>();
  for (const name of format.variables) {
    values.set(name, String(lookupVariable(pool, name)));
  }
  return format.template.replace(PLACEHOLDER, (match: string, name: string) => values.get(name) ?? match);
}

function lookupKey(pool: VariablePool, variable: KeyDataVariable): unknown {
  const data = RecordSchema.safeParse(lookupVariable(pool, variable.name));
  if (!data.success || !(variable.key in data.data)) {
    throw new UnknownVariableError(`${variable.name}.${variable.key}`);
  }
  return data.data[variable.key];
}

const isPlainObject = (value: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Replaces every variable reference in a parameter structure with its
 * current value from the pool. Literals are returned unchanged.
 */
export function resolveVariables(value: unknown, pool: VariablePool): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (value instanceof Variable) {
    return lookupVariable(pool, value.name);
  }

  if (value instanceof StringFormat) {
    return formatString(value, pool);
  }

  if (value instanceof KeyDataVariable) {
    return lookupKey(pool, value);
  }

  if (value instanceof Pending) {
    throw new UnresolvedValueError("", value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveVariables(item, pool));
  }

  if (typeof value === "object" && isPlainObject(value)) {
    const obj = RecordSchema.safeParse(value);
    if (obj.success) {
      return resolveParams(obj.data, pool);
    }
  }

  return value;
}

/**
 * Resolves each entry of an API call's parameters. An unresolved value is
 * reported under the parameter key it was found in.
 */
export function resolveParams(params: Readonly<Record<string, unknown>>, pool: VariablePool): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(params)) {
    try {
      result[key] = resolveVariables(val, pool);
    } catch (error) {
      if (error instanceof UnresolvedValueError) {
        throw new UnresolvedValueError(key, error.value, error.methodName);
      }
      throw error;
    }
  }
  return result;
}
