import type { ApiMethodName } from "./client.js";
import type { ManagedKind } from "./models.js";

/**
 * A name in the executor's variable pool, bound by an earlier instruction.
 */
export class Variable {
  constructor(readonly name: string) {}

  toString(): string {
    return `Variable(${this.name})`;
  }
}

/**
 * A template with `{name}` placeholders, each naming a pool variable.
 */
export class StringFormat {
  constructor(
    readonly template: string,
    readonly variables: readonly string[],
  ) {}

  toString(): string {
    return `StringFormat(${this.template})`;
  }
}

/** One key of a dictionary stored in the pool. */
export class KeyDataVariable {
  constructor(
    readonly name: string,
    readonly key: string,
  ) {}

  toString(): string {
    return `KeyDataVariable(${this.name}, ${this.key})`;
  }
}

export type ApiCall = {
  readonly kind: "api_call";
  readonly methodName: ApiMethodName;
  readonly params: Readonly<Record<string, unknown>>;
  readonly outputVar: string | null;
};

export type StoreValue = {
  readonly kind: "store_value";
  readonly name: string;
  readonly value: unknown;
};

export type StoreMultipleValue = {
  readonly kind: "store_multiple_value";
  readonly name: string;
  readonly value: readonly unknown[];
};

export type CopyVariable = {
  readonly kind: "copy_variable";
  readonly fromVar: string;
  readonly toVar: string;
};

export type CopyVariableFromDict = {
  readonly kind: "copy_variable_from_dict";
  readonly fromVar: string;
  readonly key: string;
  readonly toVar: string;
};

export type RecordResourceVariable = {
  readonly kind: "record_resource_variable";
  readonly resourceType: ManagedKind;
  readonly resourceName: string;
  readonly field: string;
  readonly variableName: string;
};

export type RecordResourceValue = {
  readonly kind: "record_resource_value";
  readonly resourceType: ManagedKind;
  readonly resourceName: string;
  readonly field: string;
  readonly value: unknown;
};

export type JpSearch = {
  readonly kind: "jp_search";
  readonly expression: string;
  readonly inputVar: string;
  readonly outputVar: string;
};

export type BuiltinName = "parse_arn" | "interrogate_profile" | "service_principal";

export type BuiltinFunction = {
  readonly kind: "builtin_function";
  readonly functionName: BuiltinName;
  readonly args: readonly unknown[];
  readonly outputVar: string;
};

export type Instruction =
  | ApiCall
  | StoreValue
  | StoreMultipleValue
  | CopyVariable
  | CopyVariableFromDict
  | RecordResourceVariable
  | RecordResourceValue
  | JpSearch
  | BuiltinFunction;

export type RecordInstruction = RecordResourceVariable | RecordResourceValue;

export type Plan = {
  readonly instructions: readonly Instruction[];
  readonly messages: ReadonlyMap<Instruction, string>;
};

export const apiCall = (
  methodName: ApiMethodName,
  params: Readonly<Record<string, unknown>>,
  outputVar: string | null = null,
): ApiCall => ({ kind: "api_call", methodName, params, outputVar });

export const storeValue = (name: string, value: unknown): StoreValue => ({ kind: "store_value", name, value });

export const storeMultipleValue = (name: string, value: readonly unknown[]): StoreMultipleValue => ({
  kind: "store_multiple_value",
  name,
  value,
});

export const copyVariable = (fromVar: string, toVar: string): CopyVariable => ({
  kind: "copy_variable",
  fromVar,
  toVar,
});

export const copyVariableFromDict = (fromVar: string, key: string, toVar: string): CopyVariableFromDict => ({
  kind: "copy_variable_from_dict",
  fromVar,
  key,
  toVar,
});

export const recordVariable = (
  resourceType: ManagedKind,
  resourceName: string,
  field: string,
  variableName: string,
): RecordResourceVariable => ({ kind: "record_resource_variable", resourceType, resourceName, field, variableName });

export const recordValue = (
  resourceType: ManagedKind,
  resourceName: string,
  field: string,
  value: unknown,
): RecordResourceValue => ({ kind: "record_resource_value", resourceType, resourceName, field, value });

export const jpSearch = (expression: string, inputVar: string, outputVar: string): JpSearch => ({
  kind: "jp_search",
  expression,
  inputVar,
  outputVar,
});

export const builtin = (functionName: BuiltinName, args: readonly unknown[], outputVar: string): BuiltinFunction => ({
  kind: "builtin_function",
  functionName,
  args,
  outputVar,
});

export const isRecordInstruction = (instruction: Instruction): instruction is RecordInstruction =>
  instruction.kind === "record_resource_variable" || instruction.kind === "record_resource_value";

export const emptyPlan = (): Plan => ({ instructions: [], messages: new Map() });

/**
 * Accumulates instructions and their progress messages while a plan is built.
 */
export class PlanBuilder {
  private readonly instructions: Instruction[] = [];
  private readonly messages = new Map<Instruction, string>();

  constructor(base?: Plan) {
    if (base !== undefined) {
      this.instructions.push(...base.instructions);
      for (const [instruction, message] of base.messages) {
        this.messages.set(instruction, message);
      }
    }
  }

  push(instruction: Instruction, message?: string): this {
    this.instructions.push(instruction);
    if (message !== undefined) {
      this.messages.set(instruction, message);
    }
    return this;
  }

  build(): Plan {
    return { instructions: [...this.instructions], messages: new Map(this.messages) };
  }
}
