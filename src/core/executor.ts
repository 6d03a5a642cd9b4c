import jmespath from "jmespath";
import { callBuiltin, type SessionInfo } from "./builtins.js";
import type { ApiMethods } from "./client.js";
import { assertNever, UnresolvedValueError } from "./errors.js";
import { KeyDataVariable, type ApiCall, type Instruction, type Plan, type RecordInstruction } from "./instructions.js";
import type { ManagedKind } from "./models.js";
import type { UI } from "./ui.js";
import { lookupVariable, resolveParams, resolveVariables } from "./variables.js";

export type ResourceValues = {
  readonly name: string;
  readonly resource_type: ManagedKind;
  readonly [field: string]: unknown;
};

type RecordEntry = {
  readonly name: string;
  readonly resourceType: ManagedKind;
  readonly fields: Map<string, unknown>;
};

/**
 * Runs a plan one instruction at a time. The variable pool and the recorded
 * resource values belong to this instance and survive a failed run so the
 * caller can inspect how far it got.
 */
export class Executor {
  readonly variables = new Map<string, unknown>();
  private readonly records: RecordEntry[] = [];
  private readonly recordIndex = new Map<string, RecordEntry>();

  constructor(
    private readonly client: ApiMethods,
    private readonly ui: UI,
    private readonly session: SessionInfo,
  ) {}

  get resourceValues(): readonly ResourceValues[] {
    return this.records.map((entry) => ({
      name: entry.name,
      resource_type: entry.resourceType,
      ...Object.fromEntries(entry.fields),
    }));
  }

  async execute(plan: Plan): Promise<void> {
    for (const instruction of plan.instructions) {
      const message = plan.messages.get(instruction);
      if (message !== undefined) {
        this.ui.write(message);
      }
      await this.run(instruction);
    }
  }

  private async run(instruction: Instruction): Promise<void> {
    switch (instruction.kind) {
      case "api_call":
        return this.apiCall(instruction);
      case "store_value":
        this.variables.set(instruction.name, resolveVariables(instruction.value, this.variables));
        return;
      case "store_multiple_value": {
        const values = instruction.value.map((item) => resolveVariables(item, this.variables));
        const existing = this.variables.get(instruction.name);
        this.variables.set(instruction.name, Array.isArray(existing) ? [...existing, ...values] : values);
        return;
      }
      case "copy_variable":
        this.variables.set(instruction.toVar, lookupVariable(this.variables, instruction.fromVar));
        return;
      case "copy_variable_from_dict":
        this.variables.set(
          instruction.toVar,
          resolveVariables(new KeyDataVariable(instruction.fromVar, instruction.key), this.variables),
        );
        return;
      case "record_resource_variable":
        this.record(instruction, lookupVariable(this.variables, instruction.variableName));
        return;
      case "record_resource_value":
        this.record(instruction, instruction.value);
        return;
      case "jp_search": {
        const input = lookupVariable(this.variables, instruction.inputVar);
        const result: unknown = jmespath.search(input, instruction.expression);
        this.variables.set(instruction.outputVar, result);
        return;
      }
      case "builtin_function": {
        const args = instruction.args.map((arg) => resolveVariables(arg, this.variables));
        this.variables.set(instruction.outputVar, callBuiltin(instruction.functionName, args, this.session));
        return;
      }
      default:
        return assertNever(instruction);
    }
  }

  private async apiCall(instruction: ApiCall): Promise<void> {
    let params: Record<string, unknown>;
    try {
      params = resolveParams(instruction.params, this.variables);
    } catch (error) {
      if (error instanceof UnresolvedValueError) {
        throw error.withMethodName(instruction.methodName);
      }
      throw error;
    }
    const result = await this.client[instruction.methodName](params);
    if (instruction.outputVar !== null) {
      this.variables.set(instruction.outputVar, result);
    }
  }

  private record(instruction: RecordInstruction, value: unknown): void {
    let entry = this.recordIndex.get(instruction.resourceName);
    if (entry === undefined) {
      entry = { name: instruction.resourceName, resourceType: instruction.resourceType, fields: new Map() };
      this.records.push(entry);
      this.recordIndex.set(entry.name, entry);
    }
    entry.fields.set(instruction.field, value);
  }
}
