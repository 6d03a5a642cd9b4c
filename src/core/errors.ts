export type DeployError =
  | { readonly kind: "config"; readonly field: string; readonly message: string }
  | { readonly kind: "io"; readonly message: string; readonly path: string }
  | { readonly kind: "state"; readonly message: string; readonly path: string }
  | { readonly kind: "build"; readonly message: string; readonly resourceName: string };

export function formatDeployError(error: DeployError): string {
  switch (error.kind) {
    case "config":
      return `Invalid configuration (${error.field}): ${error.message}`;
    case "io":
      return `${error.message}: ${error.path}`;
    case "state":
      return `Corrupt deployed state in ${error.path}: ${error.message}`;
    case "build":
      return `Build failed for ${error.resourceName}: ${error.message}`;
  }
}

/**
 * A value that should have been filled in before planning reached the executor.
 * Always a defect in an earlier stage.
 */
export class UnresolvedValueError extends Error {
  override readonly name = "UnresolvedValueError";

  constructor(
    readonly key: string,
    readonly value: unknown,
    readonly methodName: string = "",
  ) {
    super(
      `The API parameter '${key}' has an unresolved value of ${String(value)} in the method call: ${methodName}`,
    );
  }

  withMethodName(methodName: string): UnresolvedValueError {
    return new UnresolvedValueError(this.key, this.value, methodName);
  }
}

export class UnknownBuiltinError extends Error {
  override readonly name = "UnknownBuiltinError";

  constructor(readonly functionName: string) {
    super(`Unknown builtin function: ${functionName}`);
  }
}

export class UnknownVariableError extends Error {
  override readonly name = "UnknownVariableError";

  constructor(readonly variableName: string) {
    super(`Variable is not bound: ${variableName}`);
  }
}

export class UnknownResourceTypeError extends Error {
  override readonly name = "UnknownResourceTypeError";

  constructor(
    readonly resourceType: string,
    readonly resourceName: string,
  ) {
    super(`Unknown resource type "${resourceType}" for deployed resource: ${resourceName}`);
  }
}

export class InvalidRecordError extends Error {
  override readonly name = "InvalidRecordError";

  constructor(
    readonly resourceName: string,
    readonly detail: string,
  ) {
    super(`Deployed record for ${resourceName} is invalid: ${detail}`);
  }
}

export class DanglingReferenceError extends Error {
  override readonly name = "DanglingReferenceError";

  constructor(
    readonly id: number,
    readonly expectedKind: string,
  ) {
    super(`Reference #${id} does not point at a ${expectedKind} resource`);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
