import { err, ok, type Result } from "neverthrow";
import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import { join } from "node:path";
import type { DeployError } from "./errors.js";
import {
  Pending,
  resolved,
  type Application,
  type Late,
  type Resource,
  type ResourceKind,
} from "./models.js";
import { STATE_DIR } from "./deployed.js";
import { generatePolicy, PolicyDocumentSchema } from "./policy.js";
import { generateApiDocument } from "./swagger.js";

export type Packager = {
  /** Builds the deployment archive for a project and returns its path. */
  createDeploymentPackage(projectDir: string): Promise<Result<string, DeployError>>;
  /** Builds the archive of the project's dependencies, for a managed layer. */
  createLayerPackage(projectDir: string): Promise<Result<string, DeployError>>;
};

export type BuildContext = {
  readonly projectDir: string;
};

/**
 * One pass over the application. A step returns the resource unchanged
 * unless it fills in a pending field it is responsible for.
 */
export type BuildStep = (
  resource: Resource<"declared">,
  context: BuildContext,
) => Promise<Result<Resource<"declared">, DeployError>>;

export type LambdaDefaults = {
  readonly lambdaTimeout: number;
  readonly lambdaMemorySize: number;
};

export const DEFAULT_LAMBDA_TIMEOUT = 60;
export const DEFAULT_LAMBDA_MEMORY_SIZE = 128;

const fill = <T>(current: Late<T>, value: () => T): Late<T> =>
  current instanceof Pending ? resolved(value()) : current;

export const injectDefaults =
  (defaults: LambdaDefaults): BuildStep =>
  async (resource) => {
    if (resource.kind !== "lambda_function") {
      return ok(resource);
    }
    return ok({
      ...resource,
      timeout: fill(resource.timeout, () => defaults.lambdaTimeout),
      memorySize: fill(resource.memorySize, () => defaults.lambdaMemorySize),
    });
  };

export const sha256Base64 = (contents: Uint8Array): string => createHash("sha256").update(contents).digest("base64");

export const packageDeployments =
  (packager: Packager): BuildStep =>
  async (resource, context) => {
    if (resource.kind !== "deployment_package" || !(resource.artifact instanceof Pending)) {
      return ok(resource);
    }
    const filename =
      resource.packageType === "layer"
        ? await packager.createLayerPackage(context.projectDir)
        : await packager.createDeploymentPackage(context.projectDir);
    if (filename.isErr()) {
      return err(filename.error);
    }
    let contents: Buffer;
    try {
      contents = await fs.readFile(filename.value);
    } catch (error) {
      return err({ kind: "io", message: `Failed to read deployment package: ${String(error)}`, path: filename.value });
    }
    return ok({ ...resource, artifact: resolved({ filename: filename.value, codeSha256: sha256Base64(contents) }) });
  };

export const generatePolicies = (): BuildStep => async (resource, context) => {
  if (resource.kind === "autogen_iam_policy" && resource.document instanceof Pending) {
    return ok({ ...resource, document: resolved(generatePolicy(resource.traits)) });
  }
  if (resource.kind !== "file_based_iam_policy" || !(resource.document instanceof Pending)) {
    return ok(resource);
  }

  const path = join(context.projectDir, STATE_DIR, resource.filename);
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch {
    return err({
      kind: "build",
      message: `Unable to load IAM policy file ${resource.filename}`,
      resourceName: resource.resourceName,
    });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err({
      kind: "build",
      message: `IAM policy file ${resource.filename} is not valid JSON: ${String(error)}`,
      resourceName: resource.resourceName,
    });
  }
  const document = PolicyDocumentSchema.safeParse(parsed);
  if (!document.success) {
    return err({
      kind: "build",
      message: `IAM policy file ${resource.filename} is not a policy document`,
      resourceName: resource.resourceName,
    });
  }
  return ok({ ...resource, document: resolved(document.data) });
};

export const generateApiDocuments = (): BuildStep => async (resource) => {
  if (resource.kind !== "rest_api" || !(resource.apiDocument instanceof Pending)) {
    return ok(resource);
  }
  return ok({ ...resource, apiDocument: resolved(generateApiDocument(resource)) });
};

const settle = <T>(
  value: Late<T>,
  field: string,
  resource: { readonly resourceName: string; readonly kind: ResourceKind },
): Result<T, DeployError> =>
  value instanceof Pending
    ? err({ kind: "build", message: `${field} was never filled in`, resourceName: resource.resourceName })
    : ok(value.value);

/**
 * The only way to turn a declared resource into a built one: every late
 * field must have been filled in by some step.
 */
export function finalizeResource(resource: Resource<"declared">): Result<Resource<"built">, DeployError> {
  switch (resource.kind) {
    case "lambda_function": {
      const timeout = settle(resource.timeout, "timeout", resource);
      if (timeout.isErr()) return err(timeout.error);
      const memorySize = settle(resource.memorySize, "memorySize", resource);
      if (memorySize.isErr()) return err(memorySize.error);
      return ok({ ...resource, timeout: timeout.value, memorySize: memorySize.value });
    }
    case "autogen_iam_policy":
    case "file_based_iam_policy": {
      const document = settle(resource.document, "document", resource);
      if (document.isErr()) return err(document.error);
      return ok({ ...resource, document: document.value });
    }
    case "deployment_package": {
      const artifact = settle(resource.artifact, "artifact", resource);
      if (artifact.isErr()) return err(artifact.error);
      return ok({ ...resource, artifact: artifact.value });
    }
    case "rest_api": {
      const apiDocument = settle(resource.apiDocument, "apiDocument", resource);
      if (apiDocument.isErr()) return err(apiDocument.error);
      return ok({ ...resource, apiDocument: apiDocument.value });
    }
    case "iam_role":
    case "lambda_layer":
    case "precreated_iam_role":
    case "scheduled_event":
    case "cloudwatch_event":
    case "s3_event":
    case "sns_event":
    case "sqs_event":
    case "kinesis_event":
    case "dynamodb_event":
      return ok(resource);
  }
}

export class BuildStage {
  constructor(private readonly steps: readonly BuildStep[]) {}

  async execute(
    app: Application<"declared">,
    ordered: readonly Resource<"declared">[],
  ): Promise<Result<Application<"built">, DeployError>> {
    const context: BuildContext = { projectDir: app.projectDir };
    const current = new Map(app.resources);

    for (const step of this.steps) {
      for (const resource of ordered) {
        const latest = current.get(resource.id) ?? resource;
        const result = await step(latest, context);
        if (result.isErr()) {
          return err(result.error);
        }
        current.set(resource.id, result.value);
      }
    }

    const built = new Map<number, Resource<"built">>();
    for (const [id, resource] of current) {
      const result = finalizeResource(resource);
      if (result.isErr()) {
        return err(result.error);
      }
      built.set(id, result.value);
    }
    return ok({ stage: app.stage, projectDir: app.projectDir, roots: app.roots, resources: built });
  }
}

export const defaultBuildSteps = (packager: Packager, defaults: LambdaDefaults): readonly BuildStep[] => [
  injectDefaults(defaults),
  packageDeployments(packager),
  generatePolicies(),
  generateApiDocuments(),
];
