import { ok, type Result } from "neverthrow";
import { mkdtempSync } from "node:fs";
import * as fs from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  BuildStage,
  generateApiDocuments,
  generatePolicies,
  injectDefaults,
  sha256Base64,
  type BuildStep,
  type Packager,
} from "../core/build.js";
import type { SessionInfo } from "../core/builtins.js";
import {
  ResourceNotFoundError,
  type ApiMethodName,
  type CloudClient,
  type FunctionConfiguration,
  type LayerVersion,
  type ResolvedParams,
  type RoleDescription,
} from "../core/client.js";
import { STATE_DIR } from "../core/deployed.js";
import type { DeployError } from "../core/errors.js";
import { orderResources } from "../core/graph.js";
import { Pending, resolved, type Application, type Artifact, type PolicyDocument } from "../core/models.js";

export const TEST_ACCOUNT = "123456789012";
export const TEST_REGION = "us-west-2";

export const testSession: SessionInfo = {
  region: TEST_REGION,
  partition: "aws",
  dnsSuffix: "amazonaws.com",
};

export const functionArnFor = (functionName: string): string =>
  `arn:aws:lambda:${TEST_REGION}:${TEST_ACCOUNT}:function:${functionName}`;

export const roleArnFor = (roleName: string): string => `arn:aws:iam::${TEST_ACCOUNT}:role/${roleName}`;

export const layerArnFor = (layerName: string, version = 1): string =>
  `arn:aws:lambda:${TEST_REGION}:${TEST_ACCOUNT}:layer:${layerName}:${version}`;

export const tempProjectDir = (): string => mkdtempSync(join(tmpdir(), "converge.project."));

export const TEST_ARTIFACT: Artifact = {
  filename: "/tmp/deployment.zip",
  codeSha256: sha256Base64(new TextEncoder().encode("test-package")),
};

/** Fills in deployment packages without touching the filesystem. */
export const stubArtifact =
  (artifact: Artifact = TEST_ARTIFACT): BuildStep =>
  async (resource) =>
    resource.kind === "deployment_package" && resource.artifact instanceof Pending
      ? ok({ ...resource, artifact: resolved(artifact) })
      : ok(resource);

/**
 * Runs the build stage with default lambda settings and a stubbed package,
 * for tests that start from a declared application.
 */
export const buildApplication = async (
  app: Application<"declared">,
  artifact: Artifact = TEST_ARTIFACT,
): Promise<Application> => {
  const stage = new BuildStage([
    injectDefaults({ lambdaTimeout: 60, lambdaMemorySize: 128 }),
    stubArtifact(artifact),
    generatePolicies(),
    generateApiDocuments(),
  ]);
  const result = await stage.execute(app, orderResources(app));
  return result._unsafeUnwrap();
};

const writeArchive = async (projectDir: string, filename: string, contents: string): Promise<string> => {
  const path = join(projectDir, STATE_DIR, filename);
  await fs.mkdir(join(projectDir, STATE_DIR), { recursive: true });
  await fs.writeFile(path, contents);
  return path;
};

/** Writes fixed archives into the project's state directory. */
export const filePackager = (contents = "test-package", layerContents = "test-layer"): Packager => ({
  async createDeploymentPackage(projectDir: string): Promise<Result<string, DeployError>> {
    return ok(await writeArchive(projectDir, "deployment.zip", contents));
  },
  async createLayerPackage(projectDir: string): Promise<Result<string, DeployError>> {
    return ok(await writeArchive(projectDir, "layer-deployment.zip", layerContents));
  },
});

export const functionConfiguration = (
  overrides: Partial<FunctionConfiguration> & { readonly functionName: string },
): FunctionConfiguration => ({
  functionArn: functionArnFor(overrides.functionName),
  runtime: "nodejs20.x",
  handler: "index.handler",
  role: roleArnFor("precreated"),
  timeout: 60,
  memorySize: 128,
  environmentVariables: {},
  tags: {},
  securityGroupIds: [],
  subnetIds: [],
  layers: [],
  xray: false,
  reservedConcurrency: null,
  codeSha256: "",
  ...overrides,
});

export type RecordedCall = {
  readonly method: ApiMethodName;
  readonly params: ResolvedParams;
};

const stringParam = (params: ResolvedParams, key: string): string => {
  const value = params[key];
  return typeof value === "string" ? value : "";
};

/**
 * In-process stand-in for a cloud account. Mutating calls are recorded and
 * answered with plausible identifiers; lookups read the maps below.
 */
export class FakeCloudClient implements CloudClient {
  readonly calls: RecordedCall[] = [];
  readonly queries: string[] = [];
  readonly functions = new Map<string, FunctionConfiguration>();
  readonly roles = new Map<string, RoleDescription>();
  readonly rolePolicies = new Map<string, PolicyDocument>();
  readonly restApis = new Set<string>();
  readonly layerVersions = new Map<string, LayerVersion>();
  readonly responses = new Map<ApiMethodName, unknown>();
  snsSubscriptionsCurrent = true;
  eventSourcesCurrent = true;
  failOn: ApiMethodName | null = null;

  private readonly method =
    (name: ApiMethodName) =>
    async (params: ResolvedParams): Promise<unknown> => {
      this.calls.push({ method: name, params });
      if (this.failOn === name) {
        throw new Error(`${name} failed`);
      }
      if (this.responses.has(name)) {
        return this.responses.get(name);
      }
      return this.defaultResponse(name, params);
    };

  readonly createFunction = this.method("createFunction");
  readonly updateFunction = this.method("updateFunction");
  readonly putFunctionConcurrency = this.method("putFunctionConcurrency");
  readonly deleteFunctionConcurrency = this.method("deleteFunctionConcurrency");
  readonly deleteFunction = this.method("deleteFunction");
  readonly createRole = this.method("createRole");
  readonly putRolePolicy = this.method("putRolePolicy");
  readonly updateAssumeRolePolicy = this.method("updateAssumeRolePolicy");
  readonly deleteRole = this.method("deleteRole");
  readonly importRestApi = this.method("importRestApi");
  readonly updateApiFromSwagger = this.method("updateApiFromSwagger");
  readonly updateRestApi = this.method("updateRestApi");
  readonly deployRestApi = this.method("deployRestApi");
  readonly addPermissionForApigateway = this.method("addPermissionForApigateway");
  readonly deleteRestApi = this.method("deleteRestApi");
  readonly getOrCreateRuleArn = this.method("getOrCreateRuleArn");
  readonly connectRuleToLambda = this.method("connectRuleToLambda");
  readonly addPermissionForCloudwatchEvent = this.method("addPermissionForCloudwatchEvent");
  readonly deleteRule = this.method("deleteRule");
  readonly addPermissionForS3Event = this.method("addPermissionForS3Event");
  readonly connectS3BucketToLambda = this.method("connectS3BucketToLambda");
  readonly disconnectS3BucketFromLambda = this.method("disconnectS3BucketFromLambda");
  readonly removePermissionForS3Event = this.method("removePermissionForS3Event");
  readonly addPermissionForSnsTopic = this.method("addPermissionForSnsTopic");
  readonly subscribeFunctionToTopic = this.method("subscribeFunctionToTopic");
  readonly unsubscribeFromTopic = this.method("unsubscribeFromTopic");
  readonly removePermissionForSnsTopic = this.method("removePermissionForSnsTopic");
  readonly createSqsEventSource = this.method("createSqsEventSource");
  readonly updateSqsEventSource = this.method("updateSqsEventSource");
  readonly removeSqsEventSource = this.method("removeSqsEventSource");
  readonly createLambdaEventSource = this.method("createLambdaEventSource");
  readonly updateLambdaEventSource = this.method("updateLambdaEventSource");
  readonly removeLambdaEventSource = this.method("removeLambdaEventSource");
  readonly publishLayer = this.method("publishLayer");
  readonly deleteLayerVersion = this.method("deleteLayerVersion");

  callNames(): readonly ApiMethodName[] {
    return this.calls.map((call) => call.method);
  }

  async getFunction(functionName: string): Promise<FunctionConfiguration> {
    this.queries.push(`getFunction:${functionName}`);
    const config = this.functions.get(functionName);
    if (config === undefined) {
      throw new ResourceNotFoundError("lambda_function", functionName);
    }
    return config;
  }

  async getRole(roleName: string): Promise<RoleDescription> {
    this.queries.push(`getRole:${roleName}`);
    const role = this.roles.get(roleName);
    if (role === undefined) {
      throw new ResourceNotFoundError("iam_role", roleName);
    }
    return role;
  }

  async getRolePolicy(roleName: string, policyName: string): Promise<PolicyDocument> {
    this.queries.push(`getRolePolicy:${roleName}:${policyName}`);
    const policy = this.rolePolicies.get(roleName);
    if (policy === undefined) {
      throw new ResourceNotFoundError("iam_role_policy", policyName);
    }
    return policy;
  }

  async restApiExists(restApiId: string): Promise<boolean> {
    this.queries.push(`restApiExists:${restApiId}`);
    return this.restApis.has(restApiId);
  }

  async verifySnsSubscriptionCurrent(subscriptionArn: string, topic: string, functionArn: string): Promise<boolean> {
    this.queries.push(`verifySnsSubscriptionCurrent:${subscriptionArn}:${topic}:${functionArn}`);
    return this.snsSubscriptionsCurrent;
  }

  async verifyEventSourceCurrent(eventUuid: string, source: string, functionArn: string): Promise<boolean> {
    this.queries.push(`verifyEventSourceCurrent:${eventUuid}:${source}:${functionArn}`);
    return this.eventSourcesCurrent;
  }

  async getLayerVersion(layerVersionArn: string): Promise<LayerVersion> {
    this.queries.push(`getLayerVersion:${layerVersionArn}`);
    const version = this.layerVersions.get(layerVersionArn);
    if (version === undefined) {
      throw new ResourceNotFoundError("lambda_layer", layerVersionArn);
    }
    return version;
  }

  private defaultResponse(name: ApiMethodName, params: ResolvedParams): unknown {
    switch (name) {
      case "createFunction":
        return functionArnFor(stringParam(params, "functionName"));
      case "updateFunction":
        return { FunctionArn: functionArnFor(stringParam(params, "functionName")) };
      case "createRole":
        return roleArnFor(stringParam(params, "name"));
      case "importRestApi":
        return "abcd1234";
      case "getOrCreateRuleArn":
        return `arn:aws:events:${TEST_REGION}:${TEST_ACCOUNT}:rule/${stringParam(params, "ruleName")}`;
      case "subscribeFunctionToTopic":
        return `${stringParam(params, "topicArn")}:subscription-1`;
      case "createSqsEventSource":
      case "createLambdaEventSource":
        return "event-uuid-1";
      case "publishLayer":
        return layerArnFor(stringParam(params, "layerName"));
      default:
        return null;
    }
  }
}
