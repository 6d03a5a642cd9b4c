import type { PolicyDocument } from "./models.js";

export const API_METHODS = [
  "createFunction",
  "updateFunction",
  "putFunctionConcurrency",
  "deleteFunctionConcurrency",
  "deleteFunction",
  "createRole",
  "putRolePolicy",
  "updateAssumeRolePolicy",
  "deleteRole",
  "importRestApi",
  "updateApiFromSwagger",
  "updateRestApi",
  "deployRestApi",
  "addPermissionForApigateway",
  "deleteRestApi",
  "getOrCreateRuleArn",
  "connectRuleToLambda",
  "addPermissionForCloudwatchEvent",
  "deleteRule",
  "addPermissionForS3Event",
  "connectS3BucketToLambda",
  "disconnectS3BucketFromLambda",
  "removePermissionForS3Event",
  "addPermissionForSnsTopic",
  "subscribeFunctionToTopic",
  "unsubscribeFromTopic",
  "removePermissionForSnsTopic",
  "createSqsEventSource",
  "updateSqsEventSource",
  "removeSqsEventSource",
  "createLambdaEventSource",
  "updateLambdaEventSource",
  "removeLambdaEventSource",
  "publishLayer",
  "deleteLayerVersion",
] as const;

export type ApiMethodName = (typeof API_METHODS)[number];

export type ResolvedParams = Readonly<Record<string, unknown>>;

/**
 * Mutating calls. Every method takes one parameter object and resolves to
 * whatever the underlying API returns (an ARN, an id, or a structure).
 */
export type ApiMethods = {
  readonly [M in ApiMethodName]: (params: ResolvedParams) => Promise<unknown>;
};

export type FunctionConfiguration = {
  readonly functionName: string;
  readonly functionArn: string;
  readonly runtime: string;
  readonly handler: string;
  readonly role: string;
  readonly timeout: number;
  readonly memorySize: number;
  readonly environmentVariables: Readonly<Record<string, string>>;
  readonly tags: Readonly<Record<string, string>>;
  readonly securityGroupIds: readonly string[];
  readonly subnetIds: readonly string[];
  readonly layers: readonly string[];
  readonly xray: boolean;
  readonly reservedConcurrency: number | null;
  readonly codeSha256: string;
};

export type RoleDescription = {
  readonly roleName: string;
  readonly roleArn: string;
  readonly trustPolicy: PolicyDocument;
};

export type LayerVersion = {
  readonly layerVersionArn: string;
  readonly codeSha256: string;
};

/**
 * Read-only lookups used while planning. A lookup for something that does
 * not exist rejects with {@link ResourceNotFoundError}.
 */
export type RemoteQueries = {
  getFunction(functionName: string): Promise<FunctionConfiguration>;
  getRole(roleName: string): Promise<RoleDescription>;
  getRolePolicy(roleName: string, policyName: string): Promise<PolicyDocument>;
  restApiExists(restApiId: string): Promise<boolean>;
  verifySnsSubscriptionCurrent(subscriptionArn: string, topic: string, functionArn: string): Promise<boolean>;
  /** `source` is a queue name, a Kinesis stream name, or a DynamoDB stream ARN. */
  verifyEventSourceCurrent(eventUuid: string, source: string, functionArn: string): Promise<boolean>;
  getLayerVersion(layerVersionArn: string): Promise<LayerVersion>;
};

export type CloudClient = ApiMethods & RemoteQueries;

export class ResourceNotFoundError extends Error {
  override readonly name = "ResourceNotFoundError";

  constructor(
    readonly resourceType: string,
    readonly identifier: string,
  ) {
    super(`${resourceType} does not exist: ${identifier}`);
  }
}
