import { DanglingReferenceError } from "./errors.js";

/**
 * Whether an application still carries fields that the build stage fills in.
 */
export type Stage = "declared" | "built";

export class Pending {
  readonly kind = "pending";

  toString(): string {
    return "<pending>";
  }
}

export type Resolved<T> = { readonly kind: "resolved"; readonly value: T };

export type Late<T> = Pending | Resolved<T>;

export type Slot<S extends Stage, T> = S extends "built" ? T : Late<T>;

export const pending = (): Pending => new Pending();

export const resolved = <T>(value: T): Resolved<T> => ({ kind: "resolved", value });

export const late = <T>(value: T | undefined): Late<T> =>
  value === undefined ? pending() : resolved(value);

export type ResourceKind = Resource["kind"];

export type ManagedKind =
  | "lambda_function"
  | "iam_role"
  | "rest_api"
  | "scheduled_event"
  | "cloudwatch_event"
  | "s3_event"
  | "sns_event"
  | "sqs_event"
  | "kinesis_event"
  | "dynamodb_event"
  | "lambda_layer";

export type Ref<K extends ResourceKind = ResourceKind> = {
  readonly id: number;
  readonly kind: K;
};

export type PolicyStatement = {
  readonly Sid?: string;
  readonly Effect: "Allow" | "Deny";
  readonly Principal?: Readonly<Record<string, string>>;
  readonly Action: string | readonly string[];
  readonly Resource?: string | readonly string[];
};

export type PolicyDocument = {
  readonly Version: string;
  readonly Statement: readonly PolicyStatement[];
};

export type PolicyTraits = {
  readonly vpc: boolean;
  readonly xray: boolean;
};

export type Artifact = {
  readonly filename: string;
  readonly codeSha256: string;
};

export type ApiDocument = { readonly [key: string]: unknown };

export type CorsConfig = {
  readonly allowOrigin: string;
  readonly allowHeaders: readonly string[];
  readonly maxAge: number | null;
  readonly allowCredentials: boolean;
};

export type Route = {
  readonly path: string;
  readonly method: string;
  readonly viewName: string;
  readonly viewArgs: readonly string[];
  readonly contentTypes: readonly string[];
  readonly apiKeyRequired: boolean;
  readonly cors: CorsConfig | null;
};

export type EndpointType = "EDGE" | "REGIONAL" | "PRIVATE";

export type StartingPosition = "TRIM_HORIZON" | "LATEST";

/** What goes into a deployment package: the application code or its shared dependencies. */
export type PackageType = "function" | "layer";

type Base<K extends string> = {
  readonly kind: K;
  readonly id: number;
  readonly resourceName: string;
};

export type LambdaFunction<S extends Stage = "built"> = Base<"lambda_function"> & {
  readonly functionName: string;
  readonly runtime: string;
  readonly handler: string;
  readonly environmentVariables: Readonly<Record<string, string>>;
  readonly tags: Readonly<Record<string, string>>;
  readonly timeout: Slot<S, number>;
  readonly memorySize: Slot<S, number>;
  readonly securityGroupIds: readonly string[];
  readonly subnetIds: readonly string[];
  readonly layers: readonly string[];
  readonly reservedConcurrency: number | null;
  readonly xray: boolean;
  readonly role: Ref<"iam_role" | "precreated_iam_role">;
  readonly deploymentPackage: Ref<"deployment_package">;
  readonly managedLayer: Ref<"lambda_layer"> | null;
};

export type LambdaLayer = Base<"lambda_layer"> & {
  readonly layerName: string;
  readonly runtime: string;
  readonly deploymentPackage: Ref<"deployment_package">;
};

export type ManagedIamRole = Base<"iam_role"> & {
  readonly roleName: string;
  readonly trustPolicy: PolicyDocument;
  readonly policy: Ref<"autogen_iam_policy" | "file_based_iam_policy">;
};

export type PreCreatedIamRole = Base<"precreated_iam_role"> & {
  readonly roleArn: string;
};

export type AutoGenIamPolicy<S extends Stage = "built"> = Base<"autogen_iam_policy"> & {
  readonly traits: PolicyTraits;
  readonly document: Slot<S, PolicyDocument>;
};

export type FileBasedIamPolicy<S extends Stage = "built"> = Base<"file_based_iam_policy"> & {
  readonly filename: string;
  readonly document: Slot<S, PolicyDocument>;
};

export type DeploymentPackage<S extends Stage = "built"> = Base<"deployment_package"> & {
  readonly packageType: PackageType;
  readonly artifact: Slot<S, Artifact>;
};

export type RestApi<S extends Stage = "built"> = Base<"rest_api"> & {
  readonly title: string;
  readonly apiGatewayStage: string;
  readonly endpointType: EndpointType;
  readonly minimumCompressionSize: number | null;
  readonly routes: readonly Route[];
  readonly lambdaFunction: Ref<"lambda_function">;
  readonly apiDocument: Slot<S, ApiDocument>;
};

export type ScheduledEvent = Base<"scheduled_event"> & {
  readonly ruleName: string;
  readonly scheduleExpression: string;
  readonly ruleDescription: string | null;
  readonly lambdaFunction: Ref<"lambda_function">;
};

export type CloudWatchEvent = Base<"cloudwatch_event"> & {
  readonly ruleName: string;
  readonly eventPattern: string;
  readonly lambdaFunction: Ref<"lambda_function">;
};

export type S3Event = Base<"s3_event"> & {
  readonly bucket: string;
  readonly events: readonly string[];
  readonly prefix: string | null;
  readonly suffix: string | null;
  readonly lambdaFunction: Ref<"lambda_function">;
};

export type SnsEvent = Base<"sns_event"> & {
  readonly topic: string;
  readonly lambdaFunction: Ref<"lambda_function">;
};

export type SqsEvent = Base<"sqs_event"> & {
  readonly queue: string;
  readonly batchSize: number;
  readonly maximumBatchingWindowInSeconds: number;
  readonly lambdaFunction: Ref<"lambda_function">;
};

type StreamSettings = {
  readonly batchSize: number;
  readonly startingPosition: StartingPosition;
  readonly maximumBatchingWindowInSeconds: number;
  readonly lambdaFunction: Ref<"lambda_function">;
};

export type KinesisEvent = Base<"kinesis_event"> &
  StreamSettings & {
    readonly stream: string;
  };

export type DynamoDBEvent = Base<"dynamodb_event"> &
  StreamSettings & {
    readonly streamArn: string;
  };

export type Resource<S extends Stage = "built"> =
  | LambdaFunction<S>
  | LambdaLayer
  | ManagedIamRole
  | PreCreatedIamRole
  | AutoGenIamPolicy<S>
  | FileBasedIamPolicy<S>
  | DeploymentPackage<S>
  | RestApi<S>
  | ScheduledEvent
  | CloudWatchEvent
  | S3Event
  | SnsEvent
  | SqsEvent
  | KinesisEvent
  | DynamoDBEvent;

export type ResourceOfKind<K extends ResourceKind, S extends Stage = "built"> = Extract<
  Resource<S>,
  { readonly kind: K }
>;

export type ManagedResource<S extends Stage = "built"> = ResourceOfKind<ManagedKind, S>;

export type Application<S extends Stage = "built"> = {
  readonly stage: string;
  readonly projectDir: string;
  readonly roots: readonly Ref[];
  readonly resources: ReadonlyMap<number, Resource<S>>;
};

export function dependencies<S extends Stage>(resource: Resource<S>): readonly Ref[] {
  switch (resource.kind) {
    case "lambda_function":
      return resource.managedLayer === null
        ? [resource.role, resource.deploymentPackage]
        : [resource.managedLayer, resource.role, resource.deploymentPackage];
    case "lambda_layer":
      return [resource.deploymentPackage];
    case "iam_role":
      return [resource.policy];
    case "rest_api":
    case "scheduled_event":
    case "cloudwatch_event":
    case "s3_event":
    case "sns_event":
    case "sqs_event":
    case "kinesis_event":
    case "dynamodb_event":
      return [resource.lambdaFunction];
    case "precreated_iam_role":
    case "autogen_iam_policy":
    case "file_based_iam_policy":
    case "deployment_package":
      return [];
  }
}

const isOfKind = <K extends ResourceKind, S extends Stage>(
  resource: Resource<S>,
  kind: K,
): resource is ResourceOfKind<K, S> => resource.kind === kind;

export function deref<K extends ResourceKind, S extends Stage>(
  app: Application<S>,
  ref: Ref<K>,
): ResourceOfKind<K, S> {
  const resource = app.resources.get(ref.id);
  if (resource === undefined || !isOfKind(resource, ref.kind)) {
    throw new DanglingReferenceError(ref.id, ref.kind);
  }
  return resource;
}

export function isManaged<S extends Stage>(resource: Resource<S>): resource is ManagedResource<S> {
  switch (resource.kind) {
    case "lambda_function":
    case "iam_role":
    case "rest_api":
    case "scheduled_event":
    case "cloudwatch_event":
    case "s3_event":
    case "sns_event":
    case "sqs_event":
    case "kinesis_event":
    case "dynamodb_event":
    case "lambda_layer":
      return true;
    case "precreated_iam_role":
    case "autogen_iam_policy":
    case "file_based_iam_policy":
    case "deployment_package":
      return false;
  }
}
