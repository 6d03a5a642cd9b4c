import {
  late,
  pending,
  type Application,
  type CorsConfig,
  type EndpointType,
  type PackageType,
  type PolicyDocument,
  type PolicyTraits,
  type Ref,
  type Resource,
  type ResourceKind,
  type Route,
  type StartingPosition,
} from "./models.js";
import { LAMBDA_TRUST_POLICY } from "./policy.js";

export type LambdaFunctionProps = {
  readonly resourceName: string;
  readonly functionName: string;
  readonly runtime: string;
  readonly handler: string;
  readonly role: Ref<"iam_role" | "precreated_iam_role">;
  readonly deploymentPackage: Ref<"deployment_package">;
  readonly managedLayer?: Ref<"lambda_layer">;
  readonly environmentVariables?: Readonly<Record<string, string>>;
  readonly tags?: Readonly<Record<string, string>>;
  readonly timeout?: number;
  readonly memorySize?: number;
  readonly securityGroupIds?: readonly string[];
  readonly subnetIds?: readonly string[];
  readonly layers?: readonly string[];
  readonly reservedConcurrency?: number;
  readonly xray?: boolean;
};

export type RouteProps = {
  readonly path: string;
  readonly method: string;
  readonly viewName: string;
  readonly viewArgs?: readonly string[];
  readonly contentTypes?: readonly string[];
  readonly apiKeyRequired?: boolean;
  readonly cors?: Partial<CorsConfig> | boolean;
};

export type RestApiProps = {
  readonly resourceName?: string;
  readonly title: string;
  readonly lambdaFunction: Ref<"lambda_function">;
  readonly routes: readonly RouteProps[];
  readonly apiGatewayStage?: string;
  readonly endpointType?: EndpointType;
  readonly minimumCompressionSize?: number;
};

const DEFAULT_CORS: CorsConfig = {
  allowOrigin: "*",
  allowHeaders: [],
  maxAge: null,
  allowCredentials: false,
};

const toRoute = (props: RouteProps): Route => {
  let cors: CorsConfig | null = null;
  if (props.cors === true) {
    cors = DEFAULT_CORS;
  } else if (typeof props.cors === "object") {
    cors = { ...DEFAULT_CORS, ...props.cors };
  }
  return {
    path: props.path,
    method: props.method.toUpperCase(),
    viewName: props.viewName,
    viewArgs: props.viewArgs ?? [],
    contentTypes: props.contentTypes ?? ["application/json"],
    apiKeyRequired: props.apiKeyRequired ?? false,
    cors,
  };
};

/**
 * Assembles a declared application. Functions, APIs and event sources are
 * roots in the order they are added; roles, policies and packages are only
 * reachable through the resources that reference them.
 */
export class ApplicationBuilder {
  private nextId = 0;
  private readonly resources = new Map<number, Resource<"declared">>();
  private readonly roots: Ref[] = [];

  constructor(
    private readonly stage: string,
    private readonly projectDir: string,
  ) {}

  private add<K extends ResourceKind>(kind: K, create: (id: number) => Resource<"declared">, root = false): Ref<K> {
    const id = this.nextId++;
    this.resources.set(id, create(id));
    const ref: Ref<K> = { id, kind };
    if (root) {
      this.roots.push(ref);
    }
    return ref;
  }

  deploymentPackage(resourceName = "deployment_package", packageType: PackageType = "function"): Ref<"deployment_package"> {
    return this.add("deployment_package", (id) => ({
      kind: "deployment_package",
      id,
      resourceName,
      packageType,
      artifact: pending(),
    }));
  }

  /** A layer holding the application's dependencies, shared by every function that names it. */
  lambdaLayer(props: {
    readonly resourceName: string;
    readonly layerName: string;
    readonly runtime: string;
    readonly deploymentPackage?: Ref<"deployment_package">;
  }): Ref<"lambda_layer"> {
    const deploymentPackage =
      props.deploymentPackage ?? this.deploymentPackage(`${props.resourceName}_deployment_package`, "layer");
    return this.add("lambda_layer", (id) => ({
      kind: "lambda_layer",
      id,
      resourceName: props.resourceName,
      layerName: props.layerName,
      runtime: props.runtime,
      deploymentPackage,
    }));
  }

  precreatedRole(resourceName: string, roleArn: string): Ref<"precreated_iam_role"> {
    return this.add("precreated_iam_role", (id) => ({ kind: "precreated_iam_role", id, resourceName, roleArn }));
  }

  autogenPolicy(resourceName: string, traits: Partial<PolicyTraits> = {}): Ref<"autogen_iam_policy"> {
    return this.add("autogen_iam_policy", (id) => ({
      kind: "autogen_iam_policy",
      id,
      resourceName,
      traits: { vpc: traits.vpc ?? false, xray: traits.xray ?? false },
      document: pending(),
    }));
  }

  fileBasedPolicy(resourceName: string, filename: string): Ref<"file_based_iam_policy"> {
    return this.add("file_based_iam_policy", (id) => ({
      kind: "file_based_iam_policy",
      id,
      resourceName,
      filename,
      document: pending(),
    }));
  }

  managedRole(props: {
    readonly resourceName: string;
    readonly roleName: string;
    readonly policy: Ref<"autogen_iam_policy" | "file_based_iam_policy">;
    readonly trustPolicy?: PolicyDocument;
  }): Ref<"iam_role"> {
    return this.add("iam_role", (id) => ({
      kind: "iam_role",
      id,
      resourceName: props.resourceName,
      roleName: props.roleName,
      trustPolicy: props.trustPolicy ?? LAMBDA_TRUST_POLICY,
      policy: props.policy,
    }));
  }

  lambdaFunction(props: LambdaFunctionProps): Ref<"lambda_function"> {
    return this.add(
      "lambda_function",
      (id) => ({
        kind: "lambda_function",
        id,
        resourceName: props.resourceName,
        functionName: props.functionName,
        runtime: props.runtime,
        handler: props.handler,
        environmentVariables: props.environmentVariables ?? {},
        tags: props.tags ?? {},
        timeout: late(props.timeout),
        memorySize: late(props.memorySize),
        securityGroupIds: props.securityGroupIds ?? [],
        subnetIds: props.subnetIds ?? [],
        layers: props.layers ?? [],
        reservedConcurrency: props.reservedConcurrency ?? null,
        xray: props.xray ?? false,
        role: props.role,
        deploymentPackage: props.deploymentPackage,
        managedLayer: props.managedLayer ?? null,
      }),
      true,
    );
  }

  restApi(props: RestApiProps): Ref<"rest_api"> {
    return this.add(
      "rest_api",
      (id) => ({
        kind: "rest_api",
        id,
        resourceName: props.resourceName ?? "rest_api",
        title: props.title,
        apiGatewayStage: props.apiGatewayStage ?? "api",
        endpointType: props.endpointType ?? "EDGE",
        minimumCompressionSize: props.minimumCompressionSize ?? null,
        routes: props.routes.map(toRoute),
        lambdaFunction: props.lambdaFunction,
        apiDocument: pending(),
      }),
      true,
    );
  }

  scheduledEvent(props: {
    readonly resourceName: string;
    readonly ruleName: string;
    readonly scheduleExpression: string;
    readonly ruleDescription?: string;
    readonly lambdaFunction: Ref<"lambda_function">;
  }): Ref<"scheduled_event"> {
    return this.add(
      "scheduled_event",
      (id) => ({
        kind: "scheduled_event",
        id,
        resourceName: props.resourceName,
        ruleName: props.ruleName,
        scheduleExpression: props.scheduleExpression,
        ruleDescription: props.ruleDescription ?? null,
        lambdaFunction: props.lambdaFunction,
      }),
      true,
    );
  }

  cloudwatchEvent(props: {
    readonly resourceName: string;
    readonly ruleName: string;
    readonly eventPattern: string;
    readonly lambdaFunction: Ref<"lambda_function">;
  }): Ref<"cloudwatch_event"> {
    return this.add("cloudwatch_event", (id) => ({ kind: "cloudwatch_event", id, ...props }), true);
  }

  s3Event(props: {
    readonly resourceName: string;
    readonly bucket: string;
    readonly events?: readonly string[];
    readonly prefix?: string;
    readonly suffix?: string;
    readonly lambdaFunction: Ref<"lambda_function">;
  }): Ref<"s3_event"> {
    return this.add(
      "s3_event",
      (id) => ({
        kind: "s3_event",
        id,
        resourceName: props.resourceName,
        bucket: props.bucket,
        events: props.events ?? ["s3:ObjectCreated:*"],
        prefix: props.prefix ?? null,
        suffix: props.suffix ?? null,
        lambdaFunction: props.lambdaFunction,
      }),
      true,
    );
  }

  snsEvent(props: {
    readonly resourceName: string;
    readonly topic: string;
    readonly lambdaFunction: Ref<"lambda_function">;
  }): Ref<"sns_event"> {
    return this.add("sns_event", (id) => ({ kind: "sns_event", id, ...props }), true);
  }

  sqsEvent(props: {
    readonly resourceName: string;
    readonly queue: string;
    readonly batchSize?: number;
    readonly maximumBatchingWindowInSeconds?: number;
    readonly lambdaFunction: Ref<"lambda_function">;
  }): Ref<"sqs_event"> {
    return this.add(
      "sqs_event",
      (id) => ({
        kind: "sqs_event",
        id,
        resourceName: props.resourceName,
        queue: props.queue,
        batchSize: props.batchSize ?? 10,
        maximumBatchingWindowInSeconds: props.maximumBatchingWindowInSeconds ?? 0,
        lambdaFunction: props.lambdaFunction,
      }),
      true,
    );
  }

  kinesisEvent(props: {
    readonly resourceName: string;
    readonly stream: string;
    readonly batchSize?: number;
    readonly startingPosition?: StartingPosition;
    readonly maximumBatchingWindowInSeconds?: number;
    readonly lambdaFunction: Ref<"lambda_function">;
  }): Ref<"kinesis_event"> {
    return this.add(
      "kinesis_event",
      (id) => ({
        kind: "kinesis_event",
        id,
        resourceName: props.resourceName,
        stream: props.stream,
        batchSize: props.batchSize ?? 100,
        startingPosition: props.startingPosition ?? "LATEST",
        maximumBatchingWindowInSeconds: props.maximumBatchingWindowInSeconds ?? 0,
        lambdaFunction: props.lambdaFunction,
      }),
      true,
    );
  }

  dynamodbEvent(props: {
    readonly resourceName: string;
    readonly streamArn: string;
    readonly batchSize?: number;
    readonly startingPosition?: StartingPosition;
    readonly maximumBatchingWindowInSeconds?: number;
    readonly lambdaFunction: Ref<"lambda_function">;
  }): Ref<"dynamodb_event"> {
    return this.add(
      "dynamodb_event",
      (id) => ({
        kind: "dynamodb_event",
        id,
        resourceName: props.resourceName,
        streamArn: props.streamArn,
        batchSize: props.batchSize ?? 100,
        startingPosition: props.startingPosition ?? "LATEST",
        maximumBatchingWindowInSeconds: props.maximumBatchingWindowInSeconds ?? 0,
        lambdaFunction: props.lambdaFunction,
      }),
      true,
    );
  }

  build(): Application<"declared"> {
    return {
      stage: this.stage,
      projectDir: this.projectDir,
      roots: [...this.roots],
      resources: new Map(this.resources),
    };
  }
}
