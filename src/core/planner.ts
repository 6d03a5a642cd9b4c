import { createHash } from "node:crypto";
import { isDeepStrictEqual } from "node:util";
import {
  apiCall,
  builtin,
  copyVariable,
  emptyPlan,
  jpSearch,
  PlanBuilder,
  recordValue,
  recordVariable,
  storeValue,
  StringFormat,
  Variable,
  type Instruction,
  type Plan,
} from "./instructions.js";
import {
  deref,
  isManaged,
  type Application,
  type CloudWatchEvent,
  type DynamoDBEvent,
  type KinesisEvent,
  type LambdaFunction,
  type LambdaLayer,
  type ManagedIamRole,
  type ManagedKind,
  type Ref,
  type Resource,
  type RestApi,
  type S3Event,
  type ScheduledEvent,
  type SnsEvent,
  type SqsEvent,
} from "./models.js";
import type { RemoteState } from "./remote-state.js";

const FUNCTION_FIELDS = [
  "runtime",
  "handler",
  "environmentVariables",
  "tags",
  "timeout",
  "memorySize",
  "securityGroupIds",
  "subnetIds",
  "layers",
  "xray",
] as const;

type FunctionField = (typeof FUNCTION_FIELDS)[number];

/** An identifier that is either already known or produced earlier in the plan. */
export type Deferred = string | Variable;

type ResourcePlan = {
  readonly instructions: readonly Instruction[];
  readonly message: string | null;
};

export type Planner = {
  plan(app: Application, ordered: readonly Resource[]): Promise<Plan>;
};

const recordDeferred = (type: ManagedKind, resourceName: string, field: string, value: Deferred): Instruction =>
  value instanceof Variable
    ? recordVariable(type, resourceName, field, value.name)
    : recordValue(type, resourceName, field, value);

/**
 * Hash of an API document, with templated values reduced to their template
 * so the hash does not depend on anything only known at execution time.
 */
export const apiDocumentSha = (document: unknown): string =>
  createHash("sha256")
    .update(JSON.stringify(document, (_key, value: unknown) => (value instanceof StringFormat ? value.template : value)))
    .digest("hex");

/**
 * Instructions that bind `parsed_lambda_arn` and the partition, region and
 * account pulled out of it.
 */
const lambdaArnParts = (functionArn: Deferred): readonly Instruction[] => [
  builtin("parse_arn", [functionArn], "parsed_lambda_arn"),
  jpSearch("partition", "parsed_lambda_arn", "partition"),
  jpSearch("account_id", "parsed_lambda_arn", "account_id"),
  jpSearch("region", "parsed_lambda_arn", "region_name"),
  jpSearch("dns_suffix", "parsed_lambda_arn", "dns_suffix"),
];

const arnFromName = (service: string, name: string, varname: string, functionArn: Deferred): readonly Instruction[] =>
  name.startsWith("arn:")
    ? [storeValue(varname, name)]
    : [
        ...lambdaArnParts(functionArn),
        storeValue(
          varname,
          new StringFormat(`arn:{partition}:${service}:{region_name}:{account_id}:${name}`, [
            "partition",
            "region_name",
            "account_id",
          ]),
        ),
      ];

/**
 * Diffs each resource against what already exists and emits the calls
 * needed to converge it. Planning only reads remote state.
 */
export class PlanStage implements Planner {
  constructor(private readonly remoteState: RemoteState) {}

  async plan(app: Application, ordered: readonly Resource[]): Promise<Plan> {
    const builder = new PlanBuilder();
    for (const resource of ordered) {
      if (!isManaged(resource)) {
        continue;
      }
      const planned = await this.planResource(app, resource);
      let messageAttached = planned.message === null;
      for (const instruction of planned.instructions) {
        if (!messageAttached && instruction.kind === "api_call" && planned.message !== null) {
          builder.push(instruction, planned.message);
          messageAttached = true;
        } else {
          builder.push(instruction);
        }
      }
    }
    return builder.build();
  }

  private planResource(app: Application, resource: Resource): Promise<ResourcePlan> {
    switch (resource.kind) {
      case "lambda_function":
        return this.planLambdaFunction(app, resource);
      case "iam_role":
        return this.planManagedRole(app, resource);
      case "rest_api":
        return this.planRestApi(app, resource);
      case "scheduled_event":
      case "cloudwatch_event":
        return this.planRule(app, resource);
      case "s3_event":
        return this.planS3Event(app, resource);
      case "sns_event":
        return this.planSnsEvent(app, resource);
      case "sqs_event":
        return this.planSqsEvent(app, resource);
      case "kinesis_event":
      case "dynamodb_event":
        return this.planStreamEvent(app, resource);
      case "lambda_layer":
        return this.planLambdaLayer(app, resource);
      case "precreated_iam_role":
      case "autogen_iam_policy":
      case "file_based_iam_policy":
      case "deployment_package":
        return Promise.resolve({ instructions: [], message: null });
    }
  }

  async functionArn(app: Application, ref: Ref<"lambda_function">): Promise<Deferred> {
    const fn = deref(app, ref);
    const snapshot = await this.remoteState.fetch(fn);
    return snapshot.kind === "lambda_function"
      ? snapshot.config.functionArn
      : new Variable(`${fn.resourceName}_lambda_arn`);
  }

  async roleArn(app: Application, ref: Ref<"iam_role" | "precreated_iam_role">): Promise<Deferred> {
    const role = deref(app, ref);
    if (role.kind === "precreated_iam_role") {
      return role.roleArn;
    }
    const snapshot = await this.remoteState.fetch(role);
    return snapshot.kind === "iam_role" ? snapshot.role.roleArn : new Variable(`${role.roleName}_role_arn`);
  }

  /**
   * The ARN of the layer version a function should use: the deployed one
   * when its runtime and code are unchanged, otherwise the one this plan
   * publishes.
   */
  async layerArn(app: Application, ref: Ref<"lambda_layer">): Promise<Deferred> {
    const layer = deref(app, ref);
    const snapshot = await this.remoteState.fetch(layer);
    const artifact = deref(app, layer.deploymentPackage).artifact;
    return snapshot.kind === "lambda_layer" &&
      snapshot.record.runtime === layer.runtime &&
      snapshot.version.codeSha256 === artifact.codeSha256
      ? snapshot.version.layerVersionArn
      : new Variable(`${layer.resourceName}_layer_version_arn`);
  }

  private async planLambdaLayer(app: Application, resource: LambdaLayer): Promise<ResourcePlan> {
    const name = resource.resourceName;
    const layerArn = await this.layerArn(app, { id: resource.id, kind: resource.kind });
    const bookkeeping = [
      recordValue("lambda_layer", name, "layer_name", resource.layerName),
      recordValue("lambda_layer", name, "runtime", resource.runtime),
    ];
    if (!(layerArn instanceof Variable)) {
      return {
        instructions: [recordValue("lambda_layer", name, "layer_version_arn", layerArn), ...bookkeeping],
        message: null,
      };
    }
    const artifact = deref(app, resource.deploymentPackage).artifact;
    return {
      instructions: [
        apiCall(
          "publishLayer",
          { layerName: resource.layerName, runtime: resource.runtime, zipFilename: artifact.filename },
          layerArn.name,
        ),
        recordVariable("lambda_layer", name, "layer_version_arn", layerArn.name),
        ...bookkeeping,
      ],
      message: `Creating lambda layer: ${resource.layerName}\n`,
    };
  }

  private async planLambdaFunction(app: Application, resource: LambdaFunction): Promise<ResourcePlan> {
    const varname = `${resource.resourceName}_lambda_arn`;
    const roleArn = await this.roleArn(app, resource.role);
    const artifact = deref(app, resource.deploymentPackage).artifact;
    const layers: readonly Deferred[] =
      resource.managedLayer === null
        ? resource.layers
        : [await this.layerArn(app, resource.managedLayer), ...resource.layers];
    const snapshot = await this.remoteState.fetch(resource);

    const desired: Readonly<Record<FunctionField, unknown>> = {
      runtime: resource.runtime,
      handler: resource.handler,
      environmentVariables: resource.environmentVariables,
      tags: resource.tags,
      timeout: resource.timeout,
      memorySize: resource.memorySize,
      securityGroupIds: resource.securityGroupIds,
      subnetIds: resource.subnetIds,
      layers,
      xray: resource.xray,
    };

    if (snapshot.kind !== "lambda_function") {
      const instructions: Instruction[] = [
        apiCall(
          "createFunction",
          { functionName: resource.functionName, roleArn, zipFilename: artifact.filename, ...desired },
          varname,
        ),
        recordVariable("lambda_function", resource.resourceName, "lambda_arn", varname),
      ];
      if (resource.reservedConcurrency !== null) {
        instructions.push(
          apiCall("putFunctionConcurrency", {
            functionName: resource.functionName,
            reservedConcurrentExecutions: resource.reservedConcurrency,
          }),
        );
      }
      return { instructions, message: `Creating lambda function: ${resource.functionName}\n` };
    }

    const live = snapshot.config;
    const changes: Record<string, unknown> = {};
    for (const field of FUNCTION_FIELDS) {
      if (!isDeepStrictEqual(live[field], desired[field])) {
        changes[field] = desired[field];
      }
    }
    if (roleArn instanceof Variable || roleArn !== live.role) {
      changes["roleArn"] = roleArn;
    }
    if (artifact.codeSha256 !== live.codeSha256) {
      changes["zipFilename"] = artifact.filename;
    }

    const instructions: Instruction[] = [];
    let message: string | null = null;
    if (Object.keys(changes).length > 0) {
      instructions.push(apiCall("updateFunction", { functionName: resource.functionName, ...changes }));
      message = `Updating lambda function: ${resource.functionName}\n`;
    }
    if (resource.reservedConcurrency !== live.reservedConcurrency) {
      instructions.push(
        resource.reservedConcurrency === null
          ? apiCall("deleteFunctionConcurrency", { functionName: resource.functionName })
          : apiCall("putFunctionConcurrency", {
              functionName: resource.functionName,
              reservedConcurrentExecutions: resource.reservedConcurrency,
            }),
      );
      message ??= `Updating lambda function concurrency limit: ${resource.functionName}\n`;
    }
    instructions.push(recordValue("lambda_function", resource.resourceName, "lambda_arn", live.functionArn));
    return { instructions, message };
  }

  private async planManagedRole(app: Application, resource: ManagedIamRole): Promise<ResourcePlan> {
    const document = deref(app, resource.policy).document;
    const snapshot = await this.remoteState.fetch(resource);
    const varname = `${resource.roleName}_role_arn`;

    if (snapshot.kind !== "iam_role") {
      return {
        instructions: [
          apiCall(
            "createRole",
            { name: resource.roleName, trustPolicy: resource.trustPolicy, policy: document },
            varname,
          ),
          recordVariable("iam_role", resource.resourceName, "role_arn", varname),
          recordValue("iam_role", resource.resourceName, "role_name", resource.roleName),
        ],
        message: `Creating IAM role: ${resource.roleName}\n`,
      };
    }

    const updates: Instruction[] = [];
    if (!isDeepStrictEqual(snapshot.role.trustPolicy, resource.trustPolicy)) {
      updates.push(
        apiCall("updateAssumeRolePolicy", { roleName: resource.roleName, policyDocument: resource.trustPolicy }),
      );
    }
    if (snapshot.policy === null || !isDeepStrictEqual(snapshot.policy, document)) {
      updates.push(
        apiCall("putRolePolicy", {
          roleName: resource.roleName,
          policyName: resource.roleName,
          policyDocument: document,
        }),
      );
    }
    return {
      instructions: [
        ...updates,
        recordValue("iam_role", resource.resourceName, "role_arn", snapshot.role.roleArn),
        recordValue("iam_role", resource.resourceName, "role_name", resource.roleName),
      ],
      message: updates.length > 0 ? `Updating policy for IAM role: ${resource.roleName}\n` : null,
    };
  }

  private async planRestApi(app: Application, resource: RestApi): Promise<ResourcePlan> {
    const fn = deref(app, resource.lambdaFunction);
    const functionArn = await this.functionArn(app, resource.lambdaFunction);
    const snapshot = await this.remoteState.fetch(resource);
    const documentSha = apiDocumentSha(resource.apiDocument);
    const restApiId = new Variable("rest_api_id");
    const name = resource.resourceName;

    const preamble: Instruction[] = [
      ...lambdaArnParts(functionArn),
      functionArn instanceof Variable
        ? copyVariable(functionArn.name, "api_handler_lambda_arn")
        : storeValue("api_handler_lambda_arn", functionArn),
    ];
    const bookkeeping: Instruction[] = [
      recordValue("rest_api", name, "api_gateway_stage", resource.apiGatewayStage),
      recordValue("rest_api", name, "endpoint_type", resource.endpointType),
      recordValue("rest_api", name, "minimum_compression_size", resource.minimumCompressionSize),
      recordValue("rest_api", name, "api_document_sha", documentSha),
      recordVariable("rest_api", name, "api_handler_arn", "api_handler_lambda_arn"),
    ];
    const compression = {
      op: "replace",
      path: "/minimumCompressionSize",
      value: resource.minimumCompressionSize === null ? "" : String(resource.minimumCompressionSize),
    };
    const publish = (patchOperations: readonly unknown[], grantInvoke: boolean): Instruction[] => [
      ...(patchOperations.length > 0 ? [apiCall("updateRestApi", { restApiId, patchOperations })] : []),
      ...(grantInvoke
        ? [
            apiCall("addPermissionForApigateway", {
              functionName: fn.functionName,
              regionName: new Variable("region_name"),
              accountId: new Variable("account_id"),
              restApiId,
            }),
          ]
        : []),
      apiCall("deployRestApi", { restApiId, apiGatewayStage: resource.apiGatewayStage }),
      storeValue(
        "rest_api_url",
        new StringFormat(`https://{rest_api_id}.execute-api.{region_name}.{dns_suffix}/${resource.apiGatewayStage}/`, [
          "rest_api_id",
          "region_name",
          "dns_suffix",
        ]),
      ),
      recordVariable("rest_api", name, "rest_api_url", "rest_api_url"),
    ];

    if (snapshot.kind !== "rest_api") {
      return {
        instructions: [
          ...preamble,
          apiCall(
            "importRestApi",
            { swaggerDocument: resource.apiDocument, endpointType: resource.endpointType },
            "rest_api_id",
          ),
          recordVariable("rest_api", name, "rest_api_id", "rest_api_id"),
          ...publish([compression], true),
          ...bookkeeping,
        ],
        message: "Creating Rest API\n",
      };
    }

    const record = snapshot.record;
    const handlerChanged = functionArn instanceof Variable || record.api_handler_arn !== functionArn;
    const documentChanged = record.api_document_sha !== documentSha || handlerChanged;
    const patchOperations: unknown[] = [];
    if ((record.minimum_compression_size ?? null) !== resource.minimumCompressionSize) {
      patchOperations.push(compression);
    }
    const previousEndpoint = record.endpoint_type ?? "EDGE";
    if (previousEndpoint !== resource.endpointType) {
      patchOperations.push({
        op: "replace",
        path: `/endpointConfiguration/types/${previousEndpoint}`,
        value: resource.endpointType,
      });
    }
    const stageChanged = record.api_gateway_stage !== resource.apiGatewayStage;

    const head: Instruction[] = [
      ...preamble,
      storeValue("rest_api_id", record.rest_api_id),
      recordVariable("rest_api", name, "rest_api_id", "rest_api_id"),
    ];
    if (!documentChanged && !stageChanged && patchOperations.length === 0) {
      return {
        instructions: [...head, recordValue("rest_api", name, "rest_api_url", record.rest_api_url), ...bookkeeping],
        message: null,
      };
    }
    return {
      instructions: [
        ...head,
        ...(documentChanged
          ? [apiCall("updateApiFromSwagger", { restApiId, swaggerDocument: resource.apiDocument })]
          : []),
        ...publish(patchOperations, handlerChanged),
        ...bookkeeping,
      ],
      message: "Updating rest API\n",
    };
  }

  private async planRule(app: Application, resource: ScheduledEvent | CloudWatchEvent): Promise<ResourcePlan> {
    const fn = deref(app, resource.lambdaFunction);
    const functionArn = await this.functionArn(app, resource.lambdaFunction);
    const snapshot = await this.remoteState.fetch(resource);
    const name = resource.resourceName;
    const ruleArn = `${name}_rule_arn`;

    let params: Record<string, unknown>;
    let definition: Instruction[];
    let current: boolean;
    if (resource.kind === "scheduled_event") {
      params = { ruleName: resource.ruleName, scheduleExpression: resource.scheduleExpression };
      if (resource.ruleDescription !== null) {
        params["ruleDescription"] = resource.ruleDescription;
      }
      definition = [
        recordValue(resource.kind, name, "schedule_expression", resource.scheduleExpression),
        recordValue(resource.kind, name, "rule_description", resource.ruleDescription),
      ];
      current =
        snapshot.kind === "scheduled_event" &&
        snapshot.record.lambda_arn === functionArn &&
        snapshot.record.schedule_expression === resource.scheduleExpression &&
        (snapshot.record.rule_description ?? null) === resource.ruleDescription;
    } else {
      params = { ruleName: resource.ruleName, eventPattern: resource.eventPattern };
      definition = [recordValue(resource.kind, name, "event_pattern", resource.eventPattern)];
      current =
        snapshot.kind === "cloudwatch_event" &&
        snapshot.record.lambda_arn === functionArn &&
        snapshot.record.event_pattern === resource.eventPattern;
    }

    const bookkeeping = [
      recordValue(resource.kind, name, "rule_name", resource.ruleName),
      recordDeferred(resource.kind, name, "lambda_arn", functionArn),
      ...definition,
    ];
    if (current) {
      return { instructions: bookkeeping, message: null };
    }
    return {
      instructions: [
        apiCall("getOrCreateRuleArn", params, ruleArn),
        apiCall("connectRuleToLambda", { ruleName: resource.ruleName, functionArn }),
        apiCall("addPermissionForCloudwatchEvent", { ruleArn: new Variable(ruleArn), functionArn }),
        ...bookkeeping,
      ],
      message: `Configuring event rule ${resource.ruleName} for function ${fn.functionName}\n`,
    };
  }

  private async planS3Event(app: Application, resource: S3Event): Promise<ResourcePlan> {
    const fn = deref(app, resource.lambdaFunction);
    const functionArn = await this.functionArn(app, resource.lambdaFunction);
    const snapshot = await this.remoteState.fetch(resource);
    const name = resource.resourceName;

    const current =
      snapshot.kind === "s3_event" &&
      snapshot.record.lambda_arn === functionArn &&
      isDeepStrictEqual(snapshot.record.events, resource.events) &&
      (snapshot.record.prefix ?? null) === resource.prefix &&
      (snapshot.record.suffix ?? null) === resource.suffix;

    const bookkeeping = [
      recordValue("s3_event", name, "bucket", resource.bucket),
      recordDeferred("s3_event", name, "lambda_arn", functionArn),
      recordValue("s3_event", name, "events", resource.events),
      recordValue("s3_event", name, "prefix", resource.prefix),
      recordValue("s3_event", name, "suffix", resource.suffix),
    ];
    if (current) {
      return { instructions: bookkeeping, message: null };
    }
    return {
      instructions: [
        apiCall("addPermissionForS3Event", { bucket: resource.bucket, functionArn }),
        apiCall("connectS3BucketToLambda", {
          bucket: resource.bucket,
          functionArn,
          prefix: resource.prefix,
          suffix: resource.suffix,
          events: resource.events,
        }),
        ...bookkeeping,
      ],
      message: `Configuring S3 events in bucket ${resource.bucket} to function ${fn.functionName}\n`,
    };
  }

  private async planSnsEvent(app: Application, resource: SnsEvent): Promise<ResourcePlan> {
    const fn = deref(app, resource.lambdaFunction);
    const functionArn = await this.functionArn(app, resource.lambdaFunction);
    const name = resource.resourceName;
    const topicArn = `${name}_topic_arn`;
    const subscriptionArn = `${name}_subscription_arn`;
    const lookup = arnFromName("sns", resource.topic, topicArn, functionArn);

    const snapshot = functionArn instanceof Variable ? null : await this.remoteState.fetch(resource);
    if (snapshot !== null && snapshot.kind === "sns_event") {
      return {
        instructions: [
          ...lookup,
          recordValue("sns_event", name, "topic", resource.topic),
          recordDeferred("sns_event", name, "lambda_arn", functionArn),
          recordValue("sns_event", name, "subscription_arn", snapshot.record.subscription_arn),
          recordVariable("sns_event", name, "topic_arn", topicArn),
        ],
        message: null,
      };
    }
    return {
      instructions: [
        ...lookup,
        apiCall("addPermissionForSnsTopic", { topicArn: new Variable(topicArn), functionArn }),
        apiCall("subscribeFunctionToTopic", { topicArn: new Variable(topicArn), functionArn }, subscriptionArn),
        recordValue("sns_event", name, "topic", resource.topic),
        recordDeferred("sns_event", name, "lambda_arn", functionArn),
        recordVariable("sns_event", name, "subscription_arn", subscriptionArn),
        recordVariable("sns_event", name, "topic_arn", topicArn),
      ],
      message: `Subscribing ${fn.functionName} to SNS topic ${resource.topic}\n`,
    };
  }

  private async planSqsEvent(app: Application, resource: SqsEvent): Promise<ResourcePlan> {
    const fn = deref(app, resource.lambdaFunction);
    const functionArn = await this.functionArn(app, resource.lambdaFunction);
    const name = resource.resourceName;
    const queueArn = `${name}_queue_arn`;
    const uuid = `${name}_uuid`;
    const lookup = arnFromName("sqs", resource.queue, queueArn, functionArn);
    const settings = {
      batchSize: resource.batchSize,
      maximumBatchingWindowInSeconds: resource.maximumBatchingWindowInSeconds,
    };

    const snapshot = functionArn instanceof Variable ? null : await this.remoteState.fetch(resource);
    const bookkeeping = [
      recordValue("sqs_event", name, "queue", resource.queue),
      recordDeferred("sqs_event", name, "lambda_arn", functionArn),
      recordValue("sqs_event", name, "batch_size", resource.batchSize),
      recordValue("sqs_event", name, "maximum_batching_window_in_seconds", resource.maximumBatchingWindowInSeconds),
    ];
    if (snapshot !== null && snapshot.kind === "sqs_event") {
      const record = snapshot.record;
      const changed =
        record.batch_size !== resource.batchSize ||
        record.maximum_batching_window_in_seconds !== resource.maximumBatchingWindowInSeconds;
      return {
        instructions: [
          ...lookup,
          ...(changed ? [apiCall("updateSqsEventSource", { eventUuid: record.event_uuid, ...settings })] : []),
          recordValue("sqs_event", name, "queue_arn", record.queue_arn),
          recordValue("sqs_event", name, "event_uuid", record.event_uuid),
          ...bookkeeping,
        ],
        message: changed ? `Updating SQS event source for ${fn.functionName}\n` : null,
      };
    }
    return {
      instructions: [
        ...lookup,
        apiCall("createSqsEventSource", { queueArn: new Variable(queueArn), functionName: functionArn, ...settings }, uuid),
        recordVariable("sqs_event", name, "queue_arn", queueArn),
        recordVariable("sqs_event", name, "event_uuid", uuid),
        ...bookkeeping,
      ],
      message: `Subscribing ${fn.functionName} to SQS queue ${resource.queue}\n`,
    };
  }

  private async planStreamEvent(app: Application, resource: KinesisEvent | DynamoDBEvent): Promise<ResourcePlan> {
    const fn = deref(app, resource.lambdaFunction);
    const functionArn = await this.functionArn(app, resource.lambdaFunction);
    const name = resource.resourceName;
    const type = resource.kind;
    const streamArn = `${name}_stream_arn`;
    const uuid = `${name}_uuid`;
    const settings = {
      batchSize: resource.batchSize,
      maximumBatchingWindowInSeconds: resource.maximumBatchingWindowInSeconds,
    };

    let lookup: readonly Instruction[];
    let source: Instruction[];
    let createdStreamArn: Instruction;
    let service: string;
    let stream: string;
    if (resource.kind === "kinesis_event") {
      lookup = arnFromName("kinesis", `stream/${resource.stream}`, streamArn, functionArn);
      source = [recordValue(type, name, "stream", resource.stream)];
      createdStreamArn = recordVariable(type, name, "stream_arn", streamArn);
      service = "Kinesis";
      stream = resource.stream;
    } else {
      lookup = [storeValue(streamArn, resource.streamArn)];
      source = [];
      createdStreamArn = recordValue(type, name, "stream_arn", resource.streamArn);
      service = "DynamoDB";
      stream = resource.streamArn;
    }
    const bookkeeping = [
      ...source,
      recordDeferred(type, name, "lambda_arn", functionArn),
      recordValue(type, name, "batch_size", resource.batchSize),
      recordValue(type, name, "maximum_batching_window_in_seconds", resource.maximumBatchingWindowInSeconds),
      recordValue(type, name, "starting_position", resource.startingPosition),
    ];

    const snapshot = functionArn instanceof Variable ? null : await this.remoteState.fetch(resource);
    if (snapshot !== null && (snapshot.kind === "kinesis_event" || snapshot.kind === "dynamodb_event")) {
      const record = snapshot.record;
      const changed =
        record.batch_size !== resource.batchSize ||
        record.maximum_batching_window_in_seconds !== resource.maximumBatchingWindowInSeconds;
      return {
        instructions: [
          ...(changed ? [apiCall("updateLambdaEventSource", { eventUuid: record.event_uuid, ...settings })] : []),
          recordValue(type, name, "stream_arn", record.stream_arn),
          recordValue(type, name, "event_uuid", record.event_uuid),
          ...bookkeeping,
        ],
        message: changed ? `Updating ${service} event source for ${fn.functionName}\n` : null,
      };
    }
    return {
      instructions: [
        ...lookup,
        apiCall(
          "createLambdaEventSource",
          {
            eventSourceArn: new Variable(streamArn),
            functionName: functionArn,
            startingPosition: resource.startingPosition,
            ...settings,
          },
          uuid,
        ),
        createdStreamArn,
        recordVariable(type, name, "event_uuid", uuid),
        ...bookkeeping,
      ],
      message: `Subscribing ${fn.functionName} to ${service} stream ${stream}\n`,
    };
  }
}

/** Plans nothing; paired with the sweeper this removes a whole stage. */
export class NoopPlanner implements Planner {
  async plan(): Promise<Plan> {
    return emptyPlan();
  }
}
