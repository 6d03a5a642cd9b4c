import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import * as fs from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { InvalidRecordError, UnknownResourceTypeError, type DeployError } from "./errors.js";

export const STATE_DIR = ".converge";
export const SCHEMA_VERSION = "2.0";

export const deployedStatePath = (projectDir: string, stage: string): string =>
  join(projectDir, STATE_DIR, "deployed", `${stage}.json`);

const LambdaRecordSchema = z.object({
  name: z.string(),
  resource_type: z.literal("lambda_function"),
  lambda_arn: z.string(),
});

const IamRoleRecordSchema = z.object({
  name: z.string(),
  resource_type: z.literal("iam_role"),
  role_name: z.string(),
  role_arn: z.string(),
});

const RestApiRecordSchema = z.object({
  name: z.string(),
  resource_type: z.literal("rest_api"),
  rest_api_id: z.string(),
  rest_api_url: z.string(),
  api_gateway_stage: z.string().optional(),
  endpoint_type: z.string().optional(),
  minimum_compression_size: z.number().nullable().optional(),
  api_handler_arn: z.string().optional(),
  api_document_sha: z.string().optional(),
});

const RuleRecordFields = {
  name: z.string(),
  rule_name: z.string(),
  lambda_arn: z.string().optional(),
  schedule_expression: z.string().optional(),
  rule_description: z.string().nullable().optional(),
  event_pattern: z.string().optional(),
};

const ScheduledEventRecordSchema = z.object({
  ...RuleRecordFields,
  resource_type: z.literal("scheduled_event"),
});

const CloudWatchEventRecordSchema = z.object({
  ...RuleRecordFields,
  resource_type: z.literal("cloudwatch_event"),
});

const S3EventRecordSchema = z.object({
  name: z.string(),
  resource_type: z.literal("s3_event"),
  bucket: z.string(),
  lambda_arn: z.string(),
  events: z.array(z.string()).optional(),
  prefix: z.string().nullable().optional(),
  suffix: z.string().nullable().optional(),
});

const SnsEventRecordSchema = z.object({
  name: z.string(),
  resource_type: z.literal("sns_event"),
  topic: z.string(),
  lambda_arn: z.string(),
  subscription_arn: z.string(),
  topic_arn: z.string().optional(),
});

const SqsEventRecordSchema = z.object({
  name: z.string(),
  resource_type: z.literal("sqs_event"),
  queue: z.string(),
  queue_arn: z.string(),
  lambda_arn: z.string(),
  event_uuid: z.string(),
  batch_size: z.number().optional(),
  maximum_batching_window_in_seconds: z.number().optional(),
});

const StreamRecordFields = {
  name: z.string(),
  stream_arn: z.string(),
  lambda_arn: z.string(),
  event_uuid: z.string(),
  batch_size: z.number().optional(),
  maximum_batching_window_in_seconds: z.number().optional(),
  starting_position: z.string().optional(),
};

const KinesisEventRecordSchema = z.object({
  ...StreamRecordFields,
  resource_type: z.literal("kinesis_event"),
  stream: z.string(),
});

const DynamoDBEventRecordSchema = z.object({
  ...StreamRecordFields,
  resource_type: z.literal("dynamodb_event"),
});

const LambdaLayerRecordSchema = z.object({
  name: z.string(),
  resource_type: z.literal("lambda_layer"),
  layer_version_arn: z.string(),
  layer_name: z.string().optional(),
  runtime: z.string().optional(),
});

const DeploymentRecordSchema = z.discriminatedUnion("resource_type", [
  LambdaRecordSchema,
  IamRoleRecordSchema,
  RestApiRecordSchema,
  ScheduledEventRecordSchema,
  CloudWatchEventRecordSchema,
  S3EventRecordSchema,
  SnsEventRecordSchema,
  SqsEventRecordSchema,
  KinesisEventRecordSchema,
  DynamoDBEventRecordSchema,
  LambdaLayerRecordSchema,
]);

export type DeploymentRecord = z.infer<typeof DeploymentRecordSchema>;
export type RecordType = DeploymentRecord["resource_type"];
export type RecordOfType<T extends RecordType> = Extract<DeploymentRecord, { resource_type: T }>;

const RECORD_TYPES: readonly string[] = DeploymentRecordSchema.options.map((option) => option.shape.resource_type.value);

const RawRecordSchema = z
  .object({
    name: z.string(),
    resource_type: z.string(),
  })
  .passthrough();

export type RawRecord = z.infer<typeof RawRecordSchema>;

const DeployedStateSchema = z.object({
  resources: z.array(RawRecordSchema),
  schema_version: z.string(),
  backend: z.string().optional(),
});

/**
 * Validates a raw record against the shape stored for its type.
 */
export function parseRecord(raw: RawRecord): DeploymentRecord {
  if (!RECORD_TYPES.includes(raw.resource_type)) {
    throw new UnknownResourceTypeError(raw.resource_type, raw.name);
  }
  const result = DeploymentRecordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue === undefined ? "invalid record" : `${issue.path.join(".")}: ${issue.message}`;
    throw new InvalidRecordError(raw.name, detail);
  }
  return result.data;
}

/** Identity of a deployed resource: its type together with its name. */
export const recordKey = (resourceType: string, name: string): string => `${resourceType}\0${name}`;

/**
 * The resources recorded by the last successful deployment of a stage, in
 * the order they were recorded.
 */
export class DeployedResources {
  private readonly byKey: ReadonlyMap<string, RawRecord>;

  constructor(readonly records: readonly RawRecord[]) {
    this.byKey = new Map(records.map((record) => [recordKey(record.resource_type, record.name), record]));
  }

  static empty(): DeployedResources {
    return new DeployedResources([]);
  }

  resourceNames(): readonly string[] {
    return this.records.map((record) => record.name);
  }

  has(name: string): boolean {
    return this.records.some((record) => record.name === name);
  }

  /** The record of type `type` named `name`, if the last deployment made one. */
  getOfType<T extends RecordType>(name: string, type: T): RecordOfType<T> | undefined {
    const raw = this.byKey.get(recordKey(type, name));
    if (raw === undefined) {
      return undefined;
    }
    const record = parseRecord(raw);
    return isRecordOfType(record, type) ? record : undefined;
  }
}

const isRecordOfType = <T extends RecordType>(record: DeploymentRecord, type: T): record is RecordOfType<T> =>
  record.resource_type === type;

export const parseDeployedState = (parsed: unknown, path: string): Result<DeployedResources, DeployError> => {
  const result = DeployedStateSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const message = issue === undefined ? "Invalid deployed state" : `${issue.path.join(".") || "root"}: ${issue.message}`;
    return err({ kind: "state", message, path });
  }
  if (result.data.schema_version !== SCHEMA_VERSION) {
    return err({
      kind: "state",
      message: `Unsupported schema version ${result.data.schema_version}, expected ${SCHEMA_VERSION}`,
      path,
    });
  }
  return ok(new DeployedResources(result.data.resources));
};

export const readDeployedResources = async (
  projectDir: string,
  stage: string,
): Promise<Result<DeployedResources, DeployError>> => {
  const path = deployedStatePath(projectDir, stage);
  if (!existsSync(path)) {
    return ok(DeployedResources.empty());
  }

  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (error) {
    return err({ kind: "io", message: `Failed to read deployed state: ${String(error)}`, path });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err({ kind: "state", message: `Invalid JSON: ${String(error)}`, path });
  }
  return parseDeployedState(parsed, path);
};
