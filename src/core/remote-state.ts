import {
  ResourceNotFoundError,
  type FunctionConfiguration,
  type LayerVersion,
  type RemoteQueries,
  type RoleDescription,
} from "./client.js";
import { DeployedResources, type RecordOfType } from "./deployed.js";
import type { ManagedResource, PolicyDocument } from "./models.js";

export type ResourceSnapshot =
  | { readonly kind: "absent" }
  | { readonly kind: "lambda_function"; readonly config: FunctionConfiguration }
  | { readonly kind: "iam_role"; readonly role: RoleDescription; readonly policy: PolicyDocument | null }
  | { readonly kind: "rest_api"; readonly record: RecordOfType<"rest_api"> }
  | { readonly kind: "scheduled_event"; readonly record: RecordOfType<"scheduled_event"> }
  | { readonly kind: "cloudwatch_event"; readonly record: RecordOfType<"cloudwatch_event"> }
  | { readonly kind: "s3_event"; readonly record: RecordOfType<"s3_event"> }
  | { readonly kind: "sns_event"; readonly record: RecordOfType<"sns_event"> }
  | { readonly kind: "sqs_event"; readonly record: RecordOfType<"sqs_event"> }
  | { readonly kind: "kinesis_event"; readonly record: RecordOfType<"kinesis_event"> }
  | { readonly kind: "dynamodb_event"; readonly record: RecordOfType<"dynamodb_event"> }
  | { readonly kind: "lambda_layer"; readonly record: RecordOfType<"lambda_layer">; readonly version: LayerVersion };

export type PresentSnapshot<K extends ResourceSnapshot["kind"]> = Extract<ResourceSnapshot, { readonly kind: K }>;

const ABSENT: ResourceSnapshot = { kind: "absent" };

/**
 * Answers "does this already exist, and what does it look like" for one
 * deploy attempt. Each resource is looked up at most once; the answer is
 * cached by resource type and name.
 */
export class RemoteState {
  private readonly cache = new Map<string, Promise<ResourceSnapshot>>();

  constructor(
    private readonly client: RemoteQueries,
    private readonly deployed: DeployedResources = DeployedResources.empty(),
  ) {}

  async exists(resource: ManagedResource): Promise<boolean> {
    const snapshot = await this.fetch(resource);
    return snapshot.kind !== "absent";
  }

  fetch(resource: ManagedResource): Promise<ResourceSnapshot> {
    const key = `${resource.kind}\0${resource.resourceName}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const snapshot = this.lookup(resource);
    this.cache.set(key, snapshot);
    return snapshot;
  }

  private async lookup(resource: ManagedResource): Promise<ResourceSnapshot> {
    switch (resource.kind) {
      case "lambda_function": {
        const config = await absentIfNotFound(this.client.getFunction(resource.functionName));
        return config === null ? ABSENT : { kind: "lambda_function", config };
      }
      case "iam_role": {
        const role = await absentIfNotFound(this.client.getRole(resource.roleName));
        if (role === null) {
          return ABSENT;
        }
        const policy = await absentIfNotFound(this.client.getRolePolicy(resource.roleName, resource.roleName));
        return { kind: "iam_role", role, policy };
      }
      case "rest_api": {
        const record = this.deployed.getOfType(resource.resourceName, "rest_api");
        if (record === undefined || !(await this.client.restApiExists(record.rest_api_id))) {
          return ABSENT;
        }
        return { kind: "rest_api", record };
      }
      case "sns_event": {
        const record = this.deployed.getOfType(resource.resourceName, "sns_event");
        if (record === undefined) {
          return ABSENT;
        }
        const current = await this.client.verifySnsSubscriptionCurrent(
          record.subscription_arn,
          resource.topic,
          record.lambda_arn,
        );
        return current ? { kind: "sns_event", record } : ABSENT;
      }
      case "sqs_event": {
        const record = this.deployed.getOfType(resource.resourceName, "sqs_event");
        if (record === undefined) {
          return ABSENT;
        }
        const current = await this.client.verifyEventSourceCurrent(record.event_uuid, resource.queue, record.lambda_arn);
        return current ? { kind: "sqs_event", record } : ABSENT;
      }
      case "kinesis_event": {
        const record = this.deployed.getOfType(resource.resourceName, "kinesis_event");
        if (record === undefined || record.starting_position !== resource.startingPosition) {
          return ABSENT;
        }
        const current = await this.client.verifyEventSourceCurrent(record.event_uuid, resource.stream, record.lambda_arn);
        return current ? { kind: "kinesis_event", record } : ABSENT;
      }
      case "dynamodb_event": {
        const record = this.deployed.getOfType(resource.resourceName, "dynamodb_event");
        if (record === undefined || record.starting_position !== resource.startingPosition) {
          return ABSENT;
        }
        const current = await this.client.verifyEventSourceCurrent(
          record.event_uuid,
          resource.streamArn,
          record.lambda_arn,
        );
        return current ? { kind: "dynamodb_event", record } : ABSENT;
      }
      case "lambda_layer": {
        const record = this.deployed.getOfType(resource.resourceName, "lambda_layer");
        if (record === undefined) {
          return ABSENT;
        }
        const version = await absentIfNotFound(this.client.getLayerVersion(record.layer_version_arn));
        return version === null ? ABSENT : { kind: "lambda_layer", record, version };
      }
      case "s3_event": {
        const record = this.deployed.getOfType(resource.resourceName, "s3_event");
        return record === undefined || record.bucket !== resource.bucket ? ABSENT : { kind: "s3_event", record };
      }
      case "scheduled_event": {
        const record = this.deployed.getOfType(resource.resourceName, "scheduled_event");
        return record === undefined || record.rule_name !== resource.ruleName
          ? ABSENT
          : { kind: "scheduled_event", record };
      }
      case "cloudwatch_event": {
        const record = this.deployed.getOfType(resource.resourceName, "cloudwatch_event");
        return record === undefined || record.rule_name !== resource.ruleName
          ? ABSENT
          : { kind: "cloudwatch_event", record };
      }
    }
  }
}

async function absentIfNotFound<T>(query: Promise<T>): Promise<T | null> {
  try {
    return await query;
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return null;
    }
    throw error;
  }
}
