import { DeployedResources, parseRecord, recordKey, type DeploymentRecord } from "./deployed.js";
import { assertNever } from "./errors.js";
import {
  apiCall,
  isRecordInstruction,
  PlanBuilder,
  type Instruction,
  type Plan,
  type RecordInstruction,
} from "./instructions.js";

type Deletion = {
  readonly instructions: readonly Instruction[];
  readonly message: string | null;
};

function deletionFor(record: DeploymentRecord): Deletion {
  switch (record.resource_type) {
    case "lambda_function":
      return {
        instructions: [apiCall("deleteFunction", { functionName: record.lambda_arn })],
        message: `Deleting function: ${record.lambda_arn}\n`,
      };
    case "iam_role":
      return {
        instructions: [apiCall("deleteRole", { name: record.role_name })],
        message: `Deleting IAM role: ${record.role_name}\n`,
      };
    case "rest_api":
      return {
        instructions: [apiCall("deleteRestApi", { restApiId: record.rest_api_id })],
        message: `Deleting Rest API: ${record.rest_api_id}\n`,
      };
    case "scheduled_event":
    case "cloudwatch_event":
      return {
        instructions: [apiCall("deleteRule", { ruleName: record.rule_name })],
        message: null,
      };
    case "s3_event":
      return {
        instructions: [
          apiCall("disconnectS3BucketFromLambda", { bucket: record.bucket, functionArn: record.lambda_arn }),
          apiCall("removePermissionForS3Event", { bucket: record.bucket, functionArn: record.lambda_arn }),
        ],
        message: null,
      };
    case "sns_event":
      return {
        instructions: [
          apiCall("unsubscribeFromTopic", { subscriptionArn: record.subscription_arn }),
          apiCall("removePermissionForSnsTopic", {
            topicArn: record.topic_arn ?? record.topic,
            functionArn: record.lambda_arn,
          }),
        ],
        message: null,
      };
    case "sqs_event":
      return {
        instructions: [apiCall("removeSqsEventSource", { eventUuid: record.event_uuid })],
        message: null,
      };
    case "kinesis_event":
    case "dynamodb_event":
      return {
        instructions: [apiCall("removeLambdaEventSource", { eventUuid: record.event_uuid })],
        message: null,
      };
    case "lambda_layer":
      return {
        instructions: [apiCall("deleteLayerVersion", { layerVersionArn: record.layer_version_arn })],
        message: `Deleting layer version: ${record.layer_version_arn}\n`,
      };
    default:
      return assertNever(record);
  }
}

const plannedValue = (marked: readonly RecordInstruction[], field: string): unknown => {
  for (const instruction of marked) {
    if (instruction.kind === "record_resource_value" && instruction.field === field) {
      return instruction.value;
    }
  }
  return undefined;
};

/**
 * Whether a resource that is still planned was deployed against something
 * else (a different bucket, topic, queue or stream, or an older layer
 * version) that must be disconnected.
 */
function replacesTarget(record: DeploymentRecord, marked: readonly RecordInstruction[]): boolean {
  switch (record.resource_type) {
    case "s3_event":
      return plannedValue(marked, "bucket") !== record.bucket;
    case "sns_event":
      return plannedValue(marked, "topic") !== record.topic;
    case "sqs_event":
      return plannedValue(marked, "queue") !== record.queue;
    case "kinesis_event":
      return (
        plannedValue(marked, "stream") !== record.stream ||
        plannedValue(marked, "starting_position") !== record.starting_position
      );
    case "dynamodb_event":
      return (
        plannedValue(marked, "stream_arn") !== record.stream_arn ||
        plannedValue(marked, "starting_position") !== record.starting_position
      );
    case "lambda_layer":
      return plannedValue(marked, "layer_version_arn") !== record.layer_version_arn;
    case "lambda_function":
    case "iam_role":
    case "rest_api":
    case "scheduled_event":
    case "cloudwatch_event":
      return false;
    default:
      return assertNever(record);
  }
}

/**
 * Appends deletions for everything the last deployment recorded that the new
 * plan no longer records under the same type and name, newest first so
 * dependents go before what they depend on. The input plan is left untouched.
 */
export function sweep(plan: Plan, deployed: DeployedResources = DeployedResources.empty()): Plan {
  const marked = new Map<string, RecordInstruction[]>();
  for (const instruction of plan.instructions) {
    if (isRecordInstruction(instruction)) {
      const key = recordKey(instruction.resourceType, instruction.resourceName);
      const existing = marked.get(key) ?? [];
      existing.push(instruction);
      marked.set(key, existing);
    }
  }

  const builder = new PlanBuilder(plan);
  for (const raw of [...deployed.records].reverse()) {
    const record = parseRecord(raw);
    const planned = marked.get(recordKey(record.resource_type, record.name));
    if (planned !== undefined && !replacesTarget(record, planned)) {
      continue;
    }
    const deletion = deletionFor(record);
    deletion.instructions.forEach((instruction, index) => {
      builder.push(instruction, index === 0 && deletion.message !== null ? deletion.message : undefined);
    });
  }
  return builder.build();
}
