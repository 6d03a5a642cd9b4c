import type { ResourceValues } from "./executor.js";
import { StringFormat, type Plan } from "./instructions.js";

const SORT_ORDER: Readonly<Record<string, number>> = {
  rest_api: 100,
};
const DEFAULT_ORDERING = 50;

const reportLine = (resource: ResourceValues): string | null => {
  switch (resource.resource_type) {
    case "lambda_function":
      return `  - Lambda ARN: ${String(resource["lambda_arn"])}`;
    case "lambda_layer":
      return `  - Lambda Layer ARN: ${String(resource["layer_version_arn"])}`;
    case "rest_api":
      return `  - Rest API URL: ${String(resource["rest_api_url"])}`;
    default:
      return null;
  }
};

/**
 * Summary of a deployment for the user. Only functions, layers and the REST
 * API are listed; the API comes last.
 */
export function generateReport(resources: readonly ResourceValues[]): string {
  const ordered = [...resources].sort(
    (a, b) => (SORT_ORDER[a.resource_type] ?? DEFAULT_ORDERING) - (SORT_ORDER[b.resource_type] ?? DEFAULT_ORDERING),
  );
  const lines = ["Resources deployed:"];
  for (const resource of ordered) {
    const line = reportLine(resource);
    if (line !== null) {
      lines.push(line);
    }
  }
  lines.push("");
  return lines.join("\n");
}

/** The plan as JSON, with templates shown unexpanded. */
export function formatPlan(plan: Plan): string {
  return JSON.stringify(
    plan.instructions,
    (_key, value: unknown) => (value instanceof StringFormat ? value.template : value),
    4,
  );
}
