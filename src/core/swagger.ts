import { StringFormat } from "./instructions.js";
import type { ApiDocument, Route } from "./models.js";

const DEFAULT_CORS_HEADERS = ["Authorization", "Content-Type", "X-Amz-Date", "X-Amz-Security-Token", "X-Api-Key"];

const EMPTY_RESPONSES = {
  "200": {
    description: "200 response",
    schema: { $ref: "#/definitions/Empty" },
  },
};

export type ApiDocumentInput = {
  readonly title: string;
  readonly routes: readonly Route[];
  readonly endpointType: string;
  readonly minimumCompressionSize: number | null;
};

/**
 * The URI API Gateway invokes for every route. The handler ARN and region are
 * only known once the function exists, so it stays a template until execution.
 */
export const integrationUri = (): StringFormat =>
  new StringFormat(
    "arn:{partition}:apigateway:{region_name}:lambda:path/2015-03-31/functions/{api_handler_lambda_arn}/invocations",
    ["partition", "region_name", "api_handler_lambda_arn"],
  );

function methodDefinition(route: Route): Record<string, unknown> {
  const definition: Record<string, unknown> = {
    consumes: [...route.contentTypes],
    produces: ["application/json"],
    responses: EMPTY_RESPONSES,
    "x-amazon-apigateway-integration": {
      responses: { default: { statusCode: "200" } },
      uri: integrationUri(),
      passthroughBehavior: "when_no_match",
      httpMethod: "POST",
      contentHandling: "CONVERT_TO_TEXT",
      type: "aws_proxy",
    },
  };
  if (route.viewArgs.length > 0) {
    definition["parameters"] = route.viewArgs.map((name) => ({
      name,
      in: "path",
      required: true,
      type: "string",
    }));
  }
  if (route.apiKeyRequired) {
    definition["security"] = [{ api_key: [] }];
  }
  return definition;
}

function preflightDefinition(routes: readonly Route[]): Record<string, unknown> | null {
  const first = routes.find((route) => route.cors !== null);
  if (first === undefined || first.cors === null) {
    return null;
  }
  const cors = first.cors;
  const methods = [...new Set([...routes.filter((r) => r.cors !== null).map((r) => r.method), "OPTIONS"])].sort();
  const headers: Record<string, string> = {
    "Access-Control-Allow-Methods": methods.join(","),
    "Access-Control-Allow-Origin": cors.allowOrigin,
    "Access-Control-Allow-Headers": [...new Set([...DEFAULT_CORS_HEADERS, ...cors.allowHeaders])].sort().join(","),
  };
  if (cors.maxAge !== null) {
    headers["Access-Control-Max-Age"] = String(cors.maxAge);
  }
  if (cors.allowCredentials) {
    headers["Access-Control-Allow-Credentials"] = "true";
  }

  const responseHeaders: Record<string, { type: string }> = {};
  const responseParameters: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    responseHeaders[name] = { type: "string" };
    responseParameters[`method.response.header.${name}`] = `'${value}'`;
  }

  return {
    consumes: ["application/json"],
    produces: ["application/json"],
    responses: {
      "200": { ...EMPTY_RESPONSES["200"], headers: responseHeaders },
    },
    "x-amazon-apigateway-integration": {
      responses: { default: { statusCode: "200", responseParameters } },
      requestTemplates: { "application/json": '{"statusCode": 200}' },
      passthroughBehavior: "when_no_match",
      type: "mock",
      contentHandling: "CONVERT_TO_TEXT",
    },
  };
}

export function generateApiDocument(api: ApiDocumentInput): ApiDocument {
  const byPath = new Map<string, Route[]>();
  for (const route of api.routes) {
    const routes = byPath.get(route.path) ?? [];
    routes.push(route);
    byPath.set(route.path, routes);
  }

  const paths: Record<string, Record<string, unknown>> = {};
  for (const [path, routes] of byPath) {
    const methods: Record<string, unknown> = {};
    for (const route of routes) {
      methods[route.method.toLowerCase()] = methodDefinition(route);
    }
    const preflight = preflightDefinition(routes);
    if (preflight !== null) {
      methods["options"] = preflight;
    }
    paths[path] = methods;
  }

  const document: Record<string, unknown> = {
    swagger: "2.0",
    info: { version: "1.0", title: api.title },
    schemes: ["https"],
    paths,
    definitions: {
      Empty: { type: "object", title: "Empty Schema" },
    },
    "x-amazon-apigateway-endpoint-configuration": { types: [api.endpointType] },
  };
  if (api.minimumCompressionSize !== null) {
    document["x-amazon-apigateway-minimum-compression-size"] = api.minimumCompressionSize;
  }
  if (api.routes.some((route) => route.apiKeyRequired)) {
    document["securityDefinitions"] = {
      api_key: { type: "apiKey", name: "x-api-key", in: "header" },
    };
  }
  return document;
}
