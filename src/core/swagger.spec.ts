import { describe, expect, test } from "vitest";
import { integrationUri, generateApiDocument } from "./swagger.js";
import type { Route } from "./models.js";

const route = (overrides: Partial<Route> = {}): Route => ({
  path: "/",
  method: "GET",
  viewName: "index",
  viewArgs: [],
  contentTypes: ["application/json"],
  apiKeyRequired: false,
  cors: null,
  ...overrides,
});

describe("generateApiDocument", () => {
  test("describes one proxy integration per route", () => {
    const document = generateApiDocument({
      title: "app",
      routes: [route()],
      endpointType: "EDGE",
      minimumCompressionSize: null,
    });

    expect(document).toEqual({
      swagger: "2.0",
      info: { version: "1.0", title: "app" },
      schemes: ["https"],
      paths: {
        "/": {
          get: {
            consumes: ["application/json"],
            produces: ["application/json"],
            responses: {
              "200": { description: "200 response", schema: { $ref: "#/definitions/Empty" } },
            },
            "x-amazon-apigateway-integration": {
              responses: { default: { statusCode: "200" } },
              uri: integrationUri(),
              passthroughBehavior: "when_no_match",
              httpMethod: "POST",
              contentHandling: "CONVERT_TO_TEXT",
              type: "aws_proxy",
            },
          },
        },
      },
      definitions: { Empty: { type: "object", title: "Empty Schema" } },
      "x-amazon-apigateway-endpoint-configuration": { types: ["EDGE"] },
    });
  });

  test("adds path parameters, API keys and compression", () => {
    const document = generateApiDocument({
      title: "app",
      routes: [route({ path: "/users/{id}", viewArgs: ["id"], apiKeyRequired: true })],
      endpointType: "REGIONAL",
      minimumCompressionSize: 1024,
    });

    expect(document["x-amazon-apigateway-minimum-compression-size"]).toBe(1024);
    expect(document["securityDefinitions"]).toEqual({ api_key: { type: "apiKey", name: "x-api-key", in: "header" } });
    expect(document["paths"]).toMatchObject({
      "/users/{id}": {
        get: {
          parameters: [{ name: "id", in: "path", required: true, type: "string" }],
          security: [{ api_key: [] }],
        },
      },
    });
  });

  test("answers CORS preflight requests", () => {
    const cors = { allowOrigin: "https://example.com", allowHeaders: ["X-Custom"], maxAge: 600, allowCredentials: true };
    const document = generateApiDocument({
      title: "app",
      routes: [route({ method: "PUT", cors }), route({ method: "GET", cors })],
      endpointType: "EDGE",
      minimumCompressionSize: null,
    });

    expect(document["paths"]).toMatchObject({
      "/": {
        options: {
          "x-amazon-apigateway-integration": {
            type: "mock",
            responses: {
              default: {
                statusCode: "200",
                responseParameters: {
                  "method.response.header.Access-Control-Allow-Methods": "'GET,OPTIONS,PUT'",
                  "method.response.header.Access-Control-Allow-Origin": "'https://example.com'",
                  "method.response.header.Access-Control-Allow-Headers":
                    "'Authorization,Content-Type,X-Amz-Date,X-Amz-Security-Token,X-Api-Key,X-Custom'",
                  "method.response.header.Access-Control-Max-Age": "'600'",
                  "method.response.header.Access-Control-Allow-Credentials": "'true'",
                },
              },
            },
          },
        },
      },
    });
  });
});
