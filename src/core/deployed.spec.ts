import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { tempProjectDir } from "../testing/index.js";
import { deployedStatePath, parseDeployedState, parseRecord, readDeployedResources } from "./deployed.js";
import { InvalidRecordError } from "./errors.js";

describe("parseRecord", () => {
  test("validates a record against its type", () => {
    expect(
      parseRecord({ name: "default_role", resource_type: "iam_role", role_name: "app-dev", role_arn: "arn:role" }),
    ).toEqual({ name: "default_role", resource_type: "iam_role", role_name: "app-dev", role_arn: "arn:role" });
  });

  test("rejects a record missing a required field", () => {
    expect(() => parseRecord({ name: "api_handler", resource_type: "lambda_function" })).toThrow(InvalidRecordError);
  });
});

describe("parseDeployedState", () => {
  test("rejects an unsupported schema version", () => {
    const result = parseDeployedState({ resources: [], schema_version: "1.0" }, "/state.json");
    expect(result._unsafeUnwrapErr()).toEqual({
      kind: "state",
      message: "Unsupported schema version 1.0, expected 2.0",
      path: "/state.json",
    });
  });

  test("keeps records in the order they were written", () => {
    const result = parseDeployedState(
      {
        resources: [
          { name: "b", resource_type: "lambda_function", lambda_arn: "arn:b" },
          { name: "a", resource_type: "lambda_function", lambda_arn: "arn:a" },
        ],
        schema_version: "2.0",
        backend: "api",
      },
      "/state.json",
    );
    const deployed = result._unsafeUnwrap();
    expect(deployed.resourceNames()).toEqual(["b", "a"]);
    expect(deployed.has("a")).toBe(true);
    expect(deployed.getOfType("a", "lambda_function")?.lambda_arn).toBe("arn:a");
    expect(deployed.getOfType("a", "iam_role")).toBeUndefined();
  });
});

describe("readDeployedResources", () => {
  test("treats a stage that was never deployed as empty", async () => {
    const result = await readDeployedResources(tempProjectDir(), "dev");
    expect(result._unsafeUnwrap().records).toEqual([]);
  });

  test("reports a state file that is not JSON", async () => {
    const projectDir = tempProjectDir();
    const path = deployedStatePath(projectDir, "dev");
    mkdirSync(join(projectDir, ".converge", "deployed"), { recursive: true });
    writeFileSync(path, "{not json");

    const result = await readDeployedResources(projectDir, "dev");

    const error = result._unsafeUnwrapErr();
    expect(error.kind).toBe("state");
    expect(error.kind === "state" ? error.path : undefined).toBe(path);
  });
});
