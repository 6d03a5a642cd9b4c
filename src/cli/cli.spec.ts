import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { recordResults } from "../core/recorder.js";
import { bufferUI } from "../core/ui.js";
import { tempProjectDir } from "../testing/index.js";
import { showConfig } from "./config.js";
import { showState } from "./state.js";

describe("showState", () => {
  test("reports a stage that was never deployed", async () => {
    const ui = bufferUI();
    const result = await showState({ stage: "prod", cwd: tempProjectDir(), ui });
    expect(result.isOk()).toBe(true);
    expect(ui.lines).toEqual(["Stage prod has not been deployed.\n"]);
  });

  test("summarises the recorded resources", async () => {
    const cwd = tempProjectDir();
    await recordResults(
      [
        { name: "rest_api", resource_type: "rest_api", rest_api_id: "abcd1234", rest_api_url: "https://abcd1234/api/" },
        { name: "api_handler", resource_type: "lambda_function", lambda_arn: "arn:fn" },
      ],
      "dev",
      cwd,
    );
    const ui = bufferUI();

    await showState({ cwd, ui });

    expect(ui.lines).toEqual(["Resources deployed:\n  - Lambda ARN: arn:fn\n  - Rest API URL: https://abcd1234/api/\n"]);
  });

  test("returns a state error for a record of an unknown type", async () => {
    const cwd = tempProjectDir();
    mkdirSync(join(cwd, ".converge", "deployed"), { recursive: true });
    writeFileSync(
      join(cwd, ".converge", "deployed", "dev.json"),
      JSON.stringify({ resources: [{ name: "mystery", resource_type: "elasticache_cluster" }], schema_version: "2.0" }),
    );

    const result = await showState({ cwd, ui: bufferUI() });

    expect(result._unsafeUnwrapErr()).toEqual({
      kind: "state",
      message: 'Unknown resource type "elasticache_cluster" for deployed resource: mystery',
      path: join(cwd, ".converge", "deployed", "dev.json"),
    });
  });
});

describe("showConfig", () => {
  test("prints the resolved stage settings", async () => {
    const cwd = tempProjectDir();
    mkdirSync(join(cwd, ".converge"));
    writeFileSync(join(cwd, ".converge", "config.json"), JSON.stringify({ appName: "app", lambdaMemorySize: 256 }));
    const ui = bufferUI();

    await showConfig({ cwd, stage: "dev", ui });

    expect(ui.lines.map((line) => JSON.parse(line))).toEqual([
      { appName: "app", stage: "dev", lambdaTimeout: 60, lambdaMemorySize: 256, region: null },
    ]);
  });

  test("returns the validation error", async () => {
    const cwd = tempProjectDir();
    mkdirSync(join(cwd, ".converge"));
    writeFileSync(join(cwd, ".converge", "config.json"), JSON.stringify({ appName: "" }));

    const result = await showConfig({ cwd, ui: bufferUI() });

    expect(result._unsafeUnwrapErr()).toEqual({
      kind: "config",
      field: "appName",
      message: "String must contain at least 1 character(s)",
    });
  });
});
