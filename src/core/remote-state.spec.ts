import { describe, expect, test } from "vitest";
import {
  buildApplication,
  FakeCloudClient,
  functionArnFor,
  functionConfiguration,
  layerArnFor,
  roleArnFor,
  TEST_ARTIFACT,
} from "../testing/index.js";
import { ApplicationBuilder } from "./application.js";
import { DeployedResources } from "./deployed.js";
import { deref, type Application, type Ref } from "./models.js";
import { LAMBDA_TRUST_POLICY } from "./policy.js";
import { RemoteState } from "./remote-state.js";

type Fixture = {
  readonly app: Application;
  readonly fn: Ref<"lambda_function">;
  readonly role: Ref<"iam_role">;
  readonly sqs: Ref<"sqs_event">;
  readonly s3: Ref<"s3_event">;
  readonly layer: Ref<"lambda_layer">;
};

const fixture = async (): Promise<Fixture> => {
  const builder = new ApplicationBuilder("dev", "/project");
  const pkg = builder.deploymentPackage();
  const policy = builder.autogenPolicy("default_policy");
  const role = builder.managedRole({ resourceName: "default_role", roleName: "app-dev", policy });
  const layer = builder.lambdaLayer({ resourceName: "managed-layer", layerName: "app-dev-deps", runtime: "nodejs20.x" });
  const fn = builder.lambdaFunction({
    resourceName: "worker",
    functionName: "app-dev-worker",
    runtime: "nodejs20.x",
    handler: "app.worker",
    role,
    deploymentPackage: pkg,
    managedLayer: layer,
  });
  const sqs = builder.sqsEvent({ resourceName: "worker-sqs", queue: "jobs", lambdaFunction: fn });
  const s3 = builder.s3Event({ resourceName: "worker-s3", bucket: "uploads", lambdaFunction: fn });
  return { app: await buildApplication(builder.build()), fn, role, sqs, s3, layer };
};

describe("RemoteState", () => {
  test("treats a missing function as absent", async () => {
    const { app, fn } = await fixture();
    const state = new RemoteState(new FakeCloudClient());
    expect(await state.exists(deref(app, fn))).toBe(false);
  });

  test("queries each resource once", async () => {
    const { app, fn } = await fixture();
    const client = new FakeCloudClient();
    client.functions.set("app-dev-worker", functionConfiguration({ functionName: "app-dev-worker" }));
    const state = new RemoteState(client);

    const lambda = deref(app, fn);
    expect(await state.exists(lambda)).toBe(true);
    expect(await state.exists(lambda)).toBe(true);
    const snapshot = await state.fetch(lambda);

    expect(snapshot.kind === "lambda_function" ? snapshot.config.functionArn : null).toBe(
      functionArnFor("app-dev-worker"),
    );
    expect(client.queries).toEqual(["getFunction:app-dev-worker"]);
  });

  test("reads a role together with its inline policy", async () => {
    const { app, role } = await fixture();
    const client = new FakeCloudClient();
    client.roles.set("app-dev", { roleName: "app-dev", roleArn: roleArnFor("app-dev"), trustPolicy: LAMBDA_TRUST_POLICY });
    const snapshot = await new RemoteState(client).fetch(deref(app, role));

    expect(snapshot).toEqual({
      kind: "iam_role",
      role: { roleName: "app-dev", roleArn: roleArnFor("app-dev"), trustPolicy: LAMBDA_TRUST_POLICY },
      policy: null,
    });
    expect(client.queries).toEqual(["getRole:app-dev", "getRolePolicy:app-dev:app-dev"]);
  });

  test("checks a recorded event source against the cloud", async () => {
    const { app, sqs } = await fixture();
    const client = new FakeCloudClient();
    client.eventSourcesCurrent = false;
    const deployed = new DeployedResources([
      {
        name: "worker-sqs",
        resource_type: "sqs_event",
        queue: "jobs",
        queue_arn: "arn:aws:sqs:us-west-2:123456789012:jobs",
        lambda_arn: functionArnFor("app-dev-worker"),
        event_uuid: "uuid-1",
      },
    ]);

    expect(await new RemoteState(client, deployed).exists(deref(app, sqs))).toBe(false);
    expect(client.queries).toEqual([
      `verifyEventSourceCurrent:uuid-1:jobs:${functionArnFor("app-dev-worker")}`,
    ]);
  });

  test("ignores an S3 record for another bucket", async () => {
    const { app, s3 } = await fixture();
    const deployed = new DeployedResources([
      { name: "worker-s3", resource_type: "s3_event", bucket: "old-bucket", lambda_arn: functionArnFor("x") },
    ]);
    expect(await new RemoteState(new FakeCloudClient(), deployed).exists(deref(app, s3))).toBe(false);
  });

  test("does not mistake a record of another type for the resource", async () => {
    const { app, s3 } = await fixture();
    const deployed = new DeployedResources([
      {
        name: "worker-s3",
        resource_type: "sqs_event",
        queue: "uploads",
        queue_arn: "arn:aws:sqs:us-west-2:123456789012:uploads",
        lambda_arn: functionArnFor("app-dev-worker"),
        event_uuid: "uuid-1",
      },
    ]);
    expect(await new RemoteState(new FakeCloudClient(), deployed).exists(deref(app, s3))).toBe(false);
  });

  describe("managed layers", () => {
    const arn = layerArnFor("app-dev-deps");
    const deployed = new DeployedResources([
      { name: "managed-layer", resource_type: "lambda_layer", layer_version_arn: arn, runtime: "nodejs20.x" },
    ]);

    test("reads the recorded layer version", async () => {
      const { app, layer } = await fixture();
      const client = new FakeCloudClient();
      client.layerVersions.set(arn, { layerVersionArn: arn, codeSha256: TEST_ARTIFACT.codeSha256 });

      const snapshot = await new RemoteState(client, deployed).fetch(deref(app, layer));

      expect(snapshot.kind === "lambda_layer" ? snapshot.version.codeSha256 : null).toBe(TEST_ARTIFACT.codeSha256);
      expect(client.queries).toEqual([`getLayerVersion:${arn}`]);
    });

    test("treats a deleted layer version as absent", async () => {
      const { app, layer } = await fixture();
      expect(await new RemoteState(new FakeCloudClient(), deployed).exists(deref(app, layer))).toBe(false);
    });
  });

  test("propagates errors other than not-found", async () => {
    const { app, fn } = await fixture();
    const client = new FakeCloudClient();
    client.getFunction = async () => {
      throw new Error("throttled");
    };
    await expect(new RemoteState(client).exists(deref(app, fn))).rejects.toThrow("throttled");
  });
});
