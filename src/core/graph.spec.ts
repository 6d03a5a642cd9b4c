import { describe, expect, test } from "vitest";
import { ApplicationBuilder } from "./application.js";
import { DanglingReferenceError } from "./errors.js";
import { orderResources } from "./graph.js";
import { dependencies, type Application, type Resource } from "./models.js";

const names = (resources: readonly Resource<"declared">[]): readonly string[] =>
  resources.map((resource) => resource.resourceName);

describe("orderResources", () => {
  test("returns nothing for an empty application", () => {
    const app = new ApplicationBuilder("dev", "/project").build();
    expect(orderResources(app)).toEqual([]);
  });

  test("puts dependencies before dependents", () => {
    const builder = new ApplicationBuilder("dev", "/project");
    const pkg = builder.deploymentPackage();
    const policy = builder.autogenPolicy("default_policy");
    const role = builder.managedRole({ resourceName: "default_role", roleName: "app-dev", policy });
    builder.lambdaFunction({
      resourceName: "api_handler",
      functionName: "app-dev",
      runtime: "nodejs20.x",
      handler: "app.handler",
      role,
      deploymentPackage: pkg,
    });

    expect(names(orderResources(builder.build()))).toEqual([
      "default_policy",
      "default_role",
      "deployment_package",
      "api_handler",
    ]);
  });

  test("orders a managed layer and its package ahead of the function", () => {
    const builder = new ApplicationBuilder("dev", "/project");
    const layer = builder.lambdaLayer({ resourceName: "managed-layer", layerName: "app-dev-deps", runtime: "nodejs20.x" });
    builder.lambdaFunction({
      resourceName: "api_handler",
      functionName: "app-dev",
      runtime: "nodejs20.x",
      handler: "app.handler",
      role: builder.precreatedRole("default_role", "arn:aws:iam::123456789012:role/precreated"),
      deploymentPackage: builder.deploymentPackage(),
      managedLayer: layer,
    });

    expect(names(orderResources(builder.build()))).toEqual([
      "managed-layer_deployment_package",
      "managed-layer",
      "default_role",
      "deployment_package",
      "api_handler",
    ]);
  });

  test("emits shared dependencies once", () => {
    const builder = new ApplicationBuilder("dev", "/project");
    const pkg = builder.deploymentPackage();
    const role = builder.precreatedRole("shared_role", "arn:aws:iam::123456789012:role/shared");
    for (const name of ["first", "second"]) {
      builder.lambdaFunction({
        resourceName: name,
        functionName: `app-dev-${name}`,
        runtime: "nodejs20.x",
        handler: "app.handler",
        role,
        deploymentPackage: pkg,
      });
    }

    expect(names(orderResources(builder.build()))).toEqual(["shared_role", "deployment_package", "first", "second"]);
  });

  test("every dependency comes strictly before its dependent", () => {
    const builder = new ApplicationBuilder("dev", "/project");
    const pkg = builder.deploymentPackage();
    const role = builder.precreatedRole("role", "arn:aws:iam::123456789012:role/r");
    const fn = builder.lambdaFunction({
      resourceName: "worker",
      functionName: "app-dev-worker",
      runtime: "nodejs20.x",
      handler: "app.worker",
      role,
      deploymentPackage: pkg,
    });
    builder.snsEvent({ resourceName: "worker-sns", topic: "updates", lambdaFunction: fn });
    builder.sqsEvent({ resourceName: "worker-sqs", queue: "jobs", lambdaFunction: fn });

    const ordered = orderResources(builder.build());
    const position = new Map(ordered.map((resource, index) => [resource.id, index]));
    for (const resource of ordered) {
      for (const dependency of dependencies(resource)) {
        expect(position.get(dependency.id)).toBeLessThan(position.get(resource.id) ?? -1);
      }
    }
    expect(ordered).toHaveLength(5);
  });

  test("throws on a reference to a missing resource", () => {
    const app: Application<"declared"> = {
      stage: "dev",
      projectDir: "/project",
      roots: [{ id: 7, kind: "lambda_function" }],
      resources: new Map(),
    };
    expect(() => orderResources(app)).toThrow(DanglingReferenceError);
  });
});
