import { err, ok, type Result } from "neverthrow";
import { ApplicationBuilder } from "./application.js";
import { BuildStage, defaultBuildSteps, type Packager } from "./build.js";
import type { SessionInfo } from "./builtins.js";
import type { CloudClient } from "./client.js";
import type { ResolvedStageConfig } from "./config.js";
import { readDeployedResources } from "./deployed.js";
import type { DeployError } from "./errors.js";
import { Executor, type ResourceValues } from "./executor.js";
import { orderResources } from "./graph.js";
import type { Plan } from "./instructions.js";
import type { Application } from "./models.js";
import { NoopPlanner, PlanStage, type Planner } from "./planner.js";
import { recordResults } from "./recorder.js";
import { RemoteState } from "./remote-state.js";
import { sweep } from "./sweeper.js";
import type { UI } from "./ui.js";

export type DeployerOptions = {
  readonly client: CloudClient;
  readonly ui: UI;
  readonly session: SessionInfo;
  readonly buildStage: BuildStage;
  readonly planner: (remoteState: RemoteState) => Planner;
};

export type DeployResult = {
  readonly resources: readonly ResourceValues[];
  readonly statePath: string;
};

/**
 * Runs one deploy attempt for a stage: order, build, plan, sweep, execute,
 * record. Cloud API failures reject; nothing is recorded for a failed run.
 */
export class Deployer {
  constructor(private readonly options: DeployerOptions) {}

  async plan(app: Application<"declared">): Promise<Result<Plan, DeployError>> {
    const ordered = orderResources(app);
    const built = await this.options.buildStage.execute(app, ordered);
    if (built.isErr()) {
      return err(built.error);
    }

    const deployed = await readDeployedResources(app.projectDir, app.stage);
    if (deployed.isErr()) {
      return err(deployed.error);
    }

    const remoteState = new RemoteState(this.options.client, deployed.value);
    const plan = await this.options.planner(remoteState).plan(built.value, orderResources(built.value));
    return ok(sweep(plan, deployed.value));
  }

  async deploy(app: Application<"declared">): Promise<Result<DeployResult, DeployError>> {
    const plan = await this.plan(app);
    if (plan.isErr()) {
      return err(plan.error);
    }

    const executor = new Executor(this.options.client, this.options.ui, this.options.session);
    await executor.execute(plan.value);

    const resources = executor.resourceValues;
    const statePath = await recordResults(resources, app.stage, app.projectDir);
    if (statePath.isErr()) {
      return err(statePath.error);
    }
    return ok({ resources, statePath: statePath.value });
  }
}

export type DefaultDeployerOptions = {
  readonly client: CloudClient;
  readonly ui: UI;
  readonly session: SessionInfo;
  readonly packager: Packager;
  readonly config: ResolvedStageConfig;
};

export const createDefaultDeployer = (options: DefaultDeployerOptions): Deployer =>
  new Deployer({
    client: options.client,
    ui: options.ui,
    session: options.session,
    buildStage: new BuildStage(defaultBuildSteps(options.packager, options.config)),
    planner: (remoteState) => new PlanStage(remoteState),
  });

export const createDeletionDeployer = (options: Omit<DefaultDeployerOptions, "packager" | "config">): Deployer =>
  new Deployer({
    client: options.client,
    ui: options.ui,
    session: options.session,
    buildStage: new BuildStage([]),
    planner: () => new NoopPlanner(),
  });

/** Removes every resource recorded for a stage. */
export const deleteStage = (
  deployer: Deployer,
  stage: string,
  projectDir: string,
): Promise<Result<DeployResult, DeployError>> => deployer.deploy(new ApplicationBuilder(stage, projectDir).build());
