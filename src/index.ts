// Resource model
export type {
  Stage,
  Late,
  Resolved,
  Slot,
  Ref,
  ResourceKind,
  ManagedKind,
  PolicyDocument,
  PolicyStatement,
  PolicyTraits,
  Artifact,
  ApiDocument,
  CorsConfig,
  Route,
  EndpointType,
  StartingPosition,
  PackageType,
  LambdaFunction,
  LambdaLayer,
  ManagedIamRole,
  PreCreatedIamRole,
  AutoGenIamPolicy,
  FileBasedIamPolicy,
  DeploymentPackage,
  RestApi,
  ScheduledEvent,
  CloudWatchEvent,
  S3Event,
  SnsEvent,
  SqsEvent,
  KinesisEvent,
  DynamoDBEvent,
  Resource,
  ResourceOfKind,
  ManagedResource,
  Application,
} from "./core/models.js";
export { Pending, pending, resolved, late, dependencies, deref, isManaged } from "./core/models.js";
export { ApplicationBuilder } from "./core/application.js";
export type { LambdaFunctionProps, RestApiProps, RouteProps } from "./core/application.js";
export { LAMBDA_TRUST_POLICY, generatePolicy } from "./core/policy.js";
export { generateApiDocument } from "./core/swagger.js";

// Pipeline
export { orderResources } from "./core/graph.js";
export {
  BuildStage,
  defaultBuildSteps,
  finalizeResource,
  injectDefaults,
  packageDeployments,
  generatePolicies,
  generateApiDocuments,
} from "./core/build.js";
export type { BuildStep, BuildContext, Packager, LambdaDefaults } from "./core/build.js";
export { RemoteState } from "./core/remote-state.js";
export type { ResourceSnapshot } from "./core/remote-state.js";
export { PlanStage, NoopPlanner } from "./core/planner.js";
export type { Planner, Deferred } from "./core/planner.js";
export { sweep } from "./core/sweeper.js";
export { Executor } from "./core/executor.js";
export type { ResourceValues } from "./core/executor.js";
export { Deployer, createDefaultDeployer, createDeletionDeployer, deleteStage } from "./core/deployer.js";
export type { DeployerOptions, DeployResult } from "./core/deployer.js";

// Instructions
export {
  Variable,
  StringFormat,
  KeyDataVariable,
  PlanBuilder,
  emptyPlan,
  apiCall,
  storeValue,
  storeMultipleValue,
  copyVariable,
  copyVariableFromDict,
  recordVariable,
  recordValue,
  jpSearch,
  builtin,
} from "./core/instructions.js";
export type { Instruction, Plan, BuiltinName } from "./core/instructions.js";
export { resolveVariables } from "./core/variables.js";
export { callBuiltin, parseArn, servicePrincipal } from "./core/builtins.js";
export type { SessionInfo } from "./core/builtins.js";

// State, config and reporting
export { DeployedResources, readDeployedResources, parseDeployedState, deployedStatePath } from "./core/deployed.js";
export type { DeploymentRecord } from "./core/deployed.js";
export { recordResults } from "./core/recorder.js";
export { generateReport, formatPlan } from "./core/reporter.js";
export { readConfig, parseConfig, resolveStageConfig, configPath } from "./core/config.js";
export type { ProjectConfig, ResolvedStageConfig } from "./core/config.js";
export { consoleUI, bufferUI } from "./core/ui.js";
export type { UI } from "./core/ui.js";

// Client contract and errors
export { API_METHODS, ResourceNotFoundError } from "./core/client.js";
export type { ApiMethodName, ApiMethods, CloudClient, FunctionConfiguration, LayerVersion, RemoteQueries, RoleDescription } from "./core/client.js";
export {
  formatDeployError,
  UnresolvedValueError,
  UnknownBuiltinError,
  UnknownVariableError,
  UnknownResourceTypeError,
  InvalidRecordError,
  DanglingReferenceError,
} from "./core/errors.js";
export type { DeployError } from "./core/errors.js";
