import { ok, err, type Result } from "neverthrow";
import { z } from "zod";
import * as fs from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { DEFAULT_LAMBDA_MEMORY_SIZE, DEFAULT_LAMBDA_TIMEOUT, type LambdaDefaults } from "./build.js";
import { STATE_DIR } from "./deployed.js";
import type { DeployError } from "./errors.js";

const StageConfigSchema = z.object({
  lambdaTimeout: z.number().int().positive().optional(),
  lambdaMemorySize: z.number().int().positive().optional(),
  region: z.string().min(1).optional(),
});

const ProjectConfigSchema = z.object({
  appName: z.string().min(1),
  lambdaTimeout: z.number().int().positive().optional(),
  lambdaMemorySize: z.number().int().positive().optional(),
  region: z.string().min(1).optional(),
  stages: z.record(z.string(), StageConfigSchema).optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type StageConfig = z.infer<typeof StageConfigSchema>;

export type ResolvedStageConfig = LambdaDefaults & {
  readonly appName: string;
  readonly stage: string;
  readonly region: string | null;
};

export const configPath = (projectDir: string): string => join(projectDir, STATE_DIR, "config.json");

export const readConfig = async (path: string): Promise<Result<ProjectConfig, DeployError>> => {
  if (!existsSync(path)) {
    return err({ kind: "config", field: "path", message: `Config file not found: ${path}` });
  }

  const text = await fs.readFile(path, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err({ kind: "config", field: "root", message: `Invalid JSON: ${String(error)}` });
  }

  return parseConfig(parsed);
};

export const parseConfig = (parsed: unknown): Result<ProjectConfig, DeployError> => {
  const result = ProjectConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (issue !== undefined) {
      return err({ kind: "config", field: issue.path.join(".") || "root", message: issue.message });
    }
    return err({ kind: "config", field: "root", message: "Invalid config" });
  }
  return ok(result.data);
};

/** Stage settings override project settings, which override the defaults. */
export const resolveStageConfig = (config: ProjectConfig, stage: string): ResolvedStageConfig => {
  const stageConfig: StageConfig = config.stages?.[stage] ?? {};
  return {
    appName: config.appName,
    stage,
    lambdaTimeout: stageConfig.lambdaTimeout ?? config.lambdaTimeout ?? DEFAULT_LAMBDA_TIMEOUT,
    lambdaMemorySize: stageConfig.lambdaMemorySize ?? config.lambdaMemorySize ?? DEFAULT_LAMBDA_MEMORY_SIZE,
    region: stageConfig.region ?? config.region ?? null,
  };
};
