import { z } from "zod";
import type { PolicyDocument, PolicyStatement, PolicyTraits } from "./models.js";

export const POLICY_VERSION = "2012-10-17";

export const LAMBDA_TRUST_POLICY: PolicyDocument = {
  Version: POLICY_VERSION,
  Statement: [
    {
      Sid: "",
      Effect: "Allow",
      Principal: { Service: "lambda.amazonaws.com" },
      Action: "sts:AssumeRole",
    },
  ],
};

const CLOUDWATCH_LOGS: PolicyStatement = {
  Effect: "Allow",
  Action: ["logs:CreateLogGroup", "logs:CreateLogStream", "logs:PutLogEvents"],
  Resource: "arn:*:logs:*:*:*",
};

const VPC_ATTACH: PolicyStatement = {
  Effect: "Allow",
  Action: [
    "ec2:CreateNetworkInterface",
    "ec2:DescribeNetworkInterfaces",
    "ec2:DetachNetworkInterface",
    "ec2:DeleteNetworkInterface",
  ],
  Resource: "*",
};

const XRAY: PolicyStatement = {
  Effect: "Allow",
  Action: ["xray:PutTraceSegments", "xray:PutTelemetryRecords"],
  Resource: "*",
};

export function generatePolicy(traits: PolicyTraits): PolicyDocument {
  const statements: PolicyStatement[] = [CLOUDWATCH_LOGS];
  if (traits.vpc) {
    statements.push(VPC_ATTACH);
  }
  if (traits.xray) {
    statements.push(XRAY);
  }
  return { Version: POLICY_VERSION, Statement: statements };
}

const StringOrListSchema = z.union([z.string(), z.array(z.string())]);

const PolicyStatementSchema = z.object({
  Sid: z.string().optional(),
  Effect: z.enum(["Allow", "Deny"]),
  Principal: z.record(z.string(), z.string()).optional(),
  Action: StringOrListSchema,
  Resource: StringOrListSchema.optional(),
});

export const PolicyDocumentSchema = z.object({
  Version: z.string(),
  Statement: z.array(PolicyStatementSchema),
});
