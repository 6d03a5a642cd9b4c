import { UnknownBuiltinError } from "./errors.js";

export type SessionInfo = {
  readonly region: string;
  readonly partition: string;
  readonly dnsSuffix: string;
};

export type ParsedArn = {
  readonly partition: string;
  readonly service: string;
  readonly region: string;
  readonly account_id: string;
  readonly dns_suffix: string;
};

const PARTITION_DNS_SUFFIXES: Readonly<Record<string, string>> = {
  aws: "amazonaws.com",
  "aws-cn": "amazonaws.com.cn",
  "aws-iso": "c2s.ic.gov",
  "aws-iso-b": "sc2s.sgov.gov",
  "aws-us-gov": "amazonaws.com",
};

export const dnsSuffixForPartition = (partition: string): string =>
  PARTITION_DNS_SUFFIXES[partition] ?? "amazonaws.com";

export function parseArn(arn: string): ParsedArn {
  const parts = arn.split(":");
  const partition = parts[1] ?? "";
  return {
    partition,
    service: parts[2] ?? "",
    region: parts[3] ?? "",
    account_id: parts[4] ?? "",
    dns_suffix: dnsSuffixForPartition(partition),
  };
}

const US_ISO_EXCEPTIONS = new Set(["cloudhsm", "config", "states", "workspaces"]);
const US_ISOB_EXCEPTIONS = new Set(["dms", "states"]);

const SERVICE_NAME = /^([^.]+)(?:(?:\.amazonaws\.com(?:\.cn)?)|(?:\.c2s\.ic\.gov)|(?:\.sc2s\.sgov\.gov))?$/;

/**
 * Computes the principal a service uses to assume roles or invoke functions
 * in the given region. Anything that does not look like a service name or
 * service host is returned as given.
 */
export function servicePrincipal(service: string, region = "us-east-1", urlSuffix = "amazonaws.com"): string {
  const match = SERVICE_NAME.exec(service);
  const name = match?.[1];
  if (name === undefined) {
    return service;
  }

  const isoException =
    (region.startsWith("us-iso-") && US_ISO_EXCEPTIONS.has(name)) ||
    (region.startsWith("us-isob-") && US_ISOB_EXCEPTIONS.has(name));
  if (isoException) {
    return name === "states" ? `${name}.amazonaws.com` : `${name}.${urlSuffix}`;
  }

  switch (name) {
    case "codedeploy":
    case "logs":
      return `${name}.${region}.${urlSuffix}`;
    case "states":
      return `${name}.${region}.amazonaws.com`;
    case "ec2":
      return `${name}.${urlSuffix}`;
    default:
      return `${name}.amazonaws.com`;
  }
}

const stringArg = (args: readonly unknown[], index: number, fallback?: string): string => {
  const value = args[index];
  if (typeof value === "string") {
    return value;
  }
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected a string for argument ${index}, got ${String(value)}`);
};

/**
 * Runs one of the fixed set of builtin functions on already resolved
 * arguments.
 */
export function callBuiltin(name: string, args: readonly unknown[], session: SessionInfo): unknown {
  switch (name) {
    case "parse_arn":
      return parseArn(stringArg(args, 0));
    case "interrogate_profile":
      return {
        partition: session.partition,
        region: session.region,
        dns_suffix: session.dnsSuffix,
      };
    case "service_principal":
      return servicePrincipal(
        stringArg(args, 0),
        stringArg(args, 1, session.region),
        stringArg(args, 2, session.dnsSuffix),
      );
    default:
      throw new UnknownBuiltinError(name);
  }
}
