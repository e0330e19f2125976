import { INITIAL_POLL_INTERVAL_SECONDS } from "../services/restart";
import { ConfigurationError } from "../utils/errors";
import { ConfigOverrides, Ec2CtlConfig } from "./types";

/**
 * Treats empty strings as unset.
 */
function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseFlag(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

function parsePollInterval(value: string | undefined): number {
  const raw = optional(value);
  if (raw === undefined) {
    return INITIAL_POLL_INTERVAL_SECONDS;
  }
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(
      `EC2CTL_POLL_INTERVAL must be a positive number of seconds, got "${raw}"`
    );
  }
  return seconds;
}

/**
 * Resolves the invocation config. Flags override environment variables.
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {}
): Ec2CtlConfig {
  return {
    awsCli: optional(overrides.awsCli) ?? optional(env.EC2CTL_AWS_CLI) ?? "aws",
    region: optional(overrides.region) ?? optional(env.EC2CTL_REGION),
    profile: optional(overrides.profile) ?? optional(env.EC2CTL_PROFILE),
    pollIntervalSeconds: parsePollInterval(env.EC2CTL_POLL_INTERVAL),
    logFile: optional(env.EC2CTL_LOG_FILE),
    verbose: overrides.verbose ?? parseFlag(env.EC2CTL_VERBOSE),
  };
}
