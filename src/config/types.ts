/**
 * Settings for a single ec2ctl invocation, resolved from environment and flags.
 */
export interface Ec2CtlConfig {
  awsCli: string;               // AWS CLI executable
  region?: string;              // Appended as --region when set
  profile?: string;             // Appended as --profile when set
  pollIntervalSeconds: number;  // Initial force-restart poll interval
  logFile?: string;             // JSON log destination
  verbose: boolean;
}

/**
 * Global command-line options; these win over the environment.
 * A type alias so it satisfies commander's OptionValues constraint.
 */
export type ConfigOverrides = {
  awsCli?: string;
  region?: string;
  profile?: string;
  verbose?: boolean;
};
