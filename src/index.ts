#!/usr/bin/env node

import { Command } from "commander";
import * as dotenv from "dotenv";
import { createForceRestartCommand } from "./commands/forceRestart";
import { createGetCommand } from "./commands/get";
import { createNameToIdCommand } from "./commands/nameToId";

dotenv.config();

// CLI Entrypoint
const program = new Command();
program
  .name("ec2ctl")
  .version("1.0.0")
  .description("Locate, describe and force-restart EC2 instances through the AWS CLI")
  .option("-v, --verbose", "Enable verbose logging")
  .option("--region <region>", "AWS region passed to every AWS CLI call")
  .option("--profile <profile>", "AWS CLI profile passed to every AWS CLI call")
  .option("--aws-cli <path>", "AWS CLI executable (default: aws)");

program.addCommand(createNameToIdCommand());
program.addCommand(createGetCommand());
program.addCommand(createForceRestartCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
