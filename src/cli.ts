#!/usr/bin/env node
import dotenv from "dotenv";
import { Command } from "commander";
import { applyOverrides, loadConfig } from "./lib/config";
import type { ConfigOverrides } from "./lib/config";
import { readDatasetSummary } from "./lib/dataset-assembler";
import { configureLogger, getLogger } from "./lib/logger";
import { runGenerator } from "./lib/run-generator";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("saas-funnel-synth")
    .description("Generate a synthetic SaaS funnel dataset (users, events, subscriptions)");

  program
    .command("generate", { isDefault: true })
    .description("Simulate user journeys and write users.csv, events.csv and subscriptions.csv")
    .option("-n, --users <count>", "Number of users to simulate")
    .option("-s, --seed <seed>", "Random seed")
    .option("-d, --lookback-days <days>", "Signup window in days before the reference time")
    .option("-o, --out <dir>", "Output directory")
    .option("--reference-time <iso>", "End of the signup window (ISO-8601); defaults to now")
    .action(async (options: ConfigOverrides) => {
      const config = loadConfig(applyOverrides(process.env, options));
      const logger = configureLogger(config.logLevel);
      await runGenerator(config, logger);
    });

  program
    .command("summarize <dir>")
    .description("Read a generated dataset back and report its funnel stats")
    .action(async (dir: string) => {
      const config = loadConfig(process.env);
      const logger = configureLogger(config.logLevel);
      const stats = await readDatasetSummary(dir);
      logger.info("Dataset summary", { dir, ...stats });
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  dotenv.config();
  await buildProgram().parseAsync(argv);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    getLogger().error("Dataset generation failed", err instanceof Error ? err : new Error(String(err)));
    process.exitCode = 1;
  });
}
