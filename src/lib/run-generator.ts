import { assembleDataset, writeDataset } from "./dataset-assembler";
import type { WrittenDataset } from "./dataset-assembler";
import { generateFunnelData } from "./funnel-synth-engine";
import type { FunnelOutputStats, FunnelSynthHooks } from "./funnel-synth-engine";
import type { AppConfig } from "./config";
import type { Logger } from "./logger";

export interface GeneratorRun {
  stats: FunnelOutputStats;
  written: WrittenDataset;
}

/** Logs roughly every tenth of the population. */
export function progressReporter(logger: Logger): (done: number, total: number) => void {
  return (done, total) => {
    const step = Math.max(1, Math.floor(total / 10));
    if (done % step === 0 || done === total) {
      logger.info("Simulating journeys", { done, total, pct: Math.round(done / total * 100) });
    }
  };
}

export async function runGenerator(
  config: AppConfig,
  logger: Logger,
  hooks: Omit<FunnelSynthHooks, "onProgress"> = {},
): Promise<GeneratorRun> {
  const log = logger.child({ seed: config.synth.seed });
  log.info("Generating SaaS funnel dataset", {
    users: config.synth.totalUsers,
    lookbackDays: config.synth.lookbackDays,
    referenceTime: new Date(config.synth.referenceTime).toISOString(),
  });

  const result = generateFunnelData(config.synth, { ...hooks, onProgress: progressReporter(log) });
  const written = await writeDataset(config.outputDir, assembleDataset(result));

  const { stats } = result;
  log.info("Dataset generated", {
    outputDir: written.outputDir,
    users: stats.users,
    events: stats.events,
    subscriptions: stats.subscriptions,
    paidConversionRatePct: stats.paidConversionRate,
  });
  log.debug("Event mix", stats.eventCounts);

  return { stats, written };
}
