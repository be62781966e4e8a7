#!/usr/bin/env node
// consensus/semantic-bft/cli/semantic-bft-cli.ts
// Command-line runner for single-network, multi-domain and sweep simulations

import * as dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import winston from 'winston';
import { LOG_LEVELS, loadConfig } from '../core/config/config-manager';
import { SimulationOrchestrator } from '../integration/simulation-orchestrator';
import { SimulationMonitor } from '../monitoring/simulation-monitor';
import { createLogger, resolveLogLevel } from '../monitoring/logger';
import { DomainMetrics, Metrics, MetricsSummary } from '../analytics/performance-analytics';

dotenv.config();

interface CommonArgs {
  config?: string;
  'log-level'?: string;
  metrics: boolean;
}

function setup(argv: CommonArgs): { logger: winston.Logger; monitor: SimulationMonitor; orchestrator: SimulationOrchestrator } {
  const config = loadConfig(argv.config);
  const logger = createLogger({ ...config.logging, level: resolveLogLevel(argv['log-level'], config.logging.level) });
  const monitor = new SimulationMonitor(logger);
  const orchestrator = new SimulationOrchestrator({ configPath: argv.config, logger, monitor });
  return { logger, monitor, orchestrator };
}

function reportMetrics(logger: winston.Logger, metrics: Metrics): void {
  logger.info(`Created transactions:    ${metrics.createdTransactions}`);
  logger.info(`Confirmed transactions:  ${metrics.confirmedTransactions}`);
  logger.info(`Node finalizations:      ${metrics.nodeFinalizations}`);
  logger.info(`Mean latency:            ${metrics.meanLatency.toFixed(4)} ± ${metrics.stdLatency.toFixed(4)}`);
  logger.info(`Message overhead:        ${metrics.messageOverhead}`);
  logger.info(`Malformed detected:      ${metrics.malformedDetected}`);
  logger.info(`False positive rate:     ${metrics.falsePositiveRate.toFixed(2)}%`);
  logger.info(`Throughput:              ${metrics.throughput.toFixed(3)} tx/unit`);
}

function reportSummary(logger: winston.Logger, label: string, summary: MetricsSummary): void {
  logger.info(
    `${label} confirmed=${summary.confirmedTransactions.mean.toFixed(1)}±${summary.confirmedTransactions.std.toFixed(1)} ` +
    `malformed=${summary.malformedDetected.mean.toFixed(1)}±${summary.malformedDetected.std.toFixed(1)} ` +
    `fpr=${summary.falsePositiveRate.mean.toFixed(2)}% ` +
    `latency=${summary.meanLatency.mean.toFixed(4)}`
  );
}

function reportDomains(logger: winston.Logger, metrics: DomainMetrics): void {
  logger.info(`Cross-domain sync ${metrics.enableCrossDomainSync ? 'enabled' : 'disabled'}: ${metrics.totalEvents} events`);
  for (const domain of metrics.domains) {
    logger.info(
      `${domain.name.padEnd(12)} CDFT ${domain.cdftMean.toFixed(3)} ± ${domain.cdftStd.toFixed(3)} ` +
      `(${domain.cdftSamples} samples; ${domain.cdftAttemptMean.toFixed(3)} over all ${domain.cdftAttemptSamples}) intra=${domain.intraBandwidth}B inter=${domain.interBandwidth}B`
    );
  }
  logger.info(`Interoperability overhead: ${metrics.interoperabilityOverhead}B over ${metrics.syncEvents} syncs`);
}

async function printMetrics(argv: CommonArgs, monitor: SimulationMonitor): Promise<void> {
  if (argv.metrics) {
    process.stdout.write(await monitor.getMetricsText());
  }
}

yargs(hideBin(process.argv))
  .scriptName('semantic-bft')
  .usage('$0 <command> [options]')
  .option('config', {
    type: 'string',
    description: 'Path to a simulator YAML configuration.'
  })
  .option('log-level', {
    type: 'string',
    choices: LOG_LEVELS,
    description: 'Override the configured log level.'
  })
  .option('metrics', {
    type: 'boolean',
    default: false,
    description: 'Print Prometheus exposition text after the run.'
  })
  .command(
    'run',
    'Simulate a single network of semantic-verifying nodes.',
    (cmd) =>
      cmd
        .option('nodes', { alias: 'n', type: 'number', default: 100, description: 'Node count.' })
        .option('adversarial', { alias: 'a', type: 'number', default: 0.1, description: 'Adversarial fraction.' })
        .option('rounds', { alias: 'r', type: 'number', default: 50, description: 'Rounds to simulate.' })
        .option('seed', { type: 'number', default: 42, description: 'Random seed.' })
        .option('seeds', { type: 'array', number: true, description: 'Repeat the run over several seeds.' }),
    async (argv) => {
      const { logger, monitor, orchestrator } = setup(argv);
      const options = { nodeCount: argv.nodes, adversarialFraction: argv.adversarial, rounds: argv.rounds };

      if (argv.seeds && argv.seeds.length > 0) {
        const { runs, summary } = await orchestrator.runSeeds(options, argv.seeds.map(Number));
        for (const entry of runs) {
          logger.info(`seed ${entry.seed}: ${entry.metrics.confirmedTransactions}/${entry.metrics.createdTransactions} confirmed`);
        }
        reportSummary(logger, `${runs.length} seeds`, summary);
      } else {
        reportMetrics(logger, await orchestrator.run({ ...options, seed: argv.seed }));
      }
      await printMetrics(argv, monitor);
    }
  )
  .command(
    'multi-domain',
    'Simulate urban, interurban and rural domains with cross-domain finality.',
    (cmd) =>
      cmd
        .option('domains', { type: 'number', default: 3, description: 'Domain count.' })
        .option('vehicles', { type: 'number', default: 100, description: 'Vehicles per domain.' })
        .option('duration', { alias: 'd', type: 'number', default: 120, description: 'Simulated duration.' })
        .option('sync', { type: 'boolean', default: true, description: 'Enable semantic synchronization.' })
        .option('compare', { type: 'boolean', default: false, description: 'Run with and without synchronization.' })
        .option('seed', { type: 'number', default: 42, description: 'Random seed.' }),
    async (argv) => {
      const { logger, monitor, orchestrator } = setup(argv);
      const modes = argv.compare ? [true, false] : [argv.sync];

      for (const enableCrossDomainSync of modes) {
        const metrics = await orchestrator.runMultiDomain({
          domainCount: argv.domains,
          vehiclesPerDomain: argv.vehicles,
          duration: argv.duration,
          enableCrossDomainSync,
          seed: argv.seed
        });
        reportDomains(logger, metrics);
      }
      await printMetrics(argv, monitor);
    }
  )
  .command(
    'sweep',
    'Measure detection and false positives across adversarial fractions.',
    (cmd) =>
      cmd
        .option('fractions', { type: 'array', number: true, default: [0, 0.1, 0.2, 0.3], description: 'Adversarial fractions.' })
        .option('nodes', { alias: 'n', type: 'number', default: 100, description: 'Node count.' })
        .option('rounds', { alias: 'r', type: 'number', default: 20, description: 'Rounds per run.' })
        .option('seeds', { type: 'array', number: true, default: [1, 2, 3], description: 'Seeds per fraction.' }),
    async (argv) => {
      const { logger, monitor, orchestrator } = setup(argv);
      const points = await orchestrator.sweepAdversarialFractions(
        argv.fractions.map(Number),
        { nodeCount: argv.nodes, rounds: argv.rounds },
        argv.seeds.map(Number)
      );
      for (const point of points) {
        reportSummary(logger, `${(point.adversarialFraction * 100).toFixed(0)}% adversarial:`, point.summary);
      }
      await printMetrics(argv, monitor);
    }
  )
  .demandCommand(1)
  .strict()
  .help()
  .parseAsync()
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`semantic-bft: ${message}\n`);
    process.exitCode = 1;
  });
