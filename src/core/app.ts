/**
 * Main pipeline orchestrator
 */
import { rm, stat } from 'fs/promises';
import chalk from 'chalk';
import { resolvePaths } from './config.js';
import { configurationError, describeError, toolError, type PipelineError } from './errors.js';
import type { Result } from './result.js';
import { splitByPort } from './splitter.js';
import { buildTargetList, resolveTargetSpec } from './targets.js';
import { extractTitles, FileReportSink } from './titles.js';
import { MasscanRunner, type Scanner } from '../tools/masscan.js';
import { ZgrabRunner, type Grabber } from '../tools/zgrab.js';
import { executeConcurrentSettled } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import type {
  PipelineConfig,
  PipelinePaths,
  PipelineSummary,
  SplitSummary,
  TargetListSummary,
  WebPort,
} from './types.js';

/**
 * Replaceable external tools, mainly for tests
 */
export interface PipelineTools {
  scanner?: Scanner;
  grabber?: Grabber;
}

interface PortStage {
  port: WebPort;
  ips: string;
  grabOutput: string;
  count: number;
}

function unwrap<T>(result: Result<T, PipelineError>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Runs list build → scan → split → grab per port → title report, in that
 * order. The first fatal error aborts the run; files already written stay.
 */
export class Pipeline {
  readonly paths: PipelinePaths;
  private config: PipelineConfig;
  private scanner: Scanner;
  private grabber: Grabber;

  constructor(config: PipelineConfig, tools: PipelineTools = {}) {
    this.config = config;
    this.paths = resolvePaths(config.workdir, config.output);
    this.scanner =
      tools.scanner ??
      new MasscanRunner({ explicitPath: config.masscanPath, binDir: this.paths.binDir });
    this.grabber =
      tools.grabber ?? new ZgrabRunner({ explicitPath: config.zgrabPath, binDir: this.paths.binDir });

    // Configure logger
    logger.setQuiet(config.quiet);
    logger.setLevel(config.verbose ? 'debug' : 'info');
  }

  /**
   * Run the complete workflow
   */
  async run(): Promise<PipelineSummary> {
    const startTime = new Date();

    // Step 1: Target list
    logger.info(chalk.cyan.bold('Step 1/4') + chalk.cyan('  Preparing target list...'));
    const targets = await this.prepareTargets();

    await this.checkTools();

    // Step 2: Port scan
    logger.info(chalk.cyan.bold('Step 2/4') + chalk.cyan('  Scanning for open ports...'));
    const split = await this.scan();

    // Step 3: Grab
    logger.info(chalk.cyan.bold('Step 3/4') + chalk.cyan('  Grabbing web pages...'));
    const stages = this.portStages(split);
    await this.grab(stages);

    // Step 4: Report
    logger.info(chalk.cyan.bold('Step 4/4') + chalk.cyan('  Extracting titles...'));
    const report = await this.writeReport(stages);

    const endTime = new Date();
    logger.success(`Report written to ${this.paths.report}`);

    return {
      targetKind: targets.kind,
      rangesWritten: targets.rangesWritten,
      open80: split.open80,
      open443: split.open443,
      reportLines: report.lines,
      noBody: report.noBody,
      report: this.paths.report,
      durationMs: endTime.getTime() - startTime.getTime(),
    };
  }

  /**
   * Resolve the input and write the canonical list file
   */
  async prepareTargets(): Promise<TargetListSummary> {
    const spec = unwrap(
      await resolveTargetSpec(this.config.input, {
        listMode: this.config.listMode,
        country: this.config.country,
      })
    );
    logger.debug(`Input ${this.config.input} treated as ${spec.kind} target`);

    const result = await buildTargetList(spec, this.paths.list);
    if (!result.ok) {
      logger.error('Failed to prepare list file for the scanner.');
      throw result.error;
    }
    return result.value;
  }

  private async checkTools(): Promise<void> {
    if (!(await this.scanner.isAvailable())) {
      throw configurationError(
        `${this.scanner.name} is required. Install it on PATH, in ${this.paths.binDir}, or pass --masscan <path>.`
      );
    }
    if (!(await this.grabber.isAvailable())) {
      throw configurationError(
        `${this.grabber.name} is required. Install it on PATH, in ${this.paths.binDir}, or pass --zgrab <path>.`
      );
    }
  }

  private async scan(): Promise<SplitSummary> {
    let code: number;
    try {
      code = await this.scanner.scan({
        ports: this.config.ports,
        rate: this.config.rate,
        list: this.paths.list,
        output: this.paths.scanOutput,
      });
    } catch (error) {
      throw toolError(`${this.scanner.name} could not be started: ${describeError(error)}`, error);
    }
    if (code !== 0) {
      throw toolError(`${this.scanner.name} failed. You may need elevated privileges.`);
    }

    return unwrap(await splitByPort(this.paths.scanOutput, this.paths.open80, this.paths.open443));
  }

  private portStages(split: SplitSummary): PortStage[] {
    return [
      { port: '80', ips: this.paths.open80, grabOutput: this.paths.grab80, count: split.open80 },
      { port: '443', ips: this.paths.open443, grabOutput: this.paths.grab443, count: split.open443 },
    ];
  }

  /**
   * Grab every port with at least one open IP. A failed grab only costs
   * that port's report lines.
   */
  private async grab(stages: PortStage[]): Promise<void> {
    // Outputs from a previous run must not leak into this report
    await Promise.all(stages.map((stage) => rm(stage.grabOutput, { force: true })));

    const active = stages.filter((stage) => stage.count > 0);
    for (const stage of stages) {
      if (stage.count === 0) {
        logger.info(`No open port ${stage.port} IPs, skipping ${this.grabber.name}`);
      }
    }

    const outcomes = await executeConcurrentSettled(
      active.map(
        (stage) => () =>
          this.grabber.grab({ port: stage.port, input: stage.ips, output: stage.grabOutput })
      ),
      this.config.parallelGrab ? active.length : 1
    );

    outcomes.forEach((outcome, i) => {
      const { port } = active[i];
      if (outcome.status === 'rejected') {
        logger.warn(`${this.grabber.name} failed for port ${port}: ${describeError(outcome.reason)}`);
      } else if (outcome.value !== 0) {
        logger.warn(`${this.grabber.name} failed for port ${port} (exit code ${outcome.value})`);
      }
    });
  }

  /**
   * Truncate the report and append titles for port 80, then port 443
   */
  private async writeReport(stages: PortStage[]): Promise<{ lines: number; noBody: number }> {
    const sink = unwrap(await FileReportSink.open(this.paths.report));
    const totals = { lines: 0, noBody: 0 };

    try {
      for (const stage of stages) {
        if (!(await exists(stage.grabOutput))) {
          continue;
        }
        const summary = unwrap(await extractTitles(stage.grabOutput, sink));
        totals.lines += summary.lines;
        totals.noBody += summary.noBody;
      }
    } finally {
      await sink.close();
    }

    return totals;
  }
}
