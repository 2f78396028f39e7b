/**
 * Fresh wallet screener
 *
 * Usage:
 *   npm run screen -- [--lookback-days 7] [--max-trades 5000] [--min-bet 1000]
 *                     [--min-balance 50000] [--conviction 0.1] [--require-fresh]
 *                     [--check-prior-trades]
 *                     [--csv out/signals.csv] [--json out/signals.json]
 */

import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { type EnvSource, initializeEnv, screeningConfigFromEnv } from "../config/env";
import { DEFAULT_MAX_TRADES, DEFAULT_PAGE_SIZE } from "./api/data";
import type { ScreeningConfig } from "./detection/screening-config";
import { renderConsoleReport, writeCsvReport, writeJsonReport } from "./report";
import {
  type ScreeningRunDependencies,
  createLiveDependencies,
  runScreening,
} from "./services/screening-run";
import { ConfigurationError, describeError } from "./utils/errors";
import { type Logger, logger } from "./utils/logger";

export interface CliOptions {
  overrides: Partial<ScreeningConfig>;
  maxTrades?: number;
  csvPath?: string;
  jsonPath?: string;
  help: boolean;
}

export const USAGE = `Usage: screen [options]

  --lookback-days <n>   Days of trades to fetch
  --max-trades <n>      Cap on trades fetched
  --min-bet <usd>       Minimum first-bet amount
  --min-balance <usd>   Balance needed for the WEAK tier
  --conviction <ratio>  Conviction ratio needed for STRONG/MEDIUM
  --require-fresh       Reject wallets with prior on-chain activity
  --check-prior-trades  Reject wallets that traded before the window
  --csv <path>          Write a CSV export
  --json <path>         Write a JSON export
  -h, --help            Show this message`;

function numberFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`--${name} must be a number, got: ${value}`);
  }
  return parsed;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        "lookback-days": { type: "string" },
        "max-trades": { type: "string" },
        "min-bet": { type: "string" },
        "min-balance": { type: "string" },
        conviction: { type: "string" },
        "require-fresh": { type: "boolean" },
        "check-prior-trades": { type: "boolean" },
        csv: { type: "string" },
        json: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (error) {
    throw new ConfigurationError(describeError(error));
  }
}

/**
 * Parse command-line flags into screening overrides
 *
 * @throws ConfigurationError on unknown flags or malformed values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);

  const overrides: { -readonly [K in keyof ScreeningConfig]?: ScreeningConfig[K] } = {};
  const lookbackDays = numberFlag("lookback-days", values["lookback-days"]);
  if (lookbackDays !== undefined) overrides.lookbackDays = lookbackDays;
  const minBetAmount = numberFlag("min-bet", values["min-bet"]);
  if (minBetAmount !== undefined) overrides.minBetAmount = minBetAmount;
  const minWalletBalance = numberFlag("min-balance", values["min-balance"]);
  if (minWalletBalance !== undefined) overrides.minWalletBalance = minWalletBalance;
  const convictionThreshold = numberFlag("conviction", values.conviction);
  if (convictionThreshold !== undefined) overrides.convictionThreshold = convictionThreshold;
  if (values["require-fresh"]) overrides.requireFreshWallet = true;
  if (values["check-prior-trades"]) overrides.checkPriorTrades = true;

  const maxTrades = numberFlag("max-trades", values["max-trades"]);
  if (maxTrades !== undefined && (!Number.isInteger(maxTrades) || maxTrades <= 0)) {
    throw new ConfigurationError(`--max-trades must be a positive integer, got: ${maxTrades}`);
  }

  return {
    overrides,
    maxTrades,
    csvPath: values.csv,
    jsonPath: values.json,
    help: values.help ?? false,
  };
}

export interface CliContext {
  env?: EnvSource;
  /** Replaces the network-backed collaborators */
  dependencies?: ScreeningRunDependencies;
  now?: Date;
  write?: (text: string) => void;
  log?: Logger;
}

/**
 * Run the screener once and return the process exit code
 */
export async function main(argv: string[], context: CliContext = {}): Promise<number> {
  const source = context.env ?? process.env;
  const log = context.log ?? logger;
  const write = context.write ?? ((text: string) => process.stdout.write(text));

  let options: CliOptions;
  let config: ScreeningConfig;
  let dependencies: ScreeningRunDependencies;
  let maxTrades: number;
  let pageSize: number;
  try {
    options = parseCliArgs(argv);
    if (options.help) {
      write(`${USAGE}\n`);
      return 0;
    }
    config = screeningConfigFromEnv(source, options.overrides);
    if (context.dependencies) {
      dependencies = context.dependencies;
      maxTrades = options.maxTrades ?? DEFAULT_MAX_TRADES;
      pageSize = DEFAULT_PAGE_SIZE;
    } else {
      const env = initializeEnv(source, log);
      dependencies = createLiveDependencies(env);
      maxTrades = options.maxTrades ?? env.MAX_TRADES;
      pageSize = env.TRADE_PAGE_SIZE;
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error("Configuration error", { error: error.message, problems: error.problems });
      return 1;
    }
    throw error;
  }

  try {
    const report = await runScreening(dependencies, {
      config,
      now: context.now,
      maxTrades,
      pageSize,
    });

    write(`${renderConsoleReport(report)}\n`);

    if (options.csvPath) {
      await writeCsvReport(options.csvPath, report.wallets);
    }
    if (options.jsonPath) {
      await writeJsonReport(options.jsonPath, report);
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error("Configuration error", { error: error.message, problems: error.problems });
      return 1;
    }
    log.error("Screening run failed", { error: describeError(error) });
    return 1;
  }
}

const invokedPath = process.argv[1];
if (invokedPath && import.meta.url === pathToFileURL(invokedPath).href) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal("Unexpected failure", { error: describeError(error) });
      process.exitCode = 1;
    });
}
