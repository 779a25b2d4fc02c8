import { AppConfig, loadConfig } from "../config";
import { CommandContext, runIngest, runStatus, runTestSource } from "../core/commands";
import { HtmlFetcher } from "../core/fetch";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createHistoryStore } from "../store";

export type CommandName = "run" | "test-source" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  sourcesPath?: string;
  historyPath?: string;
  sourceId?: string;
  limit?: number;
  fetchPdf: boolean;
  outPath?: string;
  concurrency?: number;
  ignoreHttpsErrors: boolean;
}

const HELP_TEXT = `
Usage:
  bid-triage <command> [options]

Commands:
  run                      Crawl every configured source, score new opportunities, append them to history
  test-source --source <id> Crawl one source without scoring or writing history; prints a JSON report
  status                   Summarize the history file

Options:
  --config <path>          Optional path to JSON app config file
  --sources <path>         Sources file (YAML or JSON)
  --history <path>         History file (newline-delimited JSON)
  --source <id>            Source to test (test-source)
  --limit <n>              Max listings to extract (test-source, default 10)
  --no-fetch-pdf           Do not visit detail pages (test-source)
  --out <path>             Write the test-source report to a file
  --concurrency <n>        Sources crawled in parallel (run)
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  -h, --help               Show this help

Each source is capped at 10 listings unless it sets max_listings (flat entries included).
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "test-source" || raw === "status") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

function readPositiveInt(argv: string[], name: string): number | undefined {
  const raw = readOption(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    configPath: readOption(argv, "--config"),
    sourcesPath: readOption(argv, "--sources"),
    historyPath: readOption(argv, "--history"),
    sourceId: readOption(argv, "--source"),
    limit: readPositiveInt(argv, "--limit"),
    fetchPdf: !argv.includes("--no-fetch-pdf"),
    outPath: readOption(argv, "--out"),
    concurrency: readPositiveInt(argv, "--concurrency"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    sourcesPath: parsed.sourcesPath ?? config.sourcesPath,
    historyPath: parsed.historyPath ?? config.historyPath,
    sourceConcurrency: parsed.concurrency ?? config.sourceConcurrency,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const metrics = new MetricsRegistry();
  const context: CommandContext = {
    runId,
    config,
    logger,
    metrics,
    history: createHistoryStore(config, logger.child("history")),
    fetcher: new HtmlFetcher({
      userAgent: config.userAgent,
      timeoutMs: config.requestTimeoutMs,
      maxAttempts: config.maxFetchAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      ignoreHttpsErrors: config.ignoreHttpsErrors,
      logger: logger.child("fetch"),
    }),
    write: (text) => console.log(text),
  };

  logger.info("command_start", {
    command: parsed.command,
    sourcesPath: config.sourcesPath,
    historyPath: config.historyPath,
    concurrency: config.sourceConcurrency,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "run":
        await runIngest({ ...context, logger: logger.child("ingest") });
        break;
      case "test-source":
        if (!parsed.sourceId) {
          console.error("test-source requires --source <id>");
          return 1;
        }
        await runTestSource(
          { ...context, logger: logger.child("test_source") },
          { sourceId: parsed.sourceId, limit: parsed.limit, fetchPdf: parsed.fetchPdf, outPath: parsed.outPath },
        );
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    metrics.logSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
