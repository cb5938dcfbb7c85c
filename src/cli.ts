#!/usr/bin/env node
import { Octokit } from "@octokit/rest";
import { Command } from "commander";
import { loadConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createProcessExecutor } from "./executor.js";
import { createGitHubApi } from "./github.js";
import { createRateLimiter } from "./github-rate-limit.js";
import { closeLogFile, logger, openLogFile, setLoggerConfig } from "./logger.js";
import { publishCommit } from "./publisher.js";
import { describeOutcome, runUpdater } from "./runner.js";
import type { RunSummary } from "./types.js";

type CliOptions = {
  org?: string;
  repo?: string;
  dryRun?: boolean;
  token?: string;
  gpgKey?: string;
  logDir?: string;
  json?: boolean;
};

const program = new Command();
program
  .name("renovate-config-updater")
  .description(
    "Rewrites github>MyOrg/ presets to github>MyOtherOrg/ in renovate.json and opens pull requests"
  )
  .version("0.1.0")
  .option("--org <org>", "GitHub organization name (default: MyOrg)")
  .option("--repo <name>", "Specific repository name; skips the organization scan")
  .option("--dry-run", "Report matches without committing or opening pull requests")
  .option("--token <token>", "GitHub personal access token (or GITHUB_TOKEN)")
  .option("--gpg-key <id>", "GPG key ID for signing commits")
  .option("--log-dir <dir>", "Directory for the run's log file")
  .option("--json", "JSON output")
  .action(async (options: CliOptions) => {
    const config = loadConfig({
      org: options.org,
      repo: options.repo,
      dryRun: options.dryRun,
      token: options.token,
      gpgKey: options.gpgKey,
      logDir: options.logDir
    });
    setLoggerConfig({
      level: config.logging.level,
      format: config.logging.format,
      color: config.logging.color,
      timeZone: config.logging.timeZone
    });
    const logFile = openLogFile(config.logging.dir);
    try {
      logger.info("run.start", { logFile, org: config.github.org, repo: config.github.repo ?? null });
      const summary = await run(config);
      printSummary(summary, Boolean(options.json));
    } catch (error) {
      logger.error("run.failed", { error: errorMessage(error) });
      throw error;
    } finally {
      await closeLogFile();
    }
  });

program.parseAsync(process.argv).catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});

async function run(config: AppConfig) {
  const octokit = new Octokit({
    auth: config.github.token
  });
  const executor = createProcessExecutor();
  const limiter = createRateLimiter({
    logger: logger.withContext({ component: "rate-limit" }),
    lowWaterMark: config.github.lowWaterMark
  });

  return runUpdater(
    {
      org: config.github.org,
      repo: config.github.repo,
      dryRun: config.update.dryRun,
      signingKey: config.update.signingKey,
      perPage: config.github.perPage
    },
    {
      api: createGitHubApi(octokit),
      limiter,
      logger: logger.withContext({ org: config.github.org }),
      repoLogger: (fullName) => logger.withContext({ repo: fullName }),
      publish: (request) =>
        publishCommit(request, {
          executor,
          sshHost: config.github.sshHost,
          logger: logger.withContext({ repo: request.repository.fullName })
        })
    }
  );
}

function printSummary(summary: RunSummary, json: boolean) {
  if (json) {
    console.log(
      JSON.stringify(
        {
          ...summary,
          outcomes: summary.outcomes.map((outcome) =>
            outcome.status === "error"
              ? { ...outcome, error: errorMessage(outcome.error) }
              : outcome
          )
        },
        null,
        2
      )
    );
    return;
  }
  const lines = [
    `mode: ${summary.mode}`,
    `target: ${summary.target}`,
    `updated: ${summary.counts.updated}`,
    `no-op: ${summary.counts["no-op"]}`,
    `dry-run: ${summary.counts["dry-run"]}`,
    `errors: ${summary.counts.error}`
  ];
  if (summary.rateLimit) {
    lines.push(
      `rate limit: ${summary.rateLimit.remaining}/${summary.rateLimit.limit} (resets ${summary.rateLimit.resetAt.toISOString()})`
    );
  }
  lines.push(...summary.outcomes.map(describeOutcome));
  console.log(lines.join("\n"));
}
