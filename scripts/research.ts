/**
 * Research Run Script
 *
 * Runs one research request end to end against Brave Search and prints the
 * report with per-domain statuses.
 *
 * Usage:
 *   npx tsx scripts/research.ts --subject=NAME [options]
 *
 * Example:
 *   npx tsx scripts/research.ts --subject="Acme Corp" --role="Data Engineer" --context=job.md
 *
 * Options:
 *   --role=TITLE        Role the research is for
 *   --context=TEXT      Free-form context, or a .txt/.md file to read it from
 *   --iterations=N      Iteration budget per domain (default: from config)
 *   --deadline=MS       Global deadline in milliseconds (default: derived)
 *   --output=FILE       Also write the Markdown report to FILE
 *
 * Environment variables:
 *   BRAVE_SEARCH_API_KEY (required)
 *   OPENAI_API_KEY (optional, enables LLM planning)
 */

import * as dotenv from "dotenv";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import {
  InvalidRequestError,
  createResearchSupervisor,
  errorMessage,
  withConfigOverrides,
  type ConfigOverrides,
} from "../packages/core/src";
import { CliUsageError, parseCliArgs, type CliOptions } from "./research-args";

// Load environment variables from .env file
const scriptDir = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(scriptDir, "../.env") });

function printUsage(): void {
  console.error(
    "\nUsage: npx tsx scripts/research.ts --subject=NAME [--role=TITLE] " +
      "[--context=TEXT|FILE.md] [--iterations=N] [--deadline=MS] [--output=FILE]\n"
  );
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`\n✗ ${errorMessage(error)}`);
    if (error instanceof CliUsageError) {
      printUsage();
    }
    process.exit(1);
  }

  const braveKey = process.env.BRAVE_SEARCH_API_KEY;
  if (!braveKey) {
    console.error("\n✗ Error: Missing required environment variable BRAVE_SEARCH_API_KEY\n");
    process.exit(1);
  }

  const overrides: ConfigOverrides = {};
  if (options.iterations !== undefined) {
    overrides.research = { iterationBudget: options.iterations };
  }
  if (options.deadlineMs !== undefined) {
    overrides.supervisor = { deadlineMs: options.deadlineMs };
  }

  const supervisor = createResearchSupervisor({
    braveApiKey: braveKey,
    openaiApiKey: process.env.OPENAI_API_KEY,
    config: withConfigOverrides(overrides),
  });

  console.log("\n" + "=".repeat(60));
  console.log("  COMPANY RESEARCH");
  console.log("=".repeat(60) + "\n");
  console.log(`Subject:   ${options.subject}`);
  console.log(`Role:      ${options.role ?? "(none)"}`);
  console.log(`Context:   ${options.context ? `${options.context.length} chars` : "(none)"}`);
  console.log(`Deadline:  ${supervisor.getDeadlineMs()}ms\n`);

  try {
    const outcome = await supervisor.run({
      subject: options.subject,
      roleTitle: options.role,
      context: options.context,
    });

    console.log(outcome.report.markdown);
    console.log("\n" + "-".repeat(60));
    for (const [domain, status] of Object.entries(outcome.statuses)) {
      console.log(`  ${domain.padEnd(8)} ${status}`);
    }
    console.log(
      `\n  ${outcome.invocations} tool calls in ${(outcome.durationMs / 1000).toFixed(1)}s`
    );

    if (options.output) {
      fs.writeFileSync(options.output, outcome.report.markdown, "utf8");
      console.log(`  Report written to ${options.output}`);
    }
    console.log("");
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      console.error(`\n✗ Invalid request: ${error.message}\n`);
    } else {
      console.error(`\n✗ Research failed: ${errorMessage(error)}\n`);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`\n✗ ${errorMessage(error)}\n`);
  process.exit(1);
});
