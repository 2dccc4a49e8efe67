#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * oab-publication-search --bar 123456 --state SP [--days 7] [--out publicacoes.json]
 */
import { CliUsageError, USAGE, parseCliArgs, runCli } from "./cli/search.command";
import { toError } from "./shared/errors/scrape.errors";
import { logger } from "./monitoring/logger";

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.kind === "help") {
    console.log(USAGE);
    return;
  }

  const result = await runCli(command.options);
  console.log(
    `${result.publications.length} publicações salvas em ${command.options.output}` +
      (result.error ? ` (erro: ${result.error})` : "")
  );
}

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(`Error: ${error.message}`);
    console.error(USAGE);
  } else {
    logger.error({ error: toError(error).message }, "Search command failed");
  }
  process.exit(1);
});
