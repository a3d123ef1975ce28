#!/usr/bin/env node
import "dotenv/config";
import { parseEnv, requireProviderCredential } from "@tablelens/config";
import { ValidationError } from "@tablelens/errors";
import { createLogger } from "@tablelens/logger";
import { applyOverrides, parseCliArgs, USAGE, type CliArgs } from "./args.js";
import { createIngestionDeps, createQueryService } from "./container.js";
import { runIngest } from "./commands/ingest.js";
import { ensureIngested, runQuery } from "./commands/query.js";
import { runChat } from "./commands/chat.js";
import { formatFatal } from "./format.js";

const print = (line: string): void => {
  console.log(line);
};

function parseOrExplain(argv: string[]): CliArgs | undefined {
  try {
    return parseCliArgs(argv);
  } catch (error: unknown) {
    if (error instanceof ValidationError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return undefined;
    }
    throw error;
  }
}

async function main(argv: string[]): Promise<number> {
  const args = parseOrExplain(argv);
  if (!args) return 2;

  if (args.command.kind === "help") {
    print(USAGE);
    return 0;
  }

  const config = applyOverrides(parseEnv(), args.overrides);
  const logger = createLogger({
    level: config.logLevel,
    service: "tablelens",
    pretty: config.nodeEnv === "development",
  });
  if (args.command.kind !== "ingest" && !(await ensureIngested(config.paths.persistDir, print))) {
    return 1;
  }
  requireProviderCredential(config);

  switch (args.command.kind) {
    case "ingest":
      return runIngest(config, createIngestionDeps(config, logger), print, logger);
    case "query":
      return runQuery(createQueryService(config, logger), args.command.question, print);
    case "app": {
      const log = await runChat(createQueryService(config, logger), {
        input: process.stdin,
        output: process.stdout,
      });
      logger.debug({ messages: log.length }, "chat session ended");
      return 0;
    }
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    formatFatal(error).forEach((line) => console.error(line));
    process.exitCode = 1;
  });
