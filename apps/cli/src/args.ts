import { parseArgs } from "node:util";
import type { AppConfig } from "@tablelens/types";
import { ValidationError } from "@tablelens/errors";

export const USAGE = [
  "Usage: tablelens (--ingest | --app | --query \"QUESTION\") [options]",
  "",
  "Commands (exactly one):",
  "  --ingest            Extract, summarize and index the configured PDF",
  "  --app               Start an interactive chat over the index",
  "  --query QUESTION    Answer one question and exit",
  "",
  "Options:",
  "  --pdf PATH          PDF to ingest (PDF_PATH)",
  "  --tables DIR        Directory for table crops (TABLE_OUTPUT_DIR)",
  "  --storage DIR       Index directory (PERSIST_DIR)",
  "  -h, --help          Show this help",
].join("\n");

export type CliCommand =
  | { kind: "ingest" }
  | { kind: "app" }
  | { kind: "query"; question: string }
  | { kind: "help" };

export interface PathOverrides {
  pdfPath?: string;
  tableOutputDir?: string;
  persistDir?: string;
}

export interface CliArgs {
  command: CliCommand;
  overrides: PathOverrides;
}

function readOptions(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        ingest: { type: "boolean" },
        app: { type: "boolean" },
        query: { type: "string" },
        pdf: { type: "string" },
        tables: { type: "string" },
        storage: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(reason, { argv: argv.join(" ") }, { cause: error });
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const values = readOptions(argv);

  const overrides: PathOverrides = {
    pdfPath: values.pdf,
    tableOutputDir: values.tables,
    persistDir: values.storage,
  };

  if (values.help) {
    return { command: { kind: "help" }, overrides };
  }

  const selected = [values.ingest, values.app, values.query !== undefined].filter(Boolean).length;
  if (selected !== 1) {
    throw new ValidationError("Choose exactly one of --ingest, --app or --query", {
      command: selected === 0 ? "missing" : "conflicting",
    });
  }

  if (values.query !== undefined) {
    const question = values.query.trim();
    if (question.length === 0) {
      throw new ValidationError("--query needs a question", { query: "empty" });
    }
    return { command: { kind: "query", question }, overrides };
  }

  return { command: { kind: values.ingest ? "ingest" : "app" }, overrides };
}

export function applyOverrides(config: AppConfig, overrides: PathOverrides): AppConfig {
  return {
    ...config,
    paths: {
      pdfPath: overrides.pdfPath ?? config.paths.pdfPath,
      tableOutputDir: overrides.tableOutputDir ?? config.paths.tableOutputDir,
      persistDir: overrides.persistDir ?? config.paths.persistDir,
    },
  };
}
