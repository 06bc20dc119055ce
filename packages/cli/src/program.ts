import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { Logger } from "pino";
import {
  EXIT_CODES,
  convertXml,
  isTagSqlError,
  resolveOptions,
  type InferenceConfig,
} from "@tagsql/core";
import { createLogger } from "./logger";
import { loadConfig, processIO, readInput, readText, writeOutput, type CliIO } from "./utils";

export interface CliFlags {
  input?: string;
  output?: string;
  header?: string;
  etc?: number;
  skipColumns?: boolean;
  duplicateKeys?: boolean;
  relations?: boolean;
  annotate?: boolean;
  isvalid?: string;
  config?: string;
  verbose?: boolean;
}

export interface CliDeps {
  io?: CliIO;
  logger?: Logger;
  cwd?: string;
}

function parseThreshold(value: string): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

/** Only flags given on the command line; they override the config file. */
function flagsToConfig(flags: CliFlags): InferenceConfig {
  const config: InferenceConfig = {};
  if (flags.duplicateKeys) config.duplicateKeys = true;
  if (flags.etc !== undefined) config.maxColumnsThreshold = flags.etc;
  if (flags.skipColumns) config.skipColumns = true;
  if (flags.header !== undefined) config.header = flags.header;
  if (flags.relations) config.relationReport = true;
  if (flags.annotate) config.annotateRelations = true;
  return config;
}

export async function runConversion(flags: CliFlags, deps: Required<CliDeps>): Promise<void> {
  const { io, logger, cwd } = deps;

  const { path: configPath, config: fileConfig } = await loadConfig(flags.config, cwd);
  if (configPath) logger.debug({ configPath }, "Loaded config file");

  const options = resolveOptions({ ...fileConfig, ...flagsToConfig(flags) });
  logger.debug({ options }, "Resolved options");

  const xml = await readInput(flags.input, io);
  logger.debug({ input: flags.input ?? "<stdin>", bytes: xml.length }, "Read input");

  const candidate = flags.isvalid === undefined ? undefined : await readText(flags.isvalid);

  const rendered = convertXml(xml, options, candidate);
  await writeOutput(flags.output, rendered, io);
  logger.debug({ output: flags.output ?? "<stdout>", bytes: rendered.length }, "Wrote output");
}

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name("tagsql")
    .description("Infer a relational schema from the nesting of an XML document")
    .version("0.1.0")
    .option("--input <file>", "XML input file (default: stdin)")
    .option("--output <file>", "output file (default: stdout)")
    .option("--header <text>", "comment emitted at the top of the output")
    .option("--etc <n>", "inline at most <n> columns per child table", parseThreshold)
    .option("-a, --skip-columns", "do not generate columns from attributes")
    .option("-b, --duplicate-keys", "always put the key on the child table (not with --etc)")
    .option("-g, --relations", "emit the relation report instead of DDL")
    .option("--annotate", "prefix each CREATE TABLE with its relations as comments")
    .option("--isvalid <file>", "fail unless this XML document fits the inferred schema")
    .option("--config <path>", `path to JSON config file (default: ./tagsql.config.json)`)
    .option("--verbose", "log every phase to stderr")
    .action(async (flags: CliFlags) => {
      const logger = deps.logger ?? createLogger("cli", flags.verbose ? "debug" : undefined);
      await runConversion(flags, {
        io: deps.io ?? processIO,
        logger,
        cwd: deps.cwd ?? process.cwd(),
      });
    });

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix) and return the
 * process exit code.
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const program = createProgram(deps).exitOverride();
  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;

    const logger = deps.logger ?? createLogger("cli");
    logger.error({ err }, "Conversion failed");
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? err.message : String(err));
    return isTagSqlError(err) ? EXIT_CODES[err.code] : 1;
  }
}
