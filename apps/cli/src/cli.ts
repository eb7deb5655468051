import { Command, CommanderError } from "commander";
import { createDefaultTable, loadConfig } from "@lxconf/confile";
import { EXIT_USAGE, describeError, exitCodeFor } from "@lxconf/errors";
import {
  createLogger,
  generateSessionId,
  stderrSink,
  type LogLevel,
  type LogSink,
} from "@lxconf/logger";
import { loadCliConfig } from "./config.js";
import { renderConf } from "./format.js";

const ENVIRONMENT_HELP = `
Environment:
  LXCONF_LOG_LEVEL       debug | info | warn | error (default: info)
  LXCONF_LEGACY_NUMBERS  1 to read non-numeric lxc.pts / lxc.tty as 0`;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logSink: LogSink;
}

interface CliOptions {
  keys?: boolean;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  logSink: stderrSink,
};

/**
 * Command definition. The action reports its exit code through `onExit`;
 * usage errors and help surface as a thrown CommanderError.
 */
export function createProgram(
  io: CliIO,
  settings: { logLevel: LogLevel; legacyNumbers: boolean },
  onExit: (code: number) => void
): Command {
  const program: Command = new Command();

  program
    .name("lxconf")
    .description("Read a container configuration and print it as JSON")
    .argument("[config-file]", "configuration file to read")
    .option("--keys", "list the recognised directive prefixes")
    .allowExcessArguments(false)
    .addHelpText("after", ENVIRONMENT_HELP)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    })
    .action((file: string | undefined, options: CliOptions) => {
      if (options.keys) {
        io.stdout(createDefaultTable().prefixes().join("\n"));
        onExit(0);
        return;
      }

      if (file === undefined) {
        program.error("error: missing required argument 'config-file'", {
          exitCode: EXIT_USAGE,
          code: "lxconf.missingFile",
        });
      }

      const logger = createLogger(
        { sessionId: generateSessionId(), component: "lxconf" },
        { level: settings.logLevel, sink: io.logSink }
      );

      const result = loadConfig(file, { logger, legacyNumbers: settings.legacyNumbers });
      if (result.isErr()) {
        io.stderr(`lxconf: ${describeError(result.error)}`);
        onExit(exitCodeFor(result.error));
        return;
      }

      io.stdout(JSON.stringify(renderConf(result.unwrap()), null, 2));
      onExit(0);
    });

  return program;
}

/**
 * Run the command and return its exit code
 */
export function run(
  args: string[],
  env: Record<string, string | undefined>,
  io: CliIO = processIO
): number {
  const config = loadCliConfig(env);
  if (config.isErr()) {
    io.stderr(`lxconf: ${describeError(config.error)}`);
    return exitCodeFor(config.error);
  }

  let code = 0;
  const program = createProgram(io, config.unwrap(), (exitCode) => {
    code = exitCode;
  });

  try {
    program.parse(args, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version exit with 0; everything else is a usage error
      return error.exitCode === 0 ? 0 : EXIT_USAGE;
    }
    throw error;
  }
  return code;
}
