/**
 * bidimap command-line program
 */

import { Command, CommanderError, Option } from "commander";
import type { PolicyName } from "@bidimap/sdk";
import packageJson from "../package.json" with { type: "json" };
import { parseElement, parsePolicy } from "./lib/arg.js";
import { isVerbose, resolvePolicyName } from "./lib/env.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { writeStderr, writeStdout } from "./lib/io.js";
import { loadMap } from "./lib/load.js";
import type { LoadOptions } from "./lib/load.js";
import { colorize, printJson, printMap } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

type Flags = {
  policy?: PolicyName;
  ordered?: boolean;
  raw?: boolean;
  verbose?: boolean;
};

function addMapOptions(command: Command): Command {
  return command
    .addOption(
      new Option("--policy <name>", "Collision policy for array and object input (default: BIDIMAP_POLICY or strict)")
        .argParser(parsePolicy)
    )
    .option("--ordered", "Keep insertion order for array and object input")
    .option("--raw", "Output compact JSON");
}

function loadOptions(flags: Flags): LoadOptions {
  return {
    policy: resolvePolicyName(flags.policy),
    ordered: flags.ordered === true,
  };
}

/**
 * Build a fresh program; `onExit` receives every error commander reports itself
 */
function createProgram(onExit: (err: CommanderError) => void): Command {
  const program = new Command();

  // Configure error output with color
  program
    .configureOutput({
      writeOut: writeStdout,
      writeErr: (str) => writeStderr(colorize(str, "red", process.stderr)),
    })
    .exitOverride((err) => {
      onExit(err);
      throw err;
    });

  // Global options
  program
    .name("bidimap")
    .description("Inspect and invert bidirectional maps stored as JSON")
    .version(packageJson.version)
    .option("--verbose", "Verbose diagnostics");

  addMapOptions(program.command("check <file>"))
    .description("Load a map and report its size (file may be - for stdin)")
    .action(async (file: string, _options: Flags, command: Command) => {
      const flags = command.optsWithGlobals<Flags>();
      await withTiming("cli.check", isVerbose(flags.verbose), async () => {
        const map = await loadMap(file, loadOptions(flags));
        console.log(colorize(`OK: ${map.size} associations`, "green"));
      });
    });

  addMapOptions(program.command("invert <file>"))
    .description("Print the inverse map as a bidimap document")
    .action(async (file: string, _options: Flags, command: Command) => {
      const flags = command.optsWithGlobals<Flags>();
      await withTiming("cli.invert", isVerbose(flags.verbose), async () => {
        const map = await loadMap(file, loadOptions(flags));
        printMap(map.inverse, { raw: flags.raw });
      });
    });

  addMapOptions(program.command("get <file> <key>"))
    .description("Print the value for a key (key is parsed as JSON when it parses)")
    .action(async (file: string, key: string, _options: Flags, command: Command) => {
      const flags = command.optsWithGlobals<Flags>();
      await withTiming("cli.get", isVerbose(flags.verbose), async () => {
        const map = await loadMap(file, loadOptions(flags));
        printJson(map.lookup(parseElement(key, "key")), { raw: flags.raw });
      });
    });

  addMapOptions(program.command("get-key <file> <value>"))
    .description("Print the key for a value (value is parsed as JSON when it parses)")
    .action(async (file: string, value: string, _options: Flags, command: Command) => {
      const flags = command.optsWithGlobals<Flags>();
      await withTiming("cli.get-key", isVerbose(flags.verbose), async () => {
        const map = await loadMap(file, loadOptions(flags));
        printJson(map.lookupKey(parseElement(value, "value")), { raw: flags.raw });
      });
    });

  return program;
}

/**
 * Run the program on user arguments (without the node and script paths)
 * @returns Process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const reported = new WeakSet<CommanderError>();
  const program = createProgram((err) => {
    reported.add(err);
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed its own usage errors, help and version
    if (err instanceof CommanderError && reported.has(err)) {
      return err.exitCode;
    }

    const verbose = isVerbose(program.opts<Flags>().verbose);
    console.error(`Error: ${formatCliError(err, verbose)}`);
    return mapSdkErrorToExitCode(err);
  }
}
