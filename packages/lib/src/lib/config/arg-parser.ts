import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { PolycallConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("@polycall/lib/package.json") as { version: string };

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return parsed;
};

export const getConfigFromCli = (
  argv: readonly string[] = process.argv
): PolycallConfig => {
  const program = new Command();

  program
    .name("polycall")
    .description("Resolve a call against an overloaded set from a manifest")
    .version(version, "-v, --version", "display the current version")
    .argument("<manifest>", "JSON manifest of conversions and overloaded sets")
    .requiredOption("-s, --set <name>", "overloaded set to call")
    .option("-a, --args <json>", "JSON array of call arguments", "[]")
    .option(
      "-r, --repeat <count>",
      "issue the call this many times",
      parsePositiveInt,
      1,
    )
    .option("--stats", "print cache statistics after the calls")
    .option("--trace", "log each resolution step")
    .helpOption("-h, --help", "display help for command");

  program.parse([...argv]);
  const opts = program.opts<{
    set: string;
    args: string;
    repeat: number;
    stats?: boolean;
    trace?: boolean;
  }>();
  const [manifest] = program.args;

  return {
    manifest,
    set: opts.set,
    args: opts.args,
    repeat: opts.repeat,
    stats: opts.stats,
    trace: opts.trace,
  };
};
