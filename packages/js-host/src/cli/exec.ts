import { readFile } from "node:fs/promises";
import { toError } from "@polycall/dispatch";
import { getConfigFromCli } from "@polycall/lib/config/arg-parser";
import type { PolycallConfig } from "@polycall/lib/config/types";
import { decodeOutcome, createMsgPackBridge, encodeArguments } from "../bridge.js";
import { createJsHost } from "../host.js";
import { loadManifest } from "../manifest.js";

const stringifyValue = (value: unknown): string =>
  JSON.stringify(value, (_key, field: unknown) =>
    typeof field === "bigint" ? `${field}n` : field
  ) ?? String(value);

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfigFromCli();
  process.exitCode = await run(config);
}

/** Runs the configured calls and returns the process exit code. */
export async function run(
  config: PolycallConfig,
  out: Pick<Console, "log" | "error"> = console
): Promise<number> {
  const host = createJsHost({ logWriter: config.trace ? console : undefined });
  const sets = loadManifest(host, await readManifest(config.manifest));
  const bridge = createMsgPackBridge({ sets });

  const args: unknown = JSON.parse(config.args);
  if (!Array.isArray(args)) {
    throw new Error("--args must be a JSON array");
  }
  const payload = encodeArguments(args);

  let exitCode = 0;
  for (let i = 0; i < config.repeat; i++) {
    const outcome = decodeOutcome(bridge.call(config.set, payload));
    if (outcome.kind === "failed") {
      out.error(outcome.message);
      exitCode = 1;
      break;
    }
    out.log(stringifyValue(outcome.value));
  }

  if (config.stats) {
    const { hits, misses, entries } = host.environment.cache.stats();
    out.log(`cache: ${hits} hit(s), ${misses} miss(es), ${entries} entr(ies)`);
  }
  return exitCode;
}

async function readManifest(path: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    throw new Error(`cannot read manifest ${path}`, { cause: toError(error) });
  }
}

function errorHandler(error: unknown) {
  console.error(toError(error));
  process.exit(1);
}
