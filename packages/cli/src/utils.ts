/**
 * Shared I/O helpers for the CLI: config discovery, reading the source
 * document and writing the rendered output.
 */

import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { join, resolve as resolvePath } from "node:path";
import {
  invalidConfigurationError,
  ioError,
  parseInferenceConfig,
  type InferenceConfig,
} from "@tagsql/core";

export const CONFIG_FILE_NAME = "tagsql.config.json";

export interface CliIO {
  readStdin(): Promise<string>;
  writeStdout(text: string): void;
}

export const processIO: CliIO = {
  async readStdin() {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf8");
  },
  writeStdout(text) {
    process.stdout.write(text);
  },
};

/**
 * Locate and validate tagsql.config.json. An explicit path must exist;
 * otherwise the working directory and its two parents are tried in turn.
 */
export async function loadConfig(
  explicitPath: string | undefined,
  cwd: string = process.cwd(),
): Promise<{ path?: string; config: InferenceConfig }> {
  if (explicitPath) {
    const path = resolvePath(cwd, explicitPath);
    return { path, config: await readConfigFile(path) };
  }

  const candidates = [
    join(cwd, CONFIG_FILE_NAME),
    join(cwd, "..", CONFIG_FILE_NAME),
    join(cwd, "..", "..", CONFIG_FILE_NAME),
  ];
  for (const path of candidates) {
    if (existsSync(path)) {
      return { path, config: await readConfigFile(path) };
    }
  }

  return { config: {} };
}

async function readConfigFile(path: string): Promise<InferenceConfig> {
  const raw = await readText(path);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw invalidConfigurationError(`${path} is not valid JSON`, err);
  }
  return parseInferenceConfig(parsed);
}

export async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    throw ioError(path, err);
  }
}

export async function readInput(path: string | undefined, io: CliIO): Promise<string> {
  return path === undefined ? io.readStdin() : readText(path);
}

export async function writeOutput(path: string | undefined, text: string, io: CliIO): Promise<void> {
  if (path === undefined) {
    io.writeStdout(text);
    return;
  }
  try {
    await writeFile(path, text, "utf8");
  } catch (err) {
    throw ioError(path, err);
  }
}
