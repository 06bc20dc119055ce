import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TagSqlError } from "@tagsql/core";
import { CONFIG_FILE_NAME, loadConfig, readInput, writeOutput, type CliIO } from "../src/utils";

async function rejection(promise: Promise<unknown>): Promise<TagSqlError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof TagSqlError) return err;
    throw err;
  }
  throw new Error("expected a TagSqlError rejection");
}

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tagsql-utils-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns an empty config when no file is found", async () => {
    expect(await loadConfig(undefined, dir)).toEqual({ config: {} });
  });

  it("finds the config file in a parent directory", async () => {
    const nested = join(dir, "packages", "cli");
    await mkdir(nested, { recursive: true });
    await writeFile(join(dir, CONFIG_FILE_NAME), JSON.stringify({ maxColumnsThreshold: 4 }));

    expect(await loadConfig(undefined, nested)).toEqual({
      path: join(dir, CONFIG_FILE_NAME),
      config: { maxColumnsThreshold: 4 },
    });
  });

  it("reads an explicit path relative to the working directory", async () => {
    await writeFile(join(dir, "custom.json"), JSON.stringify({ header: "h" }));

    expect((await loadConfig("custom.json", dir)).config).toEqual({ header: "h" });
  });

  it("fails when an explicit path does not exist", async () => {
    expect((await rejection(loadConfig("nope.json", dir))).code).toBe("IO_ERROR");
  });

  it("fails on invalid JSON or unknown options", async () => {
    await writeFile(join(dir, "broken.json"), "{ not json");
    await writeFile(join(dir, "unknown.json"), JSON.stringify({ colour: "red" }));

    expect((await rejection(loadConfig("broken.json", dir))).code).toBe("INVALID_CONFIGURATION");
    expect((await rejection(loadConfig("unknown.json", dir))).code).toBe("INVALID_CONFIGURATION");
  });
});

describe("readInput / writeOutput", () => {
  const io: CliIO & { written: string[] } = {
    written: [],
    async readStdin() {
      return "<root/>";
    },
    writeStdout(text) {
      this.written.push(text);
    },
  };

  it("uses stdin and stdout when no path is given", async () => {
    expect(await readInput(undefined, io)).toBe("<root/>");
    await writeOutput(undefined, "done", io);
    expect(io.written).toEqual(["done"]);
  });

  it("fails with IO_ERROR when the output cannot be written", async () => {
    const target = join(tmpdir(), "tagsql-missing-dir", "nested", "out.sql");
    expect((await rejection(writeOutput(target, "x", io))).code).toBe("IO_ERROR");
  });
});
