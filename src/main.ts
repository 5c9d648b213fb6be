#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { runCli } from "./cli.js";
import { getRuntimeConfig } from "./runtimeConfig.js";

const PackageSchema = z.object({ version: z.string() });

function readPackageVersion(): string {
  try {
    const pkgPath = join(__dirname, "..", "package.json");
    return PackageSchema.parse(JSON.parse(readFileSync(pkgPath, "utf8"))).version;
  } catch {
    return "0.0.0";
  }
}

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    version: readPackageVersion(),
    env: process.env,
    cwd: () => process.cwd(),
    loadConfig: getRuntimeConfig,
    io: {
      send: (text) => process.stdout.write(text + "\n"),
      sendError: (text) => process.stderr.write(text + "\n"),
    },
  });
}

main().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
