#!/usr/bin/env node
import { readFileSync } from "node:fs";
import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  prefixedLogger,
} from "@plainserve/engine";
import { type CliArgs, CliUsageError, HELP_TEXT, parseArgs } from "./args.js";

function readVersion(): string {
  const pkgUrl = new URL("../package.json", import.meta.url);
  const pkg: unknown = JSON.parse(readFileSync(pkgUrl, "utf8"));
  if (pkg && typeof pkg === "object" && "version" in pkg) {
    return String(pkg.version);
  }
  return "unknown";
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }

  if (args.action === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (args.action === "version") {
    console.log(readVersion());
    return;
  }

  const root = path.resolve(args.root);
  const logger = prefixedLogger(
    "plainserve",
    args.quiet ? filteredLogger("warn") : basicLogger(),
  );

  const config = {
    ...defaultConfig(root),
    port: args.port,
    host: args.host,
    readBufferSize: args.bufferSize,
    requestTimeoutMs: args.timeoutMs,
    quiet: args.quiet,
  };

  const server = createNodeServer({ config, logger });

  // A bind failure rejects here and aborts the process below.
  const port = await server.start();

  const url = `http://${config.host === "0.0.0.0" ? "localhost" : config.host}:${port}`;
  console.log(`\n  plainserve serving ${root}\n`);
  console.log(`  Local:   ${url}`);
  console.log(`  Static:  ${url}${config.staticPrefix}`);
  console.log();

  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
