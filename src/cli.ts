#!/usr/bin/env node
import { program } from "commander";
import { existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import chalk from "chalk";
import * as yaml from "js-yaml";
import { startServer } from "./server.js";
import { loadConfig, withServerOverrides, type Config } from "./config.js";
import { ConfigError } from "./errors.js";
import { parsePort } from "./cli-options.js";

const DEFAULT_CONFIG = {
  rpc: {
    url: "http://127.0.0.1:8332",
    user: "rpcuser",
    pass: "rpcpassword",
  },
  server: {
    host: "127.0.0.1",
    port: 8080,
  },
  logging: {
    level: "info",
    requests: true,
  },
  latestBlocks: {
    windowSize: 10,
  },
};

program
  .name("block-gateway")
  .description("REST gateway for a JSON-RPC blockchain node")
  .version("1.0.0");

program
  .command("init")
  .description("Create gateway.config.yaml with default settings")
  .option("-f, --force", "Overwrite existing config file")
  .option("--json", "Create JSON config (gateway.config.json)")
  .action((options: { force?: boolean; json?: boolean }) => {
    const fileName = options.json ? "gateway.config.json" : "gateway.config.yaml";
    const configPath = join(process.cwd(), fileName);

    if (existsSync(configPath) && !options.force) {
      console.error(chalk.red(`\n✖ Error: ${fileName} already exists\n`));
      console.log(chalk.dim("Use --force to overwrite the existing file:\n"));
      console.log(chalk.cyan("  block-gateway init --force\n"));
      process.exit(1);
    }

    const content = options.json
      ? JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n"
      : yaml.dump(DEFAULT_CONFIG);
    writeFileSync(configPath, content);

    console.log(chalk.green(`\n✔ Created ${fileName}\n`));
    console.log("Next steps:");
    console.log(chalk.dim("  1. Point rpc.url, rpc.user and rpc.pass at your node"));
    console.log(chalk.dim("  2. Start the gateway:"));
    console.log(chalk.cyan("     block-gateway\n"));
  });

program
  .command("start", { isDefault: true })
  .description("Start the HTTP gateway")
  .option("-c, --config <path>", "Path to config file")
  .option("-H, --host <host>", "Override server.host")
  .option("-p, --port <number>", "Override server.port", parsePort)
  .action(async (options: { config?: string; host?: string; port?: number }) => {
    let config: Config;
    try {
      config = await loadConfig(process.cwd(), options.config);
    } catch (err) {
      if (err instanceof ConfigError) {
        console.error(chalk.red(`\n✖ Error: ${err.message}\n`));
        console.log(chalk.dim("Create one with:"));
        console.log(chalk.cyan("  block-gateway init\n"));
        process.exit(1);
      }
      throw err;
    }

    await startServer(withServerOverrides(config, options));
  });

await program.parseAsync();
