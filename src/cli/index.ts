#!/usr/bin/env node
import chalk from "chalk";
import { getConfigPath, loadConfig } from "../lib/config.js";
import { errorMessage } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { createProgram } from "./program.js";

const configPath = getConfigPath();
const config = loadConfig({ configPath });
const logger = createLogger(config.logLevel);

createProgram({ config, configPath, logger })
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  });
