#!/usr/bin/env node

import path from "node:path";
import { Command } from "commander";
import { config as loadEnv } from "dotenv";
import { isLogLevel, setLogLevel } from "@synod/core";
import { registerAskCommand } from "../src/commands/ask.js";
import { registerConfigCommand } from "../src/commands/config.js";
import { registerConversationsCommand } from "../src/commands/conversations.js";
import { VERSION } from "../src/version.js";

// Load .env from the directory synod is run in
loadEnv({ path: path.join(process.cwd(), ".env") });

// Logs share stdout with command output; keep them to warnings unless asked.
const envLevel = process.env.LOG_LEVEL?.toLowerCase();
setLogLevel(isLogLevel(envLevel) ? envLevel : "warn");

const program = new Command();

program
  .name("synod")
  .description("Ask a council of LLMs, let them rank each other, get one synthesized answer")
  .version(VERSION);

registerAskCommand(program);
registerConversationsCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
