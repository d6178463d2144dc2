#!/usr/bin/env node

/**
 * dsmirror CLI - inspect and mirror object-storage datasets
 */

import { Command } from "commander";
import { createRequire } from "node:module";
import { registerShowTreeCommand } from "./commands/show-tree.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerCatalogCommand } from "./commands/catalog.js";

const require = createRequire(import.meta.url);
const pkg = require("../../package.json") as { version: string };

const program = new Command();

program
  .name("dsmirror")
  .description("Inspect and mirror datasets stored in object storage")
  .version(pkg.version);

registerShowTreeCommand(program);
registerSyncCommand(program);
registerCatalogCommand(program);

program.parse();
