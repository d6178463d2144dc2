/**
 * dsmirror show-tree: render a manifest JSON file.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import { parseManifestJson } from "../../manifest/json.js";
import { partitionManifest, parsePartitionArgs } from "../../manifest/partition.js";
import { parseBytes } from "../../render/format-size.js";
import { DEFAULT_SHARD_SIZE_BYTES, shardByCount, shardBySize } from "../../render/shard-policy.js";
import type { ShardPolicy } from "../../render/shard-policy.js";
import { renderManifest } from "../../render/tree-renderer.js";
import type { RenderOptions } from "../../render/tree-renderer.js";
import { collect, parseInteger } from "../options.js";

export interface ShowTreeOptions {
  full?: boolean;
  depth?: number;
  shardSize?: string;
  shardCount?: number;
  partition?: string[];
  defaultGroup?: string;
  label?: string;
}

export function buildShardPolicy(options: Pick<ShowTreeOptions, "shardSize" | "shardCount">): ShardPolicy {
  if (options.shardSize !== undefined && options.shardCount !== undefined) {
    throw new Error("Use either --shard-size or --shard-count, not both");
  }
  if (options.shardCount !== undefined) {
    return shardByCount(options.shardCount);
  }
  return shardBySize(
    options.shardSize === undefined ? DEFAULT_SHARD_SIZE_BYTES : parseBytes(options.shardSize)
  );
}

/**
 * Parse manifest JSON and render it. With partitions, each non-empty group
 * is rendered as its own tree, separated by a blank line.
 */
export function renderManifestText(text: string, options: ShowTreeOptions = {}): string[] {
  const manifest = parseManifestJson(text, { label: options.label });
  const renderOptions: RenderOptions = {
    full: options.full,
    depth: options.depth,
    shardPolicy: buildShardPolicy(options),
  };

  const partitions = options.partition ?? [];
  if (partitions.length === 0) {
    return renderManifest(manifest, renderOptions);
  }

  const groups = partitionManifest(manifest, parsePartitionArgs(partitions), {
    defaultGroup: options.defaultGroup,
  });
  const lines: string[] = [];
  for (const group of groups.values()) {
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(...renderManifest(group, renderOptions));
  }
  return lines;
}

export function registerShowTreeCommand(program: Command): void {
  program
    .command("show-tree")
    .description("Render a manifest JSON file as a tree")
    .argument("<manifest>", "Path to the manifest JSON file")
    .option("--full", "Print every node instead of the summarized view")
    .option("--depth <n>", "Directory levels expanded in the summarized view", parseInteger)
    .option("--shard-size <size>", "Shard threshold for collapsed directories, e.g. 10G")
    .option("--shard-count <n>", "Entries per shard for collapsed directories", parseInteger)
    .option("--partition <name=glob>", "Split the tree into named groups (repeatable)", collect)
    .option("--default-group <name>", "Group for entries matching no partition")
    .option("--label <label>", "Root label (default: file name)")
    .action((manifestPath: string, options: ShowTreeOptions) => {
      try {
        const text = fs.readFileSync(manifestPath, "utf-8");
        const lines = renderManifestText(text, {
          ...options,
          label: options.label ?? path.basename(manifestPath, path.extname(manifestPath)),
        });
        for (const line of lines) {
          console.log(line);
        }
      } catch (error) {
        console.error(chalk.red("show-tree failed:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
