/**
 * dsmirror sync: mirror a selection of a dataset prefix into a local
 * directory, extracting archives as they arrive.
 *
 * Exports `runSync` so the run can be driven programmatically (and in
 * tests) with an injected object store and extractor registry.
 */

import * as fs from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import { buildMirrorConfig, validateMirrorConfig } from "../../config.js";
import type { MirrorConfig } from "../../config.js";
import { ConfigError } from "../../errors.js";
import { ExtractorRegistry } from "../../extract/extractor-registry.js";
import { createLogger } from "../../logger.js";
import type { Logger } from "../../logger.js";
import { buildManifest } from "../../manifest/builder.js";
import { parseManifestJson } from "../../manifest/json.js";
import type { Manifest } from "../../manifest/manifest.js";
import { MirrorManager } from "../../mirror/mirror-manager.js";
import { formatMirrorReport } from "../../mirror/report.js";
import type { MirrorReport } from "../../mirror/types.js";
import { S3ObjectStore, createS3Client } from "../../store/s3-object-store.js";
import type { ObjectStore } from "../../store/types.js";
import { parseInteger } from "../options.js";

export interface SyncCommandOptions {
  manifest?: string;
  select?: string;
  glob?: string;
  bucket?: string;
  endpoint?: string;
  region?: string;
  concurrency?: number;
  extractConcurrency?: number;
  retries?: number;
  timeout?: number;
  extract?: boolean;
  keepArchives?: boolean;
  stateFile?: string;
}

/** Collaborators a caller may supply instead of the defaults */
export interface SyncDependencies {
  store?: ObjectStore;
  registry?: ExtractorRegistry;
  logger?: Logger;
  signal?: AbortSignal;
}

export function syncConfigFromOptions(dest: string, options: SyncCommandOptions): MirrorConfig {
  const config = buildMirrorConfig({
    localRoot: dest,
    bucket: options.bucket,
    endpoint: options.endpoint,
    region: options.region,
    concurrency: options.concurrency,
    extractConcurrency: options.extractConcurrency,
    maxRetries: options.retries,
    fetchTimeoutMs: options.timeout,
    extract: options.extract,
    keepArchives: options.keepArchives,
    stateFilePath: options.stateFile,
  });

  const problems = validateMirrorConfig(config);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

/**
 * Load the manifest from a JSON file when given, otherwise list the
 * prefix in the bucket. Manifest errors surface before any download.
 */
export async function loadManifest(
  prefix: string,
  store: ObjectStore,
  manifestPath?: string
): Promise<Manifest> {
  if (manifestPath !== undefined) {
    return parseManifestJson(fs.readFileSync(manifestPath, "utf-8"), { rootPath: prefix });
  }
  return buildManifest(await store.list(prefix), { rootPath: prefix });
}

export async function runSync(
  prefix: string,
  dest: string,
  options: SyncCommandOptions = {},
  deps: SyncDependencies = {}
): Promise<MirrorReport> {
  const config = syncConfigFromOptions(dest, options);
  const logger = deps.logger ?? createLogger({ pretty: process.stderr.isTTY });
  const store =
    deps.store ??
    new S3ObjectStore(
      createS3Client(config),
      { bucket: config.bucket, maxListPages: config.maxListPages },
      logger
    );

  const manifest = await loadManifest(prefix, store, options.manifest);
  const registry = deps.registry ?? ExtractorRegistry.withDefaults(logger);
  const manager = new MirrorManager(store, registry, config, logger);

  return manager.mirror(
    manifest,
    { prefix: options.select, glob: options.glob },
    { signal: deps.signal }
  );
}

/** Colour the plain report lines for a terminal */
export function colorReportLine(line: string): string {
  if (line.startsWith("Warning:")) return chalk.yellow(line);
  if (line.startsWith("Failures:") || line.startsWith("  [")) return chalk.red(line);
  if (line.startsWith("Source:")) return chalk.blue(line);
  return line;
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Mirror a dataset prefix into a local directory")
    .argument("<prefix>", "Dataset prefix in the bucket")
    .argument("<dest>", "Local destination directory")
    .option("--manifest <file>", "Use a manifest JSON file instead of listing the bucket")
    .option("--select <prefix>", "Only sync entries under this path")
    .option("--glob <pattern>", "Only sync entries matching this glob")
    .option("--bucket <name>", "Bucket name (env: DSMIRROR_BUCKET)")
    .option("--endpoint <url>", "S3-compatible endpoint (env: DSMIRROR_ENDPOINT)")
    .option("--region <region>", "Region (env: DSMIRROR_REGION)")
    .option("--concurrency <n>", "Parallel downloads", parseInteger)
    .option("--extract-concurrency <n>", "Parallel extractions", parseInteger)
    .option("--retries <n>", "Retries per object", parseInteger)
    .option("--timeout <ms>", "Timeout per download attempt", parseInteger)
    .option("--no-extract", "Keep archives as downloaded")
    .option("--keep-archives", "Keep archives after extracting them")
    .option("--state-file <path>", "Sync state file (env: DSMIRROR_STATE_FILE)")
    .action(async (prefix: string, dest: string, options: SyncCommandOptions) => {
      const controller = new AbortController();
      const onSigint = (): void => {
        console.error(chalk.yellow("Cancelling: in-flight downloads will finish first..."));
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      try {
        const report = await runSync(prefix, dest, options, { signal: controller.signal });
        for (const line of formatMirrorReport(report)) {
          console.log(colorReportLine(line));
        }

        if (report.success) {
          console.log(chalk.green("Mirror complete."));
        } else {
          console.log(
            chalk.red(report.cancelled > 0 ? "Mirror cancelled." : "Mirror finished with failures.")
          );
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(chalk.red("Sync failed:"), error instanceof Error ? error.message : error);
        process.exit(1);
      } finally {
        process.removeListener("SIGINT", onSigint);
      }
    });
}
