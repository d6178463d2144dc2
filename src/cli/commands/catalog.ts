/**
 * dsmirror catalog: list a dataset prefix and write its manifest JSON.
 */

import * as fs from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import { buildMirrorConfig } from "../../config.js";
import { ConfigError } from "../../errors.js";
import { createLogger } from "../../logger.js";
import type { Logger } from "../../logger.js";
import { buildManifest } from "../../manifest/builder.js";
import { serializeManifest } from "../../manifest/json.js";
import type { Manifest } from "../../manifest/manifest.js";
import { formatBytes } from "../../render/format-size.js";
import { S3ObjectStore, createS3Client } from "../../store/s3-object-store.js";
import type { ObjectStore } from "../../store/types.js";

export interface CatalogOptions {
  output?: string;
  bucket?: string;
  endpoint?: string;
  region?: string;
}

export interface CatalogDependencies {
  store?: ObjectStore;
  logger?: Logger;
}

/**
 * List a prefix and build its manifest.
 */
export async function runCatalog(
  prefix: string,
  options: CatalogOptions = {},
  deps: CatalogDependencies = {}
): Promise<Manifest> {
  const logger = deps.logger ?? createLogger({ pretty: process.stderr.isTTY });

  let store = deps.store;
  if (store === undefined) {
    const config = buildMirrorConfig({
      bucket: options.bucket,
      endpoint: options.endpoint,
      region: options.region,
    });
    if (!config.bucket) {
      throw new ConfigError(["bucket is required"]);
    }
    store = new S3ObjectStore(
      createS3Client(config),
      { bucket: config.bucket, maxListPages: config.maxListPages },
      logger
    );
  }

  const manifest = buildManifest(await store.list(prefix), { rootPath: prefix });
  logger.info(
    { prefix, leaves: manifest.leafCount, sizeBytes: manifest.sizeBytes },
    "Catalog built"
  );
  return manifest;
}

export function registerCatalogCommand(program: Command): void {
  program
    .command("catalog")
    .description("List a dataset prefix and write its manifest JSON")
    .argument("<prefix>", "Dataset prefix in the bucket")
    .option("-o, --output <file>", "Write to a file instead of stdout")
    .option("--bucket <name>", "Bucket name (env: DSMIRROR_BUCKET)")
    .option("--endpoint <url>", "S3-compatible endpoint (env: DSMIRROR_ENDPOINT)")
    .option("--region <region>", "Region (env: DSMIRROR_REGION)")
    .action(async (prefix: string, options: CatalogOptions) => {
      try {
        const manifest = await runCatalog(prefix, options);
        const json = serializeManifest(manifest);

        if (options.output) {
          fs.writeFileSync(options.output, json, "utf-8");
          console.error(
            chalk.green(
              `Wrote ${manifest.leafCount} entries (${formatBytes(manifest.sizeBytes)}) to ${options.output}`
            )
          );
        } else {
          process.stdout.write(json);
        }
      } catch (error) {
        console.error(chalk.red("Catalog failed:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
