#!/usr/bin/env tsx
/**
 * Mailpaste CLI
 *
 * Usage:
 *   mailpaste transform draft.html                 # print { html, messages, stats } as JSON
 *   mailpaste transform draft.html --out out.html  # write the HTML, messages to stderr
 *   mailpaste asset https://example.com/a.jpg      # rehost one image, print the asset
 *   mailpaste asset a.png b.jpg --batch            # rehost as one fail-fast batch
 *
 * Uses the same configuration as the server (.env, STORAGE_DRIVER, R2_*).
 * Progress goes to stderr so stdout stays machine-readable.
 */

import { config as loadEnv } from "dotenv";
import { readFile, writeFile } from "node:fs/promises";
import { assertStorageConfig, loadConfig } from "@mailpaste/server/config";
import { createPipeline, type Pipeline } from "@mailpaste/server/pipeline";
import { isPipelineError, errorMessage } from "@mailpaste/server/errors";
import { USAGE, UsageError, parseArgs, toBatchInputs, type Command } from "./args.js";

const stderrLogger = { log: console.error, warn: console.error, error: console.error };

async function run(command: Exclude<Command, { name: "help" }>, pipeline: Pipeline): Promise<number> {
  if (command.name === "transform") {
    const html = await readFile(command.file, "utf8");
    const result = await pipeline.transformer.transform(html);
    if (command.out) {
      await writeFile(command.out, result.html);
      for (const message of result.messages) console.error(`   ${message}`);
      console.error(
        `✅ ${command.out}: ${result.stats.imagesRehosted}/${result.stats.imagesProcessed} images rehosted`,
      );
    } else {
      console.log(JSON.stringify(result, null, 2));
    }
    return 0;
  }

  const items = await toBatchInputs(command.inputs, (path) => readFile(path));
  if (command.batch) {
    const assets = await pipeline.assets.processBatch(items);
    console.log(JSON.stringify({ assets, count: assets.length }, null, 2));
    return 0;
  }

  let failures = 0;
  for (const [i, item] of items.entries()) {
    try {
      const asset = item.url
        ? await pipeline.assets.processFromUrl(item.url)
        : item.dataUri
          ? await pipeline.assets.processFromDataUri(item.dataUri)
          : await pipeline.assets.processFromBytes(item.data ?? new Uint8Array());
      console.log(JSON.stringify(asset, null, 2));
    } catch (err) {
      failures++;
      console.error(`❌ ${command.inputs[i]}: ${errorMessage(err)}`);
    }
  }
  return failures > 0 ? 1 : 0;
}

async function main(): Promise<number> {
  let command: Command;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }
  if (command.name === "help") {
    console.log(USAGE);
    return 0;
  }

  loadEnv();
  const config = loadConfig();
  assertStorageConfig(config);
  const pipeline = createPipeline(config, stderrLogger);
  try {
    return await run(command, pipeline);
  } catch (err) {
    console.error(isPipelineError(err) ? `❌ ${err.code}: ${err.message}` : `❌ ${errorMessage(err)}`);
    return 1;
  } finally {
    await pipeline.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  },
);
