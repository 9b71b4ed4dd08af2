#!/usr/bin/env node
import "dotenv/config";
import { readFile } from "node:fs/promises";
import { InvalidArgumentError, program } from "commander";
import { AppContext, createAppContext } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { fail, OperationResult } from "./domain/errors.js";
import { Modality } from "./domain/types.js";
import { SERVER_NAME, SERVER_VERSION } from "./mcpServer.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("cli");

interface CrawlCommandOptions {
  limit: number;
  delay: number;
}

interface IndexCommandOptions {
  type: Modality;
  sourceUrl: string;
  content?: string;
  path?: string;
  assetUrl?: string;
  altText: string;
}

interface SearchCommandOptions {
  type: Modality;
  limit: number;
  keyword?: boolean;
}

program
  .name("mmsearch")
  .description(`${SERVER_NAME}: crawl sites and search their text, images and audio`)
  .version(SERVER_VERSION);

program
  .command("crawl")
  .description("Crawl a site from a seed URL and index everything found")
  .argument("<seedUrl>", "URL to start crawling from")
  .option("--limit <n>", "Maximum number of pages to crawl", parsePositiveInt, 10)
  .option("--delay <seconds>", "Seconds to wait between pages", parseSeconds, 1)
  .action(async (seedUrl: string, options: CrawlCommandOptions) => {
    await withContext(async (context) => {
      log.info(`Starting crawl from ${seedUrl} with a limit of ${options.limit} pages.`);
      const result = await context.crawler.crawl({
        seedUrl,
        limit: options.limit,
        delayMs: Math.round(options.delay * 1000),
      });
      if (!result.ok) {
        return result;
      }

      log.info("Waiting for queued ingestion tasks to finish...");
      await context.queue.onIdle();

      const failures = context.queue.getFailures();
      printJson({ ...result.value, ingestion: context.queue.getStats(), failures });
      return failures.length === 0
        ? result
        : fail("transient_io", `${failures.length} ingestion task(s) failed.`);
    });
  });

program
  .command("index")
  .description("Index a single text snippet, image or audio file")
  .requiredOption("--type <type>", "text, image or audio", parseModality)
  .requiredOption("--source-url <url>", "Page the content was found on")
  .option("--content <text>", "Text to index (type=text)")
  .option("--path <file>", "Local asset file (type=image|audio)")
  .option("--asset-url <url>", "Public URL of the asset (type=image|audio)")
  .option("--alt-text <text>", "Alt text (type=image)", "")
  .action(async (options: IndexCommandOptions) => {
    await withContext(async (context) => {
      log.info(`Starting indexing for type: ${options.type}`);

      if (options.type === "text") {
        if (!options.content) {
          return fail("validation", "--content is required for type=text.");
        }
        const result = await context.ingestion.ingestText(options.content, options.sourceUrl);
        if (result.ok) {
          printJson({ id: result.value.id, source_page_url: result.value.sourcePageUrl });
        }
        return result;
      }

      if (!options.path || !options.assetUrl) {
        return fail("validation", `--path and --asset-url are required for type=${options.type}.`);
      }

      const data = await readFile(options.path);
      const result =
        options.type === "image"
          ? await context.ingestion.ingestImageBytes(
              data,
              { url: options.assetUrl, altText: options.altText },
              options.sourceUrl,
            )
          : await context.ingestion.ingestAudioBytes(
              data,
              { url: options.assetUrl },
              options.sourceUrl,
            );
      if (result.ok) {
        printJson(result.value);
      }
      return result;
    });
  });

program
  .command("search")
  .description("Search indexed content with a text query")
  .argument("<query>", "Search query")
  .option("--type <type>", "text, image or audio", parseModality, "text")
  .option("--limit <n>", "Maximum number of results", parsePositiveInt, 10)
  .option("--keyword", "Match words in text content or image alt text instead")
  .action(async (query: string, options: SearchCommandOptions) => {
    await withContext(async (context) => {
      const modality = options.type;
      if (options.keyword && modality === "audio") {
        return fail("validation", "Keyword search supports text and image only.");
      }
      const result =
        options.keyword && modality !== "audio"
          ? await context.retrieval.searchByKeyword({ query, modality, limit: options.limit })
          : await context.retrieval.searchByText({ query, modality, limit: options.limit });
      if (result.ok) {
        printJson(result.value);
      }
      return result;
    });
  });

/**
 * Builds the app, runs one command and always releases the store. A failed
 * result is logged and sets a non-zero exit code.
 */
async function withContext(run: (context: AppContext) => Promise<OperationResult<unknown>>) {
  const context = await createAppContext(loadConfig());
  try {
    const result = await run(context);
    if (!result.ok) {
      log.error(`${result.error.kind}: ${result.error.message}`);
      process.exitCode = 1;
    }
  } finally {
    await context.close();
  }
}

function printJson(payload: unknown) {
  process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return parsed;
}

function parseModality(value: string): Modality {
  if (value === "text" || value === "image" || value === "audio") {
    return value;
  }
  throw new InvalidArgumentError("Expected text, image or audio.");
}

program.parseAsync(process.argv).catch((error: unknown) => {
  log.fatal(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
