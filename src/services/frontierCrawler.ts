import { fail, OperationResult, succeed, toOperationError } from "../domain/errors.js";
import { PageFetcher } from "../infra/http/fetcher.js";
import { extractFragments } from "../pipelines/fragmentExtraction.js";
import { AppLogger, createLogger } from "../utils/logger.js";
import { sleep as defaultSleep, Sleep } from "../utils/time.js";
import { IngestionDispatcher } from "./ingestionDispatcher.js";

export interface CrawlOptions {
  seedUrl: string;
  /** Maximum number of distinct pages fetched in this run. */
  limit: number;
  /** Pause after each successfully processed page. */
  delayMs: number;
}

export interface CrawlFailure {
  url: string;
  reason: string;
}

export interface CrawlReport {
  seedUrl: string;
  visited: string[];
  failed: CrawlFailure[];
  dispatched: {
    text: number;
    image: number;
    audio: number;
  };
}

export interface FrontierCrawlerDeps {
  fetcher: PageFetcher;
  dispatcher: IngestionDispatcher;
  sleep?: Sleep;
  logger?: AppLogger;
}

/**
 * Breadth-first, same-origin site traversal. Pages are fetched one at a time;
 * every fragment found is handed to the dispatcher without waiting for it.
 */
export class FrontierCrawler {
  private readonly sleep: Sleep;

  private readonly logger: AppLogger;

  constructor(private readonly deps: FrontierCrawlerDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? createLogger("crawler");
  }

  async crawl(options: CrawlOptions): Promise<OperationResult<CrawlReport>> {
    const seed = parseSeed(options.seedUrl);
    if (!seed) {
      return fail("validation", `Seed URL must be an absolute http(s) URL: ${options.seedUrl}`);
    }
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      return fail("validation", "Crawl limit must be a positive integer.");
    }
    if (!Number.isFinite(options.delayMs) || options.delayMs < 0) {
      return fail("validation", "Crawl delay must be zero or more milliseconds.");
    }

    const report: CrawlReport = {
      seedUrl: seed.href,
      visited: [],
      failed: [],
      dispatched: { text: 0, image: 0, audio: 0 },
    };
    const visited = new Set<string>();
    const queued = new Set<string>([seed.href]);
    const frontier: string[] = [seed.href];
    let head = 0;

    while (head < frontier.length && visited.size < options.limit) {
      const url = frontier[head];
      head += 1;
      if (visited.has(url)) {
        continue;
      }
      visited.add(url);
      report.visited.push(url);
      this.logger.info(`Crawling ${url} (${visited.size}/${options.limit})`);

      let html: string;
      let pageUrl: string;
      try {
        const page = await this.deps.fetcher.fetchPage(url);
        html = page.html;
        pageUrl = page.url;
      } catch (error) {
        const reason = toOperationError(error).message;
        this.logger.error(`Could not fetch ${url}: ${reason}`);
        report.failed.push({ url, reason });
        continue;
      }

      const fragments = extractFragments(html, pageUrl);
      for (const text of fragments.texts) {
        this.deps.dispatcher.dispatchText(text, url);
      }
      for (const image of fragments.images) {
        this.deps.dispatcher.dispatchMedia(image, url, "image");
      }
      for (const audio of fragments.audio) {
        this.deps.dispatcher.dispatchMedia(audio, url, "audio");
      }
      report.dispatched.text += fragments.texts.length;
      report.dispatched.image += fragments.images.length;
      report.dispatched.audio += fragments.audio.length;

      for (const link of fragments.links) {
        if (new URL(link).origin !== seed.origin || visited.has(link) || queued.has(link)) {
          continue;
        }
        queued.add(link);
        frontier.push(link);
      }

      this.logger.debug(
        `Dispatched ${fragments.texts.length} text, ${fragments.images.length} image, ${fragments.audio.length} audio fragment(s) from ${url}`,
      );

      const moreToCrawl = head < frontier.length && visited.size < options.limit;
      if (moreToCrawl && options.delayMs > 0) {
        await this.sleep(options.delayMs);
      }
    }

    this.logger.info(
      `Crawl finished: ${report.visited.length} visited, ${report.failed.length} failed`,
    );
    return succeed(report);
  }
}

function parseSeed(value: string): URL | null {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return null;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return null;
  }
  parsed.hash = "";
  return parsed;
}
