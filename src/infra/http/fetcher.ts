import { ClassifiedError } from "../../domain/errors.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

const USER_AGENT = "mmsearch-crawler/0.1 (+https://example.invalid/bot)";

/** Network failure while fetching a page or asset; always worth a retry. */
export class FetchError extends ClassifiedError {
  constructor(
    readonly url: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super("transient_io", message, options);
    this.name = "FetchError";
  }
}

export class HttpStatusError extends FetchError {
  constructor(
    url: string,
    readonly status: number,
  ) {
    super(url, `GET ${url} failed with HTTP ${status}.`);
    this.name = "HttpStatusError";
  }
}

export class FetchTimeoutError extends FetchError {
  constructor(
    url: string,
    readonly timeoutMs: number,
  ) {
    super(url, `GET ${url} timed out after ${timeoutMs} ms.`);
    this.name = "FetchTimeoutError";
  }
}

export class PayloadTooLargeError extends FetchError {
  constructor(
    url: string,
    readonly maxBytes: number,
  ) {
    super(url, `Payload of ${url} exceeds maximum allowed size of ${maxBytes} bytes.`);
    this.name = "PayloadTooLargeError";
  }
}

export interface FetchedPage {
  /** Final URL after redirects. */
  url: string;
  html: string;
}

export interface DownloadedAsset {
  url: string;
  contentType: string | null;
  data: Buffer;
}

export interface PageFetcher {
  fetchPage(url: string): Promise<FetchedPage>;
}

export interface AssetDownloader {
  download(url: string): Promise<DownloadedAsset>;
}

export interface HttpFetcherOptions {
  pageTimeoutMs: number;
  assetTimeoutMs: number;
  maxAssetBytes: number;
  fetchImpl?: FetchLike;
}

export class HttpFetcher implements PageFetcher, AssetDownloader {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchPage(url: string): Promise<FetchedPage> {
    const { response, body } = await this.request(url, {
      timeoutMs: this.options.pageTimeoutMs,
      maxBytes: this.options.maxAssetBytes,
      accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.5",
    });

    const contentType = mediaTypeOf(response.headers.get("content-type"));
    if (contentType && !contentType.includes("html")) {
      throw new FetchError(url, `GET ${url} returned ${contentType}, expected HTML.`);
    }

    return { url: response.url || url, html: body.toString("utf-8") };
  }

  async download(url: string): Promise<DownloadedAsset> {
    const { response, body } = await this.request(url, {
      timeoutMs: this.options.assetTimeoutMs,
      maxBytes: this.options.maxAssetBytes,
      accept: "*/*",
    });

    return {
      url,
      contentType: mediaTypeOf(response.headers.get("content-type")),
      data: body,
    };
  }

  private async request(
    url: string,
    limits: { timeoutMs: number; maxBytes: number; accept: string },
  ): Promise<{ response: Response; body: Buffer }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, limits.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: { "user-agent": USER_AGENT, accept: limits.accept },
        redirect: "follow",
        signal: controller.signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new HttpStatusError(url, response.status);
      }

      const body = await collectBody(url, response, limits.maxBytes, controller);
      return { response, body };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new FetchTimeoutError(url, limits.timeoutMs);
      }
      throw new FetchError(
        url,
        `GET ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Buffers the body, giving up as soon as it is known to pass `maxBytes`. */
async function collectBody(
  url: string,
  response: Response,
  maxBytes: number,
  controller: AbortController,
): Promise<Buffer> {
  const stream = response.body;
  const declaredLength = Number(response.headers.get("content-length") ?? 0);
  if (declaredLength > maxBytes) {
    await stream?.cancel();
    throw new PayloadTooLargeError(url, maxBytes);
  }
  if (!stream) {
    return Buffer.alloc(0);
  }

  const reader = stream.getReader();
  const parts: Uint8Array[] = [];
  let received = 0;
  for (let next = await reader.read(); !next.done; next = await reader.read()) {
    received += next.value.byteLength;
    if (received > maxBytes) {
      await reader.cancel();
      controller.abort();
      throw new PayloadTooLargeError(url, maxBytes);
    }
    parts.push(next.value);
  }
  return Buffer.concat(parts, received);
}

/** `"Text/HTML; charset=utf-8"` becomes `"text/html"`. */
function mediaTypeOf(header: string | null): string | null {
  const essence = header?.split(";", 1)[0].trim().toLowerCase();
  return essence || null;
}
