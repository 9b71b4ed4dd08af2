import { load } from "cheerio";
import { hasChildren, isTag, isText } from "domhandler";
import type { AnyNode } from "domhandler";
import { AudioAssetDescriptor, ImageAssetDescriptor } from "../domain/types.js";
import { AUDIO_EXTENSIONS } from "../infra/media/audioDecoder.js";
import { IMAGE_EXTENSIONS } from "../infra/media/imageDecoder.js";

export interface PageFragments {
  texts: string[];
  images: ImageAssetDescriptor[];
  audio: AudioAssetDescriptor[];
  links: string[];
}

const NON_VISIBLE_TAGS = new Set([
  "script",
  "style",
  "head",
  "title",
  "meta",
  "noscript",
  "template",
]);

/**
 * Pulls visible text, media references and crawlable links out of one page.
 * Every URL returned is absolute; relative references resolve against
 * `pageUrl`. No I/O happens here.
 */
export function extractFragments(html: string, pageUrl: string): PageFragments {
  const $ = load(html);
  const base = new URL(pageUrl);

  const texts: string[] = [];
  const body = $("body").get(0);
  if (body) {
    collectVisibleText(body, texts);
  }

  const images = new Map<string, ImageAssetDescriptor>();
  $("img[src]").each((_, element) => {
    const url = resolveMediaUrl($(element).attr("src"), base, IMAGE_EXTENSIONS);
    if (url && !images.has(url)) {
      images.set(url, { url, altText: ($(element).attr("alt") ?? "").trim() });
    }
  });

  const audio = new Map<string, AudioAssetDescriptor>();
  $("audio[src], audio source[src]").each((_, element) => {
    const url = resolveMediaUrl($(element).attr("src"), base, AUDIO_EXTENSIONS);
    if (url && !audio.has(url)) {
      audio.set(url, { url });
    }
  });

  const links = new Set<string>();
  $("a[href]").each((_, element) => {
    const url = resolveLink($(element).attr("href"), base);
    if (url) {
      links.add(url);
    }
  });

  return {
    texts,
    images: [...images.values()],
    audio: [...audio.values()],
    links: [...links],
  };
}

function collectVisibleText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    const trimmed = node.data.trim();
    if (trimmed) {
      out.push(trimmed);
    }
    return;
  }
  if (isTag(node) && NON_VISIBLE_TAGS.has(node.name)) {
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectVisibleText(child, out);
    }
  }
}

function resolveUrl(raw: string | undefined, base: URL): URL | null {
  const value = raw?.trim();
  if (!value) {
    return null;
  }
  try {
    return new URL(value, base);
  } catch {
    return null;
  }
}

function resolveMediaUrl(
  raw: string | undefined,
  base: URL,
  extensions: readonly string[],
): string | null {
  const url = resolveUrl(raw, base);
  if (!url || (url.protocol !== "http:" && url.protocol !== "https:")) {
    return null;
  }
  const pathname = url.pathname.toLowerCase();
  return extensions.some((extension) => pathname.endsWith(extension)) ? url.href : null;
}

function resolveLink(raw: string | undefined, base: URL): string | null {
  const url = resolveUrl(raw, base);
  if (!url || (url.protocol !== "http:" && url.protocol !== "https:")) {
    return null;
  }
  if (url.origin !== base.origin) {
    return null;
  }
  url.hash = "";
  return url.href;
}
