import assert from "node:assert";
import * as cheerio from "cheerio";
import { ResolutionError, errorMessage } from "../errors";
import { isAbstractLink } from "./extractor";
import type { LinkTarget } from "./extractor";
import type { CandidateLink } from "./types";

export type ResolverOptions = {
  readonly target: LinkTarget;
  readonly timeoutMs: number;
  readonly userAgent: string;
};

/**
 * Pulls the display title out of an abstract page. Drops everything up to the
 * last `]`, which is where arXiv puts its `[2401.00001]` prefix.
 */
export function parseTitle(html: string): string | null {
  const $ = cheerio.load(html);
  const element = $("title").first();
  if (element.length === 0) return null;

  const text = element.text();
  const title = text
    .slice(text.lastIndexOf("]") + 1)
    .replace(/\s+/g, " ")
    .trim();

  return title.length > 0 ? title : null;
}

export async function resolveTitle(
  link: CandidateLink,
  options: ResolverOptions,
): Promise<string> {
  assert.ok(
    isAbstractLink(link, options.target),
    `resolveTitle expects an abstract-page link, got ${link}`,
  );

  let response: Response;
  try {
    response = await fetch(link, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/html,application/xhtml+xml",
      },
    });
  } catch (err) {
    throw new ResolutionError(link, "network", errorMessage(err));
  }

  if (!response.ok) {
    throw new ResolutionError(
      link,
      "status",
      `HTTP ${response.status}: ${response.statusText}`,
    );
  }

  let html: string;
  try {
    html = await response.text();
  } catch (err) {
    throw new ResolutionError(link, "network", errorMessage(err));
  }

  const title = parseTitle(html);
  if (title === null) {
    throw new ResolutionError(link, "parse", "page has no title element");
  }

  return title;
}
