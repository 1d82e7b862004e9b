// pattern: Imperative Shell
import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Logger } from "pino";
import { errorMessage } from "../errors";
import { linkIdentifier, toArtifactUrl } from "./extractor";
import type { LinkTarget } from "./extractor";
import type { CandidateLink, DownloadOutcome } from "./types";

const MAX_FILE_NAME_LENGTH = 200;

export type DownloaderOptions = {
  readonly target: LinkTarget;
  readonly destinationDir: string;
  readonly timeoutMs: number;
  readonly userAgent: string;
  /**
   * File names already written, keyed to the link that wrote them. A title
   * that collides with another link's file gets the paper identifier
   * appended instead of overwriting it.
   */
  readonly claimedNames?: Map<string, CandidateLink>;
};

/**
 * Turns a paper title into a file name stem. Returns an empty string when
 * nothing usable is left.
 */
export function sanitizeFileName(title: string): string {
  return title
    .replace(/\s+/g, " ")
    .replace(/[/\\:*?"<>|\u0000-\u001f\u007f]/g, "")
    .replace(/ {2,}/g, " ")
    .slice(0, MAX_FILE_NAME_LENGTH)
    .replace(/^[\s.]+|[\s.]+$/g, "");
}

export function artifactFileName(
  link: CandidateLink,
  title: string,
  target: LinkTarget,
  withIdentifier = false,
): string {
  const identifier = sanitizeFileName(
    linkIdentifier(link, target).replace(/\//g, "_"),
  );
  const titled = sanitizeFileName(title);
  if (!titled) return `${identifier || "untitled"}${target.fileExtension}`;
  return withIdentifier && identifier
    ? `${titled} (${identifier})${target.fileExtension}`
    : `${titled}${target.fileExtension}`;
}

function chooseFileName(
  link: CandidateLink,
  title: string,
  options: DownloaderOptions,
): string {
  const name = artifactFileName(link, title, options.target);
  const owner = options.claimedNames?.get(name);
  return owner === undefined || owner === link
    ? name
    : artifactFileName(link, title, options.target, true);
}

/**
 * Streams the artifact behind `link` into `destinationDir`. The body goes to a
 * `.part` file that is renamed into place only after the last byte is written,
 * so a failed attempt never leaves a file under the final name. I/O failures
 * are reported in the outcome, never thrown.
 */
export async function downloadArtifact(
  link: CandidateLink,
  title: string,
  options: DownloaderOptions,
  logger: Logger,
): Promise<DownloadOutcome> {
  const url = toArtifactUrl(link, options.target);
  const fileName = chooseFileName(link, title, options);
  const path = join(options.destinationDir, fileName);
  const partPath = `${path}.part`;

  let response: Response;
  try {
    response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: { "User-Agent": options.userAgent },
    });
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }

  if (!response.ok) {
    return {
      ok: false,
      reason: `HTTP ${response.status}: ${response.statusText}`,
    };
  }

  if (!response.body) {
    return { ok: false, reason: "response has no body" };
  }

  try {
    await mkdir(options.destinationDir, { recursive: true });
    const sink = createWriteStream(partPath);
    await pipeline(Readable.fromWeb(response.body), sink);
    await rename(partPath, path);
    options.claimedNames?.set(fileName, link);
    logger.debug(
      { link, url, path, bytes: sink.bytesWritten },
      "artifact written",
    );
    return { ok: true, path, bytes: sink.bytesWritten };
  } catch (err) {
    try {
      await rm(partPath, { force: true });
    } catch (cleanupErr) {
      logger.warn(
        { partPath, error: errorMessage(cleanupErr) },
        "could not remove partial download",
      );
    }
    return { ok: false, reason: errorMessage(err) };
  }
}
