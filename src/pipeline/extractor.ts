// pattern: functional-core
import type { TargetConfig } from "../config";
import type { FavoritedItem } from "../feed/types";
import type { CandidateLink } from "./types";

export type LinkTarget = Pick<
  TargetConfig,
  "domain" | "abstractPath" | "filePath" | "fileExtension"
>;

function canonicalHost(hostname: string): string {
  const host = hostname.toLowerCase();
  return host.startsWith("www.") ? host.slice(4) : host;
}

function isTargetHost(host: string, domain: string): boolean {
  const target = canonicalHost(domain);
  return host === target || host.endsWith(`.${target}`);
}

/**
 * Maps an embedded URL to its abstract-page key, or `null` when it is not a
 * paper link on the target domain. Direct file links (`/pdf/<id>.pdf`) are
 * rewritten to `/abs/<id>`, and mirror subdomains fold onto the target
 * domain. Idempotent.
 */
export function normalizeLink(
  rawUrl: string,
  target: LinkTarget,
): CandidateLink | null {
  let url: URL;
  try {
    url = new URL(rawUrl.trim());
  } catch {
    return null;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") return null;

  const host = canonicalHost(url.hostname);
  if (!isTargetHost(host, target.domain)) return null;

  const fileMarker = `/${target.filePath}/`;
  const abstractMarker = `/${target.abstractPath}/`;

  let path = url.pathname.replace(/\/+$/, "");
  if (path.startsWith(fileMarker)) {
    path = abstractMarker + path.slice(fileMarker.length);
    if (path.toLowerCase().endsWith(target.fileExtension.toLowerCase())) {
      path = path.slice(0, -target.fileExtension.length);
    }
  }

  if (!path.startsWith(abstractMarker) || path.length === abstractMarker.length) {
    return null;
  }

  return `https://${canonicalHost(target.domain)}${path}`;
}

export function isAbstractLink(link: string, target: LinkTarget): boolean {
  return normalizeLink(link, target) === link;
}

/**
 * Collects the distinct candidate links embedded in one item, in the order
 * they appear.
 */
export function extractLinks(
  item: FavoritedItem,
  target: LinkTarget,
): ReadonlySet<CandidateLink> {
  const links = new Set<CandidateLink>();
  for (const { expandedUrl } of item.urls) {
    const link = normalizeLink(expandedUrl, target);
    if (link) links.add(link);
  }
  return links;
}

/**
 * Inverse of the file-link rewrite: `/abs/<id>` becomes `/pdf/<id>`.
 */
export function toArtifactUrl(link: CandidateLink, target: LinkTarget): string {
  const url = new URL(link);
  const abstractMarker = `/${target.abstractPath}/`;
  if (url.pathname.startsWith(abstractMarker)) {
    url.pathname = `/${target.filePath}/${url.pathname.slice(abstractMarker.length)}`;
  }
  return url.toString();
}

export function linkIdentifier(link: CandidateLink, target: LinkTarget): string {
  const path = new URL(link).pathname;
  const abstractMarker = `/${target.abstractPath}/`;
  return path.startsWith(abstractMarker)
    ? path.slice(abstractMarker.length)
    : path.replace(/^\/+/, "");
}
