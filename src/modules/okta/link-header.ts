/**
 * Parses an RFC 8288 `Link` header into `rel -> url`.
 * Okta paginates with `Link: <https://…/api/v1/users?after=abc&limit=200>; rel="next"`.
 */
export function parseLinkHeader(header: string | null): Record<string, string> {
  const links: Record<string, string> = {};
  if (!header) return links;

  for (const part of header.split(',')) {
    const match = /<([^>]*)>\s*;(.*)/.exec(part.trim());
    if (!match) continue;

    const [, url, params] = match;
    const rel = /rel\s*=\s*"?([^";]+)"?/i.exec(params);
    if (!rel) continue;

    for (const name of rel[1].trim().split(/\s+/)) {
      links[name] = url;
    }
  }

  return links;
}

/** The opaque cursor is the `after` parameter of the next link. */
export function nextCursorFrom(header: string | null): string | undefined {
  const next = parseLinkHeader(header).next;
  if (!next) return undefined;

  try {
    return new URL(next).searchParams.get('after') ?? undefined;
  } catch {
    return undefined;
  }
}
