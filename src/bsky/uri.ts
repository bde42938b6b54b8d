/**
 * AT-URI and bsky.app profile URL helpers.
 *
 *   at://<did>/<collection>/<rkey>
 *   https://bsky.app/profile/<actor>/<segment>/<rkey>
 */

export const COLLECTIONS = {
  feed: "app.bsky.feed.generator",
  lists: "app.bsky.graph.list",
  post: "app.bsky.feed.post",
  repost: "app.bsky.feed.repost",
  like: "app.bsky.feed.like",
} as const;

/** Profile URL segment for each reference kind. */
export type RefSegment = "feed" | "lists" | "post";

const PROFILE_MARKER = "bsky.app/profile/";

export function isAtUri(value: string): boolean {
  return value.startsWith("at://");
}

export function isDid(actor: string): boolean {
  return actor.toLowerCase().startsWith("did:");
}

/** Everything after "bsky.app/profile/", split on "/" with empty parts dropped; null when absent. */
function profileParts(url: string): string[] | null {
  const idx = url.toLowerCase().indexOf(PROFILE_MARKER);
  if (idx < 0) return null;
  const tail = url.slice(idx + PROFILE_MARKER.length);
  return tail.split(/[?#]/, 1)[0].split("/").filter(Boolean);
}

/** Actor and record key of `.../profile/<actor>/<segment>/<rkey>` when the segment matches. */
export function parseProfileUrl(url: string, segment: RefSegment): { actor: string; rkey: string } | null {
  const parts = profileParts(url.trim());
  if (!parts || parts.length < 3) return null;
  const [actor, seg, rkey] = parts;
  if (seg.toLowerCase() !== segment) return null;
  return { actor, rkey };
}

/** Actor of `https://bsky.app/profile/<actor>[/...]`; null for anything else. */
export function profileActor(url: string): string | null {
  const parts = profileParts(url.trim());
  if (!parts || parts.length === 0) return null;
  return parts[0].trim() || null;
}

export function buildAtUri(did: string, segment: RefSegment, rkey: string): string {
  return `at://${did}/${COLLECTIONS[segment]}/${rkey}`;
}

/** Last path segment of an AT-URI; "" when there is none. */
export function rkeyOf(atUri: string): string {
  if (!isAtUri(atUri)) return "";
  const parts = atUri.slice("at://".length).split("/");
  if (parts.length < 3) return "";
  return parts[parts.length - 1];
}
