/**
 * Maps validated API views onto ContentItem. Embed classification follows the
 * $type of each view (images#view, video#view, external#view, record#view,
 * recordWithMedia#view).
 */
import type { ContentItem, EmbedDescriptor, FeedEntry, MediaDescriptor } from "../types/index.js";
import { FeedViewPostSchema, PostViewSchema, type PostView } from "../types/bsky.js";

const IMAGES = "app.bsky.embed.images";
const VIDEO = "app.bsky.embed.video";
const EXTERNAL = "app.bsky.embed.external";
const RECORD = "app.bsky.embed.record";
const RECORD_WITH_MEDIA = "app.bsky.embed.recordWithMedia";
const TAG_FACET = "app.bsky.richtext.facet#tag";

/** ISO timestamp to epoch ms; undefined when missing or unparsable. */
export function parseTimestamp(iso: string | undefined): number | undefined {
  if (!iso) return undefined;
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? undefined : ms;
}

function classifyMedia(media: { $type?: string; images?: unknown[] } | undefined): MediaDescriptor {
  const t = media?.$type ?? "";
  if (t.includes(IMAGES)) return { kind: "images", count: media?.images?.length ?? 0 };
  if (t.includes(VIDEO)) return { kind: "video" };
  return { kind: "other", type: t };
}

export function classifyEmbed(embed: PostView["embed"]): EmbedDescriptor {
  if (!embed) return { kind: "none" };
  const t = embed.$type ?? "";
  // recordWithMedia contains "record" as a prefix, so it goes first.
  if (t.includes(RECORD_WITH_MEDIA)) return { kind: "quote-with-media", media: classifyMedia(embed.media) };
  if (t.includes(IMAGES)) return { kind: "images", count: embed.images?.length ?? 0 };
  if (t.includes(VIDEO)) return { kind: "video" };
  if (t.includes(EXTERNAL)) return { kind: "external" };
  if (t.includes(RECORD)) return { kind: "quote" };
  return { kind: "unknown", type: t };
}

function facetTags(record: PostView["record"]): string[] {
  const tags: string[] = [];
  for (const facet of record.facets ?? []) {
    for (const feature of facet.features) {
      if ((feature.$type ?? "").includes(TAG_FACET) && feature.tag) tags.push(feature.tag);
    }
  }
  return tags;
}

export function toContentItem(view: PostView): ContentItem {
  return {
    uri: view.uri || undefined,
    cid: view.cid || undefined,
    authorDid: view.author.did,
    authorHandle: view.author.handle,
    timestamp: parseTimestamp(view.indexedAt) ?? parseTimestamp(view.record.createdAt),
    text: view.record.text,
    tags: facetTags(view.record),
    embed: classifyEmbed(view.embed),
    isReply: view.record.reply != null,
  };
}

/** Validates one raw post view; null when it does not have the expected shape. */
export function parsePostView(raw: unknown): ContentItem | null {
  const result = PostViewSchema.safeParse(raw);
  return result.success ? toContentItem(result.data) : null;
}

/** Validates one raw feed entry; null when it does not have the expected shape. */
export function parseFeedEntry(raw: unknown): FeedEntry | null {
  const result = FeedViewPostSchema.safeParse(raw);
  if (!result.success) return null;
  const reasonType = result.data.reason?.$type;
  return { item: toContentItem(result.data.post), ...(reasonType ? { reasonType } : {}) };
}
