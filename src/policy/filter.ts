import type { ContentItem, EmbedDescriptor, ProvenanceContext } from "../types/index.js";
import type { Blocklist } from "./blocklist.js";

export interface ContentPolicyConfig {
  /** Tag feed/list items must carry, without "#"; "" disables the rule. */
  requiredTag: string;
  blocklist: Blocklist;
}

export interface FilterInput {
  item: ContentItem;
  /** Present only for feed/list items; switches on the reshare and required-tag rules. */
  provenance?: ProvenanceContext;
}

export type RejectReason = "reshare" | "reply" | "missing-tag" | "not-media" | "blocked";

export type PolicyVerdict = { allowed: true } | { allowed: false; reason: RejectReason };

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** "#tag" as a whole token in the text, or a tag facet equal to the tag; both case-insensitive. */
export function hasRequiredTag(item: Pick<ContentItem, "text" | "tags">, tag: string): boolean {
  const wanted = tag.replace(/^#+/, "").trim();
  if (!wanted) return true;
  const pattern = new RegExp(`(?:^|\\s)#${escapeRegExp(wanted)}(?![\\p{L}\\p{N}_])`, "iu");
  if (pattern.test(item.text)) return true;
  const lower = wanted.toLowerCase();
  return item.tags.some((t) => t.toLowerCase() === lower);
}

/** Images (at least one) or video, directly or as the media part of a quote. */
export function isMediaOnly(embed: EmbedDescriptor): boolean {
  switch (embed.kind) {
    case "images":
      return embed.count > 0;
    case "video":
      return true;
    case "quote-with-media":
      return embed.media.kind === "video" || (embed.media.kind === "images" && embed.media.count > 0);
    default:
      return false;
  }
}

/** Ordered, short-circuiting admission checks for a single item. */
export class ContentPolicy {
  private readonly config: ContentPolicyConfig;

  constructor(config: ContentPolicyConfig) {
    this.config = config;
  }

  isBlocked(item: ContentItem): boolean {
    return this.config.blocklist.blocks(item);
  }

  evaluate({ item, provenance }: FilterInput): PolicyVerdict {
    if (provenance?.reshared === true) {
      return { allowed: false, reason: "reshare" };
    }
    if (item.isReply) {
      return { allowed: false, reason: "reply" };
    }
    if (provenance && !hasRequiredTag(item, this.config.requiredTag)) {
      return { allowed: false, reason: "missing-tag" };
    }
    if (!isMediaOnly(item.embed)) {
      return { allowed: false, reason: "not-media" };
    }
    if (this.isBlocked(item)) {
      return { allowed: false, reason: "blocked" };
    }
    return { allowed: true };
  }

  passes(input: FilterInput): boolean {
    return this.evaluate(input).allowed;
  }
}
