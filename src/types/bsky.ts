import { z } from "zod";

/** POST com.atproto.server.createSession */
export const SessionSchema = z.object({
  did: z.string().min(1),
  handle: z.string(),
  accessJwt: z.string().min(1),
  refreshJwt: z.string().optional(),
});
export type Session = z.infer<typeof SessionSchema>;

export const ResolveHandleSchema = z.object({ did: z.string() });

export const CreateRecordSchema = z.object({
  uri: z.string().min(1),
  cid: z.string().optional(),
});

const FacetFeatureSchema = z
  .object({
    $type: z.string().optional(),
    tag: z.string().optional(),
  })
  .passthrough();

const PostRecordSchema = z
  .object({
    text: z.string().default(""),
    createdAt: z.string().optional(),
    reply: z.unknown().optional(),
    facets: z.array(z.object({ features: z.array(FacetFeatureSchema).default([]) }).passthrough()).optional(),
  })
  .passthrough();

const MediaViewSchema = z
  .object({
    $type: z.string().optional(),
    images: z.array(z.unknown()).optional(),
  })
  .passthrough();

/** Embed views: images#view, video#view, external#view, record#view, recordWithMedia#view. */
const EmbedViewSchema = z
  .object({
    $type: z.string().optional(),
    images: z.array(z.unknown()).optional(),
    media: MediaViewSchema.optional(),
  })
  .passthrough();

/** app.bsky.feed.defs#postView */
export const PostViewSchema = z
  .object({
    uri: z.string().optional(),
    cid: z.string().optional(),
    author: z
      .object({ did: z.string().default(""), handle: z.string().default("") })
      .passthrough()
      .default({}),
    record: PostRecordSchema.default({}),
    embed: EmbedViewSchema.optional(),
    indexedAt: z.string().optional(),
  })
  .passthrough();
export type PostView = z.infer<typeof PostViewSchema>;

/** app.bsky.feed.defs#feedViewPost */
export const FeedViewPostSchema = z
  .object({
    post: PostViewSchema,
    reason: z.object({ $type: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();
export type FeedViewPost = z.infer<typeof FeedViewPostSchema>;

/** Envelope of getFeed / getListFeed; entries are validated one by one. */
export const FeedPageSchema = z.object({
  feed: z.array(z.unknown()).default([]),
  cursor: z.string().optional(),
});

/** Envelope of searchPosts / getPosts. */
export const PostsPageSchema = z.object({
  posts: z.array(z.unknown()).default([]),
});

/** Calls whose response body we do not inspect (deleteRecord). */
export const EmptyResponseSchema = z.object({}).passthrough();

export const XrpcErrorSchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});
