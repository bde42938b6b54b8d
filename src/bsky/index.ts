export { BskyClient, BskyClientError, type BskyClientConfig } from "./client.js";
export { IdentifierNormalizer, type NormalizeResult } from "./identity.js";
export { loginWithRetry, type LoginOptions } from "./session.js";
export {
  COLLECTIONS,
  buildAtUri,
  isAtUri,
  isDid,
  parseProfileUrl,
  profileActor,
  rkeyOf,
  type RefSegment,
} from "./uri.js";
export { classifyEmbed, parseFeedEntry, parsePostView, parseTimestamp, toContentItem } from "./normalize.js";
