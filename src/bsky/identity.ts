/**
 * Identifier normalization: turns configured references (AT-URIs or bsky.app
 * profile URLs) into AT-URIs, resolving handles to DIDs on the way.
 */
import type { BskyApi } from "../types/index.js";
import { errorMessage, type Logger } from "../logger.js";
import { buildAtUri, isAtUri, isDid, parseProfileUrl, type RefSegment } from "./uri.js";

export type NormalizeResult =
  | { ok: true; uri: string }
  | { ok: false; reason: "unrecognized" | "unresolved" };

export class IdentifierNormalizer {
  private readonly api: Pick<BskyApi, "resolveHandle">;
  private readonly logger: Logger;
  private readonly resolved = new Map<string, string>();

  constructor(api: Pick<BskyApi, "resolveHandle">, logger: Logger) {
    this.api = api;
    this.logger = logger;
  }

  /** Stable DID for an actor; "" when the lookup fails or comes back empty. */
  async resolveActor(actor: string): Promise<string> {
    const a = actor.trim();
    if (isDid(a)) return a;
    const key = a.toLowerCase();
    const cached = this.resolved.get(key);
    if (cached !== undefined) return cached;
    let did = "";
    try {
      did = (await this.api.resolveHandle(a)).trim();
    } catch (err) {
      this.logger.warn("handle resolution failed", { handle: a, error: errorMessage(err) });
    }
    this.resolved.set(key, did);
    return did;
  }

  async normalize(ref: string, segment: RefSegment): Promise<NormalizeResult> {
    const v = ref.trim();
    if (!v) return { ok: false, reason: "unrecognized" };
    if (isAtUri(v)) return { ok: true, uri: v };

    const parsed = parseProfileUrl(v, segment);
    if (!parsed) return { ok: false, reason: "unrecognized" };

    const did = await this.resolveActor(parsed.actor);
    if (!did) return { ok: false, reason: "unresolved" };
    return { ok: true, uri: buildAtUri(did, segment, parsed.rkey) };
  }

  /** Normalizes every reference; rejected ones are logged and skipped. */
  async normalizeAll(refs: string[], segment: RefSegment): Promise<string[]> {
    const out: string[] = [];
    for (const ref of refs) {
      const result = await this.normalize(ref, segment);
      if (result.ok) {
        out.push(result.uri);
      } else {
        this.logger.warn(`${result.reason} ${segment} reference, skipping`, { value: ref });
      }
    }
    return out;
  }
}
