import type { SourcedItem } from "../types/index.js";
import { FeedViewSource } from "./base.js";

/** Custom feed generator (app.bsky.feed.getFeed). */
export class FeedSource extends FeedViewSource {
  readonly kind = "feed";
  readonly detectsReshares = true;

  protected async fetch(): Promise<SourcedItem[]> {
    return this.toSourced(await this.api.getFeed(this.ref, this.limit));
  }
}
