import type { SourcedItem } from "../types/index.js";
import { FeedViewSource } from "./base.js";

/**
 * List members' posts (app.bsky.feed.getListFeed). The list feed marks reposts
 * with the same reason object as custom feeds.
 */
export class ListSource extends FeedViewSource {
  readonly kind = "list";
  readonly detectsReshares = true;

  protected async fetch(): Promise<SourcedItem[]> {
    return this.toSourced(await this.api.getListFeed(this.ref, this.limit));
  }
}
