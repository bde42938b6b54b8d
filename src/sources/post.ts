import type { SourcedItem } from "../types/index.js";
import { SourceAdapter } from "./base.js";

/** Single post by AT-URI (app.bsky.feed.getPosts); zero items when it is not found. */
export class PostSource extends SourceAdapter {
  readonly kind = "post";
  readonly carriesProvenance = false;
  readonly detectsReshares = false;

  protected async fetch(): Promise<SourcedItem[]> {
    const posts = await this.api.getPosts([this.ref]);
    const match = posts.find((p) => p.uri === this.ref) ?? posts[0];
    return match ? [{ item: match, source: this.ref }] : [];
  }
}
