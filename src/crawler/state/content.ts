import type { ContentMap } from '../../types.js';

/** Content of stored pages in completion order. */
export class ContentStore {
  private readonly pages: ContentMap = new Map();

  /** Stores `content` unless `url` is already present; returns whether it was stored. */
  store(url: string, content: string): boolean {
    if (this.pages.has(url)) {
      return false;
    }

    this.pages.set(url, content);
    return true;
  }

  get size(): number {
    return this.pages.size;
  }

  snapshot(): ContentMap {
    return new Map(this.pages);
  }
}
