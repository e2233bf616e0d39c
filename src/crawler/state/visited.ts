export interface VisitedRegistryLimits {
  maxDepth: number;
  maxPages: number;
}

export class VisitedRegistry {
  private readonly visited = new Set<string>();

  constructor(private readonly limits: VisitedRegistryLimits) {}

  /**
   * Admission check for a branch: false once the depth limit is passed, the page
   * budget is spent, or the URL was already visited. Does not insert.
   */
  tryClaim(url: string, depth: number): boolean {
    if (depth > this.limits.maxDepth) {
      return false;
    }

    if (this.isFull()) {
      return false;
    }

    return !this.visited.has(url);
  }

  /** Inserts `url`; false if another branch already marked it. */
  markVisited(url: string): boolean {
    if (this.visited.has(url)) {
      return false;
    }

    this.visited.add(url);
    return true;
  }

  has(url: string): boolean {
    return this.visited.has(url);
  }

  isFull(): boolean {
    return this.visited.size >= this.limits.maxPages;
  }

  get size(): number {
    return this.visited.size;
  }
}
