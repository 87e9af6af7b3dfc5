/**
 * Run-wide set of accepted links. Entries are only ever added; `drain` hands out a snapshot
 * for the output file without clearing anything.
 */
export class LinkAggregator {
  private readonly links = new Set<string>();

  /** Returns true only the first time a given URL is inserted. */
  insert(url: string): boolean {
    if (this.links.has(url)) {
      return false;
    }

    this.links.add(url);
    return true;
  }

  drain(): string[] {
    return [...this.links];
  }

  get size(): number {
    return this.links.size;
  }
}
