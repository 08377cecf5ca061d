/** Tracks whether the record source still has records to give. Flips to exhausted once and stays there. */
export class RecordTracker {
  private hasMore = true;

  moreRecords(): boolean {
    return this.hasMore;
  }

  noMoreRecords(): void {
    this.hasMore = false;
  }
}
