/**
 * Single-pass reader over the whitespace separated groups of a telegram.
 * One group of lookahead is available through `peek`; nothing can be
 * pushed back once consumed.
 */
export class GroupReader {
  private readonly groups: string[];
  private position = 0;

  constructor(message: string) {
    this.groups = message.trim().split(/\s+/).filter((group) => group.length > 0);
  }

  peek(): string | undefined {
    return this.groups[this.position];
  }

  next(): string | undefined {
    const group = this.groups[this.position];
    if (group !== undefined) {
      this.position += 1;
    }
    return group;
  }

  hasNext(): boolean {
    return this.position < this.groups.length;
  }

  /**
   * Consumes groups until `isBoundary` accepts the next one or the input
   * runs out. The boundary group itself is left unread.
   */
  takeUntil(isBoundary: (group: string) => boolean): string[] {
    const taken: string[] = [];
    let group = this.peek();
    while (group !== undefined && !isBoundary(group)) {
      taken.push(group);
      this.position += 1;
      group = this.peek();
    }
    return taken;
  }
}
