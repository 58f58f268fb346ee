/**
 * Tracks names already present in a fixture so generated ones never collide
 */
export class UniqueNameRegistry {
  private names: Set<string> = new Set();

  constructor(existing: Iterable<string> = []) {
    for (const name of existing) {
      this.names.add(name);
    }
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  size(): number {
    return this.names.size;
  }

  /**
   * Reserve `name`, or `name #k` with the smallest free k >= 2 if it is taken.
   * Returns the reserved name.
   */
  reserve(name: string): string {
    let candidate = name;
    let suffix = 2;
    while (this.names.has(candidate)) {
      candidate = `${name} #${suffix}`;
      suffix++;
    }
    this.names.add(candidate);
    return candidate;
  }
}
