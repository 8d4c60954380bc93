/**
 * Two-level instance cache: resource name -> (argument -> value).
 *
 * Presence is tracked by the inner maps rather than by value, so a resource
 * whose value is `undefined` is still a cache hit.
 */
export class ResourceCache {
  private readonly slots = new Map<string, Map<string, unknown>>();

  /**
   * Number of resource names with at least one cached instance.
   */
  get size(): number {
    return this.slots.size;
  }

  has(name: string, argument: string): boolean {
    return this.slots.get(name)?.has(argument) ?? false;
  }

  get(name: string, argument: string): unknown {
    return this.slots.get(name)?.get(argument);
  }

  set(name: string, argument: string, value: unknown): void {
    let slot = this.slots.get(name);
    if (!slot) {
      slot = new Map();
      this.slots.set(name, slot);
    }
    slot.set(argument, value);
  }

  /**
   * Detach every instance of one resource and return them.
   *
   * @returns argument -> value map, or undefined when nothing was cached
   */
  take(name: string): Map<string, unknown> | undefined {
    const slot = this.slots.get(name);
    this.slots.delete(name);
    return slot;
  }

  /**
   * Names of resources with at least one cached instance, in first-cached order.
   */
  names(): string[] {
    return Array.from(this.slots.keys());
  }

  /**
   * Arguments cached for one resource.
   */
  argumentsOf(name: string): string[] {
    const slot = this.slots.get(name);
    return slot ? Array.from(slot.keys()) : [];
  }

  clear(): void {
    this.slots.clear();
  }
}
