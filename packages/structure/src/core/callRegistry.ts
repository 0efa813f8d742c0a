/**
 * Scope id -> set of callee descriptors.
 *
 * Insertion order carries no meaning; readers that need a stable order use
 * the sorted accessors.
 */
export class CallRegistry {
  private readonly calls = new Map<string, Set<string>>();

  add(scopeId: string, callee: string): void {
    let callees = this.calls.get(scopeId);
    if (!callees) {
      callees = new Set<string>();
      this.calls.set(scopeId, callees);
    }
    callees.add(callee);
  }

  has(scopeId: string): boolean {
    return (this.calls.get(scopeId)?.size ?? 0) > 0;
  }

  get(scopeId: string): ReadonlySet<string> {
    return this.calls.get(scopeId) ?? new Set<string>();
  }

  /** Callees of one scope, lexicographically sorted. */
  sorted(scopeId: string): string[] {
    return [...this.get(scopeId)].sort(compareText);
  }

  /** Scope ids, lexicographically sorted. */
  scopes(): string[] {
    return [...this.calls.keys()].sort(compareText);
  }

  get size(): number {
    return this.calls.size;
  }

  toJSON(): Record<string, string[]> {
    const json: Record<string, string[]> = {};
    for (const scopeId of this.scopes()) {
      json[scopeId] = this.sorted(scopeId);
    }
    return json;
  }
}

/**
 * Code-unit ordering, independent of the host locale.
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
