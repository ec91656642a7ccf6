// apps/backend/src/lib/value-store.ts

/**
 * Placeholder → value mapping for one session. Keys are fixed at construction;
 * an empty (or whitespace-only) value means the placeholder is still unresolved.
 */
export class ValueStore {
  private readonly values: Map<string, string>

  constructor(placeholders: readonly string[]) {
    this.values = new Map(placeholders.map((p) => [p, '']))
  }

  get keys(): string[] {
    return [...this.values.keys()]
  }

  get size(): number {
    return this.values.size
  }

  has(key: string): boolean {
    return this.values.has(key)
  }

  get(key: string): string | undefined {
    return this.values.get(key)
  }

  /** Unknown keys are ignored; returns whether the key exists. */
  set(key: string, value: string): boolean {
    if (!this.values.has(key)) return false
    this.values.set(key, value)
    return true
  }

  missing(): string[] {
    return [...this.values].filter(([, v]) => !v.trim()).map(([k]) => k)
  }

  get filledCount(): number {
    return this.size - this.missing().length
  }

  isComplete(): boolean {
    return this.missing().length === 0
  }

  /** Ordered snapshot, safe to hand out */
  mapping(): Record<string, string> {
    return Object.fromEntries(this.values)
  }
}
