/** Ordered narrative produced by resolving one action. */
export class EffectLog {
  private readonly entries: string[] = []

  constructor(message?: string) {
    if (message !== undefined) {
      this.entries.push(message)
    }
  }

  messages(): string[] {
    return this.entries.slice()
  }

  add(message: string): this {
    this.entries.push(message)
    return this
  }

  combine(other: EffectLog): this {
    this.entries.push(...other.entries)
    return this
  }

  isEmpty(): boolean {
    return this.entries.length === 0
  }
}
