export interface ElementChartView {
  effectiveness(attacking: string, defending: string): number
  elements(): string[]
}

/**
 * Damage multipliers between element types. Populated once by content setup
 * and handed to each battle; unlisted pairs are neutral.
 */
export class ElementChart implements ElementChartView {
  private readonly table = new Map<string, Map<string, number>>()

  private readonly known = new Set<string>()

  register(attacking: string, defending: string, multiplier: number): this {
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
      throw new RangeError(`Effectiveness of ${attacking} against ${defending} must be positive, got ${multiplier}.`)
    }
    let row = this.table.get(attacking)
    if (!row) {
      row = new Map()
      this.table.set(attacking, row)
    }
    row.set(defending, multiplier)
    this.known.add(attacking)
    this.known.add(defending)
    return this
  }

  effectiveness(attacking: string, defending: string): number {
    return this.table.get(attacking)?.get(defending) ?? 1
  }

  elements(): string[] {
    return Array.from(this.known)
  }
}
