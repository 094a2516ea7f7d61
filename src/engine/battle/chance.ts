const RNG_A = 1664525
const RNG_C = 1013904223
const RNG_M = 0x100000000

/** The engine's only source of nondeterminism. */
export interface ChanceSource {
  holds(probability: number): boolean
}

export function randomChance(): ChanceSource {
  return { holds: (probability) => Math.random() < probability }
}

export function seededChance(seed: number): ChanceSource {
  let state = seed >>> 0
  return {
    holds(probability) {
      state = (Math.imul(state, RNG_A) + RNG_C) >>> 0
      return state / RNG_M < probability
    },
  }
}

export function fixedChance(result: boolean): ChanceSource {
  return { holds: () => result }
}
