import type { SentenceType } from '../parser/sentence-type.js'

// Set of sentence types, used for "required for a fix" and "seen this tick"
export class SentenceMask {
  private readonly types = new Set<SentenceType>()

  constructor(types: Iterable<SentenceType> = []) {
    for (const type of types) this.types.add(type)
  }

  insert(type: SentenceType): void {
    this.types.add(type)
  }

  contains(type: SentenceType): boolean {
    return this.types.has(type)
  }

  isSubsetOf(other: SentenceMask): boolean {
    for (const type of this.types) {
      if (!other.contains(type)) return false
    }
    return true
  }

  clear(): void {
    this.types.clear()
  }

  get size(): number {
    return this.types.size
  }

  toArray(): SentenceType[] {
    return [...this.types]
  }
}
