import type { CatalogIndex } from './types.js';

/**
 * Holds the live catalog behind a single reference. Readers take one
 * snapshot per operation; a reload builds a complete new index first and
 * then swaps it in, so nobody observes a half-built catalog.
 */
export class CatalogStore {
  private index: CatalogIndex;
  private generation = 1;

  constructor(initial: CatalogIndex) {
    this.index = initial;
  }

  current(): CatalogIndex {
    return this.index;
  }

  /** Replace the live index; returns the previous one */
  swap(next: CatalogIndex): CatalogIndex {
    const previous = this.index;
    this.index = next;
    this.generation++;
    return previous;
  }

  /** Incremented on every swap */
  getGeneration(): number {
    return this.generation;
  }
}
