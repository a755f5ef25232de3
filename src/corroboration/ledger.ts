import type { EvidenceRecord, ValueTally } from './types';

export interface LedgerEntry<V> {
  readonly value: V;
  readonly independentDomainCount: number;
  readonly domainsSeen: ReadonlySet<string>;
  readonly sources: readonly EvidenceRecord[];
}

interface MutableEntry<V> {
  value: V;
  independentDomainCount: number;
  domainsSeen: Set<string>;
  sources: EvidenceRecord[];
}

/*
 * Per-value tally of independent supporting domains.
 *
 * Invariant: independentDomainCount === domainsSeen.size for every entry.
 * Repeat-domain records are kept in `sources` for audit but never counted.
 * Entries iterate in the order their value was first recorded.
 */
export class Ledger<V> {
  private readonly entries = new Map<string, MutableEntry<V>>();

  constructor(private readonly keyOf: (value: V) => string = String) {}

  record(value: V, evidence: EvidenceRecord): LedgerEntry<V> {
    const key = this.keyOf(value);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { value, independentDomainCount: 0, domainsSeen: new Set(), sources: [] };
      this.entries.set(key, entry);
    }
    if (!entry.domainsSeen.has(evidence.domain)) {
      entry.domainsSeen.add(evidence.domain);
      entry.independentDomainCount += 1;
    }
    entry.sources.push(evidence);
    return entry;
  }

  maxCount(): number {
    let max = 0;
    for (const entry of this.entries.values()) {
      if (entry.independentDomainCount > max) max = entry.independentDomainCount;
    }
    return max;
  }

  valuesAt(count: number): V[] {
    return this.list()
      .filter((entry) => entry.independentDomainCount === count)
      .map((entry) => entry.value);
  }

  entry(value: V): LedgerEntry<V> | undefined {
    return this.entries.get(this.keyOf(value));
  }

  list(): LedgerEntry<V>[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }

  /*
   * Counts of every value except `exclude`, with the first source each
   * value received.
   */
  tallies(exclude?: V): ValueTally<V>[] {
    const excludedKey = exclude === undefined ? undefined : this.keyOf(exclude);
    return this.list()
      .filter((entry) => this.keyOf(entry.value) !== excludedKey)
      .map((entry) => ({
        value: entry.value,
        count: entry.independentDomainCount,
        sampleSource: entry.sources[0] ?? null,
      }));
  }
}
