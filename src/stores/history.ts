/**
 * History Ledger
 * Append-only log of every card transition, newest first
 */
import { createSignal } from 'solid-js';
import type { HistoryEntry } from '../types.js';

export function createHistoryLedger() {
  const [entries, setEntries] = createSignal<readonly HistoryEntry[]>([]);
  const listeners = new Set<(entries: readonly HistoryEntry[]) => void>();

  function append(entry: HistoryEntry): HistoryEntry {
    const frozen = Object.freeze({ ...entry });
    // Prepend so insertion order decides ties between equal timestamps
    const next = Object.freeze([frozen, ...entries()]);
    setEntries(next);
    for (const listener of [...listeners]) listener(next);
    return frozen;
  }

  function entriesMostRecentFirst(): readonly HistoryEntry[] {
    return entries();
  }

  function size(): number {
    return entries().length;
  }

  function subscribe(listener: (entries: readonly HistoryEntry[]) => void): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  return {
    entriesMostRecentFirst,
    size,
    append,
    subscribe
  };
}

export type HistoryLedger = ReturnType<typeof createHistoryLedger>;
