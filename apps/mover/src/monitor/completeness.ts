import { EntryState, type EntryObservationV1, type RemoteEntryV1 } from "@alist-mover/shared";

export interface CompletenessPolicy {
  /** Consecutive equal-size samples needed before an entry counts as stable (>= 2). */
  requiredSamples: number;
  /** Minimum gap between consecutive samples inside the stability window. */
  minSpacingMs: number;
  historyLimit: number;
}

export function completenessPolicy(input: { requiredSamples?: number; minSpacingMs: number }): CompletenessPolicy {
  const requiredSamples = Math.max(2, Math.floor(input.requiredSamples ?? 2));
  return {
    requiredSamples,
    minSpacingMs: Math.max(0, input.minSpacingMs),
    historyLimit: Math.max(requiredSamples, 4),
  };
}

/** Samples one poll apart may arrive slightly early; allow a fifth of the interval, at most 2s. */
export function minSpacingForInterval(checkIntervalMs: number): number {
  const tolerance = Math.min(2_000, Math.floor(checkIntervalMs / 5));
  return Math.max(0, checkIntervalMs - tolerance);
}

/**
 * An absent history means the path was missing from the latest listing.
 * Stable needs the last `requiredSamples` sizes to be equal and non-zero,
 * each sample taken at least `minSpacingMs` after the previous one.
 */
export function classify(
  history: readonly EntryObservationV1[] | undefined,
  policy: CompletenessPolicy,
): EntryState {
  if (!history || history.length === 0) return EntryState.Vanished;
  if (history.length < policy.requiredSamples) return EntryState.Growing;

  const window = history.slice(-policy.requiredSamples);
  const size = window[0].size;
  if (size <= 0) return EntryState.Growing;
  for (let i = 1; i < window.length; i += 1) {
    if (window[i].size !== size) return EntryState.Growing;
    if (window[i].observed_at_ms - window[i - 1].observed_at_ms < policy.minSpacingMs) {
      return EntryState.Growing;
    }
  }
  return EntryState.Stable;
}

export class CompletenessDetector {
  private readonly histories = new Map<string, EntryObservationV1[]>();

  constructor(private readonly policy: CompletenessPolicy) {}

  /** Polls an unchanged entry needs before it can classify as stable. */
  get requiredSamples(): number {
    return this.policy.requiredSamples;
  }

  /**
   * Records one listing. Directories are ignored. Tracked paths missing from
   * the listing come back as vanished and lose their history.
   */
  observe(listing: readonly RemoteEntryV1[], observedAtMs: number): Map<string, EntryState> {
    const result = new Map<string, EntryState>();
    const present = new Set<string>();

    for (const entry of listing) {
      if (entry.is_directory) continue;
      present.add(entry.path);
      const history = this.histories.get(entry.path) ?? [];
      history.push({ size: entry.size, modified_at: entry.modified_at, observed_at_ms: observedAtMs });
      if (history.length > this.policy.historyLimit) {
        history.splice(0, history.length - this.policy.historyLimit);
      }
      this.histories.set(entry.path, history);
      result.set(entry.path, classify(history, this.policy));
    }

    for (const trackedPath of [...this.histories.keys()]) {
      if (present.has(trackedPath)) continue;
      this.histories.delete(trackedPath);
      result.set(trackedPath, EntryState.Vanished);
    }
    return result;
  }

  classify(entryPath: string): EntryState {
    return classify(this.histories.get(entryPath), this.policy);
  }

  /** True when the newest sample's size differs from the one before it. */
  sizeChanged(entryPath: string): boolean {
    const history = this.histories.get(entryPath);
    if (!history || history.length < 2) return false;
    return history[history.length - 1].size !== history[history.length - 2].size;
  }

  history(entryPath: string): readonly EntryObservationV1[] {
    return this.histories.get(entryPath) ?? [];
  }

  forget(entryPath: string): void {
    this.histories.delete(entryPath);
  }

  trackedPaths(): string[] {
    return [...this.histories.keys()].sort((a, b) => a.localeCompare(b));
  }
}
