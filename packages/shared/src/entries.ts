/**
 * One file or directory node as reported by a remote listing.
 * Snapshots are immutable; every poll produces fresh ones.
 */
export interface RemoteEntryV1 {
  path: string;
  name: string;
  size: number;
  modified_at: string; // RFC3339 timestamp
  is_directory: boolean;
}

export const EntryState = {
  Growing: "growing",
  Stable: "stable",
  Vanished: "vanished",
} as const;

export type EntryState = (typeof EntryState)[keyof typeof EntryState];

export interface EntryObservationV1 {
  size: number;
  modified_at: string;
  observed_at_ms: number;
}
