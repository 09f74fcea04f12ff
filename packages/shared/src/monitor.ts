import type { CycleId } from "./ids.js";

export const MonitorState = {
  Idle: "idle",
  Listing: "listing",
  Classifying: "classifying",
  Transferring: "transferring",
  Recording: "recording",
  Sleeping: "sleeping",
  Stopped: "stopped",
} as const;

export type MonitorState = (typeof MonitorState)[keyof typeof MonitorState];

export interface MonitorCountersV1 {
  cycles: number;
  copied: number;
  deleted: number;
  errored: number;
}

export interface CycleReportV1 {
  cycle_id: CycleId;
  started_at: string;
  finished_at: string;
  listed: number;
  stable: number;
  growing: number;
  vanished: number;
  skipped: number;
  transferred: number;
  failed: number;
  list_error?: string;
}

export interface MonitorStatusV1 {
  state: MonitorState;
  counters: MonitorCountersV1;
  last_cycle: CycleReportV1 | null;
  tracked_paths: string[];
  processed_paths: string[];
}
