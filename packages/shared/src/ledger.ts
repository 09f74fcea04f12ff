export const TransferOutcome = {
  Success: "success",
  Failed: "failed",
} as const;

export type TransferOutcome = (typeof TransferOutcome)[keyof typeof TransferOutcome];

export interface LedgerRecordV1 {
  identity: string;
  path: string;
  size: number;
  outcome: TransferOutcome;
  transferred_at: string; // RFC3339 timestamp
  detail?: {
    dest_path?: string;
    delete_failed?: string;
    reason_code?: string;
    message?: string;
  };
}

export interface LedgerStatsV1 {
  total_lines: number;
  success: number;
  failed: number;
  torn_lines: number;
  duplicate_success: number;
  /** Repeated failures, or failures of an identity that later succeeded. */
  superseded_failed: number;
}
