export interface AccessPoint {
  id: string;
  channel: number;
  power_db: number;
  last_change_time_minutes: number; // minutes since an arbitrary epoch
}

export interface AccessPointInput {
  id: string;
  channel: number;
  power_db: number;
  last_change_time_minutes?: number;
}

/** Absent fields mean "no change requested" for that setting. */
export interface ChangeRequest {
  new_channel?: number;
  new_power_db?: number;
  is_emergency?: boolean;
}

export interface EvaluationContext {
  current_time_minutes: number;
  is_peak_hour: boolean;
}

export interface GuardrailPolicy {
  change_budget_minutes: number;
  hysteresis_threshold_db: number;
}

export interface ValueChange {
  from: number;
  to: number;
}

export interface ChangeRecord {
  time_minutes: number;
  channel: ValueChange | null;
  power_db: ValueChange | null;
  emergency: boolean;
}

export type PolicyRejectionReason = "PEAK_HOUR_BLOCKED" | "BUDGET_NOT_ELAPSED" | "HYSTERESIS_TOO_SMALL";

export interface Rejection {
  reason: PolicyRejectionReason;
  detail: string;
}

export type AcceptedOutcome = "APPLIED" | "NO_CHANGE" | "WOULD_APPLY";

export type Verdict =
  | {
      accepted: true;
      outcome: AcceptedOutcome;
      access_point: AccessPoint;
      change: ChangeRecord | null;
    }
  | {
      accepted: false;
      kind: "policy";
      reason: PolicyRejectionReason;
      detail: string;
      access_point: AccessPoint;
    }
  | {
      accepted: false;
      kind: "lookup";
      reason: "UNKNOWN_ACCESS_POINT";
      detail: string;
    };
