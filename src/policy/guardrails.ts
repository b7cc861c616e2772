import { AccessPoint, ChangeRequest, EvaluationContext, GuardrailPolicy, Rejection } from "../types.js";

export const DEFAULT_POLICY: GuardrailPolicy = {
  change_budget_minutes: 4 * 60,
  hysteresis_threshold_db: 2
};

/** Peak hours block everything except emergencies. */
export function checkTimeWindow(request: ChangeRequest, context: EvaluationContext): Rejection | null {
  if (context.is_peak_hour && !request.is_emergency) {
    return { reason: "PEAK_HOUR_BLOCKED", detail: "Change blocked by time window (peak hour)" };
  }
  return null;
}

/**
 * Rate limit per access point. Emergencies are not exempt, and a current time
 * earlier than the last change counts as not elapsed.
 */
export function checkChangeBudget(
  ap: AccessPoint,
  context: EvaluationContext,
  policy: GuardrailPolicy
): Rejection | null {
  const elapsed = context.current_time_minutes - ap.last_change_time_minutes;
  if (elapsed < policy.change_budget_minutes) {
    return {
      reason: "BUDGET_NOT_ELAPSED",
      detail: `Change blocked by budget (last change ${elapsed} min ago, need ${policy.change_budget_minutes})`
    };
  }
  return null;
}

export function checkHysteresis(
  ap: AccessPoint,
  request: ChangeRequest,
  policy: GuardrailPolicy
): Rejection | null {
  if (request.new_power_db === undefined) return null;

  const delta = Math.abs(request.new_power_db - ap.power_db);
  if (delta < policy.hysteresis_threshold_db) {
    return {
      reason: "HYSTERESIS_TOO_SMALL",
      detail: `Change blocked by hysteresis (delta ${delta}dB, need ${policy.hysteresis_threshold_db}dB)`
    };
  }
  return null;
}
