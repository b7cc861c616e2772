import { NetworkStateStore } from "../state/networkStore.js";
import {
  AccessPoint,
  ChangeRecord,
  ChangeRequest,
  EvaluationContext,
  GuardrailPolicy,
  Rejection,
  ValueChange,
  Verdict
} from "../types.js";
import { logger } from "../utils/logger.js";
import { checkChangeBudget, checkHysteresis, checkTimeWindow } from "./guardrails.js";

export type Evaluation =
  | { accepted: false; rejection: Rejection }
  | { accepted: true; mutation: { next: AccessPoint; change: ChangeRecord } | null };

function diff(current: number, requested: number | undefined): ValueChange | null {
  if (requested === undefined || requested === current) return null;
  return { from: current, to: requested };
}

/**
 * Runs the guardrail chain against a snapshot of one access point.
 * First failing rule wins, so the order below is part of the contract.
 */
export function evaluateChange(
  ap: AccessPoint,
  request: ChangeRequest,
  context: EvaluationContext,
  policy: GuardrailPolicy
): Evaluation {
  const rejection =
    checkTimeWindow(request, context) ??
    checkChangeBudget(ap, context, policy) ??
    checkHysteresis(ap, request, policy);
  if (rejection) return { accepted: false, rejection };

  const channel = diff(ap.channel, request.new_channel);
  const power_db = diff(ap.power_db, request.new_power_db);
  if (!channel && !power_db) return { accepted: true, mutation: null };

  return {
    accepted: true,
    mutation: {
      next: {
        ...ap,
        channel: channel?.to ?? ap.channel,
        power_db: power_db?.to ?? ap.power_db,
        last_change_time_minutes: context.current_time_minutes
      },
      change: {
        time_minutes: context.current_time_minutes,
        channel,
        power_db,
        emergency: request.is_emergency ?? false
      }
    }
  };
}

export class GuardrailEvaluator {
  private readonly policy: GuardrailPolicy;

  /** Uses the store's policy, so the starting timestamp and the budget rule agree. */
  constructor(private readonly store: NetworkStateStore) {
    this.policy = store.policy;
  }

  /**
   * Read, evaluate and commit happen in one synchronous call, so no other
   * request can observe the record between the check and the write.
   */
  evaluateAndApply(
    apId: string,
    request: ChangeRequest,
    currentTimeMinutes: number,
    isPeakHour: boolean,
    opts: { dryRun?: boolean } = {}
  ): Verdict {
    const ap = this.store.find(apId);
    if (!ap) {
      const detail = `Access point '${apId}' not found in network state`;
      logger.warn({ ap_id: apId }, detail);
      return { accepted: false, kind: "lookup", reason: "UNKNOWN_ACCESS_POINT", detail };
    }

    const log = logger.child({ ap_id: apId, t: currentTimeMinutes, peak: isPeakHour });
    const evaluation = evaluateChange(
      ap,
      request,
      { current_time_minutes: currentTimeMinutes, is_peak_hour: isPeakHour },
      this.policy
    );

    if (!evaluation.accepted) {
      log.warn({ reason: evaluation.rejection.reason }, evaluation.rejection.detail);
      return {
        accepted: false,
        kind: "policy",
        reason: evaluation.rejection.reason,
        detail: evaluation.rejection.detail,
        access_point: ap
      };
    }

    const { mutation } = evaluation;
    if (!mutation) {
      log.info("Request accepted but no state change occurred");
      return { accepted: true, outcome: "NO_CHANGE", access_point: ap, change: null };
    }

    if (opts.dryRun) {
      log.info({ change: mutation.change }, "Dry run: all guardrails passed, change not applied");
      return { accepted: true, outcome: "WOULD_APPLY", access_point: ap, change: mutation.change };
    }

    this.store.commit(mutation.next, mutation.change);
    log.info({ change: mutation.change }, "All guardrails passed, change applied");
    return { accepted: true, outcome: "APPLIED", access_point: { ...mutation.next }, change: mutation.change };
  }
}
