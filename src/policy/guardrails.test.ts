import assert from "node:assert/strict";
import { test } from "node:test";
import { DEFAULT_POLICY, checkChangeBudget, checkHysteresis, checkTimeWindow } from "./guardrails.js";
import { AccessPoint } from "../types.js";

const ap: AccessPoint = { id: "AP-100", channel: 6, power_db: 20, last_change_time_minutes: 1000 };

test("time window blocks non-emergency requests during peak hour only", () => {
  assert.equal(checkTimeWindow({ new_channel: 1 }, { current_time_minutes: 0, is_peak_hour: false }), null);
  assert.equal(
    checkTimeWindow({ new_channel: 1, is_emergency: true }, { current_time_minutes: 0, is_peak_hour: true }),
    null
  );
  assert.deepEqual(checkTimeWindow({ new_channel: 1 }, { current_time_minutes: 0, is_peak_hour: true }), {
    reason: "PEAK_HOUR_BLOCKED",
    detail: "Change blocked by time window (peak hour)"
  });
});

test("change budget rejects below the threshold and accepts at it", () => {
  const rejection = checkChangeBudget(ap, { current_time_minutes: 1239, is_peak_hour: false }, DEFAULT_POLICY);
  assert.equal(rejection?.reason, "BUDGET_NOT_ELAPSED");
  assert.equal(rejection?.detail, "Change blocked by budget (last change 239 min ago, need 240)");

  assert.equal(checkChangeBudget(ap, { current_time_minutes: 1240, is_peak_hour: false }, DEFAULT_POLICY), null);
});

test("change budget treats a time before the last change as not elapsed", () => {
  const rejection = checkChangeBudget(ap, { current_time_minutes: 900, is_peak_hour: false }, DEFAULT_POLICY);
  assert.equal(rejection?.reason, "BUDGET_NOT_ELAPSED");
  assert.equal(rejection?.detail, "Change blocked by budget (last change -100 min ago, need 240)");
});

test("hysteresis only looks at power and uses the absolute delta", () => {
  assert.equal(checkHysteresis(ap, { new_channel: 11 }, DEFAULT_POLICY), null);
  assert.equal(checkHysteresis(ap, { new_power_db: 18 }, DEFAULT_POLICY), null);
  assert.equal(checkHysteresis(ap, { new_power_db: 22 }, DEFAULT_POLICY), null);

  assert.deepEqual(checkHysteresis(ap, { new_power_db: 19 }, DEFAULT_POLICY), {
    reason: "HYSTERESIS_TOO_SMALL",
    detail: "Change blocked by hysteresis (delta 1dB, need 2dB)"
  });
  assert.equal(checkHysteresis(ap, { new_power_db: 20 }, DEFAULT_POLICY)?.reason, "HYSTERESIS_TOO_SMALL");
});

test("policy thresholds are honoured", () => {
  const strict = { change_budget_minutes: 60, hysteresis_threshold_db: 5 };
  assert.equal(checkChangeBudget(ap, { current_time_minutes: 1060, is_peak_hour: false }, strict), null);
  assert.equal(checkHysteresis(ap, { new_power_db: 24 }, strict)?.reason, "HYSTERESIS_TOO_SMALL");
  assert.equal(checkHysteresis(ap, { new_power_db: 25 }, strict), null);
});
