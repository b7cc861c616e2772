import { DEFAULT_POLICY } from "../src/policy/guardrails.js";
import { GuardrailEvaluator } from "../src/policy/evaluator.js";
import { NetworkStateStore } from "../src/state/networkStore.js";
import { ChangeRequest } from "../src/types.js";
import { logger } from "../src/utils/logger.js";

const steps: Array<{ request: ChangeRequest; t: number; peak: boolean }> = [
  { request: { new_channel: 11 }, t: 100, peak: false },
  { request: { new_channel: 11 }, t: 250, peak: false },
  { request: { new_power_db: 21 }, t: 500, peak: false },
  { request: { new_power_db: 22 }, t: 500, peak: false },
  { request: { new_channel: 1 }, t: 800, peak: true },
  { request: { new_channel: 1, is_emergency: true }, t: 800, peak: true },
  { request: { new_channel: 6 }, t: 1100, peak: false }
];

const store = new NetworkStateStore({ policy: DEFAULT_POLICY });
const evaluator = new GuardrailEvaluator(store);

store.add({ id: "AP-001", channel: 6, power_db: 20, last_change_time_minutes: 0 });

for (const step of steps) {
  const verdict = evaluator.evaluateAndApply("AP-001", step.request, step.t, step.peak);
  logger.info(
    {
      t: step.t,
      accepted: verdict.accepted,
      result: verdict.accepted ? verdict.outcome : verdict.reason,
      state: store.get("AP-001")
    },
    "Scenario step"
  );
}
