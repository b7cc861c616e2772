import { loadConfig, policyFromConfig } from "./config.js";
import { logger } from "./utils/logger.js";
import { loadNetworkConfig, seedStore } from "./networkConfig.js";
import { NetworkStateStore } from "./state/networkStore.js";
import { GuardrailEvaluator } from "./policy/evaluator.js";
import { startServer } from "./server.js";

const cfg = loadConfig();
const policy = policyFromConfig(cfg);

const store = new NetworkStateStore({
  policy,
  historyLimit: cfg.HISTORY_ROWS
});
const evaluator = new GuardrailEvaluator(store);

const networkConfig = loadNetworkConfig(cfg.NETWORK_CONFIG_PATH);
const seeded = seedStore(store, networkConfig);

logger.info(
  { network_id: networkConfig.network.id, access_points: seeded, ...policy },
  "Starting change guardrail service"
);

startServer({ port: cfg.PORT, store, evaluator });
