import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { test, type TestContext } from "node:test";
import { loadNetworkConfig, seedStore } from "./networkConfig.js";
import { DEFAULT_POLICY } from "./policy/guardrails.js";
import { NetworkStateStore } from "./state/networkStore.js";

function writeTemp(t: TestContext, contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "network-config-"));
  t.after(() => fs.rmSync(dir, { recursive: true, force: true }));
  const file = path.join(dir, "network.config.json");
  fs.writeFileSync(file, contents, "utf-8");
  return file;
}

test("bundled network config seeds the store", () => {
  const networkConfig = loadNetworkConfig("./config/network.config.json");
  const store = new NetworkStateStore({ policy: DEFAULT_POLICY });

  assert.equal(seedStore(store, networkConfig), 3);
  assert.equal(networkConfig.network.id, "hq-floor-2");
  assert.deepEqual(store.get("AP-002"), { id: "AP-002", channel: 1, power_db: 17, last_change_time_minutes: -241 });
});

test("explicit last change times are kept", (t) => {
  const file = writeTemp(
    t,
    JSON.stringify({
      network: { id: "lab", label: "Lab" },
      access_points: [{ id: "AP-L", channel: 6, power_db: 20, last_change_time_minutes: 0 }]
    })
  );
  const store = new NetworkStateStore({ policy: DEFAULT_POLICY });
  seedStore(store, loadNetworkConfig(file));
  assert.equal(store.get("AP-L").last_change_time_minutes, 0);
});

test("duplicate ids fail validation", (t) => {
  const file = writeTemp(
    t,
    JSON.stringify({
      network: { id: "lab", label: "Lab" },
      access_points: [
        { id: "AP-L", channel: 6, power_db: 20 },
        { id: "AP-L", channel: 11, power_db: 20 }
      ]
    })
  );
  assert.throws(() => loadNetworkConfig(file), /duplicate access point id 'AP-L'/);
});

test("non-integer settings fail validation", (t) => {
  const file = writeTemp(
    t,
    JSON.stringify({
      network: { id: "lab", label: "Lab" },
      access_points: [{ id: "AP-L", channel: 6.5, power_db: 20 }]
    })
  );
  assert.throws(() => loadNetworkConfig(file), /Network config validation error/);
});

test("integers beyond the safe range fail validation", (t) => {
  const file = writeTemp(
    t,
    JSON.stringify({
      network: { id: "lab", label: "Lab" },
      access_points: [
        { id: "AP-L", channel: 6, power_db: 20, last_change_time_minutes: Number.MAX_SAFE_INTEGER + 1 }
      ]
    })
  );
  assert.throws(() => loadNetworkConfig(file), /Network config validation error/);
});

test("malformed JSON and missing files name the path", (t) => {
  const file = writeTemp(t, "{ not json");
  assert.throws(() => loadNetworkConfig(file), /Network config JSON parse error/);
  assert.throws(() => loadNetworkConfig(path.join(os.tmpdir(), "does-not-exist.json")), /Failed to read network config/);
});
