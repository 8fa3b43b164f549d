import { test } from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../src/config.js";

test("loadConfig falls back to defaults", () => {
  assert.deepEqual(loadConfig({}), {
    port: 2091,
    dataFile: "data/settings.json",
    notificationPermission: "notDetermined",
    tickIntervalMs: 1000
  });
});

test("loadConfig reads the environment", () => {
  const config = loadConfig({ PORT: "8080", NOTIFICATION_PERMISSION: "granted", TICK_INTERVAL_MS: "250" });

  assert.equal(config.port, 8080);
  assert.equal(config.notificationPermission, "granted");
  assert.equal(config.tickIntervalMs, 250);
});

test("loadConfig rejects an invalid environment", () => {
  assert.throws(() => loadConfig({ PORT: "not-a-port" }), /Invalid environment configuration: PORT/);
});
