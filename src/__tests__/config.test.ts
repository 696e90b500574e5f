/**
 * Tests for loadConfig: defaults, coercion and validation errors.
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";
import { ConfigError } from "../errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      mqtt: { url: "mqtt://localhost:1883", username: undefined, password: undefined },
      baseTopic: "openevse",
      chargerClientId: "openevse_charger",
      controllerClientId: "openevse_simulator",
      heartbeatIntervalMs: 5000,
      telemetryIntervalMs: 1000,
      guards: "none",
      ackTimeoutMs: undefined,
      retry: { attempts: 3, baseDelayMs: 200 },
      dashboardPort: 8080,
      timeScale: 1,
      logLevel: "info",
    });
  });

  it("reads and coerces variables", () => {
    const config = loadConfig({
      MQTT_URL: "mqtts://broker.example.test:8883",
      MQTT_USERNAME: "sim",
      MQTT_PASSWORD: "test-secret",
      BASE_TOPIC: "lab/evse2",
      HEARTBEAT_INTERVAL_MS: "2500",
      CHARGER_GUARDS: "physical",
      ACK_TIMEOUT_MS: "3000",
      PUBLISH_RETRY_ATTEMPTS: "5",
      SIM_TIME_SCALE: "0.1",
      LOG_LEVEL: "debug",
    });

    expect(config.mqtt).toEqual({
      url: "mqtts://broker.example.test:8883",
      username: "sim",
      password: "test-secret",
    });
    expect(config.baseTopic).toBe("lab/evse2");
    expect(config.heartbeatIntervalMs).toBe(2500);
    expect(config.guards).toBe("physical");
    expect(config.ackTimeoutMs).toBe(3000);
    expect(config.retry).toEqual({ attempts: 5, baseDelayMs: 200 });
    expect(config.timeScale).toBe(0.1);
    expect(config.logLevel).toBe("debug");
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({ ACK_TIMEOUT_MS: "", BASE_TOPIC: "" });
    expect(config.ackTimeoutMs).toBeUndefined();
    expect(config.baseTopic).toBe("openevse");
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ HEARTBEAT_INTERVAL_MS: "-5", BASE_TOPIC: "openevse/#", CHARGER_GUARDS: "strict" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe("CONFIG_INVALID");
      expect(caught.issues).toHaveLength(3);
      expect(caught.issues).toContain(
        "BASE_TOPIC: must be a topic path without wildcards or leading/trailing '/'",
      );
      expect(caught.issues.some((issue) => issue.startsWith("HEARTBEAT_INTERVAL_MS:"))).toBe(true);
      expect(caught.issues.some((issue) => issue.startsWith("CHARGER_GUARDS:"))).toBe(true);
    }
  });

  it("rejects a non-MQTT broker URL", () => {
    expect(() => loadConfig({ MQTT_URL: "http://localhost:1883" })).toThrow(ConfigError);
  });
});
