/**
 * Tests for the dashboard API, exercised through Hono's in-process
 * `app.request` without opening a port.
 */

import { describe, it, expect } from "vitest";
import { ChargerSimulator } from "../../src/charger/chargerSimulator";
import { buildTopics } from "../../src/topics";
import { createDashboardApp } from "../server";

function setup() {
  const charger = new ChargerSimulator({ topics: buildTopics("openevse") });
  const app = createDashboardApp(charger);
  return { charger, app };
}

function postCommand(app: ReturnType<typeof createDashboardApp>, body: string) {
  return app.request("/api/commands", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("dashboard API", () => {
  it("returns the charger snapshot", async () => {
    const { app } = setup();

    const res = await app.request("/api/status");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      state: "Idle",
      targetCurrentA: 0,
      bidirectional: false,
      lastStatus: null,
      commandsHandled: 0,
    });
  });

  it("applies a posted command", async () => {
    const { app, charger } = setup();

    const res = await postCommand(app, JSON.stringify({ kind: "SetCurrent", amps: 16 }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      accepted: true,
      from: "Idle",
      to: "CurrentConfigured",
      status: "Charging current set",
    });
    expect(charger.snapshot().targetCurrentA).toBe(16);
  });

  it("lists recent status events", async () => {
    const { app, charger } = setup();
    await charger.handle({ kind: "StartCharge" });
    await charger.handle({ kind: "Stop" });

    const res = await app.request("/api/events");
    const events: unknown = await res.json();

    expect(Array.isArray(events)).toBe(true);
    expect(events).toMatchObject([
      { message: "Charging started", source: "command" },
      { message: "Charging stopped", source: "command" },
    ]);
  });

  it("rejects a body that is not JSON", async () => {
    const { app } = setup();

    const res = await postCommand(app, "stop please");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Body must be JSON" });
  });

  it("rejects an unknown command", async () => {
    const { app, charger } = setup();

    const res = await postCommand(app, JSON.stringify({ kind: "Reboot" }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "Invalid command" });
    expect(charger.snapshot().commandsHandled).toBe(0);
  });

  it("rejects a current that is not a number", async () => {
    const { app } = setup();

    const res = await postCommand(app, JSON.stringify({ kind: "SetCurrent", amps: "32" }));

    expect(res.status).toBe(400);
  });
});
