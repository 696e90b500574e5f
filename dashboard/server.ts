import { serve, type ServerType } from "@hono/node-server";
import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ChargerSimulator } from "../src/charger/chargerSimulator";
import { createLogger } from "../src/logger";
import { CommandSchema } from "../src/rapi/types";

const log = createLogger("DASHBOARD");

export function createDashboardApp(charger: ChargerSimulator): Hono {
  const app = new Hono();

  // Enable CORS
  app.use("/*", cors());

  const api = new Hono();

  // Current charger snapshot
  api.get("/status", (c) => {
    return c.json(charger.snapshot());
  });

  // Recent status events, oldest first
  api.get("/events", (c) => {
    return c.json(charger.recentStatus());
  });

  // Apply a command directly, bypassing the bus
  api.post("/commands", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Body must be JSON" }, 400);
    }

    const parsed = CommandSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        { error: "Invalid command", issues: parsed.error.issues.map((issue) => issue.message) },
        400,
      );
    }

    const result = await charger.handle(parsed.data);
    return c.json({
      accepted: result.accepted,
      from: result.from,
      to: result.to,
      status: result.status,
    });
  });

  app.route("/api", api);

  return app;
}

export function startDashboard(charger: ChargerSimulator, port: number): ServerType {
  const app = createDashboardApp(charger);
  const server = serve({ fetch: app.fetch, port });
  log.info(`Charger dashboard on http://localhost:${port}/api/status`);
  return server;
}
