import "dotenv/config";

import { connectMqtt } from "./src/channel/mqttChannel";
import { ChargerSimulator } from "./src/charger/chargerSimulator";
import { loadConfig } from "./src/config";
import { startDashboard } from "./dashboard/server";
import { createLogger, setLogLevel } from "./src/logger";
import { buildTopics } from "./src/topics";

const log = createLogger("CHARGER");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const charger = new ChargerSimulator({
    topics: buildTopics(config.baseTopic),
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    telemetryIntervalMs: config.telemetryIntervalMs,
    guards: config.guards,
    retry: config.retry,
  });

  const channel = await connectMqtt({
    address: config.mqtt.url,
    clientId: config.chargerClientId,
    cleanSession: true,
    username: config.mqtt.username,
    password: config.mqtt.password,
  });

  const attached = await charger.attach(channel);
  if (!attached.ok) {
    await channel.disconnect();
    throw attached.error;
  }
  charger.start();
  log.info(`Charger simulator online (guards: ${config.guards})`);

  const dashboard = startDashboard(charger, config.dashboardPort);

  process.once("SIGINT", () => {
    log.info("Received SIGINT, shutting down...");
    charger.stop();
    charger.detach();
    dashboard.close();
    channel
      .disconnect()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error("Disconnect failed:", error);
        process.exit(1);
      });
  });
}

main().catch((error: unknown) => {
  log.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
