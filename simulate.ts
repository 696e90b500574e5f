import "dotenv/config";

import { MemoryBroker } from "./src/channel/memoryBroker";
import { ChargerSimulator } from "./src/charger/chargerSimulator";
import { loadConfig } from "./src/config";
import { runControllerSession } from "./src/controller/session";
import { REFERENCE_SESSION, scaleWaits } from "./src/controller/sessionScript";
import { createLogger, setLogLevel } from "./src/logger";
import { buildTopics } from "./src/topics";

const log = createLogger("SIMULATION");

// Charger and controller in one process, talking through the in-process broker.
async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const broker = new MemoryBroker();
  const topics = buildTopics(config.baseTopic);

  const charger = new ChargerSimulator({
    topics,
    heartbeatIntervalMs: config.heartbeatIntervalMs * config.timeScale,
    telemetryIntervalMs: config.telemetryIntervalMs * config.timeScale,
    guards: config.guards,
    retry: config.retry,
  });
  const chargerChannel = await broker.connect({
    address: "memory://local",
    clientId: config.chargerClientId,
    cleanSession: true,
  });
  const attached = await charger.attach(chargerChannel);
  if (!attached.ok) throw attached.error;
  charger.start();

  const abort = new AbortController();
  process.once("SIGINT", () => abort.abort());

  try {
    const report = await runControllerSession({
      connect: broker.connect,
      address: "memory://local",
      clientId: config.controllerClientId,
      topics,
      script: scaleWaits(REFERENCE_SESSION, config.timeScale),
      retry: config.retry,
      ackTimeoutMs: config.ackTimeoutMs,
      signal: abort.signal,
    });
    await broker.drain();

    log.info(`Session ${report.outcome}; charger ended in ${charger.getState()}`);
    log.info(`Status sequence: ${report.statuses.join(" | ")}`);
    process.exitCode = report.outcome === "completed" ? 0 : 1;
  } finally {
    charger.stop();
    charger.detach();
    await chargerChannel.disconnect();
  }
}

main().catch((error: unknown) => {
  log.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
