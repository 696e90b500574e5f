import "dotenv/config";

import { connectMqtt } from "./src/channel/mqttChannel";
import { loadConfig } from "./src/config";
import { runControllerSession } from "./src/controller/session";
import { REFERENCE_SESSION } from "./src/controller/sessionScript";
import { createLogger, setLogLevel } from "./src/logger";
import { buildTopics } from "./src/topics";

const log = createLogger("CONTROLLER");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const abort = new AbortController();
  process.once("SIGINT", () => {
    log.info("Received SIGINT, aborting session...");
    abort.abort();
  });

  const report = await runControllerSession({
    connect: connectMqtt,
    address: config.mqtt.url,
    clientId: config.controllerClientId,
    username: config.mqtt.username,
    password: config.mqtt.password,
    topics: buildTopics(config.baseTopic),
    script: REFERENCE_SESSION,
    retry: config.retry,
    ackTimeoutMs: config.ackTimeoutMs,
    signal: abort.signal,
  });

  log.info(`Session ${report.outcome}: ${report.commandsSent} command(s), statuses seen: ${report.statuses.length}`);
  process.exitCode = report.outcome === "completed" ? 0 : 1;
}

main().catch((error: unknown) => {
  log.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
