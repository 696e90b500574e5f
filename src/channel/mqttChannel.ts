import * as mqtt from "mqtt";
import { ConnectionError, PublishFailure, SubscribeFailure } from "../errors";
import { createLogger } from "../logger";
import { err, ok, type Result } from "../result";
import type {
  ConnectOptions,
  MessageChannel,
  MessageHandler,
  QualityOfService,
} from "./messageChannel";

const log = createLogger("MQTT");

// Broker rejected the subscription (SUBACK return code 0x80).
const SUBACK_FAILURE = 128;

export class MqttChannel implements MessageChannel {
  private handlers = new Set<MessageHandler>();

  constructor(
    private readonly client: mqtt.MqttClient,
    readonly clientId: string,
    private readonly publishQos: QualityOfService = 1,
  ) {
    client.on("message", (topic, message) => {
      const payload = message.toString();
      log.debug(`Received ${topic} -> ${payload}`);
      for (const handler of this.handlers) {
        this.dispatch(handler, topic, payload);
      }
    });

    client.on("error", (error) => {
      log.error(`${clientId}: ${error.message}`);
    });

    client.on("close", () => {
      log.info(`${clientId}: connection closed`);
    });

    client.on("offline", () => {
      log.warn(`${clientId}: client went offline`);
    });
  }

  private dispatch(handler: MessageHandler, topic: string, payload: string) {
    try {
      const pending = handler(topic, payload);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => {
          log.error(`Handler for ${topic} failed:`, error);
        });
      }
    } catch (error) {
      log.error(`Handler for ${topic} failed:`, error);
    }
  }

  subscribe(pattern: string, qos: QualityOfService = 1): Promise<Result<void, SubscribeFailure>> {
    return new Promise((resolve) => {
      this.client.subscribe(pattern, { qos }, (error, granted) => {
        if (error) {
          log.error(`Subscribe to ${pattern} failed: ${error.message}`);
          resolve(err(new SubscribeFailure(pattern, error)));
          return;
        }
        if (granted?.some((grant) => grant.qos === SUBACK_FAILURE)) {
          log.error(`Broker refused subscription to ${pattern}`);
          resolve(err(new SubscribeFailure(pattern, new Error("refused by broker"))));
          return;
        }
        log.info(`Subscribed to ${pattern}`);
        resolve(ok(undefined));
      });
    });
  }

  publish(topic: string, payload: string): Promise<Result<void, PublishFailure>> {
    return new Promise((resolve) => {
      if (!this.client.connected) {
        resolve(err(new PublishFailure(topic, 1, new Error("client is not connected"))));
        return;
      }
      this.client.publish(topic, payload, { qos: this.publishQos }, (error) => {
        if (error) {
          resolve(err(new PublishFailure(topic, 1, error)));
        } else {
          log.debug(`Published ${topic} -> ${payload}`);
          resolve(ok(undefined));
        }
      });
    });
  }

  onMessage(handler: MessageHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  disconnect(): Promise<void> {
    return new Promise((resolve) => {
      this.handlers.clear();
      this.client.end(false, {}, () => {
        log.info(`${this.clientId}: disconnected`);
        resolve();
      });
    });
  }
}

/**
 * Connects to an MQTT broker. Automatic reconnection is off: a failed
 * handshake rejects with `ConnectionError`, which callers treat as fatal.
 */
export function connectMqtt(options: ConnectOptions): Promise<MqttChannel> {
  const clientOptions: mqtt.IClientOptions = {
    clientId: options.clientId,
    clean: options.cleanSession,
    connectTimeout: options.connectTimeoutMs ?? 30000,
    reconnectPeriod: 0,
  };

  if (options.username) {
    clientOptions.username = options.username;
    clientOptions.password = options.password;
  }

  log.info(`Connecting to MQTT broker at ${options.address} as ${options.clientId}...`);

  return new Promise((resolve, reject) => {
    let client: mqtt.MqttClient;
    try {
      client = mqtt.connect(options.address, clientOptions);
    } catch (error) {
      reject(new ConnectionError(options.address, error));
      return;
    }

    const onConnect = () => {
      client.off("error", onError);
      client.off("close", onClose);
      log.info(`Connected to MQTT broker at ${options.address}`);
      resolve(new MqttChannel(client, options.clientId));
    };

    const fail = (cause: Error) => {
      client.off("connect", onConnect);
      client.off("error", onError);
      client.off("close", onClose);
      client.end(true);
      reject(new ConnectionError(options.address, cause));
    };

    const onError = (error: Error) => fail(error);
    const onClose = () => fail(new Error("connection closed during handshake"));

    client.once("connect", onConnect);
    client.once("error", onError);
    client.once("close", onClose);
  });
}
