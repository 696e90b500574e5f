import { EventEmitter } from "node:events";
import {
  type BmsAdvisory,
  type BmsLimits,
  DEFAULT_BMS_LIMITS,
  evaluateBms,
  formatAdvisory,
} from "../bms/bmsMonitor";
import type { MessageChannel } from "../channel/messageChannel";
import { DEFAULT_RETRY_POLICY, publishWithRetry, type RetryPolicy } from "../channel/retry";
import type { MalformedCommand, SubscribeFailure } from "../errors";
import { createLogger } from "../logger";
import { decodeCommand } from "../rapi/codec";
import { describeCommand, type Command } from "../rapi/types";
import { ok, type Result } from "../result";
import type { TopicMap } from "../topics";
import { BatterySimulator, type BatteryProfile } from "./batterySimulator";
import {
  type ChargerState,
  type GuardPolicy,
  STATUS_MESSAGES,
  type Transition,
  transition,
} from "./chargerState";
import { SerialQueue } from "./serialQueue";

const log = createLogger("CHARGER");

const STATUS_HISTORY_LIMIT = 100;

export type StatusSource = "command" | "heartbeat";

export interface StatusEvent {
  readonly message: string;
  readonly timestamp: Date;
  readonly source: StatusSource;
}

export interface ChargerSnapshot {
  state: ChargerState;
  targetCurrentA: number;
  bidirectional: boolean;
  lastStatus: StatusEvent | null;
  commandsHandled: number;
  soc: number;
  energyWh: number;
  bms: BmsAdvisory | null;
}

export interface ChargerSimulatorOptions {
  topics: TopicMap;
  heartbeatIntervalMs?: number;
  telemetryIntervalMs?: number;
  guards?: GuardPolicy;
  retry?: RetryPolicy;
  battery?: Partial<BatteryProfile>;
  bmsLimits?: Partial<BmsLimits>;
}

/**
 * Simulated charger reacting to RAPI commands.
 *
 * Commands are handled one at a time: each one is decoded, applied to the
 * state cell and answered with exactly one status before the next starts.
 * The heartbeat and telemetry timers run beside the command queue and only
 * read the state.
 *
 * Emits:
 *   'status'     (event: StatusEvent)          -- every status, command or heartbeat
 *   'transition' (transition: Transition)      -- after each handled command
 *   'malformed'  (error: MalformedCommand)     -- ignored input on the command namespace
 *   'telemetry'  (sample: TelemetrySample)     -- each telemetry tick outside Idle
 *   'bms'        (advisory: BmsAdvisory)       -- when the BMS advisory changes
 */
export class ChargerSimulator extends EventEmitter {
  private state: ChargerState = "Idle";
  private targetCurrentA = 0;
  private commandsHandled = 0;
  private lastStatus: StatusEvent | null = null;
  private statusHistory: StatusEvent[] = [];
  private lastAdvisory: BmsAdvisory | null = null;

  private readonly queue = new SerialQueue();
  private readonly battery: BatterySimulator;
  private readonly topics: TopicMap;
  private readonly heartbeatIntervalMs: number;
  private readonly telemetryIntervalMs: number;
  private readonly guards: GuardPolicy;
  private readonly retry: RetryPolicy;
  private readonly bmsLimits: BmsLimits;

  private channel: MessageChannel | null = null;
  private removeHandler: (() => void) | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private telemetryTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ChargerSimulatorOptions) {
    super();
    this.topics = options.topics;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 5000;
    this.telemetryIntervalMs = options.telemetryIntervalMs ?? 1000;
    this.guards = options.guards ?? "none";
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.bmsLimits = { ...DEFAULT_BMS_LIMITS, ...options.bmsLimits };
    this.battery = new BatterySimulator(options.battery);
  }

  getState(): ChargerState {
    return this.state;
  }

  snapshot(): ChargerSnapshot {
    return {
      state: this.state,
      targetCurrentA: this.targetCurrentA,
      bidirectional: this.state === "Bidirectional",
      lastStatus: this.lastStatus,
      commandsHandled: this.commandsHandled,
      soc: this.battery.getSoc(),
      energyWh: this.battery.getEnergyWh(),
      bms: this.lastAdvisory,
    };
  }

  /** Most recent status events, oldest first. */
  recentStatus(): StatusEvent[] {
    return [...this.statusHistory];
  }

  /** Subscribes to the command namespace and publishes replies on `channel`. */
  async attach(channel: MessageChannel): Promise<Result<void, SubscribeFailure>> {
    this.detach();
    this.channel = channel;
    this.removeHandler = channel.onMessage((topic, payload) => this.receive(topic, payload));

    const subscribed = await channel.subscribe(this.topics.commandWildcard, 1);
    if (!subscribed.ok) {
      this.detach();
      return subscribed;
    }
    log.info(`Listening on ${this.topics.commandWildcard}`);
    return ok(undefined);
  }

  detach() {
    this.removeHandler?.();
    this.removeHandler = null;
    this.channel = null;
  }

  /** Publishes a first heartbeat, then starts the heartbeat and telemetry timers. */
  start() {
    this.stop();
    const heartbeat = () => {
      this.publishStatus(STATUS_MESSAGES.idle, "heartbeat").catch((error: unknown) => {
        log.error("Heartbeat failed:", error);
      });
    };
    heartbeat();
    this.heartbeatTimer = setInterval(heartbeat, this.heartbeatIntervalMs);
    this.telemetryTimer = setInterval(() => {
      this.publishTelemetry().catch((error: unknown) => {
        log.error("Telemetry tick failed:", error);
      });
    }, this.telemetryIntervalMs);
  }

  stop() {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.telemetryTimer) {
      clearInterval(this.telemetryTimer);
      this.telemetryTimer = null;
    }
  }

  /** Resolves once every command received so far has been answered. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /**
   * Entry point for bus messages. Anything that does not decode is logged
   * and dropped without touching the state or publishing a status.
   */
  receive(topic: string, payload: string): Promise<void> {
    if (!topic.startsWith(this.topics.commandPrefix)) {
      return Promise.resolve();
    }

    const decoded = decodeCommand(this.topics, topic, payload);
    if (!decoded.ok) {
      this.rejectMalformed(decoded.error);
      return Promise.resolve();
    }

    log.info(`Received: ${topic} -> ${payload}`);
    return this.handle(decoded.value).then(() => undefined);
  }

  /** Applies a command directly, without going through the bus. */
  handle(command: Command): Promise<Transition> {
    return this.queue.run(async () => {
      const result = transition(this.state, command, this.guards);
      this.apply(result);
      this.emit("transition", result);
      await this.publishStatus(result.status, "command");
      return result;
    });
  }

  private apply(result: Transition) {
    this.commandsHandled++;
    if (!result.accepted) {
      log.warn(`${describeCommand(result.command)} rejected in ${result.from}`);
      return;
    }

    this.state = result.to;
    if (result.command.kind === "SetCurrent") {
      this.targetCurrentA = result.command.amps;
    } else if (result.command.kind === "Stop") {
      this.targetCurrentA = 0;
    }
    log.info(`${describeCommand(result.command)}: ${result.from} -> ${result.to}`);
  }

  private rejectMalformed(error: MalformedCommand) {
    log.warn(error.message);
    this.emit("malformed", error);
  }

  private async publishStatus(message: string, source: StatusSource): Promise<void> {
    const event: StatusEvent = Object.freeze({ message, timestamp: new Date(), source });
    this.lastStatus = event;
    this.statusHistory.push(event);
    if (this.statusHistory.length > STATUS_HISTORY_LIMIT) {
      this.statusHistory.shift();
    }
    this.emit("status", event);

    if (!this.channel) return;
    const published = await publishWithRetry(this.channel, this.topics.status, message, this.retry);
    if (!published.ok) {
      log.error(published.error.message);
    }
  }

  /** Current the charger lets flow in the present state. */
  private drawnCurrentA(): number {
    switch (this.state) {
      case "Charging":
        return Math.max(0, this.targetCurrentA);
      case "Bidirectional":
        return this.targetCurrentA;
      case "CurrentConfigured":
      case "Idle":
        return 0;
    }
  }

  private async publishTelemetry(): Promise<void> {
    if (this.state === "Idle") return;

    const sample = this.battery.tick(this.drawnCurrentA(), this.telemetryIntervalMs / 1000);
    this.emit("telemetry", sample);

    const advisory = evaluateBms(sample, this.bmsLimits);
    const advisoryChanged = advisory.code !== this.lastAdvisory?.code;
    if (advisoryChanged) {
      this.lastAdvisory = advisory;
      if (advisory.critical) {
        log.warn(`BMS: ${formatAdvisory(advisory)}`);
      }
      this.emit("bms", advisory);
    }

    const channel = this.channel;
    if (!channel) return;

    const frames: Array<[string, string]> = [
      [this.topics.amp, sample.currentA.toFixed(1)],
      [this.topics.volt, sample.voltageV.toFixed(1)],
      [this.topics.wh, Math.round(sample.energyWh).toString()],
    ];
    if (advisoryChanged) {
      frames.push([this.topics.bms, formatAdvisory(advisory)]);
    }

    // Telemetry is lossy: a failed sample is superseded by the next tick.
    for (const [topic, payload] of frames) {
      const published = await channel.publish(topic, payload);
      if (!published.ok) {
        log.warn(published.error.message);
      }
    }
  }
}
