export abstract class SimulatorError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Broker unreachable or handshake refused. Fatal at startup. */
export class ConnectionError extends SimulatorError {
  readonly code = "CONNECTION_FAILED";

  constructor(
    readonly address: string,
    cause?: unknown,
  ) {
    super(
      `Could not connect to ${address}${cause instanceof Error ? `: ${cause.message}` : ""}`,
      { cause },
    );
  }
}

/** Message on the command namespace that does not decode to a command. */
export class MalformedCommand extends SimulatorError {
  readonly code = "MALFORMED_COMMAND";

  constructor(
    readonly topic: string,
    readonly payload: string,
    readonly reason: string,
  ) {
    super(`Ignoring ${topic} -> "${payload}": ${reason}`);
  }
}

export class PublishFailure extends SimulatorError {
  readonly code = "PUBLISH_FAILED";

  constructor(
    readonly topic: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(
      `Publish to ${topic} failed after ${attempts} attempt(s)${cause instanceof Error ? `: ${cause.message}` : ""}`,
      { cause },
    );
  }
}

export class SubscribeFailure extends SimulatorError {
  readonly code = "SUBSCRIBE_FAILED";

  constructor(
    readonly pattern: string,
    cause?: unknown,
  ) {
    super(
      `Subscribe to ${pattern} failed${cause instanceof Error ? `: ${cause.message}` : ""}`,
      { cause },
    );
  }
}

/** No matching status arrived while the sequencer waited for one. */
export class AckTimeout extends SimulatorError {
  readonly code = "ACK_TIMEOUT";

  constructor(
    readonly expectedStatus: string,
    readonly timeoutMs: number,
  ) {
    super(`No "${expectedStatus}" status within ${timeoutMs}ms`);
  }
}

export class ConfigError extends SimulatorError {
  readonly code = "CONFIG_INVALID";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
}
