import type { RapiCode } from "./rapi/types";

export interface TopicMap {
  base: string;
  status: string;
  amp: string;
  volt: string;
  wh: string;
  bms: string;
  /** `{base}/rapi/in/`, the prefix every command topic starts with. */
  commandPrefix: string;
  /** `{base}/rapi/in/#`, subscribed by the charger. */
  commandWildcard: string;
  command(code: RapiCode): string;
}

export function buildTopics(base: string): TopicMap {
  const commandPrefix = `${base}/rapi/in/`;
  return {
    base,
    status: `${base}/status`,
    amp: `${base}/amp`,
    volt: `${base}/volt`,
    wh: `${base}/wh`,
    bms: `${base}/bms`,
    commandPrefix,
    commandWildcard: `${commandPrefix}#`,
    command: (code) => `${commandPrefix}${code}`,
  };
}

/** Topics the controller watches. */
export function observedTopics(topics: TopicMap): string[] {
  return [topics.status, topics.amp, topics.volt, topics.wh, topics.bms];
}

/**
 * MQTT topic filter matching: `+` matches exactly one level, a trailing `#`
 * matches the parent level and everything below it.
 */
export function topicMatches(pattern: string, topic: string): boolean {
  const filterLevels = pattern.split("/");
  const topicLevels = topic.split("/");

  for (let i = 0; i < filterLevels.length; i++) {
    const level = filterLevels[i];
    if (level === "#") return true;
    if (i >= topicLevels.length) return false;
    if (level !== "+" && level !== topicLevels[i]) return false;
  }

  return filterLevels.length === topicLevels.length;
}
