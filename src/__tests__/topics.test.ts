/**
 * Tests for topic construction and MQTT filter matching.
 */

import { describe, it, expect } from "vitest";
import { buildTopics, observedTopics, topicMatches } from "../topics";

describe("buildTopics", () => {
  it("roots every topic at the base", () => {
    const topics = buildTopics("site/evse1");

    expect(topics.status).toBe("site/evse1/status");
    expect(topics.commandWildcard).toBe("site/evse1/rapi/in/#");
    expect(topics.command("$V2G")).toBe("site/evse1/rapi/in/$V2G");
    expect(observedTopics(topics)).toEqual([
      "site/evse1/status",
      "site/evse1/amp",
      "site/evse1/volt",
      "site/evse1/wh",
      "site/evse1/bms",
    ]);
  });
});

describe("topicMatches", () => {
  it.each([
    ["openevse/rapi/in/#", "openevse/rapi/in/$SC", true],
    ["openevse/rapi/in/#", "openevse/rapi/in", true],
    ["openevse/rapi/in/#", "openevse/rapi/in/a/b", true],
    ["openevse/rapi/in/#", "openevse/status", false],
    ["openevse/+", "openevse/status", true],
    ["openevse/+", "openevse/rapi/in", false],
    ["+/status", "openevse/status", true],
    ["openevse/status", "openevse/status", true],
    ["openevse/status", "openevse/status/extra", false],
    ["openevse/status/extra", "openevse/status", false],
    ["#", "anything/at/all", true],
  ])("%s against %s is %s", (pattern, topic, expected) => {
    expect(topicMatches(pattern, topic)).toBe(expected);
  });
});
