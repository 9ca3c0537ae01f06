import { describe, expect, it } from "vitest";
import { DomainViolationError, UnresolvedTopicError } from "../../src/errors.ts";
import { CommandTranslator } from "../../src/translate/commands.ts";
import type { Command } from "../../src/translate/types.ts";
import type { Result } from "../../src/utility.ts";
import {
  createRegistry,
  createTopics,
  handleEntry,
  inboundMessage,
  shutterEntry,
  switchEntry,
} from "../factories.ts";

const SHUTTER = shutterEntry().address;
const SWITCH = switchEntry().address;

const createTranslator = () => {
  const topics = createTopics();
  const registry = createRegistry(
    [shutterEntry(), switchEntry(), handleEntry()],
    topics
  );
  return new CommandTranslator(registry, topics);
};

const errorOf = (result: Result<Command>) =>
  result.fold<Error | undefined>(
    () => undefined,
    error => error
  );

describe("CommandTranslator", () => {
  it("should translate a position into a scaled LEVEL call", () => {
    const command = createTranslator()
      .translate(inboundMessage(`Homematic/${SHUTTER}/4/level/set`, "40"))
      .flat();

    expect(command).toEqual({
      address: SHUTTER,
      channel: 4,
      datapoint: "level",
      messageId: "message-1",
      value: 40,
      call: {
        address: SHUTTER,
        channel: 4,
        parameter: "LEVEL",
        value: 0.4,
        type: "double",
      },
    });
  });

  it("should reject positions outside 0..100", () => {
    const error = errorOf(
      createTranslator().translate(
        inboundMessage(`Homematic/${SHUTTER}/4/level/set`, "150")
      )
    );

    expect(error).toBeInstanceOf(DomainViolationError);
    expect(error?.message).toBe("Expected 0..100");
  });

  it("should map movements to their controller calls", () => {
    const translator = createTranslator();
    const topic = `Homematic/${SHUTTER}/5/movement/set`;

    expect(translator.translate(inboundMessage(topic, "up")).flat().call).toEqual(
      { address: SHUTTER, channel: 5, parameter: "LEVEL", value: 1, type: "double" }
    );
    expect(
      translator.translate(inboundMessage(topic, "down")).flat().call
    ).toEqual({
      address: SHUTTER,
      channel: 5,
      parameter: "LEVEL",
      value: 0,
      type: "double",
    });
    expect(
      translator.translate(inboundMessage(topic, "stop")).flat().call
    ).toEqual({
      address: SHUTTER,
      channel: 5,
      parameter: "STOP",
      value: true,
      type: "boolean",
    });
  });

  it("should translate switch commands", () => {
    const command = createTranslator()
      .translate(inboundMessage(`Homematic/${SWITCH}/4/state/set`, "on"))
      .flat();

    expect(command.value).toBe(true);
    expect(command.call).toEqual({
      address: SWITCH,
      channel: 4,
      parameter: "STATE",
      value: true,
      type: "boolean",
    });
  });

  it("should not accept commands on state topics", () => {
    const error = errorOf(
      createTranslator().translate(
        inboundMessage(`Homematic/${SHUTTER}/4/level`, "40")
      )
    );

    expect(error).toBeInstanceOf(UnresolvedTopicError);
    expect(error?.message).toBe(
      `No datapoint accepts commands on Homematic/${SHUTTER}/4/level`
    );
  });

  it("should not accept commands for read-only datapoints", () => {
    const topic = `Homematic/${handleEntry().address}/1/state/set`;
    const error = errorOf(
      createTranslator().translate(inboundMessage(topic, "open"))
    );

    expect(error).toBeInstanceOf(UnresolvedTopicError);
  });

  it("should not accept commands for unknown devices", () => {
    expect(
      errorOf(
        createTranslator().translate(
          inboundMessage("Homematic/UNKNOWN/4/level/set", "40")
        )
      )
    ).toBeInstanceOf(UnresolvedTopicError);
  });
});
