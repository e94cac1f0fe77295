import { describe, expect, it } from "vitest";
import { Conversation } from "../../../src/services/Conversation.js";

describe("Conversation", () => {
  it("keeps turns in order and returns copies", () => {
    const conversation = new Conversation();
    conversation.append({ role: "user", text: "hello" });
    conversation.append({ role: "assistant", text: "hi", citedChunkIds: ["doc:0"] });

    const history = conversation.history();
    history.pop();

    expect(conversation.size).toBe(2);
    expect(conversation.history().map((turn) => [turn.role, turn.text])).toEqual([
      ["user", "hello"],
      ["assistant", "hi"]
    ]);
    expect(conversation.history()[1]?.citedChunkIds).toEqual(["doc:0"]);
    expect(conversation.history()[0]?.citedChunkIds).toBeUndefined();
  });

  it("forgets the oldest turns past its bound", () => {
    const conversation = new Conversation({ maxTurns: 3 });
    for (const text of ["one", "two", "three", "four"]) {
      conversation.append({ role: "user", text });
    }

    expect(conversation.history().map((turn) => turn.text)).toEqual(["two", "three", "four"]);
    expect(conversation.history(2).map((turn) => turn.text)).toEqual(["three", "four"]);
    expect(conversation.history(0)).toEqual([]);
  });

  it("empties on clear and moves to a new epoch", () => {
    const conversation = new Conversation();
    conversation.append({ role: "user", text: "hello" });
    const before = conversation.epoch;

    conversation.clear();

    expect(conversation.size).toBe(0);
    expect(conversation.epoch).toBe(before + 1);
  });
});
