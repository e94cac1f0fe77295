import { beforeEach, describe, expect, it } from "vitest";
import { GenerationServiceError } from "../../../src/errors.js";
import { NO_INFORMATION_ANSWER } from "../../../src/prompts/index.js";
import { AnswerService, type AnswerStreamEvent } from "../../../src/services/AnswerService.js";
import { Conversation } from "../../../src/services/Conversation.js";
import { Retriever } from "../../../src/services/Retriever.js";
import { InMemoryVectorIndex } from "../../../src/store/InMemoryVectorIndex.js";
import { FakeEmbeddingGateway } from "../../helpers/FakeEmbeddingGateway.js";
import { FakeGenerator } from "../../helpers/FakeGenerator.js";
import { seedIndex } from "../../helpers/fixtures.js";

const VACATION = "Vacation policy: employees receive 15 days of paid vacation per year.";
const REMOTE = "Remote work policy: staff may work from home two days per week.";

async function collect(events: AsyncGenerator<AnswerStreamEvent>): Promise<AnswerStreamEvent[]> {
  const collected: AnswerStreamEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

describe("AnswerService", () => {
  let index: InMemoryVectorIndex;
  let embeddings: FakeEmbeddingGateway;
  let generator: FakeGenerator;
  let service: AnswerService;

  beforeEach(async () => {
    index = new InMemoryVectorIndex();
    embeddings = new FakeEmbeddingGateway();
    generator = new FakeGenerator();
    await seedIndex(index, embeddings, [
      { name: "vacation.txt", text: VACATION },
      { name: "remote.txt", text: REMOTE }
    ]);
    const retriever = new Retriever(index, embeddings, {}, {
      rewritePolicy: "none",
      rewriteHistoryTurns: 2,
      similarityThreshold: 0,
      defaultTopK: 1
    });
    service = new AnswerService(retriever, generator, {}, { defaultTopK: 1, maxContextChars: 6000 });
  });

  it("answers from the retrieved context and cites what it used", async () => {
    const answer = await service.ask({ question: "  How many vacation days?  " });

    expect(answer.text).toBe("Answer to: How many vacation days?");
    expect(answer.grounded).toBe(true);
    expect(answer.citations).toEqual([
      {
        documentId: "vacation",
        documentName: "vacation.txt",
        chunkId: "vacation:0",
        excerpt: VACATION,
        score: expect.closeTo(3 / (Math.sqrt(13) * 2), 10)
      }
    ]);
    expect(generator.inputs[0]).toEqual({
      contextText: `### Source: vacation.txt\n${VACATION}`,
      query: "How many vacation days?",
      history: []
    });
  });

  it("cites only chunks that made it into the context", async () => {
    const answer = await service.ask({ question: "policy days per", k: 2 });
    const context = generator.inputs[0]?.contextText ?? "";

    expect(answer.citations).toHaveLength(2);
    for (const citation of answer.citations) {
      expect(context).toContain(citation.excerpt);
    }
  });

  it("returns the fixed reply without calling the model when nothing is retrieved", async () => {
    const empty = new AnswerService(
      new Retriever(new InMemoryVectorIndex(), embeddings, {}, { rewritePolicy: "none" }),
      generator
    );
    const conversation = new Conversation();

    const answer = await empty.ask({ question: "Anything?", conversation });

    expect(answer).toEqual({ text: NO_INFORMATION_ANSWER, citations: [], grounded: false });
    expect(generator.inputs).toEqual([]);
    expect(conversation.history().map((turn) => turn.text)).toEqual(["Anything?", NO_INFORMATION_ANSWER]);
  });

  it("records the exchange and feeds it back on the next question", async () => {
    const conversation = new Conversation();

    await service.ask({ question: "How many vacation days?", conversation });
    await service.ask({ question: "And for remote work?", conversation });

    const turns = conversation.history();
    expect(turns.map((turn) => turn.role)).toEqual(["user", "assistant", "user", "assistant"]);
    expect(turns[1]?.citedChunkIds).toEqual(["vacation:0"]);
    expect(generator.inputs[1]?.history.map((turn) => turn.text)).toEqual([
      "How many vacation days?",
      "Answer to: How many vacation days?"
    ]);
  });

  it("does not write back into a conversation cleared while answering", async () => {
    const conversation = new Conversation();
    let release: () => void = () => undefined;
    generator.gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const pending = service.ask({ question: "How many vacation days?", conversation });
    await new Promise((resolve) => setTimeout(resolve, 10));
    conversation.clear();
    release();
    const answer = await pending;

    expect(answer.grounded).toBe(true);
    expect(conversation.size).toBe(0);
  });

  it("leaves the conversation untouched when generation fails", async () => {
    const conversation = new Conversation();
    generator.failure = new GenerationServiceError("Generation service call failed: offline");

    await expect(service.ask({ question: "How many vacation days?", conversation })).rejects.toBeInstanceOf(
      GenerationServiceError
    );
    expect(conversation.size).toBe(0);
  });

  it("streams retrieval, deltas, citations and the final answer", async () => {
    const events = await collect(service.stream({ question: "How many vacation days?" }));

    expect(events.map((event) => event.type)).toEqual([
      "retrieval",
      "delta",
      "delta",
      "delta",
      "delta",
      "delta",
      "delta",
      "citations",
      "done"
    ]);
    expect(events[0]).toEqual({ type: "retrieval", retrievedChunkIds: ["vacation:0"] });
    const text = events.map((event) => (event.type === "delta" ? event.delta : "")).join("");
    expect(text).toBe("Answer to: How many vacation days?");

    const done = events[events.length - 1];
    expect(done?.type === "done" ? done.answer.text : null).toBe("Answer to: How many vacation days?");
  });

  it("streams the fixed reply for an empty knowledge base", async () => {
    const empty = new AnswerService(
      new Retriever(new InMemoryVectorIndex(), embeddings, {}, { rewritePolicy: "none" }),
      generator
    );

    const events = await collect(empty.stream({ question: "Anything?" }));

    expect(events).toEqual([
      { type: "retrieval", retrievedChunkIds: [] },
      { type: "delta", delta: NO_INFORMATION_ANSWER },
      { type: "citations", citations: [] },
      { type: "done", answer: { text: NO_INFORMATION_ANSWER, citations: [], grounded: false } }
    ]);
  });
});
