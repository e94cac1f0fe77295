import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { GenerationServiceError } from "../../src/errors.js";
import { NO_INFORMATION_ANSWER } from "../../src/prompts/index.js";
import { seedIndex } from "../helpers/fixtures.js";
import { createTestContext, parseSse, type TestContext } from "../helpers/testApp.js";

const VACATION = "Vacation policy: employees receive 15 days of paid vacation per year.";
const REMOTE = "Remote work policy: staff may work from home two days per week.";

describe("chat api", () => {
  let context: TestContext;

  beforeEach(async () => {
    context = createTestContext();
    await seedIndex(context.index, context.embeddings, [
      { name: "vacation.txt", text: VACATION },
      { name: "remote.txt", text: REMOTE }
    ]);
  });

  it("answers a one-off question with citations", async () => {
    const response = await request(context.app)
      .post("/api/chat/query")
      .send({ question: "How many vacation days?", k: 1 });

    expect(response.status).toBe(200);
    expect(response.body.answer).toBe("Answer to: How many vacation days?");
    expect(response.body.grounded).toBe(true);
    expect(response.body.citations).toHaveLength(1);
    expect(response.body.citations[0].documentName).toBe("vacation.txt");
    expect(response.body.sessionId).toBeUndefined();
  });

  it("returns the fixed reply when the knowledge base is empty", async () => {
    await context.index.reset(null);

    const response = await request(context.app).post("/api/chat/query").send({ question: "Anything?" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ answer: NO_INFORMATION_ANSWER, citations: [], grounded: false });
  });

  it("rejects an empty question", async () => {
    const response = await request(context.app).post("/api/chat/query").send({ question: "   " });

    expect(response.status).toBe(400);
    expect(response.body.code).toBe("VALIDATION_FAILED");
    expect(response.body.details[0].path).toBe("question");
  });

  it("returns 404 for a query against an unknown session", async () => {
    const response = await request(context.app)
      .post("/api/chat/query")
      .send({ question: "How many vacation days?", sessionId: "nope" });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: "Chat session does not exist: nope",
      code: "SESSION_NOT_FOUND",
      stage: "request"
    });
  });

  it("reports generation failures with their stage", async () => {
    context.generator.failure = new GenerationServiceError("Generation service call failed: offline");

    const response = await request(context.app).post("/api/chat/query").send({ question: "How many vacation days?" });

    expect(response.status).toBe(502);
    expect(response.body).toEqual({
      error: "Could not generate an answer: Generation service call failed: offline",
      code: "GENERATION_SERVICE_FAILED",
      stage: "generation"
    });
  });

  it("keeps history per session and clears it on request", async () => {
    const created = await request(context.app).post("/api/chat/sessions").send({});
    expect(created.status).toBe(201);
    expect(created.body.session.title).toBe("New Session");
    const sessionId: string = created.body.session.id;

    const message = await request(context.app)
      .post(`/api/chat/sessions/${sessionId}/messages`)
      .send({ content: "How many vacation days?" });
    expect(message.status).toBe(200);
    expect(message.body.sessionId).toBe(sessionId);
    expect(message.body.answer.text).toBe("Answer to: How many vacation days?");

    const detail = await request(context.app).get(`/api/chat/sessions/${sessionId}`);
    expect(detail.status).toBe(200);
    expect(detail.body.session.turns.map((turn: { role: string }) => turn.role)).toEqual(["user", "assistant"]);

    await request(context.app)
      .post("/api/chat/query")
      .send({ question: "And remote work?", sessionId });
    expect(context.generator.inputs[1]?.history).toHaveLength(2);

    const cleared = await request(context.app).delete(`/api/chat/sessions/${sessionId}/history`);
    expect(cleared.status).toBe(204);

    const afterClear = await request(context.app).get(`/api/chat/sessions/${sessionId}`);
    expect(afterClear.body.session.turns).toEqual([]);
  });

  it("lists and deletes sessions", async () => {
    await request(context.app).post("/api/chat/sessions").send({ title: "Benefits" });

    const list = await request(context.app).get("/api/chat/sessions?limit=10");
    expect(list.status).toBe(200);
    expect(list.body.sessions).toHaveLength(1);
    const sessionId: string = list.body.sessions[0].id;

    expect((await request(context.app).delete(`/api/chat/sessions/${sessionId}`)).status).toBe(204);
    expect((await request(context.app).delete(`/api/chat/sessions/${sessionId}`)).status).toBe(404);
    expect((await request(context.app).get(`/api/chat/sessions/${sessionId}`)).status).toBe(404);
  });

  it("validates the session list limit", async () => {
    const response = await request(context.app).get("/api/chat/sessions?limit=abc");

    expect(response.status).toBe(400);
    expect(response.body.code).toBe("VALIDATION_FAILED");
  });

  it("streams an answer as server-sent events", async () => {
    const session = context.sessionStore.createSession({ title: "Stream" });

    const response = await request(context.app)
      .post(`/api/chat/sessions/${session.id}/messages?stream=true`)
      .send({ content: "How many vacation days?", k: 1 });

    expect(response.status).toBe(200);
    expect(response.headers["content-type"]).toContain("text/event-stream");
    const events = parseSse(response.text);
    expect(events[0]).toEqual({ event: "ack", data: { sessionId: session.id } });
    expect(events[1]).toEqual({ event: "retrieval", data: { type: "retrieval", retrievedChunkIds: ["vacation:0"] } });
    expect(events.slice(-2).map((event) => event.event)).toEqual(["citations", "done"]);
    const text = events
      .filter((event) => event.event === "delta")
      .map((event) =>
        typeof event.data === "object" && event.data !== null && "delta" in event.data ? String(event.data.delta) : ""
      )
      .join("");
    expect(text).toBe("Answer to: How many vacation days?");
    expect(context.sessionStore.getConversation(session.id).size).toBe(2);
  });

  it("ends a failed stream with an error event", async () => {
    context.generator.failure = new GenerationServiceError("Generation service call failed: offline");

    const response = await request(context.app)
      .post("/api/chat/query")
      .set("Accept", "text/event-stream")
      .send({ question: "How many vacation days?" });

    const events = parseSse(response.text);
    expect(events.map((event) => event.event)).toEqual(["ack", "retrieval", "error"]);
    expect(events[2]?.data).toEqual({
      error: "Could not generate an answer: Generation service call failed: offline",
      code: "GENERATION_SERVICE_FAILED",
      stage: "generation"
    });
  });
});
