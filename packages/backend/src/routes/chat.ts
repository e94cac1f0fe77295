import type { Request, Response } from "express";
import { Router } from "express";
import { z } from "zod";
import type {
  ChatSessionDetailResponse,
  CreateChatMessageResponse,
  CreateChatSessionResponse,
  ListChatSessionsResponse,
  QueryResponse
} from "@lorebase/shared";
import { toErrorResponse } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import { getAnswerServiceSingleton, getSessionStoreSingleton } from "../runtime/ragRuntime.js";
import type { AnswerService, AnswerStreamEvent, AskInput } from "../services/AnswerService.js";
import type { SessionStore } from "../services/SessionStore.js";
import { logger } from "../utils/logger.js";

const sessionParamsSchema = z.object({
  id: z.string().min(1)
});

const createSessionBodySchema = z.object({
  title: z.string().min(1).max(120).optional()
});

const queryBodySchema = z.object({
  question: z.string().trim().min(1).max(4000),
  sessionId: z.string().min(1).optional(),
  k: z.coerce.number().int().min(1).max(50).optional()
});

const createMessageBodySchema = z.object({
  content: z.string().trim().min(1).max(4000),
  k: z.coerce.number().int().min(1).max(50).optional()
});

const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(100)
});

type QueryBody = z.infer<typeof queryBodySchema>;
type CreateMessageBody = z.infer<typeof createMessageBodySchema>;
type CreateSessionBody = z.infer<typeof createSessionBodySchema>;

export interface CreateChatRouterOptions {
  answerService?: AnswerService;
  sessionStore?: SessionStore;
}

function wantsSse(req: Request): boolean {
  const accepts = req.headers.accept ?? "";
  const streamFlag = req.query.stream;
  const streamRequested =
    typeof streamFlag === "string" && streamFlag.toLowerCase() === "true";
  return accepts.includes("text/event-stream") || streamRequested;
}

function sendSseEvent(res: Response, eventName: string, payload: unknown): void {
  res.write(`event: ${eventName}\n`);
  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}

/** Aborts when the client goes away before the response is complete. */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

export function createChatRouter(options: CreateChatRouterOptions = {}): Router {
  const answerService = options.answerService ?? getAnswerServiceSingleton();
  const sessionStore = options.sessionStore ?? getSessionStoreSingleton();

  const chatRouter = Router();

  const streamAnswer = async (
    res: Response,
    input: AskInput,
    sessionId: string | undefined
  ): Promise<void> => {
    res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    res.setHeader("Cache-Control", "no-cache, no-transform");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    sendSseEvent(res, "ack", sessionId ? { sessionId } : {});
    const heartbeat = setInterval(() => {
      res.write(": heartbeat\n\n");
    }, 15_000);

    let closed = false;
    res.on("close", () => {
      closed = !res.writableEnded;
      clearInterval(heartbeat);
    });

    try {
      for await (const event of answerService.stream(input)) {
        if (closed) {
          break;
        }
        emitAnswerEvent(res, event);
      }
    } catch (error) {
      if (!closed) {
        const { body } = toErrorResponse(error);
        logger.warn({ err: error, sessionId }, "Answer stream failed");
        sendSseEvent(res, "error", body);
      }
    } finally {
      clearInterval(heartbeat);
      if (!closed) {
        res.end();
      }
    }
  };

  chatRouter.post("/query", validate({ body: queryBodySchema }), async (req, res, next) => {
    const body: QueryBody = req.body;
    const controller = abortOnDisconnect(res);

    try {
      const conversation = body.sessionId ? sessionStore.getConversation(body.sessionId) : null;
      const input: AskInput = { question: body.question, conversation, signal: controller.signal };
      if (body.k !== undefined) {
        input.k = body.k;
      }

      if (wantsSse(req)) {
        await streamAnswer(res, input, body.sessionId);
        return;
      }

      const answer = await answerService.ask(input);
      if (body.sessionId) {
        sessionStore.touch(body.sessionId);
      }

      const response: QueryResponse = {
        answer: answer.text,
        citations: answer.citations,
        grounded: answer.grounded
      };
      if (body.sessionId) {
        response.sessionId = body.sessionId;
      }
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  chatRouter.post("/sessions", validate({ body: createSessionBodySchema }), (req, res) => {
    const body: CreateSessionBody = req.body;
    const session = sessionStore.createSession({
      title: body.title ?? "New Session"
    });

    const response: CreateChatSessionResponse = { session };
    res.status(201).json(response);
  });

  chatRouter.get("/sessions", (req, res) => {
    const { limit } = listSessionsQuerySchema.parse(req.query);
    const response: ListChatSessionsResponse = {
      sessions: sessionStore.listSessions(limit)
    };
    res.json(response);
  });

  chatRouter.get("/sessions/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    const sessionId = req.params.id ?? "";
    const session = sessionStore.getSessionById(sessionId);
    if (!session) {
      res.status(404).json({ error: "Session not found", code: "SESSION_NOT_FOUND", stage: "request" });
      return;
    }

    const response: ChatSessionDetailResponse = {
      session: {
        ...session,
        turns: sessionStore.getConversation(sessionId).history()
      }
    };
    res.json(response);
  });

  chatRouter.delete("/sessions/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    const deleted = sessionStore.deleteSession(req.params.id ?? "");
    if (!deleted) {
      res.status(404).json({ error: "Session not found", code: "SESSION_NOT_FOUND", stage: "request" });
      return;
    }

    res.status(204).send();
  });

  chatRouter.delete("/sessions/:id/history", validate({ params: sessionParamsSchema }), (req, res, next) => {
    try {
      const sessionId = req.params.id ?? "";
      sessionStore.getConversation(sessionId).clear();
      sessionStore.touch(sessionId);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  chatRouter.post(
    "/sessions/:id/messages",
    validate({
      params: sessionParamsSchema,
      body: createMessageBodySchema
    }),
    async (req, res, next) => {
      const sessionId = req.params.id ?? "";
      const body: CreateMessageBody = req.body;
      const controller = abortOnDisconnect(res);

      try {
        const conversation = sessionStore.getConversation(sessionId);
        const input: AskInput = { question: body.content, conversation, signal: controller.signal };
        if (body.k !== undefined) {
          input.k = body.k;
        }

        if (wantsSse(req)) {
          await streamAnswer(res, input, sessionId);
          sessionStore.touch(sessionId);
          return;
        }

        const answer = await answerService.ask(input);
        sessionStore.touch(sessionId);
        const response: CreateChatMessageResponse = { sessionId, answer };
        res.json(response);
      } catch (error) {
        next(error);
      }
    }
  );

  return chatRouter;
}

function emitAnswerEvent(res: Response, event: AnswerStreamEvent): void {
  switch (event.type) {
    case "retrieval":
      sendSseEvent(res, "retrieval", event);
      break;
    case "delta":
      sendSseEvent(res, "delta", event);
      break;
    case "citations":
      sendSseEvent(res, "citations", event);
      break;
    case "done":
      sendSseEvent(res, "done", event);
      break;
    default:
      break;
  }
}
