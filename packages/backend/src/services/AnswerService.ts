import type { Answer, Citation, RetrievalResult } from "@lorebase/shared";
import { appConfig } from "../config.js";
import { NO_INFORMATION_ANSWER } from "../prompts/index.js";
import { logger } from "../utils/logger.js";
import { ContextAssembler, type AssembledContext } from "./ContextAssembler.js";
import type { Conversation } from "./Conversation.js";
import type { CallOptions, GeneratorLike } from "./llmTypes.js";
import type { Retriever } from "./Retriever.js";

export type AnswerStreamEvent =
  | {
      type: "retrieval";
      retrievedChunkIds: string[];
    }
  | {
      type: "delta";
      delta: string;
    }
  | {
      type: "citations";
      citations: Citation[];
    }
  | {
      type: "done";
      answer: Answer;
    };

export interface AskInput {
  question: string;
  conversation?: Conversation | null;
  k?: number;
  signal?: AbortSignal;
}

interface AnswerServiceOptions {
  defaultTopK: number;
  maxContextChars: number;
}

const defaultOptions: AnswerServiceOptions = {
  defaultTopK: appConfig.DEFAULT_TOP_K,
  maxContextChars: appConfig.MAX_CONTEXT_CHARS
};

interface PreparedQuery {
  question: string;
  conversation: Conversation | null;
  /** Conversation epoch when the query started. */
  epoch: number;
  retrieval: RetrievalResult;
  context: AssembledContext | null;
}

/**
 * One question through the whole pipeline: retrieve, assemble, generate, then record the
 * exchange in the conversation. Citations come from the assembled context, never from
 * model output.
 */
export class AnswerService {
  private readonly options: AnswerServiceOptions;
  private readonly assembler: ContextAssembler;

  constructor(
    private readonly retriever: Retriever,
    private readonly generator: GeneratorLike,
    deps: { assembler?: ContextAssembler } = {},
    options: Partial<AnswerServiceOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
    this.assembler = deps.assembler ?? new ContextAssembler({ maxContextChars: this.options.maxContextChars });
  }

  async ask(input: AskInput): Promise<Answer> {
    const prepared = await this.prepare(input);
    if (!prepared.context) {
      return this.finish(prepared, NO_INFORMATION_ANSWER, false);
    }

    const text = await this.generator.generate(
      {
        contextText: prepared.context.contextText,
        query: prepared.question,
        history: prepared.context.history
      },
      callOptions(input.signal)
    );
    return this.finish(prepared, text, true);
  }

  async *stream(input: AskInput): AsyncGenerator<AnswerStreamEvent> {
    const prepared = await this.prepare(input);
    yield {
      type: "retrieval",
      retrievedChunkIds: prepared.retrieval.map((item) => item.chunk.id)
    };

    if (!prepared.context) {
      yield { type: "delta", delta: NO_INFORMATION_ANSWER };
      yield { type: "citations", citations: [] };
      yield { type: "done", answer: this.finish(prepared, NO_INFORMATION_ANSWER, false) };
      return;
    }

    let text = "";
    for await (const delta of this.generator.stream(
      {
        contextText: prepared.context.contextText,
        query: prepared.question,
        history: prepared.context.history
      },
      callOptions(input.signal)
    )) {
      if (delta.length === 0) {
        continue;
      }
      text += delta;
      yield { type: "delta", delta };
    }

    const answer = this.finish(prepared, text.trim(), true);
    yield { type: "citations", citations: answer.citations };
    yield { type: "done", answer };
  }

  private async prepare(input: AskInput): Promise<PreparedQuery> {
    const question = input.question.trim();
    const conversation = input.conversation ?? null;
    const epoch = conversation?.epoch ?? 0;

    const retrieval = await this.retriever.retrieve(
      question,
      input.k ?? this.options.defaultTopK,
      conversation,
      callOptions(input.signal)
    );

    if (retrieval.length === 0) {
      return { question, conversation, epoch, retrieval, context: null };
    }

    const context = this.assembler.assemble(retrieval, conversation, this.options.maxContextChars);
    if (context.includedChunkIds.length === 0) {
      return { question, conversation, epoch, retrieval, context: null };
    }

    if (context.droppedChunkIds.length > 0) {
      logger.debug(
        { included: context.includedChunkIds.length, dropped: context.droppedChunkIds.length },
        "Context budget dropped lower-ranked chunks"
      );
    }
    return { question, conversation, epoch, retrieval, context };
  }

  private finish(prepared: PreparedQuery, text: string, grounded: boolean): Answer {
    const citations = prepared.context?.citations ?? [];
    const { conversation } = prepared;

    if (conversation) {
      if (conversation.epoch === prepared.epoch) {
        conversation.append({ role: "user", text: prepared.question });
        conversation.append({
          role: "assistant",
          text,
          citedChunkIds: citations.map((citation) => citation.chunkId)
        });
      } else {
        logger.debug("Conversation was cleared while answering; not recording this exchange");
      }
    }

    return { text, citations, grounded };
  }
}

function callOptions(signal: AbortSignal | undefined): CallOptions {
  return signal ? { signal } : {};
}
