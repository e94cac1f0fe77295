import { createInterface } from "node:readline";
import { parseArgs } from "node:util";
import { pathToFileURL } from "node:url";
import type { Answer } from "@lorebase/shared";
import { appConfig } from "../config.js";
import { describeError, isRagError, userMessage } from "../errors.js";
import { closeRuntime, getAnswerServiceSingleton } from "../runtime/ragRuntime.js";
import type { AnswerService } from "../services/AnswerService.js";
import { Conversation } from "../services/Conversation.js";
import { logger } from "../utils/logger.js";

const USAGE = `Usage: npm run ask -- [--k <n>] ["<question>" ...]

Asks each question in turn, in one conversation. Without questions, reads them from
stdin; type /clear to forget the conversation and /exit to quit.`;

export interface AskCommandDeps {
  answerService: Pick<AnswerService, "ask">;
  write: (line: string) => void;
  /** Next line of input, or null at end of input. */
  readLine?: () => Promise<string | null>;
}

function parseAskArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      k: { type: "string" },
      help: { type: "boolean", short: "h" }
    },
    allowPositionals: true
  });
}

export async function runAskCommand(argv: string[], deps: AskCommandDeps): Promise<number> {
  let parsed: ReturnType<typeof parseAskArgs>;
  try {
    parsed = parseAskArgs(argv);
  } catch (error) {
    deps.write(describeError(error));
    deps.write(USAGE);
    return 2;
  }

  if (parsed.values.help) {
    deps.write(USAGE);
    return 0;
  }

  const k = parsed.values.k === undefined ? appConfig.DEFAULT_TOP_K : Number(parsed.values.k);
  if (!Number.isInteger(k) || k <= 0) {
    deps.write(`--k must be a positive integer, got ${parsed.values.k ?? ""}`);
    return 2;
  }

  const conversation = new Conversation({ maxTurns: appConfig.MAX_CONVERSATION_TURNS });
  let failures = 0;

  const askOne = async (question: string): Promise<void> => {
    try {
      const answer = await deps.answerService.ask({ question, conversation, k });
      for (const line of formatAnswer(answer)) {
        deps.write(line);
      }
    } catch (error) {
      failures += 1;
      if (isRagError(error)) {
        deps.write(`Error (${error.stage}): ${userMessage(error)}`);
      } else {
        deps.write(`Error (unknown): ${describeError(error)}`);
      }
    }
  };

  if (parsed.positionals.length > 0) {
    for (const question of parsed.positionals) {
      deps.write(`Q: ${question}`);
      await askOne(question);
    }
    return failures > 0 ? 1 : 0;
  }

  if (!deps.readLine) {
    deps.write(USAGE);
    return 2;
  }

  while (true) {
    const line = await deps.readLine();
    if (line === null) {
      break;
    }
    const input = line.trim();
    if (input.length === 0) {
      continue;
    }
    if (input === "/exit") {
      break;
    }
    if (input === "/clear") {
      conversation.clear();
      deps.write("Conversation cleared.");
      continue;
    }
    await askOne(input);
  }
  return failures > 0 ? 1 : 0;
}

export function formatAnswer(answer: Answer): string[] {
  const lines = [answer.text];
  if (answer.citations.length > 0) {
    lines.push("", "Sources:");
    answer.citations.forEach((citation, index) => {
      lines.push(`  [${index + 1}] ${citation.documentName} (${citation.score.toFixed(3)})`);
    });
  }
  lines.push("");
  return lines;
}

async function main(): Promise<void> {
  const rl = createInterface({ input: process.stdin, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  const code = await runAskCommand(process.argv.slice(2), {
    answerService: getAnswerServiceSingleton(),
    write: (line) => process.stdout.write(`${line}\n`),
    readLine: async () => {
      process.stdout.write("> ");
      const next = await lines.next();
      return next.done ? null : next.value;
    }
  });
  rl.close();
  await closeRuntime();
  process.exitCode = code;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    logger.fatal({ err: error }, "Ask command crashed");
    process.exitCode = 2;
  });
}
