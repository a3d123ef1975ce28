import { createInterface } from "node:readline";
import { checkSourceImages, type QueryOutcome, type SourceImageCheck } from "@tablelens/core";
import { AppError } from "@tablelens/errors";
import { ConversationLog } from "../conversation-log.js";
import { formatAnswer, formatQueryError, formatTurnFailure } from "../format.js";
import type { Answerer } from "./query.js";

const EXIT_COMMAND = "/exit";

export interface ChatReply {
  lines: string[];
  exit: boolean;
}

/**
 * One turn at a time: the question goes to the log, then the answer with
 * the source tables that are still on disk. Operational failures end the
 * turn, not the session; anything else (an embedding mismatch, a bug)
 * propagates.
 */
export class ChatSession {
  constructor(
    private readonly service: Answerer,
    readonly log: ConversationLog = new ConversationLog(),
    private readonly checkImages: (paths: readonly string[]) => Promise<SourceImageCheck> = checkSourceImages,
  ) {}

  async handle(input: string): Promise<ChatReply> {
    const question = input.trim();
    if (question === EXIT_COMMAND) return { lines: [], exit: true };
    if (question.length === 0) return { lines: [], exit: false };

    this.log.append({ role: "user", content: question });

    let outcome: QueryOutcome;
    try {
      outcome = await this.service.query(question);
    } catch (error: unknown) {
      if (AppError.isAppError(error) && error.isOperational) {
        return this.failTurn(formatTurnFailure(error));
      }
      throw error;
    }

    if (!outcome.ok) return this.failTurn(formatQueryError(outcome.error));

    const images = await this.checkImages(outcome.value.sourceImages);
    this.log.append({ role: "assistant", content: outcome.value.answer, images: images.present });
    return { lines: formatAnswer(outcome.value, images), exit: false };
  }

  private failTurn(lines: string[]): ChatReply {
    this.log.append({ role: "assistant", content: lines.join("\n") });
    return { lines, exit: false };
  }
}

export interface ChatIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export async function runChat(service: Answerer, io: ChatIO): Promise<ConversationLog> {
  const session = new ChatSession(service);
  const rl = createInterface({ input: io.input, output: io.output, prompt: "YOU> " });
  const write = (line: string) => io.output.write(`${line}\n`);

  write("Ask about the report. Type /exit to quit.");
  rl.prompt();
  try {
    for await (const line of rl) {
      const reply = await session.handle(line);
      reply.lines.forEach(write);
      if (reply.exit) break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
  return session.log;
}
