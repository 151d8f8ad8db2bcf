import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions.js";
import { withRetry } from "../llm/retry.js";
import { componentLogger, type Logger } from "../logger.js";
import { charLength, getPartTexts, sliceChars } from "./content.js";
import type { Message, Summarizer, Transcript } from "./types.js";

// ── LLM Summarizer ───────────────────────────────────────

/**
 * The slice of the OpenAI SDK the summarizer calls. An `OpenAI` instance
 * satisfies it; tests pass a plain object.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface LlmSummarizerOptions {
  model: string;
  /** Fewer messages than this are not summarized (default 10) */
  minMessages?: number;
  /** Rendered conversations shorter than this are not summarized (default 200) */
  minChars?: number;
  maxOutputTokens?: number;
  temperature?: number;
  logger?: Logger;
}

/** Per-part cap when rendering the conversation for the prompt. */
const MAX_PART_CHARS = 500;

const SUMMARIZE_PROMPT = `สรุปบทสนทนาต่อไปนี้ให้กระชับและครบถ้วน ใน 2-3 ประโยค:
- เก็บประเด็นสำคัญ ชื่อ และข้อมูลที่ต้องจำ
- เขียนเป็นมุมมองบุคคลที่สาม
- ใช้ภาษาเดียวกับบทสนทนา

บทสนทนา:
{conversation}

สรุป:`;

/** One `User:` / `AI:` line per part, long parts cut at 500 chars. */
export function renderConversation(messages: Transcript): string {
  const lines: string[] = [];
  for (const message of messages) {
    const speaker = message.role === "user" ? "User" : "AI";
    for (const text of getPartTexts(message)) {
      const clipped =
        charLength(text) > MAX_PART_CHARS ? `${sliceChars(text, MAX_PART_CHARS)}...` : text;
      lines.push(`${speaker}: ${clipped}`);
    }
  }
  return lines.join("\n");
}

export class LlmSummarizer implements Summarizer {
  private readonly model: string;
  private readonly minMessages: number;
  private readonly minChars: number;
  private readonly maxOutputTokens: number;
  private readonly temperature: number;
  private readonly log: Logger;

  constructor(
    private readonly client: ChatCompletionsClient,
    options: LlmSummarizerOptions,
  ) {
    this.model = options.model;
    this.minMessages = options.minMessages ?? 10;
    this.minChars = options.minChars ?? 200;
    this.maxOutputTokens = options.maxOutputTokens ?? 300;
    this.temperature = options.temperature ?? 0.3;
    this.log = options.logger ?? componentLogger("summarizer");
  }

  /** Summarize the last `maxMessages` messages. Null when too little to say. */
  async summarize(
    messages: Transcript,
    maxMessages = 50,
    signal?: AbortSignal,
  ): Promise<string | null> {
    if (messages.length < this.minMessages) return null;

    const conversation = renderConversation(messages.slice(-maxMessages));
    if (charLength(conversation) < this.minChars) return null;

    const response = await withRetry(
      async () =>
        this.client.chat.completions.create(
          {
            model: this.model,
            max_tokens: this.maxOutputTokens,
            temperature: this.temperature,
            messages: [
              {
                role: "user",
                content: SUMMARIZE_PROMPT.replace("{conversation}", () => conversation),
              },
            ],
          },
          { signal },
        ),
      { label: "summarize", signal },
    );

    const summary = response.choices[0]?.message.content?.trim() ?? "";
    if (!summary) return null;

    this.log.info({ preview: summary.slice(0, 50) }, "📝 Generated conversation summary");
    return summary;
  }

  shouldSummarize(transcript: Transcript, threshold = 100): boolean {
    return transcript.length >= threshold;
  }

  /**
   * Replace everything but the last `keepRecent` messages with one summary
   * entry. Returns the input unchanged when no summary comes back.
   */
  async compressHistory(
    transcript: Transcript,
    keepRecent = 20,
    signal?: AbortSignal,
  ): Promise<Message[]> {
    if (transcript.length <= keepRecent + 10) return [...transcript];

    const splitAt = transcript.length - keepRecent;
    const summary = await this.summarize(transcript.slice(0, splitAt), 50, signal);
    if (!summary) return [...transcript];

    const compressed: Message[] = [
      { role: "user", parts: [`[บทสรุปการสนทนาก่อนหน้า]\n${summary}`] },
      ...transcript.slice(splitAt),
    ];

    this.log.info(
      { from: transcript.length, to: compressed.length },
      "📦 Compressed history",
    );
    return compressed;
  }
}
