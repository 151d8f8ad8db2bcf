import { charLength, getMessageContent } from "./content.js";
import type { Message, Tokenizer, Transcript } from "./types.js";

/** Role and separator bookkeeping charged to every message. */
export const MESSAGE_OVERHEAD_TOKENS = 5;

/** Character heuristic used when no tokenizer is configured. */
const CHARS_PER_TOKEN = 4;

/**
 * Token counting with an optional precise tokenizer. Without one, falls
 * back to `floor(chars / 4)`; callers see the same units either way.
 */
export class TokenEstimator {
  constructor(private readonly tokenizer?: Tokenizer) {}

  get isPrecise(): boolean {
    return this.tokenizer !== undefined;
  }

  countText(text: string): number {
    if (!text) return 0;
    if (this.tokenizer) return this.tokenizer.encode(text).length;
    return Math.floor(charLength(text) / CHARS_PER_TOKEN);
  }

  estimateMessage(message: Message): number {
    return this.countText(getMessageContent(message)) + MESSAGE_OVERHEAD_TOKENS;
  }

  estimate(transcript: Transcript): number {
    let total = 0;
    for (const message of transcript) total += this.estimateMessage(message);
    return total;
  }
}
