import type { Message, MessagePart } from "./types.js";

function partText(part: MessagePart): string {
  return typeof part === "string" ? part : part.text;
}

/** Space-joined text of every part. Missing or empty parts give "". */
export function getMessageContent(message: Message): string {
  return (message.parts ?? []).map(partText).join(" ");
}

/** Text of each part on its own, for line-per-part rendering. */
export function getPartTexts(message: Message): string[] {
  return (message.parts ?? []).map(partText);
}

/** Length in code points, so an astral emoji counts once. */
export function charLength(text: string): number {
  return [...text].length;
}

/** First `max` code points of `text`; never splits a surrogate pair. */
export function sliceChars(text: string, max: number): string {
  if (text.length <= max) return text;
  return Array.from(text).slice(0, max).join("");
}
