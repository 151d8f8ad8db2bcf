import { getMessageContent, sliceChars } from "./content.js";
import type { Transcript, UserFacts } from "./types.js";

const NAME_PATTERN =
  /(?:ชื่อ|name)\s*(?:ของ)?(?:ฉัน|ผม|my)?\s*(?:คือ|is|เป็น)?\s*[:\s]*([^\s,.]+)/iu;

const PREFERENCE_PATTERN = /(?:ฉัน|ผม|i)\s*(?:ชอบ|รัก|like|love)\s+(.+?)(?:[,.]|\n?$)/giu;

const MAX_PREFERENCE_CHARS = 50;

function pushUnique(list: string[], value: string): void {
  if (value && !list.includes(value)) list.push(value);
}

/**
 * Pull stated names and preferences out of the user's own messages.
 * Each category is de-duplicated by exact match, first-seen order.
 */
export function extractUserFacts(transcript: Transcript): UserFacts {
  const facts: UserFacts = {
    names: [],
    preferences: [],
    personal_info: [],
    rules: [],
  };

  for (const message of transcript) {
    if (message.role !== "user") continue;
    const content = getMessageContent(message);

    const nameMatch = NAME_PATTERN.exec(content);
    if (nameMatch?.[1]) pushUnique(facts.names, nameMatch[1].trim());

    for (const match of content.matchAll(PREFERENCE_PATTERN)) {
      const preference = sliceChars((match[1] ?? "").trim(), MAX_PREFERENCE_CHARS);
      pushUnique(facts.preferences, preference);
    }
  }

  return facts;
}
