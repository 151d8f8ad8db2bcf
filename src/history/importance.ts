import { charLength, getMessageContent } from "./content.js";
import type { ImportanceScore, Message } from "./types.js";

// ── Importance Rules ─────────────────────────────────────
// Thai and English markers. Matched anywhere in the text: Thai has no
// word boundaries, so no \b anchors.

export interface ImportanceRule {
  name: string;
  pattern: RegExp;
  weight: number;
}

export const IMPORTANCE_RULES: readonly ImportanceRule[] = [
  // User facts and preferences
  {
    name: "user_name",
    pattern: /(?:ชื่อ|name)\s*(?:ของ)?(?:ฉัน|ผม|ของฉัน|my|i'm|im)\s*(?:คือ|is|เป็น)?/iu,
    weight: 2.0,
  },
  {
    name: "preference",
    pattern: /(?:ฉัน|ผม|i)\s*(?:ชอบ|รัก|เกลียด|ไม่ชอบ|like|love|hate|dislike)/iu,
    weight: 1.5,
  },
  {
    name: "personal_info",
    pattern: /(?:วันเกิด|birthday|อายุ|age|ที่อยู่|address)/iu,
    weight: 1.8,
  },
  // Emotional significance
  { name: "gratitude", pattern: /(?:ขอบคุณ|thank|รัก|love|❤️|🙏)/iu, weight: 1.3 },
  {
    name: "explicit_important",
    pattern: /(?:สำคัญ|important|จำ(?:ไว้)?|remember|อย่าลืม)/iu,
    weight: 2.0,
  },
  // Instructions and boundaries
  {
    name: "rule",
    pattern: /(?:กฎ|rule|ต้อง|must|ห้าม|don't|never|always|เสมอ)/iu,
    weight: 1.5,
  },
  // Context setters
  { name: "context", pattern: /(?:ตั้งแต่|since|เพราะ|because|เนื่องจาก)/iu, weight: 1.2 },
  // Roleplay character tags, e.g. {{char}}
  { name: "character", pattern: /\{\{[^}]+\}\}/u, weight: 1.4 },
];

/** Score at or above which a message counts as important in stats. */
export const IMPORTANT_SCORE = 1.3;

const LONG_MESSAGE_CHARS = 200;
const LONG_MESSAGE_BOOST = 1.1;
const USER_ROLE_BOOST = 1.1;

/**
 * Heuristic retention weight, always >= 1.0.
 * Highest matching rule weight wins, then length and role boosts multiply.
 */
export function scoreMessage(
  message: Message,
  rules: readonly ImportanceRule[] = IMPORTANCE_RULES,
): ImportanceScore {
  const content = getMessageContent(message);
  if (!content) return { score: 1.0, matched: [] };

  let score = 1.0;
  const matched: string[] = [];

  for (const rule of rules) {
    if (rule.pattern.test(content)) {
      score = Math.max(score, rule.weight);
      matched.push(rule.name);
    }
  }

  if (charLength(content) > LONG_MESSAGE_CHARS) score *= LONG_MESSAGE_BOOST;
  if (message.role === "user") score *= USER_ROLE_BOOST;

  return { score, matched };
}
