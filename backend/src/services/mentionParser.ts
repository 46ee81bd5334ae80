import { v4 as uuidv4 } from "uuid";
import { MENTION_TYPES, Mention, MentionType } from "../types.js";

const TYPE_ALTERNATION = MENTION_TYPES.join("|");
const MENTION_PATTERN = new RegExp(`@(${TYPE_ALTERNATION})\\b(?::(\\S+))?`, "g");
const MENTION_WITH_TRAILING_SPACE = new RegExp(`@(?:${TYPE_ALTERNATION})\\b(?::\\S+)?\\s*`, "g");

export function isMentionType(value: string): value is MentionType {
  return MENTION_TYPES.some((type) => type === value);
}

export function createMention(type: MentionType, value = ""): Mention {
  return {
    id: uuidv4(),
    type,
    value,
    displayName: value ? `@${type}:${value}` : `@${type}`
  };
}

export function parseMentions(text: string): Mention[] {
  const mentions: Mention[] = [];
  for (const match of text.matchAll(MENTION_PATTERN)) {
    const type = match[1];
    if (isMentionType(type)) {
      mentions.push(createMention(type, match[2] || ""));
    }
  }
  return mentions;
}

export function removeMentions(text: string): string {
  return text.replace(MENTION_WITH_TRAILING_SPACE, "");
}

/**
 * Mentions attached to the message being composed. A `(type, value)` pair is
 * held at most once; the set is cleared when the message is sent.
 */
export class MentionSet {
  private items: Mention[] = [];

  list(): Mention[] {
    return this.items.map((mention) => ({ ...mention }));
  }

  get size(): number {
    return this.items.length;
  }

  has(type: MentionType, value: string): boolean {
    return this.items.some((mention) => mention.type === type && mention.value === value);
  }

  add(mention: Mention): boolean {
    if (this.has(mention.type, mention.value)) {
      return false;
    }
    this.items.push({ ...mention });
    return true;
  }

  addFromText(text: string): Mention[] {
    return parseMentions(text).filter((mention) => this.add(mention));
  }

  remove(id: string): boolean {
    const index = this.items.findIndex((mention) => mention.id === id);
    if (index < 0) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  clear(): Mention[] {
    const cleared = this.items;
    this.items = [];
    return cleared;
  }
}
