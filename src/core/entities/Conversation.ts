/**
 * Conversation domain entities
 */
export type MessageRole = 'user' | 'assistant' | 'system';

export const MESSAGE_ROLES: readonly MessageRole[] = ['user', 'assistant', 'system'];

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
}

/**
 * Conversation domains, each with its own isolated history
 */
export type Topic = 'cultural' | 'emotional';

export const TOPICS: readonly Topic[] = ['cultural', 'emotional'];

/**
 * Prompt personas. Anonymous sharing replies to a single post and keeps no history.
 */
export type PromptKind = 'cultural_advice' | 'emotion_support' | 'anonymous_sharing';

export const PROMPT_KINDS: readonly PromptKind[] = [
  'cultural_advice',
  'emotion_support',
  'anonymous_sharing',
];

const TOPIC_BY_KIND: Record<PromptKind, Topic | null> = {
  cultural_advice: 'cultural',
  emotion_support: 'emotional',
  anonymous_sharing: null,
};

export function topicForKind(kind: PromptKind): Topic | null {
  return TOPIC_BY_KIND[kind];
}

export function isTopic(value: string): value is Topic {
  return (TOPICS as readonly string[]).includes(value);
}

export function isMessageRole(value: unknown): value is MessageRole {
  return typeof value === 'string' && (MESSAGE_ROLES as readonly string[]).includes(value);
}
