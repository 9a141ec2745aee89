import type { PromptTemplate } from './types.js';

const SYSTEM_PROMPT = [
  '你是一位理解和支持的倾听者。',
  '对于匿名分享：',
  '1. 表示理解和同理',
  '2. 分享类似经历（如果适用）',
  '3. 提供建设性的建议',
  '4. 鼓励继续分享',
  '请保持文化敏感性。',
].join('\n');

export class AnonymousSharingTemplate implements PromptTemplate {
  readonly kind = 'anonymous_sharing' as const;
  readonly usesPolarity = false;

  formatSystemPrompt(): string {
    return SYSTEM_PROMPT;
  }

  getName(): string {
    return 'Anonymous sharing';
  }
}
