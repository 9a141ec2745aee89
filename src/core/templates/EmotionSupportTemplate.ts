import type { PromptTemplate, TemplateInput } from './types.js';

/**
 * Empathetic support persona, told the live polarity of the user's message
 */
export class EmotionSupportTemplate implements PromptTemplate {
  readonly kind = 'emotion_support' as const;
  readonly usesPolarity = true;

  formatSystemPrompt({ polarity = 0 }: TemplateInput): string {
    return [
      '你是一位富有同理心的心理支持顾问。',
      `用户当前的情感状态显示情感极性为${polarity}。`,
      '请：',
      '1. 表达理解和认同',
      '2. 提供情感支持',
      '3. 给出实用的建议',
      '4. 鼓励积极的态度',
      '注意使用温和、支持性的语言。',
    ].join('\n');
  }

  getName(): string {
    return 'Emotion support';
  }
}
