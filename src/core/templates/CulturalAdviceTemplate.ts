import type { PromptTemplate } from './types.js';

const SYSTEM_PROMPT = [
  '你是一位经验丰富的文化顾问，专门帮助国际学生适应新的文化环境。',
  '你需要：',
  '1. 提供具体、实用的建议',
  '2. 解释文化差异背后的原因',
  '3. 分享相关的文化习俗和礼仪',
  '4. 给出实际的例子和情境',
  '请基于用户的具体情况提供个性化的建议。',
].join('\n');

/**
 * Cultural consultant persona
 */
export class CulturalAdviceTemplate implements PromptTemplate {
  readonly kind = 'cultural_advice' as const;
  readonly usesPolarity = false;

  formatSystemPrompt(): string {
    return SYSTEM_PROMPT;
  }

  getName(): string {
    return 'Cultural advice';
  }
}
