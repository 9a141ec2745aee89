import type { PromptKind } from '../entities/Conversation.js';
import type { PromptTemplate } from './types.js';
import { CulturalAdviceTemplate } from './CulturalAdviceTemplate.js';
import { EmotionSupportTemplate } from './EmotionSupportTemplate.js';
import { AnonymousSharingTemplate } from './AnonymousSharingTemplate.js';

/**
 * Factory for persona templates
 */
export class TemplateFactory {
  private static templates: Map<PromptKind, PromptTemplate> = new Map<PromptKind, PromptTemplate>([
    ['cultural_advice', new CulturalAdviceTemplate()],
    ['emotion_support', new EmotionSupportTemplate()],
    ['anonymous_sharing', new AnonymousSharingTemplate()],
  ]);

  /**
   * Get a template instance by prompt kind
   */
  static getTemplate(kind: PromptKind): PromptTemplate {
    const template = this.templates.get(kind);
    if (!template) {
      throw new Error(`Unknown prompt kind: ${kind}`);
    }
    return template;
  }
}
