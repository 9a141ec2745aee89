/**
 * Persona templates for each prompt kind
 */
export type { PromptTemplate, TemplateInput, ChatMessage } from './types.js';
export { CulturalAdviceTemplate } from './CulturalAdviceTemplate.js';
export { EmotionSupportTemplate } from './EmotionSupportTemplate.js';
export { AnonymousSharingTemplate } from './AnonymousSharingTemplate.js';
export { TemplateFactory } from './TemplateFactory.js';
