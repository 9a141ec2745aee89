/**
 * Background the user fills in before asking for cultural advice
 */
export const SITUATION_TYPES = [
  { value: '学习相关', description: '学习相关（如图书馆使用、与教授沟通等）' },
  { value: '文化适应', description: '文化适应（如理解美国人的社交习惯）' },
  { value: '生活问题', description: '生活问题（如住宿、交通、饮食等）' },
  { value: '其他', description: '其他' },
] as const;

export type SituationType = (typeof SITUATION_TYPES)[number]['value'];

export const OTHER_SITUATION: SituationType = '其他';

export const EMOTIONAL_STATES = ['非常困扰', '有点焦虑', '一般', '还好', '很乐观'] as const;

export type EmotionalState = (typeof EMOTIONAL_STATES)[number];

export interface UserProfile {
  /** Situation type, or "其他：<elaboration>" */
  situation: string;
  currentStatus: string;
  emotionalState: EmotionalState;
}

export interface ProfileInput {
  situationType: string;
  otherSituation?: string;
  currentStatus?: string;
  emotionalState?: string;
}

export const DEFAULT_PROFILE: UserProfile = {
  situation: '学习相关',
  currentStatus: '',
  emotionalState: '一般',
};

export interface EmotionalStateRecord {
  id: number;
  sessionId: string;
  emotion: string;
  recordedAt: Date;
}

export function isSituationType(value: unknown): value is SituationType {
  return typeof value === 'string' && SITUATION_TYPES.some((s) => s.value === value);
}

export function isEmotionalState(value: unknown): value is EmotionalState {
  return typeof value === 'string' && (EMOTIONAL_STATES as readonly string[]).includes(value);
}
