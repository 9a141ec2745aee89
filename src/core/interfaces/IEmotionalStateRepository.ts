import type { EmotionalStateRecord } from '../entities/Profile.js';

/**
 * Interface for the emotional_states log
 */
export interface IEmotionalStateRepository {
  record(sessionId: string, emotion: string, recordedAt: Date): EmotionalStateRecord;

  listForSession(sessionId: string): EmotionalStateRecord[];
}
