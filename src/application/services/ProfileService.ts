import {
  EMOTIONAL_STATES,
  OTHER_SITUATION,
  isEmotionalState,
  isSituationType,
} from '../../core/entities/Profile.js';
import type { EmotionalStateRecord, ProfileInput, UserProfile } from '../../core/entities/Profile.js';
import type { IEmotionalStateRepository } from '../../core/interfaces/IEmotionalStateRepository.js';
import { ValidationError } from '../../core/errors.js';
import { systemClock } from '../../utils/dates.js';
import type { Clock } from '../../utils/dates.js';
import type { SessionContext } from '../session/SessionContext.js';

/**
 * Render the profile as the background message for cultural advice
 */
export function buildCulturalContext(profile: UserProfile): string {
  return [
    '用户背景信息：',
    `情景类型：${profile.situation}`,
    `当前状态：${profile.currentStatus}`,
    `情绪状态：${profile.emotionalState}`,
  ].join('\n');
}

/**
 * Validates and stores the cultural-advice background of a session
 */
export class ProfileService {
  constructor(
    private emotionalStates: IEmotionalStateRepository,
    private clock: Clock = systemClock
  ) {}

  /**
   * Validate input into a profile without touching any session
   */
  parse(input: ProfileInput): UserProfile {
    if (!isSituationType(input.situationType)) {
      throw new ValidationError(`Unknown situation type: ${String(input.situationType)}`, 'situationType');
    }

    let situation: string = input.situationType;
    if (input.situationType === OTHER_SITUATION) {
      const elaboration = input.otherSituation?.trim() ?? '';
      if (!elaboration) {
        throw new ValidationError('Please describe the situation when choosing 其他', 'otherSituation');
      }
      situation = `${OTHER_SITUATION}：${elaboration}`;
    }

    const emotionalState = input.emotionalState ?? '一般';
    if (!isEmotionalState(emotionalState)) {
      throw new ValidationError(
        `Emotional state must be one of ${EMOTIONAL_STATES.join(', ')}`,
        'emotionalState'
      );
    }

    return {
      situation,
      currentStatus: input.currentStatus?.trim() ?? '',
      emotionalState,
    };
  }

  /**
   * Store the profile on the session and log the emotional state
   */
  save(session: SessionContext, input: ProfileInput): UserProfile {
    const profile = this.parse(input);
    this.emotionalStates.record(session.id, profile.emotionalState, this.clock());
    session.profile = profile;
    return profile;
  }

  listEmotionalStates(sessionId: string): EmotionalStateRecord[] {
    return this.emotionalStates.listForSession(sessionId);
  }
}
