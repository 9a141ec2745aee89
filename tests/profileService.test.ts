import { ProfileService, buildCulturalContext } from '../src/application/services/ProfileService.js';
import { SessionContext } from '../src/application/session/SessionContext.js';
import { DatabaseConnection, IN_MEMORY } from '../src/infrastructure/database/DatabaseConnection.js';
import { EmotionalStateRepository } from '../src/infrastructure/database/repositories/EmotionalStateRepository.js';
import { DEFAULT_PROFILE } from '../src/core/entities/Profile.js';
import { ValidationError } from '../src/core/errors.js';

describe('ProfileService', () => {
  let connection: DatabaseConnection;
  let profiles: ProfileService;
  let session: SessionContext;
  const now = new Date('2026-03-10T09:00:00.000Z');

  beforeEach(() => {
    connection = new DatabaseConnection(IN_MEMORY);
    profiles = new ProfileService(new EmotionalStateRepository(connection.getDatabase()), () => now);
    session = new SessionContext('s1');
  });

  afterEach(() => {
    connection.close();
  });

  it('starts sessions with the default profile', () => {
    expect(session.profile).toEqual(DEFAULT_PROFILE);
  });

  it('saves a profile onto the session', () => {
    const profile = profiles.save(session, {
      situationType: '文化适应',
      currentStatus: '  不太懂小费文化 ',
      emotionalState: '有点焦虑',
    });

    expect(profile).toEqual({ situation: '文化适应', currentStatus: '不太懂小费文化', emotionalState: '有点焦虑' });
    expect(session.profile).toEqual(profile);
  });

  it('combines 其他 with its description', () => {
    const profile = profiles.parse({ situationType: '其他', otherSituation: '打工签证' });
    expect(profile.situation).toBe('其他：打工签证');
    expect(profile.emotionalState).toBe('一般');
  });

  it('requires a description for 其他', () => {
    expect(() => profiles.parse({ situationType: '其他', otherSituation: '  ' })).toThrow(ValidationError);
  });

  it('rejects unknown situation types and emotional states', () => {
    expect(() => profiles.parse({ situationType: '旅游' })).toThrow('Unknown situation type: 旅游');
    expect(() => profiles.parse({ situationType: '学习相关', emotionalState: '超开心' })).toThrow(ValidationError);
  });

  it('leaves the session profile alone when validation fails', () => {
    expect(() => profiles.save(session, { situationType: '旅游' })).toThrow(ValidationError);
    expect(session.profile).toEqual(DEFAULT_PROFILE);
    expect(profiles.listEmotionalStates('s1')).toEqual([]);
  });

  it('logs the emotional state of each saved profile', () => {
    profiles.save(session, { situationType: '学习相关', emotionalState: '非常困扰' });
    profiles.save(session, { situationType: '学习相关', emotionalState: '还好' });

    const states = profiles.listEmotionalStates('s1');
    expect(states.map((s) => s.emotion)).toEqual(['非常困扰', '还好']);
    expect(states[0].recordedAt).toEqual(now);
    expect(profiles.listEmotionalStates('other')).toEqual([]);
  });

  it('renders the profile as background text', () => {
    expect(buildCulturalContext(DEFAULT_PROFILE)).toBe(
      '用户背景信息：\n情景类型：学习相关\n当前状态：\n情绪状态：一般'
    );
  });
});
