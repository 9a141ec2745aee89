import type { SessionRegistry } from './session/SessionRegistry.js';
import type { AdvisorService } from './services/AdvisorService.js';
import type { PostService } from './services/PostService.js';
import type { ProfileService } from './services/ProfileService.js';
import type { MoodAnalytics } from './services/MoodAnalytics.js';
import type { HealthService } from './services/HealthService.js';

/**
 * The services every surface (HTTP API, MCP tools) works against
 */
export interface AppServices {
  sessions: SessionRegistry;
  advisor: AdvisorService;
  posts: PostService;
  profiles: ProfileService;
  analytics: MoodAnalytics;
  health: HealthService;
}
