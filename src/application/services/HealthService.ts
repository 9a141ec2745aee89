import type { CircuitState } from '../../utils/retry.js';
import { errorMessage } from '../../core/errors.js';
import type { SessionRegistry } from '../session/SessionRegistry.js';
import type { PostService } from './PostService.js';

export type ComponentStatus = 'healthy' | 'degraded' | 'error';

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    database: { status: ComponentStatus; message: string; postsByCategory?: Record<string, number> };
    llm: { status: ComponentStatus; message: string; circuitBreaker?: CircuitState };
    sessions: { active: number };
  };
}

export interface LlmHealthProbe {
  healthCheck(): Promise<boolean>;
  getCircuitBreakerState?(): CircuitState;
}

/**
 * Aggregated status of the store, the LLM endpoint and live sessions
 */
export class HealthService {
  constructor(
    private posts: PostService,
    private llm: LlmHealthProbe,
    private sessions: SessionRegistry
  ) {}

  async check(): Promise<HealthReport> {
    const report: HealthReport = {
      timestamp: new Date().toISOString(),
      status: 'healthy',
      components: {
        database: { status: 'healthy', message: '' },
        llm: { status: 'healthy', message: '', circuitBreaker: this.llm.getCircuitBreakerState?.() },
        sessions: { active: this.sessions.getActiveSessionCount() },
      },
    };

    try {
      const postsByCategory = this.posts.countByCategory();
      const total = Object.values(postsByCategory).reduce((sum, n) => sum + n, 0);
      report.components.database = {
        status: 'healthy',
        message: `Database connected - ${total} posts`,
        postsByCategory,
      };
    } catch (error) {
      report.components.database = { status: 'error', message: errorMessage(error) };
      report.status = 'degraded';
    }

    if (await this.llm.healthCheck()) {
      report.components.llm.message = 'LLM endpoint reachable';
    } else {
      report.components.llm.status = 'degraded';
      report.components.llm.message = 'LLM endpoint unreachable or API key missing';
      report.status = 'degraded';
    }

    return report;
  }
}
