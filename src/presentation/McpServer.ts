import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import type { IChatCompletionClient } from '../core/interfaces/IChatCompletionClient.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { PostRepository } from '../infrastructure/database/repositories/PostRepository.js';
import { EmotionalStateRepository } from '../infrastructure/database/repositories/EmotionalStateRepository.js';
import { OpenAiApiClient } from '../infrastructure/http/OpenAiApiClient.js';
import { LexiconSentimentScorer } from '../infrastructure/nlp/LexiconSentimentScorer.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import type { AppServices } from '../application/AppServices.js';
import { SessionRegistry } from '../application/session/SessionRegistry.js';
import { AdvisorService } from '../application/services/AdvisorService.js';
import { HealthService } from '../application/services/HealthService.js';
import type { LlmHealthProbe } from '../application/services/HealthService.js';
import { MoodAnalytics } from '../application/services/MoodAnalytics.js';
import { PostService } from '../application/services/PostService.js';
import { ProfileService } from '../application/services/ProfileService.js';
import { PromptComposer } from '../application/services/PromptComposer.js';
import { CircuitBreaker, DEFAULT_RETRY_CONFIG } from '../utils/retry.js';
import { createErrorLog, createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { registerChatTools } from './tools/ChatTools.js';
import { registerManageConversationTool } from './tools/ManageConversationTool.js';
import { registerProfileTool } from './tools/ProfileTool.js';
import { registerPostTools } from './tools/PostTools.js';
import { registerAnalyticsTools } from './tools/AnalyticsTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

export interface McpServerOverrides {
  /** Replaces the OpenAI client, e.g. with an in-process fake */
  llmClient?: IChatCompletionClient & LlmHealthProbe;
  logger?: Logger;
}

/**
 * Register every tool on a server instance
 */
export function registerTools(server: BaseMcpServer, services: AppServices) {
  const { sessions, advisor, posts, profiles, analytics, health } = services;

  registerChatTools(server, sessions, advisor);
  registerManageConversationTool(server, sessions);
  registerProfileTool(server, sessions, profiles);
  registerPostTools(server, posts, advisor);
  registerAnalyticsTools(server, analytics);
  registerHealthCheckTool(server, health);
}

/**
 * Main server class that wires storage, services and both surfaces
 */
export class McpServer {
  private server: BaseMcpServer | null = null;
  private webServer: WebServer | null = null;
  private dbConnection: DatabaseConnection;
  private services: AppServices;
  private logger: Logger;

  constructor(
    private config: Config,
    overrides: McpServerOverrides = {}
  ) {
    this.logger = overrides.logger ?? createLogger('navigator', config.server.debug);

    // Storage
    this.dbConnection = new DatabaseConnection(config.database.path);
    const db = this.dbConnection.getDatabase();
    const postRepo = new PostRepository(db);
    const emotionalStateRepo = new EmotionalStateRepository(db);

    // LLM boundary
    const llmLogger = createLogger('llm', config.server.debug);
    const llmClient =
      overrides.llmClient ??
      new OpenAiApiClient({
        apiUrl: config.llm.apiUrl,
        apiKey: config.llm.apiKey,
        circuitBreaker: new CircuitBreaker({
          onStateChange: (state, reason) => llmLogger.warn(`Circuit ${state}: ${reason}`),
        }),
        retryConfig: {
          ...DEFAULT_RETRY_CONFIG,
          ...config.llm.retry,
          timeoutMs: config.llm.timeoutMs,
        },
        onRetryLog: (log) => {
          if (!log.success) {
            llmLogger.debug(
              JSON.stringify(
                createErrorLog(log.timestamp, log.attempt, config.llm.model, log.error ?? '', log.nextRetryInMs)
              )
            );
          }
        },
      });

    // Services
    const scorer = new LexiconSentimentScorer();
    const sessions = new SessionRegistry({
      contextWindow: config.conversation.contextWindow,
      sessionTimeoutMinutes: config.conversation.sessionTimeoutMinutes,
      logger: this.logger,
    });
    const composer = new PromptComposer(scorer, config.conversation.contextWindow);
    const advisor = new AdvisorService(
      llmClient,
      composer,
      {
        model: config.llm.model,
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens,
      },
      llmLogger
    );
    const posts = new PostService(postRepo, scorer);

    this.services = {
      sessions,
      advisor,
      posts,
      profiles: new ProfileService(emotionalStateRepo),
      analytics: new MoodAnalytics(posts),
      health: new HealthService(posts, llmClient, sessions),
    };

    if (config.webApi.enabled) {
      this.webServer = new WebServer(this.services, config.webApi.port, createLogger('http', config.server.debug));
    }

    if (config.mcp.transport === 'stdio') {
      this.server = new BaseMcpServer({
        name: config.server.name,
        version: config.server.version,
      });
      registerTools(this.server, this.services);
    }
  }

  getServices(): AppServices {
    return this.services;
  }

  /**
   * Print database statistics
   */
  printStats() {
    const stats = this.dbConnection.getStatistics();
    this.logger.info(
      `📊 Database Statistics: ${stats.totalPosts} posts, ${stats.totalEmotionalStates} emotional states, ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
  }

  /**
   * Start the HTTP API and the stdio transport, as configured
   */
  async start() {
    this.logger.debug(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);

    if (this.webServer) {
      await this.webServer.start();
    }

    if (this.server) {
      const transport = new StdioServerTransport();

      // Keep a broken pipe from taking the process down
      process.stdin.on('error', (error) => {
        this.logger.warn(`stdin error (non-fatal): ${error.message}`);
      });
      process.stdout.on('error', (error) => {
        this.logger.warn(`stdout error (non-fatal): ${error.message}`);
      });
      process.stdin.on('end', () => {
        this.logger.warn('stdin ended - client may have disconnected');
      });

      await this.server.connect(transport);
      this.logger.info('✅ Cultural Navigator MCP server running on stdio');
    }
  }

  /**
   * Stop both surfaces, drop sessions and close the database
   */
  async shutdown() {
    this.logger.info('👋 Shutting down gracefully...');

    if (this.webServer) {
      await this.webServer.stop();
    }
    if (this.server) {
      await this.server.close();
    }

    this.services.sessions.closeAll();
    this.dbConnection.close();
  }
}
