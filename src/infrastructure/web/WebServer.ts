import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import { z } from 'zod';
import type { AppServices } from '../../application/AppServices.js';
import type { SessionContext } from '../../application/session/SessionContext.js';
import type { AdvisorResult, ChatKind } from '../../application/services/AdvisorService.js';
import { isTopic } from '../../core/entities/Conversation.js';
import type { Topic } from '../../core/entities/Conversation.js';
import { MOOD_VOCABULARY } from '../../core/entities/Mood.js';
import { POST_CATEGORIES } from '../../core/entities/Post.js';
import { EMOTIONAL_STATES, SITUATION_TYPES } from '../../core/entities/Profile.js';
import { ValidationError } from '../../core/errors.js';
import { formatBoundaryFailure } from '../../presentation/formatters.js';
import { toHttpError } from '../../presentation/httpErrors.js';
import type { Logger } from '../../utils/logger.js';

const KIND_BY_TOPIC: Record<Topic, ChatKind> = {
  cultural: 'cultural_advice',
  emotional: 'emotion_support',
};

const AskSchema = z.object({
  text: z.string().min(1, 'text must not be empty'),
});

const ProfileSchema = z.object({
  situationType: z.string(),
  otherSituation: z.string().optional(),
  currentStatus: z.string().optional(),
  emotionalState: z.string().optional(),
});

const PublishPostSchema = z.object({
  content: z.string(),
  category: z.string(),
  mood: z.string().optional(),
  postDate: z.string().optional(),
});

const TrendQuerySchema = z.object({
  metric: z.enum(['moodScore', 'textPolarity']).optional(),
  month: z.string().optional(),
});

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new ValidationError(`${issue.path.join('.') || 'body'}: ${issue.message}`, issue.path.join('.'));
  }
  return parsed.data;
}

function requireTopic(value: string): Topic {
  if (!isTopic(value)) {
    throw new ValidationError(`Unknown topic: ${value}`, 'topic');
  }
  return value;
}

function requireInteger(value: string, field: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new ValidationError(`${field} must be an integer`, field);
  }
  return Number(value);
}

type Handler = (req: Request, res: Response) => unknown;

/**
 * JSON API over the application services
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private services: AppServices,
    private port: number = 3001,
    private logger?: Logger
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  /**
   * Wrap a handler so thrown and rejected errors become JSON responses
   */
  private route(handler: Handler) {
    return (req: Request, res: Response) => {
      Promise.resolve()
        .then(() => handler(req, res))
        .catch((error: unknown) => {
          const { status, body } = toHttpError(error);
          if (status >= 500) {
            this.logger?.error(`${req.method} ${req.path} failed`, error);
          }
          res.status(status).json(body);
        });
    };
  }

  private sendAdvisorResult(res: Response, result: AdvisorResult, session: SessionContext, topic: Topic) {
    const history = session.history(topic).messages();
    if (result.ok) {
      res.json({ success: true, data: { reply: result.reply, history } });
      return;
    }
    res.status(502).json({
      success: false,
      code: result.error.code,
      error: result.error.message,
      data: { displayText: formatBoundaryFailure(result.error), history },
    });
  }

  private setupRoutes(): void {
    const { sessions, advisor, posts, profiles, analytics, health } = this.services;

    // Sessions
    this.app.post(
      '/api/sessions',
      this.route((req, res) => {
        const session = sessions.create();
        res.status(201).json({ success: true, data: { sessionId: session.id } });
      })
    );

    this.app.delete(
      '/api/sessions/:sessionId',
      this.route((req, res) => {
        sessions.get(req.params.sessionId);
        sessions.remove(req.params.sessionId);
        res.json({ success: true, message: 'Session ended' });
      })
    );

    this.app.put(
      '/api/sessions/:sessionId/profile',
      this.route(async (req, res) => {
        const input = parseBody(ProfileSchema, req.body);
        const profile = await sessions.withSession(req.params.sessionId, (session) =>
          profiles.save(session, input)
        );
        res.json({ success: true, data: profile });
      })
    );

    // Conversations
    this.app.get(
      '/api/sessions/:sessionId/conversations/:topic',
      this.route(async (req, res) => {
        const topic = requireTopic(req.params.topic);
        const messages = await sessions.withSession(req.params.sessionId, (session) =>
          session.history(topic).messages()
        );
        res.json({ success: true, data: messages });
      })
    );

    this.app.post(
      '/api/sessions/:sessionId/conversations/:topic/messages',
      this.route(async (req, res) => {
        const topic = requireTopic(req.params.topic);
        const { text } = parseBody(AskSchema, req.body);
        await sessions.withSession(req.params.sessionId, async (session) => {
          const result = await advisor.ask(session, KIND_BY_TOPIC[topic], text);
          this.sendAdvisorResult(res, result, session, topic);
        });
      })
    );

    this.app.delete(
      '/api/sessions/:sessionId/conversations/:topic/messages/:index',
      this.route(async (req, res) => {
        const topic = requireTopic(req.params.topic);
        const index = requireInteger(req.params.index, 'index');
        // Delete and re-read as one step so positions cannot drift in between
        const remaining = await sessions.withSession(req.params.sessionId, (session) => {
          const history = session.history(topic);
          history.deleteAt(index);
          return history.messages();
        });
        res.json({ success: true, data: remaining });
      })
    );

    this.app.delete(
      '/api/sessions/:sessionId/conversations/:topic',
      this.route(async (req, res) => {
        const topic = requireTopic(req.params.topic);
        await sessions.withSession(req.params.sessionId, (session) => session.clearHistory(topic));
        res.json({ success: true, message: 'Conversation cleared' });
      })
    );

    // Posts
    this.app.get(
      '/api/posts',
      this.route((req, res) => {
        res.json({ success: true, data: posts.listAll() });
      })
    );

    this.app.post(
      '/api/posts',
      this.route((req, res) => {
        const post = posts.save(parseBody(PublishPostSchema, req.body));
        res.status(201).json({ success: true, data: post });
      })
    );

    this.app.post(
      '/api/posts/:id/support',
      this.route(async (req, res) => {
        const id = requireInteger(req.params.id, 'id');
        const post = posts.get(id);
        if (!post) {
          res.status(404).json({ success: false, error: `Post not found: ${id}` });
          return;
        }
        const result = await advisor.supportPost(post);
        if (result.ok) {
          res.json({ success: true, data: { reply: result.reply } });
        } else {
          res.status(502).json({
            success: false,
            code: result.error.code,
            error: result.error.message,
            data: { displayText: formatBoundaryFailure(result.error) },
          });
        }
      })
    );

    // Analytics
    this.app.get(
      '/api/analytics/calendar',
      this.route((req, res) => {
        const month = typeof req.query.month === 'string' ? req.query.month : undefined;
        res.json({ success: true, data: analytics.calendar(month) });
      })
    );

    this.app.get(
      '/api/analytics/trend',
      this.route((req, res) => {
        const query = parseBody(TrendQuerySchema, req.query);
        res.json({ success: true, data: analytics.trend(query) });
      })
    );

    this.app.get(
      '/api/analytics/summary',
      this.route((req, res) => {
        res.json({ success: true, data: analytics.summary() });
      })
    );

    // Vocabularies
    this.app.get('/api/moods', (req: Request, res: Response) => {
      res.json({ success: true, data: MOOD_VOCABULARY });
    });

    this.app.get('/api/categories', (req: Request, res: Response) => {
      res.json({ success: true, data: POST_CATEGORIES });
    });

    this.app.get('/api/situations', (req: Request, res: Response) => {
      res.json({ success: true, data: { situationTypes: SITUATION_TYPES, emotionalStates: EMOTIONAL_STATES } });
    });

    this.app.get(
      '/api/health',
      this.route(async (req, res) => {
        res.json({ success: true, data: await health.check() });
      })
    );

    // Malformed JSON bodies
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      res.status(400).json({ success: false, code: 'VALIDATION_ERROR', error: 'Malformed JSON body' });
    });
  }

  /**
   * Start listening; port 0 picks a free port
   */
  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger?.info(`HTTP API available at http://localhost:${port}/api`);
        resolve(port);
      });

      server.on('error', (error) => {
        this.logger?.error('Server error', error);
        reject(error);
      });

      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }
      this.httpServer.close((error) => {
        this.httpServer = null;
        if (error) {
          reject(error);
          return;
        }
        this.logger?.info('HTTP server closed');
        resolve();
      });
    });
  }
}
