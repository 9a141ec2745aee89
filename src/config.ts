import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';

export type McpTransport = 'stdio' | 'none';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  llm: {
    apiUrl: string;
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    retry: {
      maxAttempts: number;
      initialDelayMs: number;
      maxDelayMs: number;
    };
  };
  conversation: {
    /** Messages of history sent with each prompt (10 = five exchanges) */
    contextWindow: number;
    sessionTimeoutMinutes: number;
  };
  database: {
    path: string;
  };
  webApi: {
    enabled: boolean;
    port: number;
  };
  mcp: {
    transport: McpTransport;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  llm: z.object({
    apiUrl: z.string().url('Invalid LLM API URL format'),
    apiKey: z.string(),
    model: z.string().min(1, 'Model must not be empty'),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().min(1).max(32000),
    timeoutMs: z.number().int().min(1000).max(600000),
    retry: z.object({
      maxAttempts: z.number().int().min(1).max(10),
      initialDelayMs: z.number().int().min(100).max(10000),
      maxDelayMs: z.number().int().min(1000).max(60000),
    }),
  }),
  conversation: z.object({
    contextWindow: z.number().int().min(0).max(200),
    sessionTimeoutMinutes: z.number().int().min(5).max(1440),
  }),
  database: z.object({
    path: z.string().min(1, 'Database path must not be empty'),
  }),
  webApi: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1024).max(65535),
  }),
  mcp: z.object({
    transport: z.enum(['stdio', 'none']),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --model gpt-4o-mini --context-window 6 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build and validate configuration from CLI arguments and environment.
 * Throws ConfigurationError listing every invalid setting.
 */
export function loadConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  // NaN survives to the schema and is reported there
  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const raw = cliArgs[cliKey] ?? env[envKey];
    if (raw === undefined || raw === '' || raw === true) return defaultValue;
    return Number(raw);
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'cultural-navigator'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    llm: {
      apiUrl: getString('llm-url', 'OPENAI_API_URL', 'https://api.openai.com/v1').replace(/\/+$/, ''),
      apiKey: getString('api-key', 'OPENAI_API_KEY', ''),
      model: getString('model', 'OPENAI_MODEL', 'gpt-4'),
      temperature: getNumber('temperature', 'LLM_TEMPERATURE', 0.7),
      maxTokens: getNumber('max-tokens', 'LLM_MAX_TOKENS', 1000),
      timeoutMs: getNumber('llm-timeout', 'LLM_TIMEOUT_MS', 60000),
      retry: {
        maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 2),
        initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 1000),
        maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 8000),
      },
    },
    conversation: {
      contextWindow: getNumber('context-window', 'CONTEXT_WINDOW_MESSAGES', 10),
      sessionTimeoutMinutes: getNumber('session-timeout', 'SESSION_TIMEOUT_MINUTES', 60),
    },
    database: {
      path: getString('database', 'DATABASE_PATH', 'data/cultural_navigator.db'),
    },
    webApi: {
      enabled: getBoolean('web-api', 'WEB_API_ENABLED', true),
      port: getNumber('port', 'PORT', 3001),
    },
    mcp: {
      transport: getString('mcp-transport', 'MCP_TRANSPORT', 'stdio'),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
    throw new ConfigurationError('Configuration validation failed', issues);
  }
  return parsed.data;
}

/**
 * Load .env, then the validated configuration. Exits the process on invalid settings.
 */
export function getConfig(): Config {
  dotenv.config();

  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => console.error(`  • ${issue}`));
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - OPENAI_API_URL must be a valid URL (e.g., https://api.openai.com/v1)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║             Cultural Navigator - Configuration                   ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 LLM: ${config.llm.apiUrl} | model ${config.llm.model} | key ${config.llm.apiKey ? 'set' : 'NOT SET'}`);
  console.error(`   temperature ${config.llm.temperature}, max tokens ${config.llm.maxTokens}, retry ${config.llm.retry.maxAttempts}x (${config.llm.retry.initialDelayMs}-${config.llm.retry.maxDelayMs}ms)`);
  console.error(`💬 Context window: ${config.conversation.contextWindow} messages | session timeout ${config.conversation.sessionTimeoutMinutes}m`);
  console.error(`🗄️  Database: ${config.database.path}`);

  if (config.webApi.enabled) {
    console.error(`🌐 HTTP API: http://localhost:${config.webApi.port}/api`);
  }

  console.error(`📡 MCP: ${config.mcp.transport === 'stdio' ? 'STDIO' : 'disabled'}`);
  console.error('\n' + '─'.repeat(68));
}
