import { loadConfig, parseArgs } from '../src/config.js';
import { ConfigurationError } from '../src/core/errors.js';

const ARGV = ['node', 'index.js'];

describe('parseArgs', () => {
  it('reads values and bare flags', () => {
    expect(parseArgs([...ARGV, '--model', 'gpt-4o-mini', '--debug', '--port', '4000'])).toEqual({
      model: 'gpt-4o-mini',
      debug: true,
      port: '4000',
    });
  });
});

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    const config = loadConfig(ARGV, {});

    expect(config.llm).toEqual({
      apiUrl: 'https://api.openai.com/v1',
      apiKey: '',
      model: 'gpt-4',
      temperature: 0.7,
      maxTokens: 1000,
      timeoutMs: 60000,
      retry: { maxAttempts: 2, initialDelayMs: 1000, maxDelayMs: 8000 },
    });
    expect(config.conversation).toEqual({ contextWindow: 10, sessionTimeoutMinutes: 60 });
    expect(config.database.path).toBe('data/cultural_navigator.db');
    expect(config.webApi).toEqual({ enabled: true, port: 3001 });
    expect(config.mcp.transport).toBe('stdio');
    expect(config.server.debug).toBe(false);
  });

  it('reads the environment', () => {
    const config = loadConfig(ARGV, {
      OPENAI_API_KEY: 'test-secret',
      OPENAI_API_URL: 'http://localhost:8080/v1/',
      OPENAI_MODEL: 'local-model',
      CONTEXT_WINDOW_MESSAGES: '6',
      WEB_API_ENABLED: 'false',
      MCP_TRANSPORT: 'none',
      DEBUG: 'true',
    });

    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.llm.apiUrl).toBe('http://localhost:8080/v1');
    expect(config.llm.model).toBe('local-model');
    expect(config.conversation.contextWindow).toBe(6);
    expect(config.webApi.enabled).toBe(false);
    expect(config.mcp.transport).toBe('none');
    expect(config.server.debug).toBe(true);
  });

  it('lets command line arguments win over the environment', () => {
    const config = loadConfig([...ARGV, '--model', 'from-cli', '--port', '4100', '--debug'], {
      OPENAI_MODEL: 'from-env',
      PORT: '4200',
      DEBUG: 'false',
    });

    expect(config.llm.model).toBe('from-cli');
    expect(config.webApi.port).toBe(4100);
    expect(config.server.debug).toBe(true);
  });

  it('reports every invalid setting', () => {
    try {
      loadConfig(ARGV, { OPENAI_API_URL: 'not a url', LLM_TEMPERATURE: 'hot', MCP_TRANSPORT: 'sse' });
      throw new Error('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(3);
        expect(error.issues[0]).toBe('llm.apiUrl: Invalid LLM API URL format');
        expect(error.issues.some((issue) => issue.startsWith('llm.temperature:'))).toBe(true);
        expect(error.issues.some((issue) => issue.startsWith('mcp.transport:'))).toBe(true);
      }
    }
  });

  it('rejects a port below 1024', () => {
    expect(() => loadConfig(ARGV, { PORT: '80' })).toThrow(ConfigurationError);
  });
});
