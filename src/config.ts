import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './core/errors.js';

// Load environment variables from .env file
dotenv.config();

export const DEFAULT_PROMPTS_DIR = path.resolve(__dirname, '..', 'prompts');

export const APP_MODES = ['interactive', 'http', 'mcp'] as const;

export type AppMode = (typeof APP_MODES)[number];

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  gemini: z.object({
    apiKey: z.string().trim().min(1, 'GEMINI_API_KEY is required (set it in the environment or .env)'),
    apiUrl: z
      .string()
      .url('Invalid Gemini API URL format')
      .transform((url) => url.replace(/\/+$/, '')),
    model: z.string().min(1, 'Model name must not be empty'),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().min(1).max(8192),
    timeoutMs: z.number().int().min(1000).max(600000),
    retryAttempts: z.number().int().min(1).max(5),
  }),
  promptsDir: z.string().min(1),
  mode: z.enum(APP_MODES, {
    errorMap: () => ({ message: `Mode must be one of: ${APP_MODES.join(', ')}` }),
  }),
  http: z.object({
    port: z.number().int().min(0).max(65535),
  }),
  query: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

/**
 * Parse command line arguments
 * Usage: civic-advisor --mode http --port 8080 --debug
 *        civic-advisor --query "What is PM Awas Yojana?"
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq !== -1) {
        args[arg.slice(2, eq)] = arg.slice(eq + 1);
        continue;
      }

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
 * Get configuration from CLI arguments, then environment variables, then defaults.
 * Throws ConfigError listing every problem; nothing here touches the network.
 */
export function getConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    const value = typeof cliValue === 'string' ? cliValue : env[envKey];
    return value ? Number(value) : defaultValue;
  };

  const query = cliArgs['query'];

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'civic-advisor'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    gemini: {
      apiKey: getString('api-key', 'GEMINI_API_KEY', ''),
      apiUrl: getString('api-url', 'GEMINI_API_URL', 'https://generativelanguage.googleapis.com/v1beta'),
      model: getString('model', 'GEMINI_MODEL', 'gemini-1.5-flash'),
      temperature: getNumber('temperature', 'GEMINI_TEMPERATURE', 0.4),
      maxOutputTokens: getNumber('max-output-tokens', 'GEMINI_MAX_OUTPUT_TOKENS', 1024),
      timeoutMs: getNumber('timeout', 'GEMINI_TIMEOUT_MS', 30000),
      retryAttempts: getNumber('retry-attempts', 'GEMINI_RETRY_ATTEMPTS', 1),
    },
    promptsDir: getString('prompts-dir', 'PROMPTS_DIR', DEFAULT_PROMPTS_DIR),
    mode: getString('mode', 'APP_MODE', 'interactive'),
    http: {
      port: getNumber('port', 'PORT', 3001),
    },
    query: typeof query === 'string' ? query : undefined,
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError(
      'Configuration validation failed',
      parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return parsed.data;
}

/**
 * Print configuration summary to stderr. The API key is never printed.
 */
export function printConfigInfo(config: Config): void {
  console.error('─'.repeat(60));
  console.error(`📊 ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🤖 Model: ${config.gemini.model} (temperature ${config.gemini.temperature}, max ${config.gemini.maxOutputTokens} tokens)`);
  console.error(`⏱️  Timeout: ${config.gemini.timeoutMs}ms | Attempts: ${config.gemini.retryAttempts}`);
  console.error(`📝 Prompts: ${config.promptsDir}`);
  if (config.mode === 'http') {
    console.error(`🌐 HTTP API on port ${config.http.port}`);
  } else if (config.mode === 'mcp') {
    console.error('📡 MCP: STDIO mode');
  }
  console.error('─'.repeat(60));
}
