// ============================================================================
// APPLICATION CONFIG
// ============================================================================
// Built once at startup from the environment and handed to createApp.
// The locator engine itself takes no configuration.

export interface AiConfig {
  /** Empty disables AI suggestions */
  apiKey: string;
  model: string;
  requestsPerMinute: number;
  maxRetries: number;
  /** Characters of HTML sent to the model */
  htmlSnippetLimit: number;
}

export interface AppConfig {
  port: number;
  host: string;
  /** express.json body limit */
  bodyLimit: string;
  ai: AiConfig;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 3002,
  host: '0.0.0.0',
  bodyLimit: '2mb',
  ai: {
    apiKey: '',
    model: 'gemini-2.0-flash',
    requestsPerMinute: 20,
    maxRetries: 2,
    htmlSnippetLimit: 12000,
  },
};

function intFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < min) {
    console.warn(`[Config] Ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function stringFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: intFromEnv(env, 'PORT', DEFAULT_CONFIG.port),
    host: stringFromEnv(env, 'HOST', DEFAULT_CONFIG.host),
    bodyLimit: stringFromEnv(env, 'BODY_LIMIT', DEFAULT_CONFIG.bodyLimit),
    ai: {
      apiKey: env.GEMINI_API_KEY?.trim() ?? '',
      model: stringFromEnv(env, 'GEMINI_MODEL', DEFAULT_CONFIG.ai.model),
      requestsPerMinute: intFromEnv(env, 'AI_REQUESTS_PER_MINUTE', DEFAULT_CONFIG.ai.requestsPerMinute, 1),
      maxRetries: intFromEnv(env, 'AI_MAX_RETRIES', DEFAULT_CONFIG.ai.maxRetries),
      htmlSnippetLimit: intFromEnv(env, 'AI_HTML_SNIPPET_LIMIT', DEFAULT_CONFIG.ai.htmlSnippetLimit, 1),
    },
  };
}
