/**
 * Field names that carry provider credentials or auth headers.
 */
export const SENSITIVE_KEYS: readonly string[] = [
  "apiKey",
  "api_key",
  "cohereApiKey",
  "OPENROUTER_API_KEY",
  "COHERE_API_KEY",
  "authorization",
  "Authorization",
  "token",
  "secret",
];

/**
 * Pino `redact` paths: every sensitive key at the top level and one level down
 * (e.g. `config.apiKey`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];
