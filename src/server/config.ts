// ============================================================================
// BACKEND CONFIGURATION
// Server-side configuration with environment variable overrides
// Note: the card store never reads this file; the server passes values in
// ============================================================================

type Env = Record<string, string | undefined>;

export function readConfig(env: Env = process.env) {
  // ==========================================================================
  // ACTIVATION API CONFIGURATION
  // ==========================================================================

  const activation = {
    baseUrl: env.ACTIVATION_BASE_URL || 'https://api.o2.sk/',
    path: env.ACTIVATION_PATH || 'version',
    queryParam: env.ACTIVATION_QUERY_PARAM || 'code',
    // Response field compared against the activation threshold
    responseField: env.ACTIVATION_RESPONSE_FIELD || 'android',
    timeoutMs: parseInt(env.ACTIVATION_TIMEOUT_MS || '10000', 10),
  } as const;

  // ==========================================================================
  // SCRATCH CONFIGURATION
  // ==========================================================================

  const scratch = {
    delayMs: parseInt(env.SCRATCH_DELAY_MS || '2000', 10),
  } as const;

  // ==========================================================================
  // SERVER CONFIGURATION
  // ==========================================================================

  const server = {
    port: parseInt(env.PORT || '3001', 10),
    host: env.HOST || 'localhost',
  } as const;

  return { activation, scratch, server };
}

export type AppConfig = ReturnType<typeof readConfig>;

// ============================================================================
// VALIDATION
// ============================================================================

export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  try {
    new URL(config.activation.baseUrl);
  } catch {
    errors.push('ACTIVATION_BASE_URL must be an absolute URL');
  }

  if (!config.activation.queryParam) {
    errors.push('ACTIVATION_QUERY_PARAM cannot be empty');
  }

  if (isNaN(config.activation.timeoutMs) || config.activation.timeoutMs < 100 || config.activation.timeoutMs > 120000) {
    errors.push('ACTIVATION_TIMEOUT_MS must be between 100 and 120000');
  }

  if (isNaN(config.scratch.delayMs) || config.scratch.delayMs < 0 || config.scratch.delayMs > 60000) {
    errors.push('SCRATCH_DELAY_MS must be between 0 and 60000');
  }

  if (isNaN(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  return errors;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const config = readConfig(env);
  const errors = validateConfig(config);

  if (errors.length > 0) {
    console.error('[Config] Validation errors:');
    errors.forEach(err => console.error(`  - ${err}`));
    throw new Error('Configuration validation failed');
  }

  return config;
}
