// ──────────────────────────────────────────────
// Switchboard - Environment Configuration Helper
// ──────────────────────────────────────────────

export function getEnvOrThrow(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

export function getEnvAsBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new Error(`Environment variable ${key} must be a boolean, got: ${value}`);
  }
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;

  database: {
    url: string;
    poolMax: number;
  };

  backend: {
    port: number;
    host: string;
    corsOrigin: string;
  };

  http: {
    userAgent: string;
    throwOnErrorStatus: boolean;
  };

  executions: {
    recentLimit: number;
  };

  seedSampleData: boolean;
}

export function loadConfig(): AppConfig {
  return {
    nodeEnv: getEnvOrDefault("NODE_ENV", "development"),
    logLevel: getEnvOrDefault("LOG_LEVEL", "info"),

    database: {
      url: getEnvOrThrow("DATABASE_URL"),
      poolMax: getEnvAsNumber("DATABASE_POOL_MAX", 10),
    },

    backend: {
      port: getEnvAsNumber("BACKEND_PORT", 4000),
      host: getEnvOrDefault("BACKEND_HOST", "0.0.0.0"),
      corsOrigin: getEnvOrDefault("CORS_ORIGIN", "*"),
    },

    http: {
      userAgent: getEnvOrDefault("HTTP_USER_AGENT", "switchboard/1.0"),
      throwOnErrorStatus: getEnvAsBoolean("HTTP_THROW_ON_ERROR_STATUS", false),
    },

    executions: {
      recentLimit: getEnvAsNumber("RECENT_EXECUTIONS_LIMIT", 20),
    },

    seedSampleData: getEnvAsBoolean("SEED_SAMPLE_DATA", false),
  };
}
