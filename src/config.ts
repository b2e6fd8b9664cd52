import path from 'path';

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  nodeEnv: string;
  corsOrigin: string[] | true;
  apiBaseUrl?: string;
  apiTitle: string;
  apiVersion: string;
  apiDescription: string;
  dataDir: string;
  oracle: {
    baseUrl?: string;
    timeoutMs: number;
    retryBackoffMs: number;
  };
  orderIntake: {
    baseUrl?: string;
    timeoutMs: number;
  };
  session: {
    continuationWindowMinutes: number;
    idleTtlMinutes: number;
  };
  resolver: {
    maxCandidates: number;
    batchItemTimeoutMs: number;
  };
  cart: {
    maxUnitsPerLine: number;
    maxKgPerLine: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInt(env.PORT || '3000', 10);
  const host = env.HOST || '0.0.0.0';

  return {
    port,
    host,
    logLevel: env.LOG_LEVEL || 'info',
    nodeEnv: env.NODE_ENV || 'development',
    corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : true,
    apiBaseUrl: env.API_BASE_URL || `http://${host}:${port}`,
    apiTitle: env.API_TITLE || 'Grocery Order Engine',
    apiVersion: env.API_VERSION || '1.0.0',
    apiDescription:
      env.API_DESCRIPTION ||
      'Decision engine behind a conversational grocery assistant: product resolution, live quotes, cart sessions and checkout',
    dataDir: path.resolve(env.DATA_DIR || path.join(process.cwd(), 'data')),
    oracle: {
      baseUrl: env.ORACLE_BASE_URL || undefined,
      timeoutMs: parseInt(env.ORACLE_TIMEOUT_MS || '2000', 10),
      retryBackoffMs: parseInt(env.ORACLE_RETRY_BACKOFF_MS || '250', 10),
    },
    orderIntake: {
      baseUrl: env.ORDER_INTAKE_BASE_URL || undefined,
      timeoutMs: parseInt(env.ORDER_INTAKE_TIMEOUT_MS || '5000', 10),
    },
    session: {
      continuationWindowMinutes: parseFloat(env.CONTINUATION_WINDOW_MINUTES || '15'),
      idleTtlMinutes: parseFloat(env.SESSION_IDLE_TTL_MINUTES || '0'),
    },
    resolver: {
      maxCandidates: parseInt(env.RESOLVER_MAX_CANDIDATES || '3', 10),
      batchItemTimeoutMs: parseInt(env.BATCH_ITEM_TIMEOUT_MS || '4000', 10),
    },
    cart: {
      maxUnitsPerLine: parseInt(env.MAX_UNITS_PER_LINE || '99', 10),
      maxKgPerLine: parseFloat(env.MAX_KG_PER_LINE || '50'),
    },
  };
}
