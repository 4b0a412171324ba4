import dotenv from 'dotenv';

dotenv.config();

export const config = {
  server: {
    port: parseInt(process.env.PORT || '3000'),
    env: process.env.NODE_ENV || 'development'
  },

  database: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432'),
    database: process.env.DB_NAME || 'soa_builder',
    user: process.env.DB_USER || 'soa_builder',
    password: process.env.DB_PASSWORD || 'soa_builder',
    max: parseInt(process.env.DB_MAX_CONNECTIONS || '20'),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000
  },

  security: {
    allowedOrigins: (process.env.ALLOWED_ORIGINS || '').split(',').filter(o => o),
    rateLimitWindowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000'),
    rateLimitMaxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000'),
    versioningRateLimitMaxRequests: parseInt(process.env.VERSIONING_RATE_LIMIT_MAX_REQUESTS || '60')
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    filePath: process.env.LOG_FILE_PATH || './logs'
  },

  versioning: {
    // Interactive diff views show at most this many entries per list
    diffDefaultLimit: parseInt(process.env.DIFF_DEFAULT_LIMIT || '50'),
    diffExportLimit: parseInt(process.env.DIFF_EXPORT_LIMIT || '1000')
  },

  concepts: {
    apiUrl: process.env.CONCEPTS_API_URL || 'https://api.library.cdisc.org/api/cosmos/v2/mdr/bc/biomedicalconcepts',
    apiKey: process.env.CONCEPTS_API_KEY || '',
    // JSON list used instead of the remote catalog (offline use and tests)
    overrideJson: process.env.CONCEPTS_JSON || '',
    skipRemote: process.env.CONCEPTS_SKIP_REMOTE === '1',
    cacheTtlMs: parseInt(process.env.CONCEPTS_CACHE_TTL_MS || '3600000'),
    requestTimeoutMs: parseInt(process.env.CONCEPTS_TIMEOUT_MS || '15000')
  }
};
