import path from 'path';
import dotenv from 'dotenv';

// Source and compiled entry points sit at different depths; both run from the project root
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export interface DatabaseConfig {
  host: string;
  port: number;
  name: string;
  username: string;
  password: string;
  adminDatabase: string;
  ssl: boolean;
  sslRejectUnauthorized: boolean;
  logging: boolean;
  runMigrations: boolean;
}

export interface RateLimitConfig {
  windowMs: number;
  max: number;
}

export interface CORSConfig {
  origin: string | string[];
  credentials: boolean;
}

export interface NegotiationConfig {
  maxRounds: number;
  sessionTimeoutMinutes: number;
  timeoutSweepEnabled: boolean;
  timeoutSweepCron: string;
}

export interface EnvironmentConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  database: DatabaseConfig;
  rateLimit: RateLimitConfig;
  cors: CORSConfig;
  negotiation: NegotiationConfig;
}

const positiveInteger = (raw: string | undefined, fallback: number): number => {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
};

export const env: EnvironmentConfig = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: Number(process.env.PORT || 8000),
  logLevel: process.env.LOG_LEVEL || 'info',
  database: {
    host: process.env.DB_HOST || '127.0.0.1',
    port: Number(process.env.DB_PORT || 5432),
    name: process.env.DB_NAME || 'carrier_negotiation',
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    adminDatabase: process.env.DB_ADMIN_DATABASE || 'postgres',
    ssl: process.env.DB_SSL === 'true',
    sslRejectUnauthorized: process.env.DB_SSL_REJECT_UNAUTHORIZED !== 'false',
    logging: process.env.DB_LOGGING === 'true',
    runMigrations: process.env.DB_RUN_MIGRATIONS !== 'false',
  },
  rateLimit: {
    windowMs: Number(process.env.RATE_LIMIT_WINDOW || 15 * 60 * 1000),
    max: Number(process.env.RATE_LIMIT_MAX || 100),
  },
  cors: {
    origin: process.env.CORS_ORIGIN
      ? process.env.CORS_ORIGIN.split(',').map((origin) => origin.trim())
      : '*',
    credentials: process.env.CORS_ORIGIN ? true : false,
  },
  negotiation: {
    maxRounds: positiveInteger(process.env.NEGOTIATION_MAX_ROUNDS, 3),
    sessionTimeoutMinutes: positiveInteger(process.env.NEGOTIATION_SESSION_TIMEOUT_MINUTES, 30),
    timeoutSweepEnabled: process.env.NEGOTIATION_TIMEOUT_SWEEP_ENABLED !== 'false',
    timeoutSweepCron: process.env.NEGOTIATION_TIMEOUT_SWEEP_CRON || '*/5 * * * *',
  },
};

export default env;
