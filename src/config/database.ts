import { Sequelize, Options } from 'sequelize';
import { execSync } from 'child_process';
import pg from 'pg';
import env from './env.js';
import logger from './logger.js';

interface ClientConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl?: {
    require: boolean;
    rejectUnauthorized: boolean;
  };
}

const sslOptions = env.database.ssl
  ? {
      ssl: {
        require: true,
        rejectUnauthorized: env.database.sslRejectUnauthorized,
      },
    }
  : undefined;

const buildClientConfig = (database: string): ClientConfig => ({
  host: env.database.host,
  port: env.database.port,
  user: env.database.username,
  password: env.database.password,
  database,
  ...(sslOptions ?? {}),
});

export const ensureDatabaseExists = async (): Promise<void> => {
  const client = new pg.Client(buildClientConfig(env.database.adminDatabase));

  try {
    await client.connect();
    const result = await client.query(
      'SELECT 1 FROM pg_database WHERE datname = $1',
      [env.database.name]
    );

    if (result.rowCount === 0) {
      const dbName = env.database.name;
      if (!/^[a-zA-Z0-9_-]+$/.test(dbName)) {
        throw new Error('Invalid database name');
      }
      await client.query(`CREATE DATABASE "${dbName}"`);
      logger.info(`Database ${dbName} created`);
    }
  } finally {
    await client.end().catch((error: unknown) => {
      logger.warn('Failed to close admin connection', { error: String(error) });
    });
  }
};

const sequelizeOptions: Options = {
  host: env.database.host,
  port: env.database.port,
  dialect: 'postgres',
  dialectModule: pg,
  logging: env.database.logging ? (sql: string) => logger.debug(sql) : false,
  dialectOptions: sslOptions,
};

export const sequelize = new Sequelize(
  env.database.name,
  env.database.username,
  env.database.password,
  sequelizeOptions
);

export interface ConnectOptions {
  /** Run the development seeders after connecting. Off for callers that seed themselves. */
  seed?: boolean;
}

export const connectDatabase = async ({ seed = true }: ConnectOptions = {}): Promise<void> => {
  await ensureDatabaseExists();
  await sequelize.authenticate();
  logger.info('Database authenticated');

  if (env.database.runMigrations) {
    logger.info('Running database migrations...');
    execSync('npx sequelize-cli db:migrate', { stdio: 'inherit' });
    logger.info('Migrations complete');
  }

  if (!seed) return;

  // Seed data only in development (or when explicitly forced)
  if (env.nodeEnv === 'development' || process.env.FORCE_SEED === 'true') {
    logger.info('Running seed data (development mode)...');
    const { seedAll } = await import('../seeders/index.js');
    await seedAll();
  } else {
    logger.info(`Skipping seed data (NODE_ENV=${env.nodeEnv})`);
  }
};

export default sequelize;
