import { Sequelize, Options } from 'sequelize';
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

const buildClientConfig = (database: string): ClientConfig => ({
  host: env.database.host,
  port: env.database.port,
  user: env.database.username,
  password: env.database.password,
  database,
  ...(env.database.ssl
    ? {
        ssl: {
          require: true,
          rejectUnauthorized: env.database.sslRejectUnauthorized,
        },
      }
    : {}),
});

export const ensureDatabaseExists = async (): Promise<void> => {
  const client = new pg.Client(buildClientConfig(env.database.adminDatabase));

  try {
    await client.connect();
    const result = await client.query('SELECT 1 FROM pg_database WHERE datname = $1', [
      env.database.name,
    ]);

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
      logger.warn('Failed to close admin connection', {
        message: error instanceof Error ? error.message : String(error),
      });
    });
  }
};

const sequelizeOptions: Options = {
  host: env.database.host,
  port: env.database.port,
  dialect: 'postgres',
  dialectModule: pg,
  logging: env.database.logging ? (sql: string) => logger.debug(sql) : false,
  dialectOptions: env.database.ssl
    ? {
        ssl: {
          require: true,
          rejectUnauthorized: env.database.sslRejectUnauthorized,
        },
      }
    : undefined,
};

export const sequelize = new Sequelize(
  env.database.name,
  env.database.username,
  env.database.password,
  sequelizeOptions
);

export const connectDatabase = async (): Promise<void> => {
  await ensureDatabaseExists();
  await sequelize.authenticate();
  logger.info('Database authenticated');

  await sequelize.sync();
  logger.info('Models synchronized');

  if (env.nodeEnv === 'development' || process.env.FORCE_SEED === 'true') {
    logger.info('Running seed data (development mode)...');
    const { seedAll } = await import('../seeders/index.js');
    await seedAll();
  } else {
    logger.info(`Skipping seed data (NODE_ENV=${env.nodeEnv})`);
  }
};

export default sequelize;
