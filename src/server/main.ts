import type { Logger } from 'pino';

import { createPool } from '../db/client.js';
import { applyMigrations } from '../db/migrations.js';
import { buildServer } from './buildServer.js';
import { getServerConfig } from './config.js';
import { createDependencies } from './dependencies.js';

async function migrateDatabase(logger: Logger): Promise<void> {
  const pool = createPool();
  try {
    await applyMigrations(pool);
  } finally {
    try {
      await pool.end();
    } catch (closeError) {
      logger.error({ msg: 'マイグレーション用のDB接続のクローズに失敗しました', cause: closeError });
    }
  }
}

async function main(): Promise<void> {
  const config = getServerConfig();
  const dependencies = createDependencies(config);
  const { logger } = dependencies;
  try {
    await migrateDatabase(logger);
  } catch (error) {
    logger.fatal({ msg: 'データベースマイグレーションの適用に失敗しました', cause: error });
    await dependencies.pool.end();
    process.exit(1);
  }
  const server = await buildServer({ config, dependencies });
  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (error) {
    server.log.error(error, 'サーバーの起動に失敗しました');
    await server.close();
    process.exit(1);
  }
  dependencies.sweeper.start();

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ msg: 'shutting down', signal });
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ msg: 'シャットダウンに失敗しました', cause: error });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

void main();
