// 결정 로그 저장소 연결. 풀은 앱 종료 시 닫는다

import { Global, Inject, Module, type OnApplicationShutdown } from '@nestjs/common';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema/index.js';

export const DB = Symbol('DB');
export const PG_POOL = Symbol('PG_POOL');
export type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

const DEFAULT_POOL_MAX = 5;

function poolMax(): number {
  const value = parseInt(process.env.DATABASE_POOL_MAX ?? '', 10);
  return Number.isInteger(value) && value > 0 ? value : DEFAULT_POOL_MAX;
}

@Global()
@Module({
  providers: [
    {
      provide: PG_POOL,
      useFactory: () =>
        new Pool({
          connectionString: process.env.DATABASE_URL,
          max: poolMax(),
          application_name: 'battle-ai-server',
        }),
    },
    {
      provide: DB,
      inject: [PG_POOL],
      useFactory: (pool: Pool) => drizzle(pool, { schema }),
    },
  ],
  exports: [DB],
})
export class DrizzleModule implements OnApplicationShutdown {
  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
  }
}
