import {
  Global,
  Inject,
  Logger,
  Module,
  type OnApplicationShutdown,
} from "@nestjs/common";
import { Pool } from "pg";

export const PG_POOL = "PG_POOL";

@Global()
@Module({
  providers: [
    {
      provide: PG_POOL,
      useFactory: async (): Promise<Pool> => {
        const { env } = await import("@repo/env");
        return new Pool({
          connectionString: env.DATABASE_URL,
          ssl:
            env.NODE_ENV === "production"
              ? { rejectUnauthorized: false }
              : undefined,
          max: 20,
          // fail fast when the database is unreachable
          connectionTimeoutMillis: 5000,
          idleTimeoutMillis: 10000,
        });
      },
    },
  ],
  exports: [PG_POOL],
})
export class DatabaseModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseModule.name);

  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
    this.logger.log("Database pool closed");
  }
}
