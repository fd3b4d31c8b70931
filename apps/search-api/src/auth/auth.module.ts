import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";
import { PassportModule } from "@nestjs/passport";
import { AUTH_OPTIONS, type AuthOptions } from "./auth-options";
import { JwtAuthGuard } from "./jwt-auth.guard";
import { JwtStrategy } from "./jwt.strategy";

/**
 * Bearer-token verification only. Tokens are issued by the account service
 * that shares AUTH_SECRET.
 */
@Module({
  imports: [PassportModule.register({ defaultStrategy: "jwt" })],
  providers: [
    {
      provide: AUTH_OPTIONS,
      useFactory: async (): Promise<AuthOptions> => {
        const { env } = await import("@repo/env");
        return {
          enabled: env.ENABLE_AUTH === "true",
          secret: env.AUTH_SECRET,
        };
      },
    },
    JwtStrategy,
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard,
    },
  ],
})
export class AuthModule {}
