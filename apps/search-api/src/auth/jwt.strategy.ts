import { ExtractJwt, Strategy } from "passport-jwt";
import { PassportStrategy } from "@nestjs/passport";
import { Inject, Injectable, UnauthorizedException } from "@nestjs/common";
import { AUTH_OPTIONS, type AuthOptions } from "./auth-options";

export interface JwtPayload {
  sub?: unknown;
  username?: unknown;
}

export interface AuthenticatedUser {
  userId: string;
  username?: string;
}

export function isAuthenticatedUser(
  value: unknown,
): value is AuthenticatedUser {
  return (
    typeof value === "object" &&
    value !== null &&
    "userId" in value &&
    typeof value.userId === "string"
  );
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(@Inject(AUTH_OPTIONS) options: AuthOptions) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      // passport-jwt refuses an empty key, even when auth is switched off
      secretOrKey: options.secret || "auth-disabled",
    });
  }

  async validate(payload: JwtPayload): Promise<AuthenticatedUser> {
    if (typeof payload.sub !== "string" || payload.sub.length === 0) {
      throw new UnauthorizedException("Token has no subject");
    }

    return {
      userId: payload.sub,
      username:
        typeof payload.username === "string" ? payload.username : undefined,
    };
  }
}
