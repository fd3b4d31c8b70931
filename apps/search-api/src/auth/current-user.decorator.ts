import { createParamDecorator, type ExecutionContext } from "@nestjs/common";
import type { Request } from "express";
import { type AuthenticatedUser, isAuthenticatedUser } from "./jwt.strategy";

/** The JWT subject, or undefined when auth is disabled */
export const CurrentUser = createParamDecorator(
  (
    _data: unknown,
    context: ExecutionContext,
  ): AuthenticatedUser | undefined => {
    const request = context.switchToHttp().getRequest<Request>();
    return isAuthenticatedUser(request.user) ? request.user : undefined;
  },
);
