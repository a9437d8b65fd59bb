import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AuthenticatedCaller } from '../strategies/jwt.strategy';

/**
 * Address of the authenticated caller. Only meaningful behind AuthGuard('jwt').
 */
export const CurrentCaller = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<{ user?: AuthenticatedCaller }>();
  if (!request.user) {
    throw new UnauthorizedException();
  }
  return request.user.address;
});
