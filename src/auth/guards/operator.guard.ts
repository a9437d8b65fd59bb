import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { sameAddress } from '../../common/ethereum';
import { ConfigService } from '../../database/config.service';
import { AuthenticatedCaller } from '../strategies/jwt.strategy';

/**
 * Lets through only the configured operator. Runs after AuthGuard('jwt').
 */
@Injectable()
export class OperatorGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const operator = this.configService.operatorAddress;
    if (!operator) {
      throw new ForbiddenException('Operator routes are disabled');
    }

    const request = context.switchToHttp().getRequest<{ user?: AuthenticatedCaller }>();
    const caller = request.user?.address ?? null;
    if (!sameAddress(caller, operator)) {
      throw new ForbiddenException('Only the operator may call this route');
    }
    return true;
  }
}
