import { ForbiddenException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ALICE, OWNER } from '../../../test/raffle-harness';
import { ConfigService } from '../../database/config.service';
import { OperatorGuard } from './operator.guard';

function contextFor(user?: { address: string }): ExecutionContextHost {
  return new ExecutionContextHost([{ user }, {}, () => undefined]);
}

describe('OperatorGuard', () => {
  it('lets the operator through under any casing', () => {
    const guard = new OperatorGuard(new ConfigService({ OPERATOR_ADDRESS: OWNER.toLowerCase() }));

    expect(guard.canActivate(contextFor({ address: OWNER }))).toBe(true);
  });

  it('forbids other callers', () => {
    const guard = new OperatorGuard(new ConfigService({ OPERATOR_ADDRESS: OWNER }));

    expect(() => guard.canActivate(contextFor({ address: ALICE }))).toThrow(ForbiddenException);
    expect(() => guard.canActivate(contextFor())).toThrow(ForbiddenException);
  });

  it('disables operator routes when no operator is configured', () => {
    const guard = new OperatorGuard(new ConfigService({}));

    expect(() => guard.canActivate(contextFor({ address: OWNER }))).toThrow('Operator routes are disabled');
  });
});
