import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard, bearerToken } from './auth.guard';
import { AccountsService } from '../accounts/accounts.service';
import { User } from '../accounts/user.entity';
import { AuthenticatedRequest } from './current-user.decorator';

describe('AuthGuard', () => {
  const reflector = { getAllAndOverride: jest.fn() };
  const identityVerifier = { verify: jest.fn() };
  const accountsService = { provisionFromIdentity: jest.fn() };

  const guard = new AuthGuard(
    reflector as unknown as Reflector,
    identityVerifier,
    accountsService as unknown as AccountsService,
  );

  function contextFor(request: Partial<AuthenticatedRequest>): ExecutionContext {
    return {
      getHandler: () => undefined,
      getClass: () => undefined,
      switchToHttp: () => ({ getRequest: () => request }),
    } as unknown as ExecutionContext;
  }

  beforeEach(() => {
    jest.clearAllMocks();
    reflector.getAllAndOverride.mockReturnValue(false);
  });

  it('should let public routes through without a token', async () => {
    reflector.getAllAndOverride.mockReturnValue(true);

    await expect(guard.canActivate(contextFor({ headers: {} }))).resolves.toBe(
      true,
    );
    expect(identityVerifier.verify).not.toHaveBeenCalled();
  });

  it('should reject requests without a bearer token', async () => {
    await expect(
      guard.canActivate(contextFor({ headers: {} })),
    ).rejects.toThrow(UnauthorizedException);
  });

  it('should provision the user and attach it to the request', async () => {
    const user = Object.assign(new User(), { id: 3, isActive: true });
    identityVerifier.verify.mockResolvedValue({ uid: 'uid-3' });
    accountsService.provisionFromIdentity.mockResolvedValue(user);
    const request: Partial<AuthenticatedRequest> = {
      headers: { authorization: 'Bearer test-token' },
    };

    await expect(guard.canActivate(contextFor(request))).resolves.toBe(true);

    expect(identityVerifier.verify).toHaveBeenCalledWith('test-token');
    expect(accountsService.provisionFromIdentity).toHaveBeenCalledWith({
      uid: 'uid-3',
    });
    expect(request.user).toBe(user);
  });

  it('should reject disabled accounts', async () => {
    identityVerifier.verify.mockResolvedValue({ uid: 'uid-4' });
    accountsService.provisionFromIdentity.mockResolvedValue(
      Object.assign(new User(), { id: 4, isActive: false }),
    );

    await expect(
      guard.canActivate(
        contextFor({ headers: { authorization: 'Bearer test-token' } }),
      ),
    ).rejects.toThrow('User account is disabled');
  });

  describe('bearerToken', () => {
    it('should extract the token after Bearer', () => {
      expect(bearerToken('Bearer abc.def')).toBe('abc.def');
    });

    it('should ignore other schemes and empty tokens', () => {
      expect(bearerToken('Basic abc')).toBeNull();
      expect(bearerToken('Bearer')).toBeNull();
      expect(bearerToken(undefined)).toBeNull();
    });
  });
});
