import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_KEY } from '../common/decorators/public.decorator';
import { AccountsService } from '../accounts/accounts.service';
import { AuthenticatedRequest } from './current-user.decorator';
import {
  IDENTITY_VERIFIER,
  IdentityVerifier,
} from './interfaces/identity-verifier.interface';

/**
 * Global guard: verifies the bearer token, provisions the user on first
 * sight and attaches it to the request. Routes marked @Public() skip it.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    @Inject(IDENTITY_VERIFIER)
    private readonly identityVerifier: IdentityVerifier,
    private readonly accountsService: AccountsService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = bearerToken(request.headers.authorization);
    if (!token) {
      throw new UnauthorizedException('Missing bearer token');
    }

    const identity = await this.identityVerifier.verify(token);
    const user = await this.accountsService.provisionFromIdentity(identity);
    if (!user.isActive) {
      throw new UnauthorizedException('User account is disabled');
    }

    request.user = user;
    return true;
  }
}

export function bearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const [scheme, token] = header.split(' ');
  if (scheme !== 'Bearer' || !token) {
    return null;
  }
  return token;
}
