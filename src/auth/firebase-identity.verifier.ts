import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  UnauthorizedException,
} from '@nestjs/common';
import { App, deleteApp } from 'firebase-admin/app';
import { getAuth } from 'firebase-admin/auth';
import { z } from 'zod';
import { FIREBASE_APP } from './firebase-app.provider';
import {
  DecodedIdentity,
  IdentityVerifier,
} from './interfaces/identity-verifier.interface';

const ClaimsSchema = z.object({
  uid: z.string().min(1),
  email: z.string().optional(),
  name: z.string().optional(),
});

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

@Injectable()
export class FirebaseIdentityVerifier
  implements IdentityVerifier, OnApplicationShutdown
{
  private readonly logger = new Logger(FirebaseIdentityVerifier.name);

  constructor(@Inject(FIREBASE_APP) private readonly app: App | null) {}

  async verify(token: string): Promise<DecodedIdentity> {
    if (!this.app) {
      throw new UnauthorizedException('Authentication is not configured');
    }

    let decoded: unknown;
    try {
      decoded = await getAuth(this.app).verifyIdToken(token);
    } catch (error: unknown) {
      const code = errorCode(error);
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';

      if (code === 'auth/id-token-expired') {
        this.logger.warn(`Expired identity token: ${errorMessage}`);
        throw new UnauthorizedException('Identity token expired');
      }
      if (code?.startsWith('auth/')) {
        this.logger.warn(`Invalid identity token (${code}): ${errorMessage}`);
        throw new UnauthorizedException('Invalid identity token');
      }
      this.logger.error(`Identity verification failed: ${errorMessage}`);
      throw new UnauthorizedException('Authentication failed');
    }

    const claims = ClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new UnauthorizedException('Identity token is missing claims');
    }
    return claims.data;
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.app) {
      await deleteApp(this.app);
    }
  }
}
