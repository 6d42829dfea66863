import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { AccountsModule } from '../accounts/accounts.module';
import { SecretsProvider } from '../common/secrets.provider';
import { firebaseAppProvider } from './firebase-app.provider';
import { FirebaseIdentityVerifier } from './firebase-identity.verifier';
import { IDENTITY_VERIFIER } from './interfaces/identity-verifier.interface';
import { AuthGuard } from './auth.guard';

@Module({
  imports: [AccountsModule],
  providers: [
    SecretsProvider,
    firebaseAppProvider,
    {
      provide: IDENTITY_VERIFIER,
      useClass: FirebaseIdentityVerifier,
    },
    {
      provide: APP_GUARD,
      useClass: AuthGuard,
    },
  ],
  exports: [IDENTITY_VERIFIER],
})
export class AuthModule {}
