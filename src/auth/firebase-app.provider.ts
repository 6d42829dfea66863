import { FactoryProvider, Logger } from '@nestjs/common';
import { App, cert, initializeApp } from 'firebase-admin/app';
import { SecretsProvider } from '../common/secrets.provider';

export const FIREBASE_APP = 'FIREBASE_APP';

const APP_NAME = 'agent-leads-identity';

/**
 * Builds the one firebase-admin App used for token verification, from
 * credentials the SecretsProvider supplies. Resolves to null when no
 * credentials are configured; every authenticated request is then refused.
 */
export const firebaseAppProvider: FactoryProvider<App | null> = {
  provide: FIREBASE_APP,
  useFactory: async (secrets: SecretsProvider): Promise<App | null> => {
    const logger = new Logger('FirebaseApp');
    const credentials = await secrets.getFirebaseServiceAccount();

    if (!credentials) {
      logger.warn(
        'No identity provider credentials configured; authenticated routes will return 401',
      );
      return null;
    }

    const app = initializeApp(
      {
        credential: cert({
          projectId: credentials.projectId,
          clientEmail: credentials.clientEmail,
          privateKey: credentials.privateKey.replace(/\\n/g, '\n'),
        }),
        projectId: credentials.projectId,
      },
      APP_NAME,
    );
    logger.log(`Identity provider initialised for project ${credentials.projectId}`);
    return app;
  },
  inject: [SecretsProvider],
};
