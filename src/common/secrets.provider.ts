import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SecretsManagerClient,
  GetSecretValueCommand,
} from '@aws-sdk/client-secrets-manager';
import { z } from 'zod';

const ServiceAccountSchema = z.object({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export interface ServiceAccountCredentials {
  projectId: string;
  clientEmail: string;
  privateKey: string;
}

@Injectable()
export class SecretsProvider {
  private readonly logger = new Logger(SecretsProvider.name);
  private cachedSecrets: Map<string, ServiceAccountCredentials> = new Map();
  private cacheExpiry: Map<string, number> = new Map();
  private readonly CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes

  constructor(
    private configService: ConfigService,
    @Optional() private secretsManager?: SecretsManagerClient,
  ) {
    if (this.isProduction() && !this.secretsManager) {
      this.secretsManager = new SecretsManagerClient({
        region: this.configService.get<string>('AWS_REGION', 'us-east-1'),
      });
    }
  }

  /**
   * Service-account credentials for the identity provider, or null when none
   * are configured (local runs without authentication).
   */
  async getFirebaseServiceAccount(): Promise<ServiceAccountCredentials | null> {
    const cacheKey = 'identity_firebase';
    const expiry = this.cacheExpiry.get(cacheKey);
    const cached = this.cachedSecrets.get(cacheKey);

    if (expiry && Date.now() < expiry && cached) {
      this.logger.debug('Using cached identity provider credentials');
      return cached;
    }

    const raw = this.isProduction()
      ? await this.getFromSecretsManager('AWS_SECRET_NAME_FIREBASE')
      : this.getFromEnvironment('FIREBASE_SERVICE_ACCOUNT_KEY');

    if (!raw) {
      return null;
    }

    const credentials = this.parseServiceAccount(raw);
    this.cachedSecrets.set(cacheKey, credentials);
    this.cacheExpiry.set(cacheKey, Date.now() + this.CACHE_TTL_MS);
    return credentials;
  }

  clearCache(): void {
    this.cachedSecrets.clear();
    this.cacheExpiry.clear();
    this.logger.log('Credentials cache cleared');
  }

  private isProduction(): boolean {
    return this.configService.get<string>('NODE_ENV') === 'production';
  }

  private async getFromSecretsManager(
    nameVariable: string,
  ): Promise<string | null> {
    const secretName = this.configService.get<string>(nameVariable);

    if (!secretName) {
      this.logger.warn(`${nameVariable} not configured`);
      return null;
    }

    if (!this.secretsManager) {
      throw new Error('Secrets Manager client not initialized');
    }

    try {
      const command = new GetSecretValueCommand({ SecretId: secretName });
      const response = await this.secretsManager.send(command);

      if (!response.SecretString) {
        throw new Error('Empty secret response');
      }

      this.logger.log(`Retrieved ${secretName} from Secrets Manager`);
      return response.SecretString;
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Failed to retrieve ${secretName} from Secrets Manager: ${errorMessage}`,
      );
      throw new Error(`Credential retrieval failed for ${secretName}`);
    }
  }

  private getFromEnvironment(variable: string): string | null {
    const value = this.configService.get<string>(variable);
    if (!value) {
      return null;
    }
    this.logger.warn(
      `Using ${variable} from the environment (development only)`,
    );
    return value;
  }

  private parseServiceAccount(raw: string): ServiceAccountCredentials {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new Error('Service account key is not valid JSON');
    }

    const parsed = ServiceAccountSchema.parse(json);
    return {
      projectId: parsed.project_id,
      clientEmail: parsed.client_email,
      privateKey: parsed.private_key,
    };
  }
}
