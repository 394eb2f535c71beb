import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';

export interface AppSecrets {
  TMDB_API_KEY: string;
}

function isAppSecrets(value: unknown): value is AppSecrets {
  return (
    typeof value === 'object' &&
    value !== null &&
    'TMDB_API_KEY' in value &&
    typeof value.TMDB_API_KEY === 'string'
  );
}

export type SecretsClient = Pick<SecretsManagerClient, 'send'>;

export class SecretsService {
  private client: SecretsClient;
  private secretName = process.env.SECRETS_NAME || 'media-metadata/api-keys';
  private cachedSecrets: AppSecrets | null = null;
  private region = process.env.AWS_REGION || 'us-east-1';

  constructor(client?: SecretsClient) {
    this.client = client ?? new SecretsManagerClient({ region: this.region });
  }

  async getSecrets(): Promise<AppSecrets> {
    if (this.cachedSecrets) {
      return this.cachedSecrets;
    }

    // Check if we should use local .env (for development/fallback)
    if (process.env.USE_LOCAL_SECRETS === 'true') {
      console.log('Using local .env secrets (USE_LOCAL_SECRETS=true)');
      return this.getLocalSecrets();
    }

    try {
      console.log(`Fetching secrets from AWS Secrets Manager: ${this.secretName}`);

      const response = await this.client.send(new GetSecretValueCommand({ SecretId: this.secretName }));

      if (!response.SecretString) {
        throw new Error('Secret value is empty');
      }

      const parsed: unknown = JSON.parse(response.SecretString);
      if (!isAppSecrets(parsed)) {
        throw new Error('Secret is missing TMDB_API_KEY');
      }

      this.cachedSecrets = { TMDB_API_KEY: parsed.TMDB_API_KEY };
      console.log('Secrets loaded successfully from AWS Secrets Manager');

      return this.cachedSecrets;
    } catch (error) {
      console.warn('Failed to fetch from AWS Secrets Manager, falling back to local .env');
      console.warn(error instanceof Error ? error.message : error);
      return this.getLocalSecrets();
    }
  }

  private getLocalSecrets(): AppSecrets {
    const secrets: AppSecrets = {
      TMDB_API_KEY: process.env.TMDB_API_KEY || '',
    };

    if (!secrets.TMDB_API_KEY) {
      console.warn('Missing secrets: TMDB_API_KEY (external resolution will fail authentication)');
    }

    this.cachedSecrets = secrets;
    return secrets;
  }

  // Clear cache (useful for testing or refreshing secrets)
  clearCache(): void {
    this.cachedSecrets = null;
  }
}

// Singleton instance
export const secretsService = new SecretsService();
