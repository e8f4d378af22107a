import { DefaultAzureCredential } from '@azure/identity';
import { SecretClient } from '@azure/keyvault-secrets';
import { createLogger } from '../utils/logger';

const logger = createLogger('config:secrets');

/**
 * Secrets loaded from Azure Key Vault
 */
export interface KeyVaultSecrets {
  jwtSecret?: string;
  azureMonitorConnectionString?: string;
}

/**
 * Secret names in Azure Key Vault (hyphenated, as Key Vault requires)
 */
const SECRET_NAMES: Record<keyof KeyVaultSecrets, string> = {
  jwtSecret: 'JWT-SECRET',
  azureMonitorConnectionString: 'AZURE-MONITOR-CONNECTION-STRING',
};

/**
 * Load secrets from Azure Key Vault using DefaultAzureCredential
 *
 * Returns an empty object on any error (Key Vault unavailable, credential
 * failure, invalid URI); the caller keeps the environment values.
 *
 * @param keyVaultUri - e.g. https://my-kv.vault.azure.net/
 */
export async function loadSecretsFromKeyVault(keyVaultUri: string): Promise<KeyVaultSecrets> {
  const correlationId = `kv-load-${Date.now()}`;

  if (!keyVaultUri.startsWith('https://')) {
    logger.warn({ correlationId, keyVaultUri }, 'Invalid Key Vault URI format');
    return {};
  }

  try {
    logger.info({ correlationId, keyVaultUri }, 'Loading secrets from Azure Key Vault');

    const client = new SecretClient(keyVaultUri, new DefaultAzureCredential());
    const keys = Object.keys(SECRET_NAMES).filter((key): key is keyof KeyVaultSecrets => key in SECRET_NAMES);

    const results = await Promise.all(
      keys.map(async (key) => {
        const secretName = SECRET_NAMES[key];
        try {
          const secret = await client.getSecret(secretName);
          return { key, value: secret.value };
        } catch (error) {
          logger.warn(
            { correlationId, secretName, error: error instanceof Error ? error.message : String(error) },
            'Failed to retrieve secret from Key Vault'
          );
          return { key, value: undefined };
        }
      })
    );

    const secrets: KeyVaultSecrets = {};
    for (const { key, value } of results) {
      if (value && value.trim() !== '') {
        secrets[key] = value;
      }
    }

    logger.info({ correlationId, loadedCount: Object.keys(secrets).length }, 'Loaded secrets from Key Vault');
    return secrets;
  } catch (error) {
    logger.error(
      { correlationId, keyVaultUri, error: error instanceof Error ? error.message : String(error) },
      'Failed to load secrets from Azure Key Vault - falling back to environment variables'
    );
    return {};
  }
}
