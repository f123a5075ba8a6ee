import { ServiceBusClient } from '@azure/service-bus';
import { ClientSecretCredential } from '@azure/identity';
import type { TokenCredential } from '@azure/identity';
import type { ServiceBusEntityId } from '../../domain/index.js';
import { AuthenticationError, namespaceHostname, toError } from '../../domain/index.js';
import type { ServiceBusAuthConfig } from '../config/index.js';

/** A named way of obtaining a broker client. `connect` throws when the method is unusable. */
export interface AuthStrategy<TClient> {
  readonly name: string;
  connect(): TClient;
}

/** Builds broker clients; swapped for a fake in tests. */
export interface ServiceBusClientFactory<TClient> {
  fromConnectionString(connectionString: string): TClient;
  fromCredential(fullyQualifiedNamespace: string, credential: TokenCredential): TClient;
}

export const serviceBusClientFactory: ServiceBusClientFactory<ServiceBusClient> = {
  fromConnectionString: (connectionString) => new ServiceBusClient(connectionString),
  fromCredential: (fullyQualifiedNamespace, credential) => new ServiceBusClient(fullyQualifiedNamespace, credential),
};

/**
 * Returns the SAS connection string to use for the given entity.
 *
 * An explicit key name/value pair takes precedence and is used to compose a
 * new connection string, scoped to the queue or topic. Otherwise the
 * configured connection string is returned as is.
 */
export function connectionStringFromConfig(
  auth: ServiceBusAuthConfig,
  entity: ServiceBusEntityId,
): string | undefined {
  if (auth.keyName || auth.keyValue) {
    return (
      `Endpoint=sb://${namespaceHostname(entity)}/;` +
      `SharedAccessKeyName=${auth.keyName ?? ''};` +
      `SharedAccessKey=${auth.keyValue ?? ''};` +
      `EntityPath=${entity.resourceName}`
    );
  }
  return auth.connectionString;
}

/**
 * Authentication strategies in the order they are tried:
 * 1. `sas`: shared access signature, from a key pair or a connection string.
 * 2. `aad`: Azure Active Directory service principal.
 */
export function serviceBusAuthStrategies<TClient>(
  auth: ServiceBusAuthConfig,
  entity: ServiceBusEntityId,
  factory: ServiceBusClientFactory<TClient>,
): AuthStrategy<TClient>[] {
  return [
    {
      name: 'sas',
      connect: () => {
        const connStr = connectionStringFromConfig(auth, entity);
        if (!connStr) {
          throw new Error('neither a shared access key nor a connection string is set');
        }
        return factory.fromConnectionString(connStr);
      },
    },
    {
      name: 'aad',
      connect: () => {
        const { tenantId, clientId, clientSecret } = auth;
        if (!tenantId || !clientId || !clientSecret) {
          throw new Error('service principal credentials are incomplete (AZURE_TENANT_ID, AZURE_CLIENT_ID, AZURE_CLIENT_SECRET)');
        }
        const credential = new ClientSecretCredential(tenantId, clientId, clientSecret);
        return factory.fromCredential(namespaceHostname(entity), credential);
      },
    },
  ];
}

/**
 * Tries each strategy in order and returns the first client obtained.
 * Throws `AuthenticationError` naming every failed attempt when none succeeds.
 */
export function connectFirst<TClient>(
  namespace: string,
  strategies: readonly AuthStrategy<TClient>[],
): { client: TClient; strategy: string } {
  const attempts: { strategy: string; error: Error }[] = [];

  for (const strategy of strategies) {
    try {
      return { client: strategy.connect(), strategy: strategy.name };
    } catch (err: unknown) {
      attempts.push({ strategy: strategy.name, error: toError(err) });
    }
  }

  throw new AuthenticationError(namespace, attempts);
}
