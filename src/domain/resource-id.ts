import { ConfigurationError } from './errors.js';

const RESOURCE_PROVIDER_SERVICEBUS = 'Microsoft.ServiceBus';
const SERVICEBUS_ENDPOINT_SUFFIX = 'servicebus.windows.net';

const RESOURCE_TYPE_QUEUES = 'queues';
const RESOURCE_TYPE_TOPICS = 'topics';
const RESOURCE_TYPE_SUBSCRIPTIONS = 'subscriptions';

/**
 * Structured form of an Azure Resource Manager resource ID.
 *
 *   /subscriptions/{sub}/resourceGroups/{rg}/providers/{provider}[/namespaces/{ns}]/{type}/{name}[/{subType}/{subName}]
 *
 * Optional parts that are absent are empty strings.
 */
export interface AzureResourceId {
  readonly subscriptionId: string;
  readonly resourceGroup: string;
  readonly resourceProvider: string;
  readonly namespace: string;
  readonly resourceType: string;
  readonly resourceName: string;
  readonly subResourceType: string;
  readonly subResourceName: string;
}

/** Resource ID of a Service Bus queue. */
export interface ServiceBusQueueId extends AzureResourceId {
  readonly resourceType: typeof RESOURCE_TYPE_QUEUES;
  readonly subResourceType: '';
}

/** Resource ID of a Service Bus topic subscription. */
export interface ServiceBusSubscriptionId extends AzureResourceId {
  readonly resourceType: typeof RESOURCE_TYPE_TOPICS;
  readonly subResourceType: typeof RESOURCE_TYPE_SUBSCRIPTIONS;
}

/** A Service Bus entity the adapter can receive from. */
export type ServiceBusEntityId = ServiceBusQueueId | ServiceBusSubscriptionId;

function isKeyword(segment: string | undefined, keyword: string): boolean {
  return segment !== undefined && segment.toLowerCase() === keyword.toLowerCase();
}

/**
 * Parses a resource ID string into its structured form.
 * Keyword segments are matched case-insensitively, names are kept verbatim.
 */
export function parseAzureResourceId(resIdStr: string): AzureResourceId {
  const fail = (reason: string): never => {
    throw new ConfigurationError(`deserializing resource ID string: ${reason}`);
  };

  if (!resIdStr.startsWith('/')) fail('resource ID must begin with "/"');

  const parts = resIdStr.slice(1).split('/');
  if (parts.some((p) => p === '')) fail('resource ID contains empty segments');

  // subscriptions/{sub}/resourceGroups/{rg}/providers/{provider}/...
  if (parts.length < 8) fail('resource ID is too short');
  if (!isKeyword(parts[0], 'subscriptions')) fail('expected "subscriptions" segment');
  if (!isKeyword(parts[2], 'resourceGroups')) fail('expected "resourceGroups" segment');
  if (!isKeyword(parts[4], 'providers')) fail('expected "providers" segment');

  let rest = parts.slice(6);
  let namespace = '';
  if (isKeyword(rest[0], 'namespaces')) {
    namespace = rest[1] ?? '';
    rest = rest.slice(2);
  }

  if (rest.length !== 2 && rest.length !== 4) {
    fail(`unexpected number of segments after provider (${rest.length})`);
  }

  return {
    subscriptionId: parts[1] ?? '',
    resourceGroup: parts[3] ?? '',
    resourceProvider: parts[5] ?? '',
    namespace,
    resourceType: rest[0] ?? '',
    resourceName: rest[1] ?? '',
    subResourceType: rest[2] ?? '',
    subResourceName: rest[3] ?? '',
  };
}

/**
 * Parses the given resource ID string and validates that it refers to a
 * Service Bus entity. Must match one of:
 *  - /.../providers/Microsoft.ServiceBus/namespaces/{namespaceName}/queues/{queueName}
 *  - /.../providers/Microsoft.ServiceBus/namespaces/{namespaceName}/topics/{topicName}/subscriptions/{subsName}
 */
export function parseServiceBusEntityId(resIdStr: string): ServiceBusEntityId {
  const resId = parseAzureResourceId(resIdStr);

  if (resId.resourceProvider === RESOURCE_PROVIDER_SERVICEBUS && resId.namespace !== '') {
    if (resId.resourceType === RESOURCE_TYPE_QUEUES && resId.subResourceType === '') {
      return { ...resId, resourceType: RESOURCE_TYPE_QUEUES, subResourceType: '' };
    }
    if (resId.resourceType === RESOURCE_TYPE_TOPICS && resId.subResourceType === RESOURCE_TYPE_SUBSCRIPTIONS) {
      return { ...resId, resourceType: RESOURCE_TYPE_TOPICS, subResourceType: RESOURCE_TYPE_SUBSCRIPTIONS };
    }
  }

  throw new ConfigurationError('resource ID does not refer to a Service Bus entity');
}

/** Returns the entity path of the given Service Bus entity. */
export function entityPath(entity: ServiceBusEntityId): string {
  switch (entity.resourceType) {
    case RESOURCE_TYPE_QUEUES:
      return entity.resourceName;
    case RESOURCE_TYPE_TOPICS:
      return `${entity.resourceName}/Subscriptions/${entity.subResourceName}`;
  }
}

/** Fully qualified host name of the entity's namespace. */
export function namespaceHostname(entity: ServiceBusEntityId): string {
  return `${entity.namespace}.${SERVICEBUS_ENDPOINT_SUFFIX}`;
}
