import { z } from 'zod';
import { ConfigurationError } from '../../domain/index.js';

/** Unset and empty environment variables are treated the same. */
const emptyToUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

/**
 * `K_CE_OVERRIDES`: JSON document whose `extensions` are added to every
 * outgoing event.
 */
const ceOverridesSchema = z.object({
  extensions: z.record(z.string(), z.string()).default({}),
});

export type CloudEventOverrides = z.infer<typeof ceOverridesSchema>;

const ceOverridesFromJson = z.preprocess(
  emptyToUndefined,
  z
    .string()
    .transform((raw, ctx): unknown => {
      try {
        return JSON.parse(raw) as unknown;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a JSON document' });
        return z.NEVER;
      }
    })
    .pipe(ceOverridesSchema)
    .optional(),
);

/**
 * Zod schema of the adapter environment.
 *
 * The Service Bus key pair and the service principal variables are all
 * optional; which of them are usable is decided when connecting.
 */
const envSchema = z.object({
  SERVICEBUS_ENTITY_RESOURCE_ID: z.preprocess(emptyToUndefined, z.string({ required_error: 'Required' })),
  SERVICEBUS_MESSAGE_PROCESSOR: z.preprocess(emptyToUndefined, z.string().default('default')),
  SERVICEBUS_MAX_CONCURRENT_CALLS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(1)),
  SERVICEBUS_KEY_NAME: optionalString,
  SERVICEBUS_KEY_VALUE: optionalString,
  SERVICEBUS_CONNECTION_STRING: optionalString,
  AZURE_TENANT_ID: optionalString,
  AZURE_CLIENT_ID: optionalString,
  AZURE_CLIENT_SECRET: optionalString,
  K_SINK: z.preprocess(emptyToUndefined, z.string({ required_error: 'Required' }).url()),
  K_CE_OVERRIDES: ceOverridesFromJson,
  SINK_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10_000)),
  METRICS_HOST: z.preprocess(emptyToUndefined, z.string().default('0.0.0.0')),
  METRICS_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).default(9090)),
});

/** Credentials the broker connector may use, in whatever combination was provided. */
export interface ServiceBusAuthConfig {
  keyName?: string | undefined;
  keyValue?: string | undefined;
  connectionString?: string | undefined;
  tenantId?: string | undefined;
  clientId?: string | undefined;
  clientSecret?: string | undefined;
}

/** Adapter configuration. Loaded once at startup, never modified afterwards. */
export interface AdapterConfig {
  readonly entityResourceId: string;
  readonly messageProcessor: string;
  readonly maxConcurrentCalls: number;
  readonly auth: Readonly<ServiceBusAuthConfig>;
  readonly sink: {
    readonly url: string;
    readonly timeoutMs: number;
    readonly overrides: CloudEventOverrides | undefined;
  };
  readonly metrics: {
    readonly host: string;
    readonly port: number;
  };
}

/**
 * Reads the adapter configuration from the given environment.
 * Every invalid variable is reported in a single `ConfigurationError`.
 */
export function loadAdapterConfig(env: NodeJS.ProcessEnv = process.env): AdapterConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`invalid adapter configuration: ${details}`);
  }

  const e = result.data;
  return {
    entityResourceId: e.SERVICEBUS_ENTITY_RESOURCE_ID,
    messageProcessor: e.SERVICEBUS_MESSAGE_PROCESSOR,
    maxConcurrentCalls: e.SERVICEBUS_MAX_CONCURRENT_CALLS,
    auth: {
      keyName: e.SERVICEBUS_KEY_NAME,
      keyValue: e.SERVICEBUS_KEY_VALUE,
      connectionString: e.SERVICEBUS_CONNECTION_STRING,
      tenantId: e.AZURE_TENANT_ID,
      clientId: e.AZURE_CLIENT_ID,
      clientSecret: e.AZURE_CLIENT_SECRET,
    },
    sink: {
      url: e.K_SINK,
      timeoutMs: e.SINK_TIMEOUT_MS,
      overrides: e.K_CE_OVERRIDES,
    },
    metrics: {
      host: e.METRICS_HOST,
      port: e.METRICS_PORT,
    },
  };
}
