export { loadAdapterConfig } from './env-config.js';
export type { AdapterConfig, ServiceBusAuthConfig, CloudEventOverrides } from './env-config.js';
