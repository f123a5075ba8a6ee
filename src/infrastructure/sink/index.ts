export { createHttpEventSender, toCloudEvent } from './http-sender.js';
export type { HttpEventSenderOptions } from './http-sender.js';
