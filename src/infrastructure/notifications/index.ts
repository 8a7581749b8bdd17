export { HttpFanoutSender, fanoutUrl } from './http-fanout-sender.js';
export type { FanoutConfig } from './http-fanout-sender.js';
export { LoggingSender } from './logging-sender.js';
