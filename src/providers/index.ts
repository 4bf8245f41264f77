export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export type { INotificationProvider, StageTransitionSignal } from './INotificationProvider.js';
export { LogNotificationProvider } from './LogNotificationProvider.js';
export { WebhookNotificationProvider } from './WebhookNotificationProvider.js';
export type { IProfileProvider } from './IProfileProvider.js';
export type { IIdentityProvider } from './IIdentityProvider.js';
