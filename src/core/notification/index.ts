export { NotificationDispatcher, TEST_MESSAGE_PREFIX, type SendOptions, type DispatcherConfig } from './dispatcher.js';
export { ErrorReporter, buildFailurePayload, formatReportTimestamp, type ErrorWebhookResolver } from './error-reporter.js';
export { DiscordWebhookClient, type DiscordWebhookClientConfig } from './adapters/discord.js';
export type { NotificationConfig, DiscordWebhookPayload, DiscordEmbed, DispatchResult, FailureReport } from './types.js';
