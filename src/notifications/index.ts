// src/notifications/index.ts
// Notification system exports

export {
  EmailNotifier,
  buildTransportOptions,
  selectTransportMode,
  type EmailNotifierOptions,
  type SmtpTransporter,
  type TransportFactory,
} from './EmailNotifier.js';
export { TelegramNotifier, type TelegramSendResult } from './TelegramNotifier.js';
