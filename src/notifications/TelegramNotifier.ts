// src/notifications/TelegramNotifier.ts
// Telegram Bot API integration for PageSpeed Insight run reports

import axios from 'axios';
import type { OutboundTelegramMessage, TelegramConfig, TelegramReportContext } from '../types/index.js';
import { formatClock, FALLBACK_TIMEZONE, resolveTimeZone } from '../utils/timezone.js';
import { isFailureStatus } from '../utils/validation.js';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';
export const REQUEST_TIMEOUT_MS = 20_000;

export interface TelegramSendResult {
  ok: boolean;
  /** Response body exactly as received */
  raw: string;
}

export class TelegramNotifier {
  private config: TelegramConfig;

  constructor(config: TelegramConfig) {
    this.config = config;
  }

  /**
   * Format the run report with Telegram HTML formatting.
   * Optional lines are left out entirely when their value is missing.
   */
  composeMessage(context: TelegramReportContext, now: Date = new Date()): string {
    const badge = isFailureStatus(context.status) ? '❌ FAILED' : '✅ SUCCESS';

    const zone = resolveTimeZone([context.timezone, FALLBACK_TIMEZONE]);
    const clock = formatClock(now, zone);

    const lines: string[] = [];
    lines.push('<b>PageSpeed Insight Report</b>');
    lines.push(`Status: <b>${badge}</b>`);
    lines.push(`Site: <code>${this.escapeHtml(context.site)}</code>`);
    if (context.duration) {
      lines.push(`Duration: <b>${this.escapeHtml(context.duration)} s</b>`);
    }
    lines.push(`Time: ${clock.day} ${clock.month} ${clock.year} | ${clock.time} ${clock.zoneName}`);
    if (context.dashboard) {
      lines.push(`Dashboard: ${this.escapeHtml(context.dashboard)}`);
    }
    if (context.extra) {
      lines.push(this.escapeHtml(context.extra));
    }

    return lines.join('\n');
  }

  buildMessage(text: string): OutboundTelegramMessage {
    return {
      chatId: this.config.chatId,
      text,
      parseMode: 'HTML',
      disableWebPagePreview: true,
    };
  }

  /**
   * Escape HTML special characters for Telegram HTML parse mode
   */
  escapeHtml(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;');
  }

  /**
   * Send message via Telegram Bot API.
   * API rejections come back as `ok: false`; network errors and timeouts throw.
   */
  async send(message: OutboundTelegramMessage): Promise<TelegramSendResult> {
    const url = `${TELEGRAM_API_BASE}/bot${this.config.botToken}/sendMessage`;

    const body = new URLSearchParams({
      chat_id: message.chatId,
      text: message.text,
      parse_mode: message.parseMode,
      disable_web_page_preview: String(message.disableWebPagePreview),
    });

    const response = await axios.post<string>(url, body, {
      timeout: REQUEST_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      responseType: 'text',
      // Telegram answers 4xx with an { ok: false } body; let the flag decide
      validateStatus: () => true,
    });

    const raw = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
    return { ok: TelegramNotifier.isOkResponse(raw), raw };
  }

  /**
   * True only for a JSON body whose `ok` flag is true
   */
  static isOkResponse(raw: string): boolean {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return false;
    }
    return typeof parsed === 'object' && parsed !== null && 'ok' in parsed && parsed.ok === true;
  }
}
