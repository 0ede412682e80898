import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  EmailNotifier,
  buildTransportOptions,
  selectTransportMode,
  type TransportFactory,
} from '../../src/notifications/EmailNotifier.js';
import { startFakeSmtpServer, type FakeSmtpServer } from '../utils/fakeSmtpServer.js';
import type { EmailConfig, NotificationContext } from '../../src/types/index.js';

const NOW = new Date('2026-03-05T07:30:00Z');

function makeConfig(overrides: Partial<EmailConfig> = {}): EmailConfig {
  return {
    host: 'smtp.example.com',
    port: 587,
    user: '',
    password: '',
    sender: 'ci@example.com',
    recipients: ['dev@example.com', 'ops@example.com'],
    timezone: 'Asia/Jakarta',
    ...overrides,
  };
}

function makeContext(overrides: Partial<NotificationContext> = {}): NotificationContext {
  return {
    site: 'https://example.com',
    status: 'Success',
    duration: '4.99',
    timezone: 'Asia/Jakarta',
    ...overrides,
  };
}

describe('EmailNotifier', () => {
  describe('selectTransportMode', () => {
    it('should use implicit TLS on port 465', () => {
      expect(selectTransportMode(465)).toBe('implicit-tls');
    });

    it('should use STARTTLS on any other port', () => {
      expect(selectTransportMode(587)).toBe('starttls');
      expect(selectTransportMode(25)).toBe('starttls');
      expect(selectTransportMode(2525)).toBe('starttls');
    });
  });

  describe('buildTransportOptions', () => {
    it('should connect securely from the start on 465', () => {
      expect(buildTransportOptions(makeConfig({ port: 465 }))).toEqual({
        host: 'smtp.example.com',
        port: 465,
        secure: true,
      });
    });

    it('should allow plaintext fallback on other ports', () => {
      expect(buildTransportOptions(makeConfig())).toEqual({
        host: 'smtp.example.com',
        port: 587,
        secure: false,
        requireTLS: false,
        ignoreTLS: false,
        opportunisticTLS: true,
      });
    });

    it('should authenticate only when user and password are both set', () => {
      expect(buildTransportOptions(makeConfig({ user: 'mailer', password: 'test-secret' })).auth).toEqual({
        user: 'mailer',
        pass: 'test-secret',
      });
      expect(buildTransportOptions(makeConfig({ user: 'mailer' })).auth).toBeUndefined();
      expect(buildTransportOptions(makeConfig({ password: 'test-secret' })).auth).toBeUndefined();
    });
  });

  describe('composeMessage', () => {
    it('should build the subject from the Jakarta clock', () => {
      const notifier = new EmailNotifier(makeConfig());
      const email = notifier.composeMessage(makeContext(), NOW);
      expect(email.subject).toBe('PageSpeed Insight Report - 05 Mar 2026 | 14:30 WIB');
    });

    it('should keep the WIB label for other zones', () => {
      const notifier = new EmailNotifier(makeConfig());
      const email = notifier.composeMessage(makeContext({ timezone: 'UTC' }), NOW);
      expect(email.subject).toBe('PageSpeed Insight Report - 05 Mar 2026 | 07:30 WIB');
    });

    it('should fall back to Asia/Jakarta for an invalid zone', () => {
      const notifier = new EmailNotifier(makeConfig());
      const email = notifier.composeMessage(makeContext({ timezone: 'Mars/Olympus' }), NOW);
      expect(email.subject).toBe('PageSpeed Insight Report - 05 Mar 2026 | 14:30 WIB');
    });

    it('should render the body template', () => {
      const notifier = new EmailNotifier(makeConfig());
      const email = notifier.composeMessage(makeContext(), NOW);
      expect(email.bodyText).toBe(
        'Site     : https://example.com\n' +
          'Summary:\n' +
          '• Status   : Success\n' +
          '• Duration : 4.99 seconds\n' +
          '\n' +
          'Check the attached HTML report for the full test results\n' +
          'This report is auto-generated by psi-notify'
      );
    });

    it('should address sender and recipients from config', () => {
      const notifier = new EmailNotifier(makeConfig());
      const email = notifier.composeMessage(makeContext(), NOW);
      expect(email.sender).toBe('ci@example.com');
      expect(email.recipients).toEqual(['dev@example.com', 'ops@example.com']);
      expect(email.attachment).toBeUndefined();
    });
  });

  describe('attachReport', () => {
    let dir: string;
    let stderr: MockInstance<typeof console.error>;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'psi-notify-'));
      stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    it('should leave the email unchanged without a path', () => {
      const notifier = new EmailNotifier(makeConfig());
      const email = notifier.composeMessage(makeContext(), NOW);
      expect(notifier.attachReport(email)).toBe(email);
    });

    it('should attach an HTML report with its MIME type', () => {
      const path = join(dir, 'index.html');
      writeFileSync(path, '<html>report</html>');

      const notifier = new EmailNotifier(makeConfig());
      const email = notifier.attachReport(notifier.composeMessage(makeContext(), NOW), path);

      expect(email.attachment?.filename).toBe('index.html');
      expect(email.attachment?.contentType).toBe('text/html');
      expect(email.attachment?.content.toString('utf-8')).toBe('<html>report</html>');
    });

    it('should default to application/octet-stream for unknown extensions', () => {
      const path = join(dir, 'report.psiraw');
      writeFileSync(path, Buffer.from([0x00, 0x01, 0x02]));

      const notifier = new EmailNotifier(makeConfig());
      const email = notifier.attachReport(notifier.composeMessage(makeContext(), NOW), path);

      expect(email.attachment?.contentType).toBe('application/octet-stream');
      expect(email.attachment?.content).toEqual(Buffer.from([0x00, 0x01, 0x02]));
    });

    it('should warn and skip a missing file', () => {
      const path = join(dir, 'missing.html');
      const notifier = new EmailNotifier(makeConfig());
      const email = notifier.composeMessage(makeContext(), NOW);

      const result = notifier.attachReport(email, path);

      expect(result.attachment).toBeUndefined();
      expect(stderr).toHaveBeenCalledWith(`[notify_email] WARNING: attachment not found: ${path}`);
    });
  });

  describe('send', () => {
    it('should send one message through the transport', async () => {
      const sendMail = vi.fn().mockResolvedValue({ messageId: '<1@example.com>' });
      const createTransport = vi.fn<TransportFactory>(() => ({ sendMail }));
      const notifier = new EmailNotifier(makeConfig({ port: 465 }), { createTransport });

      const email = notifier.composeMessage(makeContext(), NOW);
      await notifier.send(email);

      expect(createTransport).toHaveBeenCalledTimes(1);
      expect(createTransport).toHaveBeenCalledWith({ host: 'smtp.example.com', port: 465, secure: true });
      expect(sendMail).toHaveBeenCalledTimes(1);
      expect(sendMail).toHaveBeenCalledWith({
        from: 'ci@example.com',
        to: 'dev@example.com, ops@example.com',
        subject: 'PageSpeed Insight Report - 05 Mar 2026 | 14:30 WIB',
        text: email.bodyText,
        attachments: [],
      });
    });

    it('should pass the attachment to the transport', async () => {
      const sendMail = vi.fn().mockResolvedValue({ messageId: '<2@example.com>' });
      const notifier = new EmailNotifier(makeConfig(), { createTransport: () => ({ sendMail }) });
      const content = Buffer.from('<html></html>');

      await notifier.send({
        ...notifier.composeMessage(makeContext(), NOW),
        attachment: { filename: 'index.html', content, contentType: 'text/html' },
      });

      expect(sendMail).toHaveBeenCalledWith(
        expect.objectContaining({
          attachments: [{ filename: 'index.html', content, contentType: 'text/html' }],
        })
      );
    });

    it('should propagate transport errors without retrying', async () => {
      const sendMail = vi.fn().mockRejectedValue(new Error('Connection refused'));
      const notifier = new EmailNotifier(makeConfig(), { createTransport: () => ({ sendMail }) });

      await expect(notifier.send(notifier.composeMessage(makeContext(), NOW))).rejects.toThrow('Connection refused');
      expect(sendMail).toHaveBeenCalledTimes(1);
    });
  });

  describe('STARTTLS fallback', () => {
    let server: FakeSmtpServer;

    beforeEach(async () => {
      server = await startFakeSmtpServer();
    });

    afterEach(async () => {
      await server.close();
    });

    it('should deliver in plaintext when the server refuses the upgrade', async () => {
      const notifier = new EmailNotifier(makeConfig({ host: '127.0.0.1', port: server.port }));

      await notifier.send(notifier.composeMessage(makeContext(), NOW));

      expect(server.commands[0]).toMatch(/^EHLO /);
      expect(server.commands.slice(1, 6)).toEqual([
        'STARTTLS',
        'MAIL FROM:<ci@example.com>',
        'RCPT TO:<dev@example.com>',
        'RCPT TO:<ops@example.com>',
        'DATA',
      ]);
      expect(server.messages).toHaveLength(1);
      expect(server.messages[0]).toContain('Subject: PageSpeed Insight Report - 05 Mar 2026 | 14:30 WIB');
    });
  });
});
