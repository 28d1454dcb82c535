import { Api } from 'grammy';
import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { NotificationError, errorMessage } from '@stockwatch/shared';
import type { EmailConfig, MonitorConfig } from './config.js';
import type { Logger } from './logger.js';
import type { RenderedMessage } from './notifications.js';

export interface NotificationChannel {
  readonly name: string;
  send(message: RenderedMessage): Promise<void>;
}

export interface DeliveryResult {
  channel: string;
  ok: boolean;
  error?: NotificationError;
}

export function createTelegramChannel(api: Pick<Api, 'sendMessage'>, chatId: string): NotificationChannel {
  return {
    name: `telegram:${chatId}`,
    async send(message) {
      await api.sendMessage(chatId, `${message.subject}\n\n${message.text}`);
    },
  };
}

export function createSmtpTransport(email: EmailConfig): Transporter {
  const implicitTls = email.smtpPort === 465;
  return nodemailer.createTransport({
    host: email.smtpServer,
    port: email.smtpPort,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: { user: email.senderEmail, pass: email.senderPassword },
  });
}

export function createEmailChannel(
  transport: Pick<Transporter, 'sendMail'>,
  email: Pick<EmailConfig, 'senderEmail' | 'recipientEmail'>,
): NotificationChannel {
  return {
    name: 'email',
    async send(message) {
      await transport.sendMail({
        from: { name: 'Stock Bot', address: email.senderEmail },
        to: email.recipientEmail,
        subject: message.subject,
        text: message.text,
      });
    },
  };
}

/**
 * Sends one message on every channel, once each. Channel failures are
 * logged and returned, never thrown.
 */
export async function dispatchNotification(
  message: RenderedMessage,
  channels: readonly NotificationChannel[],
  log: Pick<Logger, 'info' | 'error'>,
): Promise<DeliveryResult[]> {
  const settled = await Promise.allSettled(channels.map((channel) => channel.send(message)));

  return settled.map((result, index) => {
    const channel = channels[index].name;
    if (result.status === 'fulfilled') {
      log.info(`Sent "${message.subject}" via ${channel}`);
      return { channel, ok: true };
    }

    const error = new NotificationError(
      `Delivery via ${channel} failed: ${errorMessage(result.reason)}`,
      channel,
      { cause: result.reason },
    );
    log.error(error.message);
    return { channel, ok: false, error };
  });
}

export interface ChannelSet {
  channels: NotificationChannel[];
  healthChannels: NotificationChannel[];
  close(): Promise<void>;
}

export interface ChannelFactories {
  telegramApi?: (token: string) => Pick<Api, 'sendMessage'>;
  smtpTransport?: (email: EmailConfig) => Pick<Transporter, 'sendMail' | 'close'>;
}

export function createChannels(
  config: Pick<MonitorConfig, 'email' | 'telegram'>,
  factories: ChannelFactories = {},
): ChannelSet {
  const channels: NotificationChannel[] = [];
  const healthChannels: NotificationChannel[] = [];
  let transport: Pick<Transporter, 'sendMail' | 'close'> | null = null;

  if (config.email) {
    transport = (factories.smtpTransport ?? createSmtpTransport)(config.email);
    channels.push(createEmailChannel(transport, config.email));
  }

  if (config.telegram) {
    const api = (factories.telegramApi ?? ((token: string) => new Api(token)))(config.telegram.botToken);
    for (const chatId of config.telegram.chatIds) {
      channels.push(createTelegramChannel(api, chatId));
    }
    if (config.telegram.adminChatId) {
      healthChannels.push(createTelegramChannel(api, config.telegram.adminChatId));
    }
  }

  return {
    channels,
    healthChannels,
    async close() {
      transport?.close();
    },
  };
}
