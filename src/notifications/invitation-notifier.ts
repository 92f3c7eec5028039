/**
 * Invitation notifications.
 *
 * Sends the "you have been invited" mail through a nodemailer transport.
 * Without SMTP settings the JSON transport is used, which renders the
 * message but delivers nothing.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { MailConfig } from '../config';

export interface InvitationMessage {
  to: string;
  projectName: string;
  inviterName: string;
  role: string;
  acceptUrl: string;
  declineUrl: string;
  expiresAt: string;
}

export interface DeliveryResult {
  messageId: string;
}

export interface InvitationNotifier {
  sendInvitation(message: InvitationMessage): Promise<DeliveryResult>;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderInvitation(message: InvitationMessage): { subject: string; text: string; html: string } {
  const subject = `Invitation to collaborate on ${message.projectName}`;
  const text = [
    `${message.inviterName} invited you to collaborate on ${message.projectName} as ${message.role}.`,
    `Accept: ${message.acceptUrl}`,
    `Decline: ${message.declineUrl}`,
    `This invitation expires at ${message.expiresAt}.`,
  ].join('\n');
  const html = [
    `<p>${escapeHtml(message.inviterName)} invited you to collaborate on <strong>${escapeHtml(message.projectName)}</strong> as ${escapeHtml(message.role)}.</p>`,
    `<p><a href="${escapeHtml(message.acceptUrl)}">Accept</a> | <a href="${escapeHtml(message.declineUrl)}">Decline</a></p>`,
    `<p>This invitation expires at ${escapeHtml(message.expiresAt)}.</p>`,
  ].join('\n');
  return { subject, text, html };
}

export class MailInvitationNotifier implements InvitationNotifier {
  constructor(
    private readonly transport: Transporter,
    private readonly from: string,
  ) {}

  async sendInvitation(message: InvitationMessage): Promise<DeliveryResult> {
    const { subject, text, html } = renderInvitation(message);
    const info = await this.transport.sendMail({
      from: this.from,
      to: message.to,
      subject,
      text,
      html,
    });
    return { messageId: String(info.messageId) };
  }
}

/** Build the notifier from mail configuration. */
export function createInvitationNotifier(config: MailConfig): InvitationNotifier {
  const transport = config.host
    ? nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        auth: config.user ? { user: config.user, pass: config.pass } : undefined,
      })
    : nodemailer.createTransport({ jsonTransport: true });
  return new MailInvitationNotifier(transport, config.from);
}
