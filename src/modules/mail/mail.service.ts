/**
 * Mail Service
 * ============
 * SMTP delivery through nodemailer.
 *
 * - Account emails are fire-and-forget: failures are logged, never retried.
 * - MAIL_DRY_RUN=1 uses nodemailer's JSON transport and keeps an in-process outbox.
 */

import nodemailer, { type Transporter } from "nodemailer";

import { envBool, envInt, envString } from "../../shared/env.js";
import { ConfigurationError } from "../../shared/errors.js";
import { joinUrl } from "../../shared/html.js";
import { logger } from "../../shared/logger.js";
import { renderResetPasswordEmail, renderVerificationEmail, type RenderedMail } from "./mail.templates.js";

export type OutgoingMail = RenderedMail & {
  to: string;
};

type MailConfig = {
  dryRun: boolean;
  host?: string;
  port: number;
  secure: boolean;
  username?: string;
  password?: string;
  from: string;
  fromName: string;
};

let transport: Transporter | null = null;
const dryRunOutbox: OutgoingMail[] = [];

function getMailConfig(): MailConfig {
  return {
    dryRun: envBool("MAIL_DRY_RUN", false),
    host: envString("MAIL_SERVER"),
    port: envInt("MAIL_PORT", 465),
    secure: envBool("MAIL_SSL_TLS", true),
    username: envString("MAIL_USERNAME"),
    password: envString("MAIL_PASSWORD"),
    from: envString("MAIL_FROM") || "no-reply@localhost",
    fromName: envString("MAIL_FROM_NAME") || "Contacts API",
  };
}

function getTransport(cfg: MailConfig): Transporter {
  if (transport) {return transport;}

  if (cfg.dryRun) {
    transport = nodemailer.createTransport({ jsonTransport: true });
    return transport;
  }

  if (!cfg.host) {throw new ConfigurationError("MAIL_SERVER is required");}
  transport = nodemailer.createTransport({
    host: cfg.host,
    port: cfg.port,
    secure: cfg.secure,
    auth: cfg.username ? { user: cfg.username, pass: cfg.password } : undefined,
  });
  return transport;
}

export async function sendMail(mail: OutgoingMail): Promise<void> {
  const cfg = getMailConfig();
  const info: { messageId?: string } = await getTransport(cfg).sendMail({
    from: { name: cfg.fromName, address: cfg.from },
    to: mail.to,
    subject: mail.subject,
    html: mail.html,
    text: mail.text,
  });

  if (cfg.dryRun) {dryRunOutbox.push(mail);}
  logger.info("Mail sent", { to: mail.to, subject: mail.subject, message_id: info.messageId, dry_run: cfg.dryRun });
}

/**
 * Send in the background. The caller's response never waits on SMTP.
 */
export function dispatchMail(kind: string, mail: OutgoingMail): void {
  void sendMail(mail).catch((err: unknown) => {
    logger.error("Mail delivery failed", {
      kind,
      to: mail.to,
      error: err instanceof Error ? err.message : String(err),
    });
  });
}

export function queueVerificationEmail(params: {
  email: string;
  username: string;
  token: string;
  baseUrl: string;
}): void {
  const link = joinUrl(params.baseUrl, `/api/auth/confirmed_email/${params.token}`);
  dispatchMail("verify_email", { to: params.email, ...renderVerificationEmail({ username: params.username, link }) });
}

export function queueResetPasswordEmail(params: {
  email: string;
  username: string;
  token: string;
  baseUrl: string;
}): void {
  const link = joinUrl(params.baseUrl, `/api/auth/reset_password/${params.token}`);
  dispatchMail("reset_password", { to: params.email, ...renderResetPasswordEmail({ username: params.username, link }) });
}

export function __getMailOutboxForTests(): readonly OutgoingMail[] {
  return dryRunOutbox;
}

export function __resetMailForTests(): void {
  dryRunOutbox.length = 0;
  transport = null;
}
