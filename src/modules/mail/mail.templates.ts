/**
 * Mail Templates
 * ==============
 * HTML + plain-text bodies for account emails.
 */

import { escapeHtml } from "../../shared/html.js";

export type RenderedMail = {
  subject: string;
  html: string;
  text: string;
};

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>
<body style="font-family: Arial, sans-serif; color: #222; max-width: 560px; margin: 0 auto;">
${body}
</body>
</html>`;
}

export function renderVerificationEmail(params: { username: string; link: string }): RenderedMail {
  const name = escapeHtml(params.username);
  const link = escapeHtml(params.link);

  return {
    subject: "Confirm your email",
    html: layout(
      "Confirm your email",
      `<h2>Hi ${name},</h2>
<p>Thanks for signing up. Please confirm your email address by clicking the link below.</p>
<p><a href="${link}">Confirm email</a></p>
<p>If you did not create an account, you can ignore this message.</p>`
    ),
    text: `Hi ${params.username},\n\nConfirm your email address: ${params.link}\n`,
  };
}

export function renderResetPasswordEmail(params: { username: string; link: string }): RenderedMail {
  const name = escapeHtml(params.username);
  const link = escapeHtml(params.link);

  return {
    subject: "Reset password",
    html: layout(
      "Reset password",
      `<h2>Hi ${name},</h2>
<p>We received a request to reset your password. The link below works once and expires soon.</p>
<p><a href="${link}">Reset password</a></p>
<p>If you did not ask for this, no action is needed.</p>`
    ),
    text: `Hi ${params.username},\n\nReset your password: ${params.link}\n`,
  };
}
