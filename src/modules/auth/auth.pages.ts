import { escapeHtml } from "../../shared/html.js";

/**
 * Minimal self-posting form for the password reset link sent by email.
 */
export function renderResetPasswordPage(params: { username: string; action: string }): string {
  const username = escapeHtml(params.username);
  const action = escapeHtml(params.action);

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Reset password</title>
</head>
<body>
  <h1>Reset password</h1>
  <p>Hi ${username}, choose a new password.</p>
  <form method="post" action="${action}">
    <label>New password <input type="password" name="password" minlength="6" required></label>
    <label>Confirm password <input type="password" name="confirm_password" minlength="6" required></label>
    <button type="submit">Reset password</button>
  </form>
</body>
</html>
`;
}
