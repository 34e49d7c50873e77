function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function welcomeEmail(firstName: string, username: string): { subject: string; html: string } {
  return {
    subject: 'Welcome to the church family',
    html: `
<!DOCTYPE html>
<html>
<head><meta charset="utf-8"></head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 480px; margin: 0 auto; padding: 24px; color: #1a1a1a;">
  <h2 style="margin: 0 0 16px; font-size: 20px;">Welcome, ${escapeHtml(firstName)}!</h2>
  <p style="margin: 0 0 8px; font-size: 15px;">
    Your membership record has been created. You can sign in with the username
    <strong>${escapeHtml(username)}</strong>.
  </p>
  <p style="margin: 0; font-size: 13px; color: #71717a;">
    If you did not expect this message, please contact the church office.
  </p>
</body>
</html>`.trim(),
  };
}

/** Plain-text notice as HTML; line breaks become `<br>`. */
export function communicationEmail(title: string, message: string): { subject: string; html: string } {
  return {
    subject: title,
    html: `<p style="font-size: 15px;">${escapeHtml(message).replace(/\r?\n/g, '<br>')}</p>`,
  };
}
