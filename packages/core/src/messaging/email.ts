/**
 * Outbound e-mail through the Resend HTTP API.
 * Without RESEND_API_KEY the message is only logged (development).
 */
import { getConfig } from '../config';
import { logger, serializeError } from '../observability/logger';

const RESEND_API_URL = 'https://api.resend.com/emails';
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export async function sendEmail(to: string, subject: string, html: string): Promise<boolean> {
  if (!EMAIL_PATTERN.test(to)) {
    logger.warn('Email not sent: invalid recipient', { to, subject });
    return false;
  }

  const { RESEND_API_KEY: apiKey, EMAIL_FROM: from } = getConfig();
  if (!apiKey) {
    logger.info('Email (no RESEND_API_KEY configured)', { to, subject });
    return true;
  }

  try {
    const res = await fetch(RESEND_API_URL, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ from, to: [to], subject, html }),
      signal: AbortSignal.timeout(15_000),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => '(no body)');
      logger.error('Resend API error', { status: res.status, body: body.slice(0, 200), to, subject });
      return false;
    }
    return true;
  } catch (error) {
    logger.error('Email send failed', { to, subject, error: serializeError(error) });
    return false;
  }
}
