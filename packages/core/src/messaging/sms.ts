/**
 * SMS delivery. The provider is picked by SMS_PROVIDER; every provider
 * reports failure as `false` and keeps the reason in `lastError`.
 */
import { getConfig } from '../config';
import type { AppConfig } from '../config';
import { logger, serializeError } from '../observability/logger';

const REQUEST_TIMEOUT_MS = 15_000;

export interface SmsProvider {
  readonly name: string;
  readonly lastError: string | null;
  send(to: string, message: string): Promise<boolean>;
}

/** Digits only; a local 10-digit number starting with 0 becomes 233 + the last 9 digits. */
export function normalizePhone(phone: string): string {
  const digits = phone.replace(/\D/g, '');
  if (digits.length === 10 && digits.startsWith('0')) {
    return `233${digits.slice(1)}`;
  }
  return digits;
}

abstract class BaseSmsProvider implements SmsProvider {
  abstract readonly name: string;
  protected _lastError: string | null = null;

  constructor(protected readonly config: AppConfig) {}

  get lastError(): string | null {
    return this._lastError;
  }

  abstract send(to: string, message: string): Promise<boolean>;

  protected async post(url: string, init: { headers: Record<string, string>; body: string }): Promise<boolean> {
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: init.headers,
        body: init.body,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
      if (res.ok) {
        this._lastError = null;
        return true;
      }
      const body = await res.text().catch(() => '');
      this._lastError = `${this.name} failed | Code: ${res.status} | Response: ${body.slice(0, 200)}`;
      return false;
    } catch (error) {
      this._lastError = `${this.name} failed | Error: ${serializeError(error).message}`;
      return false;
    }
  }
}

export class HubtelProvider extends BaseSmsProvider {
  readonly name = 'Hubtel';

  async send(to: string, message: string): Promise<boolean> {
    const phone = normalizePhone(to);
    if (phone.length !== 12 || !phone.startsWith('233')) {
      this._lastError = `Invalid Ghana phone number: ${phone}`;
      return false;
    }

    const form = new URLSearchParams({
      from: this.config.SMS_SENDER_ID,
      to: phone,
      content: message,
      clientid: this.config.SMS_API_KEY ?? '',
      clientsecret: this.config.SMS_API_SECRET ?? '',
    });
    return this.post(this.config.SMS_API_URL ?? 'https://smsc.hubtel.com/v1/messages/send', {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    });
  }
}

export class TextMeProvider extends BaseSmsProvider {
  readonly name = 'TextMe';

  async send(to: string, message: string): Promise<boolean> {
    const form = new URLSearchParams({
      to: normalizePhone(to),
      message,
      sender_id: this.config.SMS_SENDER_ID,
      api_key: this.config.SMS_API_KEY ?? '',
    });
    return this.post(this.config.SMS_API_URL ?? 'https://api.textme.com.gh/sms/send', {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    });
  }
}

/** JSON `{ to, message, sender }` to SMS_API_URL, bearer SMS_API_KEY when set. */
export class GenericHttpProvider extends BaseSmsProvider {
  readonly name = 'Generic SMS';

  async send(to: string, message: string): Promise<boolean> {
    const url = this.config.SMS_API_URL;
    if (!url) {
      this._lastError = 'SMS_API_URL not configured';
      return false;
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.SMS_API_KEY) {
      headers.Authorization = `Bearer ${this.config.SMS_API_KEY}`;
    }
    return this.post(url, {
      headers,
      body: JSON.stringify({ to: normalizePhone(to), message, sender: this.config.SMS_SENDER_ID }),
    });
  }
}

export function createSmsProvider(config: AppConfig = getConfig()): SmsProvider {
  switch (config.SMS_PROVIDER) {
    case 'hubtel':
      return new HubtelProvider(config);
    case 'textme':
      return new TextMeProvider(config);
    case 'generic':
      return new GenericHttpProvider(config);
  }
}

export class SmsGateway {
  constructor(private readonly provider: SmsProvider) {}

  get lastError(): string | null {
    return this.provider.lastError;
  }

  async send(to: string, message: string): Promise<boolean> {
    const sent = await this.provider.send(to, message);
    if (!sent) {
      logger.error('SMS delivery failed', { provider: this.provider.name, reason: this.provider.lastError });
    }
    return sent;
  }

  /** Sends one at a time so `lastError` always belongs to the number that failed. */
  async sendBulk(numbers: string[], message: string): Promise<{ sent: number; failed: number }> {
    let sent = 0;
    let failed = 0;
    for (const number of numbers) {
      if (await this.send(number, message)) {
        sent++;
      } else {
        failed++;
      }
    }
    return { sent, failed };
  }
}

let gateway: SmsGateway | null = null;

export function getSmsGateway(): SmsGateway {
  if (!gateway) {
    gateway = new SmsGateway(createSmsProvider());
  }
  return gateway;
}

export function setSmsGateway(next: SmsGateway | null): void {
  gateway = next;
}
