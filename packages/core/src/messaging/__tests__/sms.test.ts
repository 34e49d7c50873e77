import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getConfig, resetConfig } from '../../config';
import type { AppConfig } from '../../config';
import {
  normalizePhone,
  HubtelProvider,
  TextMeProvider,
  GenericHttpProvider,
  createSmsProvider,
  SmsGateway,
} from '../sms';

function configFor(env: Record<string, string>): AppConfig {
  resetConfig();
  for (const key of ['SMS_PROVIDER', 'SMS_API_URL', 'SMS_API_KEY', 'SMS_API_SECRET', 'SMS_SENDER_ID']) {
    delete process.env[key];
  }
  Object.assign(process.env, env);
  return getConfig();
}

const ORIGINAL_ENV = { ...process.env };

describe('normalizePhone', () => {
  it('converts local numbers to the 233 prefix', () => {
    expect(normalizePhone('024 123 4567')).toBe('233241234567');
  });

  it('strips formatting from international numbers', () => {
    expect(normalizePhone('+233 (24) 123-4567')).toBe('233241234567');
  });

  it('leaves other lengths as digits only', () => {
    expect(normalizePhone('12-34')).toBe('1234');
  });
});

describe('SMS providers', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    process.env = { ...ORIGINAL_ENV };
    resetConfig();
  });

  it('posts a form to Hubtel with client credentials', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{}', { status: 201 }));
    const provider = new HubtelProvider(configFor({ SMS_API_KEY: 'test-id', SMS_API_SECRET: 'test-secret' }));

    expect(await provider.send('0241234567', 'Hello')).toBe(true);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://smsc.hubtel.com/v1/messages/send');
    expect(init.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
    expect(init.body).toBe('from=CHURCH&to=233241234567&content=Hello&clientid=test-id&clientsecret=test-secret');
    expect(provider.lastError).toBeNull();
  });

  it('rejects non-Ghana numbers for Hubtel without calling the API', async () => {
    const provider = new HubtelProvider(configFor({}));

    expect(await provider.send('12345', 'Hello')).toBe(false);
    expect(provider.lastError).toBe('Invalid Ghana phone number: 12345');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('records the status and body when TextMe refuses', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad key', { status: 401 }));
    const provider = new TextMeProvider(configFor({ SMS_API_KEY: 'test-key' }));

    expect(await provider.send('0241234567', 'Hi')).toBe(false);
    expect(provider.lastError).toBe('TextMe failed | Code: 401 | Response: bad key');
    expect(fetchMock.mock.calls[0][1].body).toBe('to=233241234567&message=Hi&sender_id=CHURCH&api_key=test-key');
  });

  it('requires a URL for the generic provider', async () => {
    const provider = new GenericHttpProvider(configFor({}));

    expect(await provider.send('0241234567', 'Hi')).toBe(false);
    expect(provider.lastError).toBe('SMS_API_URL not configured');
  });

  it('posts JSON with a bearer token for the generic provider', async () => {
    fetchMock.mockResolvedValueOnce(new Response('ok', { status: 200 }));
    const provider = new GenericHttpProvider(
      configFor({ SMS_API_URL: 'https://sms.example.test/send', SMS_API_KEY: 'test-key', SMS_SENDER_ID: 'GRACE' }),
    );

    expect(await provider.send('0241234567', 'Hi')).toBe(true);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://sms.example.test/send');
    expect(init.headers.Authorization).toBe('Bearer test-key');
    expect(JSON.parse(init.body)).toEqual({ to: '233241234567', message: 'Hi', sender: 'GRACE' });
  });

  it('captures network errors', async () => {
    fetchMock.mockRejectedValueOnce(new Error('connection reset'));
    const provider = new GenericHttpProvider(configFor({ SMS_API_URL: 'https://sms.example.test/send' }));

    expect(await provider.send('0241234567', 'Hi')).toBe(false);
    expect(provider.lastError).toBe('Generic SMS failed | Error: connection reset');
  });

  it('picks the provider from SMS_PROVIDER', () => {
    expect(createSmsProvider(configFor({ SMS_PROVIDER: 'hubtel' })).name).toBe('Hubtel');
    expect(createSmsProvider(configFor({ SMS_PROVIDER: 'textme' })).name).toBe('TextMe');
    expect(createSmsProvider(configFor({})).name).toBe('Generic SMS');
  });

  it('counts sent and failed messages in bulk', async () => {
    fetchMock.mockResolvedValue(new Response('{}', { status: 200 }));
    const gateway = new SmsGateway(new HubtelProvider(configFor({})));

    const result = await gateway.sendBulk(['0241234567', '999', '0209876543'], 'Service at 9am');

    expect(result).toEqual({ sent: 2, failed: 1 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
