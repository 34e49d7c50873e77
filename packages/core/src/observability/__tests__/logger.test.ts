import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, setLogLevel, serializeError } from '../logger';
import { AppError } from '@shepherd/shared';
import { requestContext } from '../../auth/context';
import { createTestContext, TEST_USER_ID } from '../../testing/context';

function captureOutput() {
  return {
    stdout: vi.spyOn(process.stdout, 'write').mockImplementation(() => true),
    stderr: vi.spyOn(process.stderr, 'write').mockImplementation(() => true),
  };
}

describe('logger', () => {
  beforeEach(() => {
    setLogLevel('info');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes info lines as JSON to stdout', () => {
    const { stdout } = captureOutput();
    logger.info('member registered', { requestId: 'req-1', userId: 'u-1' });

    expect(stdout).toHaveBeenCalledOnce();
    const line = String(stdout.mock.calls[0]?.[0]);
    const entry = JSON.parse(line);
    expect(entry).toMatchObject({
      level: 'info',
      message: 'member registered',
      requestId: 'req-1',
      userId: 'u-1',
    });
    expect(line.endsWith('\n')).toBe(true);
  });

  it('writes errors to stderr', () => {
    const { stdout, stderr } = captureOutput();
    logger.error('insert failed');
    expect(stderr).toHaveBeenCalledOnce();
    expect(stdout).not.toHaveBeenCalled();
  });

  it('drops entries below the minimum level', () => {
    const { stdout } = captureOutput();
    logger.debug('noisy');
    expect(stdout).not.toHaveBeenCalled();

    setLogLevel('debug');
    logger.debug('noisy');
    expect(stdout).toHaveBeenCalledOnce();
  });

  it('picks up the request context', () => {
    const { stdout } = captureOutput();
    requestContext.run(createTestContext({ branchId: 'branch-1' }), () => {
      logger.info('budget submitted');
    });

    const entry = JSON.parse(String(stdout.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ requestId: 'req-1', userId: TEST_USER_ID, branchId: 'branch-1' });
  });

  it('lets explicit fields win over the context', () => {
    const { stdout } = captureOutput();
    requestContext.run(createTestContext(), () => {
      logger.info('request', { requestId: 'req-9' });
    });

    expect(JSON.parse(String(stdout.mock.calls[0]?.[0])).requestId).toBe('req-9');
  });

  it('redacts credentials', () => {
    const { stdout } = captureOutput();
    logger.warn('login payload', { username: 'admin', password: 'test-secret', refreshToken: 'tok' });

    const entry = JSON.parse(String(stdout.mock.calls[0]?.[0]));
    expect(entry.username).toBe('admin');
    expect(entry.password).toBe('[redacted]');
    expect(entry.refreshToken).toBe('[redacted]');
  });

  it('serializes AppErrors with their code', () => {
    const serialized = serializeError(new AppError('CONFLICT', 'Username already exists', 409));
    expect(serialized.code).toBe('CONFLICT');
    expect(serialized.message).toBe('Username already exists');
  });

  it('serializes non-errors as strings', () => {
    expect(serializeError(42)).toEqual({ message: '42' });
  });
});
