import type { RabRefreshService } from '../src/services/rabRefreshService';
import { RefreshInProgressError } from '../src/services/rabRefreshService';
import { RefreshScheduler } from '../src/services/refreshScheduler';

type RefreshFn = RabRefreshService['refresh'];

describe('RefreshScheduler', () => {
  const createLogger = () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  });

  const createService = (refresh: jest.Mock<ReturnType<RefreshFn>, Parameters<RefreshFn>>) => ({
    refresh,
  });

  const flushPromises = async () => {
    for (let i = 0; i < 5; i += 1) {
      await Promise.resolve();
    }
  };

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('triggers scheduled refreshes at the configured interval', async () => {
    const refreshMock = jest.fn<ReturnType<RefreshFn>, Parameters<RefreshFn>>();
    const logger = createLogger();
    const scheduler = new RefreshScheduler({
      service: createService(refreshMock),
      intervalMinutes: 2,
      enabled: true,
      logger,
    });

    scheduler.start();

    expect(scheduler.isActive()).toBe(true);
    expect(refreshMock).not.toHaveBeenCalled();

    jest.advanceTimersByTime(2 * 60 * 1000);
    await flushPromises();

    expect(refreshMock).toHaveBeenCalledWith('scheduled', { update: true });
    expect(logger.info).toHaveBeenCalledWith('[RAB Scheduler] Completed scheduled RAB refresh');

    scheduler.stop();
  });

  it('runs a cached refresh at startup when immediate is set', async () => {
    const refreshMock = jest.fn<ReturnType<RefreshFn>, Parameters<RefreshFn>>();
    const scheduler = new RefreshScheduler({
      service: createService(refreshMock),
      intervalMinutes: 60,
      enabled: true,
      logger: createLogger(),
      immediate: true,
    });

    scheduler.start();
    await flushPromises();

    expect(refreshMock).toHaveBeenCalledTimes(1);
    expect(refreshMock).toHaveBeenCalledWith('scheduled', { update: false });

    scheduler.stop();
  });

  it('logs a warning when a refresh is already in progress', async () => {
    const refreshMock = jest
      .fn<ReturnType<RefreshFn>, Parameters<RefreshFn>>()
      .mockRejectedValueOnce(new RefreshInProgressError());
    const logger = createLogger();
    const scheduler = new RefreshScheduler({
      service: createService(refreshMock),
      intervalMinutes: 1,
      enabled: true,
      logger,
    });

    scheduler.start();

    jest.advanceTimersByTime(60 * 1000);
    await flushPromises();

    expect(logger.warn).toHaveBeenCalledWith(
      '[RAB Scheduler] Refresh already in progress, skipping scheduled run',
    );

    jest.advanceTimersByTime(60 * 1000);
    await flushPromises();

    expect(logger.error).not.toHaveBeenCalled();
    expect(refreshMock).toHaveBeenCalledTimes(2);

    scheduler.stop();
  });

  it('logs errors from refresh failures', async () => {
    const refreshMock = jest
      .fn<ReturnType<RefreshFn>, Parameters<RefreshFn>>()
      .mockRejectedValue(new Error('network failure'));
    const logger = createLogger();
    const scheduler = new RefreshScheduler({
      service: createService(refreshMock),
      intervalMinutes: 1,
      enabled: true,
      logger,
    });

    scheduler.start();

    jest.advanceTimersByTime(60 * 1000);
    await flushPromises();

    expect(logger.error).toHaveBeenCalledWith(
      '[RAB Scheduler] Scheduled refresh failed',
      expect.any(Error),
    );

    scheduler.stop();
  });

  it('does nothing when disabled', () => {
    const refreshMock = jest.fn<ReturnType<RefreshFn>, Parameters<RefreshFn>>();
    const logger = createLogger();
    const scheduler = new RefreshScheduler({
      service: createService(refreshMock),
      intervalMinutes: 1,
      enabled: false,
      logger,
      immediate: true,
    });

    scheduler.start();

    expect(scheduler.isActive()).toBe(false);
    expect(logger.info).toHaveBeenCalledWith('[RAB Scheduler] Scheduler disabled via configuration');
    expect(refreshMock).not.toHaveBeenCalled();
  });

  it('can be stopped and prevents future triggers', async () => {
    const refreshMock = jest.fn<ReturnType<RefreshFn>, Parameters<RefreshFn>>();
    const logger = createLogger();
    const scheduler = new RefreshScheduler({
      service: createService(refreshMock),
      intervalMinutes: 1,
      enabled: true,
      logger,
    });

    scheduler.start();
    scheduler.stop();

    expect(scheduler.isActive()).toBe(false);
    expect(logger.info).toHaveBeenCalledWith('[RAB Scheduler] Stopped dataset refresh scheduler');

    jest.advanceTimersByTime(5 * 60 * 1000);
    await flushPromises();

    expect(refreshMock).not.toHaveBeenCalled();
  });
});
