import { Logger } from '../../src/core/logger';

describe('Logger', () => {
  const previous = process.env.LOG_LEVEL;

  afterEach(() => {
    process.env.LOG_LEVEL = previous;
    jest.restoreAllMocks();
  });

  it('writes context-labelled lines at or above the threshold', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = new Logger('AccountPipeline');
    logger.info('hidden');
    logger.warn('1234567890: login failed (timeout)');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN \] \[AccountPipeline\] 1234567890: login failed \(timeout\)$/,
    );
  });

  it('prints the error object after an error line', () => {
    process.env.LOG_LEVEL = 'info';
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const cause = new Error('insert failed');

    new Logger('OutcomeLogger').error('Failed to record', cause);

    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[1][0]).toBe(cause);
  });

  it('prints nothing when silent', () => {
    process.env.LOG_LEVEL = 'silent';
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    new Logger('Orchestrator').error('crashed', new Error('boom'));

    expect(error).not.toHaveBeenCalled();
  });
});
