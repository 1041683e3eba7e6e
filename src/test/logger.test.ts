import { Logger } from '../logger';

describe('Logger', () => {
  let warn: jest.SpyInstance;
  let log: jest.SpyInstance;
  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    log = jest.spyOn(console, 'log').mockImplementation(() => {});
  });
  afterEach(() => {
    warn.mockRestore();
    log.mockRestore();
  });
  it('should format level, context and data', () => {
    let logger = new Logger({ context: 'executor' });
    expect(logger.format('warn', 'Stopped', { rows: 3 }))
      .toBe('[warn] (executor) Stopped {"rows":3}');
    expect(new Logger().format('info', 'Ready')).toBe('[info] Ready');
  });
  it('should drop messages below its level', () => {
    let logger = new Logger({ level: 'warn' });
    logger.debug('hidden');
    logger.warn('shown');
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[warn] shown');
  });
  it('should print nothing when silent', () => {
    let logger = new Logger({ level: 'debug', silent: true });
    logger.debug('a');
    logger.warn('b');
    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });
  it('should nest child contexts', () => {
    let child = new Logger({ level: 'debug', context: 'engine' })
      .child('planner');
    expect(child.context).toBe('engine:planner');
    expect(child.level).toBe('debug');
    child.debug('Planned');
    expect(log).toHaveBeenCalledWith('[debug] (engine:planner) Planned');
  });
});
