import { expect } from 'chai';
import { describe, it, afterEach } from 'mocha';
import sinon from 'sinon';
import { isLogLevel, Logger } from '../lib/logger';

describe('Logger', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('should format level, message and metadata', () => {
    const line = new Logger().format('info', 'SSH connection established', {
      host: 'test-host',
    });

    expect(line).to.match(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] /);
    expect(line).to.include('[INFO]');
    expect(line.endsWith(' SSH connection established {"host":"test-host"}')).to.equal(true);
  });

  it('should drop messages below the threshold', () => {
    const write = sinon.stub(console, 'error');
    const logger = new Logger('warn');

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(write.callCount).to.equal(2);
  });

  it('should switch level at runtime', () => {
    const write = sinon.stub(console, 'error');
    const logger = new Logger('info');

    logger.debug('hidden');
    logger.setLevel('debug');
    logger.debug('shown');

    expect(write.callCount).to.equal(1);
    expect(logger.getLevel()).to.equal('debug');
  });

  it('should recognise level names only', () => {
    expect(isLogLevel('debug')).to.equal(true);
    expect(isLogLevel('toString')).to.equal(false);
    expect(isLogLevel(undefined)).to.equal(false);
  });
});
