// SPDX-License-Identifier: Apache-2.0

import 'sinon-chai';

import {type SinonStub} from 'sinon';
import sinon from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach, beforeEach} from 'mocha';

import {type LogMeta, type SettingsLogger} from '../../../src/core/logging/settings-logger.js';
import winston from 'winston';
import {SettingsWinstonLogger} from '../../../src/core/logging/settings-winston-logger.js';

describe('Logging', () => {
  let logger: SettingsLogger;
  let loggerStub: SinonStub;

  beforeEach(() => {
    logger = new SettingsWinstonLogger('debug', '');
    loggerStub = sinon.stub(winston.Logger.prototype, 'log');
  });

  // Cleanup after each test
  afterEach(() => sinon.restore());

  it('should log at correct severity', () => {
    expect(logger).to.be.instanceof(SettingsWinstonLogger);
    const meta: LogMeta = logger.prepMeta();

    logger.error('Error log');
    expect(loggerStub).to.have.been.calledWith('error', 'Error log', meta);

    logger.warn('Warn log');
    expect(loggerStub).to.have.been.calledWith('warn', 'Warn log', meta);

    logger.info('Info log');
    expect(loggerStub).to.have.been.calledWith('info', 'Info log', meta);

    logger.debug('Debug log');
    expect(loggerStub).to.have.been.calledWith('debug', 'Debug log', meta);
  });

  it('should attach a new trace id after nextTraceId', () => {
    const before: unknown = logger.prepMeta().traceId;
    logger.nextTraceId();
    const after: unknown = logger.prepMeta().traceId;

    expect(before).to.be.a('string');
    expect(after).to.be.a('string');
    expect(after).to.not.equal(before);
  });

  it('should keep metadata passed to prepMeta', () => {
    expect(logger.prepMeta({key: 'multi'})).to.have.property('key', 'multi');
  });
});
