// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import * as chai from 'chai';
import sinonChai from 'sinon-chai';
import {resetForTest} from './test-container.js';

resetForTest();

chai.use(sinonChai);

chai.config.truncateThreshold = 0;
