/**
 * Test setup file.
 * Keeps engine logging off stderr unless a test turns it back on.
 */

import { setLogLevel } from '../../src/utils/log.js';

setLogLevel('silent');
