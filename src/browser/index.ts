/**
 * Browser module.
 * Supervised browser process plus one automation session, reached only
 * through SerialSession.
 */

export { connectBrowser } from './connect.js';
export type { BrowserConnection, ConnectOptions, Connector } from './connect.js';
export { launchDriver, driverArgs } from './driver.js';
export type { DriverChild, DriverOptions, DriverProcess, SpawnDriver } from './driver.js';
export { ConnectError } from './errors.js';
export type { ConnectStage } from './errors.js';
export { attachSession, createPlaywrightSession } from './playwrightSession.js';
export { SerialSession } from './serialSession.js';
export type { AutomationSession, SessionElement } from './session.js';
