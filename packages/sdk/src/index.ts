export { INSTRUMENT_BUS_VERSION } from 'instrument-bus';
export { BusModule } from './bus-module.js';
export type { BusModuleOptions, MessageSender } from './bus-module.js';
export { ModuleHost, STARTUP_SEQUENCE, CLOSE_EVENT } from './module-host.js';
export type { ModuleHostOptions, StatusHandler, FatalErrorHandler, ConfigureData } from './module-host.js';
export { resolveHostConfig, DIAGNOSTICS_ENV } from './host-config.js';
export type { HostConfig, DiagnosticsMode } from './host-config.js';
