export type { ModuleRef } from './module.js';
