/**
 * Anything that can appear as the source of a message.
 * Messages borrow the reference; they never control the module's lifetime.
 */
export interface ModuleRef {
  readonly moduleName: string;
}
