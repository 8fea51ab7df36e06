export type DiagnosticsMode = 'console' | 'silent';

export interface HostConfig {
  /** Where level 1 message lifecycle events go */
  diagnostics: DiagnosticsMode;
}

export const DIAGNOSTICS_ENV = 'INSTRUMENT_BUS_DIAGNOSTICS';

const DEFAULT_HOST_CONFIG: HostConfig = {
  diagnostics: 'silent',
};

/** Read host settings from the environment. Unknown values fall back to defaults. */
export function resolveHostConfig(env: Record<string, string | undefined> = process.env): HostConfig {
  const diagnostics = env[DIAGNOSTICS_ENV]?.trim().toLowerCase();
  return {
    diagnostics:
      diagnostics === 'console' || diagnostics === 'silent' ? diagnostics : DEFAULT_HOST_CONFIG.diagnostics,
  };
}
