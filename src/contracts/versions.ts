export const ENGINE_VERSION = '1.2.0' as const;
export const CONTRACT_VERSION = 'emissions-output-v1' as const;
