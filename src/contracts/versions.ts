export const ENGINE_VERSION = '0.1.0' as const;
export const CONTRACT_VERSION = 'v1' as const;
