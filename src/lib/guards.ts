export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isPresent = <T>(value: T | null | undefined): value is T =>
  value !== null && value !== undefined;
