export type Result<T, E extends Error = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends Error>(error: E): { success: false; error: E } {
  return { success: false, error };
}
