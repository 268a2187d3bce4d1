// src/utils/pick.ts

/**
 * Copies the listed own properties that are present and not `undefined`.
 * Used to turn optional query DTO fields into store filters without
 * leaking `undefined` keys.
 */
const pick = <T extends object, K extends keyof T>(object: T | null | undefined, keys: readonly K[]): Partial<Pick<T, K>> => {
  const picked: Partial<Pick<T, K>> = {};
  if (object === null || object === undefined) {
    return picked;
  }

  for (const key of keys) {
    if (Object.prototype.hasOwnProperty.call(object, key) && object[key] !== undefined) {
      picked[key] = object[key];
    }
  }
  return picked;
};

export default pick;
