/** Recursively freezes plain objects and arrays. */
export const deepFreeze = <T>(value: T): T => {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  Object.values(value).forEach((child) => {
    deepFreeze(child);
  });
  Object.freeze(value);
  return value;
};
