import { distance } from "fastest-levenshtein";

export const collapseWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

/**
 * `1 - levenshtein / maxLength` over whitespace-collapsed strings, in `[0, 1]`.
 * Both sides are expected to be collapsed already.
 */
export const similarity = (left: string, right: string): number => {
  if (left === right) return 1;
  const maxLength = Math.max(left.length, right.length);
  if (maxLength === 0) return 1;
  return 1 - distance(left, right) / maxLength;
};

/**
 * Upper bound on `similarity` from lengths alone: the edit distance is at least
 * the length difference.
 */
export const similarityCeiling = (leftLength: number, rightLength: number): number => {
  const maxLength = Math.max(leftLength, rightLength);
  if (maxLength === 0) return 1;
  return 1 - Math.abs(leftLength - rightLength) / maxLength;
};
