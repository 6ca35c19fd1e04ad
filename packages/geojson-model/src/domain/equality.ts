/**
 * Element-wise equality for the immutable lists the model is built from.
 */
export function listEquals<T>(
  left: readonly T[],
  right: readonly T[],
  equals: (a: T, b: T) => boolean
): boolean {
  if (left === right) return true;
  if (left.length !== right.length) return false;
  return left.every((item, index) => {
    const other = right[index];
    return other !== undefined && equals(item, other);
  });
}

export function nestedListEquals<T>(
  left: readonly (readonly T[])[],
  right: readonly (readonly T[])[],
  equals: (a: T, b: T) => boolean
): boolean {
  return listEquals(left, right, (a, b) => listEquals(a, b, equals));
}
