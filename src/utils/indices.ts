/**
 * Index normalization shared by statement containers and sequences.
 *
 * Negative indices count from the end, so `-1` is the last element.
 *
 * @packageDocumentation
 */

/**
 * Resolves an index that must name an existing element.
 *
 * @param index - Possibly negative index.
 * @param length - Current number of elements.
 * @returns The equivalent non-negative index.
 * @throws RangeError if the index is not an integer or falls outside `[-length, length)`.
 */
export function resolveIndex(index: number, length: number): number {
  const resolved = index < 0 ? length + index : index;
  if (!Number.isInteger(index) || resolved < 0 || resolved >= length) {
    throw new RangeError(
      `Index ${String(index)} out of range for length ${String(length)}`
    );
  }
  return resolved;
}

/**
 * Resolves an insertion point. Inserting at `length` appends; a negative
 * index inserts before the element it names, as with `resolveIndex`.
 *
 * @param index - Possibly negative insertion point.
 * @param length - Current number of elements.
 * @returns The equivalent non-negative insertion point.
 * @throws RangeError if the index is not an integer or falls outside `[-length, length]`.
 */
export function resolveInsertIndex(index: number, length: number): number {
  const resolved = index < 0 ? length + index : index;
  if (!Number.isInteger(index) || resolved < 0 || resolved > length) {
    throw new RangeError(
      `Insertion index ${String(index)} out of range for length ${String(length)}`
    );
  }
  return resolved;
}
