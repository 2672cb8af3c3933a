/**
 * @module db/values
 * Maps raw driver values onto the closed `CellValue` variant.
 */

import { CellValue } from './session';

/**
 * Classifies a value decoded by the driver.
 *
 * `mssql` decodes datetime types to `Date`, binary types to `Buffer`,
 * bigint to string, bit to boolean and the rest to string or number.
 * Anything else (UDTs, driver-specific objects) is shown through `String()`.
 */
export function ClassifyValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return { Kind: 'null' };
  }
  if (value instanceof Date) {
    return { Kind: 'timestamp', Value: value };
  }
  if (value instanceof Uint8Array) {
    return { Kind: 'binary', Value: value };
  }
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return { Kind: 'scalar', Value: value };
    default:
      return { Kind: 'scalar', Value: String(value) };
  }
}
