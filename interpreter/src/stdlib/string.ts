/**
 * Standard library: string comparison.
 */

import { PrimitiveTable } from '../values';
import { boolBinop, unpackStr } from '../builtins';

export const stringPrimitives: PrimitiveTable = {
  'string=?': boolBinop(unpackStr, (a, b) => a === b),
  'string<?': boolBinop(unpackStr, (a, b) => a < b),
  'string>?': boolBinop(unpackStr, (a, b) => a > b),
  'string<=?': boolBinop(unpackStr, (a, b) => a <= b),
  'string>=?': boolBinop(unpackStr, (a, b) => a >= b),
};
