/**
 * Type Oracle - the only view of the type system flow analysis needs
 */

import type { Type } from './types.js';

export interface TypeOracle {
  /** Is `sub` a subtype of `sup`? Never throws. */
  isSubtype(sub: Type, sup: Type): boolean;
  /**
   * Type of the member `name` on a value of type `receiver`, if the
   * receiver declares one. Methods are returned as function types.
   */
  memberType?(receiver: Type, name: string): Type | undefined;
}
