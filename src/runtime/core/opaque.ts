/**
 * Opaque Values
 *
 * Type-erased handles exchanged with the template engine. The engine
 * captures arguments at parse time without knowing their static type;
 * the binding adapter downcasts them back to template values.
 */

import { deepEquals } from './equals.js';
import { fromNative, isTemplateValue, type TemplateValue } from './values.js';

export class OpaqueValue {
  private constructor(private readonly payload: unknown) {}

  /** Hold a template value */
  static wrap(value: TemplateValue): OpaqueValue {
    return new OpaqueValue(value);
  }

  /**
   * Hold an arbitrary payload. Engines that carry their own
   * representations use this; downcast() fails for non-template payloads.
   */
  static erase(payload: unknown): OpaqueValue {
    return new OpaqueValue(payload);
  }

  /** The held template value, or undefined if the payload is not one */
  downcast(): TemplateValue | undefined {
    return isTemplateValue(this.payload) ? this.payload : undefined;
  }

  /** Structural equality when both hold template values */
  equals(other: OpaqueValue): boolean {
    const a = this.downcast();
    const b = other.downcast();
    if (a === undefined || b === undefined) {
      return this.payload === other.payload;
    }
    return deepEquals(a, b);
  }
}

/** Ordered, fixed-length arguments of one call */
export type ArgumentList = readonly OpaqueValue[];

/** Build an argument list from plain JavaScript data */
export function argumentList(...values: unknown[]): ArgumentList {
  return Object.freeze(values.map((value) => OpaqueValue.wrap(fromNative(value))));
}
