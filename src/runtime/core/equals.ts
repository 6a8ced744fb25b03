/**
 * Template Value Structural Equality
 *
 * Arrays compare element-wise in order; maps compare as unordered
 * key/value sets. Variants never compare equal across kinds, so
 * int(1) and float(1) differ.
 */

import type { TemplateValue } from './values.js';

export function deepEquals(a: TemplateValue, b: TemplateValue): boolean {
  if (a === b) return true;
  if (a.kind !== b.kind) return false;

  switch (a.kind) {
    case 'nil':
      return true;
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return 'value' in b && a.value === b.value;
    case 'array': {
      if (b.kind !== 'array') return false;
      if (a.elements.length !== b.elements.length) return false;
      for (let i = 0; i < a.elements.length; i++) {
        const aElem = a.elements[i];
        const bElem = b.elements[i];
        if (aElem === undefined || bElem === undefined) return false;
        if (!deepEquals(aElem, bElem)) return false;
      }
      return true;
    }
    case 'map': {
      if (b.kind !== 'map') return false;
      if (a.entries.size !== b.entries.size) return false;
      for (const [key, aVal] of a.entries) {
        const bVal = b.entries.get(key);
        if (bVal === undefined || !deepEquals(aVal, bVal)) return false;
      }
      return true;
    }
  }
}
