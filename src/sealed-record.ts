import { SealedRecordViolation } from './errors.js';
import { ATTRIBUTE_PREFIX, MinionSelf, SEMIPRIVATE_KEY, SemiprivateHandle } from './types.js';

export function slotKey(attribute: string): `$${string}` {
  return `${ATTRIBUTE_PREFIX}${attribute}`;
}

export interface SealedRecord {
  self: MinionSelf;
  attachHandle(handle: SemiprivateHandle): void;
}

/**
 * Allocate a key-restricted state record.
 *
 * The only readable/writable keys are `$<attribute>` for each declared
 * attribute, plus the read-only `$$` semiprivate handle. Every other string
 * key, on read or write, raises SealedRecordViolation.
 */
export function createSealedRecord(attributes: readonly string[], className?: string): SealedRecord {
  const allowed = new Set<string>(attributes.map(slotKey));
  const target: MinionSelf = Object.create(null);

  for (const key of allowed) {
    Object.defineProperty(target, key, {
      value: undefined,
      writable: true,
      enumerable: true,
      configurable: true,
    });
  }

  const self = new Proxy<MinionSelf>(target, {
    get(record, key) {
      if (typeof key === 'symbol' || key === SEMIPRIVATE_KEY || allowed.has(key)) {
        return Reflect.get(record, key);
      }
      throw new SealedRecordViolation(key, 'access', className);
    },

    set(record, key, value) {
      if (typeof key === 'string' && allowed.has(key)) {
        return Reflect.set(record, key, value);
      }
      if (key === SEMIPRIVATE_KEY) {
        throw new SealedRecordViolation(key, 'modify', className);
      }
      throw new SealedRecordViolation(String(key), 'access', className);
    },

    has(_record, key) {
      return key === SEMIPRIVATE_KEY || (typeof key === 'string' && allowed.has(key));
    },

    deleteProperty(record, key) {
      if (typeof key === 'string' && allowed.has(key)) {
        return Reflect.set(record, key, undefined);
      }
      throw new SealedRecordViolation(String(key), key === SEMIPRIVATE_KEY ? 'delete' : 'access', className);
    },

    defineProperty(_record, key) {
      throw new SealedRecordViolation(String(key), 'modify', className);
    },

    setPrototypeOf() {
      return false;
    },
  });

  let attached = false;

  return {
    self,
    attachHandle(handle: SemiprivateHandle): void {
      if (attached) {
        throw new SealedRecordViolation(SEMIPRIVATE_KEY, 'modify', className);
      }
      Object.defineProperty(target, SEMIPRIVATE_KEY, {
        value: handle,
        writable: false,
        enumerable: false,
        configurable: false,
      });
      attached = true;
    },
  };
}
