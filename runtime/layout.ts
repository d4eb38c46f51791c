/**
 * Storage layout descriptors
 *
 * A layout is the ordered list of business fields an implementation version
 * declares. Fields take sequential slots in order; a gap reserves `length`
 * slots for fields a later version appends. Layout checks here are static:
 * they run against descriptors, never against live storage.
 */

import { toHex } from 'viem';
import { revert } from './errors';
import { sequentialSlot, slotToHex } from './slots';
import { ADDRESS_ZERO, normalizeAddress } from './base';

export type ValueType = 'uint256' | 'address' | 'bool';

export type FieldDescriptor =
  | { readonly label: string; readonly type: ValueType }
  | { readonly label: string; readonly type: 'gap'; readonly length: number };

export interface AllocatedField {
  readonly label: string;
  readonly type: ValueType | 'gap';
  readonly slot: bigint;
  readonly slots: number;
}

export class StorageLayout {
  readonly fields: readonly AllocatedField[];
  readonly size: number;
  private readonly byLabel: ReadonlyMap<string, AllocatedField>;

  constructor(readonly name: string, descriptors: readonly FieldDescriptor[]) {
    const fields: AllocatedField[] = [];
    const byLabel = new Map<string, AllocatedField>();
    let next = 0;
    for (const descriptor of descriptors) {
      if (byLabel.has(descriptor.label)) {
        throw new Error(`${name}: duplicate field '${descriptor.label}'`);
      }
      const slots = descriptor.type === 'gap' ? descriptor.length : 1;
      if (!Number.isInteger(slots) || slots <= 0) {
        throw new Error(`${name}: gap '${descriptor.label}' must reserve at least one slot`);
      }
      const field: AllocatedField = {
        label: descriptor.label,
        type: descriptor.type,
        slot: sequentialSlot(next),
        slots,
      };
      fields.push(field);
      byLabel.set(field.label, field);
      next += slots;
    }
    this.fields = fields;
    this.size = next;
    this.byLabel = byLabel;
  }

  slotOf(label: string): bigint {
    const field = this.byLabel.get(label);
    if (!field || field.type === 'gap') {
      revert('UnknownField', `${this.name}.${label}`);
    }
    return field.slot;
  }

  /**
   * Every sequential slot this layout can touch, gaps included
   */
  *occupiedSlots(): Generator<bigint> {
    for (const field of this.fields) {
      for (let i = 0; i < field.slots; i++) {
        yield field.slot + BigInt(i);
      }
    }
  }

  get trailingGap(): AllocatedField | undefined {
    const last = this.fields[this.fields.length - 1];
    return last?.type === 'gap' ? last : undefined;
  }

  /** Non-gap fields in declaration order */
  get dataFields(): AllocatedField[] {
    return this.fields.filter(f => f.type !== 'gap');
  }
}

export function defineLayout(name: string, fields: readonly FieldDescriptor[]): StorageLayout {
  return new StorageLayout(name, fields);
}

/**
 * Throws StorageCollision when a reserved control slot falls on a slot the
 * layout allocates sequentially.
 */
export function assertDisjoint(layout: StorageLayout, reserved: readonly bigint[]): void {
  const wanted = new Set(reserved);
  for (const slot of layout.occupiedSlots()) {
    if (wanted.has(slot)) {
      const owner = layout.fields.find(f => slot >= f.slot && slot < f.slot + BigInt(f.slots));
      revert('StorageCollision', `${layout.name}.${owner?.label ?? '?'} shares slot ${slotToHex(slot)} with proxy control data`);
    }
  }
}

/**
 * Append-only rule between consecutive versions. Previous data fields must be
 * a prefix of the next version's data fields (same label, type and slot).
 * When both versions end in a gap, the total footprint must not change.
 */
export function assertUpgradeCompatible(previous: StorageLayout, next: StorageLayout): void {
  const before = previous.dataFields;
  const after = next.dataFields;
  for (let i = 0; i < before.length; i++) {
    const old = before[i];
    const cur = after[i];
    if (!cur) {
      revert('IncompatibleStorageLayout', `${next.name} drops field '${old.label}'`);
    }
    if (cur.label !== old.label || cur.type !== old.type || cur.slot !== old.slot) {
      revert(
        'IncompatibleStorageLayout',
        `${next.name} declares '${cur.label}: ${cur.type}' at slot ${cur.slot}, ` +
          `${previous.name} had '${old.label}: ${old.type}' at slot ${old.slot}`,
      );
    }
  }

  if (previous.trailingGap && next.trailingGap && previous.size !== next.size) {
    revert(
      'IncompatibleStorageLayout',
      `${next.name} occupies ${next.size} slots, ${previous.name} occupied ${previous.size}; resize the gap`,
    );
  }
}

/**
 * Checks a whole upgrade path, oldest version first.
 */
export function assertUpgradePath(versions: readonly StorageLayout[], reserved: readonly bigint[]): void {
  versions.forEach((layout, i) => {
    assertDisjoint(layout, reserved);
    if (i > 0) {
      assertUpgradeCompatible(versions[i - 1], layout);
    }
  });
}

// =============================================================================
// VALUE CODECS
// =============================================================================

export function encodeAddress(addr: string): bigint {
  return BigInt(normalizeAddress(addr));
}

export function decodeAddress(word: bigint): string {
  return word === 0n ? ADDRESS_ZERO : toHex(word & ((1n << 160n) - 1n), { size: 20 });
}

export function encodeBool(value: boolean): bigint {
  return value ? 1n : 0n;
}

export function decodeBool(word: bigint): boolean {
  return word !== 0n;
}
