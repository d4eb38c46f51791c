/**
 * Storage slot allocation
 *
 * Ordinary fields take sequential slots from 0 in declaration order. Proxy
 * control data lives in reserved slots derived as keccak256(namespace) - 1,
 * far above anything sequential allocation reaches.
 */

import { keccak256, stringToHex, hexToBigInt, toHex } from 'viem';

/** Sequential allocation never reaches this bound. */
export const SEQUENTIAL_SLOT_LIMIT = 1n << 64n;

export function reservedSlot(namespace: string): bigint {
  return hexToBigInt(keccak256(stringToHex(namespace))) - 1n;
}

export function sequentialSlot(index: number | bigint): bigint {
  const slot = BigInt(index);
  if (slot < 0n) {
    throw new RangeError(`sequential slot index must be non-negative, got ${slot}`);
  }
  return slot;
}

export function isReservedRegion(slot: bigint): boolean {
  return slot >= SEQUENTIAL_SLOT_LIMIT;
}

export function slotToHex(slot: bigint): `0x${string}` {
  return toHex(slot, { size: 32 });
}

// bytes32(uint256(keccak256('eip1967.proxy.implementation')) - 1)
export const IMPLEMENTATION_SLOT = reservedSlot('eip1967.proxy.implementation');
// bytes32(uint256(keccak256('eip1967.proxy.admin')) - 1)
export const ADMIN_SLOT = reservedSlot('eip1967.proxy.admin');
export const INITIALIZABLE_SLOT = reservedSlot('proxy.initializable');
export const OWNER_SLOT = reservedSlot('proxy.ownable.owner');

/**
 * Where a proxy keeps its implementation and admin pointers.
 */
export interface ProxySlots {
  readonly implementation: bigint;
  readonly admin: bigint;
}

export const ERC1967_SLOTS: ProxySlots = {
  implementation: IMPLEMENTATION_SLOT,
  admin: ADMIN_SLOT,
};

/**
 * Control data placed at the first sequential slots. Only useful to show what
 * a storage collision does to a live proxy.
 */
export const NAIVE_SLOTS: ProxySlots = {
  implementation: sequentialSlot(0),
  admin: sequentialSlot(1),
};

export function controlSlots(slots: ProxySlots = ERC1967_SLOTS): bigint[] {
  return [slots.implementation, slots.admin, INITIALIZABLE_SLOT, OWNER_SLOT];
}
