/**
 * Shared upgrade step for every proxy flavour
 *
 * Writes the implementation pointer and runs the optional post-upgrade call.
 * Both happen inside the caller's transaction, so a failing post-upgrade call
 * rolls the pointer back together with everything else.
 */

import type { Hex } from 'viem';
import { isZeroAddress, type Contract, type ExecutionContext, type Host } from './base';
import { revert } from './errors';
import { decodeAddress, encodeAddress } from './layout';
import type { ProxySlots } from './slots';

export const upgradeAbi = [
  {
    type: 'function',
    name: 'upgradeToAndCall',
    stateMutability: 'payable',
    inputs: [
      { name: 'newImplementation', type: 'address' },
      { name: 'data', type: 'bytes' },
    ],
    outputs: [],
  },
  {
    type: 'event',
    name: 'Upgraded',
    inputs: [{ name: 'implementation', type: 'address', indexed: true }],
  },
] as const;

/**
 * Resolve an address to deployed code, or fail with InvalidImplementation.
 */
export function requireCode(host: Host, address: string): Contract {
  if (isZeroAddress(address)) {
    revert('InvalidImplementation', 'implementation is the zero address');
  }
  return host.codeAt(address);
}

export function readImplementation(ctx: ExecutionContext, slots: ProxySlots): string {
  return decodeAddress(ctx.storage.sload(slots.implementation));
}

/**
 * Point `ctx.storage` at a new implementation and, when `data` is non-empty,
 * delegate one call with it to the new implementation.
 */
export function upgradeImplementation(
  host: Host,
  ctx: ExecutionContext,
  slots: ProxySlots,
  newImplementation: string,
  data: Hex,
): void {
  const code = requireCode(host, newImplementation);
  ctx.storage.sstore(slots.implementation, encodeAddress(code.address));
  host.events.emit('Upgraded', { implementation: code.address }, ctx.self);
  if (data !== '0x') {
    host.delegateCall(code, ctx, data);
  }
}
