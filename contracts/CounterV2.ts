/**
 * CounterV2 - appends `newVar` by taking one slot from V1's gap
 */

import type { Abi } from 'viem';
import { argUint, checkedAdd, type MethodTable } from '../runtime/base';
import { defineLayout, type StorageLayout } from '../runtime/layout';
import { CounterV1, counterV1Abi } from './CounterV1';

export const COUNTER_V2_LAYOUT = defineLayout('CounterV2', [
  { label: 'value', type: 'uint256' },
  { label: 'newVar', type: 'uint256' },
  { label: '__gap', type: 'gap', length: 48 },
]);

export const counterV2Abi = [
  ...counterV1Abi,
  {
    type: 'function',
    name: 'initializeV2',
    stateMutability: 'nonpayable',
    inputs: [{ name: 'newVar', type: 'uint256' }],
    outputs: [],
  },
  {
    type: 'function',
    name: 'getNewVar',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'uint256' }],
  },
  {
    type: 'function',
    name: 'getTotal',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'uint256' }],
  },
] as const satisfies Abi;

export class CounterV2 extends CounterV1 {
  readonly abi: Abi = counterV2Abi;
  protected readonly layout: StorageLayout = COUNTER_V2_LAYOUT;

  initializeV2(newVar: bigint): void {
    this._reinitializer(2n, () => {
      this._sstore(this.layout.slotOf('newVar'), newVar);
    });
  }

  getNewVar(): bigint {
    return this._sload(this.layout.slotOf('newVar'));
  }

  getTotal(): bigint {
    return checkedAdd(this.getValue(), this.getNewVar());
  }

  protected _methods(): MethodTable {
    return {
      ...super._methods(),
      initializeV2: args => this.initializeV2(argUint(args, 0)),
      getNewVar: () => this.getNewVar(),
      getTotal: () => this.getTotal(),
    };
  }
}
