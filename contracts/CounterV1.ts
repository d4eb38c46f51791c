/**
 * CounterV1 - first version of the upgradeable counter
 *
 * Business state is a single sequential field followed by a gap reserved for
 * later versions. Upgrades are authorized by the owner (UUPS).
 */

import type { Abi } from 'viem';
import { argAddress, argUint, checkedAdd, type MethodTable } from '../runtime/base';
import { defineLayout, type StorageLayout } from '../runtime/layout';
import { UUPSUpgradeable, uupsAbi } from '../runtime/UUPSUpgradeable';

export const COUNTER_V1_LAYOUT = defineLayout('CounterV1', [
  { label: 'value', type: 'uint256' },
  { label: '__gap', type: 'gap', length: 49 },
]);

export const counterV1Abi = [
  ...uupsAbi,
  {
    type: 'function',
    name: 'initialize',
    stateMutability: 'nonpayable',
    inputs: [
      { name: 'initialOwner', type: 'address' },
      { name: 'initialValue', type: 'uint256' },
    ],
    outputs: [],
  },
  {
    type: 'function',
    name: 'setValue',
    stateMutability: 'nonpayable',
    inputs: [{ name: 'newValue', type: 'uint256' }],
    outputs: [],
  },
  {
    type: 'function',
    name: 'increment',
    stateMutability: 'nonpayable',
    inputs: [],
    outputs: [],
  },
  {
    type: 'function',
    name: 'getValue',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'uint256' }],
  },
  {
    type: 'event',
    name: 'ValueChanged',
    inputs: [{ name: 'value', type: 'uint256', indexed: false }],
  },
] as const satisfies Abi;

export interface CounterOptions {
  /**
   * Lock this instance's own initializers at deployment. Leaving it off
   * reproduces the uninitialized-implementation takeover.
   */
  disableInitializers?: boolean;
}

export class CounterV1 extends UUPSUpgradeable {
  readonly abi: Abi = counterV1Abi;
  protected readonly layout: StorageLayout = COUNTER_V1_LAYOUT;
  private readonly lockOnDeploy: boolean;

  constructor(options: CounterOptions = {}) {
    super();
    this.lockOnDeploy = options.disableInitializers ?? true;
  }

  _afterDeploy(): void {
    if (this.lockOnDeploy) {
      this._disableInitializers();
    }
  }

  initialize(initialOwner: string, initialValue: bigint): void {
    this._initializer(() => {
      this.__Ownable_init(initialOwner);
      this._setValue(initialValue);
    });
  }

  setValue(newValue: bigint): void {
    this._setValue(newValue);
  }

  increment(): void {
    this._setValue(checkedAdd(this.getValue(), 1n));
  }

  getValue(): bigint {
    return this._sload(this.layout.slotOf('value'));
  }

  protected _setValue(newValue: bigint): void {
    this._sstore(this.layout.slotOf('value'), newValue);
    this._emitEvent('ValueChanged', { value: newValue });
  }

  protected _authorizeUpgrade(): void {
    this._checkOwner();
  }

  protected _methods(): MethodTable {
    return {
      ...super._methods(),
      initialize: args => this.initialize(argAddress(args, 0), argUint(args, 1)),
      setValue: args => this.setValue(argUint(args, 0)),
      increment: () => this.increment(),
      getValue: () => this.getValue(),
    };
  }
}
