/**
 * Transparent proxy with an external upgrade authority
 *
 * Upgrade and admin management are functions of the proxy itself, checked
 * by an UpgradePolicy. Everything else is forwarded to the implementation.
 */

import type { Abi, Hex } from 'viem';
import { argAddress, argBytes, isZeroAddress, normalizeAddress, type ExecutionContext, type MethodTable } from './base';
import { revert } from './errors';
import { upgradeAbi, upgradeImplementation } from './ERC1967Upgrade';
import { decodeAddress, encodeAddress } from './layout';
import { Proxy, type ProxyOptions } from './Proxy';
import type { ProxySlots } from './slots';

/**
 * Decides who may repoint a proxy. Throws to refuse.
 */
export interface UpgradePolicy {
  authorize(ctx: ExecutionContext, slots: ProxySlots): void;
}

/**
 * Only the address recorded in the proxy's admin slot may upgrade.
 */
export class AdminPolicy implements UpgradePolicy {
  authorize(ctx: ExecutionContext, slots: ProxySlots): void {
    const admin = decodeAddress(ctx.storage.sload(slots.admin));
    if (ctx.sender !== admin) {
      revert('Unauthorized', `${ctx.sender} is not the proxy admin`);
    }
  }
}

export const transparentProxyAbi = [
  ...upgradeAbi,
  {
    type: 'function',
    name: 'admin',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'address' }],
  },
  {
    type: 'function',
    name: 'implementation',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'address' }],
  },
  {
    type: 'function',
    name: 'changeAdmin',
    stateMutability: 'nonpayable',
    inputs: [{ name: 'newAdmin', type: 'address' }],
    outputs: [],
  },
  {
    type: 'event',
    name: 'AdminChanged',
    inputs: [
      { name: 'previousAdmin', type: 'address', indexed: false },
      { name: 'newAdmin', type: 'address', indexed: false },
    ],
  },
] as const satisfies Abi;

export interface TransparentProxyOptions extends ProxyOptions {
  admin: string;
  policy?: UpgradePolicy;
}

export class TransparentProxy extends Proxy {
  readonly abi = transparentProxyAbi;
  private readonly initialAdmin: string;
  private readonly policy: UpgradePolicy;

  constructor(implementation: string, initData: Hex, options: TransparentProxyOptions) {
    super(implementation, initData, options);
    this.initialAdmin = normalizeAddress(options.admin);
    this.policy = options.policy ?? new AdminPolicy();
  }

  _afterDeploy(): void {
    this._changeAdmin(this.initialAdmin);
    super._afterDeploy();
  }

  upgradeToAndCall(newImplementation: string, data: Hex): void {
    this.policy.authorize(this._ctx, this.slots);
    upgradeImplementation(this._env, this._ctx, this.slots, newImplementation, data);
  }

  changeAdmin(newAdmin: string): void {
    this.policy.authorize(this._ctx, this.slots);
    this._changeAdmin(newAdmin);
  }

  private _changeAdmin(newAdmin: string): void {
    if (isZeroAddress(newAdmin)) {
      revert('InvalidAdmin', 'admin cannot be the zero address');
    }
    const previousAdmin = this.admin();
    this._sstore(this.slots.admin, encodeAddress(newAdmin));
    this._emitEvent('AdminChanged', { previousAdmin, newAdmin: normalizeAddress(newAdmin) });
  }

  protected _methods(): MethodTable {
    return {
      admin: () => this.admin(),
      implementation: () => this.implementation(),
      changeAdmin: args => this.changeAdmin(argAddress(args, 0)),
      upgradeToAndCall: args => this.upgradeToAndCall(argAddress(args, 0), argBytes(args, 1)),
    };
  }
}
