/**
 * Proxy contracts
 *
 * A proxy owns the storage and forwards every call it does not answer itself
 * to the implementation recorded in its implementation slot. The forwarded
 * code runs against the proxy's store through the host's delegate call.
 */

import { toFunctionSelector, type Abi, type Hex } from 'viem';
import { Contract, type MethodTable } from './base';
import { readImplementation, requireCode, upgradeImplementation } from './ERC1967Upgrade';
import { decodeAddress } from './layout';
import { ERC1967_SLOTS, type ProxySlots } from './slots';

export interface ProxyOptions {
  /** Where the proxy keeps its control data (ERC-1967 slots by default) */
  slots?: ProxySlots;
}

export abstract class Proxy extends Contract {
  readonly slots: ProxySlots;
  private _ownSelectors?: ReadonlySet<string>;

  constructor(
    readonly initialImplementation: string,
    readonly initData: Hex = '0x',
    options: ProxyOptions = {},
  ) {
    super();
    this.slots = options.slots ?? ERC1967_SLOTS;
  }

  /**
   * Runs as part of deployment: record the implementation and, when init
   * data was given, delegate it to the implementation. A failing init call
   * aborts the deployment.
   */
  _afterDeploy(): void {
    upgradeImplementation(this._env, this._ctx, this.slots, this.initialImplementation, this.initData);
  }

  implementation(): string {
    return readImplementation(this._ctx, this.slots);
  }

  admin(): string {
    return decodeAddress(this._sload(this.slots.admin));
  }

  /**
   * Own functions first; everything else goes to the implementation
   */
  handle(data: Hex): Hex {
    return this._answers(data) ? super.handle(data) : this._fallback(data);
  }

  protected _fallback(data: Hex): Hex {
    const code = requireCode(this._env, this.implementation());
    return this._env.delegateCall(code, this._ctx, data);
  }

  private _answers(data: Hex): boolean {
    if (!this._ownSelectors) {
      this._ownSelectors = new Set(ownSelectors(this.abi));
    }
    return this._ownSelectors.has(data.slice(0, 10).toLowerCase());
  }
}

function ownSelectors(abi: Abi): string[] {
  const selectors: string[] = [];
  for (const item of abi) {
    if (item.type === 'function') {
      selectors.push(toFunctionSelector(item));
    }
  }
  return selectors;
}

/**
 * Minimal ERC-1967 proxy. It exposes no functions of its own, so upgrades
 * have to come from the implementation (see UUPSUpgradeable).
 */
export class ERC1967Proxy extends Proxy {
  readonly abi = [] as const satisfies Abi;

  protected _methods(): MethodTable {
    return {};
  }
}
