/**
 * UUPSUpgradeable - upgrades authorized by the implementation itself
 *
 * The upgrade function lives in the implementation and runs delegated in the
 * proxy's storage. Subclasses decide who may upgrade by overriding
 * _authorizeUpgrade. Builds on OwnableUpgradeable since every self-upgrading
 * contract here authorizes through an owner.
 *
 * The implementation pointer is read and written in the slots of the proxy
 * that forwarded the call, ERC-1967 unless that proxy was deployed with
 * others.
 */

import type { Hex } from 'viem';
import { argAddress, argBytes, type MethodTable } from './base';
import { revert } from './errors';
import { readImplementation, requireCode, upgradeAbi, upgradeImplementation } from './ERC1967Upgrade';
import { OwnableUpgradeable, ownableAbi } from './OwnableUpgradeable';
import { Proxy } from './Proxy';
import { IMPLEMENTATION_SLOT, slotToHex, type ProxySlots } from './slots';

export const uupsAbi = [
  ...ownableAbi,
  ...upgradeAbi,
  {
    type: 'function',
    name: 'proxiableUUID',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'bytes32' }],
  },
] as const;

export abstract class UUPSUpgradeable extends OwnableUpgradeable {
  /**
   * Who may upgrade. Throw to refuse.
   */
  protected abstract _authorizeUpgrade(newImplementation: string): void;

  /**
   * Only through a proxy whose implementation slot points at this instance.
   * Returns that proxy's slots.
   */
  protected _onlyProxy(): ProxySlots {
    const ctx = this._ctx;
    const caller = ctx.delegated && this._env.has(ctx.self) ? this._env.codeAt(ctx.self) : undefined;
    if (!(caller instanceof Proxy) || readImplementation(ctx, caller.slots) !== this.address) {
      revert('UnauthorizedCallContext', 'must be called through an active proxy');
    }
    return caller.slots;
  }

  /**
   * Only directly on the implementation, never through a proxy
   */
  protected _notDelegated(): void {
    if (this._ctx.delegated) {
      revert('UnauthorizedCallContext', 'must not be called through delegatecall');
    }
  }

  proxiableUUID(): Hex {
    this._notDelegated();
    return slotToHex(IMPLEMENTATION_SLOT);
  }

  upgradeToAndCall(newImplementation: string, data: Hex): void {
    const slots = this._onlyProxy();
    this._authorizeUpgrade(newImplementation);

    // The target must itself be upgradeable, or the proxy would be frozen on it
    const code = requireCode(this._env, newImplementation);
    if (!(code instanceof UUPSUpgradeable)) {
      revert('InvalidImplementation', `${code.constructor.name} is not UUPS upgradeable`);
    }
    const uuid = code.runInContext(code.ownContext(this._self, this._ctx.depth + 1), () => code.proxiableUUID());
    if (uuid !== slotToHex(IMPLEMENTATION_SLOT)) {
      revert('InvalidImplementation', `unsupported proxiableUUID ${uuid}`);
    }

    upgradeImplementation(this._env, this._ctx, slots, newImplementation, data);
  }

  protected _methods(): MethodTable {
    return {
      ...super._methods(),
      proxiableUUID: () => this.proxiableUUID(),
      upgradeToAndCall: args => this.upgradeToAndCall(argAddress(args, 0), argBytes(args, 1)),
    };
  }
}
