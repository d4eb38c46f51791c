/**
 * OwnableUpgradeable - single owner authorization for proxied contracts
 *
 * The owner lives in OWNER_SLOT of the executing store rather than in a
 * sequential field, so adding it to a contract never shifts business fields.
 */

import { ADDRESS_ZERO, argAddress, isZeroAddress, normalizeAddress, type MethodTable } from './base';
import { revert } from './errors';
import { Initializable, initializableAbi } from './Initializable';
import { decodeAddress, encodeAddress } from './layout';
import { OWNER_SLOT } from './slots';

export const ownableAbi = [
  ...initializableAbi,
  {
    type: 'function',
    name: 'owner',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'address' }],
  },
  {
    type: 'function',
    name: 'transferOwnership',
    stateMutability: 'nonpayable',
    inputs: [{ name: 'newOwner', type: 'address' }],
    outputs: [],
  },
  {
    type: 'function',
    name: 'renounceOwnership',
    stateMutability: 'nonpayable',
    inputs: [],
    outputs: [],
  },
  {
    type: 'event',
    name: 'OwnershipTransferred',
    inputs: [
      { name: 'previousOwner', type: 'address', indexed: true },
      { name: 'newOwner', type: 'address', indexed: true },
    ],
  },
] as const;

export abstract class OwnableUpgradeable extends Initializable {
  /**
   * Set the first owner. Only callable from inside an initializer.
   */
  protected __Ownable_init(initialOwner: string): void {
    this._onlyInitializing();
    if (isZeroAddress(initialOwner)) {
      revert('InvalidOwner', 'owner cannot be the zero address');
    }
    this._setOwner(initialOwner);
  }

  protected _setOwner(newOwner: string): void {
    const previousOwner = this.owner();
    this._sstore(OWNER_SLOT, encodeAddress(newOwner));
    this._emitEvent('OwnershipTransferred', { previousOwner, newOwner: normalizeAddress(newOwner) });
  }

  /**
   * Reverts if not called by owner
   */
  protected _checkOwner(): void {
    if (this._msgSender !== this.owner()) {
      revert('Unauthorized', `${this._msgSender} is not the owner`);
    }
  }

  owner(): string {
    return decodeAddress(this._sload(OWNER_SLOT));
  }

  transferOwnership(newOwner: string): void {
    this._checkOwner();
    if (isZeroAddress(newOwner)) {
      revert('InvalidOwner', 'owner cannot be the zero address');
    }
    this._setOwner(newOwner);
  }

  renounceOwnership(): void {
    this._checkOwner();
    this._setOwner(ADDRESS_ZERO);
  }

  protected _methods(): MethodTable {
    return {
      ...super._methods(),
      owner: () => this.owner(),
      transferOwnership: args => this.transferOwnership(argAddress(args, 0)),
      renounceOwnership: () => this.renounceOwnership(),
    };
  }
}
