/**
 * Initializable - one-shot and versioned setup for proxied contracts
 *
 * Proxied code cannot use constructors for setup: a constructor only ever
 * writes the implementation's own store. Setup runs instead through
 * initializer functions guarded by this state machine:
 *
 *   Uninitialized --initializer--------> Initialized(1)
 *   Initialized(n) --reinitializer(n+1)-> Initialized(n+1)
 *   Uninitialized --disableInitializers-> Locked (terminal)
 *
 * The state lives in INITIALIZABLE_SLOT of whatever store the code runs
 * against, so a proxy and the implementation it points at are guarded
 * independently.
 */

import { Contract, type MethodTable } from './base';
import { revert } from './errors';
import { INITIALIZABLE_SLOT } from './slots';

// Word layout of INITIALIZABLE_SLOT:
// epoch: uint64 (bits 0-63)
// initializing: bool (bit 64)
const EPOCH_MASK = (1n << 64n) - 1n;
const INITIALIZING_FLAG = 1n << 64n;

/** Epoch value marking an instance whose initializers are disabled for good */
export const LOCKED_EPOCH = EPOCH_MASK;

export type InitializationState =
  | { readonly kind: 'Uninitialized' }
  | { readonly kind: 'Initialized'; readonly epoch: bigint }
  | { readonly kind: 'Locked' };

export function decodeInitializationState(word: bigint): InitializationState {
  const epoch = word & EPOCH_MASK;
  if (epoch === 0n) return { kind: 'Uninitialized' };
  if (epoch === LOCKED_EPOCH) return { kind: 'Locked' };
  return { kind: 'Initialized', epoch };
}

export const initializableAbi = [
  {
    type: 'function',
    name: 'getInitializedVersion',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'uint64' }],
  },
  {
    type: 'function',
    name: 'isInitializing',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'bool' }],
  },
  {
    type: 'event',
    name: 'Initialized',
    inputs: [{ name: 'version', type: 'uint64', indexed: false }],
  },
] as const;

export abstract class Initializable extends Contract {
  private get _initWord(): bigint {
    return this._sload(INITIALIZABLE_SLOT);
  }

  private _writeInitWord(epoch: bigint, initializing: boolean): void {
    this._sstore(INITIALIZABLE_SLOT, (epoch & EPOCH_MASK) | (initializing ? INITIALIZING_FLAG : 0n));
  }

  protected get _initializedVersion(): bigint {
    return this._initWord & EPOCH_MASK;
  }

  protected get _initializing(): boolean {
    return (this._initWord & INITIALIZING_FLAG) !== 0n;
  }

  /**
   * Guard for the first setup call. Runs `body` with the initializing flag set.
   */
  protected _initializer<T>(body: () => T): T {
    const version = this._initializedVersion;
    if (version === LOCKED_EPOCH) {
      revert('InitializerDisabled');
    }
    if (version !== 0n) {
      revert('AlreadyInitialized', `initialized at version ${version}`);
    }
    return this._runInitializer(1n, body);
  }

  /**
   * Guard for post-upgrade setup. `epoch` must be exactly one past the
   * current version.
   */
  protected _reinitializer<T>(epoch: bigint, body: () => T): T {
    const version = this._initializedVersion;
    if (version === LOCKED_EPOCH) {
      revert('InitializerDisabled');
    }
    if (this._initializing) {
      revert('AlreadyInitialized', 'reinitializer called while initializing');
    }
    if (epoch !== version + 1n) {
      revert('InvalidReinitializationEpoch', `expected ${version + 1n}, got ${epoch}`);
    }
    return this._runInitializer(epoch, body);
  }

  private _runInitializer<T>(epoch: bigint, body: () => T): T {
    this._writeInitWord(epoch, true);
    const result = body();
    this._writeInitWord(epoch, false);
    this._emitEvent('Initialized', { version: epoch });
    return result;
  }

  /**
   * Guard for setup helpers that may only run inside an initializer.
   */
  protected _onlyInitializing(): void {
    if (!this._initializing) {
      revert('NotInitializing');
    }
  }

  /**
   * Lock the executing store against any future initialization. Meant for
   * the construction of implementations that are only ever delegated to.
   */
  protected _disableInitializers(): void {
    if (this._initializing) {
      revert('AlreadyInitialized', 'cannot lock while initializing');
    }
    const version = this._initializedVersion;
    if (version === LOCKED_EPOCH) return;
    if (version !== 0n) {
      revert('AlreadyInitialized', `initialized at version ${version}`);
    }
    this._writeInitWord(LOCKED_EPOCH, false);
    this._emitEvent('Initialized', { version: LOCKED_EPOCH });
  }

  protected _methods(): MethodTable {
    return {
      getInitializedVersion: () => this._initializedVersion,
      isInitializing: () => this._initializing,
    };
  }
}
