/**
 * Base Contract class and core utilities
 *
 * This file is separate from index.ts to avoid circular dependencies
 * between the contract base class, the dispatcher and the environment.
 */

import {
  BaseError,
  decodeFunctionData,
  encodeFunctionResult,
  getContractAddress,
  isAddress,
  isHex,
  maxUint256,
  AbiFunctionSignatureNotFoundError,
  type Abi,
  type Hex,
} from 'viem';
import { revert } from './errors';

// =============================================================================
// CONSTANTS
// =============================================================================

export const ADDRESS_ZERO = '0x0000000000000000000000000000000000000000';

export function normalizeAddress(addr: string): string {
  return addr.toLowerCase();
}

export function isZeroAddress(addr: string): boolean {
  return normalizeAddress(addr) === ADDRESS_ZERO;
}

/**
 * uint256 addition that reverts instead of leaving the word range
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > maxUint256) {
    revert('ArithmeticOverflow', `${a} + ${b} exceeds uint256`);
  }
  return sum;
}

// =============================================================================
// STORAGE SIMULATION
// =============================================================================

export type StorageSnapshot = ReadonlyMap<bigint, bigint>;

/**
 * Simulates a contract's persistent storage.
 * Each contract instance owns exactly one Storage. Slots carry no type; the
 * caller decides how to read the raw 256-bit word.
 */
export class Storage {
  private slots: Map<bigint, bigint> = new Map();

  /**
   * Read from a storage slot (SLOAD equivalent)
   */
  sload(slot: bigint): bigint {
    return this.slots.get(slot) ?? 0n;
  }

  /**
   * Write to a storage slot (SSTORE equivalent). Words are unsigned 256-bit.
   */
  sstore(slot: bigint, value: bigint): void {
    if (value < 0n || value > maxUint256) {
      revert('ValueOutOfRange', `${value} does not fit a storage word`);
    }
    if (value === 0n) {
      this.slots.delete(slot);
    } else {
      this.slots.set(slot, value);
    }
  }

  snapshot(): StorageSnapshot {
    return new Map(this.slots);
  }

  restore(snapshot: StorageSnapshot): void {
    this.slots = new Map(snapshot);
  }

  /**
   * Non-zero slots in ascending order (for debugging)
   */
  entries(): Array<[bigint, bigint]> {
    return [...this.slots.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  get size(): number {
    return this.slots.size;
  }
}

// =============================================================================
// EVENT STREAM
// =============================================================================

export interface EmittedEvent {
  name: string;
  args: Record<string, unknown>;
  emitter: string; // Address whose storage context emitted the event
}

/**
 * Captures events emitted during contract execution.
 * Unlike on-chain events, these are stored in memory for testing.
 */
export class EventStream {
  private events: EmittedEvent[] = [];

  emit(name: string, args: Record<string, unknown>, emitter: string): void {
    this.events.push({ name, args, emitter });
  }

  getAll(): EmittedEvent[] {
    return [...this.events];
  }

  getByName(name: string): EmittedEvent[] {
    return this.events.filter(e => e.name === name);
  }

  /**
   * Drop everything emitted after the stream had `length` events (rollback)
   */
  truncate(length: number): void {
    this.events.length = Math.min(length, this.events.length);
  }

  clear(): void {
    this.events = [];
  }

  get length(): number {
    return this.events.length;
  }

  get latest(): EmittedEvent | undefined {
    return this.events[this.events.length - 1];
  }
}

// =============================================================================
// CONTRACT ADDRESS MANAGEMENT
// =============================================================================

/**
 * Hands out CREATE-style addresses: keccak256(rlp(deployer, nonce)).
 * Nonces are tracked per deployer so addresses are deterministic per run.
 */
export class AddressAllocator {
  private nonces: Map<string, bigint> = new Map();

  next(deployer: string): string {
    const from = normalizeAddress(deployer);
    if (!isAddress(from, { strict: false })) {
      throw new TypeError(`invalid deployer address ${deployer}`);
    }
    const nonce = this.nonces.get(from) ?? 0n;
    this.nonces.set(from, nonce + 1n);
    return normalizeAddress(getContractAddress({ from, nonce }));
  }

  clear(): void {
    this.nonces.clear();
  }
}

// =============================================================================
// EXECUTION CONTEXT
// =============================================================================

/**
 * Whose storage a piece of code touches, and on whose behalf.
 * `self` is address(this): the proxy address under delegated execution.
 */
export interface ExecutionContext {
  readonly storage: Storage;
  readonly self: string;
  readonly sender: string;
  readonly delegated: boolean;
  readonly depth: number;
}

/**
 * What a deployed contract needs from the environment hosting it.
 */
export interface Host {
  readonly events: EventStream;
  has(address: string): boolean;
  codeAt(address: string): Contract;
  delegateCall(code: Contract, caller: ExecutionContext, data: Hex): Hex;
}

export type MethodHandler = (args: readonly unknown[]) => unknown;
export type MethodTable = Readonly<Record<string, MethodHandler>>;

// =============================================================================
// ARGUMENT DECODING
// =============================================================================

export function argAddress(args: readonly unknown[], index: number): string {
  const value = args[index];
  if (typeof value !== 'string' || !isAddress(value, { strict: false })) {
    revert('InvalidCalldata', `argument ${index} is not an address`);
  }
  return normalizeAddress(value);
}

export function argUint(args: readonly unknown[], index: number): bigint {
  const value = args[index];
  if (typeof value !== 'bigint') {
    revert('InvalidCalldata', `argument ${index} is not an integer`);
  }
  return value;
}

export function argBytes(args: readonly unknown[], index: number): Hex {
  const value = args[index];
  if (typeof value !== 'string' || !isHex(value)) {
    revert('InvalidCalldata', `argument ${index} is not a byte string`);
  }
  return value;
}

export interface DecodedCall {
  readonly functionName: string;
  readonly args: readonly unknown[];
}

/**
 * Match calldata against a contract's ABI
 */
export function decodeCall(code: Contract, data: Hex): DecodedCall {
  if (data.length < 10) {
    revert('FunctionNotFound', `${code.constructor.name} has no fallback for calldata ${data}`);
  }
  try {
    const { functionName, args } = decodeFunctionData({ abi: code.abi, data });
    return { functionName, args: args ?? [] };
  } catch (err) {
    if (err instanceof AbiFunctionSignatureNotFoundError) {
      revert('FunctionNotFound', `${code.constructor.name} has no function for selector ${data.slice(0, 10)}`);
    }
    if (err instanceof BaseError) {
      revert('InvalidCalldata', `${code.constructor.name}: ${err.shortMessage}`);
    }
    throw err;
  }
}

// =============================================================================
// BASE CONTRACT CLASS
// =============================================================================

/**
 * Base class for all contracts hosted by an Environment.
 *
 * Code and storage are kept apart: every `_sload`/`_sstore` goes to the
 * storage of the current execution context, which is this instance's own
 * store for direct calls and the caller's store under delegation.
 */
export abstract class Contract {
  // Storage owned by this contract instance
  protected readonly _storage: Storage = new Storage();

  // Contract's own address, assigned at deployment
  public _contractAddress: string = ADDRESS_ZERO;

  private _host?: Host;
  private _frames: ExecutionContext[] = [];

  abstract readonly abi: Abi;

  /**
   * Functions reachable through calldata, keyed by ABI function name
   */
  protected abstract _methods(): MethodTable;

  get storage(): Storage {
    return this._storage;
  }

  get address(): string {
    return this._contractAddress;
  }

  get deployed(): boolean {
    return this._host !== undefined;
  }

  protected get _env(): Host {
    if (!this._host) {
      throw new Error(`${this.constructor.name} is not deployed`);
    }
    return this._host;
  }

  /**
   * Bind to a host at a fresh address (called by Environment.deploy)
   */
  attach(host: Host, address: string): void {
    if (this._host) {
      throw new Error(`${this.constructor.name} is already deployed at ${this._contractAddress}`);
    }
    this._host = host;
    this._contractAddress = normalizeAddress(address);
  }

  detach(): void {
    this._host = undefined;
    this._contractAddress = ADDRESS_ZERO;
  }

  /**
   * Constructor logic that needs the host (runs inside the deploy transaction)
   */
  _afterDeploy(): void {}

  /**
   * Context for a direct call into this instance
   */
  ownContext(sender: string, depth: number = 0): ExecutionContext {
    return {
      storage: this._storage,
      self: this._contractAddress,
      sender: normalizeAddress(sender),
      delegated: false,
      depth,
    };
  }

  /**
   * Run `fn` with all storage access redirected to `ctx.storage`
   */
  runInContext<T>(ctx: ExecutionContext, fn: () => T): T {
    this._frames.push(ctx);
    try {
      return fn();
    } finally {
      this._frames.pop();
    }
  }

  /**
   * Entry point for calldata. Runs in whatever context the caller set up.
   */
  handle(data: Hex): Hex {
    const call = decodeCall(this, data);
    const result = this.dispatch(call.functionName, call.args);
    return encodeFunctionResult({ abi: this.abi, functionName: call.functionName, result });
  }

  dispatch(functionName: string, args: readonly unknown[]): unknown {
    const handler: MethodHandler | undefined = this._methods()[functionName];
    if (!handler) {
      revert('FunctionNotFound', `${this.constructor.name}.${functionName}`);
    }
    return handler(args);
  }

  protected get _ctx(): ExecutionContext {
    return this._frames[this._frames.length - 1] ?? this.ownContext(ADDRESS_ZERO);
  }

  protected get _msgSender(): string {
    return this._ctx.sender;
  }

  /**
   * address(this) for the running code
   */
  protected get _self(): string {
    return this._ctx.self;
  }

  protected _sload(slot: bigint): bigint {
    return this._ctx.storage.sload(slot);
  }

  protected _sstore(slot: bigint, value: bigint): void {
    this._ctx.storage.sstore(slot, value);
  }

  protected _emitEvent(name: string, args: Record<string, unknown>): void {
    this._env.events.emit(name, args, this._self);
  }
}
